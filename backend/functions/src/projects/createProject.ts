/**
 * Create Project Firebase Function
 * Donation Registry
 */

import { onCall } from 'firebase-functions/v2/https';
import Joi from 'joi';
import { logger } from '../utils/logger';
import { withErrorHandling } from '../utils/errors';
import { registrySchemas, validateWithJoi } from '../utils/validation';
import { authHelper, CallerRequest } from '../utils/auth';
import { toEventView } from '../utils/views';
import { donationRegistry } from '../registry/donationRegistry';
import { ProjectsAPI } from '../types/api';
import { CALLABLE_OPTIONS } from '../utils/constants';

/**
 * Schéma de validation pour la requête
 */
const requestSchema = Joi.object<ProjectsAPI.CreateProjectRequest>({
  name: registrySchemas.text,
  description: registrySchemas.text,
}).required();

/**
 * Enregistre un nouveau projet au nom de l'appelant
 */
export const handleCreateProject = withErrorHandling(
  async (request: CallerRequest): Promise<ProjectsAPI.CreateProjectResponse> => {
    const caller = authHelper.requireCallerAddress(request);
    const data = validateWithJoi(requestSchema, request.data);

    logger.info('Creating project', { caller, name: data.name });

    const result = await donationRegistry.create(caller, data.name, data.description);

    logger.info('Project created successfully', {
      caller,
      projectId: result.projectId,
      overwritten: result.overwritten,
    });

    return {
      projectId: result.projectId,
      createTime: result.createTime,
      overwritten: result.overwritten,
      event: toEventView(result.event),
    };
  }
);

export const createProject = onCall(CALLABLE_OPTIONS, handleCreateProject);
