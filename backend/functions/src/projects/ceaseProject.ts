/**
 * Cease Project Firebase Function
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

const requestSchema = Joi.object<ProjectsAPI.CeaseProjectRequest>({
  projectId: registrySchemas.projectId,
}).required();

export const handleCeaseProject = withErrorHandling(
  async (request: CallerRequest): Promise<ProjectsAPI.ProjectMutationResponse> => {
    const caller = authHelper.requireCallerAddress(request);
    const data = validateWithJoi(requestSchema, request.data);

    logger.info('Ceasing project', { caller, projectId: data.projectId });

    const result = await donationRegistry.cease(caller, data.projectId);

    logger.info('Project ceased successfully', { caller, projectId: result.projectId });

    return {
      projectId: result.projectId,
      time: result.time,
      event: toEventView(result.event),
    };
  }
);

export const ceaseProject = onCall(CALLABLE_OPTIONS, handleCeaseProject);
