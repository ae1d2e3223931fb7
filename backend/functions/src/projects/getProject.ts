/**
 * Get Project Firebase Function
 * Donation Registry
 */

import { onCall } from 'firebase-functions/v2/https';
import Joi from 'joi';
import { withErrorHandling } from '../utils/errors';
import { registrySchemas, validateWithJoi } from '../utils/validation';
import { CallerRequest } from '../utils/auth';
import { toProjectView } from '../utils/views';
import { donationRegistry } from '../registry/donationRegistry';
import { ProjectView, ProjectsAPI } from '../types/api';
import { CALLABLE_OPTIONS } from '../utils/constants';

const requestSchema = Joi.object<ProjectsAPI.GetProjectRequest>({
  projectId: registrySchemas.projectId,
}).required();

/**
 * Lecture publique : un identifiant inconnu renvoie l'enregistrement vide
 */
export const handleGetProject = withErrorHandling(
  async (request: CallerRequest): Promise<ProjectView> => {
    const data = validateWithJoi(requestSchema, request.data);
    const project = await donationRegistry.getProject(data.projectId);
    return toProjectView(project);
  }
);

export const getProject = onCall(CALLABLE_OPTIONS, handleGetProject);
