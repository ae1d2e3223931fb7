/**
 * Get Project History Firebase Function
 * Donation Registry
 */

import { onCall } from 'firebase-functions/v2/https';
import Joi from 'joi';
import { withErrorHandling } from '../utils/errors';
import { registrySchemas, validateWithJoi } from '../utils/validation';
import { CallerRequest } from '../utils/auth';
import { toHistoryResponse } from '../utils/views';
import { donationRegistry } from '../registry/donationRegistry';
import { ProjectsAPI } from '../types/api';
import { CALLABLE_OPTIONS } from '../utils/constants';

const requestSchema = Joi.object<ProjectsAPI.GetProjectRequest>({
  projectId: registrySchemas.projectId,
}).required();

/**
 * Rejoue tous les événements du projet : description courante, cessation, total des dons
 */
export const handleGetProjectHistory = withErrorHandling(
  async (request: CallerRequest): Promise<ProjectsAPI.ProjectHistoryResponse> => {
    const data = validateWithJoi(requestSchema, request.data);
    const history = await donationRegistry.getProjectHistory(data.projectId);
    return toHistoryResponse(history);
  }
);

export const getProjectHistory = onCall(CALLABLE_OPTIONS, handleGetProjectHistory);
