/**
 * Modify Project Description Firebase Function
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

const requestSchema = Joi.object<ProjectsAPI.ModifyDescriptionRequest>({
  projectId: registrySchemas.projectId,
  description: registrySchemas.text,
}).required();

/**
 * Remplace la description courante (émise en événement, jamais stockée sur le projet)
 */
export const handleModifyProjectDescription = withErrorHandling(
  async (request: CallerRequest): Promise<ProjectsAPI.ProjectMutationResponse> => {
    const caller = authHelper.requireCallerAddress(request);
    const data = validateWithJoi(requestSchema, request.data);

    logger.info('Modifying project description', { caller, projectId: data.projectId });

    const result = await donationRegistry.modifyDescription(caller, data.projectId, data.description);

    return {
      projectId: result.projectId,
      time: result.time,
      event: toEventView(result.event),
    };
  }
);

export const modifyProjectDescription = onCall(CALLABLE_OPTIONS, handleModifyProjectDescription);
