/**
 * Get Project Events Firebase Function
 * Donation Registry
 */

import { onCall } from 'firebase-functions/v2/https';
import Joi from 'joi';
import { withErrorHandling } from '../utils/errors';
import { registrySchemas, validateWithJoi } from '../utils/validation';
import { CallerRequest } from '../utils/auth';
import { toEventsPage } from '../utils/views';
import { donationRegistry } from '../registry/donationRegistry';
import { ProjectsAPI } from '../types/api';
import { CALLABLE_OPTIONS, REGISTRY_CONFIG } from '../utils/constants';

const requestSchema = Joi.object<ProjectsAPI.GetProjectEventsRequest>({
  projectId: registrySchemas.projectId,
  fromSeq: registrySchemas.fromSeq,
  limit: registrySchemas.limit,
}).required();

/**
 * Page d'événements d'un projet, par numéro de séquence croissant
 */
export const handleGetProjectEvents = withErrorHandling(
  async (request: CallerRequest): Promise<ProjectsAPI.GetProjectEventsResponse> => {
    const data = validateWithJoi(requestSchema, request.data);
    const limit = data.limit ?? REGISTRY_CONFIG.EVENTS_DEFAULT_LIMIT;

    const events = await donationRegistry.getProjectEvents(data.projectId, {
      fromSeq: data.fromSeq,
      limit,
    });

    return toEventsPage(data.projectId, events, limit);
  }
);

export const getProjectEvents = onCall(CALLABLE_OPTIONS, handleGetProjectEvents);
