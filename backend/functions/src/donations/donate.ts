/**
 * Donate Firebase Function
 * Donation Registry
 */

import { onCall } from 'firebase-functions/v2/https';
import Joi from 'joi';
import { logger } from '../utils/logger';
import { withErrorHandling } from '../utils/errors';
import { registrySchemas, validateWithJoi } from '../utils/validation';
import { authHelper, CallerRequest } from '../utils/auth';
import { toEventView } from '../utils/views';
import { helpers } from '../utils/helpers';
import { donationRegistry } from '../registry/donationRegistry';
import { DonationsAPI } from '../types/api';
import { CALLABLE_OPTIONS } from '../utils/constants';

/**
 * Schéma de validation pour la requête
 */
const requestSchema = Joi.object<DonationsAPI.DonateRequest>({
  projectId: registrySchemas.projectId,
  message: registrySchemas.text,
  amount: registrySchemas.amount,
}).required();

/**
 * Transfère `amount` de l'appelant vers le créateur du projet,
 * crédite le grand livre et émet l'événement Donate
 */
export const handleDonate = withErrorHandling(
  async (request: CallerRequest): Promise<DonationsAPI.DonateResponse> => {
    const caller = authHelper.requireCallerAddress(request);
    const data = validateWithJoi(requestSchema, request.data);
    const amount = helpers.amount.parse(data.amount);

    logger.info('Processing donation', {
      caller,
      projectId: data.projectId,
      amount,
    });

    const result = await donationRegistry.donate(caller, data.projectId, data.message, amount);

    logger.info('Donation processed successfully', {
      caller,
      projectId: result.projectId,
      seq: result.event.seq,
    });

    return {
      projectId: result.projectId,
      receiver: result.receiver,
      amount: helpers.amount.format(result.amount),
      totalDonated: helpers.amount.format(result.totalDonated),
      time: result.time,
      event: toEventView(result.event),
    };
  }
);

export const donate = onCall(CALLABLE_OPTIONS, handleDonate);
