/**
 * Get Donated Firebase Function
 * Donation Registry
 */

import { onCall } from 'firebase-functions/v2/https';
import Joi from 'joi';
import { withErrorHandling } from '../utils/errors';
import { registrySchemas, validateWithJoi } from '../utils/validation';
import { CallerRequest } from '../utils/auth';
import { helpers } from '../utils/helpers';
import { donationRegistry } from '../registry/donationRegistry';
import { DonationsAPI } from '../types/api';
import { CALLABLE_OPTIONS } from '../utils/constants';

const requestSchema = Joi.object<DonationsAPI.GetDonatedRequest>({
  donor: registrySchemas.address,
  projectId: registrySchemas.projectId,
}).required();

/**
 * Total cumulé donné par `donor` au projet; 0 si aucun don
 */
export const handleGetDonated = withErrorHandling(
  async (request: CallerRequest): Promise<DonationsAPI.GetDonatedResponse> => {
    const data = validateWithJoi(requestSchema, request.data);
    const amount = await donationRegistry.getDonated(data.donor, data.projectId);

    return {
      donor: data.donor,
      projectId: data.projectId,
      amount: helpers.amount.format(amount),
    };
  }
);

export const getDonated = onCall(CALLABLE_OPTIONS, handleGetDonated);
