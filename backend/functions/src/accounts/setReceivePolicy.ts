/**
 * Set Receive Policy Firebase Function
 * Donation Registry
 */

import { onCall } from 'firebase-functions/v2/https';
import Joi from 'joi';
import { withErrorHandling } from '../utils/errors';
import { validateWithJoi } from '../utils/validation';
import { authHelper, CallerRequest } from '../utils/auth';
import { toAccountResponse } from '../utils/views';
import { donationRegistry } from '../registry/donationRegistry';
import { AccountsAPI } from '../types/api';
import { CALLABLE_OPTIONS } from '../utils/constants';

const requestSchema = Joi.object<AccountsAPI.SetReceivePolicyRequest>({
  acceptsValue: Joi.boolean().required(),
}).required();

/**
 * Un compte qui refuse la valeur fait échouer tout don qui lui est destiné
 */
export const handleSetReceivePolicy = withErrorHandling(
  async (request: CallerRequest): Promise<AccountsAPI.AccountResponse> => {
    const caller = authHelper.requireCallerAddress(request);
    const data = validateWithJoi(requestSchema, request.data);
    const account = await donationRegistry.setReceivePolicy(caller, data.acceptsValue);
    return toAccountResponse(account);
  }
);

export const setReceivePolicy = onCall(CALLABLE_OPTIONS, handleSetReceivePolicy);
