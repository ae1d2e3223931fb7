/**
 * Get Balance Firebase Function
 * Donation Registry
 */

import { onCall } from 'firebase-functions/v2/https';
import Joi from 'joi';
import { withErrorHandling } from '../utils/errors';
import { registrySchemas, validateWithJoi } from '../utils/validation';
import { CallerRequest } from '../utils/auth';
import { toAccountResponse } from '../utils/views';
import { donationRegistry } from '../registry/donationRegistry';
import { AccountsAPI } from '../types/api';
import { CALLABLE_OPTIONS } from '../utils/constants';

const requestSchema = Joi.object<AccountsAPI.GetBalanceRequest>({
  address: registrySchemas.address,
}).required();

export const handleGetBalance = withErrorHandling(
  async (request: CallerRequest): Promise<AccountsAPI.AccountResponse> => {
    const data = validateWithJoi(requestSchema, request.data);
    const account = await donationRegistry.getAccount(data.address);
    return toAccountResponse(account);
  }
);

export const getBalance = onCall(CALLABLE_OPTIONS, handleGetBalance);
