/**
 * Fund Account Firebase Function
 * Donation Registry
 */

import { onCall } from 'firebase-functions/v2/https';
import Joi from 'joi';
import { logger } from '../utils/logger';
import { withErrorHandling } from '../utils/errors';
import { registrySchemas, validateWithJoi } from '../utils/validation';
import { authHelper, CallerRequest } from '../utils/auth';
import { toAccountResponse } from '../utils/views';
import { helpers } from '../utils/helpers';
import { donationRegistry } from '../registry/donationRegistry';
import { AccountsAPI } from '../types/api';
import { CALLABLE_OPTIONS } from '../utils/constants';

const requestSchema = Joi.object<AccountsAPI.FundAccountRequest>({
  address: registrySchemas.address,
  amount: registrySchemas.amount,
}).required();

/**
 * Crédite un compte de valeur native. Réservé aux administrateurs.
 */
export const handleFundAccount = withErrorHandling(
  async (request: CallerRequest): Promise<AccountsAPI.AccountResponse> => {
    const adminUid = authHelper.requireAdmin(request);
    const data = validateWithJoi(requestSchema, request.data);
    const amount = helpers.amount.parse(data.amount);

    const account = await donationRegistry.fundAccount(data.address, amount);

    logger.audit('fundAccount', `accounts/${data.address}`, 'success', {
      adminUid,
      amount,
    });

    return toAccountResponse(account);
  }
);

export const fundAccount = onCall(CALLABLE_OPTIONS, handleFundAccount);
