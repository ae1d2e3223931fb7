import Joi from 'joi';
import { registrySchemas, validateWithJoi } from '../../utils/validation';
import { toAccountResponse } from '../../utils/views';
import { DonationRegistry, donationRegistry } from '../../registry/donationRegistry';
import { AccountsAPI } from '../../types/api';
import { ApiRequest, ApiResponse, sendError } from '../responses';

const accountParamsSchema = Joi.object<AccountsAPI.GetBalanceRequest>({
  address: registrySchemas.address,
}).required();

export class AccountController {
  constructor(private readonly registry: DonationRegistry = donationRegistry) {}

  async getAccount(req: ApiRequest, res: ApiResponse): Promise<void> {
    try {
      const { address } = validateWithJoi(accountParamsSchema, req.params);
      const account = await this.registry.getAccount(address);
      res.json(toAccountResponse(account));
    } catch (error) {
      sendError(res, error);
    }
  }
}

export const accountController = new AccountController();
