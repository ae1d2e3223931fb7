import Joi from 'joi';
import { registrySchemas, validateWithJoi } from '../../utils/validation';
import { helpers } from '../../utils/helpers';
import { DonationRegistry, donationRegistry } from '../../registry/donationRegistry';
import { DonationsAPI } from '../../types/api';
import { ApiRequest, ApiResponse, sendError } from '../responses';

const donatedParamsSchema = Joi.object<DonationsAPI.GetDonatedRequest>({
  donor: registrySchemas.address,
  projectId: registrySchemas.projectId,
}).required();

export class DonationController {
  constructor(private readonly registry: DonationRegistry = donationRegistry) {}

  /**
   * Total cumulé d'un donateur pour un projet
   */
  async getDonated(req: ApiRequest, res: ApiResponse): Promise<void> {
    try {
      const { donor, projectId } = validateWithJoi(donatedParamsSchema, req.params);
      const amount = await this.registry.getDonated(donor, projectId);

      const response: DonationsAPI.GetDonatedResponse = {
        donor,
        projectId,
        amount: helpers.amount.format(amount),
      };
      res.json(response);
    } catch (error) {
      sendError(res, error);
    }
  }
}

export const donationController = new DonationController();
