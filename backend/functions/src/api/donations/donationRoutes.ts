import { Router } from 'express';
import { donationController } from './donationController';

const router = Router();

router.get('/:donor/:projectId',
  donationController.getDonated.bind(donationController)
);

export { router as donationRoutes };
