import { Router } from 'express';
import { accountController } from './accountController';

const router = Router();

router.get('/:address',
  accountController.getAccount.bind(accountController)
);

export { router as accountRoutes };
