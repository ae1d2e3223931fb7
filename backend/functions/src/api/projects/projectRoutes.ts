import { Router } from 'express';
import { projectController } from './projectController';

const router = Router();

router.get('/:projectId',
  projectController.getProject.bind(projectController)
);

router.get('/:projectId/events',
  projectController.getProjectEvents.bind(projectController)
);

router.get('/:projectId/history',
  projectController.getProjectHistory.bind(projectController)
);

export { router as projectRoutes };
