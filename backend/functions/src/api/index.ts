import { NextFunction, Request, Router } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { logger } from '../utils/logger';
import { APP_CONFIG, API_ALLOWED_ORIGINS } from '../utils/constants';
import { DonationRegistry, donationRegistry } from '../registry/donationRegistry';
import { ApiResponse, sendError } from './responses';

import { projectRoutes } from './projects/projectRoutes';
import { donationRoutes } from './donations/donationRoutes';
import { accountRoutes } from './accounts/accountRoutes';

export function healthHandler(registry: DonationRegistry) {
  return async (_req: unknown, res: ApiResponse): Promise<void> => {
    const startTime = Date.now();
    try {
      const eventCount = await registry.getEventCount();
      res.json({
        status: 'healthy',
        service: APP_CONFIG.name,
        version: APP_CONFIG.version,
        timestamp: new Date().toISOString(),
        eventCount,
        responseTime: Date.now() - startTime,
      });
    } catch (error) {
      logger.error('Health check failed', error);
      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: 'Health check failed',
      });
    }
  };
}

export function notFoundHandler(req: Pick<Request, 'method' | 'path'>, res: ApiResponse): void {
  logger.warn('API route not found', { method: req.method, path: req.path });
  res.status(404).json({
    error: 'Endpoint not found',
    message: `The requested endpoint ${req.method} ${req.path} does not exist`,
  });
}

// Quatre paramètres : signature d'un gestionnaire d'erreurs Express
export function apiErrorHandler(error: unknown, _req: unknown, res: ApiResponse, _next: NextFunction): void {
  sendError(res, error);
}

/**
 * API HTTP de lecture du registre. Toutes les mutations passent par les
 * fonctions callables, authentifiées par jeton.
 */
export function createApiRouter(registry: DonationRegistry = donationRegistry): Router {
  const router = Router();

  router.use(helmet({
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
  }));

  router.use(cors({
    origin: (origin, callback) => {
      // Requêtes sans origine (outils serveur, curl)
      if (!origin) return callback(null, true);

      if (API_ALLOWED_ORIGINS.length === 0 || API_ALLOWED_ORIGINS.includes(origin)) {
        callback(null, true);
      } else {
        logger.warn('CORS origin blocked', { origin });
        callback(null, false);
      }
    },
    methods: ['GET', 'OPTIONS'],
    exposedHeaders: ['X-Request-ID'],
    maxAge: 86400,
  }));

  router.use(logger.middleware());

  router.get('/health', healthHandler(registry));

  router.use('/projects', projectRoutes);
  router.use('/donations', donationRoutes);
  router.use('/accounts', accountRoutes);

  router.use(notFoundHandler);
  router.use(apiErrorHandler);

  return router;
}
