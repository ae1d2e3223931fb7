import { Request, Response } from 'express';
import { logger } from '../utils/logger';
import { ErrorHandler } from '../utils/errors';

export type ApiRequest = Pick<Request, 'params' | 'query'>;
export type ApiResponse = Pick<Response, 'status' | 'json' | 'locals'>;

/**
 * Réponse d'erreur JSON commune aux contrôleurs de l'API
 */
export function sendError(res: ApiResponse, error: unknown): void {
  const response = ErrorHandler.getErrorResponse(error);

  if (response.statusCode >= 500) {
    logger.error('API request failed', error, { requestId: res.locals.requestId });
  }

  res.status(response.statusCode).json({
    error: response.error,
    message: response.message,
    errorCode: response.errorCode,
    context: response.context,
    requestId: res.locals.requestId,
  });
}
