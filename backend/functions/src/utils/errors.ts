import { HttpsError, FunctionsErrorCode } from 'firebase-functions/v2/https';
import { logger } from './logger';

export type ErrorContext = Record<string, unknown>;

export abstract class BaseError extends Error {
  abstract readonly statusCode: number;
  abstract readonly errorCode: string;
  abstract readonly isOperational: boolean;

  constructor(
    message: string,
    public readonly context?: ErrorContext
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      errorCode: this.errorCode,
      context: this.context,
    };
  }
}

export class AppError extends BaseError {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly errorCode: string;
  public readonly isOperational: boolean = true;

  constructor(code: string, message: string, statusCode: number = 500, context?: ErrorContext) {
    super(message, context);
    this.code = code;
    this.statusCode = statusCode;
    this.errorCode = code;
  }
}

// ============================================================================
// REGISTRY ERRORS
// ============================================================================

/**
 * The caller is not allowed to act on the project (not its creator, or its creator donating).
 */
export class IllegalCallerError extends AppError {
  constructor(public readonly caller: string) {
    super('ILLEGAL_CALLER', `Illegal caller: ${caller}`, 403, { caller });
  }
}

/**
 * A string is outside its byte-length bounds.
 */
export class IncorrectStringFormatError extends AppError {
  constructor(public readonly value: string, min?: number, max?: number) {
    super('INCORRECT_STRING_FORMAT', 'Incorrect string format', 400, { value, min, max });
  }
}

/**
 * Raised when the project does NOT exist. The code keeps the historical name.
 */
export class ProjectExistedError extends AppError {
  constructor(public readonly projectId: string) {
    super('PROJECT_EXISTED', `Project ${projectId} does not exist`, 404, { projectId });
  }
}

export class InsufficientFundsError extends AppError {
  constructor(public readonly amount: bigint, context?: ErrorContext) {
    super('INSUFFICIENT_FUNDS', `Insufficient funds: ${amount.toString()}`, 402, {
      ...context,
      amount: amount.toString(),
    });
  }
}

export class TransactionFailedError extends AppError {
  constructor(reason?: string) {
    super('TRANSACTION_FAILED', 'Transaction failed', 409, reason ? { reason } : undefined);
  }
}

// ============================================================================
// PLATFORM ERRORS
// ============================================================================

export class ValidationError extends AppError {
  public readonly field?: string;

  constructor(message: string, field?: string, value?: unknown, context?: ErrorContext) {
    super('VALIDATION_ERROR', message, 400, { ...context, field, value });
    this.field = field;
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required', context?: ErrorContext) {
    super('AUTHENTICATION_ERROR', message, 401, context);
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = 'Insufficient permissions', context?: ErrorContext) {
    super('AUTHORIZATION_ERROR', message, 403, context);
  }
}

export class DatabaseError extends AppError {
  constructor(
    message: string,
    public readonly operation?: string,
    public readonly collection?: string,
    context?: ErrorContext
  ) {
    super('DATABASE_ERROR', message, 503, { ...context, operation, collection });
  }
}

// ============================================================================
// ERROR HANDLING UTILITIES
// ============================================================================

export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  errorCode: string;
  context?: ErrorContext;
}

export class ErrorHandler {
  static getErrorResponse(error: unknown): ErrorResponse {
    if (error instanceof AppError) {
      return {
        error: error.name,
        message: error.message,
        statusCode: error.statusCode,
        errorCode: error.errorCode,
        context: error.context,
      };
    }

    return {
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
      errorCode: 'UNKNOWN_ERROR',
    };
  }
}

const httpsErrorCodeMapping: Record<string, FunctionsErrorCode> = {
  'ILLEGAL_CALLER': 'permission-denied',
  'INCORRECT_STRING_FORMAT': 'invalid-argument',
  'PROJECT_EXISTED': 'not-found',
  'INSUFFICIENT_FUNDS': 'failed-precondition',
  'TRANSACTION_FAILED': 'aborted',
  'VALIDATION_ERROR': 'invalid-argument',
  'AUTHENTICATION_ERROR': 'unauthenticated',
  'AUTHORIZATION_ERROR': 'permission-denied',
  'DATABASE_ERROR': 'unavailable',
};

export function convertToHttpsError(error: unknown): HttpsError {
  if (error instanceof HttpsError) {
    return error;
  }

  if (error instanceof AppError) {
    const code = httpsErrorCodeMapping[error.code] || 'internal';
    return new HttpsError(code, error.message, { errorCode: error.errorCode, ...error.context });
  }

  logger.error('Unhandled error type', error);

  return new HttpsError('internal', 'An unexpected error occurred');
}

export function withErrorHandling<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>
): (...args: T) => Promise<R> {
  return async (...args: T): Promise<R> => {
    try {
      return await fn(...args);
    } catch (error) {
      throw convertToHttpsError(error);
    }
  };
}
