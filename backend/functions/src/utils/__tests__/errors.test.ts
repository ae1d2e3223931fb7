/**
 * Tests for error types and HTTPS conversion
 * Donation Registry
 */

import { HttpsError } from 'firebase-functions/v2/https';
import {
  convertToHttpsError,
  ErrorHandler,
  IllegalCallerError,
  IncorrectStringFormatError,
  InsufficientFundsError,
  ProjectExistedError,
  TransactionFailedError,
  ValidationError,
  withErrorHandling,
} from '../errors';

jest.mock('../logger');

const CALLER = '0x2222222222222222222222222222222222222222';
const PROJECT_ID = '0x1a8ca51e1af01efc23694892a98aab858a7a5c96513ad2110175b7ecf9412e58';

describe('registry errors', () => {
  it('carries the offending caller', () => {
    const error = new IllegalCallerError(CALLER);
    expect(error.code).toBe('ILLEGAL_CALLER');
    expect(error.caller).toBe(CALLER);
    expect(error.statusCode).toBe(403);
  });

  it('carries the offending string and its bounds', () => {
    const error = new IncorrectStringFormatError('', 1, 64);
    expect(error.context).toEqual({ value: '', min: 1, max: 64 });
  });

  it('reports the missing project', () => {
    const error = new ProjectExistedError(PROJECT_ID);
    expect(error.message).toBe(`Project ${PROJECT_ID} does not exist`);
  });

  it('serializes the amount as a decimal string', () => {
    const error = new InsufficientFundsError(100n, { balance: '50' });
    expect(error.message).toBe('Insufficient funds: 100');
    expect(error.context).toEqual({ balance: '50', amount: '100' });
  });
});

describe('ErrorHandler.getErrorResponse', () => {
  it('describes application errors', () => {
    expect(ErrorHandler.getErrorResponse(new TransactionFailedError('receiver refused'))).toEqual({
      error: 'TransactionFailedError',
      message: 'Transaction failed',
      statusCode: 409,
      errorCode: 'TRANSACTION_FAILED',
      context: { reason: 'receiver refused' },
    });
  });

  it('hides unexpected errors', () => {
    expect(ErrorHandler.getErrorResponse(new Error('boom'))).toEqual({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
      errorCode: 'UNKNOWN_ERROR',
    });
  });
});

describe('convertToHttpsError', () => {
  it.each([
    [new IllegalCallerError(CALLER), 'permission-denied'],
    [new IncorrectStringFormatError('x'), 'invalid-argument'],
    [new ProjectExistedError(PROJECT_ID), 'not-found'],
    [new InsufficientFundsError(0n), 'failed-precondition'],
    [new TransactionFailedError(), 'aborted'],
    [new ValidationError('"projectId" is required', 'projectId'), 'invalid-argument'],
  ])('maps %p to %s', (error, code) => {
    expect(convertToHttpsError(error).code).toBe(code);
  });

  it('exposes the error code and context as details', () => {
    const converted = convertToHttpsError(new InsufficientFundsError(100n, { balance: '50' }));
    expect(converted.details).toEqual({
      errorCode: 'INSUFFICIENT_FUNDS',
      balance: '50',
      amount: '100',
    });
  });

  it('returns HttpsError instances unchanged', () => {
    const original = new HttpsError('cancelled', 'stop');
    expect(convertToHttpsError(original)).toBe(original);
  });

  it('maps unknown errors to internal', () => {
    expect(convertToHttpsError(new Error('boom')).code).toBe('internal');
  });
});

describe('withErrorHandling', () => {
  it('converts thrown errors to HttpsError', async () => {
    const handler = withErrorHandling(async (): Promise<void> => {
      throw new IllegalCallerError(CALLER);
    });

    await expect(handler()).rejects.toMatchObject({
      code: 'permission-denied',
      message: `Illegal caller: ${CALLER}`,
    });
  });
});
