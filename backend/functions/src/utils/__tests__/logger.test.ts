/**
 * Tests for the structured logger
 * Donation Registry
 */

import { Logger } from '../logger';

describe('Logger', () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function lastEntry(): Record<string, unknown> {
    const [line] = consoleSpy.mock.calls[consoleSpy.mock.calls.length - 1];
    return JSON.parse(line);
  }

  it('should serialize bigint amounts and redact secrets', () => {
    new Logger().info('Donation', { amount: 100n, token: 'test-secret', nested: { apiSecret: 'x' } });

    expect(lastEntry()).toMatchObject({
      level: 'info',
      message: 'Donation',
      data: { amount: '100', token: '[REDACTED]', nested: { apiSecret: '[REDACTED]' } },
    });
  });

  it('should merge the child context into every entry', () => {
    new Logger({ functionName: 'donate' }).child({ requestId: 'req-1' }).warn('Slow transaction');

    expect(lastEntry()).toMatchObject({
      level: 'warn',
      context: { functionName: 'donate', requestId: 'req-1' },
    });
  });

  it('should describe errors with their code', () => {
    const error = Object.assign(new Error('boom'), { code: 'TRANSACTION_FAILED', statusCode: 409 });

    new Logger().error('Donation failed', error);

    expect(lastEntry()).toMatchObject({
      level: 'error',
      error: { name: 'Error', message: 'boom', code: 'TRANSACTION_FAILED', statusCode: 409 },
    });
  });

  it('should tag financial entries', () => {
    new Logger().financial('Donation transferred', { amount: 5n });

    expect(lastEntry()).toMatchObject({
      message: '[FINANCIAL] Donation transferred',
      context: { category: 'financial' },
      data: { amount: '5' },
    });
  });

  it('should tag each request with its trace id and log its completion', () => {
    const req = {
      header: jest.fn().mockReturnValue('trace-1/span;o=1'),
      method: 'GET',
      originalUrl: '/api/health',
    };
    const res = {
      locals: {},
      setHeader: jest.fn(),
      on: jest.fn(),
      statusCode: 200,
    };
    const next = jest.fn();

    new Logger().middleware()(req, res, next);

    expect(res.locals).toEqual({ requestId: 'trace-1' });
    expect(res.setHeader).toHaveBeenCalledWith('X-Request-ID', 'trace-1');
    expect(next).toHaveBeenCalledTimes(1);
    expect(lastEntry()).toMatchObject({
      message: 'Request started',
      context: { requestId: 'trace-1' },
      data: { method: 'GET', url: '/api/health' },
    });

    const [event, onFinish] = res.on.mock.calls[0];
    expect(event).toBe('finish');
    onFinish();

    expect(lastEntry()).toMatchObject({
      message: 'Request completed',
      context: { requestId: 'trace-1' },
      data: { statusCode: 200 },
    });
  });
});
