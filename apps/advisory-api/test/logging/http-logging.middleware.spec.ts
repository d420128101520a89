import { EventEmitter } from 'node:events';
import type { Request, Response } from 'express';
import { createHttpLoggingMiddleware } from '../../src/logging/http-logging.middleware';
import type { JsonLogger } from '../../src/logging/json-logger.service';

function makeResponse(statusCode: number): Response {
  return Object.assign(new EventEmitter(), { statusCode }) as unknown as Response;
}

describe('createHttpLoggingMiddleware', () => {
  const logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
  const middleware = createHttpLoggingMiddleware(logger as unknown as JsonLogger);

  const req = {
    method: 'GET',
    originalUrl: '/access/investment/300?permission=VIEW_INVESTMENT',
    requestId: 'req-9',
    user: { userId: 30, email: 'carla@example.test', claims: { sub: '30' } },
    principal: { id: 30, role: 'CLIENT', customGrants: new Set() }
  } as unknown as Request;

  it('logs once the response finishes, without the query string', () => {
    const res = makeResponse(200);
    const next = jest.fn();

    middleware(req, res, next);
    expect(next).toHaveBeenCalledTimes(1);
    expect(logger.log).not.toHaveBeenCalled();

    res.emit('finish');
    expect(logger.log).toHaveBeenCalledWith(
      'HTTP request',
      expect.objectContaining({
        requestId: 'req-9',
        method: 'GET',
        path: '/access/investment/300',
        statusCode: 200,
        durationMs: expect.any(Number),
        userId: 30,
        userRole: 'CLIENT'
      })
    );
  });

  it('uses warn for 4xx and error for 5xx', () => {
    const clientError = makeResponse(403);
    middleware(req, clientError, jest.fn());
    clientError.emit('finish');
    expect(logger.warn).toHaveBeenCalledWith('HTTP request client error', expect.objectContaining({ statusCode: 403 }));

    const serverError = makeResponse(500);
    middleware(req, serverError, jest.fn());
    serverError.emit('finish');
    expect(logger.error).toHaveBeenCalledWith('HTTP request failed', expect.objectContaining({ statusCode: 500 }));
  });
});
