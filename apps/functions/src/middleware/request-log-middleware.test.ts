import middy from '@middy/core';
import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { createMockContext, createMockEvent } from '@/test-utils/lambda-events';
import { httpErrorMiddleware } from './http-error-middleware';
import { recordCommandFailure, requestLogMiddleware } from './request-log-middleware';

describe('requestLogMiddleware', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('logs one info line for a successful request', async () => {
    const wrapped = middy<APIGatewayProxyEvent, APIGatewayProxyResult>(async () => ({
      statusCode: 200,
      body: '{}',
    })).use(requestLogMiddleware());

    await wrapped(createMockEvent(), createMockContext());

    expect(logSpy).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: 'info',
      message: 'request completed',
      requestId: 'request-id',
      method: 'POST',
      path: '/movies',
      status: 200,
    });
    expect(line.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('logs the status chosen by the error middleware', async () => {
    const wrapped = middy<APIGatewayProxyEvent, APIGatewayProxyResult>(async () => {
      throw new Error('boom');
    })
      .use(requestLogMiddleware())
      .use(httpErrorMiddleware());

    const result = await wrapped(createMockEvent(), createMockContext());

    expect(result.statusCode).toBe(500);
    expect(logSpy).not.toHaveBeenCalled();
    const requestLines = errorSpy.mock.calls
      .map((call) => call[0])
      .filter((first): first is string => typeof first === 'string' && first.startsWith('{'));
    expect(requestLines).toHaveLength(1);
    expect(JSON.parse(requestLines[0] ?? '')).toMatchObject({ level: 'error', status: 500, failure: 'InternalError' });
  });

  it('carries the failure kind the handler recorded', async () => {
    const wrapped = middy<APIGatewayProxyEvent, APIGatewayProxyResult>(async (event) => {
      recordCommandFailure(event, 'ValidationError');
      return { statusCode: 400, body: '{"message":"Validation failed"}' };
    }).use(requestLogMiddleware());

    await wrapped(createMockEvent(), createMockContext());

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toMatchObject({
      level: 'info',
      status: 400,
      failure: 'ValidationError',
    });
  });

  it('omits the failure for a successful request', async () => {
    const wrapped = middy<APIGatewayProxyEvent, APIGatewayProxyResult>(async () => ({
      statusCode: 200,
      body: '{}',
    })).use(requestLogMiddleware());

    await wrapped(createMockEvent(), createMockContext());

    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).not.toHaveProperty('failure');
  });
});
