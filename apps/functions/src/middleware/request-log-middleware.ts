import type { MiddlewareObj } from '@middy/core';
import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import type { CommandFailureKind } from '@movie-catalog/core';

export type RequestLogLine = {
  level: 'info' | 'error';
  message: 'request completed';
  requestId: string;
  method: string;
  path: string;
  status: number;
  durationMs?: number;
  /** Why the command failed; absent on success. */
  failure?: CommandFailureKind;
};

const commandFailures = new WeakMap<APIGatewayProxyEvent, CommandFailureKind>();

/**
 * Remember why the command behind `event` failed, so the request log line
 * carries it. API Gateway only fills `integrationErrorMessage` when the
 * integration itself fails, not for error responses the handler returns.
 */
export function recordCommandFailure(event: APIGatewayProxyEvent, kind: CommandFailureKind): void {
  commandFailures.set(event, kind);
}

/**
 * One structured line per invocation, written after the response is final.
 * Register it before httpErrorMiddleware so errors are already mapped to a
 * status when it runs.
 */
export function requestLogMiddleware(): MiddlewareObj<APIGatewayProxyEvent, APIGatewayProxyResult> {
  const startedAt = new WeakMap<APIGatewayProxyEvent, number>();

  const write = (
    event: APIGatewayProxyEvent,
    response: APIGatewayProxyResult | null | undefined,
    fallbackFailure?: CommandFailureKind,
  ): void => {
    const started = startedAt.get(event);
    const status = response?.statusCode ?? 500;
    const line: RequestLogLine = {
      level: status >= 500 ? 'error' : 'info',
      message: 'request completed',
      requestId: event.requestContext.requestId,
      method: event.httpMethod,
      path: event.path,
      status,
      durationMs: started === undefined ? undefined : Date.now() - started,
      failure: commandFailures.get(event) ?? fallbackFailure,
    };
    commandFailures.delete(event);

    if (line.level === 'error') {
      console.error(JSON.stringify(line));
    } else {
      console.log(JSON.stringify(line));
    }
  };

  return {
    before: async (request) => {
      startedAt.set(request.event, Date.now());
    },
    after: async (request) => {
      write(request.event, request.response);
    },
    onError: async (request) => {
      const status = request.response?.statusCode ?? 500;
      write(request.event, request.response, status >= 500 ? 'InternalError' : undefined);
    },
  };
}
