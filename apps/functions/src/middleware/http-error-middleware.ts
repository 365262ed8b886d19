import type { MiddlewareObj } from '@middy/core';
import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { apiResponse } from '@/helpers/api';

export class HttpError extends Error {
  constructor(public readonly statusCode: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export function httpErrorMiddleware(): MiddlewareObj<APIGatewayProxyEvent, APIGatewayProxyResult> {
  return {
    onError: async (request) => {
      const err = request.error;

      console.error('httpErrorMiddleware caught error:', {
        name: err?.name,
        message: err?.message,
        stack: err?.stack,
      });

      if (err instanceof HttpError) {
        request.response = apiResponse(err.statusCode, { message: err.message });
        return;
      }

      request.response = apiResponse(500, { message: 'Internal Server Error' });
    },
  };
}
