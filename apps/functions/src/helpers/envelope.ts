import type { APIGatewayProxyEvent } from 'aws-lambda';
import type { CommandEnvelope } from '@movie-catalog/core';

/**
 * Normalize a REST proxy event into the envelope handlers work with.
 * Throws SyntaxError when the body is not valid JSON.
 */
export function toCommandEnvelope(event: APIGatewayProxyEvent): CommandEnvelope {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(event.headers ?? {})) {
    if (value !== undefined) headers[name.toLowerCase()] = value;
  }

  const sourceIp = event.requestContext.identity.sourceIp;

  return {
    method: event.httpMethod,
    path: event.path,
    headers,
    body: parseBody(event),
    sourceIp: sourceIp ? sourceIp : undefined,
    requestId: event.requestContext.requestId,
  };
}

function parseBody(event: APIGatewayProxyEvent): unknown {
  if (event.body === null || event.body.trim() === '') return undefined;

  const raw = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
  return JSON.parse(raw);
}
