import type { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import middy from '@middy/core';

import {
  CatalogEntrySchema,
  commandFailure,
  commandSuccess,
  statusForResult,
  type CommandEnvelope,
  type CommandResult,
} from '@movie-catalog/core';
import { apiResponse } from '@/helpers/api';
import { dynamoMovieTable, type MovieTable, type StoredMovie } from '@/helpers/db';
import { commandDeadline, isAbortError } from '@/helpers/deadline';
import { toCommandEnvelope } from '@/helpers/envelope';
import { requireEnv, requireIntEnv } from '@/helpers/env';
import { httpErrorMiddleware } from '@/middleware/http-error-middleware';
import { recordCommandFailure, requestLogMiddleware } from '@/middleware/request-log-middleware';
import { withSentryLambda, withSpan } from '@/sentry-lambda';

export type PutMovieDeps = {
  table: MovieTable;
  /** Upper bound for the storage write. */
  timeoutMs: number;
};

export type PutMovieBody = {
  movie: StoredMovie;
};

type RemainingTime = Pick<Context, 'getRemainingTimeInMillis'>;

/**
 * Validate the envelope body as a catalog entry and upsert it.
 * Storage failures are reported as results, never thrown.
 */
export async function putMovie(
  envelope: CommandEnvelope,
  deps: PutMovieDeps,
  remainingMs?: number,
): Promise<CommandResult<PutMovieBody>> {
  if (envelope.body === undefined) {
    return commandFailure('ValidationError', 'Request body is missing');
  }

  const validationResult = CatalogEntrySchema.safeParse(envelope.body);
  if (!validationResult.success) {
    return commandFailure(
      'ValidationError',
      'Validation failed',
      validationResult.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  const entry = validationResult.data;
  const budgetMs = commandDeadline(deps.timeoutMs, remainingMs);

  try {
    const movie = await withSpan('PutItem movies', 'db.dynamodb', () =>
      deps.table.upsert(entry, { abortSignal: AbortSignal.timeout(budgetMs) }),
    );
    return commandSuccess({ movie });
  } catch (err: unknown) {
    if (isAbortError(err)) {
      console.error(`Write to ${deps.table.tableName} exceeded ${budgetMs} ms`, {
        requestId: envelope.requestId,
      });
      return commandFailure('IntegrationTimeout', 'Storage write timed out');
    }

    console.error('Error writing movie:', err);
    return commandFailure('StorageError', 'Failed to store movie');
  }
}

export function toApiResponse(result: CommandResult<PutMovieBody>): APIGatewayProxyResult {
  const statusCode = statusForResult(result);
  if (result.ok) {
    return apiResponse(statusCode, result.body);
  }

  const { message, issues } = result.error;
  return apiResponse(statusCode, issues ? { message, errors: issues } : { message });
}

export const createPutMovieHandler =
  (deps: PutMovieDeps) =>
  async (event: APIGatewayProxyEvent, context: RemainingTime): Promise<APIGatewayProxyResult> => {
    let envelope: CommandEnvelope;
    try {
      envelope = toCommandEnvelope(event);
    } catch (err: unknown) {
      if (err instanceof SyntaxError) {
        recordCommandFailure(event, 'ValidationError');
        return apiResponse(400, { message: 'Invalid JSON in request body' });
      }
      throw err;
    }

    const result = await putMovie(envelope, deps, context.getRemainingTimeInMillis());
    if (!result.ok) {
      recordCommandFailure(event, result.error.kind);
    }
    return toApiResponse(result);
  };

const MOVIES_TABLE_NAME = requireEnv('MOVIES_TABLE_NAME');
const COMMAND_TIMEOUT_MS = requireIntEnv('COMMAND_TIMEOUT_MS', 5000);

export const baseHandler = createPutMovieHandler({
  table: dynamoMovieTable(MOVIES_TABLE_NAME),
  timeoutMs: COMMAND_TIMEOUT_MS,
});

export const apiHandler = middy<APIGatewayProxyEvent, APIGatewayProxyResult>(baseHandler)
  .use(requestLogMiddleware())
  .use(httpErrorMiddleware());

export const handler = withSentryLambda((event: APIGatewayProxyEvent, context: Context) =>
  apiHandler(event, context),
);
