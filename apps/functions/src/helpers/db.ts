import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, PutCommand } from '@aws-sdk/lib-dynamodb';
import type { CatalogEntry, StoreIdentity } from '@movie-catalog/core';
import { requireEnv } from './env';

const REGION = requireEnv('REGION', 'us-east-1');

// No SDK retries: a write is only repeated when the client repeats the request.
const ddbClient = new DynamoDBClient({ region: REGION, maxAttempts: 1 });
export const docClient = DynamoDBDocumentClient.from(ddbClient, {
  marshallOptions: {
    removeUndefinedValues: true,
  },
});

export type StoredMovie = CatalogEntry & {
  updatedAt: string;
};

export type UpsertOptions = {
  abortSignal?: AbortSignal;
};

/**
 * The movies table as the handler sees it: its identity plus the one write
 * it is allowed to make.
 */
export interface MovieTable extends StoreIdentity {
  upsert(entry: CatalogEntry, options?: UpsertOptions): Promise<StoredMovie>;
}

export type DocumentSender = Pick<DynamoDBDocumentClient, 'send'>;

/**
 * Unconditional PutItem: the whole item for (year, title) is replaced and
 * concurrent writers resolve as last-write-wins.
 */
export function dynamoMovieTable(tableName: string, client: DocumentSender = docClient): MovieTable {
  return {
    tableName,
    async upsert(entry, options) {
      const item: StoredMovie = {
        ...entry,
        updatedAt: new Date().toISOString(),
      };

      await client.send(
        new PutCommand({
          TableName: tableName,
          Item: item,
        }),
        { abortSignal: options?.abortSignal },
      );

      return item;
    },
  };
}
