import { z } from 'zod';

/**
 * Keys of one access log line. The API stage's log format is built from this
 * list, so every key here has a matching `$context` variable in the infra.
 */
export const ACCESS_LOG_FIELD_NAMES = [
  'requestId',
  'sourceIp',
  'requestTime',
  'protocol',
  'httpMethod',
  'routeKey',
  'status',
  'responseLength',
  'integrationError',
] as const;

export type AccessLogFieldName = (typeof ACCESS_LOG_FIELD_NAMES)[number];

// API Gateway writes "-" for context variables that have no value.
const EMPTY_VALUE = '-';

const absentAsUndefined = (value: unknown): unknown =>
  value === EMPTY_VALUE || value === '' || value === null ? undefined : value;

const OptionalTextSchema = z.preprocess(absentAsUndefined, z.string().optional());

export const AccessLogRecordSchema = z.object({
  requestId: z.string().min(1),
  sourceIp: OptionalTextSchema,
  requestTime: z.string().min(1),
  protocol: OptionalTextSchema,
  httpMethod: z.string().min(1),
  routeKey: OptionalTextSchema,
  status: z.coerce.number().int().min(100).max(599),
  responseLength: z.preprocess(absentAsUndefined, z.coerce.number().int().nonnegative().optional()),
  integrationError: OptionalTextSchema,
});

export type AccessLogRecord = z.infer<typeof AccessLogRecordSchema>;

export function parseAccessLogRecord(line: string): AccessLogRecord {
  return AccessLogRecordSchema.parse(JSON.parse(line));
}
