/**
 * Compute Contract: what a handler behind the ingress router receives and
 * must return. The router owns HTTP; handlers only see the envelope.
 */

export type CommandEnvelope = {
  method: string;
  path: string;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  /** Parsed JSON body, `undefined` when the request had none. */
  body: unknown;
  sourceIp?: string;
  requestId: string;
};

/** Identity of the backing store. Credentials come from the execution role. */
export type StoreIdentity = {
  tableName: string;
};

export type CommandFailureKind =
  | 'ValidationError'
  | 'StorageError'
  | 'IntegrationTimeout'
  | 'InternalError';

export type CommandIssue = {
  path: string;
  message: string;
};

export type CommandFailure = {
  kind: CommandFailureKind;
  message: string;
  issues?: CommandIssue[];
};

export type CommandResult<T = unknown> =
  | { ok: true; body?: T }
  | { ok: false; error: CommandFailure };

export const FAILURE_STATUS: Record<CommandFailureKind, number> = {
  ValidationError: 400,
  StorageError: 503,
  IntegrationTimeout: 504,
  InternalError: 500,
};

export const SUCCESS_STATUS = 200;

export const commandSuccess = <T>(body?: T): CommandResult<T> => ({ ok: true, body });

export const commandFailure = (
  kind: CommandFailureKind,
  message: string,
  issues?: CommandIssue[],
): CommandResult<never> => ({
  ok: false,
  error: issues ? { kind, message, issues } : { kind, message },
});

export function statusForResult(result: CommandResult<unknown>): number {
  return result.ok ? SUCCESS_STATUS : FAILURE_STATUS[result.error.kind];
}
