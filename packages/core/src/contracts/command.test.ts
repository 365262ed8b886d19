import { commandFailure, commandSuccess, statusForResult } from './command';

describe('statusForResult', () => {
  it('should map success to 200', () => {
    expect(statusForResult(commandSuccess({ year: 1999 }))).toBe(200);
    expect(statusForResult(commandSuccess())).toBe(200);
  });

  it('should map each failure kind to its status', () => {
    expect(statusForResult(commandFailure('ValidationError', 'bad'))).toBe(400);
    expect(statusForResult(commandFailure('StorageError', 'down'))).toBe(503);
    expect(statusForResult(commandFailure('IntegrationTimeout', 'slow'))).toBe(504);
    expect(statusForResult(commandFailure('InternalError', 'boom'))).toBe(500);
  });
});

describe('commandFailure', () => {
  it('should omit issues when none are given', () => {
    expect(commandFailure('StorageError', 'down')).toEqual({
      ok: false,
      error: { kind: 'StorageError', message: 'down' },
    });
  });

  it('should carry validation issues', () => {
    expect(commandFailure('ValidationError', 'Validation failed', [{ path: 'title', message: 'Required' }])).toEqual({
      ok: false,
      error: {
        kind: 'ValidationError',
        message: 'Validation failed',
        issues: [{ path: 'title', message: 'Required' }],
      },
    });
  });
});
