// Common error types

// Structured error report printed by the CLI
export interface ErrorReport {
  error: {
    code: string;
    message: string;
    sessionId?: string;
    details?: Record<string, unknown>;
  };
}

// Error codes
export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  STALE_RECORDING: 'STALE_RECORDING',
  WRONG_INVOCATION_CONTEXT: 'WRONG_INVOCATION_CONTEXT',
  UNEXPECTED_CALL: 'UNEXPECTED_CALL',
  UNKNOWN_OPERATION: 'UNKNOWN_OPERATION',
  API_CALL_FAILED: 'API_CALL_FAILED',
  ARCHIVE_NOT_FOUND: 'ARCHIVE_NOT_FOUND',
  ARCHIVE_INVALID: 'ARCHIVE_INVALID',
  STEP_FAILED: 'STEP_FAILED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// Exit codes used by the CLI besides the wrapped command's own
export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  PRECONDITION: 2,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
