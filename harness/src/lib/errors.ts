import {
  ErrorCode,
  ExitCode,
  type ErrorReport,
  type RecordedError,
} from '@fixture-harness/shared';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly exitCode: number = ExitCode.FAILURE,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toReport(sessionId?: string): ErrorReport {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(sessionId ? { sessionId } : {}),
        ...(this.details && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, ExitCode.FAILURE, details);
    this.name = 'ValidationError';
  }
}

export class StaleRecordingError extends AppError {
  constructor(dir: string) {
    super(
      ErrorCode.STALE_RECORDING,
      `Recording directory already exists: ${dir}. Remove it before recording again`,
      ExitCode.PRECONDITION,
      { dir }
    );
    this.name = 'StaleRecordingError';
  }
}

export class WrongInvocationContextError extends AppError {
  constructor(variable: string) {
    super(
      ErrorCode.WRONG_INVOCATION_CONTEXT,
      `Recording must be run directly, not under the test-splitting harness (${variable} is set)`,
      ExitCode.PRECONDITION,
      { variable }
    );
    this.name = 'WrongInvocationContextError';
  }
}

export class UnexpectedCallError extends AppError {
  constructor(operation: string, served: number) {
    super(
      ErrorCode.UNEXPECTED_CALL,
      `Unexpected call to ${operation}: ${served} recorded ${served === 1 ? 'call was' : 'calls were'} already served`,
      ExitCode.FAILURE,
      { operation, served }
    );
    this.name = 'UnexpectedCallError';
  }
}

export class UnknownOperationError extends AppError {
  constructor(operation: string) {
    super(ErrorCode.UNKNOWN_OPERATION, `Unknown operation: ${operation}`);
    this.name = 'UnknownOperationError';
  }
}

export class ApiCallError extends AppError {
  constructor(
    public readonly operation: string,
    public readonly errorName: string,
    public readonly apiMessage: string,
    public readonly httpStatusCode?: number
  ) {
    super(ErrorCode.API_CALL_FAILED, `${operation} failed: ${errorName}: ${apiMessage}`, ExitCode.FAILURE, {
      operation,
      errorName,
      ...(httpStatusCode !== undefined ? { httpStatusCode } : {}),
    });
    this.name = 'ApiCallError';
  }

  toRecordedError(): RecordedError {
    return {
      name: this.name,
      code: this.errorName,
      message: this.apiMessage,
      ...(this.httpStatusCode !== undefined ? { httpStatusCode: this.httpStatusCode } : {}),
    };
  }

  static fromRecorded(operation: string, recorded: RecordedError): ApiCallError {
    return new ApiCallError(operation, recorded.code, recorded.message, recorded.httpStatusCode);
  }
}

export class ArchiveNotFoundError extends AppError {
  constructor(path: string) {
    super(ErrorCode.ARCHIVE_NOT_FOUND, `Fixture archive not found: ${path}`, ExitCode.PRECONDITION, {
      path,
    });
    this.name = 'ArchiveNotFoundError';
  }
}

export class ArchiveFormatError extends AppError {
  constructor(source: string, reason: string) {
    super(ErrorCode.ARCHIVE_INVALID, `Invalid fixture data in ${source}: ${reason}`, ExitCode.FAILURE, {
      source,
    });
    this.name = 'ArchiveFormatError';
  }
}

export class StepFailedError<TResult = unknown> extends AppError {
  constructor(
    public readonly step: string,
    public readonly results: TResult[],
    public readonly failure?: unknown
  ) {
    super(
      ErrorCode.STEP_FAILED,
      `Step "${step}" failed: ${failure instanceof Error ? failure.message : 'condition not met'}`,
      ExitCode.FAILURE,
      { step }
    );
    this.name = 'StepFailedError';
  }
}
