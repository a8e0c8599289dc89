export type ToolErrorCode =
  | 'PATH_OUTSIDE_BOUNDARY'
  | 'PATH_NOT_FOUND'
  | 'NOT_A_DIRECTORY'
  | 'NOT_A_FILE'
  | 'FILE_NOT_FOUND'
  | 'UNSUPPORTED_ENCODING'
  | 'NO_MATCH'
  | 'AMBIGUOUS_MATCH'
  | 'WRITE_PERMISSION_DENIED'
  | 'COMMAND_NOT_ALLOWED'
  | 'ARGUMENT_REJECTED'
  | 'TIMEOUT_EXCEEDED'
  | 'LAUNCH_FAILED'
  | 'INVALID_ARGUMENTS'
  | 'TOOL_NOT_FOUND'
  | 'TOOL_EXEC_ERROR';

export type ErrorCode =
  | ToolErrorCode
  | 'CONFIG_INVALID'
  | 'PROVIDER_AUTH_FAILED'
  | 'UNKNOWN';

export class CodeuError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    options: { retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'CodeuError';
    this.code = code;
    this.retryable = options.retryable ?? false;
  }

  static isCodeuError(err: unknown): err is CodeuError {
    return err instanceof CodeuError;
  }

  static fromUnknown(err: unknown, fallbackCode: ErrorCode = 'UNKNOWN'): CodeuError {
    if (err instanceof CodeuError) return err;
    if (err instanceof Error) {
      return new CodeuError(err.message, fallbackCode, { cause: err });
    }
    return new CodeuError(String(err), fallbackCode);
  }
}

/** Narrow an unknown rejection to a Node errno error carrying `code`. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function errnoCode(err: unknown): string | undefined {
  return isErrnoException(err) ? err.code : undefined;
}
