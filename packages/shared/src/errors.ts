/**
 * Error codes used throughout the provisioner.
 * User-correctable errors map to exit code 2.
 * Runtime errors are classified per stage by the pipeline.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors
  | 'ProcessError'
  | 'TimeoutError'
  | 'FetchError'
  | 'InstallError'
  | 'RestoreError'
  | 'ApplyError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all provisioner errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProcessError', 'powershell.exe exited with 1', {
 *   cause: originalError,
 *   details: { command: 'powershell.exe' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a subprocess cannot be started.
 * `errno` carries the spawn failure code (e.g. `ENOENT`) when known.
 */
export class ProcessError extends AppError {
  /** System error code reported by spawn */
  public readonly errno?: string;

  constructor(message: string, options: AppErrorOptions & { errno?: string } = {}) {
    super('ProcessError', message, options);
    this.errno = options.errno;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

export type FetchErrorKind = 'NetworkUnreachable' | 'HttpError' | 'WriteError';

/**
 * Error thrown when a remote artifact cannot be retrieved.
 * `status` is set for `HttpError`.
 */
export class FetchError extends AppError {
  public readonly kind: FetchErrorKind;
  public readonly status?: number;

  constructor(
    kind: FetchErrorKind,
    message: string,
    options: AppErrorOptions & { status?: number } = {},
  ) {
    super('FetchError', message, options);
    this.kind = kind;
    this.status = options.status;
  }
}

export type InstallErrorKind = 'InvalidPackage' | 'RegistrationRejected' | 'AlreadyInstalledConflict';

/**
 * Error thrown when the OS refuses to register a package.
 */
export class InstallError extends AppError {
  public readonly kind: InstallErrorKind;

  constructor(kind: InstallErrorKind, message: string, options: AppErrorOptions = {}) {
    super('InstallError', message, options);
    this.kind = kind;
  }
}

/**
 * Error thrown when the service restore trigger cannot be issued.
 */
export class RestoreError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('RestoreError', message, options);
  }
}

export type ApplyErrorKind = 'ExecutableNotFound' | 'InvocationFailed' | 'DocumentUnreadable';

/**
 * Error thrown when the configuration document cannot be applied.
 * `exitCode` is set for `InvocationFailed` when the process exited on its own.
 */
export class ApplyError extends AppError {
  public readonly kind: ApplyErrorKind;
  public readonly exitCode?: number;

  constructor(
    kind: ApplyErrorKind,
    message: string,
    options: AppErrorOptions & { exitCode?: number } = {},
  ) {
    super('ApplyError', message, options);
    this.kind = kind;
    this.exitCode = options.exitCode;
  }
}

/**
 * Renders an unknown thrown value as a single diagnostic line.
 */
export function describeError(error: unknown): string {
  if (error instanceof AppError) {
    const kind = 'kind' in error && typeof error.kind === 'string' ? `${error.kind}: ` : '';
    return `${kind}${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
