import type { AxiosError } from 'axios';

const TRANSIENT_NETWORK_CODES = new Set(["ECONNRESET", "ECONNABORTED", "ECONNREFUSED", "EPIPE", "ENETUNREACH", "EHOSTUNREACH", "ENOTFOUND", "EAI_AGAIN"]);
const TIMEOUT_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT", "ECONNABORTED"]);
const VALIDATION_ERROR_NAMES = new Set(["ValidationError", "ZodError"]);

export enum ErrorCategory {
  TRANSIENT = 'transient',
  PERMANENT = 'permanent',
  CRITICAL = 'critical',
}

export type FailureStage = 'ingestion' | 'retrieval' | 'response' | 'grading';

export class BenchmarkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or missing configuration or credentials. Always fatal. */
export class ConfigurationError extends BenchmarkError {}

/** A network or service failure worth another attempt. */
export class TransientServiceError extends BenchmarkError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/**
 * One ingestion unit or evaluation question that failed for good.
 * Recorded against the unit; sibling units keep running.
 */
export class UnitFailure extends BenchmarkError {
  readonly unitId: string;
  readonly stage: FailureStage;
  readonly attempts: number;

  constructor(unitId: string, stage: FailureStage, attempts: number, cause: unknown) {
    super(`${stage} failed for ${unitId} after ${attempts} attempt(s): ${describeCause(cause)}`, { cause });
    this.unitId = unitId;
    this.stage = stage;
    this.attempts = attempts;
  }
}

/** A state file exists but cannot be parsed. */
export class CorruptStateError extends BenchmarkError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Corrupt state file ${path}: ${reason}`, options);
    this.path = path;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  const candidate = (error as { code?: unknown }).code;
  return typeof candidate === 'string' && candidate.length > 0 ? candidate : undefined;
}

function hasErrorName(error: unknown, name: string): boolean {
  return typeof error === 'object' && error !== null && (error as { name?: unknown }).name === name;
}

export function isNetworkError(error: unknown): error is Error & { code?: string } {
  const code = getErrorCode(error);
  return !!code && TRANSIENT_NETWORK_CODES.has(code);
}

export function isTimeoutError(error: unknown): boolean {
  const code = getErrorCode(error);
  if (code && TIMEOUT_CODES.has(code)) {
    return true;
  }

  return hasErrorName(error, 'AbortError') ||
    hasErrorName(error, 'CanceledError') ||
    (error instanceof Error && /timeout|timed out/i.test(error.message));
}

export function isValidationError(error: unknown): error is Error {
  return error instanceof Error && VALIDATION_ERROR_NAMES.has(error.name);
}

function isAxiosError(error: unknown): error is AxiosError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'isAxiosError' in error &&
    (error as { isAxiosError?: unknown }).isAxiosError === true
  );
}

/** HTTP status carried by an axios error or a TransientServiceError, if any. */
export function getHttpStatus(error: unknown): number | undefined {
  if (isAxiosError(error)) {
    return error.response?.status;
  }
  if (error instanceof TransientServiceError) {
    return error.status;
  }
  return undefined;
}

export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof ConfigurationError) {
    return ErrorCategory.CRITICAL;
  }

  if (error instanceof TransientServiceError) {
    return ErrorCategory.TRANSIENT;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;

    if (!status) {
      return ErrorCategory.TRANSIENT;
    }

    if (status >= 500 || status === 429 || status === 408) {
      return ErrorCategory.TRANSIENT;
    }

    if (status === 401 || status === 403) {
      return ErrorCategory.CRITICAL;
    }

    return ErrorCategory.PERMANENT;
  }

  if (isTimeoutError(error) || isNetworkError(error)) {
    return ErrorCategory.TRANSIENT;
  }

  if (isValidationError(error)) {
    return ErrorCategory.PERMANENT;
  }

  return ErrorCategory.PERMANENT;
}

export function isRetryableError(error: unknown): boolean {
  return classifyError(error) === ErrorCategory.TRANSIENT;
}

/**
 * The ConfigurationError a run should abort with when `error` is critical;
 * undefined for anything that only fails the current unit.
 */
export function asFatalError(error: unknown): ConfigurationError | undefined {
  if (classifyError(error) !== ErrorCategory.CRITICAL) {
    return undefined;
  }
  if (error instanceof ConfigurationError) {
    return error;
  }
  const status = getHttpStatus(error);
  const suffix = status === undefined ? '' : ` with status ${status}`;
  return new ConfigurationError(`Service rejected the request${suffix}; check the API credentials`, { cause: error });
}
