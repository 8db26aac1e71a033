import type { ZodIssue } from 'zod';
import type { Tier } from './types.js';

// ── Error Classes ────────────────────────────────────────────────────────────

export type OrchestratorErrorCode =
  | 'UNKNOWN_MODEL'
  | 'DUPLICATE_MODEL'
  | 'PERMISSION_DENIED'
  | 'NO_AUTHORIZED_MODEL'
  | 'BACKEND_UNAVAILABLE'
  | 'SCHEMA_VALIDATION'
  | 'ADAPTER_ERROR';

export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly code: OrchestratorErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'OrchestratorError';
  }
}

export class UnknownModelError extends OrchestratorError {
  constructor(public readonly modelId: string) {
    super(`Model not registered: ${modelId}`, 'UNKNOWN_MODEL');
    this.name = 'UnknownModelError';
  }
}

export class DuplicateModelError extends OrchestratorError {
  constructor(public readonly modelId: string) {
    super(`Model already registered: ${modelId}`, 'DUPLICATE_MODEL');
    this.name = 'DuplicateModelError';
  }
}

export class PermissionDeniedError extends OrchestratorError {
  constructor(
    public readonly modelId: string,
    public readonly requiredTier: Tier,
    public readonly callerTier: number
  ) {
    super(
      `Insufficient permissions for ${modelId}: tier ${requiredTier} required (caller has ${callerTier})`,
      'PERMISSION_DENIED'
    );
    this.name = 'PermissionDeniedError';
  }
}

export class NoAuthorizedModelError extends OrchestratorError {
  constructor(
    public readonly taskType: string,
    public readonly callerTier: number
  ) {
    super(`No authorized model available for task "${taskType}" at tier ${callerTier}`, 'NO_AUTHORIZED_MODEL');
    this.name = 'NoAuthorizedModelError';
  }
}

export class BackendUnavailableError extends OrchestratorError {
  constructor(
    public readonly modelId: string,
    reason: string,
    cause?: unknown
  ) {
    super(`Backend for ${modelId} is unavailable: ${reason}`, 'BACKEND_UNAVAILABLE', cause);
    this.name = 'BackendUnavailableError';
  }
}

export class SchemaValidationError extends OrchestratorError {
  constructor(
    public readonly subject: string,
    public readonly issues: string[]
  ) {
    super(`Invalid ${subject}: ${issues.join('; ')}`, 'SCHEMA_VALIDATION');
    this.name = 'SchemaValidationError';
  }

  static fromZod(subject: string, issues: ZodIssue[]): SchemaValidationError {
    return new SchemaValidationError(
      subject,
      issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    );
  }
}

// ── Adapter boundary ─────────────────────────────────────────────────────────

export type AdapterFailureReason =
  | 'timeout'
  | 'connection'
  | 'overloaded'
  | 'server_error'
  | 'malformed_response'
  | 'rejected'
  | 'failed';

const TRANSIENT_REASONS: ReadonlySet<AdapterFailureReason> = new Set([
  'timeout',
  'connection',
  'overloaded',
  'server_error',
]);

/**
 * Normalized backend failure. Internal: the orchestrator always remaps it
 * to one of the public error kinds before returning.
 */
export class AdapterError extends OrchestratorError {
  public readonly transient: boolean;

  constructor(
    public readonly reason: AdapterFailureReason,
    message: string,
    cause?: unknown
  ) {
    super(message, 'ADAPTER_ERROR', cause);
    this.name = 'AdapterError';
    this.transient = TRANSIENT_REASONS.has(reason);
  }
}

/** HTTP statuses that mean "try again later" rather than "your request is wrong". */
const OVERLOAD_STATUSES = new Set([429, 502, 503, 504]);

function hasStatus(error: unknown): error is { status: number } {
  return typeof error === 'object' && error !== null && typeof Reflect.get(error, 'status') === 'number';
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const direct: unknown = Reflect.get(error, 'code');
  if (typeof direct === 'string') return direct;
  // undici wraps socket errors: TypeError('fetch failed', { cause: { code } })
  const cause: unknown = Reflect.get(error, 'cause');
  return cause === error ? undefined : errorCode(cause);
}

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EHOSTUNREACH', 'EPIPE', 'UND_ERR_SOCKET']);

/** undici's network-level failure; other TypeErrors are programming errors. */
function isFetchFailure(error: unknown): boolean {
  return error instanceof TypeError && error.message === 'fetch failed';
}

/**
 * Translate anything a backend call threw into an AdapterError.
 */
export function toAdapterError(error: unknown, backend: string): AdapterError {
  if (error instanceof AdapterError) return error;

  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new AdapterError('timeout', `${backend} call timed out or was aborted`, error);
  }

  if (hasStatus(error)) {
    if (OVERLOAD_STATUSES.has(error.status)) {
      return new AdapterError('overloaded', `${backend} is overloaded (HTTP ${error.status})`, error);
    }
    if (error.status >= 500) {
      return new AdapterError('server_error', `${backend} failed (HTTP ${error.status})`, error);
    }
    return new AdapterError('rejected', `${backend} rejected the request (HTTP ${error.status})`, error);
  }

  const code = errorCode(error);
  if ((code !== undefined && CONNECTION_CODES.has(code)) || isFetchFailure(error)) {
    return new AdapterError('connection', `${backend} is unreachable: ${message}`, error);
  }

  if (error instanceof SyntaxError) {
    return new AdapterError('malformed_response', `${backend} returned an unparsable body: ${message}`, error);
  }

  return new AdapterError('failed', `${backend} failed: ${message}`, error);
}
