/**
 * DNS challenge errors
 *
 * Typed representation of everything that can go wrong while provisioning or
 * retracting a challenge record. Each class carries a stable `kind` for the
 * host and a `context` object for debugging.
 */

import { ERROR_KIND, type ErrorKind } from './codes.js';

/**
 * Base class for all DNS challenge errors
 */
export abstract class DnsChallengeError extends Error {
  abstract readonly code: string;
  abstract readonly kind: ErrorKind;
  /** Whether the provider client retries the call that raised this error */
  readonly retryable: boolean = false;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Provider rejected the account reference / API key pair
 */
export class AuthError extends DnsChallengeError {
  readonly code = 'AUTH_ERROR';
  readonly kind = ERROR_KIND.auth;

  static rejected(method: string, detail?: string): AuthError {
    return new AuthError(
      `Metaname API rejected the credentials for ${method}${detail ? `: ${detail}` : ''}`,
      { method, detail },
    );
  }
}

/**
 * Temporary failure: network, timeout or provider-side server error
 */
export class TransientError extends DnsChallengeError {
  readonly code = 'TRANSIENT_ERROR';
  readonly kind = ERROR_KIND.transient;
  override readonly retryable = true;

  static httpStatus(method: string, statusCode: number): TransientError {
    return new TransientError(`Metaname API call ${method} failed with HTTP ${statusCode}`, {
      method,
      statusCode,
    });
  }

  static network(method: string, cause: unknown): TransientError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new TransientError(
      `Metaname API call ${method} failed: ${detail}`,
      { method, detail },
      { cause },
    );
  }
}

/**
 * Provider asked the client to back off
 */
export class RateLimitError extends DnsChallengeError {
  readonly code = 'RATE_LIMIT_ERROR';
  readonly kind = ERROR_KIND.rateLimit;
  override readonly retryable = true;

  constructor(
    message: string,
    /** Delay requested by the provider, when it sent one */
    public readonly retryAfterMs?: number,
    context?: Record<string, unknown>,
  ) {
    super(message, { ...context, retryAfterMs });
  }

  static fromResponse(method: string, retryAfterMs?: number): RateLimitError {
    return new RateLimitError(`Metaname API rate limit reached for ${method}`, retryAfterMs, {
      method,
    });
  }
}

/**
 * Provider answer does not follow the JSON-RPC contract
 */
export class ProtocolError extends DnsChallengeError {
  readonly code = 'PROTOCOL_ERROR';
  readonly kind = ERROR_KIND.protocol;

  static notJson(method: string): ProtocolError {
    return new ProtocolError(`Metaname API didn't return a JSON response for ${method}`, {
      method,
    });
  }

  static outOfSequence(method: string, expectedId: number, actualId: unknown): ProtocolError {
    return new ProtocolError(
      `Metaname API returned out of sequence response for ${method}: expected id ${expectedId}, got ${JSON.stringify(actualId)}`,
      { method, expectedId, actualId },
    );
  }

  static invalidResponse(method: string, reason: string): ProtocolError {
    return new ProtocolError(`Metaname API returned an invalid response for ${method}: ${reason}`, {
      method,
      reason,
    });
  }
}

/**
 * Provider rejected the request parameters
 */
export class ValidationError extends DnsChallengeError {
  readonly code = 'VALIDATION_ERROR';
  readonly kind = ERROR_KIND.validation;

  static rejected(method: string, detail: string, rpcCode?: number): ValidationError {
    return new ValidationError(`Metaname API rejected ${method}: ${detail}`, {
      method,
      detail,
      rpcCode,
    });
  }

  static invalidDomain(domain: string, reason: string): ValidationError {
    return new ValidationError(`Invalid domain "${domain}": ${reason}`, { domain, reason });
  }

  static invalidValue(domain: string, reason: string): ValidationError {
    return new ValidationError(`Invalid validation value for ${domain}: ${reason}`, {
      domain,
      reason,
    });
  }
}

/**
 * The referenced record (or zone) does not exist
 */
export class NotFoundError extends DnsChallengeError {
  readonly code = 'NOT_FOUND_ERROR';
  readonly kind = ERROR_KIND.notFound;

  static fromRpc(method: string, detail: string): NotFoundError {
    return new NotFoundError(`Metaname API could not find the target of ${method}: ${detail}`, {
      method,
      detail,
    });
  }
}

/**
 * No hosted zone controls the domain
 */
export class ZoneNotFoundError extends DnsChallengeError {
  readonly code = 'ZONE_NOT_FOUND_ERROR';
  readonly kind = ERROR_KIND.zoneNotFound;

  static forDomain(domain: string, candidates: string[]): ZoneNotFoundError {
    return new ZoneNotFoundError(`Unable to find any Metaname zone for ${domain}`, {
      domain,
      candidates,
    });
  }
}

/**
 * Missing or malformed credentials and options
 */
export class ConfigError extends DnsChallengeError {
  readonly code = 'CONFIG_ERROR';
  readonly kind = ERROR_KIND.config;

  static missing(what: string, hint?: string): ConfigError {
    return new ConfigError(`Missing ${what}${hint ? ` (${hint})` : ''}`, { missing: what });
  }

  static invalid(what: string, reason: string): ConfigError {
    return new ConfigError(`Invalid ${what}: ${reason}`, { invalid: what, reason });
  }
}

/**
 * The caller aborted the operation
 */
export class CancelledError extends DnsChallengeError {
  readonly code = 'CANCELLED_ERROR';
  readonly kind = ERROR_KIND.cancelled;

  static fromSignal(signal: AbortSignal, operation: string): CancelledError {
    const reason: unknown = signal.reason;
    const detail = reason instanceof Error ? reason.message : reason ? String(reason) : undefined;
    return new CancelledError(`${operation} was cancelled${detail ? `: ${detail}` : ''}`, {
      operation,
      detail,
    });
  }
}

/** Per-domain failure carried by AggregateChallengeError */
export interface DomainFailure {
  domain: string;
  kind: ErrorKind;
  message: string;
}

/**
 * One or more domains of a batch failed
 */
export class AggregateChallengeError extends DnsChallengeError {
  readonly code = 'AGGREGATE_CHALLENGE_ERROR';
  readonly kind = ERROR_KIND.aggregate;

  constructor(public readonly failures: DomainFailure[]) {
    super(
      `DNS challenge failed for ${failures.length} domain(s): ${failures
        .map((f) => `${f.domain} (${f.kind}: ${f.message})`)
        .join('; ')}`,
      { domains: failures.map((f) => f.domain) },
    );
  }
}

/** Kind and message of any thrown value, as reported to the host */
export interface ErrorSummary {
  kind: ErrorKind;
  message: string;
}

export function toErrorSummary(error: unknown): ErrorSummary {
  if (error instanceof DnsChallengeError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof Error) {
    return { kind: ERROR_KIND.unknown, message: error.message };
  }
  return { kind: ERROR_KIND.unknown, message: String(error) };
}

/**
 * Type guards for error type checking
 */
export function isDnsChallengeError(error: unknown): error is DnsChallengeError {
  return error instanceof DnsChallengeError;
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof DnsChallengeError && error.retryable;
}
