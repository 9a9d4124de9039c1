import {
  AuthError,
  NotFoundError,
  ProtocolError,
  RateLimitError,
  TransientError,
  ValidationError,
  type DnsChallengeError,
} from './challenge-errors.js';
import { JSON_RPC_ERROR } from './codes.js';

type Headers = Record<string, string | string[] | undefined>;

const AUTH_STATUS_CODES = new Set([401, 403]);
const TRANSIENT_STATUS_CODES = new Set([408, 500, 502, 503, 504]);

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const AUTH_PATTERN = /authenticat|unauthori[sz]ed|api[ _-]?key|account[ _-]?reference|permission|forbidden/i;
const RATE_LIMIT_PATTERN = /rate[ _-]?limit|too many/i;
const NOT_FOUND_PATTERN = /not found|no such|does not exist|unknown (record|zone)/i;

/**
 * Extract Retry-After header value in milliseconds
 */
export function getRetryAfterMs(headers: Headers): number | undefined {
  const retryAfter = headers['retry-after'];
  const value = Array.isArray(retryAfter) ? retryAfter[0] : retryAfter;
  if (!value) return undefined;

  // Try parsing as seconds
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  // Try parsing as HTTP date
  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return undefined;
}

/**
 * Map a non-2xx HTTP status of the RPC endpoint to an error.
 *
 * Returns undefined for statuses that still carry a JSON-RPC body worth
 * reading (e.g. 400 with an `error` member).
 */
export function createErrorFromHttpStatus(
  method: string,
  statusCode: number,
  headers: Headers,
): DnsChallengeError | undefined {
  if (AUTH_STATUS_CODES.has(statusCode)) {
    return AuthError.rejected(method, `HTTP ${statusCode}`);
  }
  if (statusCode === 429) {
    return RateLimitError.fromResponse(method, getRetryAfterMs(headers));
  }
  if (TRANSIENT_STATUS_CODES.has(statusCode) || statusCode >= 500) {
    return TransientError.httpStatus(method, statusCode);
  }
  return undefined;
}

/**
 * Map a JSON-RPC error object to an error.
 *
 * The provider reports most failures with application codes and a message,
 * so the message decides between auth, rate limit and not-found; standard
 * JSON-RPC codes decide protocol and internal failures.
 */
export function createErrorFromRpcError(method: string, rpcError: unknown): DnsChallengeError {
  if (!rpcError || typeof rpcError !== 'object') {
    return ProtocolError.invalidResponse(method, `malformed error member ${JSON.stringify(rpcError)}`);
  }

  const code = 'code' in rpcError && typeof rpcError.code === 'number' ? rpcError.code : undefined;
  const message = 'message' in rpcError && typeof rpcError.message === 'string' ? rpcError.message : '';
  const detail = message.length > 0 ? message : 'Unknown error';

  if (
    code === JSON_RPC_ERROR.parseError ||
    code === JSON_RPC_ERROR.invalidRequest ||
    code === JSON_RPC_ERROR.methodNotFound
  ) {
    return ProtocolError.invalidResponse(method, `${detail} (code ${code})`);
  }
  if (code === JSON_RPC_ERROR.internalError) {
    return new TransientError(`Metaname API internal error for ${method}: ${detail}`, {
      method,
      rpcCode: code,
    });
  }
  if (AUTH_PATTERN.test(detail)) {
    return AuthError.rejected(method, detail);
  }
  if (RATE_LIMIT_PATTERN.test(detail)) {
    return new RateLimitError(`Metaname API rate limit reached for ${method}: ${detail}`, undefined, {
      method,
      rpcCode: code,
    });
  }
  if (NOT_FOUND_PATTERN.test(detail)) {
    return NotFoundError.fromRpc(method, detail);
  }
  return ValidationError.rejected(method, detail, code);
}

/**
 * Map a thrown network/transport error to an error.
 */
export function createErrorFromNetworkError(method: string, error: unknown): DnsChallengeError {
  if (error && typeof error === 'object' && 'code' in error) {
    if (typeof error.code === 'string' && TRANSIENT_NETWORK_CODES.has(error.code)) {
      return TransientError.network(method, error);
    }
  }
  if (error instanceof SyntaxError) {
    return ProtocolError.notJson(method);
  }
  // Unknown transport failures are treated as temporary
  return TransientError.network(method, error);
}
