/**
 * Error kinds reported to the host for failed challenges.
 *
 * A kind is the stable, machine-readable part of an outcome; the message is
 * for humans.
 */
export const ERROR_KIND = {
  /** Credentials were rejected by the provider. Never retried. */
  auth: 'auth',
  /** Network failure, timeout or provider-side 5xx. Retried with backoff. */
  transient: 'transient',
  /** Provider asked us to slow down. Retried with backoff. */
  rateLimit: 'rate-limit',
  /** Provider answer did not follow the JSON-RPC contract. */
  protocol: 'protocol',
  /** Provider rejected the request parameters (bad name, value or zone). */
  validation: 'validation',
  /** The referenced record or zone does not exist. */
  notFound: 'not-found',
  /** No hosted zone controls the domain. */
  zoneNotFound: 'zone-not-found',
  /** Missing or malformed credentials or options. */
  config: 'config',
  /** The caller cancelled the operation. */
  cancelled: 'cancelled',
  /** Several domains failed. */
  aggregate: 'aggregate',
  /** Anything thrown that is not one of ours. */
  unknown: 'unknown',
} as const;

export type ErrorKind = (typeof ERROR_KIND)[keyof typeof ERROR_KIND];

/**
 * Standard JSON-RPC 2.0 error codes
 *
 * @see {@link https://www.jsonrpc.org/specification#error_object | JSON-RPC 2.0 - Error object}
 */
export const JSON_RPC_ERROR = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
} as const;
