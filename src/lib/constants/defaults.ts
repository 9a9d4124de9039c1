/**
 * Default configuration constants
 *
 * Fallbacks used when no explicit configuration is provided.
 */

// Provider API
export const METANAME_API_ENDPOINT = 'https://metaname.net/api/1.1';
export const METANAME_MIN_TTL_SECONDS = 60;
export const ACCOUNT_REFERENCE_LENGTH = 4;
export const API_KEY_LENGTH = 48;

// Record naming
export const ACME_CHALLENGE_LABEL = '_acme-challenge';
export const TXT_RECORD_TYPE = 'TXT';

// Retry / backoff for provider calls
export const RETRY_MAX_ATTEMPTS = 5;
export const RETRY_BASE_DELAY_MS = 1_000;
export const RETRY_MAX_DELAY_MS = 30_000;
export const RETRY_BACKOFF_FACTOR = 2;
export const RETRY_JITTER_PERCENT = 0.1;

// Provider-side propagation poll (off unless attempts > 0)
export const PROPAGATION_ATTEMPTS = 0;
export const PROPAGATION_INTERVAL_MS = 2_000;

// Delay the CLI auth hook waits for public resolvers
export const CLI_PROPAGATION_SECONDS = 10;
