/**
 * Core exports: provider client, zone resolution, challenge lifecycle.
 */

// Host-facing capability
export {
  DnsAuthenticator,
  type ChallengeRequest,
  type PerformOutcome,
  type CleanupOutcome,
} from './core/dns-authenticator.js';
export {
  ChallengeRecordManager,
  type ChallengeRecord,
  type ChallengeRecordManagerOptions,
  type CleanupResult,
  type PerformOptions,
  type PropagationOptions,
} from './core/challenge-record-manager.js';

// Zones
export { ZoneResolver } from './zones/zone-resolver.js';
export { ZoneCache } from './zones/zone-cache.js';

// Provider
export { MetanameClient, type MetanameClientOptions } from './provider/metaname-client.js';
export type {
  DnsProviderClient,
  ProviderRecord,
  Zone,
  CreateRecordInput,
  CallOptions,
} from './provider/types.js';

// Configuration
export {
  createCredential,
  loadCredentialFile,
  redactCredential,
  type Credential,
} from './config/credentials.js';
export {
  resolveConfig,
  resolveCredential,
  ENV,
  MISSING_CREDENTIALS,
  type ConfigOptions,
  type MetanameConfig,
} from './config/config.js';

// Error handling
export {
  DnsChallengeError,
  AuthError,
  TransientError,
  RateLimitError,
  ProtocolError,
  ValidationError,
  NotFoundError,
  ZoneNotFoundError,
  ConfigError,
  CancelledError,
  AggregateChallengeError,
  toErrorSummary,
  isDnsChallengeError,
  isAuthError,
  isNotFoundError,
  isRetryableError,
  type DomainFailure,
  type ErrorSummary,
} from './errors/challenge-errors.js';
export { ERROR_KIND, JSON_RPC_ERROR, type ErrorKind } from './errors/codes.js';

// Constants
export { CHALLENGE_STATE, canTransition, type ChallengeState } from './constants/status.js';
export * from './constants/defaults.js';

// Transport
export { HttpClient, type HttpClientOptions, type ParsedResponseData } from './transport/http-client.js';
export {
  withRetry,
  calculateRetryDelay,
  sleep,
  abortable,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  type SleepFunction,
} from './transport/retry.js';

// Utils
export {
  normalizeDomain,
  challengeRecordName,
  zoneNameCandidates,
  recordNameMatches,
} from './utils/domain.js';
export { buildUserAgent, getPackageInfo, type PackageInfo } from './utils/user-agent.js';
