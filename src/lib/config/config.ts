import { ConfigError } from '../errors/challenge-errors.js';
import {
  METANAME_API_ENDPOINT,
  PROPAGATION_ATTEMPTS,
  PROPAGATION_INTERVAL_MS,
} from '../constants/defaults.js';
import { debugConfig } from '../utils/debug.js';
import type { RetryConfig } from '../transport/retry.js';
import type { PropagationOptions } from '../core/challenge-record-manager.js';
import { createCredential, loadCredentialFile, redactCredential, type Credential } from './credentials.js';

/** Everything needed to talk to the provider and run challenges */
export interface MetanameConfig {
  endpoint: string;
  credential: Credential;
  propagation: PropagationOptions;
  retry?: Partial<RetryConfig>;
}

/** Explicit options; each one wins over the environment */
export interface ConfigOptions {
  accountReference?: string;
  apiKey?: string;
  /** Path of a JSON credentials file */
  credentials?: string;
  endpoint?: string;
  propagationAttempts?: number | string;
  propagationIntervalMs?: number | string;
}

export const ENV = {
  accountReference: 'METANAME_ACCOUNT_REFERENCE',
  apiKey: 'METANAME_API_KEY',
  credentials: 'METANAME_CREDENTIALS',
  endpoint: 'METANAME_ENDPOINT',
  propagationAttempts: 'METANAME_PROPAGATION_ATTEMPTS',
  propagationIntervalMs: 'METANAME_PROPAGATION_INTERVAL_MS',
} as const;

/** Name used in the ConfigError raised when no credential source is configured */
export const MISSING_CREDENTIALS = 'Metaname API credentials';

type Env = Record<string, string | undefined>;

function parseNonNegativeInt(name: string, raw: number | string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw ConfigError.invalid(name, `expected a non-negative integer, got "${raw}"`);
  }
  return value;
}

function parseEndpoint(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw ConfigError.invalid('endpoint', `"${raw}" is not a URL`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw ConfigError.invalid('endpoint', `unsupported protocol ${url.protocol}`);
  }
  return raw;
}

/**
 * Resolve the credential from, in order: explicit account reference + API key,
 * an explicit credentials file, the environment pair, the environment file.
 */
export async function resolveCredential(options: ConfigOptions, env: Env = process.env): Promise<Credential> {
  if (options.accountReference || options.apiKey) {
    if (!options.accountReference) throw ConfigError.missing('account reference');
    if (!options.apiKey) throw ConfigError.missing('API key');
    return createCredential(options.accountReference, options.apiKey);
  }
  if (options.credentials) {
    return loadCredentialFile(options.credentials);
  }

  const envRef = env[ENV.accountReference];
  const envKey = env[ENV.apiKey];
  if (envRef || envKey) {
    if (!envRef) throw ConfigError.missing('account reference', `set ${ENV.accountReference}`);
    if (!envKey) throw ConfigError.missing('API key', `set ${ENV.apiKey}`);
    return createCredential(envRef, envKey);
  }

  const envFile = env[ENV.credentials];
  if (envFile) {
    return loadCredentialFile(envFile);
  }

  throw ConfigError.missing(
    MISSING_CREDENTIALS,
    `use --credentials, or set ${ENV.accountReference} and ${ENV.apiKey}`,
  );
}

/**
 * Merge explicit options, the environment and defaults into a config.
 */
export async function resolveConfig(options: ConfigOptions = {}, env: Env = process.env): Promise<MetanameConfig> {
  const credential = await resolveCredential(options, env);
  const config: MetanameConfig = {
    endpoint: parseEndpoint(options.endpoint ?? env[ENV.endpoint] ?? METANAME_API_ENDPOINT),
    credential,
    propagation: {
      attempts: parseNonNegativeInt(
        'propagation attempts',
        options.propagationAttempts ?? env[ENV.propagationAttempts],
        PROPAGATION_ATTEMPTS,
      ),
      intervalMs: parseNonNegativeInt(
        'propagation interval',
        options.propagationIntervalMs ?? env[ENV.propagationIntervalMs],
        PROPAGATION_INTERVAL_MS,
      ),
    },
  };

  debugConfig(
    'endpoint=%s credential=%s propagation=%j',
    config.endpoint,
    redactCredential(credential),
    config.propagation,
  );
  return config;
}
