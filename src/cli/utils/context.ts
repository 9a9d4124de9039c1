import { input, password } from '@inquirer/prompts';
import {
  ConfigError,
  DnsAuthenticator,
  MISSING_CREDENTIALS,
  resolveConfig,
  type ConfigOptions,
  type MetanameConfig,
} from '../../index.js';

/** Options shared by every command that talks to the API */
export interface ApiCommandOptions {
  credentials?: string;
  endpoint?: string;
  propagationAttempts?: string;
  propagationInterval?: string;
}

export type Env = Record<string, string | undefined>;

export function toConfigOptions(options: ApiCommandOptions): ConfigOptions {
  return {
    credentials: options.credentials,
    endpoint: options.endpoint,
    propagationAttempts: options.propagationAttempts,
    propagationIntervalMs: options.propagationInterval,
  };
}

function isMissingCredentials(error: unknown): boolean {
  return error instanceof ConfigError && error.context?.missing === MISSING_CREDENTIALS;
}

/**
 * Resolve the configuration; when no credential source is configured and the
 * CLI runs on a terminal, ask for the account reference and API key.
 */
export async function loadConfig(
  options: ApiCommandOptions,
  env: Env = process.env,
  interactive: boolean = Boolean(process.stdin.isTTY),
): Promise<MetanameConfig> {
  const configOptions = toConfigOptions(options);
  try {
    return await resolveConfig(configOptions, env);
  } catch (error) {
    if (!interactive || !isMissingCredentials(error)) {
      throw error;
    }
  }

  const accountReference = await input({
    message: 'Metaname account reference (4 characters):',
    validate: (value) => value.trim().length === 4 || 'Expected 4 characters',
  });
  const apiKey = await password({ message: 'Metaname API key:', mask: '*' });
  return resolveConfig({ ...configOptions, accountReference, apiKey }, env);
}

export async function createAuthenticator(
  options: ApiCommandOptions,
  env: Env = process.env,
): Promise<DnsAuthenticator> {
  return DnsAuthenticator.fromConfig(await loadConfig(options, env));
}
