import { readFile, stat } from 'fs/promises';
import { ConfigError } from '../errors/challenge-errors.js';
import { ACCOUNT_REFERENCE_LENGTH, API_KEY_LENGTH } from '../constants/defaults.js';
import { debugConfig } from '../utils/debug.js';
import { logWarn } from '../../logger.js';

/**
 * Metaname API credential pair.
 *
 * Frozen on creation; use {@link redactCredential} whenever it has to be shown.
 */
export interface Credential {
  readonly accountReference: string;
  readonly apiKey: string;
}

export function createCredential(accountReference: string, apiKey: string): Credential {
  const ref = accountReference.trim();
  const key = apiKey.trim();

  if (ref.length !== ACCOUNT_REFERENCE_LENGTH) {
    throw ConfigError.invalid(
      'account reference',
      `expected ${ACCOUNT_REFERENCE_LENGTH} characters, got ${ref.length}`,
    );
  }
  if (key.length !== API_KEY_LENGTH) {
    throw ConfigError.invalid('API key', `expected ${API_KEY_LENGTH} characters, got ${key.length}`);
  }

  return Object.freeze({ accountReference: ref, apiKey: key });
}

/** Display form: account reference plus a masked key */
export function redactCredential(credential: Credential): string {
  return `${credential.accountReference}:${'*'.repeat(8)}${credential.apiKey.slice(-4)}`;
}

/**
 * Read a JSON credentials file:
 *
 * ```json
 * { "account_reference": "abcd", "api_key": "..." }
 * ```
 *
 * camelCase keys (`accountReference`, `apiKey`) are accepted as well. Warns
 * when the file is readable by group or others.
 */
export async function loadCredentialFile(path: string): Promise<Credential> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Unable to read credentials file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path },
      { cause: error },
    );
  }

  const info = await stat(path);
  if ((info.mode & 0o077) !== 0) {
    logWarn(`Unsafe permissions on credentials file ${path}; it should not be accessible by group or others`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw ConfigError.invalid(`credentials file ${path}`, 'not valid JSON');
  }
  if (!parsed || typeof parsed !== 'object') {
    throw ConfigError.invalid(`credentials file ${path}`, 'expected a JSON object');
  }

  const accountReference = pickString(parsed, 'account_reference', 'accountReference');
  const apiKey = pickString(parsed, 'api_key', 'apiKey');
  if (!accountReference) {
    throw ConfigError.missing('account reference', `account_reference in ${path}`);
  }
  if (!apiKey) {
    throw ConfigError.missing('API key', `api_key in ${path}`);
  }

  debugConfig('loaded credentials from %s', path);
  return createCredential(accountReference, apiKey);
}

function pickString(source: object, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value: unknown = Reflect.get(source, key);
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}
