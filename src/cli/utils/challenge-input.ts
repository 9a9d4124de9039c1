import { ConfigError, type ChallengeRequest } from '../../index.js';
import type { Env } from './context.js';

/** Domain/validation flags; certbot's hook variables fill in what is missing */
export interface ChallengeInputOptions {
  domain?: string;
  validation?: string;
}

export const CERTBOT_ENV = {
  domain: 'CERTBOT_DOMAIN',
  validation: 'CERTBOT_VALIDATION',
} as const;

export function resolveChallengeInput(options: ChallengeInputOptions, env: Env = process.env): ChallengeRequest {
  const domain = options.domain ?? env[CERTBOT_ENV.domain];
  const validation = options.validation ?? env[CERTBOT_ENV.validation];

  if (!domain) {
    throw ConfigError.missing('domain', `use --domain or set ${CERTBOT_ENV.domain}`);
  }
  if (!validation) {
    throw ConfigError.missing('validation value', `use --validation or set ${CERTBOT_ENV.validation}`);
  }
  return { domain, validation };
}
