import {
  CLI_PROPAGATION_SECONDS,
  ConfigError,
  DnsAuthenticator,
  sleep,
  type SleepFunction,
} from '../../index.js';
import { createSpinner, kv } from '../logger.js';
import { createAuthenticator, type ApiCommandOptions, type Env } from '../utils/context.js';
import { resolveChallengeInput, type ChallengeInputOptions } from '../utils/challenge-input.js';

/** Flags accepted by the auth (manual-auth-hook) command. */
export interface AuthCommandOptions extends ApiCommandOptions, ChallengeInputOptions {
  propagationSeconds?: string;
}

/** Collaborators replaceable by tests */
export interface CommandDeps {
  env?: Env;
  authenticator?: DnsAuthenticator;
  wait?: SleepFunction;
}

function parsePropagationSeconds(raw: string | undefined): number {
  if (raw === undefined) return CLI_PROPAGATION_SECONDS;
  const seconds = Number(raw);
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw ConfigError.invalid('propagation seconds', `expected a non-negative integer, got "${raw}"`);
  }
  return seconds;
}

/** Create the challenge record for one domain, then give resolvers time to catch up. */
export async function handleAuthCommand(options: AuthCommandOptions, deps: CommandDeps = {}): Promise<void> {
  const env = deps.env ?? process.env;
  const challenge = resolveChallengeInput(options, env);
  const seconds = parsePropagationSeconds(options.propagationSeconds);
  const authenticator = deps.authenticator ?? (await createAuthenticator(options, env));

  const spinner = createSpinner().start(`Creating TXT record for ${challenge.domain}`);
  const outcomes = await authenticator.perform([challenge]);
  const [outcome] = outcomes;
  if (!outcome?.ok) {
    spinner.fail(`Unable to create the challenge record for ${challenge.domain}`);
    DnsAuthenticator.assertAllSucceeded(outcomes);
    return;
  }

  spinner.succeed(`Created ${outcome.record.fqdnLabel} in zone ${outcome.record.zone.name}`);
  kv('Record', outcome.record.providerRecordId ?? 'unknown');

  if (seconds > 0) {
    spinner.start(`Waiting ${seconds}s for DNS propagation`);
    await (deps.wait ?? sleep)(seconds * 1000);
    spinner.succeed(`Waited ${seconds}s for DNS propagation`);
  }
}
