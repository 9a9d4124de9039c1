import { createSpinner } from '../logger.js';
import { createAuthenticator } from '../utils/context.js';
import { resolveChallengeInput } from '../utils/challenge-input.js';
import type { AuthCommandOptions, CommandDeps } from './auth.js';

export type CleanupCommandOptions = Omit<AuthCommandOptions, 'propagationSeconds'>;

/**
 * Remove the challenge record for one domain. Failures are reported but never
 * fail the command: the issuance outcome is already decided.
 */
export async function handleCleanupCommand(
  options: CleanupCommandOptions,
  deps: CommandDeps = {},
): Promise<boolean> {
  const env = deps.env ?? process.env;
  const challenge = resolveChallengeInput(options, env);
  const authenticator = deps.authenticator ?? (await createAuthenticator(options, env));

  const spinner = createSpinner().start(`Removing TXT record for ${challenge.domain}`);
  const [outcome] = await authenticator.cleanup([challenge]);

  if (!outcome || !outcome.ok) {
    spinner.warn(
      `Unable to delete the challenge record for ${challenge.domain}: ${outcome?.error?.message ?? 'no result'}`,
    );
    return false;
  }
  spinner.succeed(
    outcome.removed > 0
      ? `Removed challenge record for ${challenge.domain}`
      : `No challenge record left for ${challenge.domain}`,
  );
  return true;
}
