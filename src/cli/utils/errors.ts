import chalk from 'chalk';
import { AggregateChallengeError, ERROR_KIND, isDnsChallengeError } from '../../index.js';

const HINTS: Partial<Record<string, string>> = {
  [ERROR_KIND.auth]: 'Check the account reference and API key in your credentials.',
  [ERROR_KIND.zoneNotFound]: 'Make sure the domain is hosted on Metaname under this account.',
  [ERROR_KIND.config]: 'Run with --help to see the available options.',
  [ERROR_KIND.rateLimit]: 'The Metaname API is rate limiting requests. Try again later.',
};

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (error instanceof AggregateChallengeError) {
    console.error(chalk.red('Error:'), 'DNS challenge failed');
    for (const failure of error.failures) {
      console.error(`  - ${failure.domain} ${chalk.gray(`[${failure.kind}]`)} ${failure.message}`);
    }
  } else if (isDnsChallengeError(error)) {
    console.error(chalk.red('Error:'), `${chalk.gray(`[${error.kind}]`)} ${error.message}`);
    const hint = HINTS[error.kind];
    if (hint) console.error(chalk.gray(hint));
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
