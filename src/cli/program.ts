import { Command } from 'commander';
import { getPackageInfo } from '../index.js';
import { handleError } from './utils/errors.js';
import { handleAuthCommand, type AuthCommandOptions } from './commands/auth.js';
import { handleCleanupCommand, type CleanupCommandOptions } from './commands/cleanup.js';
import type { ApiCommandOptions } from './utils/context.js';
import { handleZoneCommand } from './commands/zone.js';

const TEST_ENV = 'ACME_DNS_METANAME_CLI_TEST';

function addApiOptions(command: Command): Command {
  return command
    .option('--credentials <path>', 'JSON file with account_reference and api_key')
    .option('--endpoint <url>', 'Metaname API endpoint')
    .option('--propagation-attempts <n>', 'Poll the API up to n times until it lists the new record')
    .option('--propagation-interval <ms>', 'Delay between propagation polls in milliseconds');
}

/** Build a Commander program instance for the CLI. */
export function createCli(): Command {
  const program = new Command();
  const pkg = getPackageInfo();

  program
    .name('acme-dns-metaname')
    .description('ACME dns-01 challenge hooks for Metaname DNS')
    .version(pkg.version);

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env[TEST_ENV]) {
    program.exitOverride();
  }

  function exitOnError() {
    if (process.env[TEST_ENV]) return;
    process.exit(1);
  }

  addApiOptions(
    program
      .command('auth')
      .description('Create the _acme-challenge TXT record (certbot --manual-auth-hook)')
      .option('-d, --domain <domain>', 'Domain being validated (default: $CERTBOT_DOMAIN)')
      .option('-v, --validation <value>', 'Validation string (default: $CERTBOT_VALIDATION)')
      .option('--propagation-seconds <seconds>', 'Seconds to wait after creating the record (default: 10)'),
  ).action(async (opts: AuthCommandOptions) => {
    try {
      await handleAuthCommand({
        domain: opts.domain,
        validation: opts.validation,
        propagationSeconds: opts.propagationSeconds,
        credentials: opts.credentials,
        endpoint: opts.endpoint,
        propagationAttempts: opts.propagationAttempts,
        propagationInterval: opts.propagationInterval,
      });
    } catch (e) {
      handleError(e);
      exitOnError();
    }
  });

  addApiOptions(
    program
      .command('cleanup')
      .description('Delete the _acme-challenge TXT record (certbot --manual-cleanup-hook)')
      .option('-d, --domain <domain>', 'Domain being validated (default: $CERTBOT_DOMAIN)')
      .option('-v, --validation <value>', 'Validation string (default: $CERTBOT_VALIDATION)'),
  ).action(async (opts: CleanupCommandOptions) => {
    // Cleanup never fails the hook
    try {
      await handleCleanupCommand({
        domain: opts.domain,
        validation: opts.validation,
        credentials: opts.credentials,
        endpoint: opts.endpoint,
        propagationAttempts: opts.propagationAttempts,
        propagationInterval: opts.propagationInterval,
      });
    } catch (e) {
      handleError(e);
    }
  });

  addApiOptions(
    program
      .command('zone')
      .description('Show which Metaname zone controls a domain')
      .argument('<domain>', 'Domain name to resolve'),
  ).action(async (domain: string, opts: ApiCommandOptions) => {
    try {
      await handleZoneCommand(domain, {
        credentials: opts.credentials,
        endpoint: opts.endpoint,
      });
    } catch (e) {
      handleError(e);
      exitOnError();
    }
  });

  return program;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const code = err && typeof err === 'object' && 'code' in err ? err.code : undefined;
    if (process.env[TEST_ENV] && (code === 'commander.helpDisplayed' || code === 'commander.version')) {
      return program;
    }
    throw err;
  }
  return program;
}
