import { describe, test, expect, jest, beforeEach } from '@jest/globals';

// Mock command handlers before the program factory loads them
jest.mock('../../src/cli/commands/auth', () => ({
  handleAuthCommand: jest.fn(async () => {}),
}));
jest.mock('../../src/cli/commands/cleanup', () => ({
  handleCleanupCommand: jest.fn(async () => true),
}));
jest.mock('../../src/cli/commands/zone', () => ({
  handleZoneCommand: jest.fn(async () => 'example.com'),
}));

import { runCli } from '../../src/cli/program.js';
import { handleAuthCommand } from '../../src/cli/commands/auth.js';
import { handleCleanupCommand } from '../../src/cli/commands/cleanup.js';
import { handleZoneCommand } from '../../src/cli/commands/zone.js';

// Utility to run with test env
function withTestEnv(fn: () => Promise<void>) {
  return async () => {
    process.env.ACME_DNS_METANAME_CLI_TEST = '1';
    try {
      await fn();
    } finally {
      delete process.env.ACME_DNS_METANAME_CLI_TEST;
    }
  };
}

describe('acme-dns-metaname CLI', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  test(
    'shows help without running a command',
    withTestEnv(async () => {
      const out = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
      try {
        await expect(runCli(['--help'])).resolves.toBeDefined();
      } finally {
        out.mockRestore();
      }
      expect(handleAuthCommand).not.toHaveBeenCalled();
    }),
  );

  test(
    'passes options to the auth command',
    withTestEnv(async () => {
      await runCli([
        'auth',
        '--domain',
        'example.com',
        '--validation',
        'abc123validation',
        '--propagation-seconds',
        '30',
        '--credentials',
        './metaname.json',
        '--endpoint',
        'https://dns.test/api',
        '--propagation-attempts',
        '4',
        '--propagation-interval',
        '500',
      ]);

      const handleAuth = jest.mocked(handleAuthCommand);
      expect(handleAuth).toHaveBeenCalledTimes(1);
      expect(handleAuth.mock.calls[0][0]).toEqual({
        domain: 'example.com',
        validation: 'abc123validation',
        propagationSeconds: '30',
        credentials: './metaname.json',
        endpoint: 'https://dns.test/api',
        propagationAttempts: '4',
        propagationInterval: '500',
      });
    }),
  );

  test(
    'leaves domain and validation to the certbot environment',
    withTestEnv(async () => {
      await runCli(['cleanup', '--credentials', './metaname.json']);

      const handleCleanup = jest.mocked(handleCleanupCommand);
      expect(handleCleanup).toHaveBeenCalledTimes(1);
      expect(handleCleanup.mock.calls[0][0]).toMatchObject({
        domain: undefined,
        validation: undefined,
        credentials: './metaname.json',
      });
    }),
  );

  test(
    'zone command forwards the domain',
    withTestEnv(async () => {
      await runCli(['zone', 'www.example.com', '--endpoint', 'https://dns.test/api']);

      const handleZone = jest.mocked(handleZoneCommand);
      expect(handleZone).toHaveBeenCalledWith('www.example.com', {
        credentials: undefined,
        endpoint: 'https://dns.test/api',
      });
    }),
  );
});
