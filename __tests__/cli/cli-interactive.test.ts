import { describe, test, expect, jest, beforeEach } from '@jest/globals';

interface PromptConfig {
  message: string;
  mask?: string;
  validate?: (value: string) => boolean | string;
}

const mockInput = jest.fn<(config: PromptConfig) => Promise<string>>();
const mockPassword = jest.fn<(config: PromptConfig) => Promise<string>>();

// Mock prompts to simulate the operator typing credentials
jest.mock('@inquirer/prompts', () => ({
  input: (config: PromptConfig) => mockInput(config),
  password: (config: PromptConfig) => mockPassword(config),
}));

import { loadConfig } from '../../src/cli/utils/context.js';
import { ConfigError } from '../../src/index.js';
import { ACCOUNT_REFERENCE, API_KEY } from '../helpers/fake-provider.js';

describe('Interactive credentials', () => {
  beforeEach(() => {
    mockInput.mockReset().mockResolvedValue(ACCOUNT_REFERENCE);
    mockPassword.mockReset().mockResolvedValue(API_KEY);
  });

  test('prompts for missing credentials on a terminal', async () => {
    const config = await loadConfig({}, {}, true);

    expect(config.credential).toEqual({ accountReference: ACCOUNT_REFERENCE, apiKey: API_KEY });
    expect(mockInput).toHaveBeenCalledTimes(1);
    expect(mockPassword.mock.calls[0][0]).toEqual({ message: 'Metaname API key:', mask: '*' });

    const validate = mockInput.mock.calls[0][0].validate;
    expect(validate?.('abc')).toBe('Expected 4 characters');
    expect(validate?.('abcd')).toBe(true);
  });

  test('does not prompt when not interactive', async () => {
    await expect(loadConfig({}, {}, false)).rejects.toBeInstanceOf(ConfigError);
    expect(mockInput).not.toHaveBeenCalled();
  });

  test('does not prompt when credentials are configured', async () => {
    const config = await loadConfig({}, { METANAME_ACCOUNT_REFERENCE: 'wxyz', METANAME_API_KEY: API_KEY }, true);
    expect(config.credential.accountReference).toBe('wxyz');
    expect(mockInput).not.toHaveBeenCalled();
  });

  test('does not prompt for other configuration errors', async () => {
    await expect(
      loadConfig(
        { endpoint: 'ftp://example.com' },
        { METANAME_ACCOUNT_REFERENCE: ACCOUNT_REFERENCE, METANAME_API_KEY: API_KEY },
        true,
      ),
    ).rejects.toThrow('Invalid endpoint: unsupported protocol ftp:');
    expect(mockInput).not.toHaveBeenCalled();
  });
});
