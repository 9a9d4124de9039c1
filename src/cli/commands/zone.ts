import { success } from '../logger.js';
import { createAuthenticator, type ApiCommandOptions } from '../utils/context.js';
import type { CommandDeps } from './auth.js';

/** Print the Metaname zone that controls a domain. */
export async function handleZoneCommand(
  domain: string,
  options: ApiCommandOptions,
  deps: CommandDeps = {},
): Promise<string> {
  const authenticator = deps.authenticator ?? (await createAuthenticator(options, deps.env ?? process.env));
  const zone = await authenticator.manager.resolver.resolve(domain);
  success(`${domain} is hosted in zone ${zone.name}`);
  return zone.name;
}
