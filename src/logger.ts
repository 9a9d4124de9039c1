import debug from 'debug';
import { DEBUG_PREFIX } from './lib/utils/debug.js';

export type LogFunction = (message: string) => void;

let logger: LogFunction | undefined;
const debugLogger = debug(DEBUG_PREFIX);

/** Route warnings to a host-provided sink in addition to debug output. */
export function setLogger(fn: LogFunction | undefined): void {
  logger = fn;
}

export function logWarn(message: string, ...args: unknown[]): void {
  const warnMessage = `WARN: ${message}`;

  if (typeof logger === 'function') {
    logger(warnMessage);
  }

  debugLogger(warnMessage, ...args);
}
