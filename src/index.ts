/**
 * acme-dns-metaname - ACME dns-01 challenges on Metaname-hosted zones
 */

export * from './lib/index.js';
export { setLogger, logWarn, type LogFunction } from './logger.js';
