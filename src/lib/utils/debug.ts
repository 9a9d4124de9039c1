/**
 * Debug logging utilities
 *
 * Namespaced debug output, enabled with the DEBUG environment variable:
 *
 * DEBUG=acme-dns-metaname:* - All debug output
 * DEBUG=acme-dns-metaname:http - Only HTTP transport
 * DEBUG=acme-dns-metaname:challenge - Only challenge record lifecycle
 *
 * Nothing is printed unless DEBUG selects the namespace.
 */

import debug from 'debug';

export const DEBUG_PREFIX = 'acme-dns-metaname';

const createDebugger = (namespace: string): debug.Debugger => debug(`${DEBUG_PREFIX}:${namespace}`);

export const debugHttp = createDebugger('http');
export const debugRpc = createDebugger('rpc');
export const debugRetry = createDebugger('retry');
export const debugZone = createDebugger('zone');
export const debugChallenge = createDebugger('challenge');
export const debugConfig = createDebugger('config');
