/**
 * acme-wire - typed, immutable ACME protocol messages
 *
 * Main entry point
 */

export * from './lib/index.js';
export { setLogger } from './logger.js';
