/**
 * Clients Exports
 *
 * Contract of the remote search API and its structured failures
 */

export * from './search/index.js';
