/**
 * exasol-ws-client - Type Definitions
 */

export * from './errors.js';
export * from './database.js';
export * from './protocol.js';
