/**
 * exasol-ws-client - Version
 */

export const VERSION = '0.1.0';
