/**
 * exasol-ws-client - Exasol WebSocket Client
 *
 * Connects to Exasol over its JSON WebSocket protocol: host ranges and
 * failover, password and token login, direct and prepared execution,
 * result paging and local CSV import.
 *
 * @module exasol-ws-client
 */

// Export types
export * from './types/index.js';

// Export configuration
export {
    ConnectionConfigSchema,
    DEFAULT_FETCH_SIZE,
    DEFAULT_PORT,
    parseConfig,
    type ConnectionConfig,
    type ConnectionConfigInput
} from './config/schema.js';
export { parseDsn } from './config/dsn.js';

// Export connection
export { Connector, open, type ConnectorOptions } from './connection/Connector.js';
export { Connection } from './connection/Connection.js';
export { PreparedStatement } from './statement/PreparedStatement.js';
export { ResultRows, Row } from './result/ResultRows.js';

// Export transport
export { Session, type SendOptions } from './transports/Session.js';
export { WebSocketChannel } from './transports/websocket.js';
export type { ChannelFactory, ChannelOptions, Frame, MessageChannel } from './transports/channel.js';

// Export utilities
export { resolveHosts } from './utils/hosts.js';
export { logger } from './utils/logger.js';
export { VERSION } from './version.js';
