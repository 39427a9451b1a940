/**
 * exasol-ws-client - Connector
 *
 * Expands the host specification and tries each candidate in order until a
 * WebSocket session can be opened and logged in. Per-host failures are
 * logged and collected; only when every candidate fails does connect()
 * reject.
 */

import { parseConfig, type ConnectionConfig, type ConnectionConfigInput } from '../config/schema.js';
import { parseDsn } from '../config/dsn.js';
import type { ChannelFactory } from '../transports/channel.js';
import { Session } from '../transports/Session.js';
import { WebSocketChannel } from '../transports/websocket.js';
import { ConnectionError, RequestCancelledError } from '../types/index.js';
import { resolveHosts } from '../utils/hosts.js';
import { logger } from '../utils/logger.js';
import { Connection } from './Connection.js';
import { login } from './login.js';

const log = logger.forModule('CONNECTOR');

export interface ConnectorOptions {
    /** Opens the message channel for one candidate host */
    channelFactory?: ChannelFactory;

    /** Aborts host probing, a WebSocket handshake or a login exchange in flight */
    signal?: AbortSignal;
}

interface HostFailure {
    host: string;
    reason: string;
}

export class Connector {
    private readonly channelFactory: ChannelFactory;

    constructor(
        readonly config: ConnectionConfig,
        private readonly options: ConnectorOptions = {}
    ) {
        this.channelFactory = options.channelFactory ?? ((channelOptions) => WebSocketChannel.open(channelOptions));
    }

    /**
     * Open and log in a session on the first reachable host
     */
    async connect(): Promise<Connection> {
        const hosts = resolveHosts(this.config.host);
        const failures: HostFailure[] = [];

        for (const host of hosts) {
            if (this.options.signal?.aborted) {
                throw new RequestCancelledError({ operation: 'connect', host });
            }
            try {
                return await this.connectHost(host);
            } catch (error) {
                if (error instanceof RequestCancelledError) {
                    throw error;
                }
                const reason = error instanceof Error ? error.message : 'Unknown error';
                failures.push({ host, reason });
                log.warning('Could not connect to host', {
                    code: 'HOST_FAILED',
                    entityId: host,
                    port: this.config.port,
                    error: reason
                });
            }
        }

        const summary = failures.map((failure) => `${failure.host}: ${failure.reason}`).join('; ');
        throw new ConnectionError(
            `could not connect to any host: ${summary}`,
            { hosts: failures },
            'ALL_HOSTS_FAILED'
        );
    }

    private async connectHost(host: string): Promise<Connection> {
        log.debug('Connecting', { entityId: host, port: this.config.port });
        const channel = await this.channelFactory({
            host,
            port: this.config.port,
            encryption: this.config.encryption,
            validateServerCertificate: this.config.validateServerCertificate,
            certificateFingerprint: this.config.certificateFingerprint,
            connectTimeout: this.config.connectTimeout,
            signal: this.options.signal
        });

        const session = new Session(channel);
        try {
            const info = await login(session, this.config, { signal: this.options.signal });
            log.info('Connected', {
                entityId: host,
                sessionId: String(info.sessionId),
                releaseVersion: info.releaseVersion
            });
            return new Connection(session, this.config, info, host);
        } catch (error) {
            await session.close();
            throw error;
        }
    }
}

/**
 * Connect using a DSN string or a configuration object
 */
export async function open(
    dsnOrConfig: string | ConnectionConfigInput,
    options: ConnectorOptions = {}
): Promise<Connection> {
    const config = typeof dsnOrConfig === 'string' ? parseDsn(dsnOrConfig) : parseConfig(dsnOrConfig);
    return new Connector(config, options).connect();
}
