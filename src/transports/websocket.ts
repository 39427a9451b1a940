/**
 * exasol-ws-client - WebSocket Channel
 *
 * Adapts a ws socket to the pull-style MessageChannel: incoming frames are
 * queued until read() asks for them, and a socket error or close fails the
 * pending and all later reads.
 */

import type { IncomingMessage } from 'node:http';
import { TLSSocket } from 'node:tls';
import WebSocket from 'ws';
import { ConnectionError, RequestCancelledError } from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { ChannelOptions, Frame, MessageChannel } from './channel.js';

const log = logger.forModule('TRANSPORT');

interface PendingRead {
    resolve: (frame: Frame) => void;
    reject: (error: Error) => void;
}

/**
 * Normalize a certificate fingerprint to lowercase hex without separators
 */
export function normalizeFingerprint(fingerprint: string): string {
    return fingerprint.replace(/:/g, '').toLowerCase();
}

function toBuffer(data: WebSocket.RawData): Buffer {
    if (Array.isArray(data)) {
        return Buffer.concat(data);
    }
    if (data instanceof ArrayBuffer) {
        return Buffer.from(new Uint8Array(data));
    }
    return data;
}

function stripIpv4Mapping(address: string | undefined): string | undefined {
    return address?.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

export class WebSocketChannel implements MessageChannel {
    private readonly inbox: Frame[] = [];
    private pending: PendingRead | null = null;
    private failure: Error | null = null;

    private constructor(
        private readonly socket: WebSocket,
        readonly localAddress: string | undefined
    ) {
        socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
            const buffer = toBuffer(data);
            this.deliver(isBinary
                ? { kind: 'binary', data: buffer }
                : { kind: 'text', data: buffer.toString('utf8') });
        });
        socket.on('error', (error: Error) => {
            this.fail(error);
        });
        socket.on('close', (code: number) => {
            this.fail(new Error(`connection closed with code ${String(code)}`));
        });
    }

    /**
     * Open a socket to ws[s]://host:port and wait for the handshake
     */
    static open(options: ChannelOptions): Promise<WebSocketChannel> {
        const url = `${options.encryption ? 'wss' : 'ws'}://${options.host}:${String(options.port)}`;
        const pinned = options.certificateFingerprint !== undefined;
        const signal = options.signal;
        if (signal?.aborted) {
            return Promise.reject(new RequestCancelledError({ operation: 'connect', url }));
        }

        return new Promise((resolve, reject) => {
            let localAddress: string | undefined;
            let fingerprintError: Error | null = null;

            const socket = new WebSocket(url, {
                handshakeTimeout: options.connectTimeout,
                perMessageDeflate: false,
                rejectUnauthorized: options.validateServerCertificate && !pinned
            });

            const onAbort = (): void => {
                socket.terminate();
                reject(new RequestCancelledError({ operation: 'connect', url }));
            };
            signal?.addEventListener('abort', onAbort, { once: true });

            socket.once('upgrade', (response: IncomingMessage) => {
                localAddress = stripIpv4Mapping(response.socket.localAddress);
                if (pinned && response.socket instanceof TLSSocket) {
                    fingerprintError = checkFingerprint(response.socket, options.certificateFingerprint ?? '');
                }
            });

            socket.once('open', () => {
                signal?.removeEventListener('abort', onAbort);
                socket.removeAllListeners('error');
                if (fingerprintError !== null) {
                    socket.terminate();
                    reject(fingerprintError);
                    return;
                }
                log.debug('WebSocket opened', { url, localAddress });
                resolve(new WebSocketChannel(socket, localAddress));
            });

            socket.once('error', (error: Error) => {
                signal?.removeEventListener('abort', onAbort);
                reject(new ConnectionError(`could not connect to '${url}': ${error.message}`, { url }));
            });
        });
    }

    write(frame: Frame): Promise<void> {
        if (this.failure !== null) {
            return Promise.reject(this.failure);
        }
        return new Promise((resolve, reject) => {
            this.socket.send(frame.data, { binary: frame.kind === 'binary' }, (error?: Error) => {
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            });
        });
    }

    read(): Promise<Frame> {
        const frame = this.inbox.shift();
        if (frame !== undefined) {
            return Promise.resolve(frame);
        }
        if (this.failure !== null) {
            return Promise.reject(this.failure);
        }
        return new Promise((resolve, reject) => {
            this.pending = { resolve, reject };
        });
    }

    close(): Promise<void> {
        if (this.socket.readyState === WebSocket.CLOSED) {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            const timer = setTimeout(() => {
                this.socket.terminate();
            }, 1000);
            timer.unref();
            this.socket.once('close', () => {
                clearTimeout(timer);
                resolve();
            });
            this.socket.close(1000);
        });
    }

    private deliver(frame: Frame): void {
        const pending = this.pending;
        if (pending !== null) {
            this.pending = null;
            pending.resolve(frame);
        } else {
            this.inbox.push(frame);
        }
    }

    private fail(error: Error): void {
        this.failure ??= error;
        const pending = this.pending;
        if (pending !== null) {
            this.pending = null;
            pending.reject(this.failure);
        }
    }
}

function checkFingerprint(socket: TLSSocket, expected: string): Error | null {
    const actual = normalizeFingerprint(socket.getPeerCertificate().fingerprint256);
    if (actual === normalizeFingerprint(expected)) {
        return null;
    }
    return new ConnectionError(
        `server certificate fingerprint '${actual}' does not match expected '${normalizeFingerprint(expected)}'`,
        { actual, expected }
    );
}
