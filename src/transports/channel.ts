/**
 * exasol-ws-client - Message Channel
 *
 * The session talks to the server through this interface; the WebSocket
 * implementation lives in websocket.ts and tests substitute an in-process fake.
 */

export type Frame =
    | { kind: 'text'; data: string }
    | { kind: 'binary'; data: Buffer };

export interface MessageChannel {
    /** Resolves once the frame has been handed to the socket */
    write(frame: Frame): Promise<void>;

    /** Resolves with the next frame received from the server */
    read(): Promise<Frame>;

    close(): Promise<void>;

    /** Local address of the underlying socket, when known */
    readonly localAddress?: string | undefined;
}

export interface ChannelOptions {
    host: string;
    port: number;
    encryption: boolean;
    validateServerCertificate: boolean;
    certificateFingerprint?: string | undefined;
    connectTimeout: number;
    /** Terminates the handshake when aborted */
    signal?: AbortSignal | undefined;
}

export type ChannelFactory = (options: ChannelOptions) => Promise<MessageChannel>;
