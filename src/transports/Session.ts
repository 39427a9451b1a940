/**
 * exasol-ws-client - Protocol Session
 *
 * One JSON request, one JSON reply. Requests are queued so that at most one
 * is in flight. Any transport failure closes the session for good; server
 * exceptions and shape mismatches only fail the request at hand.
 */

import { promisify } from 'node:util';
import { deflate, inflate } from 'node:zlib';
import type { z } from 'zod';
import {
    BadConnectionError,
    MalformedResponseError,
    RequestCancelledError,
    ResponseEnvelopeSchema,
    ServerError,
    type ProtocolRequest
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { Frame, MessageChannel } from './channel.js';

const log = logger.forModule('TRANSPORT');

const deflateAsync = promisify(deflate);
const inflateAsync = promisify(inflate);

export interface SendOptions {
    signal?: AbortSignal | undefined;
}

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function commandName(request: ProtocolRequest): string {
    return 'command' in request ? request.command : 'auth';
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

export class Session {
    private channel: MessageChannel | null;
    private compression: boolean;
    private queue: Promise<unknown> = Promise.resolve();

    constructor(channel: MessageChannel | null, options: { compression?: boolean } = {}) {
        this.channel = channel;
        this.compression = options.compression ?? false;
    }

    isClosed(): boolean {
        return this.channel === null;
    }

    isCompressed(): boolean {
        return this.compression;
    }

    /**
     * Switch payload compression. The login exchange always runs uncompressed.
     */
    setCompression(enabled: boolean): void {
        this.compression = enabled;
    }

    get localAddress(): string | undefined {
        return this.channel?.localAddress;
    }

    /**
     * Send a request and decode the reply's responseData with the schema.
     * Without a schema the payload is discarded.
     */
    send(request: ProtocolRequest, schema?: undefined, options?: SendOptions): Promise<undefined>;
    send<T>(request: ProtocolRequest, schema: ResponseSchema<T>, options?: SendOptions): Promise<T>;
    send<T>(request: ProtocolRequest, schema?: ResponseSchema<T>, options: SendOptions = {}): Promise<T | undefined> {
        const next = this.queue.then(() => this.exchange(request, schema, options));
        this.queue = next.catch(() => undefined);
        return next;
    }

    /**
     * Close the underlying channel. Safe to call more than once.
     */
    async close(): Promise<void> {
        const channel = this.channel;
        this.channel = null;
        if (channel === null) {
            return;
        }
        try {
            await channel.close();
        } catch (error) {
            log.debug('Error while closing channel', {
                error: error instanceof Error ? error.message : 'Unknown error'
            });
        }
    }

    private async exchange<T>(
        request: ProtocolRequest,
        schema: ResponseSchema<T> | undefined,
        options: SendOptions
    ): Promise<T | undefined> {
        const name = commandName(request);
        const channel = this.channel;
        if (channel === null) {
            throw new BadConnectionError(
                `could not send '${name}' request: not connected to server`,
                { command: name }
            );
        }
        if (options.signal?.aborted) {
            throw new RequestCancelledError({ command: name });
        }

        let reply: unknown;
        try {
            reply = await this.whileNotAborted(this.roundTrip(channel, JSON.stringify(request)), options.signal);
        } catch (error) {
            await this.close();
            if (error instanceof RequestCancelledError) {
                log.warning('Request cancelled, session closed', { code: 'REQUEST_CANCELLED', command: name });
                throw error;
            }
            const message = error instanceof Error ? error.message : 'Unknown error';
            log.error('Transport failure, session closed', { code: 'BAD_CONNECTION', command: name, error: message });
            throw new BadConnectionError(undefined, { command: name, cause: message });
        }

        return this.decode(reply, schema);
    }

    private async roundTrip(channel: MessageChannel, payload: string): Promise<unknown> {
        const compressed = this.compression;
        const frame: Frame = compressed
            ? { kind: 'binary', data: await deflateAsync(Buffer.from(payload, 'utf8')) }
            : { kind: 'text', data: payload };

        await channel.write(frame);
        const reply = await channel.read();

        let text: string;
        if (compressed) {
            const bytes = reply.kind === 'binary' ? reply.data : Buffer.from(reply.data, 'utf8');
            text = (await inflateAsync(bytes)).toString('utf8');
        } else {
            text = reply.kind === 'text' ? reply.data : reply.data.toString('utf8');
        }
        const parsed: unknown = JSON.parse(text);
        return parsed;
    }

    private whileNotAborted<T>(operation: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
        if (signal === undefined) {
            return operation;
        }
        return new Promise<T>((resolve, reject) => {
            const onAbort = (): void => {
                reject(new RequestCancelledError());
            };
            signal.addEventListener('abort', onAbort, { once: true });
            operation.then(
                (value) => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(value);
                },
                (error: unknown) => {
                    signal.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );
        });
    }

    private decode<T>(reply: unknown, schema: ResponseSchema<T> | undefined): T | undefined {
        const envelope = ResponseEnvelopeSchema.safeParse(reply);
        if (!envelope.success) {
            throw new MalformedResponseError(
                `invalid response envelope ${JSON.stringify(reply)}: ${describeIssues(envelope.error)}`
            );
        }

        const { status, responseData, exception } = envelope.data;
        if (status !== 'ok') {
            if (exception !== undefined) {
                throw new ServerError(exception.sqlCode ?? '', exception.text);
            }
            throw new MalformedResponseError(
                `result status is not 'ok': "${status}", expected exception in response ${JSON.stringify(reply)}`,
                { status }
            );
        }

        if (schema === undefined) {
            return undefined;
        }

        const parsed = schema.safeParse(responseData);
        if (!parsed.success) {
            const shape = schema.description ?? 'response data';
            throw new MalformedResponseError(
                `failed to parse response data ${String(JSON.stringify(responseData))} as ${shape}: ${describeIssues(parsed.error)}`,
                { expected: shape }
            );
        }
        return parsed.data;
    }
}
