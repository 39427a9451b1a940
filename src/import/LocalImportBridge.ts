/**
 * exasol-ws-client - Local Import Bridge
 *
 * Serves local CSV files to the database over a short-lived HTTP listener.
 * The listener is bound before the rewritten IMPORT is sent and closed once
 * the execute call has returned or failed.
 */

import { once } from 'node:events';
import type { FileHandle } from 'node:fs/promises';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { createInterface } from 'node:readline';
import {
    InvalidImportQueryError,
    SqlQueriesResponseSchema,
    type Attributes,
    type RequestOptions,
    type SqlQueriesResponse
} from '../types/index.js';
import type { Session } from '../transports/Session.js';
import { logger } from '../utils/logger.js';
import {
    IMPORT_RESOURCE,
    getFilePaths,
    getRowSeparator,
    isImportQuery,
    openFile,
    updateImportQuery
} from './importQuery.js';

const log = logger.forModule('IMPORT');

export interface ImportOptions extends RequestOptions {
    /** Address the server connects back to */
    advertiseHost: string;

    /** Interface the listener binds to (default: advertiseHost) */
    bindHost?: string | undefined;

    attributes?: Attributes | undefined;
}

interface ImportSource {
    files: readonly { path: string; handle: FileHandle }[];
    rowSeparator: string;
}

/**
 * HTTP listener answering GET / and GET /data.csv with the concatenated files
 */
export class ImportListener {
    private requestCount = 0;

    private constructor(
        private readonly server: Server,
        readonly host: string,
        readonly port: number
    ) { }

    static async start(source: ImportSource, host: string): Promise<ImportListener> {
        const server = createServer();
        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(0, host, () => {
                server.off('error', reject);
                resolve();
            });
        });

        const address = server.address();
        if (address === null || typeof address === 'string') {
            server.close();
            throw new Error('import listener has no TCP address');
        }

        const listener = new ImportListener(server, host, address.port);
        server.on('request', (req: IncomingMessage, res: ServerResponse) => {
            listener.serve(source, req, res).catch((error: unknown) => {
                const message = error instanceof Error ? error.message : 'Unknown error';
                log.error('Failed to serve import data', { code: 'IMPORT_SERVE_FAILED', error: message });
                res.destroy(error instanceof Error ? error : undefined);
            });
        });
        log.debug('Import listener started', { host, port: address.port });
        return listener;
    }

    /** Requests served so far */
    get requests(): number {
        return this.requestCount;
    }

    async close(): Promise<void> {
        await new Promise<void>((resolve, reject) => {
            this.server.close((error?: Error) => {
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            });
            this.server.closeAllConnections();
        });
        log.debug('Import listener closed', { port: this.port, requests: this.requestCount });
    }

    private async serve(source: ImportSource, req: IncomingMessage, res: ServerResponse): Promise<void> {
        const path = (req.url ?? '/').split('?')[0];
        if (req.method !== 'GET' || (path !== '/' && path !== `/${IMPORT_RESOURCE}`)) {
            res.writeHead(404, { 'Content-Type': 'text/plain' });
            res.end('Not Found');
            return;
        }

        this.requestCount++;
        res.writeHead(200, { 'Content-Type': 'text/csv' });
        // latin1 maps each byte to one char, so the file bytes pass through unchanged
        for (const file of source.files) {
            const lines = createInterface({
                input: file.handle.createReadStream({ start: 0, autoClose: false, encoding: 'latin1' }),
                crlfDelay: Infinity
            });
            for await (const line of lines) {
                if (!res.write(line + source.rowSeparator, 'latin1')) {
                    await once(res, 'drain');
                }
            }
        }
        res.end();
    }
}

/**
 * Execute an IMPORT ... FROM LOCAL CSV statement
 */
export async function runImport(
    session: Session,
    query: string,
    options: ImportOptions
): Promise<SqlQueriesResponse> {
    if (!isImportQuery(query)) {
        throw new InvalidImportQueryError(query);
    }
    const paths = getFilePaths(query);

    const files: { path: string; handle: FileHandle }[] = [];
    try {
        for (const path of paths) {
            files.push({ path, handle: await openFile(path) });
        }

        const listener = await ImportListener.start(
            { files, rowSeparator: getRowSeparator(query) },
            options.bindHost ?? options.advertiseHost
        );
        try {
            const rewritten = updateImportQuery(query, options.advertiseHost, listener.port);
            log.info('Running local import', { files: paths, port: listener.port });
            return await session.send({
                command: 'execute',
                sqlText: rewritten,
                ...(options.attributes !== undefined ? { attributes: options.attributes } : {})
            }, SqlQueriesResponseSchema, { signal: options.signal });
        } finally {
            await listener.close();
        }
    } finally {
        await Promise.all(files.map((file) => file.handle.close()));
    }
}
