/**
 * exasol-ws-client - CLI Program
 *
 * `exasol-ws query <sql> [params...]` connects, runs one statement and
 * prints the rows (JSON lines or tab-separated) or the affected row count.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { Connection } from '../connection/Connection.js';
import type { ConnectionConfigInput } from '../config/schema.js';
import type { SqlValue } from '../types/index.js';
import { LOG_LEVELS, logger, type LogLevel } from '../utils/logger.js';
import { VERSION } from '../version.js';

const log = logger.forModule('CLI');

export type OutputFormat = 'json' | 'tsv';

export interface CliIO {
    out: (line: string) => void;
    err: (line: string) => void;
    env: Record<string, string | undefined>;
}

export type Opener = (target: string | ConnectionConfigInput) => Promise<Connection>;

export interface QueryOptions {
    dsn?: string;
    host?: string;
    port?: number;
    user?: string;
    password?: string;
    accessToken?: string;
    schema?: string;
    compression?: boolean;
    encryption: boolean;
    validateCertificate: boolean;
    fingerprint?: string;
    maxRows?: number;
    format: OutputFormat;
    logLevel?: LogLevel;
}

function parseInteger(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new InvalidArgumentError('expected a non-negative integer');
    }
    return Number.parseInt(value, 10);
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function parseLogLevel(value: string): LogLevel {
    if (!isLogLevel(value)) {
        throw new InvalidArgumentError(`expected one of ${LOG_LEVELS.join(', ')}`);
    }
    return value;
}

/**
 * Build the connection target from flags, falling back to EXASOL_* variables
 */
export function buildTarget(options: QueryOptions, env: CliIO['env']): string | ConnectionConfigInput {
    const dsn = options.dsn ?? env['EXASOL_DSN'];
    if (dsn !== undefined && options.host === undefined) {
        return dsn;
    }

    const config: ConnectionConfigInput = {
        host: options.host ?? env['EXASOL_HOST'] ?? 'localhost',
        encryption: options.encryption,
        validateServerCertificate: options.validateCertificate
    };
    const user = options.user ?? env['EXASOL_USER'];
    const password = options.password ?? env['EXASOL_PASSWORD'];
    const accessToken = options.accessToken ?? env['EXASOL_ACCESS_TOKEN'];
    if (options.port !== undefined) config.port = options.port;
    if (user !== undefined) config.user = user;
    if (password !== undefined) config.password = password;
    if (accessToken !== undefined) config.accessToken = accessToken;
    if (options.schema !== undefined) config.schema = options.schema;
    if (options.compression !== undefined) config.compression = options.compression;
    if (options.fingerprint !== undefined) config.certificateFingerprint = options.fingerprint;
    if (options.maxRows !== undefined) config.resultSetMaxRows = options.maxRows;
    return config;
}

function toJsonValue(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}

function toCell(value: SqlValue): string {
    if (value === null) {
        return 'NULL';
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    return String(value);
}

async function runQuery(
    io: CliIO,
    openConnection: Opener,
    sql: string,
    params: string[],
    options: QueryOptions
): Promise<void> {
    const connection = await openConnection(buildTarget(options, io.env));
    try {
        const result = await connection.execute(sql, params.length > 0 ? params : undefined);
        if (result.kind === 'rowCount') {
            io.out(`${String(result.rowsAffected)} rows affected`);
            return;
        }

        if (options.format === 'tsv') {
            io.out(result.rows.columnNames.join('\t'));
        }
        for await (const row of result.rows) {
            io.out(options.format === 'tsv'
                ? row.toArray().map(toCell).join('\t')
                : JSON.stringify(row.toObject(), toJsonValue));
        }
    } finally {
        await connection.close();
    }
}

/**
 * Create the commander program. Output goes through io so that tests can
 * capture it.
 */
export function createProgram(io: CliIO, openConnection: Opener): Command {
    const program = new Command();

    program
        .name('exasol-ws')
        .description('Run SQL against an Exasol database over WebSocket')
        .version(VERSION)
        .exitOverride()
        .configureOutput({
            writeOut: (text) => io.out(text.trimEnd()),
            writeErr: (text) => io.err(text.trimEnd())
        });

    program
        .command('query')
        .description('Execute one statement and print its result')
        .argument('<sql>', 'SQL statement, ? marks positional parameters')
        .argument('[params...]', 'Parameter values')
        // Connection options
        .option('--dsn <dsn>', 'Connection string exa:host:port;key=value (env: EXASOL_DSN)')
        .option('--host <host>', 'Host list, ranges such as exasol1..3 allowed (env: EXASOL_HOST)')
        .option('--port <port>', 'Port (default: 8563)', parseInteger)
        .option('--user <user>', 'Database user (env: EXASOL_USER)')
        .option('--password <password>', 'Password (env: EXASOL_PASSWORD)')
        .option('--access-token <token>', 'OpenID access token (env: EXASOL_ACCESS_TOKEN)')
        .option('--schema <schema>', 'Schema to open')
        .option('--compression', 'Compress messages after login')
        .option('--no-encryption', 'Use ws:// instead of wss://')
        .option('--no-validate-certificate', 'Skip TLS certificate validation')
        .option('--fingerprint <sha256>', 'Pin the server certificate by SHA-256 fingerprint')
        .option('--max-rows <n>', 'Limit the rows of the result set', parseInteger)
        // Output options
        .addOption(new Option('--format <format>', 'Output format').choices(['json', 'tsv']).default('json'))
        .option('--log-level <level>', `Log level: ${LOG_LEVELS.join(', ')} (default: warning)`, parseLogLevel)
        .action(async (sql: string, params: string[], options: QueryOptions) => {
            const logLevel = options.logLevel ?? io.env['LOG_LEVEL'];
            if (logLevel !== undefined && isLogLevel(logLevel)) {
                logger.setLevel(logLevel);
            }
            log.debug('Running query', { operation: 'query', params: params.length });
            await runQuery(io, openConnection, sql, params, options);
        });

    return program;
}
