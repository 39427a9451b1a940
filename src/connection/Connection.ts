/**
 * exasol-ws-client - Connection
 *
 * Generic SQL interface over one protocol session. Statements without
 * parameters are executed directly; statements with parameters go through a
 * prepared statement that is closed again afterwards. IMPORT ... FROM LOCAL
 * CSV statements are routed through the local import bridge.
 */

import type { ConnectionConfig } from '../config/schema.js';
import { runImport } from '../import/LocalImportBridge.js';
import { isImportQuery } from '../import/importQuery.js';
import { toExecuteResult } from '../result/decode.js';
import type { ResultRows } from '../result/ResultRows.js';
import { PreparedStatement } from '../statement/PreparedStatement.js';
import { toPositionalValues } from '../statement/parameters.js';
import type { Session } from '../transports/Session.js';
import {
    CreatePreparedStatementResponseSchema,
    MalformedResponseError,
    SqlQueriesResponseSchema,
    ValidationError,
    type Attributes,
    type ExecuteResult,
    type ExecutionSettings,
    type LoginInfo,
    type RequestOptions,
    type StatementParameters
} from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('STATEMENT');

export class Connection {
    constructor(
        private readonly session: Session,
        readonly config: ConnectionConfig,
        private readonly info: LoginInfo,
        /** Candidate host the session was established with */
        readonly host: string
    ) { }

    isClosed(): boolean {
        return this.session.isClosed();
    }

    /**
     * Login response: session id, server versions and limits
     */
    getInfo(): LoginInfo {
        return { ...this.info };
    }

    private settings(): ExecutionSettings {
        return {
            resultSetMaxRows: this.config.resultSetMaxRows,
            fetchBytes: this.config.fetchSize * 1024
        };
    }

    private executeAttributes(): Attributes | undefined {
        return this.config.resultSetMaxRows !== undefined
            ? { resultSetMaxRows: this.config.resultSetMaxRows }
            : undefined;
    }

    /**
     * Execute a statement and return either its row count or its rows
     */
    async execute(sql: string, params?: StatementParameters, options: RequestOptions = {}): Promise<ExecuteResult> {
        const values = toPositionalValues(params);

        if (isImportQuery(sql)) {
            if (values.length > 0) {
                throw new ValidationError('local import statements take no parameters');
            }
            const response = await runImport(this.session, sql, {
                advertiseHost: this.config.importHost ?? this.session.localAddress ?? '127.0.0.1',
                bindHost: this.config.importHost !== undefined ? '0.0.0.0' : undefined,
                attributes: this.executeAttributes(),
                signal: options.signal
            });
            return toExecuteResult(response, this.session, this.settings());
        }

        if (values.length === 0) {
            return this.executeDirect(sql, options);
        }

        const statement = await this.prepare(sql);
        try {
            return await statement.execute(values, options);
        } finally {
            await this.closeStatement(statement);
        }
    }

    /**
     * Execute a statement that returns a result set
     */
    async query(sql: string, params?: StatementParameters, options: RequestOptions = {}): Promise<ResultRows> {
        const result = await this.execute(sql, params, options);
        if (result.kind !== 'resultSet') {
            throw new MalformedResponseError('statement did not return a result set', {
                rowsAffected: result.rowsAffected
            }, 'NOT_A_RESULT_SET');
        }
        return result.rows;
    }

    /**
     * Execute a statement and return the number of affected rows
     */
    async exec(sql: string, params?: StatementParameters, options: RequestOptions = {}): Promise<number> {
        const result = await this.execute(sql, params, options);
        if (result.kind === 'rowCount') {
            return result.rowsAffected;
        }
        await result.rows.close();
        return 0;
    }

    /**
     * Parse a statement on the server for repeated execution
     */
    async prepare(sql: string, options: RequestOptions = {}): Promise<PreparedStatement> {
        const response = await this.session.send({
            command: 'createPreparedStatement',
            sqlText: sql,
            ...this.withAttributes()
        }, CreatePreparedStatementResponseSchema, options);

        const columns = response.parameterData?.columns ?? [];
        log.debug('Prepared statement created', {
            entityId: String(response.statementHandle),
            numInput: columns.length
        });
        return new PreparedStatement(this.session, response.statementHandle, columns, this.settings());
    }

    async setAttributes(attributes: Attributes): Promise<void> {
        await this.session.send({ command: 'setAttributes', attributes });
    }

    async setAutocommit(enabled: boolean): Promise<void> {
        await this.setAttributes({ autocommit: enabled });
    }

    async setCurrentSchema(schema: string): Promise<void> {
        await this.setAttributes({ currentSchema: schema });
    }

    async commit(): Promise<void> {
        await this.executeDirect('COMMIT', {});
    }

    async rollback(): Promise<void> {
        await this.executeDirect('ROLLBACK', {});
    }

    /**
     * Send disconnect and close the socket. Safe to call more than once.
     */
    async close(): Promise<void> {
        if (this.session.isClosed()) {
            return;
        }
        try {
            await this.session.send({ command: 'disconnect' });
        } catch (error) {
            log.warning('Disconnect failed, closing socket anyway', {
                code: 'DISCONNECT_FAILED',
                error: error instanceof Error ? error.message : 'Unknown error'
            });
        } finally {
            await this.session.close();
        }
        log.info('Connection closed', { entityId: this.host });
    }

    /**
     * Close a statement prepared by execute(). A failure here is logged so that
     * the outcome of the execute reaches the caller.
     */
    private async closeStatement(statement: PreparedStatement): Promise<void> {
        if (this.session.isClosed()) {
            return;
        }
        try {
            await statement.close();
        } catch (error) {
            log.warning('Failed to close prepared statement', {
                code: 'CLOSE_STATEMENT_FAILED',
                entityId: String(statement.statementHandle),
                error: error instanceof Error ? error.message : 'Unknown error'
            });
        }
    }

    private withAttributes(): { attributes?: Attributes } {
        const attributes = this.executeAttributes();
        return attributes !== undefined ? { attributes } : {};
    }

    private async executeDirect(sql: string, options: RequestOptions): Promise<ExecuteResult> {
        const response = await this.session.send({
            command: 'execute',
            sqlText: sql,
            ...this.withAttributes()
        }, SqlQueriesResponseSchema, options);
        return toExecuteResult(response, this.session, this.settings());
    }
}
