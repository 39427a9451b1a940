/**
 * exasol-ws-client - Prepared Statement
 *
 * Wraps a server-side statement handle. The handle borrows the connection's
 * session and is only valid while that session is open; close() must be
 * called once to free it on the server.
 */

import {
    BadConnectionError,
    MalformedResponseError,
    SqlQueriesResponseSchema,
    StatementClosedError,
    type Attributes,
    type ColumnDescriptor,
    type ExecuteResult,
    type ExecutionSettings,
    type RequestOptions,
    type StatementParameters
} from '../types/index.js';
import type { Session } from '../transports/Session.js';
import { toExecuteResult } from '../result/decode.js';
import type { ResultRows } from '../result/ResultRows.js';
import { logger } from '../utils/logger.js';
import { toColumnMajor, toPositionalValues, toWireValue } from './parameters.js';

const log = logger.forModule('STATEMENT');

export class PreparedStatement {
    private closed = false;

    constructor(
        private readonly session: Session,
        readonly statementHandle: number,
        readonly columns: readonly ColumnDescriptor[],
        private readonly settings: ExecutionSettings
    ) { }

    /**
     * Number of parameters per row
     */
    get numInput(): number {
        return this.columns.length;
    }

    isClosed(): boolean {
        return this.closed;
    }

    /**
     * Execute with a flat list of values. A list of k * numInput values
     * executes k rows in one request.
     */
    async execute(params?: StatementParameters, options: RequestOptions = {}): Promise<ExecuteResult> {
        if (this.closed) {
            throw new StatementClosedError(this.statementHandle);
        }

        const values = toPositionalValues(params);
        const data = toColumnMajor(values, this.columns.length).map(
            (columnValues, index) => columnValues.map((value) => toWireValue(value, this.columns[index]))
        );

        const attributes: Attributes = {};
        if (this.settings.resultSetMaxRows !== undefined) {
            attributes.resultSetMaxRows = this.settings.resultSetMaxRows;
        }

        const response = await this.session.send({
            command: 'executePreparedStatement',
            statementHandle: this.statementHandle,
            numColumns: this.columns.length,
            numRows: data[0]?.length ?? 0,
            columns: [...this.columns],
            data,
            attributes
        }, SqlQueriesResponseSchema, options);

        if (response.numResults === 0) {
            throw new MalformedResponseError('malformed result: response contains no results', {
                statementHandle: this.statementHandle
            }, 'MALFORMED_DATA');
        }

        log.debug('Prepared statement executed', {
            entityId: String(this.statementHandle),
            numRows: data[0]?.length ?? 0
        });
        return toExecuteResult(response, this.session, this.settings);
    }

    /**
     * Execute and return the result set
     */
    async query(params?: StatementParameters, options: RequestOptions = {}): Promise<ResultRows> {
        const result = await this.execute(params, options);
        if (result.kind !== 'resultSet') {
            throw new MalformedResponseError('statement did not return a result set', {
                statementHandle: this.statementHandle
            }, 'NOT_A_RESULT_SET');
        }
        return result.rows;
    }

    /**
     * Execute and return the number of affected rows
     */
    async exec(params?: StatementParameters, options: RequestOptions = {}): Promise<number> {
        const result = await this.execute(params, options);
        if (result.kind === 'rowCount') {
            return result.rowsAffected;
        }
        await result.rows.close();
        return 0;
    }

    /**
     * Free the server-side handle. Closing twice is a no-op.
     */
    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        if (this.session.isClosed()) {
            throw new BadConnectionError(
                `could not close prepared statement ${String(this.statementHandle)}: not connected to server`,
                { statementHandle: this.statementHandle }
            );
        }
        await this.session.send({
            command: 'closePreparedStatement',
            statementHandle: this.statementHandle
        });
        this.closed = true;
        log.debug('Prepared statement closed', { entityId: String(this.statementHandle) });
    }
}
