/**
 * exasol-ws-client - Result Rows
 *
 * Forward-only view over a result set. The first page arrives with the
 * execute response; later pages are fetched from the server-side cursor when
 * the buffered rows run out. Data is column-major: data[column][row].
 */

import {
    FetchResponseSchema,
    MalformedResponseError,
    ValidationError,
    type ColumnDescriptor,
    type ExecutionSettings,
    type ResultSetData,
    type SqlValue
} from '../types/index.js';
import type { Session } from '../transports/Session.js';
import { logger } from '../utils/logger.js';
import { coerceValue } from './coerce.js';

const log = logger.forModule('RESULT');

/**
 * One row; cells are converted on access
 */
export class Row {
    constructor(
        private readonly columns: readonly ColumnDescriptor[],
        private readonly indexByName: ReadonlyMap<string, number>,
        private readonly cells: readonly unknown[]
    ) { }

    get length(): number {
        return this.columns.length;
    }

    /**
     * Value of a column by position or name
     */
    get(column: number | string): SqlValue {
        const index = typeof column === 'number' ? column : this.indexByName.get(column);
        const descriptor = index === undefined ? undefined : this.columns[index];
        if (index === undefined || descriptor === undefined) {
            throw new ValidationError(`unknown column ${JSON.stringify(column)}`, { column }, 'UNKNOWN_COLUMN');
        }
        const cell = this.cells[index];
        if (cell === undefined) {
            throw new MalformedResponseError(
                `missing value for column '${descriptor.name}'`,
                { column: descriptor.name },
                'MALFORMED_DATA'
            );
        }
        return coerceValue(cell, descriptor);
    }

    /** Wire value without conversion */
    raw(index: number): unknown {
        return this.cells[index];
    }

    toArray(): SqlValue[] {
        return this.columns.map((_, index) => this.get(index));
    }

    toObject(): Record<string, SqlValue> {
        const record: Record<string, SqlValue> = {};
        this.columns.forEach((column, index) => {
            record[column.name] = this.get(index);
        });
        return record;
    }
}

export class ResultRows implements AsyncIterable<Row> {
    readonly columns: readonly ColumnDescriptor[];
    /** Total rows of the result set, over all pages */
    readonly numRows: number;

    private readonly handle: number | undefined;
    private readonly indexByName: ReadonlyMap<string, number>;
    private page: unknown[][];
    private pageRows: number;
    private pagePosition = 0;
    private consumed = 0;
    private iterated = false;
    private closed = false;

    constructor(
        private readonly session: Session,
        resultSet: ResultSetData,
        private readonly settings: ExecutionSettings
    ) {
        this.columns = resultSet.columns;
        this.numRows = resultSet.numRows;
        this.handle = resultSet.resultSetHandle;
        this.page = resultSet.data ?? [];
        this.pageRows = resultSet.numRowsInMessage;
        this.indexByName = new Map(resultSet.columns.map((column, index) => [column.name, index]));
    }

    get columnNames(): string[] {
        return this.columns.map((column) => column.name);
    }

    isClosed(): boolean {
        return this.closed;
    }

    /**
     * Next row, or undefined once the result set is exhausted (which also
     * releases the server-side cursor)
     */
    async next(): Promise<Row | undefined> {
        if (this.closed) {
            return undefined;
        }
        if (this.consumed >= this.numRows) {
            await this.close();
            return undefined;
        }
        if (this.pagePosition >= this.pageRows) {
            await this.fetchPage();
        }

        const position = this.pagePosition;
        const cells = this.columns.map((_, column) => this.page[column]?.[position]);
        this.pagePosition++;
        this.consumed++;
        return new Row(this.columns, this.indexByName, cells);
    }

    async *[Symbol.asyncIterator](): AsyncIterator<Row> {
        if (this.iterated) {
            throw new ValidationError('result set can only be iterated once', undefined, 'RESULT_CONSUMED');
        }
        this.iterated = true;
        try {
            for (let row = await this.next(); row !== undefined; row = await this.next()) {
                yield row;
            }
        } finally {
            await this.close();
        }
    }

    /**
     * Read all remaining rows as objects keyed by column name
     */
    async toObjects(): Promise<Record<string, SqlValue>[]> {
        const rows: Record<string, SqlValue>[] = [];
        for await (const row of this) {
            rows.push(row.toObject());
        }
        return rows;
    }

    /**
     * Release the server-side cursor. Safe to call more than once.
     */
    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        if (this.handle === undefined || this.session.isClosed()) {
            return;
        }
        await this.session.send({ command: 'closeResultSet', resultSetHandles: [this.handle] });
        log.debug('Result set closed', { entityId: String(this.handle) });
    }

    private async fetchPage(): Promise<void> {
        if (this.handle === undefined) {
            throw new MalformedResponseError(
                `result set announces ${String(this.numRows)} rows but has no handle to fetch them`,
                { numRows: this.numRows, consumed: this.consumed },
                'MALFORMED_DATA'
            );
        }

        const page = await this.session.send({
            command: 'fetch',
            resultSetHandle: this.handle,
            startPosition: this.consumed,
            numBytes: this.settings.fetchBytes
        }, FetchResponseSchema);

        if (page.numRows === 0) {
            throw new MalformedResponseError(
                `fetch at position ${String(this.consumed)} returned no rows`,
                { resultSetHandle: this.handle },
                'MALFORMED_DATA'
            );
        }

        log.debug('Fetched rows', {
            entityId: String(this.handle),
            startPosition: this.consumed,
            numRows: page.numRows
        });
        this.page = page.data;
        this.pageRows = page.numRows;
        this.pagePosition = 0;
    }
}
