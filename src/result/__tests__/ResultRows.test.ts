/**
 * exasol-ws-client - Result Rows Tests
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeChannel, decimalColumn, ok, varcharColumn } from '../../__tests__/mocks/channel.js';
import { Session } from '../../transports/Session.js';
import { CellDecodeError, type ResultSetData } from '../../types/index.js';
import { ResultRows } from '../ResultRows.js';

vi.mock('../../utils/logger.js', () => ({
    logger: {
        forModule: () => ({
            debug: vi.fn(),
            info: vi.fn(),
            warning: vi.fn(),
            error: vi.fn()
        })
    }
}));

const SETTINGS = { fetchBytes: 1024 };

function resultSet(overrides: Partial<ResultSetData> = {}): ResultSetData {
    return {
        resultSetHandle: 11,
        numColumns: 2,
        numRows: 3,
        numRowsInMessage: 2,
        columns: [decimalColumn('ID'), varcharColumn('NAME')],
        data: [[1, 2], ['a', 'b']],
        ...overrides
    };
}

describe('ResultRows', () => {
    let channel: FakeChannel;
    let session: Session;

    beforeEach(() => {
        channel = new FakeChannel((request) =>
            request['command'] === 'fetch' ? ok({ numRows: 1, data: [[3], ['c']] }) : ok());
        session = new Session(channel);
    });

    it('should fetch further pages and release the cursor at the end', async () => {
        const rows = new ResultRows(session, resultSet(), SETTINGS);

        const objects = await rows.toObjects();

        expect(objects).toEqual([
            { ID: 1, NAME: 'a' },
            { ID: 2, NAME: 'b' },
            { ID: 3, NAME: 'c' }
        ]);
        expect(channel.requests).toEqual([
            { command: 'fetch', resultSetHandle: 11, startPosition: 2, numBytes: 1024 },
            { command: 'closeResultSet', resultSetHandles: [11] }
        ]);
        expect(rows.isClosed()).toBe(true);
    });

    it('should expose column metadata', () => {
        const rows = new ResultRows(session, resultSet(), SETTINGS);

        expect(rows.columnNames).toEqual(['ID', 'NAME']);
        expect(rows.numRows).toBe(3);
    });

    it('should read cells by position and name', async () => {
        const rows = new ResultRows(session, resultSet(), SETTINGS);

        const row = await rows.next();

        expect(row?.get(0)).toBe(1);
        expect(row?.get('NAME')).toBe('a');
        expect(row?.toArray()).toEqual([1, 'a']);
        expect(row?.length).toBe(2);
    });

    it('should reject unknown columns', async () => {
        const row = await new ResultRows(session, resultSet(), SETTINGS).next();

        expect(() => row?.get('MISSING')).toThrow('unknown column "MISSING"');
        expect(() => row?.get(5)).toThrow('unknown column 5');
    });

    it('should only fail the access that touches a bad cell', async () => {
        const rows = new ResultRows(session, resultSet({ numRows: 1, numRowsInMessage: 1, data: [['x'], ['a']] }), SETTINGS);

        const row = await rows.next();

        expect(() => row?.get('ID')).toThrow(CellDecodeError);
        expect(row?.get('NAME')).toBe('a');
        expect(row?.raw(0)).toBe('x');
    });

    it('should allow a single iteration', async () => {
        const rows = new ResultRows(session, resultSet({ numRows: 2 }), SETTINGS);
        const seen: unknown[] = [];

        for await (const row of rows) {
            seen.push(row.get('ID'));
        }

        expect(seen).toEqual([1, 2]);
        await expect(rows[Symbol.asyncIterator]().next()).rejects.toHaveProperty('code', 'RESULT_CONSUMED');
    });

    it('should release the cursor when iteration stops early', async () => {
        const rows = new ResultRows(session, resultSet(), SETTINGS);

        for await (const row of rows) {
            expect(row.get('ID')).toBe(1);
            break;
        }

        expect(channel.commands).toEqual(['closeResultSet']);
        await expect(rows.next()).resolves.toBeUndefined();
    });

    it('should close only once', async () => {
        const rows = new ResultRows(session, resultSet(), SETTINGS);

        await rows.close();
        await rows.close();

        expect(channel.commands).toEqual(['closeResultSet']);
    });

    it('should not send close for a result without handle', async () => {
        const rows = new ResultRows(session, resultSet({ resultSetHandle: undefined, numRows: 2 }), SETTINGS);

        await rows.toObjects();

        expect(channel.requests).toHaveLength(0);
    });

    it('should not send close on a closed session', async () => {
        const rows = new ResultRows(session, resultSet(), SETTINGS);
        await session.close();

        await rows.close();

        expect(channel.requests).toHaveLength(0);
        expect(rows.isClosed()).toBe(true);
    });

    it('should fail when more rows are announced than can be fetched', async () => {
        const rows = new ResultRows(session, resultSet({ resultSetHandle: undefined }), SETTINGS);

        await rows.next();
        await rows.next();

        await expect(rows.next()).rejects.toHaveProperty('code', 'MALFORMED_DATA');
    });

    it('should fail on an empty page', async () => {
        channel.respondWith(() => ok({ numRows: 0, data: [] }));
        const rows = new ResultRows(session, resultSet(), SETTINGS);

        await rows.next();
        await rows.next();

        await expect(rows.next()).rejects.toThrow('fetch at position 2 returned no rows');
    });
});
