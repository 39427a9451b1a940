/**
 * exasol-ws-client - Result Decoder Tests
 */

import { describe, expect, it } from 'vitest';
import { FakeChannel, decimalColumn } from '../../__tests__/mocks/channel.js';
import { Session } from '../../transports/Session.js';
import { MalformedResponseError } from '../../types/index.js';
import { ResultRows } from '../ResultRows.js';
import { decodeResult, toExecuteResult } from '../decode.js';

const SETTINGS = { fetchBytes: 1024 };

describe('decodeResult', () => {
    it('should decode a row count', () => {
        expect(decodeResult({ resultType: 'rowCount', rowCount: 5 })).toEqual({ kind: 'rowCount', rowCount: 5 });
    });

    it('should decode a result set', () => {
        const resultSet = {
            numColumns: 1,
            numRows: 1,
            numRowsInMessage: 1,
            columns: [decimalColumn('ID')],
            data: [[1]]
        };
        expect(decodeResult({ resultType: 'resultSet', resultSet })).toEqual({ kind: 'resultSet', resultSet });
    });

    it('should reject anything else', () => {
        expect(() => decodeResult({ resultType: 'somethingElse' })).toThrow(MalformedResponseError);
        expect(() => decodeResult({ resultType: 'rowCount' })).toThrow(MalformedResponseError);
    });
});

describe('toExecuteResult', () => {
    const session = new Session(new FakeChannel());

    it('should use the first result', () => {
        const result = toExecuteResult({
            numResults: 2,
            results: [{ resultType: 'rowCount', rowCount: 3 }, { resultType: 'rowCount', rowCount: 9 }]
        }, session, SETTINGS);

        expect(result).toEqual({ kind: 'rowCount', rowsAffected: 3 });
    });

    it('should wrap a result set in rows', () => {
        const result = toExecuteResult({
            numResults: 1,
            results: [{
                resultType: 'resultSet',
                resultSet: { numColumns: 1, numRows: 0, numRowsInMessage: 0, columns: [decimalColumn('ID')] }
            }]
        }, session, SETTINGS);

        expect(result.kind).toBe('resultSet');
        expect(result.kind === 'resultSet' ? result.rows : undefined).toBeInstanceOf(ResultRows);
    });

    it('should reject a response without results', () => {
        expect(() => toExecuteResult({ numResults: 0, results: [] }, session, SETTINGS))
            .toThrow('malformed result: response contains no results');
    });
});
