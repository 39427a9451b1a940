/**
 * exasol-ws-client - Result Decoder
 *
 * A result entry is either a row count or a result set. The row-count shape
 * is tried first; anything that does not fit it must be a result set.
 */

import {
    MalformedResponseError,
    ResultSetResultSchema,
    RowCountResultSchema,
    type ExecuteResult,
    type ExecutionSettings,
    type ResultSetData,
    type SqlQueriesResponse
} from '../types/index.js';
import type { Session } from '../transports/Session.js';
import { ResultRows } from './ResultRows.js';

export type DecodedResult =
    | { kind: 'rowCount'; rowCount: number }
    | { kind: 'resultSet'; resultSet: ResultSetData };

export function decodeResult(raw: unknown): DecodedResult {
    const rowCount = RowCountResultSchema.safeParse(raw);
    if (rowCount.success) {
        return { kind: 'rowCount', rowCount: rowCount.data.rowCount };
    }

    const resultSet = ResultSetResultSchema.safeParse(raw);
    if (resultSet.success) {
        return { kind: 'resultSet', resultSet: resultSet.data.resultSet };
    }

    throw new MalformedResponseError(
        `result ${JSON.stringify(raw)} is neither a row count nor a result set`,
        { issues: resultSet.error.issues.map((issue) => issue.message) }
    );
}

/**
 * Turn the first result of an execute response into the caller-facing form
 */
export function toExecuteResult(
    response: SqlQueriesResponse,
    session: Session,
    settings: ExecutionSettings
): ExecuteResult {
    const [first] = response.results;
    if (response.numResults === 0 || first === undefined) {
        throw new MalformedResponseError('malformed result: response contains no results', {
            numResults: response.numResults
        }, 'MALFORMED_DATA');
    }

    const decoded = decodeResult(first);
    if (decoded.kind === 'rowCount') {
        return { kind: 'rowCount', rowsAffected: decoded.rowCount };
    }
    return { kind: 'resultSet', rows: new ResultRows(session, decoded.resultSet, settings) };
}
