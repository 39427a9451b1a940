/**
 * exasol-ws-client - Parameter Binding
 */

import {
    InvalidValuesCountError,
    NamedParametersNotSupportedError,
    type ColumnDescriptor,
    type SqlValue,
    type StatementParameters,
    type WireValue
} from '../types/index.js';

/**
 * Accept positional parameters only
 */
export function toPositionalValues(params: StatementParameters | undefined): readonly SqlValue[] {
    if (params === undefined) {
        return [];
    }
    if (isPositional(params)) {
        return params;
    }
    const names = Object.keys(params);
    if (names.length === 0) {
        return [];
    }
    throw new NamedParametersNotSupportedError(names);
}

function isPositional(params: StatementParameters): params is readonly SqlValue[] {
    return Array.isArray(params);
}

/**
 * Regroup a flat, row-major value list into one sequence per column.
 * Value i belongs to column i % columnCount; every group of columnCount
 * values is one row.
 */
export function toColumnMajor<T>(values: readonly T[], columnCount: number): T[][] {
    if (columnCount === 0) {
        if (values.length > 0) {
            throw new InvalidValuesCountError(values.length, columnCount);
        }
        return [];
    }
    if (values.length % columnCount !== 0) {
        throw new InvalidValuesCountError(values.length, columnCount);
    }

    const columns: T[][] = Array.from({ length: columnCount }, () => []);
    values.forEach((value, index) => {
        columns[index % columnCount]?.push(value);
    });
    return columns;
}

function pad(value: number, width = 2): string {
    return String(value).padStart(width, '0');
}

function formatDate(date: Date): string {
    return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

function formatTimestamp(date: Date): string {
    return `${formatDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:` +
        `${pad(date.getUTCSeconds())}.${pad(date.getUTCMilliseconds(), 3)}`;
}

/**
 * Convert a bound value to its JSON form. Dates are written in UTC, as a
 * plain date for DATE columns.
 */
export function toWireValue(value: SqlValue, column?: ColumnDescriptor): WireValue {
    if (value instanceof Date) {
        return column?.dataType.type === 'DATE' ? formatDate(value) : formatTimestamp(value);
    }
    if (typeof value === 'bigint') {
        return value.toString();
    }
    return value;
}
