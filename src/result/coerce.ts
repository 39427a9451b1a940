/**
 * exasol-ws-client - Cell Coercion
 *
 * Converts a cell from its JSON representation to the JavaScript value for
 * the column's declared type. Conversion happens when the cell is read, so a
 * bad cell only fails the access that touches it.
 */

import { CellDecodeError, type ColumnDescriptor, type SqlValue } from '../types/index.js';

const INTEGER = /^-?\d+$/;
const NUMERIC = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?)?$/;

const TEXT_TYPES = new Set([
    'CHAR',
    'VARCHAR',
    'HASHTYPE',
    'GEOMETRY',
    'INTERVAL YEAR TO MONTH',
    'INTERVAL DAY TO SECOND'
]);

export function coerceValue(value: unknown, column: ColumnDescriptor): SqlValue {
    if (value === null) {
        return null;
    }

    const { type } = column.dataType;
    const fail = (): never => {
        throw new CellDecodeError(column.name, type, value);
    };

    switch (type) {
        case 'BOOLEAN':
            return toBoolean(value) ?? fail();
        case 'DECIMAL':
            return (column.dataType.scale ?? 0) === 0
                ? toInteger(value) ?? fail()
                : toNumber(value) ?? fail();
        case 'DOUBLE':
            return toNumber(value) ?? fail();
        case 'DATE':
        case 'TIMESTAMP':
        case 'TIMESTAMP WITH LOCAL TIME ZONE':
            return toDate(value) ?? fail();
        default:
            if (TEXT_TYPES.has(type)) {
                return typeof value === 'string' ? value : fail();
            }
            // types this driver does not know pass through as sent
            if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
                return value;
            }
            return fail();
    }
}

function toBoolean(value: unknown): boolean | undefined {
    if (typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'string') {
        const lower = value.toLowerCase();
        if (lower === 'true') return true;
        if (lower === 'false') return false;
    }
    return undefined;
}

function toInteger(value: unknown): number | bigint | undefined {
    if (typeof value === 'number') {
        return Number.isInteger(value) ? value : undefined;
    }
    if (typeof value === 'string' && INTEGER.test(value)) {
        const asNumber = Number(value);
        return Number.isSafeInteger(asNumber) ? asNumber : BigInt(value);
    }
    return undefined;
}

function toNumber(value: unknown): number | undefined {
    if (typeof value === 'number') {
        return value;
    }
    if (typeof value === 'string') {
        if (NUMERIC.test(value)) return Number(value);
        if (value === 'Infinity') return Infinity;
        if (value === '-Infinity') return -Infinity;
        if (value === 'NaN') return NaN;
    }
    return undefined;
}

/**
 * Dates and timestamps are read as UTC
 */
function toDate(value: unknown): Date | undefined {
    if (typeof value !== 'string') {
        return undefined;
    }
    const match = TIMESTAMP.exec(value);
    if (match === null) {
        return undefined;
    }
    const [, year = '', month = '', day = '', hour = '0', minute = '0', second = '0', fraction = ''] = match;
    const millis = parseInt(fraction.padEnd(3, '0').slice(0, 3), 10);
    const date = new Date(Date.UTC(
        parseInt(year, 10),
        parseInt(month, 10) - 1,
        parseInt(day, 10),
        parseInt(hour, 10),
        parseInt(minute, 10),
        parseInt(second, 10),
        millis
    ));
    return Number.isNaN(date.getTime()) ? undefined : date;
}
