/**
 * exasol-ws-client - Host Resolver
 *
 * Expands a host specification into the ordered list of candidates the
 * connector tries:
 *
 *   exasol1,exasol2     -> exasol1, exasol2
 *   exasol1..3          -> exasol1, exasol2, exasol3
 *   node08..10          -> node08, node09, node10
 *   10.0.0.11..13       -> 10.0.0.11, 10.0.0.12, 10.0.0.13
 *
 * Entries that only look like ranges (exasol1..exasol3) are kept as literal
 * host names.
 */

import { InvalidHostRangeError } from '../types/index.js';

const HOST_RANGE = /^(.+?)(\d+)\.\.(\d+)$/;

export function resolveHosts(spec: string): string[] {
    const hosts: string[] = [];
    for (const entry of spec.split(',')) {
        hosts.push(...resolveEntry(entry));
    }
    return hosts;
}

function resolveEntry(entry: string): string[] {
    const match = HOST_RANGE.exec(entry);
    if (match === null) {
        return [entry];
    }

    const [, prefix = '', low = '', high = ''] = match;
    const start = parseInt(low, 10);
    const stop = parseInt(high, 10);
    if (stop < start) {
        throw new InvalidHostRangeError(entry);
    }

    const hosts: string[] = [];
    for (let i = start; i <= stop; i++) {
        hosts.push(prefix + String(i).padStart(low.length, '0'));
    }
    return hosts;
}
