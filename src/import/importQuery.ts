/**
 * exasol-ws-client - Local Import Statements
 *
 * Recognizes IMPORT ... FROM LOCAL CSV statements and rewrites them so the
 * server pulls the data from the client's import listener instead.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { FileNotFoundError, InvalidImportQueryError } from '../types/index.js';

/** Resource name the rewritten statement asks the listener for */
export const IMPORT_RESOURCE = 'data.csv';

const IMPORT_QUERY = /^\s*IMPORT\b[\s\S]*?\bFROM\s+LOCAL\s+CSV\b/i;
const LOCAL_CSV = /\bLOCAL\s+CSV\b/i;
const FILE_CLAUSE = /\bFILE\s+(["'])(.*?)\1 ?/gi;
const ROW_SEPARATOR = /\bROW\s+SEPARATOR\s*=\s*(["'])(.*?)\1/i;

const ROW_SEPARATORS: Record<string, string> = {
    LF: '\n',
    CR: '\r',
    CRLF: '\r\n'
};

export function isImportQuery(query: string): boolean {
    return IMPORT_QUERY.test(query);
}

/**
 * Quoted paths following FILE keywords, in statement order
 */
export function getFilePaths(query: string): string[] {
    const paths = [...query.matchAll(FILE_CLAUSE)].map((match) => match[2] ?? '');
    if (paths.length === 0) {
        throw new InvalidImportQueryError(query);
    }
    return paths;
}

/**
 * Row separator declared by the statement. Unknown tokens fall back to LF
 * here and are left for the server to reject.
 */
export function getRowSeparator(query: string): string {
    const token = ROW_SEPARATOR.exec(query)?.[2]?.toUpperCase();
    return (token !== undefined ? ROW_SEPARATORS[token] : undefined) ?? '\n';
}

/**
 * Point the statement at http://host:port and collapse all FILE clauses into
 * a single FILE 'data.csv'. IPv6 hosts are written in brackets. Everything
 * else stays as written.
 */
export function updateImportQuery(query: string, host: string, port: number): string {
    let first = true;
    const withSingleFile = query.replace(FILE_CLAUSE, () => {
        if (first) {
            first = false;
            return `FILE '${IMPORT_RESOURCE}' `;
        }
        return '';
    });
    const address = host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
    return withSingleFile.replace(LOCAL_CSV, `CSV AT 'http://${address}:${String(port)}'`);
}

/**
 * Open a file for reading, mapping a missing file to FileNotFoundError
 */
export async function openFile(path: string): Promise<FileHandle> {
    try {
        return await open(path, 'r');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new FileNotFoundError(path);
        }
        throw error;
    }
}
