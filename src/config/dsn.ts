/**
 * exasol-ws-client - DSN Parser
 *
 * Format: exa:<host>[:<port>][;<key>=<value>]...
 * Keys are case-insensitive, booleans are 0/1 (or true/false) and a literal
 * semicolon inside a value is written as \;
 */

import { ValidationError } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { parseConfig, type ConnectionConfig, type ConnectionConfigInput } from './schema.js';

const log = logger.forModule('CONFIG');

const DSN_PREFIX = 'exa:';

type Assign = (target: ConnectionConfigInput, value: string, key: string) => void;

const stringKey = (field: 'user' | 'password' | 'accessToken' | 'refreshToken' | 'schema' |
    'certificateFingerprint' | 'clientName' | 'clientVersion' | 'importHost'): Assign =>
    (target, value) => { target[field] = value; };

const booleanKey = (field: 'autocommit' | 'encryption' | 'validateServerCertificate' | 'compression'): Assign =>
    (target, value, key) => { target[field] = parseBoolean(value, key); };

const integerKey = (field: 'resultSetMaxRows' | 'fetchSize' | 'queryTimeout' | 'connectTimeout'): Assign =>
    (target, value, key) => { target[field] = parseInteger(value, key); };

const PARAMETERS: Record<string, Assign> = {
    user: stringKey('user'),
    password: stringKey('password'),
    accesstoken: stringKey('accessToken'),
    refreshtoken: stringKey('refreshToken'),
    schema: stringKey('schema'),
    certificatefingerprint: stringKey('certificateFingerprint'),
    clientname: stringKey('clientName'),
    clientversion: stringKey('clientVersion'),
    importhost: stringKey('importHost'),
    autocommit: booleanKey('autocommit'),
    encryption: booleanKey('encryption'),
    validateservercertificate: booleanKey('validateServerCertificate'),
    compression: booleanKey('compression'),
    resultsetmaxrows: integerKey('resultSetMaxRows'),
    fetchsize: integerKey('fetchSize'),
    querytimeout: integerKey('queryTimeout'),
    connecttimeout: integerKey('connectTimeout')
};

function parseBoolean(value: string, key: string): boolean {
    switch (value.toLowerCase()) {
        case '1':
        case 'true':
            return true;
        case '0':
        case 'false':
            return false;
        default:
            throw new ValidationError(`invalid boolean value '${value}' for DSN parameter '${key}'`, { key });
    }
}

function parseInteger(value: string, key: string): number {
    if (!/^\d+$/.test(value)) {
        throw new ValidationError(`invalid integer value '${value}' for DSN parameter '${key}'`, { key });
    }
    return parseInt(value, 10);
}

/**
 * Split on semicolons that are not escaped with a backslash
 */
export function splitDsn(dsn: string): string[] {
    const parts: string[] = [];
    let current = '';
    for (let i = 0; i < dsn.length; i++) {
        const char = dsn[i];
        if (char === '\\' && dsn[i + 1] === ';') {
            current += ';';
            i++;
        } else if (char === ';') {
            parts.push(current);
            current = '';
        } else {
            current += char;
        }
    }
    parts.push(current);
    return parts;
}

/**
 * Parse a DSN into a validated configuration
 */
export function parseDsn(dsn: string): ConnectionConfig {
    if (!dsn.startsWith(DSN_PREFIX)) {
        throw new ValidationError(`invalid DSN: expected prefix '${DSN_PREFIX}'`);
    }

    const [address = '', ...settings] = splitDsn(dsn.slice(DSN_PREFIX.length));
    const portSeparator = address.lastIndexOf(':');
    const input: ConnectionConfigInput = { host: address };

    if (portSeparator !== -1) {
        input.host = address.slice(0, portSeparator);
        input.port = parseInteger(address.slice(portSeparator + 1), 'port');
    }

    for (const setting of settings) {
        if (setting.trim() === '') {
            continue;
        }
        const separator = setting.indexOf('=');
        if (separator === -1) {
            throw new ValidationError(`invalid DSN parameter '${setting}': expected key=value`);
        }
        const key = setting.slice(0, separator).trim();
        const assign = PARAMETERS[key.toLowerCase()];
        if (assign === undefined) {
            throw new ValidationError(`unknown DSN parameter '${key}'`, { key });
        }
        assign(input, setting.slice(separator + 1), key);
    }

    const config = parseConfig(input);
    log.debug('Parsed DSN', { host: config.host, port: config.port, user: config.user });
    return config;
}
