/**
 * exasol-ws-client - DSN Parser Tests
 */

import { describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../../types/index.js';
import { parseDsn, splitDsn } from '../dsn.js';

vi.mock('../../utils/logger.js', () => ({
    logger: {
        forModule: () => ({
            debug: vi.fn()
        })
    }
}));

describe('splitDsn', () => {
    it('should split on semicolons', () => {
        expect(splitDsn('exasol:8563;user=sys;password=x')).toEqual(['exasol:8563', 'user=sys', 'password=x']);
    });

    it('should keep escaped semicolons', () => {
        expect(splitDsn('host;password=a\\;b')).toEqual(['host', 'password=a;b']);
    });
});

describe('parseDsn', () => {
    it('should read host, port and credentials', () => {
        const config = parseDsn('exa:exasol1..3:8564;user=sys;password=test-secret');

        expect(config.host).toBe('exasol1..3');
        expect(config.port).toBe(8564);
        expect(config.user).toBe('sys');
        expect(config.password).toBe('test-secret');
    });

    it('should default the port', () => {
        expect(parseDsn('exa:exasol;user=sys;password=test-secret').port).toBe(8563);
    });

    it('should read keys case-insensitively', () => {
        const config = parseDsn(
            'exa:exasol:8563;User=sys;Password=test-secret;Schema=RETAIL;Autocommit=0;' +
            'Compression=true;ValidateServerCertificate=0;FetchSize=64;ResultSetMaxRows=500'
        );

        expect(config).toMatchObject({
            schema: 'RETAIL',
            autocommit: false,
            compression: true,
            validateServerCertificate: false,
            fetchSize: 64,
            resultSetMaxRows: 500
        });
    });

    it('should read token credentials', () => {
        expect(parseDsn('exa:exasol:8563;accesstoken=test-token').accessToken).toBe('test-token');
    });

    it('should keep an escaped semicolon in a value', () => {
        expect(parseDsn('exa:exasol:8563;user=sys;password=a\\;b').password).toBe('a;b');
    });

    it('should reject a missing prefix', () => {
        expect(() => parseDsn('exasol:8563;user=sys;password=x')).toThrow("invalid DSN: expected prefix 'exa:'");
    });

    it('should reject unknown parameters', () => {
        expect(() => parseDsn('exa:exasol:8563;user=sys;password=x;colour=blue'))
            .toThrow("unknown DSN parameter 'colour'");
    });

    it('should reject a parameter without value', () => {
        expect(() => parseDsn('exa:exasol:8563;user')).toThrow("invalid DSN parameter 'user': expected key=value");
    });

    it('should reject an invalid boolean', () => {
        expect(() => parseDsn('exa:exasol:8563;user=sys;password=x;compression=yes'))
            .toThrow("invalid boolean value 'yes' for DSN parameter 'compression'");
    });

    it('should reject an invalid port', () => {
        expect(() => parseDsn('exa:exasol:abc;user=sys;password=x')).toThrow(ValidationError);
    });
});
