/**
 * Unit tests for the structured logger
 * 
 * Tests RFC 5424 severity levels, message sanitization (log injection prevention),
 * and context sanitization (credential redaction).
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger } from '../logger.js';
import type { LogContext } from '../logger.js';

describe('Logger', () => {
    let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

    beforeEach(() => {
        consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
        logger.setLevel('debug'); // Enable all levels for testing
    });

    afterEach(() => {
        consoleErrorSpy.mockRestore();
        logger.setLevel('warning'); // Reset to default
    });

    describe('RFC 5424 Severity Levels', () => {
        it('should log at every level when set to debug', () => {
            logger.debug('debug message');
            logger.info('info message');
            logger.warning('warning message');
            logger.error('error message');

            expect(consoleErrorSpy).toHaveBeenCalledTimes(4);
        });

        it('should filter messages below minimum level', () => {
            logger.setLevel('error');

            logger.debug('debug message');
            logger.info('info message');
            logger.warning('warning message');
            logger.error('error message'); // Should log

            expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
        });

        it('should respect RFC 5424 priority ordering (lower number = higher severity)', () => {
            logger.setLevel('warning');

            // These are below warning severity (higher number = lower priority)
            logger.debug('debug');
            logger.info('info');
            expect(consoleErrorSpy).toHaveBeenCalledTimes(0);

            // These are at or above warning severity
            logger.warning('warning');
            logger.error('error');
            expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
        });

        it('should include level in uppercase in formatted output', () => {
            logger.error('test message');

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toContain('[ERROR]');
        });
    });

    describe('Message Sanitization (Log Injection Prevention)', () => {
        it('should strip null bytes from messages', () => {
            logger.info('message\x00with\x00nulls');

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).not.toContain('\x00');
            expect(output).toContain('messagewithnulls');
        });

        it('should strip bell and backspace characters', () => {
            logger.info('message\x07bell\x08backspace');

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).not.toContain('\x07');
            expect(output).not.toContain('\x08');
        });

        it('should strip form feed and vertical tab', () => {
            logger.info('message\x0Bvtab\x0Cformfeed');

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).not.toContain('\x0B');
            expect(output).not.toContain('\x0C');
        });

        it('should strip DEL character (0x7F)', () => {
            logger.info('message\x7Fwith\x7Fdel');

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).not.toContain('\x7F');
        });

        it('should strip C1 control characters (0x80-0x9F)', () => {
            logger.info('message\x80\x9Fcontrol');

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).not.toContain('\x80');
            expect(output).not.toContain('\x9F');
        });

        it('should preserve tabs, newlines, and carriage returns', () => {
            logger.info('line1\nline2\ttabbed\r\nwindows');

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toContain('\n');
            expect(output).toContain('\t');
        });

        it('should prevent log forgery via control character injection', () => {
            // Attacker tries to inject escape sequences to manipulate terminal
            logger.info('user input\x00\x1B[2Kwith control chars');

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            // Null bytes and escape sequence prefix should be stripped
            expect(output).toContain('[INFO]');
            expect(output).not.toContain('\x00');
            expect(output).not.toContain('\x1B'); // ESC character stripped
            // The printable part of the message remains
            expect(output).toContain('user input');
        });
    });

    describe('Context Sanitization (Credential Redaction)', () => {
        it('should redact password fields', () => {
            logger.info('test', { password: 'secret123' });

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toContain('[REDACTED]');
            expect(output).not.toContain('secret123');
        });

        it('should redact token fields', () => {
            logger.info('test', { token: 'jwt.token.here', accessToken: 'bearer_abc' });

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toContain('[REDACTED]');
            expect(output).not.toContain('jwt.token.here');
            expect(output).not.toContain('bearer_abc');
        });

        it('should redact login credentials', () => {
            const context: LogContext = {
                username: 'sys',
                refreshToken: 'test-refresh',
                client_secret: 'test-secret'
            };
            logger.info('login', context);

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toContain('"username":"sys"');
            expect(output).not.toContain('test-refresh');
            expect(output).not.toContain('test-secret');
        });

        it('should redact nested sensitive fields', () => {
            const context: LogContext = {
                config: {
                    database: 'mydb',
                    credentials: {
                        user: 'admin',
                        password: 'nested_secret'
                    }
                }
            };
            logger.info('nested config', context);

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).not.toContain('nested_secret');
            expect(output).toContain('mydb'); // Non-sensitive field preserved
        });

        it('should handle partial key matches', () => {
            logger.info('test', {
                dbPassword: 'pw123',
                session_token: 'tok456',
                myAccessTokenValue: 'tok789'
            });

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).not.toContain('pw123');
            expect(output).not.toContain('tok456');
            expect(output).not.toContain('tok789');
        });

        it('should preserve non-sensitive fields', () => {
            logger.info('test', {
                operation: 'query',
                entityId: 'exasol1',
                count: 42
            });

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toContain('query');
            expect(output).toContain('exasol1');
            expect(output).toContain('42');
        });
    });

    describe('Log Entry Formatting', () => {
        it('should include timestamp in ISO format', () => {
            logger.info('test message');

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            // Should have ISO timestamp format: [YYYY-MM-DDTHH:mm:ss.sssZ]
            expect(output).toMatch(/\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\]/);
        });

        it('should include module when provided', () => {
            logger.info('test', { module: 'CONNECTOR' });

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toContain('[CONNECTOR]');
        });

        it('should include code when provided', () => {
            logger.warning('connection failed', { code: 'HOST_FAILED' });

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toContain('[HOST_FAILED]');
        });

        it('should format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}', () => {
            logger.error('Transport failure', {
                module: 'TRANSPORT',
                code: 'BAD_CONNECTION',
                operation: 'execute'
            });

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toMatch(/^\[.*\] \[ERROR\] \[TRANSPORT\] \[BAD_CONNECTION\] Transport failure \{"operation":"execute"\}$/);
        });
    });

    describe('Module-Scoped Logger', () => {
        it('should create child logger with fixed module', () => {
            const resultLogger = logger.forModule('RESULT');
            resultLogger.info('Fetched rows');

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toContain('[RESULT]');
        });

        it('should override module from context', () => {
            const resultLogger = logger.forModule('RESULT');
            // Even if context has different module, forModule takes precedence
            resultLogger.error('Error', { module: 'IMPORT', code: 'MALFORMED_DATA' });

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toContain('[RESULT]');
        });

        it('should support all log levels on child logger', () => {
            const importLogger = logger.forModule('IMPORT');

            importLogger.debug('debug');
            importLogger.info('info');
            importLogger.warning('warning');
            importLogger.error('error');

            expect(consoleErrorSpy).toHaveBeenCalledTimes(4);
            for (const call of consoleErrorSpy.mock.calls) {
                expect(call[0]).toContain('[IMPORT]');
            }
        });
    });

    describe('Logger Configuration', () => {
        it('setLevel should change minimum log level', () => {
            logger.setLevel('critical');

            logger.error('Should not log');
            expect(consoleErrorSpy).not.toHaveBeenCalled();

            logger.setLevel('error');
            logger.error('Should log');
            expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
        });

        it('getLevel should return current minimum level', () => {
            logger.setLevel('warning');
            expect(logger.getLevel()).toBe('warning');

            logger.setLevel('debug');
            expect(logger.getLevel()).toBe('debug');
        });

        it('should use the default module for logs without one', () => {
            logger.info('test message');

            const output = consoleErrorSpy.mock.calls[0]?.[0] as string;
            expect(output).toContain('[DRIVER]');
        });
    });
});
