/**
 * exasol-ws-client - Structured Logger
 *
 * Centralized logging utility with RFC 5424 severity levels and structured output.
 * Everything goes to stderr so that stdout stays free for query output.
 *
 * Format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}
 * Example: [2025-12-18T01:30:00Z] [WARNING] [CONNECTOR] [HOST_FAILED] Login failed {"host":"exasol1"}
 */

/**
 * RFC 5424 syslog severity levels
 * @see https://datatracker.ietf.org/doc/html/rfc5424#section-6.2.1
 */
export type LogLevel =
    | 'debug'       // 7 - Debug-level messages
    | 'info'        // 6 - Informational messages
    | 'notice'      // 5 - Normal but significant condition
    | 'warning'     // 4 - Warning conditions
    | 'error'       // 3 - Error conditions
    | 'critical'    // 2 - Critical conditions
    | 'alert'       // 1 - Action must be taken immediately
    | 'emergency';  // 0 - System is unusable

export const LOG_LEVELS: readonly LogLevel[] = [
    'debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency'
];

/**
 * Module identifiers for log categorization
 */
export type LogModule =
    | 'DRIVER'      // Library-level events
    | 'CONNECTOR'   // Host probing and login
    | 'TRANSPORT'   // WebSocket session
    | 'STATEMENT'   // Direct and prepared execution
    | 'RESULT'      // Result set paging
    | 'IMPORT'      // Local CSV import bridge
    | 'CONFIG'      // DSN and configuration
    | 'CLI';        // Command line interface

/**
 * Structured log context
 */
export interface LogContext {
    /** Module identifier */
    module?: LogModule;
    /** Module-prefixed error/event code (e.g., HOST_FAILED) */
    code?: string;
    /** Operation being performed (e.g., execute, fetch) */
    operation?: string;
    /** Entity identifier (e.g., host, statement handle) */
    entityId?: string;
    /** Error stack trace */
    stack?: string;
    /** Additional context fields */
    [key: string]: unknown;
}

interface LogEntry {
    level: LogLevel;
    module?: LogModule | undefined;
    code?: string | undefined;
    message: string;
    timestamp: string;
    context?: LogContext | undefined;
}

/**
 * Structured logger writing to stderr
 */
class Logger {
    private minLevel: LogLevel = 'warning';
    private readonly defaultModule: LogModule = 'DRIVER';

    /**
     * RFC 5424 severity priority (lower number = higher severity)
     */
    private readonly levelPriority: Record<LogLevel, number> = {
        emergency: 0,
        alert: 1,
        critical: 2,
        error: 3,
        warning: 4,
        notice: 5,
        info: 6,
        debug: 7
    };

    setLevel(level: LogLevel): void {
        this.minLevel = level;
    }

    getLevel(): LogLevel {
        return this.minLevel;
    }

    private shouldLog(level: LogLevel): boolean {
        return this.levelPriority[level] <= this.levelPriority[this.minLevel];
    }

    /**
     * Keys whose values are never written out
     */
    private readonly sensitiveKeys: ReadonlySet<string> = new Set([
        'password',
        'secret',
        'token',
        'accesstoken',
        'access_token',
        'refreshtoken',
        'refresh_token',
        'authorization',
        'credential',
        'credentials'
    ]);

    private sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
        const sanitized: Record<string, unknown> = {};

        for (const [key, value] of Object.entries(context)) {
            const lowerKey = key.toLowerCase();
            const isSensitive = this.sensitiveKeys.has(lowerKey) ||
                [...this.sensitiveKeys].some(sk => lowerKey.includes(sk));

            if (isSensitive && value !== undefined && value !== null) {
                sanitized[key] = '[REDACTED]';
            } else if (isPlainObject(value)) {
                sanitized[key] = this.sanitizeContext(value);
            } else {
                sanitized[key] = value;
            }
        }

        return sanitized;
    }

    /**
     * Strip control characters except tab, newline and carriage return
     */
    private sanitizeMessage(message: string): string {
        // eslint-disable-next-line no-control-regex
        return message.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F-\x9F]/g, '');
    }

    private formatEntry(entry: LogEntry): string {
        const parts: string[] = [
            `[${entry.timestamp}]`,
            `[${entry.level.toUpperCase()}]`
        ];

        if (entry.module) {
            parts.push(`[${entry.module}]`);
        }

        if (entry.code) {
            parts.push(`[${entry.code}]`);
        }

        parts.push(this.sanitizeMessage(entry.message));

        if (entry.context) {
            const { module, code, ...restContext } = entry.context;
            void module; void code; // already in the line prefix
            if (Object.keys(restContext).length > 0) {
                parts.push(JSON.stringify(this.sanitizeContext(restContext)));
            }
        }

        return parts.join(' ');
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            module: context?.module ?? this.defaultModule,
            code: context?.code,
            message,
            timestamp: new Date().toISOString(),
            context
        };

        console.error(this.formatEntry(entry));
    }

    // =========================================================================
    // Convenience methods for each log level
    // =========================================================================

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    warning(message: string, context?: LogContext): void {
        this.log('warning', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log('error', message, context);
    }

    /**
     * Create a child logger scoped to a specific module
     */
    forModule(module: LogModule): ModuleLogger {
        return new ModuleLogger(this, module);
    }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Module-scoped logger for cleaner code in specific modules
 */
export class ModuleLogger {
    constructor(
        private parent: Logger,
        private module: LogModule
    ) { }

    private withModule(context?: LogContext): LogContext {
        return { ...context, module: this.module };
    }

    debug(message: string, context?: LogContext): void {
        this.parent.debug(message, this.withModule(context));
    }

    info(message: string, context?: LogContext): void {
        this.parent.info(message, this.withModule(context));
    }

    warning(message: string, context?: LogContext): void {
        this.parent.warning(message, this.withModule(context));
    }

    error(message: string, context?: LogContext): void {
        this.parent.error(message, this.withModule(context));
    }
}

export const logger = new Logger();
