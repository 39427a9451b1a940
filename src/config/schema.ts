/**
 * exasol-ws-client - Connection Configuration
 *
 * Zod schema with defaults for every connection setting.
 */

import { z } from 'zod';
import { ValidationError } from '../types/index.js';

export const DEFAULT_PORT = 8563;

/** Fetch size in KiB */
export const DEFAULT_FETCH_SIZE = 128 * 1024;

export const ConnectionConfigSchema = z.object({
    /** Host specification, see resolveHosts() */
    host: z.string().min(1, 'host must not be empty'),
    port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
    user: z.string().optional(),
    password: z.string().optional(),
    accessToken: z.string().optional(),
    refreshToken: z.string().optional(),
    /** Schema opened at login */
    schema: z.string().optional(),
    autocommit: z.boolean().default(true),
    encryption: z.boolean().default(true),
    validateServerCertificate: z.boolean().default(true),
    /** Hex SHA-256 of the server certificate; pins instead of CA validation */
    certificateFingerprint: z.string().regex(/^[0-9a-fA-F:]+$/, 'fingerprint must be hex').optional(),
    compression: z.boolean().default(false),
    resultSetMaxRows: z.number().int().nonnegative().optional(),
    fetchSize: z.number().int().positive().default(DEFAULT_FETCH_SIZE),
    /** Seconds, 0 = no timeout */
    queryTimeout: z.number().int().nonnegative().optional(),
    clientName: z.string().default('exasol-ws-client'),
    clientVersion: z.string().optional(),
    /** Address the server uses to reach the local import listener */
    importHost: z.string().optional(),
    /** WebSocket opening handshake timeout in ms */
    connectTimeout: z.number().int().positive().default(10000)
}).superRefine((config, ctx) => {
    const hasPassword = config.user !== undefined && config.password !== undefined;
    const hasToken = config.accessToken !== undefined || config.refreshToken !== undefined;
    if (!hasPassword && !hasToken) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'either user and password or an access/refresh token is required',
            path: ['user']
        });
    }
});

export type ConnectionConfigInput = z.input<typeof ConnectionConfigSchema>;
export type ConnectionConfig = z.output<typeof ConnectionConfigSchema>;

/**
 * Validate a configuration object and apply defaults
 */
export function parseConfig(input: ConnectionConfigInput): ConnectionConfig {
    const result = ConnectionConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(
            (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
        );
        throw new ValidationError(`invalid connection configuration: ${issues.join('; ')}`, { issues });
    }
    return result.data;
}
