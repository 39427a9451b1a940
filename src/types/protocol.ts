/**
 * exasol-ws-client - Wire Protocol Types
 *
 * Requests are plain JSON objects; responses are validated with zod before
 * anything else touches them.
 */

import { z } from 'zod';

/** Protocol version requested at login */
export const PROTOCOL_VERSION = 3;

// =============================================================================
// Requests
// =============================================================================

/**
 * Session attributes understood by the server
 */
export interface Attributes {
    autocommit?: boolean;
    currentSchema?: string;
    queryTimeout?: number;
    resultSetMaxRows?: number;
}

export interface LoginCommand {
    command: 'login' | 'loginToken';
    protocolVersion: number;
    attributes?: Attributes;
}

/**
 * Credentials message sent after the login command. It is the only
 * request without a command name.
 */
export interface AuthRequest {
    username?: string;
    password?: string;
    accessToken?: string;
    refreshToken?: string;
    useCompression: boolean;
    clientName: string;
    driverName: string;
    clientOs: string;
    clientOsUsername: string;
    clientVersion: string;
    clientRuntime: string;
    attributes: Attributes;
}

export interface ExecuteCommand {
    command: 'execute';
    sqlText: string;
    attributes?: Attributes;
}

export interface CreatePreparedStatementCommand {
    command: 'createPreparedStatement';
    sqlText: string;
    attributes?: Attributes;
}

export interface ExecutePreparedStatementCommand {
    command: 'executePreparedStatement';
    statementHandle: number;
    numColumns: number;
    numRows: number;
    columns: ColumnDescriptor[];
    data: WireValue[][];
    attributes?: Attributes;
}

export interface ClosePreparedStatementCommand {
    command: 'closePreparedStatement';
    statementHandle: number;
}

export interface FetchCommand {
    command: 'fetch';
    resultSetHandle: number;
    startPosition: number;
    numBytes: number;
}

export interface CloseResultSetCommand {
    command: 'closeResultSet';
    resultSetHandles: number[];
}

export interface SetAttributesCommand {
    command: 'setAttributes';
    attributes: Attributes;
}

export interface DisconnectCommand {
    command: 'disconnect';
}

export type Command =
    | LoginCommand
    | ExecuteCommand
    | CreatePreparedStatementCommand
    | ExecutePreparedStatementCommand
    | ClosePreparedStatementCommand
    | FetchCommand
    | CloseResultSetCommand
    | SetAttributesCommand
    | DisconnectCommand;

export type ProtocolRequest = Command | AuthRequest;

/** JSON-representable parameter value */
export type WireValue = string | number | boolean | null;

// =============================================================================
// Responses
// =============================================================================

export const ExceptionSchema = z.object({
    text: z.string(),
    sqlCode: z.string().optional()
});

export const ResponseEnvelopeSchema = z.object({
    status: z.string(),
    responseData: z.unknown().optional(),
    exception: ExceptionSchema.optional()
}).describe('ResponseEnvelope');

export const PublicKeyResponseSchema = z.object({
    publicKeyPem: z.string(),
    publicKeyModulus: z.string().optional(),
    publicKeyExponent: z.string().optional()
}).describe('PublicKeyResponse');

export const LoginInfoSchema = z.object({
    sessionId: z.number(),
    protocolVersion: z.number(),
    releaseVersion: z.string(),
    databaseName: z.string(),
    productName: z.string(),
    maxDataMessageSize: z.number(),
    maxIdentifierLength: z.number().optional(),
    maxVarcharLength: z.number().optional(),
    identifierQuoteString: z.string().optional(),
    timeZone: z.string().optional(),
    timeZoneBehavior: z.string().optional()
}).describe('LoginInfo');

export const DataTypeSchema = z.object({
    type: z.string(),
    precision: z.number().optional(),
    scale: z.number().optional(),
    size: z.number().optional(),
    characterSet: z.string().optional(),
    withLocalTimeZone: z.boolean().optional(),
    fraction: z.number().optional(),
    srid: z.number().optional()
});

export const ColumnDescriptorSchema = z.object({
    name: z.string(),
    dataType: DataTypeSchema
});

export const ResultSetSchema = z.object({
    resultSetHandle: z.number().optional(),
    numColumns: z.number(),
    numRows: z.number(),
    numRowsInMessage: z.number(),
    columns: z.array(ColumnDescriptorSchema),
    data: z.array(z.array(z.unknown())).optional()
});

export const RowCountResultSchema = z.object({
    resultType: z.literal('rowCount'),
    rowCount: z.number()
}).describe('RowCountResult');

export const ResultSetResultSchema = z.object({
    resultType: z.literal('resultSet'),
    resultSet: ResultSetSchema
}).describe('ResultSetResult');

/**
 * Response of execute and executePreparedStatement. Entries stay raw until
 * the result decoder picks their shape.
 */
export const SqlQueriesResponseSchema = z.object({
    numResults: z.number(),
    results: z.array(z.unknown())
}).describe('SqlQueriesResponse');

export const CreatePreparedStatementResponseSchema = z.object({
    statementHandle: z.number(),
    parameterData: z.object({
        numColumns: z.number(),
        columns: z.array(ColumnDescriptorSchema)
    }).optional(),
    numResults: z.number().optional(),
    results: z.array(z.unknown()).optional()
}).describe('CreatePreparedStatementResponse');

export const FetchResponseSchema = z.object({
    numRows: z.number(),
    data: z.array(z.array(z.unknown()))
}).describe('FetchResponse');

export type ServerException = z.infer<typeof ExceptionSchema>;
export type ResponseEnvelope = z.infer<typeof ResponseEnvelopeSchema>;
export type PublicKeyResponse = z.infer<typeof PublicKeyResponseSchema>;
export type LoginInfo = z.infer<typeof LoginInfoSchema>;
export type DataType = z.infer<typeof DataTypeSchema>;
export type ColumnDescriptor = z.infer<typeof ColumnDescriptorSchema>;
export type ResultSetData = z.infer<typeof ResultSetSchema>;
export type RowCountResult = z.infer<typeof RowCountResultSchema>;
export type ResultSetResult = z.infer<typeof ResultSetResultSchema>;
export type SqlQueriesResponse = z.infer<typeof SqlQueriesResponseSchema>;
export type CreatePreparedStatementResponse = z.infer<typeof CreatePreparedStatementResponseSchema>;
export type FetchResponse = z.infer<typeof FetchResponseSchema>;
