/**
 * exasol-ws-client - Error Types
 *
 * Every error raised by the driver extends DriverError and carries a stable
 * code. Connection-level errors mean the session must be re-established;
 * server and malformed-response errors only fail the current request.
 */

/**
 * Base error class for exasol-ws-client
 */
export class DriverError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "DriverError";
  }
}

/**
 * Failure while establishing a session (socket, handshake, login)
 */
export class ConnectionError extends DriverError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code = "CONNECTION_ERROR",
  ) {
    super(message, code, details);
    this.name = "ConnectionError";
  }
}

/**
 * The transport is gone or broke mid-request. The session that raised it
 * is closed and must not be reused.
 */
export class BadConnectionError extends DriverError {
  constructor(
    message = "bad connection",
    details?: Record<string, unknown>,
    code = "BAD_CONNECTION",
  ) {
    super(message, code, details);
    this.name = "BadConnectionError";
  }
}

/**
 * The caller aborted a request while it was waiting for the reply
 */
export class RequestCancelledError extends BadConnectionError {
  constructor(details?: Record<string, unknown>) {
    super("request cancelled", details, "REQUEST_CANCELLED");
    this.name = "RequestCancelledError";
  }
}

/**
 * Non-ok response carrying a server exception
 */
export class ServerError extends DriverError {
  constructor(
    public readonly sqlCode: string,
    public readonly text: string,
  ) {
    super(
      `execution failed with SQL error code '${sqlCode}' and message '${text}'`,
      "SERVER_ERROR",
      { sqlCode, text },
    );
    this.name = "ServerError";
  }
}

/**
 * Response that does not have the expected shape
 */
export class MalformedResponseError extends DriverError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code = "MALFORMED_RESPONSE",
  ) {
    super(message, code, details);
    this.name = "MalformedResponseError";
  }
}

/**
 * A single result cell could not be converted to its column type
 */
export class CellDecodeError extends MalformedResponseError {
  constructor(column: string, type: string, value: unknown) {
    super(
      `cannot decode value ${JSON.stringify(value)} of column '${column}' as ${type}`,
      { column, type, value },
      "CELL_DECODE_ERROR",
    );
    this.name = "CellDecodeError";
  }
}

/**
 * Validation error for configuration and input parameters
 */
export class ValidationError extends DriverError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code = "VALIDATION_ERROR",
  ) {
    super(message, code, details);
    this.name = "ValidationError";
  }
}

/**
 * Parameter count is not a multiple of the statement's column count
 */
export class InvalidValuesCountError extends ValidationError {
  constructor(valueCount: number, columnCount: number) {
    super(
      `invalid number of values: ${String(valueCount)} is not a multiple of ${String(columnCount)} columns`,
      { valueCount, columnCount },
      "INVALID_VALUES_COUNT",
    );
    this.name = "InvalidValuesCountError";
  }
}

export class NamedParametersNotSupportedError extends ValidationError {
  constructor(names: string[]) {
    super("named parameters not supported", { names }, "NAMED_PARAMETERS_NOT_SUPPORTED");
    this.name = "NamedParametersNotSupportedError";
  }
}

export class InvalidHostRangeError extends ValidationError {
  constructor(public readonly host: string) {
    super(`invalid host range limits: '${host}'`, { host }, "INVALID_HOST_RANGE");
    this.name = "InvalidHostRangeError";
  }
}

export class InvalidImportQueryError extends ValidationError {
  constructor(public readonly query: string) {
    super("invalid import query, no local file found", { query }, "INVALID_IMPORT_QUERY");
    this.name = "InvalidImportQueryError";
  }
}

export class FileNotFoundError extends ValidationError {
  constructor(public readonly path: string) {
    super(`file '${path}' not found`, { path }, "FILE_NOT_FOUND");
    this.name = "FileNotFoundError";
  }
}

/**
 * Statement used after close()
 */
export class StatementClosedError extends ValidationError {
  constructor(statementHandle: number) {
    super(
      `prepared statement ${String(statementHandle)} is closed`,
      { statementHandle },
      "STATEMENT_CLOSED",
    );
    this.name = "StatementClosedError";
  }
}
