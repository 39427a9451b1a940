/**
 * exasol-ws-client - Database Types
 *
 * Values and results as seen by callers of the SQL interface.
 */

import type { ResultRows } from "../result/ResultRows.js";

/**
 * A value bound to a parameter or read from a result cell
 */
export type SqlValue = string | number | bigint | boolean | Date | null;

/**
 * Positional parameters. A keyed object is accepted by the signature so that
 * it can be rejected with a descriptive error: the protocol only knows
 * positions.
 */
export type StatementParameters =
  | readonly SqlValue[]
  | Readonly<Record<string, SqlValue>>;

/**
 * Outcome of executing one statement
 */
export type ExecuteResult =
  | { kind: "rowCount"; rowsAffected: number }
  | { kind: "resultSet"; rows: ResultRows };

/**
 * Per-request options
 */
export interface RequestOptions {
  /** Aborting closes the session */
  signal?: AbortSignal | undefined;
}

/**
 * Settings shared by statements and result sets of one connection
 */
export interface ExecutionSettings {
  /** Maximum rows the server returns for a result set */
  resultSetMaxRows?: number | undefined;

  /** Bytes requested per fetch */
  fetchBytes: number;
}
