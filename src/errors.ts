export type StatementErrorCode =
  | "UnknownCategory"
  | "MalformedDate"
  | "MalformedAmount"
  | "MissingColumn"
  | "UnsupportedTransactionKind"
  | "EmptyStatement"
  | "InvalidConfig";

/**
 * Every failure the converter reports on purpose. All of them abort the run.
 */
export class StatementError extends Error {
  readonly code: StatementErrorCode;
  /** 1-based input record number, when the error belongs to a row. */
  readonly row?: number;

  constructor(code: StatementErrorCode, message: string, opts?: { row?: number }) {
    super(opts?.row != null ? `${message} (row ${opts.row})` : message);
    this.name = "StatementError";
    this.code = code;
    this.row = opts?.row;
  }
}

export function isStatementError(err: unknown): err is StatementError {
  return err instanceof StatementError;
}
