/**
 * Standardized exit codes for tidemark
 */
export enum ExitCode {
  SUCCESS = 0,
  SQL_ERROR = 1,
  PARSE_CONFIG_ERROR = 4,
  MISSING_FILE = 5,
  CONNECTION_ERROR = 7
}

/**
 * Base class for tidemark errors with exit codes
 */
export class TidemarkError extends Error {
  public readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode, options?: ErrorOptions) {
    super(message, options);
    this.exitCode = exitCode;
    this.name = this.constructor.name;
  }
}

export interface SqlErrorDetails {
  sql?: string;
  file?: string;
  line?: number;
}

/**
 * SQL execution error
 */
export class SqlError extends TidemarkError {
  public readonly sql?: string;
  public readonly file?: string;
  public readonly line?: number;

  constructor(message: string, details: SqlErrorDetails = {}, options?: ErrorOptions) {
    super(message, ExitCode.SQL_ERROR, options);
    this.sql = details.sql;
    this.file = details.file;
    this.line = details.line;
  }
}

/**
 * A multi-statement apply failed part way through. The statement's own error
 * travels as `cause`; the run wrapper surfaces that instead of this wrapper.
 */
export class BatchStatementError extends TidemarkError {
  constructor(message: string, cause: unknown) {
    super(message, ExitCode.SQL_ERROR, { cause });
  }
}

/**
 * Parse or configuration error
 */
export class ParseConfigError extends TidemarkError {
  constructor(message: string) {
    super(message, ExitCode.PARSE_CONFIG_ERROR);
  }
}

/**
 * Missing migration or init file
 */
export class MissingFileError extends TidemarkError {
  constructor(names: string[]) {
    const msg = names.length === 1
      ? `Missing migration file: ${names[0]}`
      : `Missing ${names.length} migration files: ${names.join(", ")}`;
    super(msg, ExitCode.MISSING_FILE);
  }
}

/**
 * Database connection error
 */
export class ConnectionError extends TidemarkError {
  constructor(message: string, options?: ErrorOptions) {
    super(`Database connection error: ${message}`, ExitCode.CONNECTION_ERROR, options);
  }
}

/**
 * Replace a batch wrapper by the error it carries. Anything else, including a
 * batch error without a cause, is returned untouched.
 */
export function unwrapBatchError(error: unknown): unknown {
  if (error instanceof BatchStatementError && error.cause !== undefined) {
    return error.cause;
  }
  return error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Helper to get exit code description for help text
 */
export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return "Success";
    case ExitCode.SQL_ERROR:
      return "SQL execution error";
    case ExitCode.PARSE_CONFIG_ERROR:
      return "Parse or configuration error";
    case ExitCode.MISSING_FILE:
      return "Missing migration file";
    case ExitCode.CONNECTION_ERROR:
      return "Database connection error";
    default:
      return "Unknown error";
  }
}

/**
 * Format exit codes for help text
 */
export function formatExitCodesHelp(): string {
  const codes = [
    ExitCode.SUCCESS,
    ExitCode.SQL_ERROR,
    ExitCode.PARSE_CONFIG_ERROR,
    ExitCode.MISSING_FILE,
    ExitCode.CONNECTION_ERROR
  ];

  return codes
    .map(code => `  ${code} - ${getExitCodeDescription(code)}`)
    .join("\n");
}
