import { SqlError, errorMessage } from "../core/errors.js";

export function formatCliError(error: unknown): string {
  if (error === undefined || error === null) {
    return "";
  }

  if (error instanceof SqlError && error.file && error.line) {
    return `${error.file}:${error.line} - ${error.message}`;
  }

  return errorMessage(error);
}
