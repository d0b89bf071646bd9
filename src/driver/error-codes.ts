function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export interface DriverErrorInfo {
  message: string;
  codes: Set<string>;
}

/**
 * Message and every error code found on `error`, its `original` and its
 * `cause`. Drivers nest the interesting code at different depths.
 */
export function inspectDriverError(error: unknown): DriverErrorInfo {
  const codes = new Set<string>();
  const addCodes = (source: unknown) => {
    if (!isRecord(source)) return;
    for (const key of ["code", "errno"]) {
      const value = source[key];
      if (typeof value === "string" && value.length > 0) {
        codes.add(value);
      }
    }
  };

  addCodes(error);
  if (isRecord(error)) {
    addCodes(error.original);
    addCodes(error.cause);
  }

  const rawMessage = isRecord(error) ? error.message : undefined;
  const message = typeof rawMessage === "string" ? rawMessage : error === undefined ? "Unknown database error" : String(error);
  return { message, codes };
}
