/**
 * Custom error classes for scanning and reporting
 */

export class DirReportError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "DirReportError";
  }
}

export class ConfigurationError extends DirReportError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigurationError";
  }
}

export class ScanError extends DirReportError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message, "SCAN_ERROR");
    this.name = "ScanError";
  }
}

export class EmptyResultError extends DirReportError {
  constructor(message: string) {
    super(message, "EMPTY_RESULT");
    this.name = "EmptyResultError";
  }
}

// Error codes for easy reference
export const ErrorCodes = {
  CONFIG_ERROR: "CONFIG_ERROR",
  SCAN_ERROR: "SCAN_ERROR",
  EMPTY_RESULT: "EMPTY_RESULT",
  UNKNOWN_ERROR: "UNKNOWN_ERROR",
} as const;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
