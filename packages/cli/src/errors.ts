export type CliErrorCode =
  | "NAME_MISMATCH"
  | "MISSING_DESCRIPTION"
  | "TEMPLATE_ERROR"
  | "CONFIG_ERROR"
  | "DOWNLOAD_FAILED"
  | "ARCHIVE_ERROR";

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: CliErrorCode, message: string, exitCode = 1, details?: Record<string, unknown>) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
  }
}

export function errorEnvelope(code: string, message: string, details?: Record<string, unknown>) {
  return {
    ok: false as const,
    error: {
      code,
      message,
      details
    }
  };
}
