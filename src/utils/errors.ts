/**
 * Conversion errors
 * Every failure the orchestrator raises itself carries one of these codes
 */

export type ErrorCode =
  | "BatchJobFileFailedOpen"
  | "BatchJobFileFailedParse"
  | "ConvertTypeUnknown"
  | "InFileFailedLoad"
  | "OutFileFailedOpen"
  | "OutFileFailedWrite"
  | "ConvertFailed"
  | "NotSupported"
  | "UnknownError"
  | "Cancelled";

const DEFAULT_MESSAGES: Record<ErrorCode, string> = {
  BatchJobFileFailedOpen: "Failed to open batch job file",
  BatchJobFileFailedParse: "Failed to parse batch job file",
  ConvertTypeUnknown: "Unknown output type",
  InFileFailedLoad: "Failed to load input file",
  OutFileFailedOpen: "Failed to open output file",
  OutFileFailedWrite: "Failed to write output file",
  ConvertFailed: "Conversion failed",
  NotSupported: "Not supported",
  UnknownError: "Unknown error",
  Cancelled: "Conversion cancelled",
};

export class ConvertError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? DEFAULT_MESSAGES[code], options);
    this.name = "ConvertError";
    this.code = code;
  }
}

export function isConvertError(
  error: unknown,
  code?: ErrorCode,
): error is ConvertError {
  return (
    error instanceof ConvertError && (code === undefined || error.code === code)
  );
}

/**
 * Short reason for an error: the code of a ConvertError, otherwise the
 * error class name (collaborator errors keep their own identity)
 */
export function errorReason(error: unknown): string {
  if (error instanceof ConvertError) return error.code;
  if (error instanceof Error) return error.name;
  return "UnknownError";
}

/**
 * One-line description used in failure lists, e.g.
 * "ConvertTypeUnknown: Unknown output type \"xyz\""
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${errorReason(error)}: ${error.message}`;
  }
  return `UnknownError: ${String(error)}`;
}
