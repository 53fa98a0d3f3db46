export type ProvenanceErrorCode =
  | "CONFIG_INVALID"
  | "LOG_DIR_MISSING"
  | "SOURCE_SCRIPT_MISSING"
  | "SCRIPT_FAILED"
  | "REQUIRED_OUTPUT_MISSING"
  | "MANIFEST_INVALID"
  | "MANIFEST_NOT_FOUND";

export class ProvenanceError extends Error {
  constructor(
    readonly code: ProvenanceErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProvenanceError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
