export type LakegateErrorCode =
  | "CONFIG_INVALID"
  | "BAD_REQUEST"
  | "CAPACITY_EXCEEDED"
  | "UPSTREAM_UNAVAILABLE"
  | "INTERNAL";

export class LakegateError extends Error {
  readonly code: LakegateErrorCode;
  readonly details?: unknown;

  constructor(code: LakegateErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "LakegateError";
    this.code = code;
    this.details = details;
  }

  toJSON(): { code: LakegateErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

export function toLakegateError(err: unknown): LakegateError {
  if (err instanceof LakegateError) return err;
  if (err instanceof Error) {
    // Zod validation errors
    if (err.name === "ZodError" && "issues" in err) {
      return new LakegateError("BAD_REQUEST", "Validation error", { issues: err.issues });
    }
    return new LakegateError("INTERNAL", err.message, { name: err.name });
  }
  return new LakegateError("INTERNAL", "Unknown error");
}

/**
 * HTTP status for a non-auth failure.
 */
export function statusForLakegateError(err: LakegateError): 400 | 500 | 502 | 503 {
  switch (err.code) {
    case "BAD_REQUEST":
      return 400;
    case "CAPACITY_EXCEEDED":
      return 503;
    case "UPSTREAM_UNAVAILABLE":
      return 502;
    default:
      return 500;
  }
}
