export type GcLabErrorCode = "CONFIGURATION_ERROR" | "CANCELLED";

export class GcLabError extends Error {
  readonly code: GcLabErrorCode;

  constructor(message: string, code: GcLabErrorCode) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid factors, exclusions, repetitions or config. Raised before any trial runs. */
export class ConfigurationError extends GcLabError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    const body =
      details.length > 0 ? `${message}\n${details.map((line) => `- ${line}`).join("\n")}` : message;
    super(body, "CONFIGURATION_ERROR");
    this.details = details;
  }
}

/** Operator interrupt during a batch pause. Halts the remaining plan. */
export class CancelledError extends GcLabError {
  constructor(message = "Experiment cancelled by operator") {
    super(message, "CANCELLED");
  }
}

export const isCancelled = (error: unknown): error is CancelledError =>
  error instanceof CancelledError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
