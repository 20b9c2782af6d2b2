import type { BootstrapStep } from "./constants.js";

export class AppError extends Error {
  constructor(
    public exitCode: number,
    public code: string,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ValidationError extends AppError {
  constructor(
    message = "Validation failed",
    public details?: Record<string, string[]>,
  ) {
    super(2, "VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

export class BootstrapStepError extends AppError {
  constructor(
    public step: BootstrapStep,
    public sqlState: string | null,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(1, options?.code ?? "STEP_FAILED", message);
    this.name = "BootstrapStepError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ExtensionUnavailableError extends BootstrapStepError {
  constructor(sqlState: string | null, message: string, cause?: unknown) {
    super("extension", sqlState, message, { cause, code: "EXTENSION_UNAVAILABLE" });
    this.name = "ExtensionUnavailableError";
  }
}

export class GrantTargetNotFoundError extends BootstrapStepError {
  constructor(sqlState: string | null, message: string, cause?: unknown) {
    super("grant", sqlState, message, { cause, code: "GRANT_TARGET_NOT_FOUND" });
    this.name = "GrantTargetNotFoundError";
  }
}

export class PermissionDeniedError extends BootstrapStepError {
  constructor(step: BootstrapStep, sqlState: string | null, message: string, cause?: unknown) {
    super(step, sqlState, message, { cause, code: "PERMISSION_DENIED" });
    this.name = "PermissionDeniedError";
  }
}
