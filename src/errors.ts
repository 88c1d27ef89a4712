/**
 * Orchestrator — Error Taxonomy
 *
 * Every error the orchestrator raises or records extends OrchestratorError
 * and carries a `kind` so step results and exit codes can be derived from it.
 */

// =============================================================================
// Kinds & Codes
// =============================================================================

export type ErrorKind = "validation" | "provider" | "timeout" | "state-store" | "cancelled";

export type ValidationCode =
  | "INVALID_TARGET"
  | "INVALID_STEP"
  | "DUPLICATE_STEP"
  | "UNKNOWN_DEPENDENCY"
  | "CYCLIC_DEPENDENCY"
  | "UNRESOLVED_VARIABLE"
  | "UNRESOLVED_INPUT"
  | "INVALID_CONFIG"
  | "RUN_IN_PROGRESS";

/** Serializable form of an error, as stored on a StepResult. */
export type StepError = {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  code?: string;
};

// =============================================================================
// Error Classes
// =============================================================================

export abstract class OrchestratorError extends Error {
  abstract readonly kind: ErrorKind;

  get retryable(): boolean {
    return false;
  }

  toStepError(): StepError {
    return { kind: this.kind, message: this.message, retryable: this.retryable };
  }
}

/** Plan, target-file or configuration problem. Never retried. */
export class ValidationError extends OrchestratorError {
  readonly kind = "validation" as const;

  constructor(
    public readonly code: ValidationCode,
    message: string,
    public readonly details: string[] = [],
  ) {
    super(message);
    this.name = "ValidationError";
  }

  override toStepError(): StepError {
    return { ...super.toStepError(), code: this.code };
  }
}

/** Failure reported by a cloud operation. */
export class ProviderError extends OrchestratorError {
  readonly kind = "provider" as const;
  readonly code: string | undefined;
  private readonly isRetryable: boolean;

  constructor(message: string, options?: { retryable?: boolean; cause?: unknown; code?: string }) {
    super(message, { cause: options?.cause });
    this.name = "ProviderError";
    this.isRetryable = options?.retryable ?? false;
    this.code = options?.code;
  }

  override get retryable(): boolean {
    return this.isRetryable;
  }

  override toStepError(): StepError {
    const base = super.toStepError();
    return this.code ? { ...base, code: this.code } : base;
  }
}

/** A step exceeded its wall-clock budget. */
export class TimeoutError extends OrchestratorError {
  readonly kind = "timeout" as const;

  constructor(public readonly stepName: string, public readonly timeoutMs: number) {
    super(`Step "${stepName}" timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/** Persistence failure. Fatal for the whole run. */
export class StateStoreError extends OrchestratorError {
  readonly kind = "state-store" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "StateStoreError";
  }
}

/** The run was cancelled while the step was in flight. */
export class CancelledError extends OrchestratorError {
  readonly kind = "cancelled" as const;

  constructor(message = "Operation was cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Normalize anything a provider throws into an OrchestratorError.
 * Unknown errors become non-retryable ProviderErrors.
 */
export function toOrchestratorError(error: unknown): OrchestratorError {
  if (error instanceof OrchestratorError) return error;
  return new ProviderError(formatErrorMessage(error), { retryable: false, cause: error });
}

export function isRetryable(error: unknown): boolean {
  return error instanceof ProviderError && error.retryable;
}

/**
 * Format an unknown thrown value into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === "object" && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
