/**
 * Pipeline Errors
 *
 * Stage-local problems (oracle failures, rejected samples) never surface as
 * exceptions. Only configuration problems and a run that produced nothing
 * are thrown to the caller, always with a readable condition.
 */

export type SynthesisErrorCode =
  | "CONFIGURATION"
  | "NOT_INITIALIZED"
  | "GENERATION_FAILED"
  | "ORACLE";

export class SynthesisError extends Error {
  readonly code: SynthesisErrorCode;
  /** Human-readable description of what went wrong */
  readonly condition: string;

  constructor(code: SynthesisErrorCode, condition: string, options?: { cause?: unknown }) {
    super(`[${code}] ${condition}`, options);
    this.name = "SynthesisError";
    this.code = code;
    this.condition = condition;
  }
}

export class ConfigurationError extends SynthesisError {
  constructor(condition: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", condition, options);
    this.name = "ConfigurationError";
  }
}

export class NotInitializedError extends SynthesisError {
  constructor(condition = "initialize() must complete before generate()") {
    super("NOT_INITIALIZED", condition);
    this.name = "NotInitializedError";
  }
}

export class GenerationFailedError extends SynthesisError {
  readonly attempts: number;

  constructor(requested: number, attempts: number) {
    super(
      "GENERATION_FAILED",
      `no record accepted out of ${attempts} attempts (${requested} requested)`
    );
    this.name = "GenerationFailedError";
    this.attempts = attempts;
  }
}

export type OracleFailureKind = "timeout" | "transport" | "malformed" | "invalid";

/**
 * Raised inside the decomposer only; always absorbed by the rule fallback.
 */
export class OracleError extends SynthesisError {
  readonly kind: OracleFailureKind;

  constructor(kind: OracleFailureKind, condition: string, options?: { cause?: unknown }) {
    super("ORACLE", condition, options);
    this.name = "OracleError";
    this.kind = kind;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
