/**
 * Error taxonomy for pipewright.
 *
 * Every failure the runner can surface carries a machine-readable
 * {@link ErrorCode}. Stage-level failures are recorded as an
 * {@link ErrorPayload} on the stage's RunResult; only configuration and
 * infrastructure errors escape the sequencer as thrown exceptions.
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export const ErrorCode = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  GUARD_ERROR: 'GUARD_ERROR',
  STAGE_FAILED: 'STAGE_FAILED',
  STAGE_TIMEOUT: 'STAGE_TIMEOUT',
  INFRASTRUCTURE: 'INFRASTRUCTURE',
  ARTIFACT_NOT_FOUND: 'ARTIFACT_NOT_FOUND',
  ABORTED: 'ABORTED',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Codes whose failure is contained to a single stage. */
export const STAGE_SCOPED_CODES: ReadonlySet<ErrorCodeValue> = new Set([
  ErrorCode.GUARD_ERROR,
  ErrorCode.STAGE_FAILED,
  ErrorCode.STAGE_TIMEOUT,
  ErrorCode.ARTIFACT_NOT_FOUND,
]);

/** Serializable error shape recorded on results and reports. */
export interface ErrorPayload {
  code: ErrorCodeValue;
  message: string;
  /** Stage the error was raised in, when there is one. */
  stage?: string;
}

// ---------------------------------------------------------------------------
// Brand symbol
// ---------------------------------------------------------------------------

const PIPELINE_ERROR_BRAND = Symbol.for('pipewright.PipelineError');

// ---------------------------------------------------------------------------
// PipelineError
// ---------------------------------------------------------------------------

export class PipelineError extends Error {
  readonly code: ErrorCodeValue;
  readonly stage?: string;

  /** @internal */
  readonly [PIPELINE_ERROR_BRAND] = true as const;

  constructor(code: ErrorCodeValue, message: string, stage?: string) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    if (stage !== undefined) {
      this.stage = stage;
    }
  }

  toPayload(): ErrorPayload {
    const payload: ErrorPayload = { code: this.code, message: this.message };
    if (this.stage !== undefined) {
      payload.stage = this.stage;
    }
    return payload;
  }
}

/** Check for a PipelineError without relying on `instanceof`. */
export function isPipelineError(value: unknown): value is PipelineError {
  return (
    value !== null &&
    typeof value === 'object' &&
    (value as Record<symbol, unknown>)[PIPELINE_ERROR_BRAND] === true
  );
}

// ---------------------------------------------------------------------------
// Taxonomy
// ---------------------------------------------------------------------------

/**
 * Malformed pipeline or deployment document. Fatal: no run is attempted.
 * Carries every problem found, not only the first.
 */
export class ConfigError extends PipelineError {
  readonly problems: readonly string[];

  constructor(message: string, problems: readonly string[] = []) {
    super(ErrorCode.CONFIG_INVALID, message);
    this.name = 'ConfigError';
    this.problems = [...problems];
  }
}

/** A guard referenced a variable the runtime context does not define. */
export class InvalidGuardError extends PipelineError {
  readonly variable: string;

  constructor(variable: string, stage?: string) {
    super(ErrorCode.GUARD_ERROR, `Guard references undefined variable "${variable}"`, stage);
    this.name = 'InvalidGuardError';
    this.variable = variable;
  }
}

/** A stage's command exited non-zero. */
export class StageExecutionFailure extends PipelineError {
  readonly exitCode: number;

  constructor(stage: string, exitCode: number) {
    super(ErrorCode.STAGE_FAILED, `Stage "${stage}" exited with code ${exitCode}`, stage);
    this.name = 'StageExecutionFailure';
    this.exitCode = exitCode;
  }
}

/** A stage ran past its deadline and was interrupted. */
export class StageTimeoutError extends PipelineError {
  readonly timeoutMs: number;

  constructor(stage: string, timeoutMs: number) {
    super(ErrorCode.STAGE_TIMEOUT, `Stage "${stage}" timed out after ${timeoutMs}ms`, stage);
    this.name = 'StageTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** The execution backend itself is unusable (binary missing, daemon down). */
export class InfrastructureError extends PipelineError {
  constructor(message: string, options?: { stage?: string; cause?: unknown }) {
    super(ErrorCode.INFRASTRUCTURE, message, options?.stage);
    this.name = 'InfrastructureError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** `unstash` was asked for a key this run never stashed. */
export class ArtifactNotFoundError extends PipelineError {
  readonly key: string;

  constructor(key: string, stage?: string) {
    super(ErrorCode.ARTIFACT_NOT_FOUND, `No artifact stashed under key "${key}"`, stage);
    this.name = 'ArtifactNotFoundError';
    this.key = key;
  }
}

/** The run was cancelled from outside while a stage was in flight. */
export class PipelineAbortedError extends PipelineError {
  constructor(stage?: string) {
    super(ErrorCode.ABORTED, stage ? `Run aborted during stage "${stage}"` : 'Run aborted', stage);
    this.name = 'PipelineAbortedError';
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Convert anything thrown into an ErrorPayload. Unknown errors are treated
 * as infrastructure failures.
 */
export function toErrorPayload(err: unknown, stage?: string): ErrorPayload {
  if (isPipelineError(err)) {
    const payload = err.toPayload();
    if (payload.stage === undefined && stage !== undefined) {
      payload.stage = stage;
    }
    return payload;
  }
  const message = err instanceof Error ? err.message : String(err);
  const payload: ErrorPayload = { code: ErrorCode.INFRASTRUCTURE, message };
  if (stage !== undefined) {
    payload.stage = stage;
  }
  return payload;
}
