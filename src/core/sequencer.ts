/**
 * Sequencer: drives one pipeline run from `pending` to `completed`.
 *
 * Stages run strictly in declaration order, one at a time. For each stage:
 * evaluate the guard, restore unstashed artifacts, execute on the backend
 * under the stage deadline, stash declared paths, collect exports, then
 * apply the stage's error policy.
 *
 * Whatever happens in the stage loop (or a failed preflight before it),
 * the `always` post-actions run
 * exactly once, followed by either the `success` or the `failure` list.
 * Post-actions are not cancelled by the run's abort signal and their
 * failures never change the run outcome.
 */

import { randomUUID } from 'node:crypto';
import type {
  PipelineRunSnapshot,
  PipelineSpec,
  PostAction,
  PostActionResult,
  PostCondition,
  RunOutcome,
  RunResult,
  StageSpec,
} from '../types/pipeline.js';
import { MAX_TIMEOUT_MS } from '../types/pipeline.js';
import type { ErrorPayload } from '../types/errors.js';
import {
  ErrorCode,
  InvalidGuardError,
  PipelineAbortedError,
  StageTimeoutError,
  isPipelineError,
  toErrorPayload,
} from '../types/errors.js';
import type { ExecutionBackend, StageInvocation } from './backend/backend.js';
import type { ArtifactStore } from './artifact-store.js';
import { RunArtifacts } from './artifact-store.js';
import { evaluate } from './guard.js';
import type { Logger } from './logger.js';
import { StageLogRouter, createLogger } from './logger.js';
import { PipelineRun } from './pipeline-run.js';
import {
  createRunContext,
  guardContext,
  parseExports,
  stageEnvironment,
  withExports,
} from './run-context.js';
import type { RunContext } from './run-context.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Default stage deadline: 30 minutes. */
export const DEFAULT_STAGE_TIMEOUT_MS = 1_800_000;

/** How long an interrupted stage gets to report back before it is abandoned. */
export const DEFAULT_KILL_GRACE_MS = 5_000;

export interface SequencerOptions {
  backend: ExecutionBackend;
  artifacts: ArtifactStore;
  /** Deadline for stages without their own, and for each post-action. */
  defaultTimeoutMs?: number;
  killGraceMs?: number;
  logger?: Logger;
  /** Injectable for deterministic run IDs in tests. */
  createRunId?: () => string;
  now?: () => Date;
}

export interface RunRequest {
  pipeline: PipelineSpec;
  /** Absolute directory every stage runs in. */
  workspace: string;
  branch?: string;
  buildNumber?: number;
  /** Extra variables layered over the pipeline's own environment. */
  env?: Record<string, string>;
  /** External cancellation. */
  signal?: AbortSignal;
  runId?: string;
  /**
   * Checked once before the first stage. A throw fails the run as an
   * infrastructure error: every stage is skipped, post-actions still run.
   */
  preflight?: () => Promise<void>;
}

/** What one stage produced, plus how the loop must react. */
interface StageStep {
  result: RunResult;
  /** Infrastructure failure: stop the loop, outcome failed. */
  fatal?: ErrorPayload;
  /** The run signal fired while this stage was in flight. */
  aborted?: boolean;
}

type Settled =
  | { kind: 'result'; result: RunResult }
  | { kind: 'error'; error: unknown }
  | { kind: 'interrupted' };

function emptyResult(stage: string, outcome: RunResult['outcome'], startedAt: number): RunResult {
  return {
    stage,
    outcome,
    stdout: '',
    stderr: '',
    exitCode: null,
    durationMs: Date.now() - startedAt,
    exports: {},
  };
}

function failedWith(result: RunResult, error: ErrorPayload): RunResult {
  return { ...result, outcome: 'failed', error, exports: {} };
}

// ---------------------------------------------------------------------------
// Sequencer
// ---------------------------------------------------------------------------

export class Sequencer {
  private readonly backend: ExecutionBackend;
  private readonly store: ArtifactStore;
  private readonly defaultTimeoutMs: number;
  private readonly killGraceMs: number;
  private readonly logger: Logger;
  private readonly createRunId: () => string;
  private readonly now: () => Date;

  constructor(options: SequencerOptions) {
    this.backend = options.backend;
    this.store = options.artifacts;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.logger = options.logger ?? createLogger('sequencer');
    this.createRunId = options.createRunId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Execute `request.pipeline` to completion and return the final snapshot.
   *
   * Never throws for stage-level problems; those are recorded on the
   * stage's result. The returned snapshot is always in phase `completed`.
   */
  async run(request: RunRequest): Promise<PipelineRunSnapshot> {
    const { pipeline } = request;
    const runId = request.runId ?? this.createRunId();
    const signal = request.signal ?? new AbortController().signal;
    const run = new PipelineRun(runId, pipeline.name, this.now);
    const artifacts = new RunArtifacts(this.store, runId, request.workspace);
    const log = this.logger.withContext({ run: runId, pipeline: pipeline.name });

    let ctx = createRunContext({
      runId,
      pipeline: pipeline.name,
      workspace: request.workspace,
      env: { ...pipeline.environment, ...request.env },
      ...(request.branch !== undefined ? { branch: request.branch } : {}),
      ...(request.buildNumber !== undefined ? { buildNumber: request.buildNumber } : {}),
    });

    log.info('run started', { stages: pipeline.stages.length, backend: this.backend.name });
    const runStartedAt = Date.now();

    let outcome: RunOutcome = 'succeeded';
    let fatalError = await this.preflight(request, log);
    const firstStage = fatalError === undefined ? 0 : pipeline.stages.length;
    if (fatalError !== undefined) {
      run.abort(fatalError);
      outcome = 'failed';
      this.skipRemaining(run, pipeline.stages, 0);
    }

    try {
      for (let index = firstStage; index < pipeline.stages.length; index++) {
        const stage = pipeline.stages[index];

        if (signal.aborted) {
          run.abort();
          outcome = 'aborted';
          this.skipRemaining(run, pipeline.stages, index);
          break;
        }

        run.beginStage(stage.name);
        const step = await this.runStage(stage, ctx, artifacts, signal);
        run.record(step.result);
        this.logStage(log, step.result);

        if (step.fatal !== undefined) {
          run.abort(step.fatal);
          outcome = 'failed';
          fatalError = step.fatal;
          this.skipRemaining(run, pipeline.stages, index + 1);
          break;
        }

        if (step.aborted) {
          run.abort();
          outcome = 'aborted';
          this.skipRemaining(run, pipeline.stages, index + 1);
          break;
        }

        if (step.result.outcome === 'failed') {
          if (stage.errorPolicy === 'fail-fast') {
            outcome = 'failed';
            this.skipRemaining(run, pipeline.stages, index + 1);
            break;
          }
          if (stage.affectsOutcome) {
            outcome = 'failed';
          }
        } else if (step.result.outcome === 'succeeded') {
          ctx = withExports(ctx, step.result.exports);
        }
      }
    } catch (err) {
      // Anything escaping the loop is a defect in the runner, not a stage.
      fatalError = toErrorPayload(err);
      outcome = 'failed';
      log.error('stage loop failed', { error_code: fatalError.code, error: fatalError.message });
    }

    run.enterPostActions(outcome, fatalError);
    await this.runPostActions(run, pipeline, ctx, outcome, log);
    run.complete();

    try {
      await artifacts.release();
    } catch (err) {
      log.warn('failed to release artifacts', { error: toErrorPayload(err).message });
    }

    log.info('run finished', {
      outcome,
      ok: outcome === 'succeeded',
      duration_ms: Date.now() - runStartedAt,
    });
    return run.snapshot();
  }

  private async preflight(request: RunRequest, log: Logger): Promise<ErrorPayload | undefined> {
    if (request.preflight === undefined) return undefined;
    try {
      await request.preflight();
      return undefined;
    } catch (err) {
      const error = toErrorPayload(err);
      log.error('preflight failed', { error_code: error.code, error: error.message });
      return error;
    }
  }

  // -------------------------------------------------------------------------
  // Stage execution
  // -------------------------------------------------------------------------

  private async runStage(
    stage: StageSpec,
    ctx: RunContext,
    artifacts: RunArtifacts,
    signal: AbortSignal,
  ): Promise<StageStep> {
    const startedAt = Date.now();

    if (stage.guard !== undefined) {
      try {
        if (!evaluate(stage.guard, guardContext(ctx))) {
          return { result: emptyResult(stage.name, 'skipped', startedAt) };
        }
      } catch (err) {
        if (err instanceof InvalidGuardError) {
          const error = new InvalidGuardError(err.variable, stage.name).toPayload();
          return { result: failedWith(emptyResult(stage.name, 'failed', startedAt), error) };
        }
        throw err;
      }
    }

    for (const key of stage.unstash) {
      try {
        await artifacts.unstash(key);
      } catch (err) {
        const failure = this.artifactFailure(stage, err);
        const result = failedWith(emptyResult(stage.name, 'failed', startedAt), failure.error);
        return failure.fatal ? { result, fatal: failure.error } : { result };
      }
    }

    const timeoutMs = stage.timeoutMs ?? this.defaultTimeoutMs;
    const invocation: Omit<StageInvocation, 'signal'> = {
      runId: ctx.runId,
      stage: stage.name,
      environment: stage.environment,
      commands: stage.commands,
      env: stageEnvironment(ctx, stage),
      workspace: ctx.workspace,
    };
    const execution = await this.execute(invocation, timeoutMs, signal);

    if (execution.settled.kind === 'error') {
      const error = toErrorPayload(execution.settled.error, stage.name);
      const failed = failedWith(emptyResult(stage.name, 'failed', startedAt), error);
      if (execution.timedOut) {
        return {
          result: { ...failed, error: new StageTimeoutError(stage.name, timeoutMs).toPayload() },
        };
      }
      if (signal.aborted) {
        return {
          result: { ...failed, error: new PipelineAbortedError(stage.name).toPayload() },
          aborted: true,
        };
      }
      return { result: failed, fatal: error };
    }

    const result: RunResult =
      execution.settled.kind === 'result'
        ? execution.settled.result
        : emptyResult(stage.name, 'failed', startedAt);

    new StageLogRouter(ctx.runId, stage.name).route(result);

    if (execution.timedOut) {
      return {
        result: failedWith(result, new StageTimeoutError(stage.name, timeoutMs).toPayload()),
      };
    }
    if (signal.aborted) {
      return {
        result: failedWith(result, new PipelineAbortedError(stage.name).toPayload()),
        aborted: true,
      };
    }

    if (result.outcome !== 'succeeded') {
      return { result: { ...result, exports: {} } };
    }

    for (const entry of stage.stash) {
      try {
        await artifacts.stash(entry.key, entry.paths);
      } catch (err) {
        const failure = this.artifactFailure(stage, err);
        const failed = failedWith(result, failure.error);
        return failure.fatal ? { result: failed, fatal: failure.error } : { result: failed };
      }
    }

    return { result: { ...result, exports: parseExports(result.stdout) } };
  }

  /**
   * Run one invocation under a deadline and the run's abort signal.
   *
   * A backend that honours the abort gets `killGraceMs` to report back with
   * its captured output; one that does not is abandoned.
   */
  private async execute(
    invocation: Omit<StageInvocation, 'signal'>,
    timeoutMs: number,
    runSignal?: AbortSignal,
  ): Promise<{ settled: Settled; timedOut: boolean }> {
    const controller = new AbortController();
    let timedOut = false;
    let graceTimer: ReturnType<typeof setTimeout> | undefined;

    const onRunAbort = (): void => controller.abort();
    if (runSignal?.aborted) {
      controller.abort();
    } else {
      runSignal?.addEventListener('abort', onRunAbort, { once: true });
    }

    // Longer delays overflow the timer and fire immediately.
    const deadline = setTimeout(
      () => {
        timedOut = true;
        controller.abort();
      },
      Math.min(timeoutMs, MAX_TIMEOUT_MS),
    );

    const interrupted = new Promise<Settled>((resolve) => {
      const startGrace = (): void => {
        graceTimer = setTimeout(() => resolve({ kind: 'interrupted' }), this.killGraceMs);
      };
      if (controller.signal.aborted) {
        startGrace();
      } else {
        controller.signal.addEventListener('abort', startGrace, { once: true });
      }
    });

    const running = this.backend.run({ ...invocation, signal: controller.signal }).then(
      (result): Settled => ({ kind: 'result', result }),
      (error: unknown): Settled => ({ kind: 'error', error }),
    );

    try {
      const settled = await Promise.race([running, interrupted]);
      return { settled, timedOut };
    } finally {
      clearTimeout(deadline);
      if (graceTimer !== undefined) clearTimeout(graceTimer);
      runSignal?.removeEventListener('abort', onRunAbort);
    }
  }

  /** Missing keys and bad paths fail the stage; anything else is infrastructure. */
  private artifactFailure(stage: StageSpec, err: unknown): { error: ErrorPayload; fatal: boolean } {
    const error = toErrorPayload(err, stage.name);
    const fatal = !(isPipelineError(err) && err.code !== ErrorCode.INFRASTRUCTURE);
    return { error, fatal };
  }

  private skipRemaining(run: PipelineRun, stages: readonly StageSpec[], from: number): void {
    const now = Date.now();
    for (const stage of stages.slice(from)) {
      run.record(emptyResult(stage.name, 'skipped', now));
    }
  }

  private logStage(log: Logger, result: RunResult): void {
    const meta: Record<string, unknown> = {
      stage: result.stage,
      outcome: result.outcome,
      ok: result.outcome !== 'failed',
      duration_ms: result.durationMs,
    };
    if (result.exitCode !== null) meta['exit_code'] = result.exitCode;
    if (result.error) {
      meta['error_code'] = result.error.code;
      log.warn('stage failed', { ...meta, error: result.error.message });
      return;
    }
    log.info(result.outcome === 'skipped' ? 'stage skipped' : 'stage finished', meta);
  }

  // -------------------------------------------------------------------------
  // Post-actions
  // -------------------------------------------------------------------------

  private async runPostActions(
    run: PipelineRun,
    pipeline: PipelineSpec,
    ctx: RunContext,
    outcome: RunOutcome,
    log: Logger,
  ): Promise<void> {
    const conditions: PostCondition[] = [
      'always',
      outcome === 'succeeded' ? 'success' : 'failure',
    ];

    for (const condition of conditions) {
      for (const action of pipeline.post[condition]) {
        const result = await this.runPostAction(action, condition, ctx, outcome);
        run.recordPost(result);
        if (result.outcome === 'failed') {
          log.warn('post-action failed', {
            condition,
            action: action.name,
            ok: false,
            duration_ms: result.durationMs,
            ...(result.error ? { error_code: result.error.code, error: result.error.message } : {}),
          });
        } else {
          log.info('post-action finished', {
            condition,
            action: action.name,
            ok: true,
            duration_ms: result.durationMs,
          });
        }
      }
    }
  }

  private async runPostAction(
    action: PostAction,
    condition: PostCondition,
    ctx: RunContext,
    outcome: RunOutcome,
  ): Promise<PostActionResult> {
    const startedAt = Date.now();
    const env = {
      ...stageEnvironment(ctx, { name: action.name, env: {} }),
      PIPEWRIGHT_OUTCOME: outcome,
    };
    const { settled, timedOut } = await this.execute(
      {
        runId: ctx.runId,
        stage: action.name,
        environment: action.environment,
        commands: action.commands,
        env,
        workspace: ctx.workspace,
      },
      this.defaultTimeoutMs,
    );

    const base: PostActionResult = {
      condition,
      name: action.name,
      outcome: 'failed',
      exitCode: null,
      durationMs: Date.now() - startedAt,
      stdout: '',
      stderr: '',
    };

    if (settled.kind === 'error') {
      return { ...base, error: toErrorPayload(settled.error, action.name) };
    }
    if (settled.kind === 'interrupted' || timedOut) {
      const partial = settled.kind === 'result' ? settled.result : undefined;
      return {
        ...base,
        exitCode: partial?.exitCode ?? null,
        stdout: partial?.stdout ?? '',
        stderr: partial?.stderr ?? '',
        error: new StageTimeoutError(action.name, this.defaultTimeoutMs).toPayload(),
      };
    }

    const { result } = settled;
    const post: PostActionResult = {
      ...base,
      outcome: result.outcome === 'succeeded' ? 'succeeded' : 'failed',
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      stdout: result.stdout,
      stderr: result.stderr,
    };
    if (result.error) post.error = result.error;
    return post;
  }
}
