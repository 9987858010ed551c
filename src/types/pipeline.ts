/**
 * Pipeline model types for pipewright.
 *
 * A {@link PipelineSpec} is the validated, immutable form of a pipeline
 * document. The runtime side ({@link RunResult}, {@link PipelineRunSnapshot})
 * is what the sequencer produces and the report renders.
 */

import type { ErrorPayload } from './errors.js';

// ---------------------------------------------------------------------------
// Execution environment
// ---------------------------------------------------------------------------

/** A bind-mount from the host into a stage container. */
export interface VolumeMount {
  /** Path on the host. Relative paths resolve against the workspace. */
  source: string;
  /** Absolute path inside the container. */
  target: string;
  readonly: boolean;
}

/** Run the stage's commands in the host shell ("inherit host"). */
export interface HostEnvironment {
  kind: 'host';
}

/** Run the stage's commands inside a container image. */
export interface ContainerEnvironment {
  kind: 'container';
  /** Image reference, e.g. `"maven:3.9-eclipse-temurin-17"`. */
  image: string;
  mounts: VolumeMount[];
  /** Extra arguments passed to the engine's `run`, e.g. `["--network", "host"]`. */
  args: string[];
}

export type ExecutionEnvironment = HostEnvironment | ContainerEnvironment;

// ---------------------------------------------------------------------------
// Stage
// ---------------------------------------------------------------------------

export type ErrorPolicy = 'fail-fast' | 'continue-on-error';

/** Paths captured under a key after a stage succeeds. */
export interface StashSpec {
  key: string;
  /** Workspace-relative files or directories. */
  paths: string[];
}

export interface StageSpec {
  /** Unique within the pipeline. */
  name: string;
  environment: ExecutionEnvironment;
  /** Shell command lines, run in order with `set -e` semantics. */
  commands: string[];
  /** Guard expression source text, if the stage is conditional. */
  guard?: string;
  errorPolicy: ErrorPolicy;
  /**
   * Whether a failure of this stage turns the run outcome to `failed`.
   * Only meaningful with `continue-on-error`; a fail-fast failure always does.
   */
  affectsOutcome: boolean;
  /** Stage-local environment overlay. */
  env: Record<string, string>;
  /** Per-stage deadline. Falls back to the configured default. */
  timeoutMs?: number;
  stash: StashSpec[];
  unstash: string[];
}

/** Stash keys name a directory under the run's artifact namespace. */
export const ARTIFACT_KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Longest deadline a timer can hold (2^31 - 1 ms, about 24.8 days). */
export const MAX_TIMEOUT_MS = 2_147_483_647;

// ---------------------------------------------------------------------------
// Post-actions
// ---------------------------------------------------------------------------

export type PostCondition = 'always' | 'success' | 'failure';

export const POST_CONDITIONS: readonly PostCondition[] = ['always', 'success', 'failure'];

export interface PostAction {
  name: string;
  environment: ExecutionEnvironment;
  commands: string[];
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface PipelineSpec {
  name: string;
  stages: readonly StageSpec[];
  /** Global environment, visible to every stage. */
  environment: Record<string, string>;
  post: Record<PostCondition, readonly PostAction[]>;
}

// ---------------------------------------------------------------------------
// Runtime results
// ---------------------------------------------------------------------------

export type StageOutcome = 'succeeded' | 'failed' | 'skipped';

export type RunOutcome = 'succeeded' | 'failed' | 'aborted';

export interface RunResult {
  stage: string;
  outcome: StageOutcome;
  stdout: string;
  stderr: string;
  /** `null` when no process ran (skipped, guard error, missing artifact). */
  exitCode: number | null;
  durationMs: number;
  error?: ErrorPayload;
  /** Environment updates the stage published for later stages. */
  exports: Record<string, string>;
}

/** Result of one post-action. Post-actions never re-enter the stage loop. */
export interface PostActionResult {
  condition: PostCondition;
  name: string;
  outcome: Exclude<StageOutcome, 'skipped'>;
  exitCode: number | null;
  durationMs: number;
  stdout: string;
  stderr: string;
  error?: ErrorPayload;
}

export type RunPhase = 'pending' | 'running' | 'post-actions' | 'aborted' | 'completed';

/** Read-only view of a pipeline run, handed to reporters. */
export interface PipelineRunSnapshot {
  runId: string;
  pipeline: string;
  phase: RunPhase;
  outcome: RunOutcome | null;
  results: readonly RunResult[];
  postResults: readonly PostActionResult[];
  startedAt: string | null;
  finishedAt: string | null;
  fatalError?: ErrorPayload;
}
