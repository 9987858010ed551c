/**
 * Immutable run context.
 *
 * Each stage receives a frozen snapshot. The only way the environment
 * changes between stages is through a stage's exports, which produce a
 * new snapshot via {@link withExports}; the previous snapshot is never
 * mutated.
 */

import type { StageSpec } from '../types/pipeline.js';
import type { GuardContext } from './guard.js';

export interface RunContext {
  readonly runId: string;
  readonly pipeline: string;
  readonly branch?: string;
  readonly buildNumber?: number;
  /** Absolute workspace directory stages run in. */
  readonly workspace: string;
  /** Pipeline environment plus everything exported so far. */
  readonly env: Readonly<Record<string, string>>;
}

export interface RunContextInit {
  runId: string;
  pipeline: string;
  workspace: string;
  branch?: string;
  buildNumber?: number;
  env?: Record<string, string>;
}

export function createRunContext(init: RunContextInit): RunContext {
  const ctx: RunContext = {
    runId: init.runId,
    pipeline: init.pipeline,
    workspace: init.workspace,
    env: Object.freeze({ ...init.env }),
    ...(init.branch !== undefined ? { branch: init.branch } : {}),
    ...(init.buildNumber !== undefined ? { buildNumber: init.buildNumber } : {}),
  };
  return Object.freeze(ctx);
}

/** Return a new context with `exports` layered over the current env. */
export function withExports(ctx: RunContext, exports: Record<string, string>): RunContext {
  if (Object.keys(exports).length === 0) return ctx;
  return Object.freeze({ ...ctx, env: Object.freeze({ ...ctx.env, ...exports }) });
}

export function guardContext(ctx: RunContext): GuardContext {
  const guard: GuardContext = { env: ctx.env };
  if (ctx.branch !== undefined) guard.branch = ctx.branch;
  if (ctx.buildNumber !== undefined) guard.buildNumber = ctx.buildNumber;
  return guard;
}

/**
 * The environment a stage's commands see: run env, then the stage's own
 * overlay, then the built-in variables (which cannot be overridden).
 */
export function stageEnvironment(
  ctx: RunContext,
  stage: Pick<StageSpec, 'name' | 'env'>,
): Record<string, string> {
  const builtins: Record<string, string> = {
    PIPEWRIGHT_RUN_ID: ctx.runId,
    PIPEWRIGHT_PIPELINE: ctx.pipeline,
    PIPEWRIGHT_STAGE: stage.name,
    WORKSPACE: ctx.workspace,
  };
  if (ctx.branch !== undefined) builtins['BRANCH_NAME'] = ctx.branch;
  if (ctx.buildNumber !== undefined) builtins['BUILD_NUMBER'] = String(ctx.buildNumber);

  return { ...ctx.env, ...stage.env, ...builtins };
}

// ---------------------------------------------------------------------------
// Exports
// ---------------------------------------------------------------------------

const EXPORT_LINE = /^::export ([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;

/**
 * Collect `::export NAME=value` lines from a stage's stdout. A later line
 * for the same name wins.
 */
export function parseExports(stdout: string): Record<string, string> {
  const exports: Record<string, string> = {};
  for (const line of stdout.split('\n')) {
    const match = EXPORT_LINE.exec(line.replace(/\r$/, ''));
    if (match) {
      exports[match[1]] = match[2];
    }
  }
  return exports;
}
