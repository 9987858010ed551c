/**
 * Stage and pipeline descriptors.
 *
 * `defineStage` / `definePipeline` are the only way a {@link StageSpec} or
 * {@link PipelineSpec} comes into existence. They validate at construction
 * time and return deep-frozen objects, so a spec handed to the sequencer
 * can never change underneath it.
 */

import type {
  ErrorPolicy,
  ExecutionEnvironment,
  PipelineSpec,
  PostAction,
  PostCondition,
  StageSpec,
  StashSpec,
} from '../types/pipeline.js';
import { ARTIFACT_KEY_PATTERN, MAX_TIMEOUT_MS, POST_CONDITIONS } from '../types/pipeline.js';
import { ConfigError, isPipelineError } from '../types/errors.js';
import { isStaticallyFalse, parseGuard } from './guard.js';

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface StageInit {
  name: string;
  commands: string[];
  environment?: ExecutionEnvironment;
  guard?: string;
  errorPolicy?: ErrorPolicy;
  affectsOutcome?: boolean;
  env?: Record<string, string>;
  timeoutMs?: number;
  stash?: StashSpec[];
  unstash?: string[];
}

export interface PostActionInit {
  name: string;
  commands: string[];
  environment?: ExecutionEnvironment;
}

export interface PipelineInit {
  name: string;
  stages: StageInit[];
  environment?: Record<string, string>;
  post?: Partial<Record<PostCondition, PostActionInit[]>>;
}

const HOST: ExecutionEnvironment = { kind: 'host' };

const KEY_RULE = 'must start with a letter or digit and contain only letters, digits, ".", "_" or "-"';

// ---------------------------------------------------------------------------
// Freezing
// ---------------------------------------------------------------------------

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function cloneEnvironment(environment: ExecutionEnvironment): ExecutionEnvironment {
  if (environment.kind === 'host') return { kind: 'host' };
  return {
    kind: 'container',
    image: environment.image,
    mounts: environment.mounts.map((m) => ({ ...m })),
    args: [...environment.args],
  };
}

// ---------------------------------------------------------------------------
// defineStage
// ---------------------------------------------------------------------------

/**
 * Validate and freeze a single stage.
 *
 * Rules: the name is non-empty; the guard (if any) parses; the command list
 * is non-empty unless the guard is statically false; `timeoutMs` is
 * positive and fits a timer; stash and unstash keys are single path-safe
 * segments, and stash keys are unique within the stage.
 *
 * @throws ConfigError listing every rule the stage breaks.
 */
export function defineStage(init: StageInit): StageSpec {
  const problems: string[] = [];
  const label = init.name.trim().length > 0 ? `stage "${init.name}"` : 'stage';

  if (init.name.trim().length === 0) {
    problems.push('stage name must be non-empty');
  }

  let staticallyFalse = false;
  if (init.guard !== undefined) {
    try {
      staticallyFalse = isStaticallyFalse(parseGuard(init.guard));
    } catch (err) {
      if (!isPipelineError(err)) throw err;
      problems.push(`${label}: ${err.message}`);
    }
  }

  if (init.commands.length === 0 && !staticallyFalse) {
    problems.push(`${label}: command list must be non-empty`);
  }

  if (init.timeoutMs !== undefined && !(init.timeoutMs > 0)) {
    problems.push(`${label}: timeout must be positive`);
  } else if (init.timeoutMs !== undefined && init.timeoutMs > MAX_TIMEOUT_MS) {
    problems.push(`${label}: timeout must not exceed ${MAX_TIMEOUT_MS}ms`);
  }

  const stashKeys = new Set<string>();
  for (const entry of init.stash ?? []) {
    if (!ARTIFACT_KEY_PATTERN.test(entry.key)) {
      problems.push(`${label}: stash key "${entry.key}" ${KEY_RULE}`);
    }
    if (stashKeys.has(entry.key)) {
      problems.push(`${label}: stash key "${entry.key}" declared twice`);
    }
    stashKeys.add(entry.key);
  }
  for (const key of init.unstash ?? []) {
    if (!ARTIFACT_KEY_PATTERN.test(key)) {
      problems.push(`${label}: unstash key "${key}" ${KEY_RULE}`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(problems[0], problems);
  }

  const stage: StageSpec = {
    name: init.name,
    environment: cloneEnvironment(init.environment ?? HOST),
    commands: [...init.commands],
    errorPolicy: init.errorPolicy ?? 'fail-fast',
    affectsOutcome: init.affectsOutcome ?? true,
    env: { ...init.env },
    stash: (init.stash ?? []).map((s) => ({ key: s.key, paths: [...s.paths] })),
    unstash: [...(init.unstash ?? [])],
  };
  if (init.guard !== undefined) stage.guard = init.guard;
  if (init.timeoutMs !== undefined) stage.timeoutMs = init.timeoutMs;

  return deepFreeze(stage);
}

// ---------------------------------------------------------------------------
// definePipeline
// ---------------------------------------------------------------------------

/**
 * Validate and freeze a whole pipeline.
 *
 * On top of the per-stage rules: stage names are unique, and every
 * `unstash` key is stashed by some earlier stage.
 *
 * @throws ConfigError listing every problem found across all stages.
 */
export function definePipeline(init: PipelineInit): PipelineSpec {
  const problems: string[] = [];
  const stages: StageSpec[] = [];
  const seenNames = new Set<string>();
  const stashedSoFar = new Set<string>();

  if (init.name.trim().length === 0) {
    problems.push('pipeline name must be non-empty');
  }

  for (const stageInit of init.stages) {
    if (seenNames.has(stageInit.name)) {
      problems.push(`duplicate stage name "${stageInit.name}"`);
    }
    seenNames.add(stageInit.name);

    for (const key of stageInit.unstash ?? []) {
      if (!stashedSoFar.has(key)) {
        problems.push(
          `stage "${stageInit.name}": unstash key "${key}" is not stashed by an earlier stage`,
        );
      }
    }
    for (const entry of stageInit.stash ?? []) {
      stashedSoFar.add(entry.key);
    }

    try {
      stages.push(defineStage(stageInit));
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      problems.push(...err.problems);
    }
  }

  const post: Record<PostCondition, PostAction[]> = { always: [], success: [], failure: [] };
  for (const condition of POST_CONDITIONS) {
    for (const action of init.post?.[condition] ?? []) {
      if (action.commands.length === 0) {
        problems.push(`post.${condition} "${action.name}": command list must be non-empty`);
        continue;
      }
      post[condition].push({
        name: action.name,
        environment: cloneEnvironment(action.environment ?? HOST),
        commands: [...action.commands],
      });
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid pipeline "${init.name}": ${problems[0]}`, problems);
  }

  return deepFreeze({
    name: init.name,
    stages,
    environment: { ...init.environment },
    post,
  });
}
