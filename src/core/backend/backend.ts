/**
 * Execution backend interface.
 *
 * A backend runs one stage's (or post-action's) commands and reports the
 * outcome. A non-zero exit is a normal `failed` {@link RunResult}; a
 * backend throws only for infrastructure failures (binary missing,
 * daemon unreachable), as an {@link InfrastructureError}.
 *
 * Cancellation arrives through {@link StageInvocation.signal}. A backend
 * must stop the underlying work (process group, container) when it fires.
 */

import type { ExecutionEnvironment, RunResult } from '../../types/pipeline.js';

/** Everything a backend needs to run one unit of work. */
export interface StageInvocation {
  runId: string;
  /** Stage or post-action name. */
  stage: string;
  environment: ExecutionEnvironment;
  commands: readonly string[];
  /** Fully merged environment for the commands. */
  env: Record<string, string>;
  /** Absolute workspace directory. */
  workspace: string;
  signal: AbortSignal;
}

export interface ExecutionBackend {
  /** Short identifier used in logs (e.g. `'shell'`, `'docker'`). */
  readonly name: string;
  run(invocation: StageInvocation): Promise<RunResult>;
}
