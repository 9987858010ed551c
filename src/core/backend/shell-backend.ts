/**
 * Host shell backend ("inherit host" stages).
 *
 * Runs the stage script with `sh -c` in the workspace, in its own process
 * group. The host environment is inherited and the stage environment is
 * layered on top.
 */

import type { RunResult } from '../../types/pipeline.js';
import { InfrastructureError } from '../../types/errors.js';
import type { ExecutionBackend, StageInvocation } from './backend.js';
import { buildScript, defaultRunProcess, toRunResult } from './process.js';
import type { RunProcessFn } from './process.js';

export interface ShellBackendOptions {
  /** Injectable process runner for testing. */
  runProcess?: RunProcessFn;
  /** Shell binary. Defaults to `/bin/sh`. */
  shell?: string;
  /** Base environment inherited by every stage. Defaults to `process.env`. */
  inheritEnv?: NodeJS.ProcessEnv;
}

function definedEntries(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

export class ShellBackend implements ExecutionBackend {
  readonly name = 'shell';

  private readonly runProcess: RunProcessFn;
  private readonly shell: string;
  private readonly baseEnv: Record<string, string>;

  constructor(options?: ShellBackendOptions) {
    this.runProcess = options?.runProcess ?? defaultRunProcess;
    this.shell = options?.shell ?? '/bin/sh';
    this.baseEnv = definedEntries(options?.inheritEnv ?? process.env);
  }

  async run(invocation: StageInvocation): Promise<RunResult> {
    if (invocation.environment.kind !== 'host') {
      throw new InfrastructureError(
        `Shell backend cannot run containerized stage "${invocation.stage}"`,
        { stage: invocation.stage },
      );
    }

    const startedAt = Date.now();
    const outcome = await this.runProcess({
      file: this.shell,
      args: ['-c', buildScript(invocation.commands)],
      env: { ...this.baseEnv, ...invocation.env },
      cwd: invocation.workspace,
      signal: invocation.signal,
    });
    return toRunResult(invocation, outcome, startedAt);
  }
}
