/**
 * Container backend for stages with an `image` agent.
 *
 * Shells out to the engine CLI (`docker` or `podman`) with `run --rm`.
 * There is no engine SDK dependency.
 *
 * Engine differences:
 * - **Docker**: standard bind mounts; `:ro` for read-only mounts.
 * - **Podman**: appends `:Z` to every bind mount for SELinux relabeling
 *   and runs with `--userns=keep-id` so workspace files stay owned by
 *   the invoking user.
 *
 * Stage environment values are passed as `-e NAME` with the value in the
 * engine process's own environment, so they never appear on its command
 * line.
 */

import { isAbsolute, resolve } from 'node:path';
import type { ContainerEnvironment, RunResult, VolumeMount } from '../../types/pipeline.js';
import type { ContainerEngine } from '../../types/config.js';
import { InfrastructureError } from '../../types/errors.js';
import { createLogger } from '../logger.js';
import type { ExecutionBackend, StageInvocation } from './backend.js';
import { buildScript, defaultExec, defaultRunProcess, toRunResult } from './process.js';
import type { ExecFn, RunProcessFn } from './process.js';

const logger = createLogger('backend:container');

/** Where the workspace is mounted inside every stage container. */
export const CONTAINER_WORKSPACE = '/workspace';

/** `WORKSPACE` names the host checkout; inside the container it is the mount point. */
function inContainer(env: Record<string, string>): Record<string, string> {
  if (env['WORKSPACE'] === undefined) return env;
  return { ...env, WORKSPACE: CONTAINER_WORKSPACE };
}

/** Engine exit code for "the engine itself failed", as opposed to the command. */
const ENGINE_ERROR_EXIT = 125;

const DAEMON_UNREACHABLE =
  /Cannot connect to the (Docker|Podman) daemon|Is the docker daemon running|unable to connect to Podman/i;

export interface ContainerBackendOptions {
  engine?: ContainerEngine;
  /** Path to the engine binary. Defaults to the engine name. */
  enginePath?: string;
  runProcess?: RunProcessFn;
  exec?: ExecFn;
  /** Host environment the engine CLI itself runs with. Defaults to `process.env`. */
  inheritEnv?: NodeJS.ProcessEnv;
}

export class ContainerBackend implements ExecutionBackend {
  readonly name: ContainerEngine;

  private readonly enginePath: string;
  private readonly runProcess: RunProcessFn;
  private readonly exec: ExecFn;
  private readonly baseEnv: Record<string, string>;
  private counter = 0;

  constructor(options?: ContainerBackendOptions) {
    this.name = options?.engine ?? 'docker';
    this.enginePath = options?.enginePath ?? this.name;
    this.runProcess = options?.runProcess ?? defaultRunProcess;
    this.exec = options?.exec ?? defaultExec;
    this.baseEnv = {};
    for (const [key, value] of Object.entries(options?.inheritEnv ?? process.env)) {
      if (value !== undefined) this.baseEnv[key] = value;
    }
  }

  /** Check whether the engine binary is installed and its daemon responds. */
  async isAvailable(): Promise<boolean> {
    try {
      await this.exec(this.enginePath, ['info']);
      return true;
    } catch (err) {
      logger.debug('engine not available', { engine: this.name, error: err });
      return false;
    }
  }

  async run(invocation: StageInvocation): Promise<RunResult> {
    const environment = invocation.environment;
    if (environment.kind !== 'container') {
      throw new InfrastructureError(
        `Container backend cannot run host stage "${invocation.stage}"`,
        { stage: invocation.stage },
      );
    }

    this.counter += 1;
    const containerName = containerNameFor(invocation.runId, invocation.stage, this.counter);
    const env = inContainer(invocation.env);
    const args = this.buildRunArgs({ ...invocation, env }, environment, containerName);

    const killContainer = (): void => {
      this.exec(this.enginePath, ['kill', containerName]).catch((err: unknown) => {
        logger.debug('container already gone', { container: containerName, error: err });
      });
    };
    invocation.signal.addEventListener('abort', killContainer, { once: true });

    const startedAt = Date.now();
    try {
      const outcome = await this.runProcess({
        file: this.enginePath,
        args,
        env: { ...this.baseEnv, ...env },
        cwd: invocation.workspace,
        signal: invocation.signal,
      });

      if (outcome.exitCode === ENGINE_ERROR_EXIT && DAEMON_UNREACHABLE.test(outcome.stderr)) {
        throw new InfrastructureError(
          `${this.name} daemon unreachable: ${outcome.stderr.trim().split('\n')[0]}`,
          { stage: invocation.stage },
        );
      }
      return toRunResult(invocation, outcome, startedAt);
    } finally {
      invocation.signal.removeEventListener('abort', killContainer);
    }
  }

  /** Build the full `run` argument list for a stage. */
  buildRunArgs(
    invocation: StageInvocation,
    environment: ContainerEnvironment,
    containerName: string,
  ): string[] {
    const args: string[] = ['run', '--rm', '--name', containerName];

    if (this.name === 'podman') {
      args.push('--userns=keep-id');
    }

    args.push('-v', this.mountSpec(invocation.workspace, CONTAINER_WORKSPACE, false));
    args.push('-w', CONTAINER_WORKSPACE);

    for (const mount of environment.mounts) {
      args.push('-v', this.formatMount(mount, invocation.workspace));
    }

    for (const key of Object.keys(invocation.env).sort()) {
      args.push('-e', key);
    }

    args.push(...environment.args);
    args.push(environment.image, 'sh', '-c', buildScript(invocation.commands));
    return args;
  }

  private formatMount(mount: VolumeMount, workspace: string): string {
    const source = isAbsolute(mount.source) ? mount.source : resolve(workspace, mount.source);
    return this.mountSpec(source, mount.target, mount.readonly);
  }

  private mountSpec(source: string, target: string, readonly: boolean): string {
    const options: string[] = [];
    if (readonly) options.push('ro');
    if (this.name === 'podman') options.push('Z');
    const suffix = options.length > 0 ? `:${options.join(',')}` : '';
    return `${source}:${target}${suffix}`;
  }
}

/** Engine-safe container name: `pipewright-<run8>-<stage>-<n>`. */
export function containerNameFor(runId: string, stage: string, counter: number): string {
  const slug = stage
    .toLowerCase()
    .replace(/[^a-z0-9_.-]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return `pipewright-${runId.slice(0, 8)}-${slug || 'stage'}-${counter}`;
}
