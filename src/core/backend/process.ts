/**
 * Process plumbing shared by the shell and container backends.
 *
 * {@link RunProcessFn} is the injectable seam: production code uses
 * {@link defaultRunProcess}, tests pass a fake that records requests.
 */

import { execFile as execFileCb, spawn } from 'node:child_process';
import { constants as osConstants } from 'node:os';
import { promisify } from 'node:util';
import type { RunResult } from '../../types/pipeline.js';
import { InfrastructureError, StageExecutionFailure } from '../../types/errors.js';
import { createLogger } from '../logger.js';
import type { StageInvocation } from './backend.js';

const execFileAsync = promisify(execFileCb);

const logger = createLogger('backend:process');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProcessRequest {
  file: string;
  args: readonly string[];
  env: Record<string, string>;
  cwd: string;
  signal: AbortSignal;
  /** Delay between SIGTERM and SIGKILL once aborted. Default {@link KILL_AFTER_MS}. */
  killAfterMs?: number;
}

/** Stays below the sequencer's default kill grace. */
export const KILL_AFTER_MS = 3_000;

export interface ProcessOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Signal that terminated the process, if any. */
  signal: string | null;
}

/**
 * Run a process to completion. Resolves with the exit status whatever it
 * is; rejects with {@link InfrastructureError} only when the process
 * cannot be started at all.
 */
export type RunProcessFn = (request: ProcessRequest) => Promise<ProcessOutcome>;

/** Short-lived CLI call (e.g. `docker info`). Rejects on non-zero exit. */
export type ExecFn = (
  file: string,
  args: readonly string[],
) => Promise<{ stdout: string; stderr: string }>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const defaultExec: ExecFn = async (file, args) => {
  return execFileAsync(file, [...args], { encoding: 'utf-8' });
};

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (signal === null) return 1;
  return 128 + osConstants.signals[signal];
}

/**
 * Spawn in a new process group (`detached: true`) so that an abort can
 * terminate the whole tree with a single negative-pid kill. A group still
 * alive `killAfterMs` after SIGTERM gets SIGKILL.
 */
export const defaultRunProcess: RunProcessFn = (request) =>
  new Promise<ProcessOutcome>((resolve, reject) => {
    const child = spawn(request.file, [...request.args], {
      cwd: request.cwd,
      env: request.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    let killTimer: ReturnType<typeof setTimeout> | undefined;

    const killGroup = (signal: NodeJS.Signals): void => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, signal);
      } catch (err) {
        logger.debug('process group already gone', { pid: child.pid, signal, error: err });
      }
    };

    const onAbort = (): void => {
      killGroup('SIGTERM');
      killTimer = setTimeout(() => {
        logger.warn('process group ignored SIGTERM, killing', { pid: child.pid });
        killGroup('SIGKILL');
      }, request.killAfterMs ?? KILL_AFTER_MS);
    };

    if (request.signal.aborted) {
      onAbort();
    } else {
      request.signal.addEventListener('abort', onAbort, { once: true });
    }

    child.on('error', (err) => {
      request.signal.removeEventListener('abort', onAbort);
      clearTimeout(killTimer);
      reject(
        new InfrastructureError(`Failed to start "${request.file}": ${err.message}`, {
          cause: err,
        }),
      );
    });

    child.on('close', (code, signal) => {
      request.signal.removeEventListener('abort', onAbort);
      clearTimeout(killTimer);
      resolve({
        exitCode: code ?? signalExitCode(signal),
        stdout,
        stderr,
        signal,
      });
    });
  });

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Join command lines into one script that stops at the first failure. */
export function buildScript(commands: readonly string[]): string {
  return ['set -e', ...commands].join('\n');
}

/** Map a finished process onto a RunResult. Exports are filled in later. */
export function toRunResult(
  invocation: StageInvocation,
  outcome: ProcessOutcome,
  startedAt: number,
): RunResult {
  const result: RunResult = {
    stage: invocation.stage,
    outcome: outcome.exitCode === 0 ? 'succeeded' : 'failed',
    stdout: outcome.stdout,
    stderr: outcome.stderr,
    exitCode: outcome.exitCode,
    durationMs: Date.now() - startedAt,
    exports: {},
  };
  if (outcome.exitCode !== 0) {
    result.error = new StageExecutionFailure(invocation.stage, outcome.exitCode).toPayload();
  }
  return result;
}
