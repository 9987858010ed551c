/**
 * Mock execution backend for testing.
 *
 * Implements {@link ExecutionBackend} with scripted, in-memory outcomes so
 * the sequencer can be exercised without spawning anything. Every stage
 * succeeds with empty output unless scripted otherwise.
 *
 * Supports failure simulation: non-zero exits, infrastructure errors, and
 * stages that hang until their signal fires.
 */

import type { RunResult } from '../../types/pipeline.js';
import { InfrastructureError } from '../../types/errors.js';
import type { ExecutionBackend, StageInvocation } from './backend.js';
import { toRunResult } from './process.js';

// ---------------------------------------------------------------------------
// Scripted outcome
// ---------------------------------------------------------------------------

export interface ScriptedOutcome {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  /** Never finish on its own; resolve with exit 143 once aborted. */
  hang?: boolean;
  /** Never finish and ignore the abort signal entirely. */
  ignoreAbort?: boolean;
  /** Finish only after this many milliseconds. */
  delayMs?: number;
  /** Throw an InfrastructureError with this message instead of running. */
  infrastructureError?: string;
}

// ---------------------------------------------------------------------------
// MockBackend
// ---------------------------------------------------------------------------

export class MockBackend implements ExecutionBackend {
  readonly name = 'mock';

  /** Every invocation received, in order. */
  readonly invocations: StageInvocation[] = [];

  private readonly scripts = new Map<string, ScriptedOutcome>();

  /** Script the outcome for every future invocation of `stage`. */
  script(stage: string, outcome: ScriptedOutcome): this {
    this.scripts.set(stage, outcome);
    return this;
  }

  /** Make `stage` exit with `exitCode`. */
  simulateFailure(stage: string, exitCode = 1, stderr = ''): this {
    return this.script(stage, { exitCode, stderr });
  }

  /** Make `stage` throw an infrastructure error. */
  simulateInfrastructureFailure(stage: string, message = 'backend unreachable'): this {
    return this.script(stage, { infrastructureError: message });
  }

  /** Make `stage` hang until its invocation is aborted. */
  simulateHang(stage: string): this {
    return this.script(stage, { hang: true });
  }

  async run(invocation: StageInvocation): Promise<RunResult> {
    this.invocations.push(invocation);
    const scripted = this.scripts.get(invocation.stage) ?? {};
    const startedAt = Date.now();

    if (scripted.infrastructureError !== undefined) {
      throw new InfrastructureError(scripted.infrastructureError, { stage: invocation.stage });
    }

    if (scripted.delayMs !== undefined) {
      await new Promise<void>((resolve) => setTimeout(resolve, scripted.delayMs));
    }

    if (scripted.ignoreAbort) {
      return new Promise<RunResult>(() => {
        // Intentionally never settles.
      });
    }

    if (scripted.hang) {
      await new Promise<void>((resolve) => {
        if (invocation.signal.aborted) {
          resolve();
          return;
        }
        invocation.signal.addEventListener('abort', () => resolve(), { once: true });
      });
      return toRunResult(
        invocation,
        { exitCode: 143, stdout: scripted.stdout ?? '', stderr: 'terminated', signal: 'SIGTERM' },
        startedAt,
      );
    }

    return toRunResult(
      invocation,
      {
        exitCode: scripted.exitCode ?? 0,
        stdout: scripted.stdout ?? '',
        stderr: scripted.stderr ?? '',
        signal: null,
      },
      startedAt,
    );
  }

  // -----------------------------------------------------------------------
  // Inspection helpers (test-only)
  // -----------------------------------------------------------------------

  /** Names of every invoked stage or post-action, in order. */
  invokedStages(): string[] {
    return this.invocations.map((i) => i.stage);
  }

  reset(): void {
    this.invocations.length = 0;
    this.scripts.clear();
  }
}
