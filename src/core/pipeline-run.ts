/**
 * PipelineRun: the mutable record of one run, owned by the sequencer.
 *
 * Phase transitions are checked; an illegal transition is a programming
 * error and throws. Reporters only ever see a {@link PipelineRunSnapshot}.
 *
 *   pending ──▶ running ──▶ running (next stage)
 *                  │  └───▶ aborted ──▶ post-actions ──▶ completed
 *                  └──────────────────▶ post-actions
 */

import type { ErrorPayload } from '../types/errors.js';
import type {
  PipelineRunSnapshot,
  PostActionResult,
  RunOutcome,
  RunPhase,
  RunResult,
} from '../types/pipeline.js';

const TRANSITIONS: Record<RunPhase, readonly RunPhase[]> = {
  pending: ['running', 'aborted', 'post-actions'],
  running: ['running', 'aborted', 'post-actions'],
  aborted: ['post-actions'],
  'post-actions': ['completed'],
  completed: [],
};

export class PipelineRun {
  private phaseValue: RunPhase = 'pending';
  private outcomeValue: RunOutcome | null = null;
  private readonly results: RunResult[] = [];
  private readonly postResults: PostActionResult[] = [];
  private startedAt: string | null = null;
  private finishedAt: string | null = null;
  private fatalError?: ErrorPayload;
  private currentStage: string | null = null;

  constructor(
    readonly runId: string,
    readonly pipeline: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get phase(): RunPhase {
    return this.phaseValue;
  }

  get outcome(): RunOutcome | null {
    return this.outcomeValue;
  }

  /** Name of the stage in `Running(stage)`, or null outside that phase. */
  get stage(): string | null {
    return this.currentStage;
  }

  private transition(next: RunPhase): void {
    if (!TRANSITIONS[this.phaseValue].includes(next)) {
      throw new Error(`Illegal run transition: ${this.phaseValue} → ${next}`);
    }
    this.phaseValue = next;
  }

  beginStage(stage: string): void {
    if (this.startedAt === null) {
      this.startedAt = this.now().toISOString();
    }
    this.transition('running');
    this.currentStage = stage;
  }

  record(result: RunResult): void {
    this.results.push(result);
  }

  /** Enter `Aborted`. `error` is set for infrastructure failures. */
  abort(error?: ErrorPayload): void {
    if (this.startedAt === null) {
      this.startedAt = this.now().toISOString();
    }
    this.transition('aborted');
    this.currentStage = null;
    if (error !== undefined) {
      this.fatalError = error;
    }
  }

  /** Fix the overall outcome and enter `PostActions`. */
  enterPostActions(outcome: RunOutcome, fatalError?: ErrorPayload): void {
    if (this.startedAt === null) {
      this.startedAt = this.now().toISOString();
    }
    this.transition('post-actions');
    this.currentStage = null;
    this.outcomeValue = outcome;
    if (fatalError !== undefined && this.fatalError === undefined) {
      this.fatalError = fatalError;
    }
  }

  recordPost(result: PostActionResult): void {
    if (this.phaseValue !== 'post-actions') {
      throw new Error(`Cannot record a post-action in phase ${this.phaseValue}`);
    }
    this.postResults.push(result);
  }

  complete(): void {
    this.transition('completed');
    this.finishedAt = this.now().toISOString();
  }

  snapshot(): PipelineRunSnapshot {
    const snapshot: PipelineRunSnapshot = {
      runId: this.runId,
      pipeline: this.pipeline,
      phase: this.phaseValue,
      outcome: this.outcomeValue,
      results: this.results.map((r) => ({ ...r, exports: { ...r.exports } })),
      postResults: this.postResults.map((r) => ({ ...r })),
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
    };
    if (this.fatalError !== undefined) {
      snapshot.fatalError = { ...this.fatalError };
    }
    return snapshot;
  }
}
