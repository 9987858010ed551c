/**
 * Run report rendering: a plain-text summary for terminals and a JSON
 * document for machines. Both read only a {@link PipelineRunSnapshot}.
 */

import type { ErrorPayload } from '../types/errors.js';
import type {
  PipelineRunSnapshot,
  PostActionResult,
  RunOutcome,
  RunResult,
  StageOutcome,
} from '../types/pipeline.js';

export interface ReportOptions {
  /** Output lines shown under each failed stage. Default 20. */
  tailLines?: number;
}

const MARKERS: Record<StageOutcome, string> = {
  succeeded: 'PASS',
  failed: 'FAIL',
  skipped: 'SKIP',
};

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/** Last `n` non-empty lines of a stage's stdout followed by its stderr. */
export function outputTail(result: Pick<RunResult, 'stdout' | 'stderr'>, n: number): string[] {
  if (n <= 0) return [];
  const lines = `${result.stdout}\n${result.stderr}`
    .split('\n')
    .map((line) => line.replace(/\r$/, ''))
    .filter((line) => line.length > 0);
  return lines.slice(-n);
}

function detail(durationMs: number, exitCode: number | null, error?: ErrorPayload): string {
  const parts = [formatDuration(durationMs)];
  if (exitCode !== null) parts.push(`exit ${exitCode}`);
  const head = `(${parts.join(', ')})`;
  return error ? `${head} ${error.code}: ${error.message}` : head;
}

function stageLine(result: RunResult): string {
  const marker = MARKERS[result.outcome];
  if (result.outcome === 'skipped') return `  ${marker}  ${result.stage}`;
  return `  ${marker}  ${result.stage} ${detail(result.durationMs, result.exitCode, result.error)}`;
}

function postLine(result: PostActionResult): string {
  const marker = MARKERS[result.outcome];
  return `  ${marker}  ${result.condition}/${result.name} ${detail(result.durationMs, result.exitCode, result.error)}`;
}

function summary(outcome: RunOutcome | null, results: readonly RunResult[]): string {
  const count = (o: StageOutcome): number => results.filter((r) => r.outcome === o).length;
  const label = outcome === null ? 'INCOMPLETE' : outcome.toUpperCase();
  return `${label}: ${count('succeeded')} succeeded, ${count('failed')} failed, ${count('skipped')} skipped`;
}

/**
 * Render a run as text.
 *
 * @example
 * ```text
 * Pipeline order-service (run 3f2c...)
 *   PASS  build (1.2s, exit 0)
 *   FAIL  test (340ms, exit 1) STAGE_FAILED: Stage "test" exited with code 1
 *         | expected 3 but got 2
 *   SKIP  deploy
 * Post-actions:
 *   PASS  always/cleanup (12ms, exit 0)
 * FAILED: 1 succeeded, 1 failed, 1 skipped
 * ```
 */
export function formatReport(run: PipelineRunSnapshot, options: ReportOptions = {}): string {
  const tailLines = options.tailLines ?? 20;
  const lines: string[] = [`Pipeline ${run.pipeline} (run ${run.runId})`];

  for (const result of run.results) {
    lines.push(stageLine(result));
    if (result.outcome === 'failed') {
      for (const line of outputTail(result, tailLines)) {
        lines.push(`        | ${line}`);
      }
    }
  }

  if (run.postResults.length > 0) {
    lines.push('Post-actions:');
    for (const result of run.postResults) {
      lines.push(postLine(result));
      if (result.outcome === 'failed') {
        for (const line of outputTail(result, tailLines)) {
          lines.push(`        | ${line}`);
        }
      }
    }
  }

  if (run.fatalError) {
    lines.push(`  FATAL ${run.fatalError.code}: ${run.fatalError.message}`);
  }
  lines.push(summary(run.outcome, run.results));
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// JSON
// ---------------------------------------------------------------------------

export interface JsonStageReport {
  name: string;
  outcome: StageOutcome;
  exitCode: number | null;
  durationMs: number;
  error?: ErrorPayload;
  exports: Record<string, string>;
  /** Output tail, present for failed stages only. */
  output?: string[];
}

export interface JsonPostActionReport {
  condition: PostActionResult['condition'];
  name: string;
  outcome: PostActionResult['outcome'];
  exitCode: number | null;
  durationMs: number;
  error?: ErrorPayload;
}

export interface JsonReport {
  runId: string;
  pipeline: string;
  outcome: RunOutcome | null;
  startedAt: string | null;
  finishedAt: string | null;
  stages: JsonStageReport[];
  postActions: JsonPostActionReport[];
  fatalError?: ErrorPayload;
}

export function toJsonReport(run: PipelineRunSnapshot, options: ReportOptions = {}): JsonReport {
  const tailLines = options.tailLines ?? 20;
  const report: JsonReport = {
    runId: run.runId,
    pipeline: run.pipeline,
    outcome: run.outcome,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    stages: run.results.map((r) => {
      const stage: JsonStageReport = {
        name: r.stage,
        outcome: r.outcome,
        exitCode: r.exitCode,
        durationMs: r.durationMs,
        exports: { ...r.exports },
      };
      if (r.error) stage.error = { ...r.error };
      if (r.outcome === 'failed') stage.output = outputTail(r, tailLines);
      return stage;
    }),
    postActions: run.postResults.map((r) => {
      const action: JsonPostActionReport = {
        condition: r.condition,
        name: r.name,
        outcome: r.outcome,
        exitCode: r.exitCode,
        durationMs: r.durationMs,
      };
      if (r.error) action.error = { ...r.error };
      return action;
    }),
  };
  if (run.fatalError) report.fatalError = { ...run.fatalError };
  return report;
}
