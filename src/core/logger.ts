/**
 * Structured JSON logging for pipewright.
 *
 * Loggers are scoped to a component and may carry run context (run ID,
 * pipeline, stage) that is stamped onto every entry. Entries go to a single
 * process-wide sink, stderr by default, so stdout stays free for the run
 * report. Tests swap the sink with {@link configureLogging}.
 *
 * @example
 * ```ts
 * const logger = createLogger('sequencer');
 * logger.info('stage started', { stage: 'build' });
 * // → {"level":"info","ts":"...","component":"sequencer","msg":"stage started","stage":"build"}
 * ```
 */

import { mkdirSync, appendFileSync } from 'node:fs';
import { dirname } from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  run?: string;
  pipeline?: string;
  stage?: string;
  duration_ms?: number;
  ok?: boolean;
  error_code?: string;
  meta?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LogContext {
  run?: string;
  pipeline?: string;
  stage?: string;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  /** Same component, with `ctx` merged over the bound context. */
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Process-wide state
// ---------------------------------------------------------------------------

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LoggingState {
  level: LogLevel;
  sink: LogSink;
}

const DEFAULT_STATE: LoggingState = { level: 'info', sink: defaultSink };

let state: LoggingState = { ...DEFAULT_STATE };

export function configureLogging(options: Partial<LoggingState>): void {
  state = {
    level: options.level ?? state.level,
    sink: options.sink ?? state.sink,
  };
}

export function resetLogging(): void {
  state = { ...DEFAULT_STATE };
}

export function defaultSink(entry: LogEntry): void {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

/** Fan one entry out to several sinks. */
export function teeSinks(...sinks: LogSink[]): LogSink {
  return (entry) => sinks.forEach((sink) => sink(entry));
}

function enabled(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(state.level);
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

/** A meta key containing any of these (case-insensitive) is never logged. */
export const REDACTED_KEY_PARTS: readonly string[] = [
  'password',
  'secret',
  'token',
  'credential',
  'authorization',
  'apikey',
  'api_key',
];

export const META_STRING_MAX_LENGTH = 1024;

function isRedacted(key: string): boolean {
  const lower = key.toLowerCase();
  return REDACTED_KEY_PARTS.some((part) => lower.includes(part));
}

function toLoggable(value: unknown): unknown {
  if (value instanceof Error) {
    const error: Record<string, unknown> = { name: value.name, message: value.message };
    if ('code' in value && typeof value.code === 'string') error['code'] = value.code;
    return error;
  }
  if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
    return `${value.slice(0, META_STRING_MAX_LENGTH)}...[truncated]`;
  }
  return value;
}

/** Move a well-known meta field onto the entry itself. Returns false if `key` is not one. */
function promote(entry: LogEntry, key: string, value: unknown): boolean {
  switch (key) {
    case 'run':
      if (typeof value !== 'string') return false;
      entry.run = value;
      return true;
    case 'pipeline':
      if (typeof value !== 'string') return false;
      entry.pipeline = value;
      return true;
    case 'stage':
      if (typeof value !== 'string') return false;
      entry.stage = value;
      return true;
    case 'error_code':
      if (typeof value !== 'string') return false;
      entry.error_code = value;
      return true;
    case 'duration_ms':
      if (typeof value !== 'number') return false;
      entry.duration_ms = value;
      return true;
    case 'ok':
      if (typeof value !== 'boolean') return false;
      entry.ok = value;
      return true;
    default:
      return false;
  }
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

export function createLogger(component: string, context: LogContext = {}): Logger {
  const emit = (level: LogLevel, msg: string, meta: Record<string, unknown> = {}): void => {
    if (!enabled(level)) return;

    const entry: LogEntry = { level, ts: new Date().toISOString(), component, msg };
    if (context.run) entry.run = context.run;
    if (context.pipeline) entry.pipeline = context.pipeline;
    if (context.stage) entry.stage = context.stage;

    const rest: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(meta)) {
      if (isRedacted(key) || promote(entry, key, value)) continue;
      rest[key] = toLoggable(value);
    }
    if (Object.keys(rest).length > 0) entry.meta = rest;

    state.sink(entry);
  };

  return {
    debug: (msg, meta) => emit('debug', msg, meta),
    info: (msg, meta) => emit('info', msg, meta),
    warn: (msg, meta) => emit('warn', msg, meta),
    error: (msg, meta) => emit('error', msg, meta),
    withContext: (ctx) => createLogger(component, { ...context, ...ctx }),
  };
}

// ---------------------------------------------------------------------------
// Stage output
// ---------------------------------------------------------------------------

/** Logs a finished stage's captured output, one debug entry per non-empty line. */
export class StageLogRouter {
  private readonly logger: Logger;

  constructor(runId: string, stage: string) {
    this.logger = createLogger('stage-output', { run: runId, stage });
  }

  /** stdout lines first, then stderr; each tagged with its stream. */
  route(output: { stdout: string; stderr: string }): void {
    for (const stream of ['stdout', 'stderr'] as const) {
      for (const line of output[stream].split('\n')) {
        if (line.length > 0) this.logger.debug(line, { stream });
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Run log files
// ---------------------------------------------------------------------------

export interface RunLogFs {
  mkdirSync: (path: string, options: { recursive: boolean }) => void;
  appendFileSync: (path: string, data: string) => void;
}

/** JSONL log of one run, usually `<home>/logs/<runId>.jsonl`. */
export class RunLogFile {
  private open = true;

  constructor(
    readonly path: string,
    private readonly fs: RunLogFs = { mkdirSync, appendFileSync },
  ) {
    fs.mkdirSync(dirname(path), { recursive: true });
  }

  /** Sink that appends to this file until {@link close} is called. */
  readonly sink: LogSink = (entry) => {
    if (this.open) this.fs.appendFileSync(this.path, `${JSON.stringify(entry)}\n`);
  };

  close(): void {
    this.open = false;
  }
}
