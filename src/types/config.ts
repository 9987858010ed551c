/**
 * pipewright configuration schema and PIPEWRIGHT_HOME resolution.
 *
 * Defines the TypeScript types for config.toml sections, the home
 * directory resolution algorithm, and the directory structure contract.
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { MAX_TIMEOUT_MS } from './pipeline.js';
import type { LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Container engine union
// ---------------------------------------------------------------------------

/** Container engines a containerized stage can run on. */
export type ContainerEngine = 'docker' | 'podman';

const VALID_ENGINES: ReadonlySet<string> = new Set<ContainerEngine>(['docker', 'podman']);

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error']);

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[runtime]` section of config.toml. */
export interface RuntimeConfig {
  engine: ContainerEngine;
}

/** `[runner]` section of config.toml. */
export interface RunnerConfig {
  /** Default per-stage deadline, used when a stage declares none. */
  stage_timeout_ms: number;
  /** How many trailing output lines the report shows for a failed stage. */
  output_tail_lines: number;
}

/** `[artifacts]` section of config.toml. */
export interface ArtifactsConfig {
  /** Root of the stash area. Defaults to `$PIPEWRIGHT_HOME/artifacts`. */
  dir?: string;
}

/** `[logging]` section of config.toml. */
export interface LoggingConfig {
  level: LogLevel;
  /** Write a JSONL log per run under `$PIPEWRIGHT_HOME/logs`. */
  run_logs: boolean;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

/**
 * Full pipewright configuration.
 *
 * Unknown top-level keys are preserved as-is so newer config files keep
 * loading on older builds.
 */
export interface PipewrightConfig {
  runtime: RuntimeConfig;
  runner: RunnerConfig;
  artifacts: ArtifactsConfig;
  logging: LoggingConfig;
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: PipewrightConfig = {
  runtime: { engine: 'docker' },
  runner: { stage_timeout_ms: 1_800_000, output_tail_lines: 20 },
  artifacts: {},
  logging: { level: 'info', run_logs: true },
};

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

/**
 * Resolve the pipewright home directory.
 *
 * Precedence:
 *  1. `$PIPEWRIGHT_HOME` (if non-empty)
 *  2. `~/.pipewright/`
 *
 * Trailing slashes are stripped and a leading `~` is expanded.
 */
export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  const envValue = env['PIPEWRIGHT_HOME'];
  if (envValue && envValue.length > 0) {
    let resolved = envValue;
    if (resolved.startsWith('~/') || resolved === '~') {
      resolved = join(homedir(), resolved.slice(2));
    }
    if (resolved.length > 1 && resolved.endsWith('/')) {
      resolved = resolved.slice(0, -1);
    }
    return resolved;
  }
  return join(homedir(), '.pipewright');
}

// ---------------------------------------------------------------------------
// Directory structure
// ---------------------------------------------------------------------------

export const PIPEWRIGHT_SUBDIRS = ['artifacts', 'logs'] as const;

export interface DirectoryStructure {
  root: string;
  artifacts: string;
  logs: string;
  configFile: string;
}

/** Create the `$PIPEWRIGHT_HOME` tree. Idempotent. */
export function ensureDirectoryStructure(root: string): DirectoryStructure {
  mkdirSync(root, { recursive: true });
  for (const subdir of PIPEWRIGHT_SUBDIRS) {
    mkdirSync(join(root, subdir), { recursive: true });
  }

  return {
    root,
    artifacts: join(root, 'artifacts'),
    logs: join(root, 'logs'),
    configFile: join(root, 'config.toml'),
  };
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`[${name}] must be a table`);
  }
  return value;
}

function positiveInteger(value: unknown, fallback: number, field: string): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`${field} must be a positive integer`);
  }
  return value;
}

function timeoutMs(value: unknown): number {
  const ms = positiveInteger(value, DEFAULT_CONFIG.runner.stage_timeout_ms, 'runner.stage_timeout_ms');
  if (ms > MAX_TIMEOUT_MS) {
    throw new Error(`runner.stage_timeout_ms must not exceed ${MAX_TIMEOUT_MS}`);
  }
  return ms;
}

function isEngine(value: string): value is ContainerEngine {
  return VALID_ENGINES.has(value);
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.has(value);
}

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into a
 * fully typed {@link PipewrightConfig}, applying defaults for anything
 * missing. Unknown top-level sections are passed through.
 */
export function parseConfig(raw: Record<string, unknown>): PipewrightConfig {
  const extra: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (!['runtime', 'runner', 'artifacts', 'logging'].includes(key)) {
      extra[key] = raw[key];
    }
  }

  // --- runtime ---
  const rawRuntime = section(raw, 'runtime');
  const engine = rawRuntime['engine'] ?? DEFAULT_CONFIG.runtime.engine;
  if (typeof engine !== 'string' || !isEngine(engine)) {
    throw new Error(
      `Invalid runtime.engine: "${String(engine)}". ` +
        `Must be one of: ${[...VALID_ENGINES].join(', ')}`,
    );
  }

  // --- runner ---
  const rawRunner = section(raw, 'runner');
  const runner: RunnerConfig = {
    stage_timeout_ms: timeoutMs(rawRunner['stage_timeout_ms']),
    output_tail_lines: positiveInteger(
      rawRunner['output_tail_lines'],
      DEFAULT_CONFIG.runner.output_tail_lines,
      'runner.output_tail_lines',
    ),
  };

  // --- artifacts ---
  const rawArtifacts = section(raw, 'artifacts');
  const artifacts: ArtifactsConfig = {};
  if (rawArtifacts['dir'] !== undefined) {
    if (typeof rawArtifacts['dir'] !== 'string' || rawArtifacts['dir'].length === 0) {
      throw new Error('artifacts.dir must be a non-empty string');
    }
    artifacts.dir = rawArtifacts['dir'];
  }

  // --- logging ---
  const rawLogging = section(raw, 'logging');
  const level = rawLogging['level'] ?? DEFAULT_CONFIG.logging.level;
  if (typeof level !== 'string' || !isLogLevel(level)) {
    throw new Error(`Invalid logging.level: "${String(level)}"`);
  }
  const runLogs = rawLogging['run_logs'] ?? DEFAULT_CONFIG.logging.run_logs;
  if (typeof runLogs !== 'boolean') {
    throw new Error('logging.run_logs must be a boolean');
  }

  return {
    ...extra,
    runtime: { engine },
    runner,
    artifacts,
    logging: { level, run_logs: runLogs },
  };
}
