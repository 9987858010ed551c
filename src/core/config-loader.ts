/**
 * TOML-based configuration loader for pipewright.
 *
 * Reads `config.toml` from `$PIPEWRIGHT_HOME`, parses it with smol-toml,
 * validates it, and returns a fully typed `PipewrightConfig`. Also
 * provides `initialize()` which sets up everything a run needs.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseConfig, ensureDirectoryStructure, DEFAULT_CONFIG } from '../types/config.js';
import type { PipewrightConfig, DirectoryStructure } from '../types/config.js';
import type { LogLevel } from './logger.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate `config.toml` from a home directory.
 *
 * Returns a copy of `DEFAULT_CONFIG` when the file is absent or empty.
 * Throws on invalid TOML syntax or schema validation errors.
 */
export function loadConfig(home: string): PipewrightConfig {
  const configPath = join(home, 'config.toml');

  if (!existsSync(configPath)) {
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return structuredClone(DEFAULT_CONFIG);
  }

  return parseConfig(parseTOML(content));
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

const ENV_LOG_LEVELS: ReadonlySet<string> = new Set(['debug', 'info', 'warn', 'error']);

function isLogLevel(value: string): value is LogLevel {
  return ENV_LOG_LEVELS.has(value);
}

/**
 * Apply environment overrides on top of a loaded config.
 *
 * `PIPEWRIGHT_LOG_LEVEL` replaces `logging.level`; an unknown value is
 * rejected rather than ignored.
 */
export function applyEnvOverrides(
  config: PipewrightConfig,
  env: NodeJS.ProcessEnv,
): PipewrightConfig {
  const level = env['PIPEWRIGHT_LOG_LEVEL'];
  if (level === undefined || level.length === 0) {
    return config;
  }
  if (!isLogLevel(level)) {
    throw new Error(`Invalid PIPEWRIGHT_LOG_LEVEL: "${level}"`);
  }
  return { ...config, logging: { ...config.logging, level } };
}

// ---------------------------------------------------------------------------
// initialize()
// ---------------------------------------------------------------------------

export interface InitResult {
  config: PipewrightConfig;
  dirs: DirectoryStructure;
  /** Where stashed artifacts live: `[artifacts] dir`, or the home default. */
  artifactsDir: string;
}

/**
 * Initialize a pipewright home directory.
 *
 * 1. Ensures the directory structure exists (idempotent).
 * 2. Loads `config.toml` (or applies defaults) and env overrides.
 * 3. Resolves the artifacts directory.
 */
export function initialize(home: string, env: NodeJS.ProcessEnv = {}): InitResult {
  const dirs = ensureDirectoryStructure(home);
  const config = applyEnvOverrides(loadConfig(home), env);
  const artifactsDir = config.artifacts.dir ?? dirs.artifacts;

  return { config, dirs, artifactsDir };
}
