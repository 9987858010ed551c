import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, ensureDirectoryStructure, parseConfig, resolveHome } from './config.js';

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

describe('resolveHome', () => {
  it('uses PIPEWRIGHT_HOME when set', () => {
    expect(resolveHome({ PIPEWRIGHT_HOME: '/opt/ci/pipewright' })).toBe('/opt/ci/pipewright');
  });

  it('strips a trailing slash', () => {
    expect(resolveHome({ PIPEWRIGHT_HOME: '/opt/ci/pipewright/' })).toBe('/opt/ci/pipewright');
  });

  it('expands a leading ~', () => {
    expect(resolveHome({ PIPEWRIGHT_HOME: '~/ci' })).toBe(join(homedir(), 'ci'));
  });

  it('falls back to ~/.pipewright', () => {
    expect(resolveHome({})).toBe(join(homedir(), '.pipewright'));
    expect(resolveHome({ PIPEWRIGHT_HOME: '' })).toBe(join(homedir(), '.pipewright'));
  });
});

// ---------------------------------------------------------------------------
// ensureDirectoryStructure()
// ---------------------------------------------------------------------------

describe('ensureDirectoryStructure', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'pipewright-home-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('creates artifacts and logs and is idempotent', () => {
    const first = ensureDirectoryStructure(root);
    const second = ensureDirectoryStructure(root);

    expect(first).toEqual(second);
    expect(first).toEqual({
      root,
      artifacts: join(root, 'artifacts'),
      logs: join(root, 'logs'),
      configFile: join(root, 'config.toml'),
    });
    expect(existsSync(first.artifacts)).toBe(true);
    expect(existsSync(first.logs)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  it('fills defaults for an empty object', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('keeps unknown sections', () => {
    const config = parseConfig({ notifications: { slack: false } });
    expect(config['notifications']).toEqual({ slack: false });
  });

  it('rejects a section that is not a table', () => {
    expect(() => parseConfig({ runner: 5 })).toThrow('[runner] must be a table');
  });

  it.each([0, -5, 1.5, '60000'])('rejects stage_timeout_ms = %j', (value) => {
    expect(() => parseConfig({ runner: { stage_timeout_ms: value } })).toThrow(
      'runner.stage_timeout_ms must be a positive integer',
    );
  });

  it('rejects a stage_timeout_ms longer than a timer can hold', () => {
    expect(() => parseConfig({ runner: { stage_timeout_ms: 2_592_000_000 } })).toThrow(
      'runner.stage_timeout_ms must not exceed 2147483647',
    );
    expect(parseConfig({ runner: { stage_timeout_ms: 2_147_483_647 } }).runner.stage_timeout_ms).toBe(
      2_147_483_647,
    );
  });

  it('rejects an empty artifacts dir', () => {
    expect(() => parseConfig({ artifacts: { dir: '' } })).toThrow(
      'artifacts.dir must be a non-empty string',
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => parseConfig({ logging: { level: 'trace' } })).toThrow(
      'Invalid logging.level: "trace"',
    );
  });

  it('rejects a non-boolean run_logs', () => {
    expect(() => parseConfig({ logging: { run_logs: 'yes' } })).toThrow(
      'logging.run_logs must be a boolean',
    );
  });
});
