import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  createLogger,
  configureLogging,
  resetLogging,
  RunLogFile,
  StageLogRouter,
  teeSinks,
  META_STRING_MAX_LENGTH,
  type LogEntry,
  type LogSink,
} from './logger.js';
import { createTestSink } from '../testing/factories.js';

describe('Logger', () => {
  let sink: LogSink;
  let entries: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    sink = test.sink;
    entries = test.entries;
    configureLogging({ level: 'debug', sink });
  });

  afterEach(() => {
    resetLogging();
  });

  // -----------------------------------------------------------------------
  // createLogger
  // -----------------------------------------------------------------------

  describe('createLogger', () => {
    it('writes one entry per call with level, component and message', () => {
      createLogger('sequencer').info('run started');
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({ level: 'info', component: 'sequencer', msg: 'run started' });
      expect(Number.isNaN(Date.parse(entries[0].ts))).toBe(false);
    });

    it('filters below the configured level', () => {
      configureLogging({ level: 'warn' });
      const logger = createLogger('sequencer');
      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');
      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('promotes well-known fields out of meta', () => {
      createLogger('sequencer').info('stage finished', {
        stage: 'build',
        duration_ms: 1200,
        ok: false,
        error_code: 'STAGE_FAILED',
        exit_code: 2,
      });
      expect(entries[0]).toMatchObject({
        stage: 'build',
        duration_ms: 1200,
        ok: false,
        error_code: 'STAGE_FAILED',
        meta: { exit_code: 2 },
      });
    });

    it('omits meta when nothing remains after promotion', () => {
      createLogger('sequencer').info('run finished', { ok: true });
      expect(entries[0].meta).toBeUndefined();
    });
  });

  // -----------------------------------------------------------------------
  // Context
  // -----------------------------------------------------------------------

  describe('withContext', () => {
    it('binds run context to every entry', () => {
      const logger = createLogger('sequencer').withContext({ run: 'run-0001', pipeline: 'orders' });
      logger.info('a');
      logger.withContext({ stage: 'build' }).info('b');
      expect(entries[0]).toMatchObject({ run: 'run-0001', pipeline: 'orders' });
      expect(entries[0].stage).toBeUndefined();
      expect(entries[1]).toMatchObject({ run: 'run-0001', pipeline: 'orders', stage: 'build' });
    });
  });

  // -----------------------------------------------------------------------
  // Sanitization
  // -----------------------------------------------------------------------

  describe('sanitization', () => {
    it('drops secret-bearing keys whatever their case or prefix', () => {
      createLogger('cli').info('registry login', {
        registry: 'registry.local',
        password: 'test-secret',
        token: 'test-secret',
        registryPassword: 'test-secret',
        REGISTRY_CREDENTIALS_REF: 'registry-push',
        Authorization: 'Bearer test-secret',
      });
      expect(entries[0].meta).toEqual({ registry: 'registry.local' });
    });

    it('leaves a promoted key of the wrong type in meta', () => {
      createLogger('cli').info('odd', { ok: 'yes' });
      expect(entries[0].ok).toBeUndefined();
      expect(entries[0].meta).toEqual({ ok: 'yes' });
    });

    it('truncates long strings', () => {
      createLogger('cli').info('long', { output: 'x'.repeat(META_STRING_MAX_LENGTH + 10) });
      expect(entries[0].meta?.['output']).toBe('x'.repeat(META_STRING_MAX_LENGTH) + '...[truncated]');
    });

    it('serializes errors with their code when they carry one', () => {
      const coded = Object.assign(new Error('spawn sh ENOENT'), { code: 'ENOENT' });
      createLogger('cli').error('failed', { error: new Error('boom'), cause: coded });
      expect(entries[0].meta).toEqual({
        error: { name: 'Error', message: 'boom' },
        cause: { name: 'Error', message: 'spawn sh ENOENT', code: 'ENOENT' },
      });
    });
  });

  // -----------------------------------------------------------------------
  // StageLogRouter
  // -----------------------------------------------------------------------

  describe('StageLogRouter', () => {
    it('logs each non-empty line with its stream', () => {
      new StageLogRouter('run-0001', 'build').route({
        stdout: 'compiling\n\ndone\n',
        stderr: 'warning: deprecated\n',
      });

      expect(entries.map((e) => [e.msg, e.meta?.['stream']])).toEqual([
        ['compiling', 'stdout'],
        ['done', 'stdout'],
        ['warning: deprecated', 'stderr'],
      ]);
      expect(entries[0]).toMatchObject({
        level: 'debug',
        component: 'stage-output',
        run: 'run-0001',
        stage: 'build',
      });
    });
  });

  // -----------------------------------------------------------------------
  // Sinks
  // -----------------------------------------------------------------------

  describe('teeSinks', () => {
    it('forwards every entry to each sink', () => {
      const other = createTestSink();
      configureLogging({ sink: teeSinks(sink, other.sink) });
      createLogger('cli').info('hello');
      expect(entries).toHaveLength(1);
      expect(other.entries).toHaveLength(1);
    });
  });

  describe('RunLogFile', () => {
    it('creates the directory and appends JSONL until closed', () => {
      const fs = { mkdirSync: vi.fn(), appendFileSync: vi.fn() };
      const file = new RunLogFile('/home/ci/.pipewright/logs/run-0001.jsonl', fs);
      const entry: LogEntry = { level: 'info', ts: '2026-01-01T00:00:00.000Z', component: 'cli', msg: 'x' };

      file.sink(entry);
      file.close();
      file.sink(entry);

      expect(fs.mkdirSync).toHaveBeenCalledWith('/home/ci/.pipewright/logs', { recursive: true });
      expect(fs.appendFileSync).toHaveBeenCalledTimes(1);
      expect(fs.appendFileSync).toHaveBeenCalledWith(
        '/home/ci/.pipewright/logs/run-0001.jsonl',
        JSON.stringify(entry) + '\n',
      );
    });

    it('keeps appending once installed behind teeSinks', () => {
      const fs = { mkdirSync: vi.fn(), appendFileSync: vi.fn() };
      const file = new RunLogFile('/logs/run-0002.jsonl', fs);
      configureLogging({ sink: teeSinks(sink, file.sink) });

      createLogger('sequencer').info('run started');

      expect(entries).toHaveLength(1);
      expect(fs.appendFileSync).toHaveBeenCalledTimes(1);
    });
  });
});
