import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { parseArgs, runCommand, type CliDeps, type RunRuntime } from './cli.js';
import { VERSION } from './index.js';
import { MockBackend } from './core/backend/mock-backend.js';
import { MemoryArtifactStore } from './core/artifact-store.js';
import { configureLogging, resetLogging } from './core/logger.js';
import type { InitResult } from './core/config-loader.js';
import { DEFAULT_CONFIG } from './types/config.js';
import { createTestSink } from './testing/factories.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const HOST_PIPELINE = `
name: orders
environment:
  REGISTRY: registry.local
stages:
  - name: build
    steps: [make build]
  - name: publish
    when: branch == "main"
    steps: [make publish]
`;

const CONTAINER_PIPELINE = `
name: orders
agent:
  image: maven:3.9
stages:
  - name: build
    steps: [mvn package]
`;

const CONTAINER_PIPELINE_WITH_CLEANUP = `
name: orders
agent:
  image: maven:3.9
stages:
  - name: build
    steps: [mvn package]
post:
  always:
    - name: cleanup
      agent: host
      steps: [docker-compose down]
`;

const VALID_MANIFEST = `apiVersion: apps/v1
kind: Deployment
metadata:
  name: orders
spec:
  selector:
    matchLabels: { app: orders }
  template:
    metadata:
      labels: { app: orders }
    spec:
      containers:
        - name: orders
          image: registry.local/orders@sha256:0123
`;

function createInit(): InitResult {
  const config = structuredClone(DEFAULT_CONFIG);
  config.logging.run_logs = false;
  return {
    config,
    dirs: {
      root: '/home/ci/.pipewright',
      artifacts: '/home/ci/.pipewright/artifacts',
      logs: '/home/ci/.pipewright/logs',
      configFile: '/home/ci/.pipewright/config.toml',
    },
    artifactsDir: '/home/ci/.pipewright/artifacts',
  };
}

interface Harness {
  deps: CliDeps;
  backend: MockBackend;
  runtime: RunRuntime;
  out: () => string[];
  err: () => string[];
}

function createHarness(overrides?: Partial<CliDeps>, files?: Record<string, string>): Harness {
  const backend = new MockBackend();
  const runtime: RunRuntime = {
    backend,
    artifacts: new MemoryArtifactStore(),
    containerAvailable: vi.fn().mockResolvedValue(true),
  };
  const contents: Record<string, string> = {
    '/repo/pipeline.yaml': HOST_PIPELINE,
    '/repo/container.yaml': CONTAINER_PIPELINE,
    '/repo/container-cleanup.yaml': CONTAINER_PIPELINE_WITH_CLEANUP,
    '/repo/k8s/deploy.yaml': VALID_MANIFEST,
    ...files,
  };
  const stdout = vi.fn<(msg: string) => void>();
  const stderr = vi.fn<(msg: string) => void>();
  const deps: CliDeps = {
    stdout,
    stderr,
    env: {},
    cwd: '/repo',
    readFile: (path) => {
      const text = contents[path];
      if (text === undefined) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      return text;
    },
    initialize: createInit,
    createRuntime: () => runtime,
    createRunId: () => 'run-0001',
    ...overrides,
  };
  return {
    deps,
    backend,
    runtime,
    out: () => stdout.mock.calls.map((c) => c[0]),
    err: () => stderr.mock.calls.map((c) => c[0]),
  };
}

// ---------------------------------------------------------------------------
// parseArgs
// ---------------------------------------------------------------------------

describe('parseArgs', () => {
  it('splits command, positionals, flags and options', () => {
    expect(
      parseArgs(['node', 'pipewright', 'run', 'pipeline.yaml', '--json', '--branch=main']),
    ).toEqual({
      command: 'run',
      flags: { json: true },
      options: { branch: 'main' },
      positionals: ['pipeline.yaml'],
    });
  });

  it('keeps everything after the first = in an option value', () => {
    expect(parseArgs(['node', 'pipewright', '--workspace=/a=b']).options).toEqual({
      workspace: '/a=b',
    });
  });
});

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

describe('runCommand — dispatch', () => {
  it('prints the version', async () => {
    const h = createHarness();
    expect(await runCommand('--version', h.deps)).toBe(0);
    expect(h.out()).toEqual([VERSION]);
  });

  it('prints usage for no command', async () => {
    const h = createHarness();
    expect(await runCommand('', h.deps)).toBe(0);
    expect(h.out()[0]).toMatch(/^Usage: pipewright <command>/);
  });

  it('rejects an unknown command with exit 2', async () => {
    const h = createHarness();
    expect(await runCommand('deploy', h.deps)).toBe(2);
    expect(h.err()).toEqual(['Unknown command: "deploy"\n']);
  });
});

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

describe('runCommand — validate', () => {
  it('reports a valid pipeline', async () => {
    const h = createHarness();
    expect(await runCommand('validate', h.deps, {}, {}, ['pipeline.yaml'])).toBe(0);
    expect(h.out()).toEqual(['  PASS  Pipeline "orders" is valid (2 stage(s))']);
  });

  it('exits 2 with every problem for a malformed pipeline', async () => {
    const h = createHarness({}, {
      '/repo/bad.yaml': 'name: bad\nstages:\n  - name: a\n  - name: a\n    steps: [x]\n',
    });

    expect(await runCommand('validate', h.deps, {}, {}, ['bad.yaml'])).toBe(2);
    expect(h.err()).toEqual([
      '  FAIL  Invalid pipeline "bad": stage "a": command list must be non-empty',
      '  ERROR duplicate stage name "a"',
    ]);
  });

  it('exits 2 when the file cannot be read', async () => {
    const h = createHarness();
    expect(await runCommand('validate', h.deps, {}, {}, ['missing.yaml'])).toBe(2);
    expect(h.err()[0]).toBe(
      "  FAIL  Cannot read pipeline file /repo/missing.yaml: ENOENT: no such file or directory, open '/repo/missing.yaml'",
    );
  });

  it('exits 2 without a path', async () => {
    const h = createHarness();
    expect(await runCommand('validate', h.deps)).toBe(2);
    expect(h.err()).toEqual(['Usage: pipewright validate <pipeline-file>']);
  });
});

// ---------------------------------------------------------------------------
// check-deployment
// ---------------------------------------------------------------------------

describe('runCommand — check-deployment', () => {
  it('resolves the manifest against cwd and passes it', async () => {
    const h = createHarness();
    expect(await runCommand('check-deployment', h.deps, {}, {}, ['k8s/deploy.yaml'])).toBe(0);
    expect(h.out()[0]).toBe('  PASS  Deployment validation passed');
  });

  it('exits 2 for a missing manifest', async () => {
    const h = createHarness();
    expect(await runCommand('check-deployment', h.deps, {}, {}, ['k8s/none.yaml'])).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

describe('runCommand — run', () => {
  beforeEach(() => {
    configureLogging({ sink: createTestSink().sink });
  });

  afterEach(() => {
    resetLogging();
  });

  it('runs the pipeline and exits 0 on success', async () => {
    const h = createHarness({ env: { BRANCH_NAME: 'main' } });

    const code = await runCommand('run', h.deps, {}, {}, ['pipeline.yaml']);

    expect(code).toBe(0);
    expect(h.backend.invokedStages()).toEqual(['build', 'publish']);
    const report = h.out()[0].split('\n');
    expect(report[0]).toBe('Pipeline orders (run run-0001)');
    expect(report.at(-1)).toBe('SUCCEEDED: 2 succeeded, 0 failed, 0 skipped');
  });

  it('skips guarded stages off the target branch', async () => {
    const h = createHarness();

    const code = await runCommand('run', h.deps, {}, { branch: 'feature/x' }, ['pipeline.yaml']);

    expect(code).toBe(0);
    expect(h.backend.invokedStages()).toEqual(['build']);
    expect(h.out()[0].split('\n')).toContain('  SKIP  publish');
  });

  it('exits 1 when a stage fails', async () => {
    const h = createHarness({ env: { BRANCH_NAME: 'main' } });
    h.backend.simulateFailure('build', 2);

    expect(await runCommand('run', h.deps, {}, {}, ['pipeline.yaml'])).toBe(1);
    expect(h.backend.invokedStages()).toEqual(['build']);
  });

  it('prints a JSON report with --json', async () => {
    const h = createHarness();

    await runCommand('run', h.deps, { json: true }, { branch: 'main', build: '12' }, [
      'pipeline.yaml',
    ]);

    const report: unknown = JSON.parse(h.out()[0]);
    expect(report).toMatchObject({
      runId: 'run-0001',
      pipeline: 'orders',
      outcome: 'succeeded',
      stages: [
        { name: 'build', outcome: 'succeeded' },
        { name: 'publish', outcome: 'succeeded' },
      ],
    });
  });

  it('passes branch, build number, workspace and only the credentials reference', async () => {
    const h = createHarness({
      env: {
        BRANCH_NAME: 'main',
        BUILD_ID: '41',
        REGISTRY_CREDENTIALS_REF: 'registry-push',
        REGISTRY_PASSWORD: 'test-secret',
      },
    });

    await runCommand('run', h.deps, {}, { workspace: 'checkout' }, ['pipeline.yaml']);

    const env = h.backend.invocations[0].env;
    expect(h.backend.invocations[0].workspace).toBe('/repo/checkout');
    expect(env['BRANCH_NAME']).toBe('main');
    expect(env['BUILD_NUMBER']).toBe('41');
    expect(env['REGISTRY']).toBe('registry.local');
    expect(env['REGISTRY_CREDENTIALS_REF']).toBe('registry-push');
    expect(env['REGISTRY_PASSWORD']).toBeUndefined();
  });

  it('exits 2 for a malformed build number', async () => {
    const h = createHarness({ env: { BUILD_NUMBER: 'abc' } });

    expect(await runCommand('run', h.deps, {}, {}, ['pipeline.yaml'])).toBe(2);
    expect(h.err()).toEqual(['  FAIL  Build number must be a non-negative integer']);
    expect(h.backend.invocations).toEqual([]);
  });

  it('exits 2 for an invalid configuration', async () => {
    const h = createHarness({
      initialize: () => {
        throw new Error('Invalid logging.level: "loud"');
      },
    });

    expect(await runCommand('run', h.deps, {}, {}, ['pipeline.yaml'])).toBe(2);
    expect(h.err()).toEqual(['  FAIL  Invalid configuration: Invalid logging.level: "loud"']);
  });

  it('exits 2 for a pipeline that does not load', async () => {
    const h = createHarness({}, { '/repo/pipeline.yaml': 'name: [' });
    expect(await runCommand('run', h.deps, {}, {}, ['pipeline.yaml'])).toBe(2);
    expect(h.backend.invocations).toEqual([]);
  });

  it('fails the run but still runs post-actions when the container engine is unavailable', async () => {
    const h = createHarness();
    vi.mocked(h.runtime.containerAvailable).mockResolvedValue(false);

    expect(await runCommand('run', h.deps, {}, {}, ['container-cleanup.yaml'])).toBe(1);

    expect(h.runtime.containerAvailable).toHaveBeenCalledTimes(1);
    expect(h.backend.invokedStages()).toEqual(['cleanup']);
    const lines = h.out()[0].split('\n');
    expect(lines).toContain('  SKIP  build');
    expect(lines).toContain(
      '  FATAL INFRASTRUCTURE: Container engine "docker" is not available; install it or start its daemon',
    );
    expect(lines.at(-1)).toBe('FAILED: 0 succeeded, 0 failed, 1 skipped');
  });

  it('reports the unavailable engine in the JSON report', async () => {
    const h = createHarness();
    vi.mocked(h.runtime.containerAvailable).mockResolvedValue(false);

    expect(await runCommand('run', h.deps, { json: true }, {}, ['container.yaml'])).toBe(1);

    const report: unknown = JSON.parse(h.out()[0]);
    expect(report).toMatchObject({
      outcome: 'failed',
      stages: [{ name: 'build', outcome: 'skipped' }],
      postActions: [],
      fatalError: {
        code: 'INFRASTRUCTURE',
        message: 'Container engine "docker" is not available; install it or start its daemon',
      },
    });
    expect(h.backend.invocations).toEqual([]);
  });

  it('does not check the engine for host-only pipelines', async () => {
    const h = createHarness();
    await runCommand('run', h.deps, {}, {}, ['pipeline.yaml']);
    expect(h.runtime.containerAvailable).not.toHaveBeenCalled();
  });

  it('opens and closes the run log when enabled', async () => {
    const close = vi.fn();
    const openRunLog = vi.fn().mockReturnValue(close);
    const h = createHarness({
      openRunLog,
      initialize: () => {
        const init = createInit();
        init.config.logging.run_logs = true;
        return init;
      },
    });

    await runCommand('run', h.deps, {}, {}, ['pipeline.yaml']);

    expect(openRunLog).toHaveBeenCalledWith('run-0001', '/home/ci/.pipewright/logs');
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('exits 1 when the run is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const h = createHarness({ signal: controller.signal });

    expect(await runCommand('run', h.deps, {}, {}, ['pipeline.yaml'])).toBe(1);
    expect(h.backend.invocations).toEqual([]);
  });
});
