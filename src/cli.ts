/**
 * pipewright CLI.
 *
 * Provides the `pipewright` command with subcommands:
 *   - `run <pipeline-file>`        Execute a pipeline and print its report.
 *   - `validate <pipeline-file>`   Load and check a pipeline without running it.
 *   - `check-deployment <file>`    Validate a Kubernetes Deployment/Service manifest.
 *
 * Exit codes: 0 success, 1 run failed or aborted (or manifest invalid),
 * 2 malformed input (unreadable file, bad YAML, schema or descriptor errors).
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * The real `main()` wires production dependencies and calls `runCommand()`.
 */

import { resolve } from 'node:path';
import { VERSION } from './index.js';
import type { InitResult } from './core/config-loader.js';
import type { ArtifactStore } from './core/artifact-store.js';
import type { ExecutionBackend } from './core/backend/backend.js';
import { configureLogging } from './core/logger.js';
import { loadPipeline } from './core/pipeline-loader.js';
import { formatReport, toJsonReport } from './core/report.js';
import { Sequencer } from './core/sequencer.js';
import type { PipelineSpec } from './types/pipeline.js';
import type { PipewrightConfig } from './types/config.js';
import { ConfigError, InfrastructureError } from './types/errors.js';
import { checkDeployment } from './validate-deployment.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Backend and store a run executes against. */
export interface RunRuntime {
  backend: ExecutionBackend;
  artifacts: ArtifactStore;
  /** Whether container stages can run. Checked only for pipelines that have them. */
  containerAvailable: () => Promise<boolean>;
}

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  /** Write to stdout. */
  stdout: (msg: string) => void;
  /** Write to stderr. */
  stderr: (msg: string) => void;
  /** Process environment (BRANCH_NAME, BUILD_NUMBER, REGISTRY_CREDENTIALS_REF). */
  env: NodeJS.ProcessEnv;
  /** Directory relative paths resolve against. */
  cwd: string;
  /** Read file contents as string. Throws on missing file. */
  readFile: (path: string) => string;
  /** Prepare PIPEWRIGHT_HOME and load its config. */
  initialize: () => InitResult;
  /** Build the backend and artifact store for a run. */
  createRuntime: (config: PipewrightConfig, artifactsDir: string) => RunRuntime;
  /** Generate a run ID. */
  createRunId: () => string;
  /** Start writing this run's log file; returns a function that stops it. */
  openRunLog?: (runId: string, logsDir: string) => () => void;
  /** Cancels an in-progress run (SIGINT/SIGTERM in production). */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  /** Bare `--name` switches. */
  flags: Record<string, boolean>;
  /** `--name=value` options. */
  options: Record<string, string>;
  /** Non-flag arguments after the command. */
  positionals: string[];
}

/**
 * Parse process.argv into a command, positionals, flags and options.
 *
 * Expects argv in the form: [node, script, command?, ...args]
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  let command = '';

  for (const arg of args) {
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq === -1) {
        flags[arg.slice(2)] = true;
      } else {
        options[arg.slice(2, eq)] = arg.slice(eq + 1);
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, flags, options, positionals };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

const USAGE = `Usage: pipewright <command>

Commands:
  run <pipeline-file>          Run a pipeline
  validate <pipeline-file>     Check a pipeline file without running it
  check-deployment <manifest>  Validate a Deployment/Service manifest

Run options:
  --branch=<name>      Target branch (default: $BRANCH_NAME)
  --build=<n>          Build number (default: $BUILD_NUMBER or $BUILD_ID)
  --workspace=<dir>    Directory stages run in (default: current directory)
  --json               Print the run report as JSON

Options:
  --version    Show version number
  --help       Show this help message`;

/**
 * Dispatch a command string to the appropriate handler.
 *
 * @returns Process exit code (0 = success, 1 = failure, 2 = malformed input).
 */
export async function runCommand(
  command: string,
  deps: CliDeps,
  flags: Record<string, boolean> = {},
  options: Record<string, string> = {},
  positionals: string[] = [],
): Promise<number> {
  if (command === '--version') {
    deps.stdout(VERSION);
    return 0;
  }

  if (command === '' || command === '--help') {
    deps.stdout(USAGE);
    return 0;
  }

  switch (command) {
    case 'run':
      return run(deps, positionals[0], flags, options);
    case 'validate':
      return validate(deps, positionals[0]);
    case 'check-deployment':
      return checkDeploymentCommand(deps, positionals[0]);
    default:
      deps.stderr(`Unknown command: "${command}"\n`);
      deps.stdout(USAGE);
      return 2;
  }
}

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

function reportConfigError(deps: CliDeps, err: ConfigError): void {
  deps.stderr(`  FAIL  ${err.message}`);
  for (const problem of err.problems.slice(1)) {
    deps.stderr(`  ERROR ${problem}`);
  }
}

function loadPipelineFile(deps: CliDeps, path: string): PipelineSpec | null {
  try {
    return loadPipeline(resolve(deps.cwd, path), deps.readFile);
  } catch (err) {
    if (err instanceof ConfigError) {
      reportConfigError(deps, err);
      return null;
    }
    throw err;
  }
}

function parseBuildNumber(raw: string | undefined): number | undefined | null {
  if (raw === undefined || raw.length === 0) return undefined;
  if (!/^\d+$/.test(raw)) return null;
  return Number(raw);
}

function usesContainers(pipeline: PipelineSpec): boolean {
  const posts = [...pipeline.post.always, ...pipeline.post.success, ...pipeline.post.failure];
  return [...pipeline.stages, ...posts].some((s) => s.environment.kind === 'container');
}

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

/** Load a pipeline and report whether it is well-formed. */
export function validate(deps: CliDeps, path: string | undefined): number {
  if (!path) {
    deps.stderr('Usage: pipewright validate <pipeline-file>');
    return 2;
  }
  const pipeline = loadPipelineFile(deps, path);
  if (pipeline === null) return 2;

  deps.stdout(
    `  PASS  Pipeline "${pipeline.name}" is valid (${pipeline.stages.length} stage(s))`,
  );
  return 0;
}

// ---------------------------------------------------------------------------
// check-deployment
// ---------------------------------------------------------------------------

export function checkDeploymentCommand(deps: CliDeps, path: string | undefined): number {
  if (!path) {
    deps.stderr('Usage: pipewright check-deployment <manifest>');
    return 2;
  }
  return checkDeployment(resolve(deps.cwd, path), deps);
}

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

/**
 * Run a pipeline end to end.
 *
 * 1. Initialize PIPEWRIGHT_HOME and load configuration.
 * 2. Load and validate the pipeline file.
 * 3. Resolve branch, build number and workspace.
 * 4. Sequence the stages and print the report. Pipelines with container
 *    stages first check the engine; an unavailable engine fails the run
 *    with every stage skipped, but post-actions still run.
 */
export async function run(
  deps: CliDeps,
  path: string | undefined,
  flags: Record<string, boolean>,
  options: Record<string, string>,
): Promise<number> {
  if (!path) {
    deps.stderr('Usage: pipewright run <pipeline-file>');
    return 2;
  }

  let init: InitResult;
  try {
    init = deps.initialize();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    deps.stderr(`  FAIL  Invalid configuration: ${detail}`);
    return 2;
  }
  configureLogging({ level: init.config.logging.level });

  const pipeline = loadPipelineFile(deps, path);
  if (pipeline === null) return 2;

  const branch = options['branch'] ?? deps.env['BRANCH_NAME'];
  const buildNumber = parseBuildNumber(
    options['build'] ?? deps.env['BUILD_NUMBER'] ?? deps.env['BUILD_ID'],
  );
  if (buildNumber === null) {
    deps.stderr('  FAIL  Build number must be a non-negative integer');
    return 2;
  }
  const workspace = resolve(deps.cwd, options['workspace'] ?? '.');

  // Only the reference name travels; the secret itself stays with the engine.
  const env: Record<string, string> = {};
  const credentialsRef = deps.env['REGISTRY_CREDENTIALS_REF'];
  if (credentialsRef) env['REGISTRY_CREDENTIALS_REF'] = credentialsRef;

  const runtime = deps.createRuntime(init.config, init.artifactsDir);
  const engine = init.config.runtime.engine;
  const preflight = async (): Promise<void> => {
    if (!(await runtime.containerAvailable())) {
      throw new InfrastructureError(
        `Container engine "${engine}" is not available; install it or start its daemon`,
      );
    }
  };

  const runId = deps.createRunId();
  const closeRunLog =
    init.config.logging.run_logs && deps.openRunLog
      ? deps.openRunLog(runId, init.dirs.logs)
      : undefined;

  const sequencer = new Sequencer({
    backend: runtime.backend,
    artifacts: runtime.artifacts,
    defaultTimeoutMs: init.config.runner.stage_timeout_ms,
  });

  try {
    const snapshot = await sequencer.run({
      pipeline,
      workspace,
      runId,
      env,
      ...(branch !== undefined && branch.length > 0 ? { branch } : {}),
      ...(buildNumber !== undefined ? { buildNumber } : {}),
      ...(deps.signal ? { signal: deps.signal } : {}),
      ...(usesContainers(pipeline) ? { preflight } : {}),
    });

    const tailLines = init.config.runner.output_tail_lines;
    if (flags['json']) {
      deps.stdout(JSON.stringify(toJsonReport(snapshot, { tailLines }), null, 2));
    } else {
      deps.stdout(formatReport(snapshot, { tailLines }));
    }
    return snapshot.outcome === 'succeeded' ? 0 : 1;
  } finally {
    closeRunLog?.();
  }
}
