#!/usr/bin/env node
/**
 * Production entry point for pipewright.
 *
 * Wires real dependencies (filesystem, host shell, container engine)
 * into CliDeps and dispatches to the CLI command handler.
 *
 * Usage:
 *   node dist/main.js run pipeline.yaml --branch=main
 *   node dist/main.js validate pipeline.yaml
 *   node dist/main.js check-deployment k8s/order-deployment.yaml
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps, RunRuntime } from './cli.js';
import { resolveHome } from './types/config.js';
import type { PipewrightConfig } from './types/config.js';
import { initialize } from './core/config-loader.js';
import { FileArtifactStore } from './core/artifact-store.js';
import { ContainerBackend, RoutingBackend, ShellBackend } from './core/backend/index.js';
import { RunLogFile, configureLogging, defaultSink, teeSinks } from './core/logger.js';

// ---------------------------------------------------------------------------
// Runtime factory
// ---------------------------------------------------------------------------

function createRuntime(config: PipewrightConfig, artifactsDir: string): RunRuntime {
  const container = new ContainerBackend({ engine: config.runtime.engine });
  return {
    backend: new RoutingBackend(new ShellBackend(), container),
    artifacts: new FileArtifactStore(artifactsDir),
    containerAvailable: () => container.isAvailable(),
  };
}

function openRunLog(runId: string, logsDir: string): () => void {
  const file = new RunLogFile(join(logsDir, `${runId}.jsonl`));
  configureLogging({ sink: teeSinks(defaultSink, file.sink) });
  return () => {
    file.close();
    configureLogging({ sink: defaultSink });
  };
}

// ---------------------------------------------------------------------------
// Signals
// ---------------------------------------------------------------------------

/**
 * Abort the run on the first SIGINT/SIGTERM. A second signal falls back to
 * the default behaviour and kills the process.
 */
function abortOnSignals(controller: AbortController): void {
  const onSignal = (signal: NodeJS.Signals): void => {
    process.stderr.write(`Received ${signal}; aborting run (send again to force quit)\n`);
    controller.abort();
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

// ---------------------------------------------------------------------------
// main()
// ---------------------------------------------------------------------------

/**
 * Production main() — wires real deps and dispatches commands.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Exit code (0 = success, non-zero = failure).
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const { command: parsedCommand, flags, options, positionals } = parseArgs(argv);
  const home = resolveHome();

  // Translate flags to pseudo-commands for runCommand compatibility
  let command = parsedCommand;
  if (!command && flags['version']) {
    command = '--version';
  } else if (!command && flags['help']) {
    command = '--help';
  }

  const controller = new AbortController();
  if (command === 'run') {
    abortOnSignals(controller);
  }

  const deps: CliDeps = {
    stdout: (msg: string) => process.stdout.write(`${msg}\n`),
    stderr: (msg: string) => process.stderr.write(`${msg}\n`),
    env: process.env,
    cwd: process.cwd(),
    readFile: (path: string) => readFileSync(path, 'utf-8'),
    initialize: () => initialize(home, process.env),
    createRuntime,
    createRunId: randomUUID,
    openRunLog,
    signal: controller.signal,
  };

  return runCommand(command, deps, flags, options, positionals);
}

// ---------------------------------------------------------------------------
// Entry point — run when executed directly
// ---------------------------------------------------------------------------

/* c8 ignore next 3 */
main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`pipewright: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exitCode = 1;
  },
);
