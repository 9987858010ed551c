/**
 * pipewright public API.
 *
 * Programmatic access to the pieces the CLI is built from: load a pipeline,
 * sequence it against a backend, render the report, and validate the
 * deployment manifest it ships.
 */

export const VERSION = '0.1.0';

export * from './types/index.js';

export { parseGuard, evaluate, referencedVariables } from './core/guard.js';
export type { GuardContext, GuardExpression, GuardValue } from './core/guard.js';
export { defineStage, definePipeline } from './core/stage-descriptor.js';
export type { StageInit, PostActionInit, PipelineInit } from './core/stage-descriptor.js';
export { parsePipelineDocument, loadPipeline } from './core/pipeline-loader.js';
export { Sequencer, DEFAULT_STAGE_TIMEOUT_MS } from './core/sequencer.js';
export type { SequencerOptions, RunRequest } from './core/sequencer.js';
export { PipelineRun } from './core/pipeline-run.js';
export {
  type ArtifactStore,
  RunArtifacts,
  MemoryArtifactStore,
  FileArtifactStore,
} from './core/artifact-store.js';
export * from './core/backend/index.js';
export { formatReport, toJsonReport } from './core/report.js';
export type { ReportOptions, JsonReport } from './core/report.js';
export { parseCpu, parseMemory, parseImageReference } from './core/quantity.js';
export { validateDeploymentManifest, checkDeployment } from './validate-deployment.js';
export type { DeploymentValidationResult, ValidationMessage } from './validate-deployment.js';
export { createLogger, configureLogging, resetLogging } from './core/logger.js';
export type { Logger, LogEntry, LogLevel, LogSink } from './core/logger.js';
export { loadConfig, initialize } from './core/config-loader.js';
