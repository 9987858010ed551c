export {
  ErrorCode,
  type ErrorCodeValue,
  type ErrorPayload,
  STAGE_SCOPED_CODES,
  PipelineError,
  ConfigError,
  InvalidGuardError,
  StageExecutionFailure,
  StageTimeoutError,
  InfrastructureError,
  ArtifactNotFoundError,
  PipelineAbortedError,
  isPipelineError,
  toErrorPayload,
} from './errors.js';

export {
  type VolumeMount,
  type HostEnvironment,
  type ContainerEnvironment,
  type ExecutionEnvironment,
  type ErrorPolicy,
  type StashSpec,
  type StageSpec,
  type PostCondition,
  type PostAction,
  type PipelineSpec,
  type StageOutcome,
  type RunOutcome,
  type RunResult,
  type PostActionResult,
  type RunPhase,
  type PipelineRunSnapshot,
  POST_CONDITIONS,
  ARTIFACT_KEY_PATTERN,
  MAX_TIMEOUT_MS,
} from './pipeline.js';

export {
  type AgentDocument,
  type EnvMapDocument,
  type StageDocument,
  type PostActionDocument,
  type PipelineDocument,
  PIPELINE_JSON_SCHEMA,
} from './pipeline-schema.js';

export {
  type ImageReference,
  type ResourceQuantities,
  type ResourceRequirements,
  type SecretReference,
  type EnvBinding,
  type ServiceDescriptor,
  type DeploymentDescriptor,
} from './deployment.js';

export {
  type Quantity,
  type DeploymentDocument,
  type ServiceDocument,
  DEPLOYMENT_JSON_SCHEMA,
  SERVICE_JSON_SCHEMA,
} from './deployment-schema.js';

export {
  type ContainerEngine,
  type RuntimeConfig,
  type RunnerConfig,
  type ArtifactsConfig,
  type LoggingConfig,
  type PipewrightConfig,
  type DirectoryStructure,
  DEFAULT_CONFIG,
  PIPEWRIGHT_SUBDIRS,
  resolveHome,
  ensureDirectoryStructure,
  parseConfig,
} from './config.js';
