export type { ExecutionBackend, StageInvocation } from './backend.js';
export {
  type ProcessRequest,
  type ProcessOutcome,
  type RunProcessFn,
  type ExecFn,
  defaultRunProcess,
  defaultExec,
  buildScript,
} from './process.js';
export { ShellBackend, type ShellBackendOptions } from './shell-backend.js';
export {
  ContainerBackend,
  type ContainerBackendOptions,
  CONTAINER_WORKSPACE,
  containerNameFor,
} from './container-backend.js';
export { RoutingBackend } from './routing-backend.js';
export { MockBackend, type ScriptedOutcome } from './mock-backend.js';
