/**
 * Dispatches each invocation to the backend that matches its execution
 * environment: host stages to the shell, image stages to the container
 * engine.
 */

import type { RunResult } from '../../types/pipeline.js';
import type { ExecutionBackend, StageInvocation } from './backend.js';

export class RoutingBackend implements ExecutionBackend {
  readonly name = 'routing';

  constructor(
    private readonly host: ExecutionBackend,
    private readonly container: ExecutionBackend,
  ) {}

  run(invocation: StageInvocation): Promise<RunResult> {
    const target = invocation.environment.kind === 'host' ? this.host : this.container;
    return target.run(invocation);
  }
}
