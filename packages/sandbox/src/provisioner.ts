/**
 * Execution Context Provisioner
 *
 * Hands out sandboxes that belong to exactly one invocation and guarantees
 * each is torn down exactly once.
 */

import { ProvisioningError, StressBridgeError, createLogger, describeError } from '@stress-bridge/utils';
import type {
  ContextRequest,
  ExecutionContext,
  SandboxDriver,
  SandboxExecOptions,
  SandboxExecResult,
  SandboxHandle,
} from './types.js';

const log = createLogger('provisioner');

class SandboxContext implements ExecutionContext {
  private isReleased = false;

  constructor(
    private readonly driver: SandboxDriver,
    readonly handle: SandboxHandle,
    private readonly request: ContextRequest
  ) {}

  get id(): string {
    return this.handle.id;
  }

  get node(): string {
    return this.handle.node;
  }

  get image(): string {
    return this.request.image;
  }

  get cpuAffinity(): number | undefined {
    return this.request.cpuAffinity;
  }

  get marker(): string {
    return this.request.marker;
  }

  get released(): boolean {
    return this.isReleased;
  }

  markReleased(): void {
    this.isReleased = true;
  }

  exec(shellCommand: string, options: SandboxExecOptions): Promise<SandboxExecResult> {
    if (this.isReleased) {
      return Promise.reject(new StressBridgeError(`Execution context ${this.id} on ${this.node} was already released`));
    }
    return this.driver.exec(this.handle, shellCommand, options);
  }
}

export class ExecutionContextProvisioner {
  private readonly live = new Map<string, SandboxContext>();

  constructor(private readonly driver: SandboxDriver) {}

  /** Contexts acquired and not yet released. */
  get liveCount(): number {
    return this.live.size;
  }

  async acquire(request: ContextRequest): Promise<ExecutionContext> {
    let handle: SandboxHandle;
    try {
      handle = await this.driver.start(request);
    } catch (error) {
      if (error instanceof ProvisioningError) throw error;
      throw new ProvisioningError(request.node, describeError(error), { cause: error });
    }

    const context = new SandboxContext(this.driver, handle, request);
    this.live.set(context.id, context);
    log.info('Execution context acquired', {
      node: context.node,
      id: context.id,
      cpuAffinity: request.cpuAffinity,
    });
    return context;
  }

  /**
   * Tear the context down. Only the first call per context reaches the driver;
   * a failed teardown is logged, never thrown.
   */
  async release(context: ExecutionContext): Promise<void> {
    const owned = this.live.get(context.id);
    if (!owned || owned !== context) {
      log.debug('Execution context already released', { node: context.node, id: context.id });
      return;
    }
    this.live.delete(context.id);
    owned.markReleased();

    try {
      await this.driver.stop(owned.handle);
      log.info('Execution context released', { node: owned.node, id: owned.id });
    } catch (error) {
      log.error('Failed to tear down execution context', {
        node: owned.node,
        id: owned.id,
        error: describeError(error),
      });
    }
  }

  /** Run `fn` with a fresh context, releasing it however `fn` ends. */
  async withContext<T>(request: ContextRequest, fn: (context: ExecutionContext) => Promise<T>): Promise<T> {
    const context = await this.acquire(request);
    try {
      return await fn(context);
    } finally {
      await this.release(context);
    }
  }
}
