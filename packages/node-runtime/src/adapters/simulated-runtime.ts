/**
 * In-process container runtime
 * @module @kubesim/node-runtime/adapters/simulated-runtime
 *
 * Environments and processes are plain records. Failures, hangs and delays
 * can be injected per operation so every runtime-facing path of the control
 * plane can be driven without Docker.
 */

import type { ContainerRuntime, EnvironmentSpec, Logger, WorkloadProcessSpec } from '@kubesim/shared';
import { RuntimeError, createServiceLogger, sleep } from '@kubesim/shared';

/**
 * Runtime operations that accept injected behaviour
 */
export type SimulatedOperation =
  | 'createEnvironment'
  | 'startEnvironment'
  | 'stopEnvironment'
  | 'removeEnvironment'
  | 'isAlive'
  | 'launchWorkload'
  | 'stopWorkload'
  | 'isWorkloadAlive';

/**
 * Simulated environment state
 */
export type SimulatedEnvironmentState = 'created' | 'running' | 'stopped';

/**
 * Snapshot of a simulated environment
 */
export interface SimulatedEnvironment {
  handle: string;
  spec: EnvironmentSpec;
  state: SimulatedEnvironmentState;
  /** Ids of running workload processes */
  workloads: string[];
}

/**
 * Simulated runtime options
 */
export interface SimulatedRuntimeOptions {
  /** Delay applied to every call in milliseconds (default: 0) */
  delayMs?: number;
  /** Prefix of generated handles (default: 'sim') */
  handlePrefix?: string;
  /** Logger override */
  logger?: Logger;
}

interface EnvironmentRecord {
  spec: EnvironmentSpec;
  state: SimulatedEnvironmentState;
  processes: Map<string, WorkloadProcessSpec>;
}

type Fault = { kind: 'refuse'; reason: string; remaining: number } | { kind: 'hang'; remaining: number };

/**
 * Simulated container runtime
 */
export class SimulatedRuntime implements ContainerRuntime {
  readonly name = 'simulated';

  private readonly environments = new Map<string, EnvironmentRecord>();
  private readonly faults = new Map<SimulatedOperation, Fault>();
  private readonly delays = new Map<SimulatedOperation, number>();
  private readonly callCounts = new Map<SimulatedOperation, number>();
  private readonly delayMs: number;
  private readonly handlePrefix: string;
  private readonly logger: Logger;
  private sequence = 0;

  constructor(options: SimulatedRuntimeOptions = {}) {
    this.delayMs = options.delayMs ?? 0;
    this.handlePrefix = options.handlePrefix ?? 'sim';
    this.logger =
      options.logger ?? createServiceLogger({ level: 'debug', service: 'kubesim' }, { component: 'simulated-runtime' });
  }

  // ===========================================================================
  // Fault injection
  // ===========================================================================

  /**
   * Make an operation fail. `times` limits how many calls fail (default: all
   * calls until cleared).
   */
  refuse(operation: SimulatedOperation, reason = 'refused by simulation', times = Infinity): this {
    this.faults.set(operation, { kind: 'refuse', reason, remaining: times });
    return this;
  }

  /**
   * Make an operation never answer
   */
  hang(operation: SimulatedOperation, times = Infinity): this {
    this.faults.set(operation, { kind: 'hang', remaining: times });
    return this;
  }

  /**
   * Delay one operation
   */
  delay(operation: SimulatedOperation, ms: number): this {
    this.delays.set(operation, ms);
    return this;
  }

  /**
   * Remove every injected fault and per-operation delay
   */
  clearFaults(): void {
    this.faults.clear();
    this.delays.clear();
  }

  /**
   * Stop an environment behind the control plane's back
   */
  killEnvironment(handle: string): void {
    const env = this.environments.get(handle);
    if (env) {
      env.state = 'stopped';
      env.processes.clear();
      this.logger.debug('Environment killed', { runtimeHandle: handle });
    }
  }

  /**
   * End a workload process behind the control plane's back
   */
  killWorkload(handle: string, workloadId: string): void {
    this.environments.get(handle)?.processes.delete(workloadId);
  }

  // ===========================================================================
  // Introspection
  // ===========================================================================

  /**
   * Snapshot of one environment
   */
  getEnvironment(handle: string): SimulatedEnvironment | undefined {
    const env = this.environments.get(handle);
    return env ? this.snapshot(handle, env) : undefined;
  }

  /**
   * Snapshots of every environment that has not been removed
   */
  listEnvironments(): SimulatedEnvironment[] {
    return [...this.environments.entries()].map(([handle, env]) => this.snapshot(handle, env));
  }

  /**
   * Number of calls made to an operation
   */
  callCount(operation: SimulatedOperation): number {
    return this.callCounts.get(operation) ?? 0;
  }

  // ===========================================================================
  // ContainerRuntime
  // ===========================================================================

  async createEnvironment(spec: EnvironmentSpec): Promise<string> {
    await this.enter('createEnvironment');
    const handle = `${this.handlePrefix}-${++this.sequence}`;
    this.environments.set(handle, { spec: { ...spec }, state: 'created', processes: new Map() });
    this.logger.debug('Environment created', { runtimeHandle: handle, nodeId: spec.nodeId });
    return handle;
  }

  async startEnvironment(handle: string): Promise<void> {
    await this.enter('startEnvironment');
    this.require(handle, 'startEnvironment').state = 'running';
  }

  async stopEnvironment(handle: string): Promise<void> {
    await this.enter('stopEnvironment');
    const env = this.environments.get(handle);
    if (env) {
      env.state = 'stopped';
      env.processes.clear();
    }
  }

  async removeEnvironment(handle: string): Promise<void> {
    await this.enter('removeEnvironment');
    this.environments.delete(handle);
  }

  async isAlive(handle: string): Promise<boolean> {
    await this.enter('isAlive');
    return this.environments.get(handle)?.state === 'running';
  }

  async launchWorkload(handle: string, spec: WorkloadProcessSpec): Promise<void> {
    await this.enter('launchWorkload');
    const env = this.require(handle, 'launchWorkload');
    if (env.state !== 'running') {
      throw RuntimeError.refused('launchWorkload', `environment ${handle} is ${env.state}`, {
        workloadId: spec.workloadId,
      });
    }
    if (!env.processes.has(spec.workloadId)) {
      env.processes.set(spec.workloadId, { ...spec });
    }
  }

  async stopWorkload(handle: string, workloadId: string): Promise<void> {
    await this.enter('stopWorkload');
    this.environments.get(handle)?.processes.delete(workloadId);
  }

  async isWorkloadAlive(handle: string, workloadId: string): Promise<boolean> {
    await this.enter('isWorkloadAlive');
    const env = this.environments.get(handle);
    return env?.state === 'running' && env.processes.has(workloadId);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async enter(operation: SimulatedOperation): Promise<void> {
    this.callCounts.set(operation, this.callCount(operation) + 1);

    const delay = this.delays.get(operation) ?? this.delayMs;
    if (delay > 0) {
      await sleep(delay);
    }

    const fault = this.faults.get(operation);
    if (!fault) {
      return;
    }
    fault.remaining--;
    if (fault.remaining <= 0) {
      this.faults.delete(operation);
    }
    if (fault.kind === 'hang') {
      await new Promise<never>(() => undefined);
    }
    if (fault.kind === 'refuse') {
      throw RuntimeError.refused(operation, fault.reason);
    }
  }

  private require(handle: string, operation: SimulatedOperation): EnvironmentRecord {
    const env = this.environments.get(handle);
    if (!env) {
      throw RuntimeError.refused(operation, `no such environment: ${handle}`);
    }
    return env;
  }

  private snapshot(handle: string, env: EnvironmentRecord): SimulatedEnvironment {
    return { handle, spec: { ...env.spec }, state: env.state, workloads: [...env.processes.keys()] };
  }
}

/**
 * Create a simulated runtime
 */
export function createSimulatedRuntime(options?: SimulatedRuntimeOptions): SimulatedRuntime {
  return new SimulatedRuntime(options);
}
