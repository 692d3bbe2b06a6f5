/**
 * Docker container runtime
 * @module @kubesim/node-runtime/adapters/docker-runtime
 *
 * One long-lived container per node (`tail -f /dev/null`) with CPU and memory
 * limits taken from the node's capacity. Workloads run as background
 * processes started through `docker exec`; each keeps its pid in a file inside
 * the container so later execs can probe and stop it.
 */

import type { Duplex } from 'node:stream';
import Docker from 'dockerode';
import type { ContainerRuntime, EnvironmentSpec, Logger, WorkloadProcessSpec } from '@kubesim/shared';
import { RuntimeError, createServiceLogger, errorMessage, retry } from '@kubesim/shared';

/**
 * Labels put on every node container
 */
export const NODE_CONTAINER_LABELS = {
  app: 'kubesim',
  type: 'node',
} as const;

/**
 * Default options
 */
export const DOCKER_RUNTIME_DEFAULTS = {
  image: 'python:3.9-slim',
  stopTimeoutSeconds: 5,
  stateDir: '/tmp/kubesim',
  pullAttempts: 3,
  pullRetryDelayMs: 1_000,
} as const;

/**
 * Command run by a workload that names none
 */
export const DEFAULT_WORKLOAD_COMMAND: readonly string[] = ['tail', '-f', '/dev/null'];

/**
 * Docker runtime options
 */
export interface DockerRuntimeOptions {
  /** Docker client (default: from the environment, i.e. DOCKER_HOST or the local socket) */
  docker?: Docker;
  /** Default node image */
  image?: string;
  /** Grace period given to `docker stop` in seconds */
  stopTimeoutSeconds?: number;
  /** Directory inside node containers holding pid and log files */
  stateDir?: string;
  /** Logger override */
  logger?: Logger;
}

/**
 * HTTP status carried by a dockerode error, if any
 */
export function dockerStatusCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Quote one argument for `sh -c`
 */
export function shellQuote(arg: string): string {
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Docker-backed container runtime
 */
export class DockerRuntime implements ContainerRuntime {
  readonly name = 'docker';

  private readonly docker: Docker;
  private readonly image: string;
  private readonly stopTimeoutSeconds: number;
  private readonly stateDir: string;
  private readonly logger: Logger;

  constructor(options: DockerRuntimeOptions = {}) {
    this.docker = options.docker ?? new Docker();
    this.image = options.image ?? DOCKER_RUNTIME_DEFAULTS.image;
    this.stopTimeoutSeconds = options.stopTimeoutSeconds ?? DOCKER_RUNTIME_DEFAULTS.stopTimeoutSeconds;
    this.stateDir = options.stateDir ?? DOCKER_RUNTIME_DEFAULTS.stateDir;
    this.logger =
      options.logger ?? createServiceLogger({ level: 'debug', service: 'kubesim' }, { component: 'docker-runtime' });
  }

  /**
   * Check that the daemon answers; throws RuntimeError RUNTIME_UNAVAILABLE otherwise
   */
  async ping(): Promise<void> {
    try {
      await this.docker.ping();
    } catch (error) {
      throw RuntimeError.unavailable(this.name, errorMessage(error), error instanceof Error ? error : undefined);
    }
  }

  // ===========================================================================
  // Environments
  // ===========================================================================

  async createEnvironment(spec: EnvironmentSpec): Promise<string> {
    const image = spec.image ?? this.image;

    return this.call('createEnvironment', async () => {
      await this.ensureImage(image);
      const container = await this.docker.createContainer({
        Image: image,
        name: `kubesim-${spec.name}-${spec.nodeId.slice(0, 8)}`,
        Cmd: ['tail', '-f', '/dev/null'],
        Labels: {
          ...NODE_CONTAINER_LABELS,
          'kubesim.node-id': spec.nodeId,
          'kubesim.node-name': spec.name,
        },
        HostConfig: {
          NanoCpus: Math.round(spec.capacity.cpu * 1e9),
          Memory: spec.capacity.memory * 1024 * 1024,
        },
      });
      this.logger.info('Created node container', { nodeId: spec.nodeId, containerId: container.id, image });
      return container.id;
    });
  }

  async startEnvironment(handle: string): Promise<void> {
    // 304: already started
    await this.tolerate(
      'startEnvironment',
      async () => {
        await this.docker.getContainer(handle).start();
      },
      [304],
      undefined,
    );
  }

  async stopEnvironment(handle: string): Promise<void> {
    // 304: already stopped, 404: gone
    await this.tolerate(
      'stopEnvironment',
      async () => {
        await this.docker.getContainer(handle).stop({ t: this.stopTimeoutSeconds });
      },
      [304, 404],
      undefined,
    );
  }

  async removeEnvironment(handle: string): Promise<void> {
    await this.tolerate(
      'removeEnvironment',
      async () => {
        await this.docker.getContainer(handle).remove({ force: true });
        this.logger.info('Removed node container', { containerId: handle });
      },
      [404],
      undefined,
    );
  }

  async isAlive(handle: string): Promise<boolean> {
    try {
      const info = await this.docker.getContainer(handle).inspect();
      return info.State.Running;
    } catch (error) {
      if (dockerStatusCode(error) === 404) {
        return false;
      }
      throw this.wrap('isAlive', error, handle);
    }
  }

  // ===========================================================================
  // Workload processes
  // ===========================================================================

  /**
   * Start the workload's command in the background. A process that is
   * already running is left alone.
   */
  async launchWorkload(handle: string, spec: WorkloadProcessSpec): Promise<void> {
    if (await this.isWorkloadAlive(handle, spec.workloadId)) {
      return;
    }

    const command = (spec.command ?? DEFAULT_WORKLOAD_COMMAND).map(shellQuote).join(' ');
    const log = this.stateFile(spec.workloadId, 'log');
    const pid = this.stateFile(spec.workloadId, 'pid');
    const script = `mkdir -p ${shellQuote(this.stateDir)}; nohup ${command} > ${log} 2>&1 & echo $! > ${pid}`;

    const exitCode = await this.call('launchWorkload', () =>
      this.exec(handle, script, [
        `KUBESIM_WORKLOAD_ID=${spec.workloadId}`,
        `KUBESIM_WORKLOAD_NAME=${spec.name}`,
        `KUBESIM_CPU=${spec.request.cpu}`,
        `KUBESIM_MEMORY_MIB=${spec.request.memory}`,
      ]),
    );
    if (exitCode !== 0) {
      throw RuntimeError.refused('launchWorkload', `launch script exited with ${exitCode}`, {
        runtimeHandle: handle,
        workloadId: spec.workloadId,
      });
    }
    this.logger.debug('Launched workload process', { containerId: handle, workloadId: spec.workloadId });
  }

  async stopWorkload(handle: string, workloadId: string): Promise<void> {
    const pid = this.stateFile(workloadId, 'pid');
    const script = `if [ -f ${pid} ]; then kill $(cat ${pid}) 2>/dev/null; rm -f ${pid}; fi`;
    // 404: container gone, 409: container not running; either way the process is gone
    await this.tolerate('stopWorkload', () => this.exec(handle, script), [404, 409], -1);
  }

  async isWorkloadAlive(handle: string, workloadId: string): Promise<boolean> {
    const pid = this.stateFile(workloadId, 'pid');
    const result = await this.tolerate(
      'isWorkloadAlive',
      () => this.exec(handle, `[ -f ${pid} ] && kill -0 $(cat ${pid}) 2>/dev/null`),
      [404, 409],
      -1,
    );
    return result === 0;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private stateFile(workloadId: string, extension: 'pid' | 'log'): string {
    return shellQuote(`${this.stateDir}/${workloadId}.${extension}`);
  }

  /**
   * Pull the image unless it is present locally
   */
  private async ensureImage(image: string): Promise<void> {
    try {
      await this.docker.getImage(image).inspect();
      return;
    } catch (error) {
      if (dockerStatusCode(error) !== 404) {
        throw error;
      }
    }

    this.logger.info('Pulling image', { image });
    await retry(() => this.pullImage(image), {
      attempts: DOCKER_RUNTIME_DEFAULTS.pullAttempts,
      delayMs: DOCKER_RUNTIME_DEFAULTS.pullRetryDelayMs,
      shouldRetry: (error) => dockerStatusCode(error) !== 404,
    });
  }

  private async pullImage(image: string): Promise<void> {
    const stream: NodeJS.ReadableStream = await this.docker.pull(image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Run `sh -c script` in the container and return its exit code
   */
  private async exec(handle: string, script: string, env: string[] = []): Promise<number> {
    const exec = await this.docker.getContainer(handle).exec({
      Cmd: ['sh', '-c', script],
      Env: env,
      AttachStdout: true,
      AttachStderr: true,
    });
    const stream: Duplex = await exec.start({ hijack: true, stdin: false });
    await new Promise<void>((resolve, reject) => {
      stream.on('end', () => resolve());
      stream.on('close', () => resolve());
      stream.on('error', reject);
      stream.resume();
    });
    const info = await exec.inspect();
    return info.ExitCode ?? -1;
  }

  /**
   * Run a Docker call, converting failures to RuntimeError
   */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.wrap(operation, error);
    }
  }

  /**
   * Run a Docker call whose listed HTTP statuses count as success with `fallback`
   */
  private async tolerate<T>(
    operation: string,
    fn: () => Promise<T>,
    statuses: readonly number[],
    fallback: T,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const status = dockerStatusCode(error);
      if (status !== undefined && statuses.includes(status)) {
        this.logger.debug('Docker call tolerated', { operation, statusCode: status });
        return fallback;
      }
      throw this.wrap(operation, error);
    }
  }

  private wrap(operation: string, error: unknown, handle?: string): RuntimeError {
    if (error instanceof RuntimeError) {
      return error;
    }
    return RuntimeError.refused(
      operation,
      errorMessage(error),
      { runtimeHandle: handle, statusCode: dockerStatusCode(error) },
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Create a Docker runtime
 */
export function createDockerRuntime(options?: DockerRuntimeOptions): DockerRuntime {
  return new DockerRuntime(options);
}
