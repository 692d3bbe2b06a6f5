/**
 * Container runtime adapters
 * @module @kubesim/node-runtime/adapters
 */

export {
  DockerRuntime,
  createDockerRuntime,
  dockerStatusCode,
  shellQuote,
  NODE_CONTAINER_LABELS,
  DOCKER_RUNTIME_DEFAULTS,
  DEFAULT_WORKLOAD_COMMAND,
  type DockerRuntimeOptions,
} from './docker-runtime.js';

export {
  SimulatedRuntime,
  createSimulatedRuntime,
  type SimulatedOperation,
  type SimulatedEnvironment,
  type SimulatedEnvironmentState,
  type SimulatedRuntimeOptions,
} from './simulated-runtime.js';
