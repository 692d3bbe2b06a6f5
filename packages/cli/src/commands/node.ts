/**
 * Node Commands
 *
 * Node management commands: add, list, get, stop, drain, stop-all
 * @module @kubesim/cli/commands/node
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { ApiClient } from '../config.js';
import type { NodeEvictionResponse, NodeListResponse, NodeResponse, NodeView } from '../api-types.js';
import { parsePositiveInteger, parsePositiveNumber, queryString } from '../arguments.js';
import {
  error,
  getOutputFormat,
  info,
  keyValue,
  output,
  phaseBadge,
  relativeTime,
  resources,
  success,
  table,
} from '../output.js';

/**
 * Resolves the API client once global options are parsed
 */
export type ClientProvider = () => ApiClient;

interface AddOptions {
  memory?: number;
  name?: string;
}

interface ListOptions {
  phase?: string;
  all?: boolean;
}

interface RevisionOptions {
  revision?: number;
}

/**
 * Print one node in detail
 */
export function printNode(node: NodeView): void {
  if (getOutputFormat() === 'json') {
    output(node);
    return;
  }

  keyValue({
    ID: node.id,
    Name: node.name,
    Phase: phaseBadge(node.phase),
    Revision: node.revision,
    Capacity: resources(node.capacity),
    Allocated: resources(node.allocated),
    Free: resources(node.free),
    Workloads: node.workloadCount,
    'Last Heartbeat': node.lastHeartbeat ? relativeTime(node.lastHeartbeat) : null,
    Message: node.message ?? null,
  });
}

/**
 * Print nodes as a table
 */
export function printNodes(nodes: NodeView[]): void {
  if (getOutputFormat() === 'json') {
    output(nodes);
    return;
  }

  table(
    nodes.map((node) => ({
      id: node.id,
      name: node.name,
      phase: phaseBadge(node.phase),
      capacity: resources(node.capacity),
      free: resources(node.free),
      workloads: node.workloadCount,
      heartbeat: node.lastHeartbeat ? relativeTime(node.lastHeartbeat) : '-',
    })),
    [
      { key: 'id', header: 'ID' },
      { key: 'name', header: 'NAME' },
      { key: 'phase', header: 'PHASE' },
      { key: 'capacity', header: 'CAPACITY' },
      { key: 'free', header: 'FREE' },
      { key: 'workloads', header: 'WORKLOADS' },
      { key: 'heartbeat', header: 'HEARTBEAT' },
    ],
  );
}

function reportEviction(verb: string, result: NodeEvictionResponse): void {
  if (getOutputFormat() === 'json') {
    output(result);
    return;
  }
  success(`Node ${result.node.name} ${verb}, ${result.evicted.length} workload(s) returned to Pending`);
}

/**
 * Add node handler
 */
export async function addHandler(client: ApiClient, cpu: number, options: AddOptions): Promise<void> {
  const { node } = await client.post<NodeResponse>('/api/nodes', {
    name: options.name,
    capacity: { cpu, memory: options.memory },
  });

  if (getOutputFormat() !== 'json') {
    success(`Node ${node.name} is ${node.phase}`);
  }
  printNode(node);
}

/**
 * List nodes handler
 */
export async function listHandler(client: ApiClient, options: ListOptions): Promise<void> {
  const { nodes, total } = await client.get<NodeListResponse>(
    `/api/nodes${queryString({ phase: options.phase, includeDeleted: options.all ? 'true' : undefined })}`,
  );

  printNodes(nodes);
  if (getOutputFormat() === 'table' && total > 0) {
    console.log(chalk.gray(`\n${total} node(s)`));
  }
}

/**
 * Get node handler
 */
export async function getHandler(client: ApiClient, id: string): Promise<void> {
  const { node } = await client.get<NodeResponse>(`/api/nodes/${encodeURIComponent(id)}`);
  printNode(node);
}

/**
 * Stop node handler: terminates the environment and evicts its workloads
 */
export async function stopHandler(client: ApiClient, id: string, options: RevisionOptions): Promise<void> {
  const result = await client.delete<NodeEvictionResponse>(`/api/nodes/${encodeURIComponent(id)}`, {
    ifMatch: options.revision,
  });
  reportEviction('stopped', result);
}

/**
 * Drain node handler
 */
export async function drainHandler(client: ApiClient, id: string, options: RevisionOptions): Promise<void> {
  const result = await client.post<NodeEvictionResponse>(`/api/nodes/${encodeURIComponent(id)}/drain`, undefined, {
    ifMatch: options.revision,
  });
  reportEviction('drained', result);
}

/**
 * Stop every node that is not already deleted
 */
export async function stopAllHandler(client: ApiClient): Promise<void> {
  const { nodes } = await client.get<NodeListResponse>('/api/nodes');

  if (nodes.length === 0) {
    info('No nodes to stop');
    return;
  }

  const stopped: NodeEvictionResponse[] = [];
  let failures = 0;
  for (const node of nodes) {
    try {
      stopped.push(await client.delete<NodeEvictionResponse>(`/api/nodes/${encodeURIComponent(node.id)}`));
    } catch (err) {
      failures++;
      error(`Failed to stop node ${node.name}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  if (getOutputFormat() === 'json') {
    output({ stopped: stopped.map((result) => result.node.id), failed: failures });
  } else {
    const evicted = stopped.reduce((sum, result) => sum + result.evicted.length, 0);
    success(`Stopped ${stopped.length} node(s), ${evicted} workload(s) returned to Pending`);
  }

  if (failures > 0) {
    throw new Error(`${failures} node(s) could not be stopped`);
  }
}

/**
 * Creates the node command group
 */
export function createNodeCommand(getClient: ClientProvider): Command {
  const node = new Command('node').description('Node management');

  node
    .command('add')
    .description('Provision a node with the given CPU capacity')
    .argument('<cpu>', 'CPU units', parsePositiveNumber)
    .option('-m, --memory <mib>', 'Memory in MiB (default 4096)', parsePositiveInteger)
    .option('-n, --name <name>', 'Node name (generated when omitted)')
    .action((cpu: number, options: AddOptions) => addHandler(getClient(), cpu, options));

  node
    .command('list')
    .alias('ls')
    .description('List nodes')
    .option('-p, --phase <phase>', 'Filter by phase')
    .option('-a, --all', 'Include deleted nodes')
    .action((options: ListOptions) => listHandler(getClient(), options));

  node
    .command('get')
    .description('Show a node')
    .argument('<id>', 'Node ID')
    .action((id: string) => getHandler(getClient(), id));

  node
    .command('stop')
    .description('Stop a node and return its workloads to Pending')
    .argument('<id>', 'Node ID')
    .option('-r, --revision <revision>', 'Expected node revision', parsePositiveInteger)
    .action((id: string, options: RevisionOptions) => stopHandler(getClient(), id, options));

  node
    .command('drain')
    .description('Stop scheduling onto a node and evict its workloads')
    .argument('<id>', 'Node ID')
    .option('-r, --revision <revision>', 'Expected node revision', parsePositiveInteger)
    .action((id: string, options: RevisionOptions) => drainHandler(getClient(), id, options));

  node
    .command('stop-all')
    .description('Stop every node')
    .action(() => stopAllHandler(getClient()));

  return node;
}
