/**
 * Workload Commands
 *
 * Workload management commands: submit, list, get, terminate, resubmit, delete
 * @module @kubesim/cli/commands/workload
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { ApiClient } from '../config.js';
import type {
  WorkloadDeleteResponse,
  WorkloadListResponse,
  WorkloadResponse,
  WorkloadSubmitResponse,
  WorkloadView,
} from '../api-types.js';
import { parseCommand, parsePositiveInteger, parsePositiveNumber, queryString } from '../arguments.js';
import { getOutputFormat, keyValue, output, phaseBadge, resources, success, table, truncate } from '../output.js';
import type { ClientProvider } from './node.js';

interface SubmitOptions {
  cpu: number;
  memory?: number;
  replicas?: number;
  image?: string;
  command?: string[];
}

interface ListOptions {
  phase?: string;
  node?: string;
}

interface RevisionOptions {
  revision?: number;
}

function statusMessage(workload: WorkloadView): string {
  return workload.schedulingStatus?.message ?? workload.message ?? '';
}

/**
 * Print one workload in detail
 */
export function printWorkload(workload: WorkloadView): void {
  if (getOutputFormat() === 'json') {
    output(workload);
    return;
  }

  keyValue({
    ID: workload.id,
    Name: workload.name,
    Group: workload.group,
    Phase: phaseBadge(workload.phase),
    Revision: workload.revision,
    Request: resources(workload.request),
    Node: workload.nodeId,
    Message: workload.message ?? null,
    Scheduling: workload.schedulingStatus
      ? `${workload.schedulingStatus.reason}: ${workload.schedulingStatus.message}`
      : null,
  });
}

/**
 * Print workloads as a table; node names are shown where known
 */
export function printWorkloads(workloads: WorkloadView[], nodeNames: ReadonlyMap<string, string> = new Map()): void {
  if (getOutputFormat() === 'json') {
    output(workloads);
    return;
  }

  table(
    workloads.map((workload) => ({
      id: workload.id,
      name: workload.name,
      phase: phaseBadge(workload.phase),
      request: resources(workload.request),
      node: workload.nodeId ? (nodeNames.get(workload.nodeId) ?? workload.nodeId) : '-',
      message: truncate(statusMessage(workload), 60),
    })),
    [
      { key: 'id', header: 'ID' },
      { key: 'name', header: 'NAME' },
      { key: 'phase', header: 'PHASE' },
      { key: 'request', header: 'REQUEST' },
      { key: 'node', header: 'NODE' },
      { key: 'message', header: 'MESSAGE' },
    ],
  );
}

/**
 * Submit workload handler
 */
export async function submitHandler(client: ApiClient, name: string, options: SubmitOptions): Promise<void> {
  const { workloads } = await client.post<WorkloadSubmitResponse>('/api/workloads', {
    name,
    request: { cpu: options.cpu, memory: options.memory },
    replicas: options.replicas,
    image: options.image,
    command: options.command,
  });

  if (getOutputFormat() !== 'json') {
    success(`Submitted ${workloads.length} instance(s) of ${name}`);
  }
  printWorkloads(workloads);
}

/**
 * List workloads handler
 */
export async function listHandler(client: ApiClient, options: ListOptions): Promise<void> {
  const { workloads, total } = await client.get<WorkloadListResponse>(
    `/api/workloads${queryString({ phase: options.phase, nodeId: options.node })}`,
  );

  printWorkloads(workloads);
  if (getOutputFormat() === 'table' && total > 0) {
    console.log(chalk.gray(`\n${total} workload(s)`));
  }
}

/**
 * Get workload handler
 */
export async function getHandler(client: ApiClient, id: string): Promise<void> {
  const { workload } = await client.get<WorkloadResponse>(`/api/workloads/${encodeURIComponent(id)}`);
  printWorkload(workload);
}

/**
 * Terminate workload handler
 */
export async function terminateHandler(client: ApiClient, id: string, options: RevisionOptions): Promise<void> {
  const { workload } = await client.post<WorkloadResponse>(
    `/api/workloads/${encodeURIComponent(id)}/terminate`,
    undefined,
    { ifMatch: options.revision },
  );

  if (getOutputFormat() === 'json') {
    output(workload);
    return;
  }
  success(`Workload ${workload.name} is ${workload.phase}`);
}

/**
 * Resubmit workload handler: clones a Terminated or Failed workload
 */
export async function resubmitHandler(client: ApiClient, id: string): Promise<void> {
  const { workload } = await client.post<WorkloadResponse>(`/api/workloads/${encodeURIComponent(id)}/resubmit`);

  if (getOutputFormat() !== 'json') {
    success(`Resubmitted ${workload.name} as ${workload.id}`);
  }
  printWorkload(workload);
}

/**
 * Delete workload handler
 */
export async function deleteHandler(client: ApiClient, id: string, options: RevisionOptions): Promise<void> {
  const result = await client.delete<WorkloadDeleteResponse>(`/api/workloads/${encodeURIComponent(id)}`, {
    ifMatch: options.revision,
  });

  if (getOutputFormat() === 'json') {
    output(result);
    return;
  }
  success(`Workload ${result.id} deleted`);
}

/**
 * Creates the workload command group
 */
export function createWorkloadCommand(getClient: ClientProvider): Command {
  const workload = new Command('workload').description('Workload management');

  workload
    .command('submit')
    .description('Submit a workload')
    .argument('<name>', 'Workload name')
    .requiredOption('-c, --cpu <cpu>', 'CPU request', parsePositiveNumber)
    .option('-m, --memory <mib>', 'Memory request in MiB (default 128)', parsePositiveInteger)
    .option('-r, --replicas <count>', 'Number of instances', parsePositiveInteger)
    .option('-i, --image <image>', 'Container image')
    .option('--command <command>', 'Command to run', parseCommand)
    .action((name: string, options: SubmitOptions) => submitHandler(getClient(), name, options));

  workload
    .command('list')
    .alias('ls')
    .description('List workloads')
    .option('-p, --phase <phase>', 'Filter by phase')
    .option('-n, --node <id>', 'Filter by node ID')
    .action((options: ListOptions) => listHandler(getClient(), options));

  workload
    .command('get')
    .description('Show a workload and its scheduling status')
    .argument('<id>', 'Workload ID')
    .action((id: string) => getHandler(getClient(), id));

  workload
    .command('terminate')
    .description('Stop a workload and release its capacity')
    .argument('<id>', 'Workload ID')
    .option('--revision <revision>', 'Expected workload revision', parsePositiveInteger)
    .action((id: string, options: RevisionOptions) => terminateHandler(getClient(), id, options));

  workload
    .command('resubmit')
    .description('Submit a copy of a Terminated or Failed workload')
    .argument('<id>', 'Workload ID')
    .action((id: string) => resubmitHandler(getClient(), id));

  workload
    .command('delete')
    .alias('rm')
    .description('Terminate and remove a workload')
    .argument('<id>', 'Workload ID')
    .option('--revision <revision>', 'Expected workload revision', parsePositiveInteger)
    .action((id: string, options: RevisionOptions) => deleteHandler(getClient(), id, options));

  return workload;
}
