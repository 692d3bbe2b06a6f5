/**
 * Cluster Commands
 *
 * Cluster overview and manual reconciliation
 * @module @kubesim/cli/commands/cluster
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { ApiClient } from '../config.js';
import type { ClusterStatusView, ReconcileResponse } from '../api-types.js';
import { getOutputFormat, keyValue, output, resources } from '../output.js';
import { printNodes, type ClientProvider } from './node.js';
import { printWorkloads } from './workload.js';

/**
 * Status handler: nodes, workloads and totals
 */
export async function statusHandler(client: ApiClient): Promise<void> {
  const status = await client.get<ClusterStatusView>('/api/status');

  if (getOutputFormat() === 'json') {
    output(status);
    return;
  }

  const { stats } = status;
  keyValue({
    Runtime: status.runtime,
    Revision: stats.revision,
    'Ready Nodes': stats.nodesByPhase.Ready,
    Capacity: resources(stats.totalCapacity),
    Allocated: resources(stats.totalAllocated),
    Free: resources(stats.totalFree),
    Pending: stats.workloadsByPhase.Pending,
    Running: stats.workloadsByPhase.Running,
  });

  const heading = (title: string): void => {
    if (getOutputFormat() === 'table') {
      console.log('\n' + chalk.bold(title));
    }
  };

  heading('Nodes');
  printNodes(status.nodes);
  heading('Workloads');
  printWorkloads(status.workloads, new Map(status.nodes.map((node) => [node.id, node.name])));
}

/**
 * Reconcile handler: runs one pass and prints what it did
 */
export async function reconcileHandler(client: ApiClient): Promise<void> {
  const { summary } = await client.post<ReconcileResponse>('/api/reconcile');

  if (getOutputFormat() === 'json') {
    output(summary);
    return;
  }

  keyValue({
    Scheduled: summary.scheduled.length,
    Started: summary.started.length,
    Unschedulable: summary.unschedulable.length,
    Failed: summary.failed.length,
    Evicted: summary.evicted.length,
    'Orphans Removed': summary.orphansRemoved.length,
    Conflicts: summary.conflicts.length,
    Duration: `${summary.durationMs}ms`,
  });
}

/**
 * Creates the status command
 */
export function createStatusCommand(getClient: ClientProvider): Command {
  return new Command('status')
    .description('Show cluster status overview')
    .action(() => statusHandler(getClient()));
}

/**
 * Creates the reconcile command
 */
export function createReconcileCommand(getClient: ClientProvider): Command {
  return new Command('reconcile')
    .description('Run one reconciliation pass now')
    .action(() => reconcileHandler(getClient()));
}
