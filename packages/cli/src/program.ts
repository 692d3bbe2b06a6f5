/**
 * kubesim CLI program
 *
 * Command-line client for the kubesim API: nodes, workloads and cluster status.
 * @module @kubesim/cli/program
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import {
  CONFIG_FILE,
  createApiClient,
  loadConfig,
  resolveApiUrl,
  saveConfig,
  type ApiClient,
  type CliConfig,
} from './config.js';
import { OUTPUT_FORMATS, isOutputFormat, keyValue, setOutputFormat, success } from './output.js';
import { createNodeCommand } from './commands/node.js';
import { createWorkloadCommand } from './commands/workload.js';
import { createReconcileCommand, createStatusCommand } from './commands/cluster.js';

export { ApiRequestError, createApiClient, resolveApiUrl, type ApiClient } from './config.js';
export type * from './api-types.js';

/**
 * CLI version from package.json
 */
export const VERSION = '0.1.0';

/**
 * CLI program description
 */
const DESCRIPTION = `
kubesim CLI

Provision simulated nodes, submit workloads and watch them get scheduled.

Commands:
  node        Node management (add, list, get, stop, drain, stop-all)
  workload    Workload management (submit, list, get, terminate, resubmit, delete)
  status      Cluster status overview
  reconcile   Run one reconciliation pass

Examples:
  $ kubesim node add 4 --memory 8192
  $ kubesim workload submit web --cpu 1 --replicas 3
  $ kubesim status
`;

/**
 * Injectable collaborators, for tests
 */
export interface ProgramDependencies {
  fetch?: typeof fetch;
  env?: NodeJS.ProcessEnv;
  configFile?: string;
}

type GlobalOptions = {
  output?: string;
  apiUrl?: string;
  color: boolean;
};

interface ConfigOptions {
  show?: boolean;
  set?: string;
}

/**
 * Creates and configures the main CLI program
 */
export function createProgram(deps: ProgramDependencies = {}): Command {
  const configFile = deps.configFile ?? CONFIG_FILE;
  let client: ApiClient | undefined;

  const getClient = (): ApiClient => {
    if (!client) {
      throw new Error('API client requested before options were parsed');
    }
    return client;
  };

  const program = new Command();

  program
    .name('kubesim')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .addOption(new Option('-o, --output <format>', 'Output format').choices(OUTPUT_FORMATS))
    .option('--api-url <url>', 'API server URL')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<GlobalOptions>();
      const config: CliConfig = loadConfig(configFile);

      const format = opts.output ?? config.defaultOutputFormat ?? 'table';
      setOutputFormat(isOutputFormat(format) ? format : 'table');

      if (!opts.color) {
        chalk.level = 0;
      }

      client = createApiClient(resolveApiUrl(opts.apiUrl, deps.env ?? process.env, config), deps.fetch);
    });

  program.addCommand(createNodeCommand(getClient));
  program.addCommand(createWorkloadCommand(getClient));
  program.addCommand(createStatusCommand(getClient));
  program.addCommand(createReconcileCommand(getClient));

  program
    .command('config')
    .description('Manage CLI configuration')
    .option('--show', 'Show current configuration')
    .option('--set <key=value>', 'Set apiUrl or defaultOutputFormat')
    .action((options: ConfigOptions) => {
      if (options.set) {
        const separator = options.set.indexOf('=');
        const key = separator > 0 ? options.set.slice(0, separator) : options.set;
        const value = separator > 0 ? options.set.slice(separator + 1) : '';

        if (key === 'apiUrl' && value) {
          saveConfig({ apiUrl: value }, configFile);
        } else if (key === 'defaultOutputFormat' && isOutputFormat(value)) {
          saveConfig({ defaultOutputFormat: value }, configFile);
        } else {
          throw new InvalidArgumentError(`Cannot set '${options.set}'`);
        }
        success(`Set ${key} to ${value}`);
        return;
      }

      keyValue({ file: configFile, ...loadConfig(configFile), activeApiUrl: getClient().baseUrl });
    });

  return program;
}
