import { Command } from 'commander';
import chalk from 'chalk';
import { collectGraphStats, createRuntime, type NodeTypeCount } from '@papergraph/core';
import type { RuntimeOverrides } from './ask.js';

/**
 * Status information about the PaperGraph graph.
 */
export interface StatusInfo {
  health: 'ok' | 'degraded' | 'not_initialized';
  graphUri: string | null;
  database: string | null;
  totalNodes: number;
  totalRelationships: number;
  nodeTypes: NodeTypeCount[];
  message?: string;
}

const EMPTY_STATUS: StatusInfo = {
  health: 'not_initialized',
  graphUri: null,
  database: null,
  totalNodes: 0,
  totalRelationships: 0,
  nodeTypes: [],
};

export async function collectStatus(rootDir: string, overrides: RuntimeOverrides = {}): Promise<StatusInfo> {
  const runtimeResult = await createRuntime({ rootDir, ...overrides, skipConnectivityCheck: true });
  if (runtimeResult.isErr()) {
    return { ...EMPTY_STATUS, message: runtimeResult.error.message };
  }

  const runtime = runtimeResult.value;
  const base: StatusInfo = {
    ...EMPTY_STATUS,
    health: 'degraded',
    graphUri: runtime.config.graph.uri,
    database: runtime.config.graph.database ?? null,
  };

  try {
    const connected = await runtime.executor.verifyConnectivity();
    if (connected.isErr()) {
      return { ...base, message: connected.error.message };
    }

    const stats = await collectGraphStats(runtime.executor);
    if (stats.isErr()) {
      return { ...base, message: stats.error.message };
    }

    return {
      ...base,
      health: stats.value.totalNodes > 0 ? 'ok' : 'degraded',
      totalNodes: stats.value.totalNodes,
      totalRelationships: stats.value.totalRelationships,
      nodeTypes: stats.value.nodeTypes,
    };
  } finally {
    await runtime.close();
  }
}

/**
 * Format status info for human-readable terminal output.
 */
export function formatStatus(status: StatusInfo): string {
  const lines: string[] = [];

  lines.push(chalk.bold('PaperGraph Status'));
  lines.push('');

  const healthColor =
    status.health === 'ok'
      ? chalk.green
      : status.health === 'degraded'
        ? chalk.yellow
        : chalk.red;

  lines.push(`  Health:        ${healthColor(status.health)}`);
  lines.push(`  Graph:         ${chalk.cyan(status.graphUri ?? 'unknown')}`);
  lines.push(`  Database:      ${chalk.cyan(status.database ?? 'default')}`);
  lines.push(`  Nodes:         ${chalk.cyan(String(status.totalNodes))}`);
  lines.push(`  Relationships: ${chalk.cyan(String(status.totalRelationships))}`);

  for (const { label, count } of status.nodeTypes) {
    lines.push(`    ${label.padEnd(14)} ${count}`);
  }

  if (status.message !== undefined) {
    lines.push('');
    lines.push(`  ${chalk.dim(status.message)}`);
  }

  return lines.join('\n');
}

/**
 * Format status info as JSON.
 */
export function formatStatusJSON(status: StatusInfo): string {
  return JSON.stringify(status, null, 2);
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show graph connectivity and node counts')
    .option('--json', 'Output in JSON format')
    .action(async (options: { json?: boolean }) => {
      try {
        const status = await collectStatus(process.cwd());

        if (options.json) {
          // eslint-disable-next-line no-console
          console.log(formatStatusJSON(status));
          return;
        }

        // eslint-disable-next-line no-console
        console.log(formatStatus(status));
        if (status.health === 'not_initialized') {
          // eslint-disable-next-line no-console
          console.log('');
          // eslint-disable-next-line no-console
          console.log(chalk.yellow('Run "papergraph init" to initialize the project.'));
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Status check failed:'), message);
        process.exit(1);
      }
    });
}
