import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { err, type Result } from 'neverthrow';
import { createRuntime, readPaperDocument, type LoadStep, type LoadSummary } from '@papergraph/core';
import type { RuntimeOverrides } from './ask.js';

/** Read a paper document and write it into the graph, replacing what was there. */
export async function loadPaper(
  rootDir: string,
  filePath: string,
  options: { onProgress?: (step: LoadStep) => void } & RuntimeOverrides = {},
): Promise<Result<LoadSummary, Error>> {
  const { onProgress, ...overrides } = options;

  const document = await readPaperDocument(resolve(rootDir, filePath));
  if (document.isErr()) {
    return err(document.error);
  }

  const runtimeResult = await createRuntime({ rootDir, ...overrides });
  if (runtimeResult.isErr()) {
    return err(runtimeResult.error);
  }

  const runtime = runtimeResult.value;
  try {
    return await runtime.createLoader(onProgress).load(document.value);
  } finally {
    await runtime.close();
  }
}

export function registerLoadCommand(program: Command): void {
  program
    .command('load')
    .description('Load a paper JSON document into the graph (existing graph content is deleted)')
    .argument('<file>', 'Path to the extracted paper JSON')
    .action(async (file: string) => {
      try {
        const result = await loadPaper(process.cwd(), file, {
          onProgress: (step) => {
            // eslint-disable-next-line no-console
            console.error(chalk.blue('[papergraph]'), `Loaded ${step}`);
          },
        });

        if (result.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Load failed:'), result.error.message);
          process.exit(1);
        }

        // eslint-disable-next-line no-console
        console.log(
          chalk.green('Graph loaded:'),
          `${result.value.statements} statements in ${result.value.steps.length} steps`,
        );
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Load failed:'), message);
        process.exit(1);
      }
    });
}
