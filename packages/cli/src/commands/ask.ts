import { Command } from 'commander';
import chalk from 'chalk';
import { err, type Result } from 'neverthrow';
import { createRuntime, type AnswerResult, type RuntimeOptions, type ScoredRow } from '@papergraph/core';

export type RuntimeOverrides = Pick<RuntimeOptions, 'env' | 'createExecutor'>;

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

/**
 * Format one ranked row for terminal display.
 */
export function formatAnswerRow(row: ScoredRow, index: number): string {
  const { _score, _tag, ...fields } = row;
  const lines: string[] = [];
  const rank = chalk.dim(`[${index + 1}]`);
  const score = chalk.green(_score.toFixed(4));

  lines.push(`${rank} ${chalk.magenta(_tag)}  score: ${score}`);
  for (const [key, value] of Object.entries(fields)) {
    lines.push(`    ${chalk.cyan(key)}: ${formatValue(value)}`);
  }

  return lines.join('\n');
}

export function formatAnswer(answer: AnswerResult): string {
  if (answer.rows.length === 0) {
    return chalk.yellow('No results found.');
  }

  const lines = [
    chalk.bold(`Top ${answer.rows.length} of ${answer.totalRows} row(s) for "${answer.question}" (${answer.intent}):`),
    '',
  ];
  answer.rows.forEach((row, index) => {
    if (index > 0) lines.push('');
    lines.push(formatAnswerRow(row, index));
  });
  return lines.join('\n');
}

/** Parse a --top-n value; null unless it is a whole number from 1 to 100. */
export function parseTopN(value: string): number | null {
  const topN = value.trim() === '' ? NaN : Number(value);
  if (!Number.isInteger(topN) || topN < 1 || topN > 100) {
    return null;
  }
  return topN;
}

/** Connect, answer one question and disconnect. */
export async function askQuestion(
  rootDir: string,
  question: string,
  options: { topN?: number } & RuntimeOverrides = {},
): Promise<Result<AnswerResult, Error>> {
  const { topN, ...overrides } = options;
  const runtimeResult = await createRuntime({ rootDir, ...overrides });
  if (runtimeResult.isErr()) {
    return err(runtimeResult.error);
  }

  const runtime = runtimeResult.value;
  try {
    return await runtime.answerer.answer(question, topN !== undefined ? { topN } : {});
  } finally {
    await runtime.close();
  }
}

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Answer a question from the paper knowledge graph')
    .argument('<question>', 'Question about the paper')
    .option('--top-n <n>', 'Maximum number of rows (default from .papergraph.yaml)')
    .option('--json', 'Output in JSON format')
    .action(async (question: string, options: { topN?: string; json?: boolean }) => {
      try {
        let topN: number | undefined;
        if (options.topN !== undefined) {
          const parsed = parseTopN(options.topN);
          if (parsed === null) {
            // eslint-disable-next-line no-console
            console.error(chalk.red('Invalid --top-n value. Must be an integer from 1 to 100.'));
            process.exit(1);
          }
          topN = parsed;
        }

        const result = await askQuestion(process.cwd(), question, topN !== undefined ? { topN } : {});
        if (result.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Ask failed:'), result.error.message);
          process.exit(1);
        }

        // eslint-disable-next-line no-console
        console.log(options.json ? JSON.stringify(result.value, null, 2) : formatAnswer(result.value));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Ask failed:'), message);
        process.exit(1);
      }
    });
}
