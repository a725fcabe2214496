import { Command } from 'commander';
import chalk from 'chalk';
import { planQuestion, type QuestionPlan } from '@papergraph/core';

function list(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : chalk.dim('none');
}

/**
 * Format a question plan for terminal display.
 */
export function formatPlan(plan: QuestionPlan): string {
  const lines: string[] = [];

  lines.push(`${chalk.bold('Intent:')}     ${chalk.cyan(plan.intent)}`);
  lines.push(`${chalk.bold('Diseases:')}   ${list(plan.entities.diseases)}`);
  lines.push(`${chalk.bold('Algorithms:')} ${list(plan.entities.algorithms)}`);
  lines.push(`${chalk.bold('Sections:')}   ${list(plan.entities.sections)}`);
  lines.push('');
  lines.push(chalk.bold(`Queries (${plan.specs.length}):`));

  plan.specs.forEach((spec, index) => {
    lines.push(`  ${chalk.dim(`[${index + 1}]`)} ${chalk.magenta(spec.tag)}`);
    lines.push(`      ${spec.query}`);
    const params = Object.entries(spec.params);
    if (params.length > 0) {
      lines.push(`      ${chalk.dim(params.map(([key, value]) => `$${key} = ${JSON.stringify(value)}`).join(', '))}`);
    }
  });

  return lines.join('\n');
}

export function registerClassifyCommand(program: Command): void {
  program
    .command('classify')
    .description('Show how a question is classified and which queries it would run')
    .argument('<question>', 'Question about the paper')
    .option('--json', 'Output in JSON format')
    .action((question: string, options: { json?: boolean }) => {
      const plan = planQuestion(question);
      // eslint-disable-next-line no-console
      console.log(options.json ? JSON.stringify(plan, null, 2) : formatPlan(plan));
    });
}
