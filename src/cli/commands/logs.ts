import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';

import { isLLMTaskKind, LLM_TASK_KINDS } from '../../domain/audit/types.js';
import type { LLMTaskKind } from '../../domain/audit/types.js';
import { parsePositiveInt, withAssistant } from '../shared.js';

function parseTaskKind(value: string): LLMTaskKind {
  if (!isLLMTaskKind(value)) {
    throw new InvalidArgumentError(`Expected one of: ${LLM_TASK_KINDS.join(', ')}.`);
  }
  return value;
}

function preview(text: string, max = 120): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

export const logsCommand = new Command('logs')
  .description('Inspect the language model interaction log');

logsCommand
  .command('list')
  .description('Show recent interactions, newest first')
  .option('-k, --kind <taskKind>', 'Only this task kind', parseTaskKind)
  .option('-l, --limit <n>', 'Maximum number of entries', parsePositiveInt, 20)
  .option('--full', 'Print full prompts and responses')
  .action(async (options: { kind?: LLMTaskKind; limit: number; full?: boolean }) => {
    await withAssistant(({ llmLogs }) => {
      const entries = llmLogs.list({ taskKind: options.kind, limit: options.limit });
      if (entries.length === 0) {
        console.log(chalk.gray('No logged interactions.'));
        return;
      }
      for (const entry of entries) {
        const attribute = entry.attributeName ? ` ${chalk.white(entry.attributeName)}` : '';
        console.log(
          `${chalk.cyan(`#${entry.id}`)} ${chalk.gray(new Date(entry.timestamp).toISOString())} ${entry.model} ${chalk.yellow(entry.taskKind)}${attribute}`
        );
        if (options.full) {
          console.log(chalk.gray('  prompt:'));
          console.log(entry.prompt.replace(/^/gm, '    '));
          console.log(chalk.gray('  response:'));
          console.log(entry.response.replace(/^/gm, '    '));
        } else {
          console.log(`  > ${preview(entry.prompt)}`);
          console.log(`  < ${preview(entry.response)}`);
        }
      }
    });
  });

logsCommand
  .command('clear')
  .description('Delete all logged interactions')
  .action(async () => {
    await withAssistant(({ llmLogs }) => {
      const removed = llmLogs.clear();
      console.log(chalk.green(`✓ Removed ${removed} log entr${removed === 1 ? 'y' : 'ies'}`));
    });
  });
