import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createInterface } from 'readline/promises';
import { stdin as input, stdout as output } from 'process';

import type { TurnPipeline } from '../../app/conversation/turn-pipeline.js';
import type { StepStatus } from '../../domain/conversation/turn.js';
import { formatError, withAssistant } from '../shared.js';

type Spinner = ReturnType<typeof ora>;

function renderStatus(status: StepStatus, spinner: Spinner): void {
  if (status.kind === 'response_ready') {
    spinner.stop();
    console.log(chalk.blue('\nAssistant: ') + (status.responseText ?? ''));
    const used = Object.keys(status.usedAttributes ?? {});
    if (used.length > 0) {
      console.log(chalk.gray(`  using: ${used.join(', ')}`));
    }
    console.log();
    return;
  }

  if (status.state === 'processing') {
    spinner.start(status.displayText);
  } else {
    spinner.stopAndPersist({ symbol: chalk.gray('·'), text: chalk.gray(status.displayText) });
  }
}

async function runTurn(pipeline: TurnPipeline, message: string): Promise<void> {
  const spinner = ora();
  const stream = pipeline.processStreaming(message);
  let last: StepStatus | undefined;

  try {
    let step = await stream.next();
    while (!step.done) {
      last = step.value;
      renderStatus(step.value, spinner);
      step = await stream.next();
    }

    for (const [name, content] of step.value.extractedAttributes) {
      console.log(chalk.green(`  ✓ remembered ${name}: ${content}`));
    }
  } catch (error) {
    // A stage that throws leaves its status in processing.
    if (last && !last.isTerminal) {
      last.fail();
      spinner.fail(last.displayText);
    } else {
      spinner.stop();
    }
    console.error(chalk.red(`✗ ${formatError(error)}\n`));
  }
}

function printHistory(pipeline: TurnPipeline): void {
  const turns = pipeline.history();
  if (turns.length === 0) {
    console.log(chalk.gray('(no history)\n'));
    return;
  }
  for (const turn of turns) {
    const label = turn.role === 'user' ? chalk.green('You') : chalk.blue('Assistant');
    console.log(`${label}: ${turn.content}`);
    if (turn.pivotContent !== undefined && turn.pivotContent !== turn.content) {
      console.log(chalk.gray(`  (${turn.pivotContent})`));
    }
  }
  console.log();
}

export const chatCommand = new Command('chat')
  .description('Start an interactive conversation')
  .action(async () => {
    await withAssistant(async ({ pipeline }) => {
      console.log(chalk.cyan('\nRecollect chat'));
      console.log(chalk.gray('Commands: /history, /clear, /exit\n'));

      const rl = createInterface({ input, output });
      try {
        while (true) {
          const message = (await rl.question(chalk.green('You: '))).trim();
          if (!message) continue;

          if (message === '/exit') {
            console.log(chalk.cyan('\nGoodbye!\n'));
            break;
          }
          if (message === '/history') {
            printHistory(pipeline);
            continue;
          }
          if (message === '/clear') {
            pipeline.clearHistory();
            console.log(chalk.gray('History cleared.\n'));
            continue;
          }

          await runTurn(pipeline, message);
        }
      } finally {
        rl.close();
      }
    });
  });
