#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { chatCommand } from './commands/chat.js';
import { attributesCommand } from './commands/attributes.js';
import { valuesCommand } from './commands/values.js';
import { logsCommand } from './commands/logs.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('recollect')
  .description('Recollect - a chat assistant that remembers what you tell it')
  .version('0.1.0');

program.addCommand(chatCommand);
program.addCommand(attributesCommand);
program.addCommand(valuesCommand);
program.addCommand(logsCommand);
program.addCommand(configCommand);

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.yellow('Run `recollect --help` for available commands'));
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
