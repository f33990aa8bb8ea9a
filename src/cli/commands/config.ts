import { Command } from 'commander';
import chalk from 'chalk';

import { getRuntimeConfigPath, loadRuntimeConfig } from '../../infra/config/runtime-config.js';
import { formatError } from '../shared.js';

function showConfig(): void {
  try {
    const config = loadRuntimeConfig();

    console.log(chalk.cyan('\nCurrent Configuration:\n'));
    console.log(chalk.white('  Config file:'), getRuntimeConfigPath());
    console.log(chalk.white('  Database:'), config.paths.database);
    console.log(chalk.white('  LLM provider:'), config.llm.provider);
    console.log(chalk.white('  LLM endpoint:'), config.llm.baseUrl || chalk.gray('(provider default)'));
    console.log(chalk.white('  LLM model:'), config.llm.model || chalk.gray('(provider default)'));
    console.log(chalk.white('  API key:'), config.llm.apiKey ? chalk.green('set') : chalk.gray('not set'));
    console.log(chalk.white('  Timeout:'), `${config.llm.timeoutMs}ms`);
    console.log(
      chalk.white('  Translation:'),
      config.translation.enabled
        ? `${config.translation.displayLanguage} ⇄ ${config.translation.pivotLanguage}`
        : chalk.gray('off')
    );
    console.log(chalk.white('  Debug logging:'), config.debug.loggingEnabled ? chalk.green('on') : 'off');
    console.log();
  } catch (error) {
    console.error(chalk.red(`✗ ${formatError(error)}`));
    process.exitCode = 1;
  }
}

export const configCommand = new Command('config')
  .description('Inspect runtime configuration');

configCommand
  .command('show')
  .description('Show the effective configuration')
  .action(showConfig);
