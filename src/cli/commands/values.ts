import { Command } from 'commander';
import chalk from 'chalk';

import { parsePositiveInt, withAssistant } from '../shared.js';

export const valuesCommand = new Command('values')
  .description('Manage stored attribute values');

valuesCommand
  .command('list')
  .description('List stored values, newest first')
  .option('-a, --attribute <id>', 'Only values of this definition', parsePositiveInt)
  .action(async (options: { attribute?: number }) => {
    await withAssistant(({ attributes }) => {
      const names = new Map(attributes.listDefinitions().map(d => [d.id, d.name]));
      const values = attributes.listValues(options.attribute);
      if (values.length === 0) {
        console.log(chalk.gray('No stored values.'));
        return;
      }
      for (const value of values) {
        const name = names.get(value.attributeId) ?? `#${value.attributeId}`;
        const updated = new Date(value.updatedAt).toISOString();
        console.log(`${chalk.cyan(`[${value.sequenceNo}]`)} ${chalk.white(name)}: ${value.content} ${chalk.gray(updated)}`);
      }
    });
  });

valuesCommand
  .command('add <attributeId> <content>')
  .description('Store a value for a definition')
  .action(async (rawId: string, content: string) => {
    const attributeId = parsePositiveInt(rawId);
    await withAssistant(({ attributes }) => {
      const sequenceNo = attributes.insertValue(attributeId, content);
      console.log(chalk.green(`✓ Stored value [${sequenceNo}]`));
    });
  });

valuesCommand
  .command('update <sequenceNo> <content>')
  .description('Replace the content of a stored value')
  .action(async (rawSequenceNo: string, content: string) => {
    const sequenceNo = parsePositiveInt(rawSequenceNo);
    await withAssistant(({ attributes }) => {
      if (!attributes.updateValue(sequenceNo, content)) {
        console.error(chalk.red(`✗ Value [${sequenceNo}] not found`));
        process.exitCode = 1;
        return;
      }
      console.log(chalk.green(`✓ Updated value [${sequenceNo}]`));
    });
  });

valuesCommand
  .command('remove <sequenceNo>')
  .description('Delete a stored value')
  .action(async (rawSequenceNo: string) => {
    const sequenceNo = parsePositiveInt(rawSequenceNo);
    await withAssistant(({ attributes }) => {
      if (!attributes.deleteValue(sequenceNo)) {
        console.error(chalk.red(`✗ Value [${sequenceNo}] not found`));
        process.exitCode = 1;
        return;
      }
      console.log(chalk.green(`✓ Deleted value [${sequenceNo}]`));
    });
  });
