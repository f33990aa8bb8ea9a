import { Command } from 'commander';
import chalk from 'chalk';

import type { IAttributeDefinition } from '../../domain/attribute/types.js';
import { seedDefaultDefinitions } from '../../infra/persistence/attribute-repository.js';
import { parsePositiveInt, withAssistant } from '../shared.js';

interface DefinitionOptions {
  name?: string;
  extraction?: string;
  judgment?: string;
}

function printDefinition(definition: IAttributeDefinition): void {
  console.log(chalk.cyan(`#${definition.id} ${definition.name}`));
  console.log(chalk.white('  judgment:   ') + definition.judgmentPrompt);
  console.log(chalk.white('  extraction: ') + definition.extractionPrompt);
}

export const attributesCommand = new Command('attributes')
  .description('Manage attribute definitions');

attributesCommand
  .command('list')
  .description('List attribute definitions')
  .action(async () => {
    await withAssistant(({ attributes }) => {
      const definitions = attributes.listDefinitions();
      if (definitions.length === 0) {
        console.log(chalk.gray('No attribute definitions. Run `recollect attributes seed` to add the defaults.'));
        return;
      }
      definitions.forEach(printDefinition);
    });
  });

attributesCommand
  .command('add')
  .description('Create an attribute definition')
  .requiredOption('-n, --name <name>', 'Definition name')
  .requiredOption('-e, --extraction <prompt>', 'Instruction for extracting values from a message')
  .requiredOption('-j, --judgment <prompt>', 'Question deciding whether the attribute is needed for a reply')
  .action(async (options: Required<DefinitionOptions>) => {
    await withAssistant(({ attributes }) => {
      const definition = attributes.createDefinition({
        name: options.name,
        extractionPrompt: options.extraction,
        judgmentPrompt: options.judgment,
      });
      console.log(chalk.green(`✓ Created definition #${definition.id} ${definition.name}`));
    });
  });

attributesCommand
  .command('update <id>')
  .description('Update an attribute definition')
  .option('-n, --name <name>', 'Definition name')
  .option('-e, --extraction <prompt>', 'Extraction instruction')
  .option('-j, --judgment <prompt>', 'Judgment question')
  .action(async (rawId: string, options: DefinitionOptions) => {
    const id = parsePositiveInt(rawId);
    await withAssistant(({ attributes }) => {
      const current = attributes.getDefinition(id);
      if (!current) {
        console.error(chalk.red(`✗ Definition #${id} not found`));
        process.exitCode = 1;
        return;
      }
      attributes.updateDefinition({
        id,
        name: options.name ?? current.name,
        extractionPrompt: options.extraction ?? current.extractionPrompt,
        judgmentPrompt: options.judgment ?? current.judgmentPrompt,
      });
      console.log(chalk.green(`✓ Updated definition #${id}`));
    });
  });

attributesCommand
  .command('remove <id>')
  .description('Delete an attribute definition and all of its values')
  .action(async (rawId: string) => {
    const id = parsePositiveInt(rawId);
    await withAssistant(({ attributes }) => {
      if (!attributes.deleteDefinition(id)) {
        console.error(chalk.red(`✗ Definition #${id} not found`));
        process.exitCode = 1;
        return;
      }
      console.log(chalk.green(`✓ Deleted definition #${id}`));
    });
  });

attributesCommand
  .command('seed')
  .description('Add the default attribute definitions')
  .action(async () => {
    await withAssistant(({ attributes }) => {
      const inserted = seedDefaultDefinitions(attributes);
      console.log(chalk.green(`✓ Added ${inserted} default definition(s)`));
    });
  });
