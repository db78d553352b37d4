import { QuickLinkComposer, StackGraph } from '@linkstack/composer';
import { isCompositionError } from '@linkstack/contracts';
import { Synthesizer } from '@linkstack/synthesizer';
import chalk from 'chalk';
import { Command } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';

import { CONFIG_FILE, loadConfig, StackConfig, toTopology } from '../config';

interface ValidateOptions {
  config: string;
  analytics: boolean;
}

function composeGraph(config: StackConfig, options: ValidateOptions): StackGraph {
  console.log(chalk.cyan('→ Composing resources...'));
  const { topology } = toTopology(config, options);
  const graph = new QuickLinkComposer(topology).compose();

  for (const resource of graph.resources) console.log(chalk.green(`  ✓ ${resource.kind} ${resource.logicalId}`));
  return graph;
}

function checkGrants(graph: StackGraph): void {
  console.log(chalk.cyan('→ Checking grants...'));
  for (const statement of graph.grantStatements)
    console.log(chalk.green(`  ✓ ${statement.principalLogicalId} -> ${statement.resourceLogicalId} (${statement.actions.join(', ')})`));
}

function checkReferences(graph: StackGraph): void {
  console.log(chalk.cyan('→ Resolving references...'));
  // Resolution pass only; nothing is written
  new Synthesizer().buildTemplate(graph, graph.stackName);
  console.log(chalk.green(`  ✓ ${graph.outputs.length} outputs resolve`));
}

export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Check that the stack composes and every reference resolves, without writing anything')
    .option('-c, --config <path>', 'Path to config file', CONFIG_FILE)
    .option('--no-analytics', 'Leave out the analytics queue')
    .action(async (options: ValidateOptions) => {
      const configPath = path.resolve(process.cwd(), options.config);

      try {
        await fs.access(configPath);
      } catch {
        console.log(chalk.red('✗ File not found'));
        process.exit(1);
        return;
      }

      try {
        console.log(chalk.bold(`\nValidating ${options.config}...\n`));

        const config = await loadConfig(configPath);
        const graph = composeGraph(config, options);
        checkGrants(graph);
        checkReferences(graph);

        console.log(chalk.bold.green('\n✓ Stack is valid\n'));
      } catch (error) {
        if (isCompositionError(error)) console.log(chalk.red(`  ✗ ${error.code}:`), error.message);
        else console.error(chalk.red('Validation error:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
