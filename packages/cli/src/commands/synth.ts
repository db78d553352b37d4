import { QuickLinkComposer } from '@linkstack/composer';
import { ManifestEntry, setLogger } from '@linkstack/contracts';
import { Synthesizer } from '@linkstack/synthesizer';
import chalk from 'chalk';
import { Command } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';

import { CONFIG_FILE, loadConfig, toTopology } from '../config';
import { createConsoleLogger } from '../logger';

interface SynthOptions {
  config: string;
  account?: string;
  region?: string;
  analytics: boolean;
  out?: string;
  verbose?: boolean;
}

export function displayManifest(outputs: ManifestEntry[]): void {
  if (outputs.length === 0) {
    console.log(chalk.yellow('No outputs declared.'));
    return;
  }

  console.log(chalk.bold('\nOutputs:\n'));
  for (const output of outputs) {
    console.log(`${chalk.cyan(output.name)} = ${chalk.green(output.value)}`);
    console.log(chalk.gray(`  ${output.description}`));
  }
}

async function executeSynth(configPath: string, options: SynthOptions): Promise<void> {
  const config = await loadConfig(configPath);
  const { topology, outDir } = toTopology(config, options);

  console.log(chalk.blue(`Synthesizing ${topology.stackName}...`));

  const graph = new QuickLinkComposer(topology).compose();
  const result = new Synthesizer({ outDir }).synthesize(graph, topology.stackName);

  console.log(chalk.green(`✓ ${graph.resources.length} resources, ${graph.grantStatements.length} grants written to ${result.templatePath}`));
  displayManifest(result.outputs);
}

export function createSynthCommand(): Command {
  return new Command('synth')
    .description('Build the stack and write its template and output manifest')
    .option('-c, --config <path>', 'Path to config file', CONFIG_FILE)
    .option('--account <id>', 'Target account id')
    .option('--region <region>', 'Target region')
    .option('--no-analytics', 'Leave out the analytics queue')
    .option('-o, --out <dir>', 'Output directory')
    .option('-v, --verbose', 'Print every resource and grant as it is added')
    .action(async (options: SynthOptions) => {
      const configPath = path.resolve(process.cwd(), options.config);

      try {
        await fs.access(configPath);
      } catch {
        console.error(chalk.red(`Error: ${options.config} not found. Run \`linkstack init\` first.`));
        process.exit(1);
        return;
      }

      setLogger(createConsoleLogger(options.verbose ?? false));

      try {
        await executeSynth(configPath, options);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(chalk.red('Synthesis failed:'), message);
        process.exit(1);
      }
    });
}
