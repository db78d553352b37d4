import { TemplateWriter } from '@linkstack/synthesizer';
import chalk from 'chalk';
import { Command } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';

import { CONFIG_FILE, loadConfig } from '../config';
import { displayManifest } from './synth';

interface OutputsOptions {
  json?: boolean;
  template?: string;
  config: string;
}

async function locateTemplate(options: OutputsOptions): Promise<string> {
  if (options.template) return path.resolve(process.cwd(), options.template);

  const config = await loadConfig(path.resolve(process.cwd(), options.config));
  return new TemplateWriter(config.outDir).pathFor(config.stackName);
}

export function createOutputsCommand(): Command {
  const command = new Command('outputs');

  command
    .description('Show the output manifest of a synthesized template')
    .option('--json', 'Output in JSON format')
    .option('-t, --template <path>', 'Path to a synthesized template')
    .option('-c, --config <path>', 'Path to config file', CONFIG_FILE)
    .action(async (options: OutputsOptions) => {
      try {
        const templatePath = await locateTemplate(options);

        if (!fs.existsSync(templatePath)) {
          console.log(chalk.yellow('No template found at ' + templatePath + '. Run `linkstack synth` first.'));
          return;
        }

        const template = new TemplateWriter().read(templatePath);

        if (options.json) console.log(JSON.stringify(template.Outputs, null, 2));
        else displayManifest(template.Outputs);
      } catch (error) {
        console.error(chalk.red('Error reading outputs:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  return command;
}
