import { assertValidStackName } from '@linkstack/contracts';
import chalk from 'chalk';
import { Command } from 'commander';
import inquirer from 'inquirer';
import fs from 'node:fs/promises';
import path from 'node:path';

import { CONFIG_FILE, DEFAULT_CONFIG, StackConfig } from '../config';

interface InitOptions {
  yes?: boolean;
  force?: boolean;
}

interface InitAnswers {
  stackName: string;
  region: string;
  account: string;
  analytics: boolean;
  codePath: string;
  rateLimit: number;
  burstLimit: number;
}

function validStackName(input: string): true | string {
  try {
    assertValidStackName(input);
    return true;
  } catch {
    return 'Use letters, digits and hyphens, starting with a letter';
  }
}

async function promptConfig(): Promise<StackConfig> {
  const answers = await inquirer.prompt<InitAnswers>([
    { type: 'input', name: 'stackName', message: 'Stack name', default: DEFAULT_CONFIG.stackName, validate: validStackName },
    { type: 'input', name: 'region', message: 'Region', default: DEFAULT_CONFIG.region },
    { type: 'input', name: 'account', message: 'Account id (leave blank to decide at deploy time)', default: '' },
    { type: 'confirm', name: 'analytics', message: 'Include the analytics queue?', default: true },
    { type: 'input', name: 'codePath', message: 'Path to the function package', default: DEFAULT_CONFIG.codePath },
    { type: 'number', name: 'rateLimit', message: 'Gateway rate limit (requests per second)', default: DEFAULT_CONFIG.throttling.rateLimit },
    { type: 'number', name: 'burstLimit', message: 'Gateway burst limit', default: DEFAULT_CONFIG.throttling.burstLimit },
  ]);

  return {
    stackName: answers.stackName,
    ...(answers.account ? { account: answers.account } : {}),
    region: answers.region,
    analytics: answers.analytics,
    codePath: answers.codePath,
    throttling: { rateLimit: answers.rateLimit, burstLimit: answers.burstLimit },
    outDir: DEFAULT_CONFIG.outDir,
  };
}

async function configExists(configPath: string): Promise<boolean> {
  try {
    await fs.access(configPath);
    return true;
  } catch {
    return false;
  }
}

export function createInitCommand(): Command {
  return new Command('init')
    .description(`Create ${CONFIG_FILE} in the current directory`)
    .option('-y, --yes', 'Accept every default without prompting')
    .option('-f, --force', 'Overwrite an existing configuration')
    .action(async (options: InitOptions) => {
      const configPath = path.join(process.cwd(), CONFIG_FILE);

      try {
        if (!options.force && (await configExists(configPath))) {
          console.error(chalk.red(`Error: ${CONFIG_FILE} already exists. Use --force to overwrite it.`));
          process.exit(1);
          return;
        }

        const config = options.yes ? DEFAULT_CONFIG : await promptConfig();
        await fs.writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, 'utf8');

        console.log(chalk.green(`✓ Created ${configPath}`));
        console.log(chalk.bold.green('\nRun `linkstack synth` to build the template.'));
      } catch (error: unknown) {
        console.error(chalk.red('Failed to initialize:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}
