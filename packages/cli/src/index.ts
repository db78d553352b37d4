import { Command } from 'commander';

import { createInitCommand } from './commands/init';
import { createOutputsCommand } from './commands/outputs';
import { createSynthCommand } from './commands/synth';
import { createValidateCommand } from './commands/validate';

const program = new Command();

program.name('linkstack').description('Compose and synthesize the QuickLink infrastructure stack').version('1.0.0');

program.addCommand(createInitCommand());
program.addCommand(createValidateCommand());
program.addCommand(createSynthCommand());
program.addCommand(createOutputsCommand());

await program.parseAsync();
