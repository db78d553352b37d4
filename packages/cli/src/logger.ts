import { Logger } from '@linkstack/contracts';
import chalk from 'chalk';

export function createConsoleLogger(verbose: boolean): Logger {
  return {
    debug: (message, ...args) => {
      if (verbose) console.log(chalk.gray(message), ...args);
    },
    info: (message, ...args) => console.log(message, ...args),
    warn: (message, ...args) => console.warn(chalk.yellow(message), ...args),
  };
}
