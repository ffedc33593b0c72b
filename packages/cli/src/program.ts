import { Command } from 'commander';
import chalk from 'chalk';
import { configCommand, moveCommand, removeCommand, typesCommand } from './commands/index.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('restidy')
    .description('Moves resources to the modules that use them and removes the ones nobody uses')
    .version(VERSION);

  moveCommand(program);
  removeCommand(program);
  typesCommand(program);
  configCommand(program);

  program.addHelpText('before', '\n' + chalk.bold.green(`  restidy v${VERSION}`));

  return program;
}
