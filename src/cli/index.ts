/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  createConfigCommand,
  createGenerateCommand,
  createStageCommand,
  createTargetsCommand,
} from './commands/index.js';
import { printError } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../../package.json');
export const VERSION: string = packageJson.version;

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('stager')
    .description('Discover deployment targets, merge defaults and stage per-target resource archives')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output')
    .option('-C, --cwd <dir>', 'Run as if started in <dir>')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts().color === false) {
        chalk.level = 0;
      }
    });

  // Add commands
  program.addCommand(createTargetsCommand());
  program.addCommand(createGenerateCommand());
  program.addCommand(createStageCommand());
  program.addCommand(createConfigCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
