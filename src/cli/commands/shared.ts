/**
 * Helpers shared by the staging commands
 */

import type { Command } from 'commander';
import path from 'node:path';
import { DEFAULT_LOG_FILE_NAME, loadConfig, type Config } from '../../config/index.js';
import { StagingLogger } from '../../staging/staging-logger.js';
import { createConsoleListener, printInfo } from '../output.js';

export interface GlobalOptions {
  verbose: boolean;
  cwd: string;
}

/**
 * Read the program-level options from any subcommand
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  const options = command.optsWithGlobals();
  const cwd: unknown = options.cwd;
  const verbose: unknown = options.verbose;
  return {
    verbose: verbose === true,
    cwd: path.resolve(typeof cwd === 'string' ? cwd : process.cwd()),
  };
}

export interface CommandContext extends GlobalOptions {
  config: Config;
  logger: StagingLogger;
}

/**
 * Load configuration for the working directory and attach a console-backed
 * logger
 */
export async function loadCommandContext(command: Command): Promise<CommandContext> {
  const globals = getGlobalOptions(command);
  const config = await loadConfig(globals.cwd);
  const verbose = globals.verbose || config.output.verbose;
  return {
    cwd: globals.cwd,
    verbose,
    config,
    logger: new StagingLogger(createConsoleListener(verbose)),
  };
}

/**
 * Persist the run log when configured (or forced) to
 */
export function writeRunLog(context: CommandContext, force: boolean = false): void {
  const { config, cwd, logger } = context;
  const configured = config.output.log_file;
  if (!configured && !force) return;

  const logFile = configured
    ? path.resolve(cwd, configured)
    : path.resolve(cwd, config.directories.build, DEFAULT_LOG_FILE_NAME);
  logger.writeMarkdown(logFile);
  printInfo(`Log written to ${logFile}`);
}
