/**
 * Targets command
 * Discovers and lists staging targets
 */

import { Command } from 'commander';
import path from 'node:path';
import { discoverTargets } from '../../staging/discovery.js';
import { collectTargets, configuredTemplates, resolvePaths } from '../../staging/run.js';
import type { TargetMap } from '../../staging/types.js';
import { printFailure, printHeader, printInfo, printTable } from '../output.js';
import { loadCommandContext } from './shared.js';

interface TargetsOptions {
  dir?: string;
  json?: boolean;
}

/**
 * Create the targets command
 */
export function createTargetsCommand(): Command {
  return new Command('targets')
    .description('Discover and list staging targets')
    .option('-d, --dir <dir>', 'Targets directory (overrides configuration)')
    .option('--json', 'Output as JSON')
    .action(async (options: TargetsOptions, command: Command) => {
      let verbose = false;
      try {
        const context = await loadCommandContext(command);
        verbose = context.verbose;
        const { config, cwd, logger } = context;

        const targets: TargetMap = options.dir
          ? discoverTargets(path.resolve(cwd, options.dir), configuredTemplates(config), { logger })
          : collectTargets(config, resolvePaths(config, cwd), logger);

        if (options.json) {
          console.log(JSON.stringify(targets, null, 2));
          return;
        }

        printHeader('Targets');
        const names = Object.keys(targets).sort();
        if (names.length === 0) {
          printInfo('No targets found');
          return;
        }

        printTable(
          ['Target', 'Properties'],
          names.map((name) => [name, String(Object.keys(targets[name].context ?? {}).length)]),
        );
      } catch (error) {
        printFailure(error, verbose);
        process.exit(1);
      }
    });
}
