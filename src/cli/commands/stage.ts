/**
 * Stage command
 * Runs discovery, defaults merge and every target chain
 */

import { Command } from 'commander';
import path from 'node:path';
import { runStaging, type StagingReport } from '../../staging/run.js';
import {
  failSpinner,
  printFailure,
  printHeader,
  printTable,
  printWarning,
  startSpinner,
  succeedSpinner,
} from '../output.js';
import { loadCommandContext, writeRunLog, type CommandContext } from './shared.js';

interface StageOptions {
  allResources?: boolean;
  target?: string[];
  generate: boolean;
  log?: boolean;
}

/**
 * Create the stage command
 */
export function createStageCommand(): Command {
  return new Command('stage')
    .description('Render, collect, archive and publish every target')
    .option('--all-resources', 'Copy every resource instead of the target-suffixed ones')
    .option('-t, --target <name...>', 'Only stage the named targets')
    .option('--no-generate', 'Skip the defaults merge')
    .option('--log', 'Write the run log to the build directory')
    .action(async (options: StageOptions, command: Command) => {
      let context: CommandContext | undefined;
      try {
        context = await loadCommandContext(command);
        const { cwd, logger } = context;
        const config = {
          ...context.config,
          staging: {
            ...context.config.staging,
            include_all_resources: options.allResources ?? context.config.staging.include_all_resources,
          },
        };

        if (!context.verbose) startSpinner('Staging targets...');
        let report: StagingReport;
        try {
          report = runStaging(config, {
            cwd,
            targets: options.target,
            generate: options.generate,
            logger,
          });
        } catch (error) {
          failSpinner('Staging failed');
          throw error;
        }
        succeedSpinner(`Staged ${Object.keys(report.targets).length} target(s)`);

        printHeader('Artifacts');
        if (report.artifacts.length === 0) {
          printWarning('No targets to stage');
        } else {
          printTable(
            ['Target', 'Archive', 'Published'],
            report.artifacts.map((entry) => [
              entry.targetName,
              path.relative(cwd, entry.artifact.file),
              entry.published ? 'yes' : 'no',
            ]),
          );
        }

        writeRunLog({ ...context, config }, options.log === true);
      } catch (error) {
        if (context && options.log) writeRunLog(context, true);
        printFailure(error, context?.verbose ?? false);
        process.exit(1);
      }
    });
}
