/**
 * Generate command
 * Merges defaults into the property templates
 */

import { Command } from 'commander';
import path from 'node:path';
import { generateFromConfig, resolvePaths } from '../../staging/run.js';
import type { GeneratedBatch } from '../../staging/types.js';
import {
  failSpinner,
  printFailure,
  printListItem,
  printSection,
  startSpinner,
  succeedSpinner,
} from '../output.js';
import { loadCommandContext, writeRunLog } from './shared.js';

interface GenerateFlags {
  sort?: boolean;
  trim?: boolean;
  structured?: boolean;
  prepend?: boolean;
}

/**
 * Create the generate command
 */
export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Merge defaults files into the property templates')
    .option('--sort', 'Sort merged lines')
    .option('--trim', 'Drop blank lines from merged files')
    .option('--structured', 'Fail when merged files disagree on their keys')
    .option('--prepend', 'Put the template lines before the defaults')
    .action(async (options: GenerateFlags, command: Command) => {
      let verbose = false;
      try {
        const context = await loadCommandContext(command);
        verbose = context.verbose;
        const { cwd, logger } = context;

        const config = {
          ...context.config,
          generate: {
            ...context.config.generate,
            sort: options.sort ?? context.config.generate.sort,
            trim: options.trim ?? context.config.generate.trim,
            structured: options.structured ?? context.config.generate.structured,
            prepend: options.prepend ?? context.config.generate.prepend,
          },
        };
        const paths = resolvePaths(config, cwd);

        startSpinner('Generating property templates...');
        let batches: GeneratedBatch[];
        try {
          batches = generateFromConfig(config, paths, logger);
        } catch (error) {
          failSpinner('Generation failed');
          throw error;
        }

        const fileCount = batches.reduce((total, batch) => total + batch.files.length, 0);
        succeedSpinner(`Generated ${fileCount} file(s) into ${path.relative(cwd, paths.generatedDir) || '.'}`);

        if (verbose) {
          for (const batch of batches) {
            printSection(path.relative(cwd, batch.source) || batch.source);
            for (const file of batch.files) {
              printListItem(path.relative(paths.generatedDir, file));
            }
          }
        }

        writeRunLog({ ...context, config });
      } catch (error) {
        printFailure(error, verbose);
        process.exit(1);
      }
    });
}
