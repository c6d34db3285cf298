/**
 * Config command
 * Inspects the resolved configuration
 */

import { Command } from 'commander';
import { stringify as stringifyYaml } from 'yaml';
import { DEFAULT_CONFIG, getConfigPath, getConfigValue, loadConfig } from '../../config/index.js';
import {
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printSection,
  printSuccess,
} from '../output.js';
import { getGlobalOptions } from './shared.js';

/**
 * Create the config command
 */
export function createConfigCommand(): Command {
  const config = new Command('config')
    .description('Inspect configuration');

  // Show resolved configuration
  config
    .command('show')
    .description('Show the resolved configuration')
    .argument('[key]', 'Dot-separated key to show (e.g. generate.sort)')
    .option('--json', 'Output as JSON')
    .action(async (key: string | undefined, options: { json?: boolean }, command: Command) => {
      try {
        const { cwd } = getGlobalOptions(command);
        const resolved = await loadConfig(cwd);

        if (key) {
          const value = getConfigValue(resolved, key);
          if (value === undefined) {
            printError(`Unknown configuration key: ${key}`);
            process.exit(1);
          }
          console.log(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
          return;
        }

        if (options.json) {
          console.log(JSON.stringify(resolved, null, 2));
          return;
        }

        printHeader('Configuration');
        printKeyValue('Source', getConfigPath() ?? 'defaults');
        for (const [name, section] of Object.entries(resolved)) {
          printConfigSection(name, section);
        }
      } catch (error) {
        printError(error instanceof Error ? error.message : 'Failed to load configuration');
        process.exit(1);
      }
    });

  // Print the defaults as a starting config file
  config
    .command('defaults')
    .description('Print the default configuration as YAML')
    .action(() => {
      console.log(stringifyYaml(DEFAULT_CONFIG));
    });

  // Config file location
  config
    .command('path')
    .description('Show the configuration file in use')
    .action(async (_options: unknown, command: Command) => {
      try {
        const { cwd } = getGlobalOptions(command);
        await loadConfig(cwd);
        const configPath = getConfigPath();
        if (configPath) {
          printSuccess(configPath);
        } else {
          printInfo('No configuration file found, using defaults');
        }
      } catch (error) {
        printError(error instanceof Error ? error.message : 'Failed to load configuration');
        process.exit(1);
      }
    });

  return config;
}

/**
 * Print a configuration section
 */
function printConfigSection(name: string, section: unknown): void {
  printSection(name);

  if (typeof section !== 'object' || section === null) {
    printKeyValue('  value', String(section));
    return;
  }

  for (const [key, value] of Object.entries(section)) {
    if (typeof value === 'object' && value !== null) {
      printKeyValue(`  ${key}`, JSON.stringify(value));
    } else {
      printKeyValue(`  ${key}`, String(value));
    }
  }

  console.log();
}
