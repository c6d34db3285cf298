/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  project: {
    group_id: 'com.example',
    artifact_id: 'app',
    version: '0.0.0',
  },
  directories: {
    targets: 'src/main/targets',
    defaults: 'src/main/defaults',
    templates: 'src/main/templates',
    resources: 'src/main/resources',
    build: 'build',
  },
  generate: {
    sort: false,
    trim: false,
    structured: false,
    prepend: false,
    defaults_file_extension: '.defaults.vtl',
  },
  staging: {
    include_all_resources: false,
    templates: [],
    targets: {},
  },
  render: {
    strict: false,
    context: {},
  },
  output: {
    verbose: false,
  },
};

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'stager.config.yaml',
  'stager.config.yml',
  '.stagerrc.yaml',
  '.stagerrc.yml',
  '.stagerrc',
  '.stager/config.yaml',
  '.stager/config.yml',
];

/**
 * Name of the markdown run log written when output.log_file is not set
 */
export const DEFAULT_LOG_FILE_NAME = 'STAGING_LOG.md';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  INCLUDE_ALL_RESOURCES: 'STAGER_INCLUDE_ALL_RESOURCES',
  SORT: 'STAGER_SORT',
  TRIM: 'STAGER_TRIM',
  STRUCTURED: 'STAGER_STRUCTURED',
  PREPEND: 'STAGER_PREPEND',
  DEFAULTS_EXTENSION: 'STAGER_DEFAULTS_EXTENSION',
  VERSION: 'STAGER_VERSION',
  LOG_LEVEL: 'STAGER_LOG_LEVEL',
} as const;
