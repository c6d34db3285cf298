/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, type Config } from './schema.js';
import { CONFIG_FILE_NAMES, DEFAULT_CONFIG, ENV_VARS } from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('stager', {
  cache: false,
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

/**
 * Cached config path from last search
 */
let cachedConfigPath: string | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<Record<string, unknown>> {
  const result = await explorer.search(cwd);
  cachedConfigPath = result?.filepath ?? null;
  if (result && !result.isEmpty && isRecord(result.config)) {
    return result.config;
  }
  return {};
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  return undefined;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  const generate: Record<string, unknown> = {};

  const flags = [
    ['sort', ENV_VARS.SORT],
    ['trim', ENV_VARS.TRIM],
    ['structured', ENV_VARS.STRUCTURED],
    ['prepend', ENV_VARS.PREPEND],
  ] as const;
  for (const [key, variable] of flags) {
    const parsed = parseBoolean(env[variable]);
    if (parsed !== undefined) generate[key] = parsed;
  }

  const extension = env[ENV_VARS.DEFAULTS_EXTENSION];
  if (extension) {
    generate.defaults_file_extension = extension;
  }
  if (Object.keys(generate).length > 0) {
    config.generate = generate;
  }

  const includeAll = parseBoolean(env[ENV_VARS.INCLUDE_ALL_RESOURCES]);
  if (includeAll !== undefined) {
    config.staging = { include_all_resources: includeAll };
  }

  const version = env[ENV_VARS.VERSION];
  if (version) {
    config.project = { version };
  }

  // Verbose/log level
  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    config.output = { verbose: true };
  }

  return config;
}

/**
 * Deep merge configuration objects
 */
export function deepMerge<T extends Record<string, unknown>>(target: T, source: Partial<T>): T {
  const result = { ...target };

  for (const key in source) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge<Record<string, unknown>>(targetValue, sourceValue) as T[Extract<keyof T, string>];
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[Extract<keyof T, string>];
    }
  }

  return result;
}

/**
 * Validate raw configuration, falling back to the defaults on errors
 */
export function resolveConfig(raw: Record<string, unknown>): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    console.warn('Configuration validation warnings:', result.error.format());
    return DEFAULT_CONFIG;
  }
  return result.data;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > defaults
 */
export async function loadConfig(cwd?: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const projectConfig = await loadProjectConfig(cwd);
  const envConfig = loadEnvConfig(env);

  const withProject = deepMerge<Record<string, unknown>>(DEFAULT_CONFIG, projectConfig);
  const merged = deepMerge<Record<string, unknown>>(withProject, envConfig);
  return resolveConfig(merged);
}

/**
 * Get the path to the currently loaded config file (or null if using defaults)
 */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}

/**
 * Get a specific config value by path
 */
export function getConfigValue(config: Config, keyPath: string): unknown {
  let current: unknown = config;

  for (const key of keyPath.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}
