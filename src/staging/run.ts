/**
 * Staging run — discovery, defaults merge, configuration and execution of
 * every target chain, driven by the loaded configuration
 */

import path from 'node:path';

import type { Config } from '../config/schema.js';
import type { ArchiveWriter } from './archive.js';
import type { ArtifactCacheEntry } from './artifact-cache.js';
import { createLayout, createOrchestrationContext, type OrchestrationContext } from './context.js';
import { mergeDefaults } from './defaults-merge.js';
import { discoverTargets } from './discovery.js';
import { isDirectory } from './fs-utils.js';
import { StageOrchestrator, type StageRunResult } from './orchestrator.js';
import { PublicationRegistry, type PublicationSink } from './publication.js';
import { getEntry, setEntry } from './records.js';
import { HandlebarsRenderer, type TemplateRenderer } from './renderer.js';
import type { StagingLogger } from './staging-logger.js';
import { LOADERS, createTemplate, type Template } from './templates.js';
import type { GeneratedBatch, TargetMap } from './types.js';

export interface StagingPaths {
  targetsDir: string;
  defaultsDir: string;
  templatesDir: string;
  resourcesDir: string;
  buildDir: string;
  generatedDir: string;
  repositoryDir?: string;
}

export interface StagingRunOptions {
  cwd?: string;
  /** Restrict configuration and execution to these targets */
  targets?: string[];
  /** Regenerate the property templates first (default true) */
  generate?: boolean;
  logger?: StagingLogger;
  renderer?: TemplateRenderer;
  archiver?: ArchiveWriter;
  publications?: PublicationSink;
}

export interface StagingReport {
  targets: TargetMap;
  batches: GeneratedBatch[];
  stages: StageRunResult[];
  artifacts: ArtifactCacheEntry[];
}

export function resolvePaths(config: Config, cwd: string = process.cwd()): StagingPaths {
  const dirs = config.directories;
  const buildDir = path.resolve(cwd, dirs.build);
  return {
    targetsDir: path.resolve(cwd, dirs.targets),
    defaultsDir: path.resolve(cwd, dirs.defaults),
    templatesDir: path.resolve(cwd, dirs.templates),
    resourcesDir: path.resolve(cwd, dirs.resources),
    buildDir,
    generatedDir: path.join(buildDir, 'vtl'),
    repositoryDir: dirs.repository ? path.resolve(cwd, dirs.repository) : undefined,
  };
}

/**
 * Templates declared in configuration, in declaration order
 */
export function configuredTemplates(config: Config): Template[] {
  return config.staging.templates.map(({ mask, loader }) => createTemplate(mask, LOADERS[loader]));
}

/**
 * Targets discovered from the targets directory, overlaid with the targets
 * declared inline in configuration
 */
export function collectTargets(config: Config, paths: StagingPaths, logger?: StagingLogger): TargetMap {
  const targets: TargetMap = {};

  if (isDirectory(paths.targetsDir)) {
    for (const [name, target] of Object.entries(discoverTargets(paths.targetsDir, configuredTemplates(config), { logger }))) {
      setEntry(targets, name, target);
    }
  } else {
    logger?.debug('discovery', 'no_targets_dir', `No targets directory at ${paths.targetsDir}`);
  }

  for (const [key, declared] of Object.entries(config.staging.targets)) {
    const name = declared.name ?? key;
    setEntry(targets, name, declared.context ? { name, context: declared.context } : { name });
  }

  return targets;
}

export function selectTargets(targets: TargetMap, names?: string[]): TargetMap {
  if (!names || names.length === 0) return targets;
  const selected: TargetMap = {};
  for (const name of names) {
    const target = getEntry(targets, name);
    if (!target) {
      throw new Error(`Unknown target: ${name} (available: ${Object.keys(targets).join(', ') || 'none'})`);
    }
    setEntry(selected, name, target);
  }
  return selected;
}

export function generateFromConfig(config: Config, paths: StagingPaths, logger?: StagingLogger): GeneratedBatch[] {
  return mergeDefaults({
    defaultsDir: paths.defaultsDir,
    defaultsFileExtension: config.generate.defaults_file_extension,
    templatesDir: paths.templatesDir,
    outputDir: paths.generatedDir,
    sort: config.generate.sort,
    trim: config.generate.trim,
    prepend: config.generate.prepend,
    structured: config.generate.structured,
    logger,
  });
}

export function createContextFromConfig(
  config: Config,
  paths: StagingPaths,
  options: StagingRunOptions = {},
): OrchestrationContext {
  return createOrchestrationContext({
    layout: createLayout({
      buildDir: paths.buildDir,
      resourcesDir: paths.resourcesDir,
      groupId: config.project.group_id,
      artifactId: config.project.artifact_id,
      version: config.project.version,
    }),
    includeAllResources: config.staging.include_all_resources,
    renderContext: config.render.context,
    renderer: options.renderer ?? new HandlebarsRenderer({ strict: config.render.strict }),
    archiver: options.archiver,
    publications: options.publications ?? new PublicationRegistry(paths.repositoryDir),
    logger: options.logger,
  });
}

/**
 * Run a complete staging pass
 */
export function runStaging(config: Config, options: StagingRunOptions = {}): StagingReport {
  const { logger } = options;
  const paths = resolvePaths(config, options.cwd);

  const targets = selectTargets(collectTargets(config, paths, logger), options.targets);
  const batches = options.generate === false ? [] : generateFromConfig(config, paths, logger);

  const context = createContextFromConfig(config, paths, options);
  const orchestrator = new StageOrchestrator(context);
  orchestrator.configure(targets);
  const stages = orchestrator.run(Object.keys(targets));

  logger?.success('run', 'run_complete', `Staged ${Object.keys(targets).length} target(s)`);
  return {
    targets,
    batches,
    stages,
    artifacts: context.artifacts.list(),
  };
}
