/**
 * Staging module — re-exports all public APIs.
 */

// Core types
export type {
  PropertyMap,
  PropertyLoader,
  Target,
  TargetMap,
  DefaultsEntry,
  MergeOptions,
  GenerateOptions,
  GeneratedBatch,
  PipelineStage,
  PipelineStageKind,
  ArtifactHandle,
  Publication,
  StagingLayout,
} from './types.js';
export { PIPELINE_STAGE_ORDER } from './types.js';

// Errors
export {
  StagingError,
  TemplateDefinitionError,
  TargetDiscoveryError,
  TargetNameParseError,
  TargetParseError,
  InvalidTargetError,
  StructuralInconsistencyError,
  PipelineStageError,
  isStagingError,
  describeErrorChain,
} from './errors.js';
export type { StagingErrorCode } from './errors.js';

// Property loaders
export { parseProperties, parseXmlProperties, loadProperties, loadXmlProperties, loadPropertiesFile } from './properties.js';

// Templates & discovery
export {
  createTemplate,
  defineTemplates,
  compileMask,
  PROPERTIES_TEMPLATE,
  XML_PROPERTIES_TEMPLATE,
  DEFAULT_TEMPLATES,
  TARGET_PATTERN,
  PROPERTIES_MASK,
  XML_PROPERTIES_MASK,
  LOADERS,
} from './templates.js';
export type { Template, TemplateDefinition, TemplateSpec, LoaderName } from './templates.js';
export { discoverTargets, parseTargets } from './discovery.js';

// Defaults merge
export {
  mergeDefaults,
  readDefaults,
  mergeLines,
  generateProperties,
  DEFAULT_DEFAULTS_FILE_EXTENSION,
} from './defaults-merge.js';
export type { MergeDefaultsOptions } from './defaults-merge.js';
export { checkStructure, throwIfNotStructured } from './structure.js';

// Orchestration
export { ArtifactCache, createArtifactCache } from './artifact-cache.js';
export type { ArtifactCacheEntry } from './artifact-cache.js';
export { StageRegistry, createStageRegistry } from './stage-registry.js';
export { createOrchestrationContext, createLayout } from './context.js';
export type { OrchestrationContext, OrchestrationContextOptions, LayoutOptions } from './context.js';
export { StageOrchestrator, createStageOrchestrator, checkTarget } from './orchestrator.js';
export type { StageRunResult } from './orchestrator.js';
export { stageName, selectResource } from './stages.js';

// Collaborators
export { HandlebarsRenderer, createRenderer, expandContext } from './renderer.js';
export type { TemplateRenderer, RenderContext } from './renderer.js';
export { ZipArchiveWriter, createArchiveWriter, archiveFileName, listArchiveEntries } from './archive.js';
export type { ArchiveWriter } from './archive.js';
export { PublicationRegistry, createPublicationRegistry, repositoryPath } from './publication.js';
export type { PublicationSink } from './publication.js';

// Logging
export { StagingLogger, createStagingLogger } from './staging-logger.js';
export type { LogEntry, LogLevel, StagingStage } from './staging-logger.js';

// Runs
export { runStaging, resolvePaths, collectTargets, generateFromConfig } from './run.js';
export type { StagingReport, StagingRunOptions, StagingPaths } from './run.js';
