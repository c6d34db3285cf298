/**
 * Orchestration context — everything one staging run shares, passed
 * explicitly to every stage construction call
 */

import path from 'node:path';

import { ArtifactCache } from './artifact-cache.js';
import { DEFAULT_ARCHIVE_EXTENSION, ZipArchiveWriter, type ArchiveWriter } from './archive.js';
import { PublicationRegistry, type PublicationSink } from './publication.js';
import { HandlebarsRenderer, type TemplateRenderer } from './renderer.js';
import { StageRegistry } from './stage-registry.js';
import type { StagingLogger } from './staging-logger.js';
import type { PropertyMap, StagingLayout } from './types.js';

export interface OrchestrationContext {
  readonly layout: StagingLayout;
  /** Collect every resource instead of only the `.<target>` variants */
  readonly includeAllResources: boolean;
  /** Shared render values; a target's own context overrides them */
  readonly renderContext: PropertyMap;
  readonly stages: StageRegistry;
  readonly artifacts: ArtifactCache;
  readonly renderer: TemplateRenderer;
  readonly archiver: ArchiveWriter;
  readonly publications: PublicationSink;
  readonly logger?: StagingLogger;
}

export interface OrchestrationContextOptions {
  layout: StagingLayout;
  includeAllResources?: boolean;
  renderContext?: PropertyMap;
  renderer?: TemplateRenderer;
  archiver?: ArchiveWriter;
  publications?: PublicationSink;
  logger?: StagingLogger;
}

export function createOrchestrationContext(options: OrchestrationContextOptions): OrchestrationContext {
  return {
    layout: options.layout,
    includeAllResources: options.includeAllResources ?? false,
    renderContext: options.renderContext ?? {},
    stages: new StageRegistry(),
    artifacts: new ArtifactCache(),
    renderer: options.renderer ?? new HandlebarsRenderer(),
    archiver: options.archiver ?? new ZipArchiveWriter(),
    publications: options.publications ?? new PublicationRegistry(),
    logger: options.logger,
  };
}

export interface LayoutOptions {
  buildDir: string;
  resourcesDir: string;
  groupId: string;
  artifactId: string;
  version: string;
  archiveExtension?: string;
}

/**
 * Derive the standard build layout:
 * `vtl/` generated templates, `templates/<target>` rendered output,
 * `resources/<target>` collected resources and `libs/` archives
 */
export function createLayout(options: LayoutOptions): StagingLayout {
  return {
    groupId: options.groupId,
    artifactId: options.artifactId,
    version: options.version,
    generatedDir: path.join(options.buildDir, 'vtl'),
    resourcesDir: options.resourcesDir,
    renderedDir: path.join(options.buildDir, 'templates'),
    collectedDir: path.join(options.buildDir, 'resources'),
    libsDir: path.join(options.buildDir, 'libs'),
    archiveExtension: options.archiveExtension ?? DEFAULT_ARCHIVE_EXTENSION,
  };
}

export function getRenderedDir(layout: StagingLayout, targetName: string): string {
  return path.join(layout.renderedDir, targetName);
}

export function getCollectedDir(layout: StagingLayout, targetName: string): string {
  return path.join(layout.collectedDir, targetName);
}
