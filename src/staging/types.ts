/**
 * Core staging types
 */

// ─── Targets ─────────────────────────────────────────────

/** Resolved key/value context of one deployment target */
export type PropertyMap = Record<string, string>;

export interface Target {
  name: string;
  context?: PropertyMap;
}

export type TargetMap = Record<string, Target>;

/**
 * Converts the raw bytes of a target definition file into properties
 */
export type PropertyLoader = (content: Buffer) => PropertyMap;

// ─── Defaults merge ──────────────────────────────────────

export interface DefaultsEntry {
  /** Path of the defaults file relative to the defaults root */
  relativePath: string;
  /** File name with the defaults extension removed */
  basename: string;
  file: string;
  lines: string[];
}

export interface MergeOptions {
  sort: boolean;
  trim: boolean;
  prepend: boolean;
  structured: boolean;
}

export interface GenerateOptions extends MergeOptions {
  defaultsDir: string;
  defaultsFileExtension: string;
  templatesDir: string;
  outputDir: string;
}

/** Files produced by one defaults entry, or by the plain copy */
export interface GeneratedBatch {
  source: string;
  files: string[];
}

// ─── Pipeline ────────────────────────────────────────────

export type PipelineStageKind = 'render' | 'collect' | 'archive' | 'publish';

export const PIPELINE_STAGE_ORDER: readonly PipelineStageKind[] = [
  'render',
  'collect',
  'archive',
  'publish',
];

export interface PipelineStage {
  name: string;
  kind: PipelineStageKind;
  targetName: string;
  /** Directory or file the stage writes */
  output: string;
  dependsOn: string[];
  run: () => void;
}

export interface ArtifactHandle {
  targetName: string;
  file: string;
  classifier: string;
  extension: string;
  /** Name of the stage producing the file */
  builtBy: string;
}

export interface Publication {
  groupId: string;
  artifactId: string;
  version: string;
  artifact: ArtifactHandle;
  classifier: string;
}

/**
 * Directories and coordinates shared by every target in a run
 */
export interface StagingLayout {
  groupId: string;
  artifactId: string;
  version: string;
  /** Shared directory of generated property templates */
  generatedDir: string;
  resourcesDir: string;
  /** Parent of the per-target rendered template directories */
  renderedDir: string;
  /** Parent of the per-target collected resource directories */
  collectedDir: string;
  libsDir: string;
  archiveExtension: string;
}
