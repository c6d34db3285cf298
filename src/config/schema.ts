/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';

/** Scalars from YAML (numbers, booleans) are kept as their string form */
const PropertyValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const PropertyMapSchema = z.record(PropertyValueSchema);

/**
 * Published coordinates; the archive is named `<artifact_id>-<version>-<target>.zip`
 */
export const ProjectSettingsSchema = z.object({
  group_id: z.string().min(1).default('com.example'),
  artifact_id: z.string().min(1).default('app'),
  version: z.coerce.string().default('0.0.0'),
});

/**
 * Source and build directories, relative to the working directory
 */
export const DirectorySettingsSchema = z.object({
  targets: z.string().default('src/main/targets'),
  defaults: z.string().default('src/main/defaults'),
  templates: z.string().default('src/main/templates'),
  resources: z.string().default('src/main/resources'),
  build: z.string().default('build'),
  repository: z.string().optional(),
});

/**
 * Defaults merge settings
 */
export const GenerateSettingsSchema = z.object({
  sort: z.boolean().default(false),
  trim: z.boolean().default(false),
  structured: z.boolean().default(false),
  prepend: z.boolean().default(false),
  defaults_file_extension: z.string().min(1).default('.defaults.vtl'),
});

export const TemplateSettingsSchema = z.object({
  mask: z.string().min(1),
  loader: z.enum(['properties', 'xml']).default('properties'),
});

export const TargetSettingsSchema = z.object({
  name: z.string().optional(),
  context: PropertyMapSchema.optional(),
});

/**
 * Staging settings
 */
export const StagingSettingsSchema = z.object({
  include_all_resources: z.boolean().default(false),
  templates: z.array(TemplateSettingsSchema).default([]),
  targets: z.record(TargetSettingsSchema).default({}),
});

export const RenderSettingsSchema = z.object({
  strict: z.boolean().default(false),
  context: PropertyMapSchema.default({}),
});

export const OutputSettingsSchema = z.object({
  verbose: z.boolean().default(false),
  log_file: z.string().optional(),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  project: ProjectSettingsSchema.default({}),
  directories: DirectorySettingsSchema.default({}),
  generate: GenerateSettingsSchema.default({}),
  staging: StagingSettingsSchema.default({}),
  render: RenderSettingsSchema.default({}),
  output: OutputSettingsSchema.default({}),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type ProjectSettings = z.infer<typeof ProjectSettingsSchema>;
export type DirectorySettings = z.infer<typeof DirectorySettingsSchema>;
export type GenerateSettings = z.infer<typeof GenerateSettingsSchema>;
export type TemplateSettings = z.infer<typeof TemplateSettingsSchema>;
export type TargetSettings = z.infer<typeof TargetSettingsSchema>;
export type StagingSettings = z.infer<typeof StagingSettingsSchema>;
export type RenderSettings = z.infer<typeof RenderSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
