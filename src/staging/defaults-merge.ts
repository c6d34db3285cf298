/**
 * Defaults merge — combines each defaults file with the property templates
 * sharing its basename and writes the merged files to the output tree.
 *
 * Without any defaults the templates are copied unchanged.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { EOL } from 'node:os';
import path from 'node:path';

import { copyFile, isDirectory, listFiles, listTree } from './fs-utils.js';
import { verifyStructure } from './structure.js';
import type { StagingLogger } from './staging-logger.js';
import type { DefaultsEntry, GeneratedBatch, GenerateOptions, MergeOptions } from './types.js';

export const DEFAULT_DEFAULTS_FILE_EXTENSION = '.defaults.vtl';

export interface MergeDefaultsOptions extends Partial<MergeOptions> {
  defaultsDir: string;
  templatesDir: string;
  outputDir: string;
  defaultsFileExtension?: string;
  logger?: StagingLogger;
}

/**
 * Split file content into lines; a trailing line break does not start a line
 */
export function readLines(file: string): string[] {
  const content = readFileSync(file, 'utf-8');
  if (content.length === 0) return [];
  const lines = content.split(/\r\n|\n|\r/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

// ─── Defaults discovery ──────────────────────────────────

export function getPropertiesBasename(fileName: string, defaultsFileExtension: string): string {
  return fileName.slice(0, fileName.length - defaultsFileExtension.length);
}

/**
 * Collect every defaults file under the root, keeping its non-blank lines.
 * A missing root yields no defaults.
 */
export function readDefaults(
  defaultsDir: string,
  defaultsFileExtension: string = DEFAULT_DEFAULTS_FILE_EXTENSION,
): DefaultsEntry[] {
  if (!isDirectory(defaultsDir)) return [];

  return listTree(defaultsDir)
    .filter((relativePath) => path.posix.basename(relativePath).endsWith(defaultsFileExtension))
    .map((relativePath) => {
      const file = path.join(defaultsDir, relativePath);
      return {
        relativePath,
        basename: getPropertiesBasename(path.posix.basename(relativePath), defaultsFileExtension),
        file,
        lines: readLines(file).filter((line) => line.trim().length > 0),
      };
    });
}

// ─── Merge ───────────────────────────────────────────────

/**
 * Concatenate defaults and own lines, then apply trim and sort.
 * Sorting covers the whole concatenation, not each half.
 */
export function mergeLines(
  defaults: string[],
  properties: string[],
  options: Pick<MergeOptions, 'sort' | 'trim' | 'prepend'>,
): string[] {
  // Appending (the default) puts the defaults first
  const prefix = options.prepend ? properties : defaults;
  const suffix = options.prepend ? defaults : properties;
  let lines = [...prefix, ...suffix];
  if (options.trim) {
    lines = lines.filter((line) => line.trim().length > 0);
  }
  if (options.sort) {
    lines.sort();
  }
  return lines;
}

export function generateProperties(
  defaults: string[],
  properties: string[],
  options: Pick<MergeOptions, 'sort' | 'trim' | 'prepend'>,
): string {
  return mergeLines(defaults, properties, options).join(EOL);
}

/**
 * Merge one defaults entry into every template whose name starts with the
 * entry's basename, in the entry's relative directory
 */
export function generateForDefaults(entry: DefaultsEntry, options: GenerateOptions, logger?: StagingLogger): string[] {
  const relativeDir = path.dirname(entry.relativePath);
  const inputDir = path.join(options.templatesDir, relativeDir);
  const outputDir = path.join(options.outputDir, relativeDir);
  if (!isDirectory(inputDir)) {
    logger?.warn('generate', 'templates_missing', `No templates directory for defaults ${entry.relativePath}: ${inputDir}`);
    return [];
  }

  const candidates = listFiles(inputDir).filter((name) => name.startsWith(entry.basename));

  const generated: string[] = [];
  for (const name of candidates) {
    const outputFile = path.join(outputDir, name);
    mkdirSync(outputDir, { recursive: true });
    writeFileSync(
      outputFile,
      generateProperties(entry.lines, readLines(path.join(inputDir, name)), options),
      'utf-8',
    );
    logger?.debug('generate', 'file_generated', `Generated ${outputFile}`);
    generated.push(outputFile);
  }
  return generated;
}

/**
 * Copy the templates tree unchanged
 */
export function copyTemplates(templatesDir: string, outputDir: string): string[] {
  return listTree(templatesDir).map((relativePath) => {
    const target = path.join(outputDir, relativePath);
    copyFile(path.join(templatesDir, relativePath), target);
    return target;
  });
}

function resolveOptions(options: MergeDefaultsOptions): GenerateOptions {
  return {
    defaultsDir: options.defaultsDir,
    templatesDir: options.templatesDir,
    outputDir: options.outputDir,
    defaultsFileExtension: options.defaultsFileExtension ?? DEFAULT_DEFAULTS_FILE_EXTENSION,
    sort: options.sort ?? false,
    trim: options.trim ?? false,
    prepend: options.prepend ?? false,
    structured: options.structured ?? false,
  };
}

/**
 * Regenerate the property files under the output directory. Each defaults
 * entry is one batch; in structured mode every file of a batch must define
 * the same keys.
 */
export function mergeDefaults(input: MergeDefaultsOptions): GeneratedBatch[] {
  const options = resolveOptions(input);
  const { logger } = input;

  if (!isDirectory(options.templatesDir)) {
    logger?.info('generate', 'skipped', `No templates at ${options.templatesDir}, nothing to generate`);
    return [];
  }

  mkdirSync(options.outputDir, { recursive: true });
  const defaults = readDefaults(options.defaultsDir, options.defaultsFileExtension);
  const batches: GeneratedBatch[] = [];

  if (defaults.length === 0) {
    const files = copyTemplates(options.templatesDir, options.outputDir);
    logger?.info('generate', 'templates_copied', `No defaults found, copied ${files.length} template(s)`);
    if (options.structured) verifyStructure(files);
    batches.push({ source: options.templatesDir, files });
    return batches;
  }

  for (const entry of defaults) {
    const files = generateForDefaults(entry, options, logger);
    if (options.structured) verifyStructure(files);
    logger?.info('generate', 'defaults_applied', `Applied ${entry.relativePath} to ${files.length} file(s)`, {
      files,
    });
    batches.push({ source: entry.file, files });
  }
  return batches;
}
