/**
 * Target discovery — turns a flat directory of target definition files into
 * named target contexts, one template at a time
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { TargetDiscoveryError, TargetNameParseError, TargetParseError } from './errors.js';
import { isDirectory, listFiles } from './fs-utils.js';
import { setEntry } from './records.js';
import type { StagingLogger } from './staging-logger.js';
import { DEFAULT_TEMPLATES, type Template } from './templates.js';
import type { Target, TargetMap } from './types.js';

export interface DiscoverOptions {
  logger?: StagingLogger;
}

export function parseTargetName(filePath: string, fileName: string, template: Template): string {
  const name = template.extractName(fileName);
  if (name === undefined) {
    throw new TargetNameParseError(fileName, template.pattern.source, filePath);
  }
  return name;
}

export function parseTargetFile(name: string, filePath: string, template: Template): Target {
  try {
    const context = template.load(readFileSync(filePath));
    return { name, context };
  } catch (error) {
    throw new TargetParseError(filePath, error);
  }
}

/**
 * Parse every file the template matches into a target keyed by name
 */
export function parseTargets(targetsDir: string, template: Template): TargetMap {
  const result: TargetMap = {};
  for (const fileName of listFiles(targetsDir).filter((f) => template.matches(f))) {
    const filePath = join(targetsDir, fileName);
    const name = parseTargetName(filePath, fileName, template);
    setEntry(result, name, parseTargetFile(name, filePath, template));
  }
  return result;
}

/**
 * Discover targets using the given templates in order. A later template
 * replaces an earlier template's target of the same name.
 */
export function discoverTargets(
  targetsDir: string,
  templates: readonly Template[] = [],
  options: DiscoverOptions = {},
): TargetMap {
  if (!isDirectory(targetsDir)) {
    throw new TargetDiscoveryError(targetsDir);
  }

  const effective = templates.length > 0 ? templates : DEFAULT_TEMPLATES;
  const targets: TargetMap = {};

  for (const template of effective) {
    const parsed = parseTargets(targetsDir, template);
    for (const [name, target] of Object.entries(parsed)) {
      if (Object.hasOwn(targets, name)) {
        options.logger?.warn('discovery', 'target_replaced', `Target ${name} redefined by pattern ${template.pattern.source}`);
      }
      setEntry(targets, name, target);
    }
  }

  options.logger?.info('discovery', 'targets_discovered', `Discovered ${Object.keys(targets).length} target(s) in ${targetsDir}`, {
    targets: Object.keys(targets),
  });
  return targets;
}
