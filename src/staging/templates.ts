/**
 * Target templates
 * A template pairs a file name pattern (capture group 1 is the target name)
 * with the loader that turns the matched file into the target context.
 */

import { TemplateDefinitionError } from './errors.js';
import { loadProperties, loadXmlProperties } from './properties.js';
import type { PropertyLoader } from './types.js';

// ─── Built-in masks ──────────────────────────────────────

/**
 * Letters, digits, dashes and underscores; dots and slashes are not part
 * of a target name
 */
export const TARGET_PATTERN = '([a-zA-Z0-9_\\-]*)';

export const PROPERTIES_MASK = `${TARGET_PATTERN}.properties`;

export const XML_PROPERTIES_MASK = `${TARGET_PATTERN}.xml`;

export const LOADERS = {
  properties: loadProperties,
  xml: loadXmlProperties,
} as const satisfies Record<string, PropertyLoader>;

export type LoaderName = keyof typeof LOADERS;

// ─── Template ────────────────────────────────────────────

export interface Template {
  readonly pattern: RegExp;
  readonly load: PropertyLoader;
  /** True if the file name contains a match of the pattern */
  matches(fileName: string): boolean;
  /** Capture group 1 of the first match, if it resolved to a non-empty name */
  extractName(fileName: string): string | undefined;
}

export interface TemplateSpec {
  mask?: string;
  pattern?: RegExp;
  load?: PropertyLoader;
}

export type TemplateDefinition = string | RegExp | TemplateSpec;

export function compileMask(mask: string): RegExp {
  try {
    return new RegExp(mask);
  } catch (error) {
    throw new TemplateDefinitionError(`Not a valid context mask: ${mask}`, mask, error);
  }
}

/**
 * Drop the stateful flags so repeated matching never depends on lastIndex
 */
function statelessPattern(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

function resolvePattern(definition: TemplateDefinition): RegExp {
  if (typeof definition === 'string') return compileMask(definition);
  if (definition instanceof RegExp) return statelessPattern(definition);
  if (definition.pattern) return statelessPattern(definition.pattern);
  if (typeof definition.mask === 'string') return compileMask(definition.mask);
  throw new TemplateDefinitionError('Define a string mask or regular expression pattern');
}

class PatternTemplate implements Template {
  readonly pattern: RegExp;
  readonly load: PropertyLoader;

  constructor(pattern: RegExp, load: PropertyLoader) {
    this.pattern = pattern;
    this.load = load;
  }

  matches(fileName: string): boolean {
    return this.pattern.test(fileName);
  }

  extractName(fileName: string): string | undefined {
    const match = this.pattern.exec(fileName);
    const name = match?.[1];
    return name ? name : undefined;
  }
}

/**
 * Create a template from a mask, a pattern or a `{ mask | pattern, load }`
 * record. The loader falls back to the line-based properties parser.
 */
export function createTemplate(definition: TemplateDefinition, load?: PropertyLoader): Template {
  const pattern = resolvePattern(definition);
  const specLoad = typeof definition === 'object' && !(definition instanceof RegExp)
    ? definition.load
    : undefined;
  return new PatternTemplate(pattern, load ?? specLoad ?? loadProperties);
}

export function defineTemplates(definitions: TemplateDefinition[]): Template[] {
  return definitions.map((definition) => createTemplate(definition));
}

export const PROPERTIES_TEMPLATE: Template = createTemplate(PROPERTIES_MASK, loadProperties);

export const XML_PROPERTIES_TEMPLATE: Template = createTemplate(XML_PROPERTIES_MASK, loadXmlProperties);

export const DEFAULT_TEMPLATES: readonly Template[] = [PROPERTIES_TEMPLATE, XML_PROPERTIES_TEMPLATE];
