/**
 * Template rendering
 * Renders the generated templates against a target context with Handlebars
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import Handlebars from 'handlebars';

import { listTree } from './fs-utils.js';
import type { PropertyMap } from './types.js';

export type RenderContext = Record<string, unknown>;

export interface TemplateRenderer {
  render(source: string, context: RenderContext, sourceName?: string): string;
}

export interface HandlebarsRendererOptions {
  /** Fail on references to keys the context does not define */
  strict?: boolean;
}

export class HandlebarsRenderer implements TemplateRenderer {
  private readonly handlebars = Handlebars.create();
  private readonly strict: boolean;

  constructor(options: HandlebarsRendererOptions = {}) {
    this.strict = options.strict ?? false;
  }

  render(source: string, context: RenderContext, sourceName = 'template'): string {
    try {
      const template = this.handlebars.compile(source, { noEscape: true, strict: this.strict });
      return template(context);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Unable to render ${sourceName}: ${reason}`, { cause: error });
    }
  }
}

const UNSAFE_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep every flat key and also nest dotted keys, so both `{{[db.url]}}`
 * and `{{db.url}}` resolve. A plain value wins over a nested one.
 */
export function expandContext(flat: PropertyMap): RenderContext {
  const context: RenderContext = { ...flat };

  for (const [key, value] of Object.entries(flat)) {
    const segments = key.split('.');
    if (segments.length < 2 || segments.some((s) => s.length === 0 || UNSAFE_SEGMENTS.has(s))) continue;

    let node: Record<string, unknown> = context;
    let blocked = false;
    for (const segment of segments.slice(0, -1)) {
      const next = node[segment];
      if (next === undefined) {
        const created: Record<string, unknown> = {};
        node[segment] = created;
        node = created;
      } else if (isRecord(next)) {
        node = next;
      } else {
        blocked = true;
        break;
      }
    }

    const leaf = segments[segments.length - 1];
    if (!blocked && node[leaf] === undefined) node[leaf] = value;
  }

  return context;
}

/**
 * Render every file below sourceDir into the same relative path below
 * outputDir. Returns the written files.
 */
export function renderDirectory(
  renderer: TemplateRenderer,
  sourceDir: string,
  outputDir: string,
  context: RenderContext,
): string[] {
  return listTree(sourceDir).map((relativePath) => {
    const source = path.join(sourceDir, relativePath);
    const target = path.join(outputDir, relativePath);
    mkdirSync(path.dirname(target), { recursive: true });
    writeFileSync(target, renderer.render(readFileSync(source, 'utf-8'), context, relativePath), 'utf-8');
    return target;
  });
}

export function createRenderer(options: HandlebarsRendererOptions = {}): TemplateRenderer {
  return new HandlebarsRenderer(options);
}
