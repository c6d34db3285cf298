/**
 * Property file loaders
 * Line-based `key=value` files and the `<properties><entry key="..">` XML form
 */

import { readFileSync } from 'node:fs';
import { XMLParser, XMLValidator } from 'fast-xml-parser';

import { setEntry } from './records.js';
import type { PropertyLoader, PropertyMap } from './types.js';

// ─── Line-based properties ───────────────────────────────

const WHITESPACE = new Set([' ', '\t', '\f']);
const SEPARATORS = new Set(['=', ':']);

const ESCAPES: Record<string, string> = {
  t: '\t',
  n: '\n',
  r: '\r',
  f: '\f',
};

function skipWhitespace(line: string, from: number): number {
  let i = from;
  while (i < line.length && WHITESPACE.has(line[i])) i++;
  return i;
}

function endsWithContinuation(line: string): boolean {
  let slashes = 0;
  for (let i = line.length - 1; i >= 0 && line[i] === '\\'; i--) {
    slashes++;
  }
  return slashes % 2 === 1;
}

/**
 * Join natural lines into logical lines, dropping blanks and comments
 */
function logicalLines(text: string): string[] {
  const natural = text.split(/\r\n|\r|\n/);
  const result: string[] = [];
  let pending: string | null = null;

  for (const raw of natural) {
    const line = raw.slice(skipWhitespace(raw, 0));

    if (pending === null) {
      if (line.length === 0 || line.startsWith('#') || line.startsWith('!')) continue;
      pending = '';
    }

    if (endsWithContinuation(line)) {
      pending += line.slice(0, -1);
      continue;
    }

    result.push(pending + line);
    pending = null;
  }

  if (pending !== null) result.push(pending);
  return result;
}

function unescape(value: string): string {
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch !== '\\' || i === value.length - 1) {
      out += ch;
      continue;
    }
    const next = value[++i];
    if (next === 'u') {
      const hex = value.slice(i + 1, i + 5);
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
        throw new Error(`Malformed \\uXXXX encoding: \\u${hex}`);
      }
      out += String.fromCharCode(parseInt(hex, 16));
      i += 4;
    } else {
      out += ESCAPES[next] ?? next;
    }
  }
  return out;
}

function splitKeyValue(line: string): [string, string] {
  let i = 0;
  while (i < line.length) {
    const ch = line[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (SEPARATORS.has(ch) || WHITESPACE.has(ch)) break;
    i++;
  }

  const key = line.slice(0, i);
  let valueStart = skipWhitespace(line, i);
  if (valueStart < line.length && SEPARATORS.has(line[valueStart])) {
    valueStart = skipWhitespace(line, valueStart + 1);
  }

  return [unescape(key), unescape(line.slice(valueStart))];
}

/**
 * Parse line-based properties text. Later duplicates overwrite earlier keys.
 */
export function parseProperties(text: string): PropertyMap {
  const properties: PropertyMap = {};
  for (const line of logicalLines(text)) {
    const [key, value] = splitKeyValue(line);
    setEntry(properties, key, value);
  }
  return properties;
}

// ─── XML properties ──────────────────────────────────────

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  isArray: (name) => name === 'entry',
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the XML properties form:
 * `<properties><entry key="a">1</entry></properties>`
 */
export function parseXmlProperties(text: string): PropertyMap {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new Error(`Invalid properties XML at line ${line}: ${msg}`);
  }

  const document: unknown = xmlParser.parse(text);
  if (!isRecord(document) || !('properties' in document)) {
    throw new Error('Properties XML must have a <properties> root element');
  }

  const root = document.properties;
  const properties: PropertyMap = {};
  if (!isRecord(root)) return properties;

  const entries = Array.isArray(root.entry) ? root.entry : [];
  for (const entry of entries) {
    if (!isRecord(entry) || typeof entry.key !== 'string') {
      throw new Error('Properties XML <entry> is missing its key attribute');
    }
    const value = entry['#text'];
    setEntry(properties, entry.key, typeof value === 'string' ? value : '');
  }
  return properties;
}

// ─── Loaders ─────────────────────────────────────────────

export const loadProperties: PropertyLoader = (content) => parseProperties(content.toString('utf-8'));

export const loadXmlProperties: PropertyLoader = (content) =>
  parseXmlProperties(content.toString('utf-8'));

/**
 * Read a line-based properties file from disk
 */
export function loadPropertiesFile(filePath: string): PropertyMap {
  return loadProperties(readFileSync(filePath));
}
