/**
 * Structural consistency of generated property sets
 */

import { StructuralInconsistencyError } from './errors.js';
import { loadPropertiesFile } from './properties.js';
import type { PropertyMap } from './types.js';

export interface StructureReport {
  /** Every key present in at least one set */
  union: string[];
  /** Keys some sets define and others do not, sorted */
  difference: string[];
}

function symmetricDifference(a: Set<string>, b: Set<string>): string[] {
  const result: string[] = [];
  for (const key of a) if (!b.has(key)) result.push(key);
  for (const key of b) if (!a.has(key)) result.push(key);
  return result;
}

/**
 * Compare every unordered pair of property sets and collect the keys that
 * appear in one but not the other
 */
export function checkStructure(propertySets: PropertyMap[]): StructureReport {
  const keySets = propertySets.map((properties) => new Set(Object.keys(properties)));
  const union = new Set<string>();
  const difference = new Set<string>();

  for (const keys of keySets) {
    for (const key of keys) union.add(key);
  }

  for (let i = 0; i < keySets.length; i++) {
    for (let j = i + 1; j < keySets.length; j++) {
      for (const key of symmetricDifference(keySets[i], keySets[j])) difference.add(key);
    }
  }

  return {
    union: [...union].sort(),
    difference: [...difference].sort(),
  };
}

export function throwIfNotStructured(propertySets: PropertyMap[]): void {
  const { difference } = checkStructure(propertySets);
  if (difference.length === 0) return;
  throw new StructuralInconsistencyError(difference);
}

/**
 * Parse the generated files and require identical key sets
 */
export function verifyStructure(files: string[]): void {
  throwIfNotStructured(files.map((file) => loadPropertiesFile(file)));
}
