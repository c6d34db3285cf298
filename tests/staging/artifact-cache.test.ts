/**
 * Artifact cache tests — memoized artifacts and one-shot publication
 */

import { describe, it, expect, vi } from 'vitest';
import { ArtifactCache } from '../../src/staging/artifact-cache.js';
import type { ArtifactHandle } from '../../src/staging/types.js';

function handle(targetName: string, file: string): ArtifactHandle {
  return {
    targetName,
    file,
    classifier: targetName,
    extension: 'zip',
    builtBy: `${targetName}Archive`,
  };
}

describe('ArtifactCache', () => {
  it('should keep the first artifact created for a target', () => {
    const cache = new ArtifactCache();
    const first = handle('dev', '/build/libs/first.zip');
    const secondFactory = vi.fn(() => handle('dev', '/build/libs/second.zip'));

    expect(cache.getOrCreate('dev', () => first)).toBe(first);
    expect(cache.getOrCreate('dev', secondFactory)).toBe(first);
    expect(secondFactory).not.toHaveBeenCalled();
    expect(cache.size).toBe(1);
  });

  it('should keep artifacts of different targets apart', () => {
    const cache = new ArtifactCache();
    cache.getOrCreate('dev', () => handle('dev', 'dev.zip'));
    cache.getOrCreate('prod', () => handle('prod', 'prod.zip'));

    expect(cache.get('prod')?.file).toBe('prod.zip');
    expect(cache.has('qa')).toBe(false);
    expect(cache.list().map((entry) => entry.targetName)).toEqual(['dev', 'prod']);
  });

  it('should register a publication only once', () => {
    const cache = new ArtifactCache();
    const artifact = cache.getOrCreate('dev', () => handle('dev', 'dev.zip'));
    const register = vi.fn();

    expect(cache.registerPublicationOnce('dev', artifact, register)).toBe(true);
    expect(cache.registerPublicationOnce('dev', artifact, register)).toBe(false);
    expect(register).toHaveBeenCalledTimes(1);
    expect(cache.isPublished('dev')).toBe(true);
  });

  it('should retry a publication whose registration failed', () => {
    const cache = new ArtifactCache();
    const artifact = cache.getOrCreate('dev', () => handle('dev', 'dev.zip'));

    expect(() =>
      cache.registerPublicationOnce('dev', artifact, () => {
        throw new Error('sink unavailable');
      }),
    ).toThrow('sink unavailable');
    expect(cache.isPublished('dev')).toBe(false);

    expect(cache.registerPublicationOnce('dev', artifact, () => undefined)).toBe(true);
    expect(cache.isPublished('dev')).toBe(true);
  });
});
