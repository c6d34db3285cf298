/**
 * Artifact Cache — at most one archive artifact and one publication
 * registration per target name for the lifetime of a run
 */

import type { ArtifactHandle } from './types.js';

export interface ArtifactCacheEntry {
  targetName: string;
  artifact: ArtifactHandle;
  published: boolean;
}

export class ArtifactCache {
  private readonly entries = new Map<string, ArtifactCacheEntry>();

  /**
   * Return the cached artifact for the target, creating it on first use.
   * The factory never runs for a name already in the cache.
   */
  getOrCreate(targetName: string, factory: () => ArtifactHandle): ArtifactHandle {
    const cached = this.entries.get(targetName);
    if (cached) return cached.artifact;

    const artifact = factory();
    this.entries.set(targetName, { targetName, artifact, published: false });
    return artifact;
  }

  /**
   * Run the registration the first time it is requested for a target;
   * later calls for the same name do nothing. Returns whether it ran.
   */
  registerPublicationOnce(targetName: string, artifact: ArtifactHandle, registerFn: () => void): boolean {
    const existing = this.entries.get(targetName);
    if (existing?.published) return false;

    registerFn();
    this.entries.set(targetName, { targetName, artifact: existing?.artifact ?? artifact, published: true });
    return true;
  }

  has(targetName: string): boolean {
    return this.entries.has(targetName);
  }

  get(targetName: string): ArtifactHandle | undefined {
    return this.entries.get(targetName)?.artifact;
  }

  isPublished(targetName: string): boolean {
    return this.entries.get(targetName)?.published ?? false;
  }

  list(): ArtifactCacheEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}

export function createArtifactCache(): ArtifactCache {
  return new ArtifactCache();
}
