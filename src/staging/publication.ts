/**
 * Publication sink
 * Registrations are recorded once per target at configuration time; the
 * publish stage later copies the archive into a local repository laid out
 * as `<group path>/<artifactId>/<version>/<file>`
 */

import path from 'node:path';

import { copyFile } from './fs-utils.js';
import type { Publication } from './types.js';

export interface PublicationSink {
  register(publication: Publication): void;
  /** Deliver a registered publication; returns the published file, if any */
  publish(publication: Publication): string | undefined;
}

export function repositoryPath(repositoryDir: string, publication: Publication): string {
  const { groupId, artifactId, version, classifier, artifact } = publication;
  return path.join(
    repositoryDir,
    ...groupId.split('.'),
    artifactId,
    version,
    `${artifactId}-${version}-${classifier}.${artifact.extension}`,
  );
}

export class PublicationRegistry implements PublicationSink {
  private readonly registered: Publication[] = [];
  private readonly published = new Map<string, string | undefined>();
  private readonly repositoryDir?: string;

  constructor(repositoryDir?: string) {
    this.repositoryDir = repositoryDir;
  }

  register(publication: Publication): void {
    this.registered.push(publication);
  }

  publish(publication: Publication): string | undefined {
    const destination = this.repositoryDir ? repositoryPath(this.repositoryDir, publication) : undefined;
    if (destination) {
      copyFile(publication.artifact.file, destination);
    }
    this.published.set(publication.classifier, destination);
    return destination;
  }

  list(): Publication[] {
    return [...this.registered];
  }

  /** Classifiers published so far, with the repository file when one was written */
  publishedFiles(): Map<string, string | undefined> {
    return new Map(this.published);
  }
}

export function createPublicationRegistry(repositoryDir?: string): PublicationRegistry {
  return new PublicationRegistry(repositoryDir);
}
