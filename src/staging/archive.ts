/**
 * Archive writing — one zip per target, built from its collected resources
 */

import { mkdirSync } from 'node:fs';
import path from 'node:path';
import AdmZip from 'adm-zip';

import { isDirectory } from './fs-utils.js';

export const DEFAULT_ARCHIVE_EXTENSION = 'zip';

export interface ArchiveWriter {
  /** Write the contents of sourceDir into archiveFile, replacing it */
  write(sourceDir: string, archiveFile: string): void;
}

export class ZipArchiveWriter implements ArchiveWriter {
  write(sourceDir: string, archiveFile: string): void {
    mkdirSync(path.dirname(archiveFile), { recursive: true });
    const zip = new AdmZip();
    if (isDirectory(sourceDir)) {
      zip.addLocalFolder(sourceDir);
    }
    zip.writeZip(archiveFile);
  }
}

/**
 * `<artifactId>-<version>-<targetName>.<extension>`
 */
export function archiveFileName(
  artifactId: string,
  version: string,
  targetName: string,
  extension: string = DEFAULT_ARCHIVE_EXTENSION,
): string {
  return `${artifactId}-${version}-${targetName}.${extension}`;
}

/** File entries of an archive, sorted */
export function listArchiveEntries(archiveFile: string): string[] {
  return new AdmZip(archiveFile)
    .getEntries()
    .filter((entry) => !entry.isDirectory)
    .map((entry) => entry.entryName)
    .sort();
}

export function readArchiveEntry(archiveFile: string, entryName: string): string | undefined {
  const entry = new AdmZip(archiveFile).getEntry(entryName);
  return entry ? entry.getData().toString('utf-8') : undefined;
}

export function createArchiveWriter(): ArchiveWriter {
  return new ZipArchiveWriter();
}
