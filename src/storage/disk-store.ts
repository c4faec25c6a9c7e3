/**
 * Disk-backed artifact store.
 *
 * Bytes are written into one scoped directory, first under a temporary name
 * and then renamed into place, so a reader never sees a partial file. Files
 * are keyed by artifact id; a reused filename never touches older bytes. The
 * metadata index lives in memory: files left behind by an earlier process are
 * not served and must be cleaned up externally. Evicted and expired artifacts
 * have their files removed.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import { ArtifactSummary } from '../domain/artifact';
import { FILE_EXTENSIONS } from '../domain/document';
import { Logger } from '../logger';
import { IndexedArtifactStore } from './indexed-store';
import { ArtifactStoreOptions } from './store';

/** True for a plain file name that stays inside its directory. */
export function isSafeBasename(name: string): boolean {
  return (
    name.length > 0 &&
    name !== '.' &&
    !name.includes('..') &&
    !/[/\\\0]/.test(name) &&
    path.basename(name) === name
  );
}

function isNotFound(err: unknown): boolean {
  // fs errors can come from another realm; match on shape.
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export class DiskArtifactStore extends IndexedArtifactStore {
  readonly kind = 'disk' as const;

  readonly directory: string;
  private ready: Promise<void> | undefined;

  constructor(directory: string, options?: Partial<ArtifactStoreOptions>, log?: Logger) {
    super(options, log);
    this.directory = path.resolve(directory);
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.directory, { recursive: true }).then(() => undefined);
      this.ready.catch(() => {
        // Let the next write retry directory creation.
        this.ready = undefined;
      });
    }
    return this.ready;
  }

  private pathFor(name: string): string {
    if (!isSafeBasename(name)) {
      throw new Error(`Unsafe artifact file name: ${name}`);
    }
    return path.join(this.directory, name);
  }

  private contentPath(summary: ArtifactSummary): string {
    return this.pathFor(`${summary.id}${FILE_EXTENSIONS[summary.documentType]}`);
  }

  protected async writeContent(summary: ArtifactSummary, content: Buffer): Promise<void> {
    await this.ensureDirectory();
    const target = this.contentPath(summary);
    const temp = this.pathFor(`.${summary.id}.tmp`);
    try {
      await writeFile(temp, content);
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw err;
    }
  }

  protected async readContent(summary: ArtifactSummary): Promise<Buffer | null> {
    try {
      return await readFile(this.contentPath(summary));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  protected async removeContent(summary: ArtifactSummary): Promise<void> {
    try {
      await rm(this.contentPath(summary), { force: true });
    } catch (err) {
      this.log.warn('Failed to remove artifact file', { id: summary.id, filename: summary.filename, err });
    }
  }

  protected async closeBackend(): Promise<void> {
    this.clearIndex();
  }
}

export function createDiskStore(
  directory: string,
  options?: Partial<ArtifactStoreOptions>,
  log?: Logger,
): DiskArtifactStore {
  return new DiskArtifactStore(directory, options, log);
}
