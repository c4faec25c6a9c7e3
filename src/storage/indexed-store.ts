/**
 * Shared bookkeeping for artifact stores.
 *
 * Keeps the metadata index, filename reservations, byte accounting,
 * eviction and expiry in one place. Subclasses only decide where the bytes
 * live. Map insertion order doubles as creation order, so eviction walks the
 * index from the front.
 *
 * A filename is issued at most once per store: after its artifact is evicted
 * or expires, the old download URL answers not-found instead of resolving to
 * a newer document with the same title.
 */

import { v4 as uuid } from 'uuid';
import {
  Artifact,
  ArtifactSummary,
  NewArtifact,
  resolveFilename,
  toFilenameStem,
} from '../domain/artifact';
import { CONTENT_TYPES } from '../domain/document';
import {
  RenderServiceError,
  artifactTooLargeError,
  emptyArtifactError,
  storeWriteError,
} from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import {
  ArtifactStore,
  ArtifactStoreKind,
  ArtifactStoreOptions,
  ArtifactStoreStats,
  DEFAULT_STORE_OPTIONS,
} from './store';

export abstract class IndexedArtifactStore implements ArtifactStore {
  abstract readonly kind: ArtifactStoreKind;

  protected readonly options: ArtifactStoreOptions;
  protected readonly log: Logger;

  private readonly index = new Map<string, ArtifactSummary>();
  private readonly idsByFilename = new Map<string, string>();
  /** Every filename ever handed out, published or not. */
  private readonly issuedFilenames = new Set<string>();
  /** Per stem, the lowest suffix that might still be free. */
  private readonly suffixHints = new Map<string, number>();
  private totalBytes = 0;
  private sweepTimer: NodeJS.Timeout | undefined;

  constructor(options: Partial<ArtifactStoreOptions> = {}, log: Logger = rootLogger) {
    this.options = { ...DEFAULT_STORE_OPTIONS, ...options };
    this.log = log.child({ module: 'artifact-store' });

    if (this.options.ttlMs > 0 && this.options.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => {
        this.sweepExpired().catch((err: unknown) => {
          this.log.error('Expiry sweep failed', { err });
        });
      }, this.options.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  /** Persist the bytes of an artifact that is not yet visible. */
  protected abstract writeContent(summary: ArtifactSummary, content: Buffer): Promise<void>;
  /** Read the bytes back; null when they have gone missing. */
  protected abstract readContent(summary: ArtifactSummary): Promise<Buffer | null>;
  protected abstract removeContent(summary: ArtifactSummary): Promise<void>;
  /** Release backend resources on close. */
  protected abstract closeBackend(): Promise<void>;

  async put(input: NewArtifact): Promise<Artifact> {
    const sizeBytes = input.content.length;
    if (sizeBytes === 0) {
      throw new RenderServiceError(emptyArtifactError());
    }
    const limit = Math.min(this.options.maxArtifactBytes, this.options.maxTotalBytes);
    if (sizeBytes > limit) {
      throw new RenderServiceError(artifactTooLargeError(sizeBytes, limit));
    }

    const stem = toFilenameStem(input.suggestedFilename);
    const hintKey = `${input.documentType}:${stem}`;
    const { filename, nextSuffix } = resolveFilename(
      stem,
      input.documentType,
      (candidate) => this.issuedFilenames.has(candidate),
      this.suffixHints.get(hintKey),
    );
    this.issuedFilenames.add(filename);
    this.suffixHints.set(hintKey, nextSuffix);

    const createdAtMs = this.options.now();
    const summary: ArtifactSummary = {
      id: uuid(),
      filename,
      documentType: input.documentType,
      contentType: CONTENT_TYPES[input.documentType],
      sizeBytes,
      createdAt: new Date(createdAtMs).toISOString(),
    };
    if (this.options.ttlMs > 0) {
      summary.expiresAt = new Date(createdAtMs + this.options.ttlMs).toISOString();
    }

    const content = Buffer.from(input.content);
    try {
      await this.writeContent(summary, content);
    } catch (err) {
      throw new RenderServiceError(storeWriteError(err), { cause: err });
    }

    // Publish only after the bytes are fully written.
    this.index.set(summary.id, summary);
    this.idsByFilename.set(filename, summary.id);
    this.totalBytes += sizeBytes;
    this.log.debug('Artifact stored', { id: summary.id, filename, sizeBytes });

    await this.enforceLimits(summary.id);

    return { ...summary, content: Buffer.from(content) };
  }

  async get(id: string): Promise<Artifact | null> {
    const summary = this.index.get(id);
    if (!summary) return null;

    if (this.isExpired(summary)) {
      await this.evict(summary, 'expired');
      return null;
    }

    const content = await this.readContent(summary);
    if (!content) {
      this.log.warn('Artifact content missing, dropping index entry', { id, filename: summary.filename });
      await this.evict(summary, 'missing');
      return null;
    }
    return { ...summary, content };
  }

  async getByFilename(filename: string): Promise<Artifact | null> {
    const id = this.idsByFilename.get(filename);
    return id ? this.get(id) : null;
  }

  async list(): Promise<ArtifactSummary[]> {
    await this.sweepExpired();
    return [...this.index.values()].map((summary) => ({ ...summary }));
  }

  async delete(id: string): Promise<boolean> {
    const summary = this.index.get(id);
    if (!summary) return false;
    await this.evict(summary, 'deleted');
    return true;
  }

  async sweepExpired(): Promise<number> {
    const expired = [...this.index.values()].filter((summary) => this.isExpired(summary));
    for (const summary of expired) {
      await this.evict(summary, 'expired');
    }
    return expired.length;
  }

  stats(): ArtifactStoreStats {
    return { count: this.index.size, totalBytes: this.totalBytes };
  }

  async close(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    await this.closeBackend();
  }

  /** Forget every index entry without touching the bytes. */
  protected clearIndex(): void {
    this.index.clear();
    this.idsByFilename.clear();
    this.totalBytes = 0;
  }

  private isExpired(summary: ArtifactSummary): boolean {
    return summary.expiresAt !== undefined && Date.parse(summary.expiresAt) <= this.options.now();
  }

  /** Evict the oldest artifacts (never `keepId`) until both caps hold. */
  private async enforceLimits(keepId: string): Promise<void> {
    const { maxArtifacts, maxTotalBytes } = this.options;
    while (this.index.size > maxArtifacts || this.totalBytes > maxTotalBytes) {
      const oldest = [...this.index.values()].find((summary) => summary.id !== keepId);
      if (!oldest) break;
      await this.evict(oldest, 'capacity');
    }
  }

  private async evict(summary: ArtifactSummary, reason: string): Promise<void> {
    if (!this.index.delete(summary.id)) return;
    this.idsByFilename.delete(summary.filename);
    this.totalBytes -= summary.sizeBytes;
    this.log.debug('Artifact evicted', { id: summary.id, filename: summary.filename, reason });
    await this.removeContent(summary);
  }
}
