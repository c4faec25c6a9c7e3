/**
 * Storage layer interfaces.
 *
 * The artifact store is constructed once at startup and handed to the tool
 * handler and the download routes. Two backends share one contract: an
 * in-memory map and a scoped directory on local disk.
 */

import { Artifact, ArtifactSummary, NewArtifact } from '../domain/artifact';

export type ArtifactStoreKind = 'memory' | 'disk';

/** Retention limits. Every limit is explicit; nothing is unbounded by default. */
export interface ArtifactStoreOptions {
  /** Largest single artifact accepted, in bytes. */
  maxArtifactBytes: number;
  /** Most artifacts retained at once; the oldest are evicted first. */
  maxArtifacts: number;
  /** Most bytes retained at once; the oldest are evicted first. */
  maxTotalBytes: number;
  /** How long an artifact stays retrievable. 0 disables expiry. */
  ttlMs: number;
  /** Interval of the background expiry sweep. 0 disables the timer. */
  sweepIntervalMs: number;
  /** Clock, overridable in tests. */
  now: () => number;
}

export const DEFAULT_STORE_OPTIONS: ArtifactStoreOptions = {
  maxArtifactBytes: 25 * 1024 * 1024,
  maxArtifacts: 500,
  maxTotalBytes: 256 * 1024 * 1024,
  ttlMs: 60 * 60 * 1000,
  sweepIntervalMs: 60_000,
  now: () => Date.now(),
};

export interface ArtifactStoreStats {
  count: number;
  totalBytes: number;
}

/** Store interface for generated documents. */
export interface ArtifactStore {
  readonly kind: ArtifactStoreKind;
  /**
   * Retain a new artifact under a fresh id and a unique filename.
   * The artifact becomes visible to readers only once fully written.
   */
  put(input: NewArtifact): Promise<Artifact>;
  /** Exact id lookup. */
  get(id: string): Promise<Artifact | null>;
  /** Exact filename lookup. */
  getByFilename(filename: string): Promise<Artifact | null>;
  /** Live artifacts, oldest first. */
  list(): Promise<ArtifactSummary[]>;
  delete(id: string): Promise<boolean>;
  /** Remove expired artifacts; resolves to how many were removed. */
  sweepExpired(): Promise<number>;
  stats(): ArtifactStoreStats;
  /** Stop background work and release held resources. */
  close(): Promise<void>;
}
