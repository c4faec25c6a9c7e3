import { ServiceConfig } from '../config';
import { Logger } from '../logger';
import { createDiskStore } from './disk-store';
import { createMemoryStore } from './memory-store';
import { ArtifactStore, ArtifactStoreOptions } from './store';

export * from './store';
export { MemoryArtifactStore, createMemoryStore } from './memory-store';
export { DiskArtifactStore, createDiskStore, isSafeBasename } from './disk-store';

/** Build the backend named by the store configuration. */
export function createArtifactStore(
  config: ServiceConfig['store'],
  overrides: Partial<ArtifactStoreOptions> = {},
  log?: Logger,
): ArtifactStore {
  const options: Partial<ArtifactStoreOptions> = {
    maxArtifactBytes: config.maxArtifactBytes,
    maxArtifacts: config.maxArtifacts,
    maxTotalBytes: config.maxTotalBytes,
    ttlMs: config.ttlMs,
    ...overrides,
  };
  return config.kind === 'disk'
    ? createDiskStore(config.directory, options, log)
    : createMemoryStore(options, log);
}
