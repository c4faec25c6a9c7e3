/**
 * In-memory artifact store.
 *
 * Default backend. Bytes live on the heap and vanish when the process exits
 * or the store is closed; the retention limits cap how much heap it holds.
 */

import { ArtifactSummary } from '../domain/artifact';
import { Logger } from '../logger';
import { IndexedArtifactStore } from './indexed-store';
import { ArtifactStoreOptions } from './store';

export class MemoryArtifactStore extends IndexedArtifactStore {
  readonly kind = 'memory' as const;

  private readonly contents = new Map<string, Buffer>();

  protected async writeContent(summary: ArtifactSummary, content: Buffer): Promise<void> {
    this.contents.set(summary.id, content);
  }

  protected async readContent(summary: ArtifactSummary): Promise<Buffer | null> {
    const content = this.contents.get(summary.id);
    return content ? Buffer.from(content) : null;
  }

  protected async removeContent(summary: ArtifactSummary): Promise<void> {
    this.contents.delete(summary.id);
  }

  protected async closeBackend(): Promise<void> {
    this.contents.clear();
    this.clearIndex();
  }
}

export function createMemoryStore(options?: Partial<ArtifactStoreOptions>, log?: Logger): MemoryArtifactStore {
  return new MemoryArtifactStore(options, log);
}
