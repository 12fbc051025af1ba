import type { IndexSettings, Persistence } from "./persistence";
import type { VectorHit, VectorItem, VectorStore } from "./types";

/** Cosine similarity over the shared prefix of two vectors; 0 when either is all zeros. */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  return normA && normB ? dot / Math.sqrt(normA * normB) : 0;
}

/**
 * `modelName` and the chunk settings are recorded with a saved collection; a
 * file written under different values is not reloaded.
 */
export interface InMemoryVectorStoreOptions extends IndexSettings {
  /** When set, {@link InMemoryVectorStore.save} writes here and `hydrate` reads back. */
  persistence?: Persistence;
}

/**
 * Zero-dependency vector index: every item lives in process and a query is a
 * linear cosine scan. Good enough for a few thousand chunks; swap in an ANN
 * index behind the same {@link VectorStore} contract for larger corpora.
 */
export class InMemoryVectorStore implements VectorStore {
  private readonly items = new Map<string, VectorItem>();
  private readonly settings: IndexSettings;
  private readonly persistence?: Persistence;

  public constructor(opts: InMemoryVectorStoreOptions) {
    this.settings = {
      modelName: opts.modelName,
      chunkSize: opts.chunkSize,
      chunkOverlap: opts.chunkOverlap,
    };
    this.persistence = opts.persistence;
  }

  /** Reload a previously persisted collection. Returns the number of items loaded. */
  public async hydrate(): Promise<number> {
    const loaded = await this.persistence?.load(this.settings);
    if (!loaded) return 0;
    this.items.clear();
    for (const item of loaded) this.items.set(item.id, item);
    return this.items.size;
  }

  public count(): number {
    return this.items.size;
  }

  /** Insert or replace items by id. In memory only until {@link save}. */
  public async upsert(items: VectorItem[]): Promise<void> {
    for (const item of items) this.items.set(item.id, item);
  }

  public async query(vector: Float32Array, k: number): Promise<VectorHit[]> {
    if (k <= 0 || this.items.size === 0) return [];
    const scored: VectorHit[] = [];
    for (const item of this.items.values()) {
      scored.push({
        id: item.id,
        document: item.document,
        metadata: item.metadata,
        score: cosineSimilarity(item.vector, vector),
      });
    }
    scored.sort((a, b) => b.score - a.score); // descending score
    return scored.slice(0, k);
  }

  /** Remove every item (the whole collection). The saved file is left alone. */
  public async drop(): Promise<void> {
    this.items.clear();
  }

  /** Write the whole collection in one go; a no-op without persistence. */
  public async save(): Promise<void> {
    await this.persistence?.save([...this.items.values()], this.settings);
  }
}
