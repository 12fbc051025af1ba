import { withTimeout } from "./timeout";
import type { EmbeddingProvider, RetrievedRecord, VectorHit, VectorStore } from "./types";

export const SNIPPET_LENGTH = 200;
export const DEFAULT_MAX_TOP_K = 10;

/** First `max` characters of `text`, with "..." appended only when something was cut. */
export function makeSnippet(text: string, max = SNIPPET_LENGTH): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export interface RetrieverOptions {
  embeddings: EmbeddingProvider;
  store: VectorStore;
  /** Upper bound applied to every requested top_k (default 10). */
  maxTopK?: number;
  /** Budget for embedding + search together; expiry yields no records. */
  timeoutMs?: number;
  verbose?: boolean;
}

/** Normalize one raw hit; metadata a store failed to carry becomes "unknown". */
export function toRecord(hit: VectorHit): RetrievedRecord {
  const text = hit.document;
  return {
    text,
    source: hit.metadata.source ?? "unknown",
    locator: hit.metadata.locator ?? "unknown",
    snippet: makeSnippet(text),
  };
}

/**
 * Query-side half of the pipeline: embeds the question, searches the vector
 * store and turns hits into citation-bearing records, most relevant first.
 *
 * An empty index, zero hits, or a failing/slow collaborator all produce `[]`,
 * which callers treat as "no grounding available".
 */
export class Retriever {
  private readonly embeddings: EmbeddingProvider;
  private readonly store: VectorStore;
  private readonly maxTopK: number;
  private readonly timeoutMs: number;
  private readonly verbose: boolean;

  public constructor(opts: RetrieverOptions) {
    this.embeddings = opts.embeddings;
    this.store = opts.store;
    this.maxTopK = Math.max(1, opts.maxTopK ?? DEFAULT_MAX_TOP_K);
    this.timeoutMs = opts.timeoutMs ?? 15_000;
    this.verbose = !!opts.verbose;
  }

  /** Requested top_k clamped to [1, maxTopK]. */
  public effectiveTopK(topK: number): number {
    if (!Number.isFinite(topK)) return this.maxTopK;
    return Math.max(1, Math.min(this.maxTopK, Math.floor(topK)));
  }

  public async retrieve(query: string, topK: number): Promise<RetrievedRecord[]> {
    if (this.store.count() === 0) return [];
    const k = this.effectiveTopK(topK);
    try {
      const hits = await withTimeout(this.search(query, k), this.timeoutMs, "Retrieval");
      if (this.verbose) console.error(`[RAG][verbose] ${hits.length} hits for top_k=${k}`);
      return hits.map(toRecord);
    } catch (e) {
      console.error(`[RAG] Retrieval failed; answering without grounding:`, e);
      return [];
    }
  }

  private async search(query: string, k: number): Promise<VectorHit[]> {
    const [vector] = await this.embeddings.embed([query]);
    if (!vector) return [];
    return this.store.query(vector, k);
  }
}
