/**
 * Shared chunk / retrieval / memory types used throughout the ingestion,
 * retrieval and memory layers, plus the contracts of the external
 * collaborators (embedding model, vector index, LLM).
 */

/** Raw fields yielded by the chunker for one emitted segment. */
export interface ChunkFields {
  /** Space-joined words of the segment, in original order. */
  readonly text: string;
  /** Emission index within the source (0-based, dense). */
  readonly index: number;
  /** Most recent heading label seen before (or at) this segment. */
  readonly section: string | null;
}

/** A contiguous span of one source document prepared for embedding. */
export interface Chunk {
  readonly text: string;
  /** Document identifier: path relative to the docs root. */
  readonly source: string;
  readonly chunkId: number;
  readonly section: string | null;
  /** Display pointer combining section and chunk id. */
  readonly locator: string;
}

/** A ranked search hit normalized for prompting and citation. */
export interface RetrievedRecord {
  readonly text: string;
  readonly source: string;
  readonly locator: string;
  /** Bounded prefix of `text`, with "..." appended only when truncated. */
  readonly snippet: string;
}

/** Deduplicated (source, locator, snippet) triple surfaced with an answer. */
export interface Citation {
  readonly source: string;
  readonly locator: string;
  readonly snippet: string;
}

export const MEMORY_TARGETS = ["USER", "COMPANY"] as const;
export type MemoryTarget = (typeof MEMORY_TARGETS)[number];

/** A candidate fact produced by extraction. Confidence is never persisted. */
export interface MemoryFact {
  readonly target: MemoryTarget;
  readonly summary: string;
  readonly confidence: number;
}

/** A fact that was actually appended to a store. */
export type MemoryWrite = Omit<MemoryFact, "confidence">;

// -------------------- External collaborators --------------------

/** Metadata stored alongside every indexed chunk. */
export interface ChunkMetadata {
  source: string;
  chunkId: number;
  locator: string;
  section: string | null;
}

export interface VectorItem {
  id: string;
  vector: Float32Array;
  document: string;
  metadata: ChunkMetadata;
}

export interface VectorHit {
  id: string;
  document: string;
  /** Partial because persisted or third-party indexes may omit fields. */
  metadata: Partial<ChunkMetadata>;
  score: number;
}

/** Opaque nearest-neighbour index. */
export interface VectorStore {
  upsert(items: VectorItem[]): Promise<void>;
  /** Ranked hits, most similar first. Empty when nothing is indexed. */
  query(vector: Float32Array, k: number): Promise<VectorHit[]>;
  drop(): Promise<void>;
  count(): number;
  /** Make the current collection durable. Called once per completed build. */
  save(): Promise<void>;
}

/** Deterministic text embedding capability. */
export interface EmbeddingProvider {
  getModelName(): string;
  embed(texts: string[]): Promise<Float32Array[]>;
}

/**
 * Outcome of one completion call. Callers branch on `kind` to pick a
 * fallback instead of catching raw errors.
 */
export type CompletionResult =
  | { kind: "ok"; text: string }
  /** No credentials / endpoint configured, or the call timed out. */
  | { kind: "unavailable"; reason: string }
  /** Rate limit or quota signalled by the provider. */
  | { kind: "transient"; message: string }
  | { kind: "failed"; message: string };

/**
 * Implementations report every outcome as a {@link CompletionResult} and
 * should not reject; callers still go through `completeSafely` so a client
 * that does is treated as a failed call.
 */
export interface LlmClient {
  complete(prompt: string): Promise<CompletionResult>;
}
