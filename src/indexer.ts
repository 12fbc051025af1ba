import path from "node:path";
import fg from "fast-glob";
import { buildChunks } from "./chunker";
import type { DocumentParser } from "./document-parser";
import { statusManager as defaultStatus, type StatusManager } from "./status";
import type { Chunk, EmbeddingProvider, VectorItem, VectorStore } from "./types";

/**
 * Options required to construct an {@link Indexer}. `verbose` enables
 * per-document progress logging; `status` defaults to the process singleton.
 */
export interface IndexerOptions {
  root: string; // folder of documents
  allowedExt: string[]; // file extensions WITHOUT leading dot
  parser: DocumentParser;
  embeddings: EmbeddingProvider;
  store: VectorStore;
  chunkSize: number;
  chunkOverlap: number; // words carried between chunks
  verbose?: boolean;
  batchSize?: number; // chunks embedded per embed() call (default 32)
  status?: StatusManager;
}

export interface SkippedDocument {
  path: string;
  reason: string;
}

export interface IngestResult {
  chunks: Chunk[];
  documents: number;
  skipped: SkippedDocument[];
}

export interface IndexSummary {
  documents: number;
  chunks: number;
  skipped: SkippedDocument[];
}

/** Vector store id for a chunk: unique per (source, chunkId). */
export function chunkVectorId(chunk: Pick<Chunk, "source" | "chunkId">): string {
  return `${chunk.source}_${chunk.chunkId}`;
}

/**
 * Orchestrates document discovery, parsing, chunking and embedding into the
 * vector store. Chunks are not retained once upserted; the store owns them.
 */
export class Indexer {
  private readonly root: string;
  private readonly allowedExt: string[];
  private readonly parser: DocumentParser;
  private readonly embeddings: EmbeddingProvider;
  private readonly store: VectorStore;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly verbose: boolean;
  private readonly batchSize: number;
  private readonly status: StatusManager;

  public constructor(opts: IndexerOptions) {
    this.root = path.resolve(opts.root);
    this.allowedExt = opts.allowedExt;
    this.parser = opts.parser;
    this.embeddings = opts.embeddings;
    this.store = opts.store;
    this.chunkSize = opts.chunkSize;
    this.chunkOverlap = opts.chunkOverlap;
    this.verbose = !!opts.verbose;
    this.batchSize = Math.max(1, opts.batchSize ?? 32);
    this.status = opts.status ?? defaultStatus;
    if (this.chunkOverlap >= this.chunkSize) {
      console.error(
        `[INDEX] chunkOverlap (=${this.chunkOverlap}) >= chunkSize (=${this.chunkSize}); consecutive chunks will be near-duplicates.`,
      );
    }
  }

  /** Source identifier for a document: its path relative to the docs root, forward slashes. */
  public sourceName(absPath: string): string {
    return path.relative(this.root, absPath).split(path.sep).join("/");
  }

  /** Supported files under the docs root, sorted for a stable chunk/id order. */
  public async discoverFiles(): Promise<string[]> {
    if (!this.allowedExt.length) return [];
    const patterns = this.allowedExt.map((ext) => `**/*.${ext}`);
    const files = await fg(patterns, {
      cwd: this.root,
      absolute: true,
      onlyFiles: true,
      caseSensitiveMatch: false,
    });
    return files.sort();
  }

  /**
   * Parse and chunk one document.
   * @throws {UnsupportedDocumentError} (from the parser) for unrecognized types.
   */
  public async ingestDocument(absPath: string): Promise<Chunk[]> {
    const text = await this.parser.parse(absPath);
    return buildChunks(this.sourceName(absPath), text, {
      chunkSize: this.chunkSize,
      overlap: this.chunkOverlap,
    });
  }

  /**
   * Ingest every discovered document. A document that fails to parse is
   * logged and skipped; the rest of the batch continues.
   */
  public async ingestDirectory(files?: string[]): Promise<IngestResult> {
    const paths = files ?? (await this.discoverFiles());
    const chunks: Chunk[] = [];
    const skipped: SkippedDocument[] = [];
    for (const abs of paths) {
      try {
        const docChunks = await this.ingestDocument(abs);
        chunks.push(...docChunks);
        if (this.verbose) {
          console.error(`[INDEX][verbose] ${this.sourceName(abs)}: ${docChunks.length} chunks`);
        }
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        console.error(`[INDEX] Skipping ${this.sourceName(abs)}: ${reason}`);
        skipped.push({ path: this.sourceName(abs), reason });
        this.status.incSkipped();
      }
    }
    return { chunks, documents: paths.length, skipped };
  }

  /** Embed chunks in batches and upsert them. Returns the number indexed. */
  public async indexChunks(chunks: readonly Chunk[]): Promise<number> {
    for (let i = 0; i < chunks.length; i += this.batchSize) {
      const batch = chunks.slice(i, i + this.batchSize);
      const vectors = await this.embeddings.embed(batch.map((c) => c.text));
      if (vectors.length !== batch.length) {
        throw new Error(`Embedding count mismatch: got ${vectors.length}, expected ${batch.length}`);
      }
      const items: VectorItem[] = batch.map((c, j) => ({
        id: chunkVectorId(c),
        vector: vectors[j],
        document: c.text,
        metadata: { source: c.source, chunkId: c.chunkId, locator: c.locator, section: c.section },
      }));
      await this.store.upsert(items);
      this.status.incEmbedded(items.length);
      if (this.verbose) console.error(`[INDEX][verbose] Embedded ${i + batch.length}/${chunks.length}`);
    }
    return chunks.length;
  }

  /**
   * Drop the collection, then ingest and index the whole docs root. The store
   * is saved only once every chunk is in; a failed build leaves the previous
   * file (if any) untouched.
   */
  public async reindex(): Promise<IndexSummary> {
    const files = await this.discoverFiles();
    console.error(`[INDEX] Indexing ${files.length} documents from ${this.root} ...`);
    this.status.beginIndexing(files.length);
    const ingest = await this.ingestDirectory(files);
    this.status.setChunksTotal(ingest.chunks.length);
    await this.store.drop();
    let n: number;
    try {
      n = await this.indexChunks(ingest.chunks);
    } catch (e) {
      console.error(`[INDEX] Indexing failed; nothing was saved:`, e);
      throw e;
    }
    await this.store.save();
    this.status.markReady();
    console.error(
      `[INDEX] Indexed ${n} chunks from ${files.length - ingest.skipped.length} documents (${ingest.skipped.length} skipped).`,
    );
    return { documents: files.length, chunks: n, skipped: ingest.skipped };
  }
}
