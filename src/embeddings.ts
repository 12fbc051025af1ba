import fs from "node:fs/promises";
import { env, pipeline, type FeatureExtractionPipeline } from "@xenova/transformers";
import type { EmbeddingProvider } from "./types";

export const DEFAULT_EMBEDDING_MODEL = "Xenova/all-MiniLM-L6-v2";

export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

export interface EmbeddingsOptions {
  modelName?: string;
  /** Model download cache. Must be set before the first pipeline loads. */
  cacheDir: string;
}

/** Sentence embeddings from a local transformers.js feature-extraction pipeline. */
export class Embeddings implements EmbeddingProvider {
  private readonly modelName: string;
  private readonly cacheDir: string;
  private embedder: FeatureExtractionPipeline | null = null;

  public constructor(opts: EmbeddingsOptions) {
    this.modelName = opts.modelName?.trim() || DEFAULT_EMBEDDING_MODEL;
    this.cacheDir = opts.cacheDir;
  }

  public getModelName(): string {
    return this.modelName;
  }

  /** Load the pipeline once; later calls are no-ops. */
  public async init(): Promise<void> {
    if (this.embedder) return;
    await fs.mkdir(this.cacheDir, { recursive: true });
    env.useBrowserCache = false;
    env.allowLocalModels = true;
    env.cacheDir = this.cacheDir;
    console.error(`[RAG] Model cache: ${this.cacheDir}`);
    console.error(`[RAG] Loading embedding model ${this.modelName} ...`);
    this.embedder = await pipeline("feature-extraction", this.modelName);
    console.error(`[RAG] Embedding model ready`);
  }

  /**
   * Mean-pooled, L2-normalized vectors in input order.
   * @throws {EmbedderNotInitializedError} before {@link init}.
   */
  public async embed(texts: string[]): Promise<Float32Array[]> {
    const embedder = this.embedder;
    if (!embedder) throw new EmbedderNotInitializedError();
    const vectors: Float32Array[] = [];
    for (const text of texts) {
      const output = await embedder(text, { pooling: "mean", normalize: true });
      // copy: the tensor's buffer is reused by the next call
      vectors.push(Float32Array.from(output.data as Float32Array));
    }
    return vectors;
  }
}
