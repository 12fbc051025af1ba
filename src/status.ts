import { APP_VERSION } from "./version";

/** Counters for the current (or last) index build. */
export interface IndexingStatus {
  /** Supported documents found under the docs root. */
  documentsDiscovered: number;
  /** Documents that failed to parse and were left out. */
  documentsSkipped: number;
  chunksTotal: number;
  /** Chunks embedded and upserted so far. */
  chunksEmbedded: number;
}

/**
 * What /health reports. `ready` is false until the first index build (or
 * restore) finishes, and again while a reindex runs.
 */
export interface ServerStatus {
  version: string;
  docsRoot: string;
  /** Empty until the embedder is configured. */
  modelName: string;
  transport: "stdio" | "http" | "unknown";
  ready: boolean;
  startedAt: string;
  indexing: IndexingStatus;
  /** Facts appended to the memory documents since start. */
  memoryWrites: number;
}

const idle = (): IndexingStatus => ({
  documentsDiscovered: 0,
  documentsSkipped: 0,
  chunksTotal: 0,
  chunksEmbedded: 0,
});

export class StatusManager {
  private readonly state: ServerStatus;

  public constructor(version: string = APP_VERSION) {
    this.state = {
      version,
      docsRoot: "",
      modelName: "",
      transport: "unknown",
      ready: false,
      startedAt: new Date().toISOString(),
      indexing: idle(),
      memoryWrites: 0,
    };
  }

  public markTransport(transport: "stdio" | "http") {
    this.state.transport = transport;
  }

  public setDocsRoot(root: string) {
    this.state.docsRoot = root;
  }

  public setModelName(name: string) {
    this.state.modelName = name;
  }

  /** Start a build over `documents` files: counters reset, not ready. */
  public beginIndexing(documents: number) {
    this.state.ready = false;
    this.state.indexing = { ...idle(), documentsDiscovered: documents };
  }

  public incSkipped(count = 1) {
    this.state.indexing.documentsSkipped += count;
  }

  public setChunksTotal(chunks: number) {
    this.state.indexing.chunksTotal = chunks;
  }

  public incEmbedded(count = 1) {
    this.state.indexing.chunksEmbedded += count;
  }

  public incMemoryWrites(count = 1) {
    this.state.memoryWrites += count;
  }

  public markReady() {
    this.state.ready = true;
  }

  /** Point-in-time copy, safe to serialize or hold on to. */
  public getStatus(): ServerStatus {
    return { ...this.state, indexing: { ...this.state.indexing } };
  }
}

// Process-wide instance; tests construct their own.
export const statusManager = new StatusManager();
