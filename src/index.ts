/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (.env in the project root or cwd).
 * 2. Load the embedding model (downloads into TRANSFORMERS_CACHE on first run).
 * 3. Create the memory documents (USER_MEMORY.md, COMPANY_MEMORY.md) if missing.
 * 4. Reload a persisted index (INDEX_STORE_PATH) or build one from DOCS_ROOT.
 * 5. Start a Model Context Protocol server over STDIO (default) or streamable
 *    HTTP (MCP_TRANSPORT=http|streamable-http, which also serves /health).
 *
 * Exposed tools: ask, search, remember, read_memory, index_documents (see ./server).
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - DOCS_ROOT             Folder of .txt / .md / .pdf documents (default ./sample_docs).
 *  - ALLOWED_EXT           Comma list of extensions to index (default txt,md,pdf).
 *  - CHUNK_SIZE            Target characters per chunk (default 500).
 *  - CHUNK_OVERLAP         Words carried between consecutive chunks (default 50).
 *  - RETRIEVAL_TOP_K       Default passages per question (default 5).
 *  - RETRIEVAL_MAX_TOP_K   Cap on any requested top_k (default 10).
 *  - RETRIEVAL_TIMEOUT_MS  Budget for query embedding + search (default 15000).
 *  - INDEX_STORE_PATH      JSON file to persist / reload the vector index.
 *  - MEMORY_DIR            Folder of the memory documents (default cwd).
 *  - OPENAI_API_KEY        Enables OpenAI chat completions (LLM_MODEL, default gpt-4o-mini).
 *  - USE_OLLAMA            '1' to use a local Ollama (OLLAMA_BASE_URL, OLLAMA_MODEL).
 *  - LLM_TIMEOUT_MS        Completion timeout (default 30000).
 *  - MODEL_NAME            Embedding model (default Xenova/all-MiniLM-L6-v2).
 *  - VERBOSE               '1'/'true' for extra logging.
 *  - MCP_TRANSPORT         'stdio' (default) or 'http'/'streamable-http'.
 *  - MCP_PORT, HOST        HTTP listener (default 3000 on 127.0.0.1).
 *  - ALLOWED_HOSTS         Comma list of accepted Host headers (default: loopback + HOST).
 *  - ENABLE_DNS_REBINDING_PROTECTION  'false' turns the Host check off.
 *  - TRANSFORMERS_CACHE    Directory for model downloads (default ./.cache/transformers).
 */
import path from "node:path";
import { AnswerService } from "./answer";
import { getConfig } from "./config";
import { FileDocumentParser } from "./document-parser";
import { Embeddings } from "./embeddings";
import { Indexer } from "./indexer";
import { createLlmClient } from "./llm";
import { MemoryService, MemoryStore } from "./memory";
import { PdfExtractor } from "./pdf-extractor";
import { Persistence } from "./persistence";
import { Retriever } from "./retriever";
import { createServer, type ToolDeps } from "./server";
import { statusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";
import { InMemoryVectorStore } from "./vector-store";

const config = getConfig();
const { DOCS_ROOT, VERBOSE, INDEX_STORE_PATH, MCP_TRANSPORT } = config;

statusManager.setDocsRoot(DOCS_ROOT);

const embeddings = new Embeddings({
  modelName: config.MODEL_NAME,
  cacheDir: config.TRANSFORMERS_CACHE,
});
await embeddings.init();
statusManager.setModelName(embeddings.getModelName());

const store = new InMemoryVectorStore({
  modelName: embeddings.getModelName(),
  chunkSize: config.CHUNK_SIZE,
  chunkOverlap: config.CHUNK_OVERLAP,
  persistence: new Persistence(INDEX_STORE_PATH, VERBOSE),
});

const indexer = new Indexer({
  root: DOCS_ROOT,
  allowedExt: config.ALLOWED_EXT,
  parser: new FileDocumentParser(
    new PdfExtractor({
      root: DOCS_ROOT,
      cacheDir: INDEX_STORE_PATH ? path.dirname(INDEX_STORE_PATH) : undefined,
      verbose: VERBOSE,
    }),
  ),
  embeddings,
  store,
  chunkSize: config.CHUNK_SIZE,
  chunkOverlap: config.CHUNK_OVERLAP,
  verbose: VERBOSE,
});

const retriever = new Retriever({
  embeddings,
  store,
  maxTopK: config.RETRIEVAL_MAX_TOP_K,
  timeoutMs: config.RETRIEVAL_TIMEOUT_MS,
  verbose: VERBOSE,
});

const llm = createLlmClient(config);
const memory = new MemoryService({
  llm,
  stores: MemoryStore.inDirectory(config.MEMORY_DIR),
  verbose: VERBOSE,
});
await memory.initialize();

const deps: ToolDeps = {
  answers: new AnswerService({ retriever, llm, defaultTopK: config.RETRIEVAL_TOP_K, memory }),
  retriever,
  memory,
  indexer,
  defaultTopK: config.RETRIEVAL_TOP_K,
  maxTopK: config.RETRIEVAL_MAX_TOP_K,
  docsLabel: path.basename(DOCS_ROOT),
};

// Reuse a persisted index when one exists; otherwise build before accepting calls.
const restored = await store.hydrate();
if (restored > 0) {
  statusManager.beginIndexing(0);
  statusManager.setChunksTotal(restored);
  statusManager.incEmbedded(restored);
  statusManager.markReady();
} else {
  await indexer.reindex();
}

const useHttp = MCP_TRANSPORT === "http" || MCP_TRANSPORT === "streamable-http";
if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(() => createServer(deps), config);
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(createServer(deps));
}
