import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export { APP_VERSION } from "./version";

export interface Config {
  /** Folder of documents to index. */
  DOCS_ROOT: string;
  ALLOWED_EXT: string[];
  VERBOSE: boolean;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  /** Default number of passages retrieved per question. */
  RETRIEVAL_TOP_K: number;
  /** Upper bound applied to every caller-requested top_k. */
  RETRIEVAL_MAX_TOP_K: number;
  RETRIEVAL_TIMEOUT_MS: number;
  INDEX_STORE_PATH: string | undefined;
  /** Folder holding USER_MEMORY.md and COMPANY_MEMORY.md. */
  MEMORY_DIR: string;
  OPENAI_API_KEY: string | undefined;
  LLM_MODEL: string | undefined;
  USE_OLLAMA: boolean;
  OLLAMA_BASE_URL: string;
  OLLAMA_MODEL: string;
  LLM_TIMEOUT_MS: number;
  MCP_TRANSPORT: string;
  MCP_PORT: number;
  HOST: string;
  /** Host headers accepted by the HTTP transport; empty means local-only defaults. */
  ALLOWED_HOSTS: string[];
  DNS_REBINDING_PROTECTION: boolean;
  /** Embedding model id; the embedder's default when unset. */
  MODEL_NAME: string | undefined;
  TRANSFORMERS_CACHE: string;
}

type Env = Record<string, string | undefined>;

/** Tolerant truthy parsing (supports several common forms). */
function flag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Parse a positive integer, clamped to `max`; falls back on anything unparsable. */
function intInRange(raw: string | undefined, fallback: number, min: number, max: number): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

function list(raw: string | undefined, fallback: string[]): string[] {
  const items = raw
    ?.split(",")
    .map((s) => s.trim().replace(/^\./, "").toLowerCase())
    .filter(Boolean);
  return items?.length ? items : fallback;
}

/**
 * Build a {@link Config} from an environment map. Pure: no dotenv, no
 * filesystem access, so it can be exercised directly.
 */
export function readConfig(env: Env): Config {
  // Chunk sizing: characters per chunk / words of overlap (defaults 500 / 50).
  const CHUNK_SIZE = intInRange(env.CHUNK_SIZE, 500, 1, 8000);
  const CHUNK_OVERLAP = intInRange(env.CHUNK_OVERLAP, 50, 0, 4000);

  // The cap bounds prompt size regardless of what a caller asks for.
  const RETRIEVAL_MAX_TOP_K = intInRange(env.RETRIEVAL_MAX_TOP_K, 10, 1, 100);
  const RETRIEVAL_TOP_K = Math.min(
    RETRIEVAL_MAX_TOP_K,
    intInRange(env.RETRIEVAL_TOP_K, 5, 1, 100),
  );

  return {
    DOCS_ROOT: path.resolve(env.DOCS_ROOT?.trim() || "sample_docs"),
    ALLOWED_EXT: list(env.ALLOWED_EXT, ["txt", "md", "pdf"]),
    VERBOSE: flag(env.VERBOSE),
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    RETRIEVAL_TOP_K,
    RETRIEVAL_MAX_TOP_K,
    RETRIEVAL_TIMEOUT_MS: intInRange(env.RETRIEVAL_TIMEOUT_MS, 15_000, 1, 600_000),
    INDEX_STORE_PATH: env.INDEX_STORE_PATH?.trim() || undefined,
    MEMORY_DIR: path.resolve(env.MEMORY_DIR?.trim() || "."),
    OPENAI_API_KEY: env.OPENAI_API_KEY?.trim() || undefined,
    LLM_MODEL: env.LLM_MODEL?.trim() || undefined,
    USE_OLLAMA: flag(env.USE_OLLAMA),
    OLLAMA_BASE_URL: env.OLLAMA_BASE_URL?.trim() || "http://localhost:11434/v1",
    OLLAMA_MODEL: env.OLLAMA_MODEL?.trim() || "llama3.2",
    LLM_TIMEOUT_MS: intInRange(env.LLM_TIMEOUT_MS, 30_000, 1, 600_000),
    // 'stdio' (default) or 'http'/'streamable-http'.
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
    MCP_PORT: intInRange(env.MCP_PORT, 3000, 1, 65_535),
    HOST: env.HOST?.trim() || "127.0.0.1",
    ALLOWED_HOSTS: (env.ALLOWED_HOSTS ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    DNS_REBINDING_PROTECTION: (env.ENABLE_DNS_REBINDING_PROTECTION ?? "").trim().toLowerCase() !== "false",
    MODEL_NAME: env.MODEL_NAME?.trim() || undefined,
    TRANSFORMERS_CACHE: path.resolve(env.TRANSFORMERS_CACHE?.trim() || ".cache/transformers"),
  };
}

// Single dotenv.config() call. Prefer the project-root .env (one level above src/),
// otherwise fall back to dotenv's default lookup in cwd.
function loadEnvFile(): void {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const rootEnv = path.resolve(here, "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
}

export function getConfig(): Config {
  loadEnvFile();
  return readConfig(process.env);
}
