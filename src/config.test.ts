import path from "node:path";
import { describe, expect, test } from "vitest";
import { readConfig } from "./config";

describe("readConfig", () => {
  test("defaults", () => {
    const c = readConfig({});
    expect(c.DOCS_ROOT).toBe(path.resolve("sample_docs"));
    expect(c.ALLOWED_EXT).toEqual(["txt", "md", "pdf"]);
    expect(c.CHUNK_SIZE).toBe(500);
    expect(c.CHUNK_OVERLAP).toBe(50);
    expect(c.RETRIEVAL_TOP_K).toBe(5);
    expect(c.RETRIEVAL_MAX_TOP_K).toBe(10);
    expect(c.RETRIEVAL_TIMEOUT_MS).toBe(15_000);
    expect(c.LLM_TIMEOUT_MS).toBe(30_000);
    expect(c.MEMORY_DIR).toBe(path.resolve("."));
    expect(c.INDEX_STORE_PATH).toBeUndefined();
    expect(c.OPENAI_API_KEY).toBeUndefined();
    expect(c.USE_OLLAMA).toBe(false);
    expect(c.VERBOSE).toBe(false);
    expect(c.MCP_TRANSPORT).toBe("");
    expect(c.MCP_PORT).toBe(3000);
    expect(c.HOST).toBe("127.0.0.1");
    expect(c.ALLOWED_HOSTS).toEqual([]);
    expect(c.DNS_REBINDING_PROTECTION).toBe(true);
    expect(c.MODEL_NAME).toBeUndefined();
    expect(c.TRANSFORMERS_CACHE).toBe(path.resolve(".cache/transformers"));
  });

  test("http transport settings", () => {
    const c = readConfig({
      MCP_PORT: "8080",
      HOST: "0.0.0.0",
      ALLOWED_HOSTS: "docs.internal, docs.internal:8080",
      ENABLE_DNS_REBINDING_PROTECTION: "FALSE",
    });
    expect(c.MCP_PORT).toBe(8080);
    expect(c.HOST).toBe("0.0.0.0");
    expect(c.ALLOWED_HOSTS).toEqual(["docs.internal", "docs.internal:8080"]);
    expect(c.DNS_REBINDING_PROTECTION).toBe(false);
  });

  test("default top_k never exceeds the cap", () => {
    const c = readConfig({ RETRIEVAL_MAX_TOP_K: "3", RETRIEVAL_TOP_K: "8" });
    expect(c.RETRIEVAL_MAX_TOP_K).toBe(3);
    expect(c.RETRIEVAL_TOP_K).toBe(3);
  });

  test("numbers are floored, clamped and fall back when invalid", () => {
    const c = readConfig({
      CHUNK_SIZE: "120.7",
      CHUNK_OVERLAP: "-4",
      RETRIEVAL_MAX_TOP_K: "1000",
      LLM_TIMEOUT_MS: "soon",
    });
    expect(c.CHUNK_SIZE).toBe(120);
    expect(c.CHUNK_OVERLAP).toBe(50);
    expect(c.RETRIEVAL_MAX_TOP_K).toBe(100);
    expect(c.LLM_TIMEOUT_MS).toBe(30_000);
  });

  test("overlap of zero is allowed", () => {
    expect(readConfig({ CHUNK_OVERLAP: "0" }).CHUNK_OVERLAP).toBe(0);
  });

  test("extension list drops dots and case", () => {
    expect(readConfig({ ALLOWED_EXT: " .MD, txt ,," }).ALLOWED_EXT).toEqual(["md", "txt"]);
  });

  test("flags and transport", () => {
    const c = readConfig({ USE_OLLAMA: "Yes", VERBOSE: "true", MCP_TRANSPORT: " HTTP " });
    expect(c.USE_OLLAMA).toBe(true);
    expect(c.VERBOSE).toBe(true);
    expect(c.MCP_TRANSPORT).toBe("http");
  });

  test("blank strings count as unset", () => {
    const c = readConfig({ OPENAI_API_KEY: "  ", MEMORY_DIR: "", OLLAMA_MODEL: " " });
    expect(c.OPENAI_API_KEY).toBeUndefined();
    expect(c.MEMORY_DIR).toBe(path.resolve("."));
    expect(c.OLLAMA_MODEL).toBe("llama3.2");
  });
});
