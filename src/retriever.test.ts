import { describe, expect, test } from "vitest";
import { HashEmbeddings } from "./testing/fakes";
import { makeSnippet, Retriever, toRecord } from "./retriever";
import type { VectorHit, VectorItem, VectorStore } from "./types";
import { InMemoryVectorStore } from "./vector-store";

const embeddings = new HashEmbeddings();

async function seededStore(texts: string[]): Promise<InMemoryVectorStore> {
  const store = new InMemoryVectorStore({ modelName: embeddings.getModelName() });
  const items: VectorItem[] = texts.map((text, i) => ({
    id: `doc.md_${i}`,
    vector: embeddings.vector(text),
    document: text,
    metadata: { source: "doc.md", chunkId: i, locator: `chunk ${i}`, section: null },
  }));
  await store.upsert(items);
  return store;
}

describe("makeSnippet", () => {
  test("appends the marker only when truncated", () => {
    expect(makeSnippet("short")).toBe("short");
    expect(makeSnippet("x".repeat(200))).toBe("x".repeat(200));
    expect(makeSnippet("x".repeat(201))).toBe(`${"x".repeat(200)}...`);
  });
});

describe("Retriever", () => {
  test("empty index returns no records without embedding the query", async () => {
    const emb = new HashEmbeddings();
    const store = new InMemoryVectorStore({ modelName: "hash-bow" });
    const retriever = new Retriever({ embeddings: emb, store });
    expect(await retriever.retrieve("anything", 5)).toEqual([]);
    expect(emb.calls).toBe(0);
  });

  test("returns the most similar passage first", async () => {
    const store = await seededStore([
      "invoices are approved by finance",
      "the deploy pipeline runs nightly",
      "holiday calendar for the office",
    ]);
    const retriever = new Retriever({ embeddings, store });
    const [top] = await retriever.retrieve("when does the deploy pipeline run", 3);
    expect(top).toEqual({
      text: "the deploy pipeline runs nightly",
      source: "doc.md",
      locator: "chunk 1",
      snippet: "the deploy pipeline runs nightly",
    });
  });

  test("caps top_k at the configured maximum", async () => {
    const store = await seededStore(Array.from({ length: 15 }, (_, i) => `passage number ${i}`));
    expect(await new Retriever({ embeddings, store }).retrieve("passage", 50)).toHaveLength(10);
    expect(
      await new Retriever({ embeddings, store, maxTopK: 3 }).retrieve("passage", 50),
    ).toHaveLength(3);
    expect(await new Retriever({ embeddings, store }).retrieve("passage", 0)).toHaveLength(1);
  });

  test("long passages get a bounded snippet", async () => {
    const long = `budget ${"y".repeat(300)}`;
    const store = await seededStore([long]);
    const [record] = await new Retriever({ embeddings, store }).retrieve("budget", 1);
    expect(record?.text).toBe(long);
    expect(record?.snippet).toBe(`${long.slice(0, 200)}...`);
  });

  test("a failing vector store yields no records", async () => {
    const broken: VectorStore = {
      upsert: async () => undefined,
      query: async () => {
        throw new Error("index unavailable");
      },
      drop: async () => undefined,
      count: () => 1,
      save: async () => undefined,
    };
    const retriever = new Retriever({ embeddings, store: broken });
    expect(await retriever.retrieve("q", 5)).toEqual([]);
  });

  test("a search that outlives the timeout yields no records", async () => {
    const hanging: VectorStore = {
      upsert: async () => undefined,
      query: () => new Promise<VectorHit[]>(() => undefined),
      drop: async () => undefined,
      count: () => 1,
      save: async () => undefined,
    };
    const retriever = new Retriever({ embeddings, store: hanging, timeoutMs: 20 });
    expect(await retriever.retrieve("q", 5)).toEqual([]);
  });
});

test("toRecord fills missing metadata with 'unknown'", () => {
  expect(toRecord({ id: "x", document: "body", metadata: {}, score: 0.5 })).toEqual({
    text: "body",
    source: "unknown",
    locator: "unknown",
    snippet: "body",
  });
});
