import { describe, expect, test } from "vitest";
import { AnswerService, buildPrompt, NO_RELEVANT_INFORMATION } from "./answer";
import { Retriever } from "./retriever";
import { HashEmbeddings, ScriptedLlm } from "./testing/fakes";
import type { LlmClient } from "./types";
import { InMemoryVectorStore } from "./vector-store";

const embeddings = new HashEmbeddings();

async function retrieverWith(passages: Array<[source: string, locator: string, text: string]>) {
  const store = new InMemoryVectorStore({ modelName: embeddings.getModelName() });
  await store.upsert(
    passages.map(([source, locator, text], i) => ({
      id: `${source}_${i}`,
      vector: embeddings.vector(text),
      document: text,
      metadata: { source, chunkId: i, locator, section: null },
    })),
  );
  return new Retriever({ embeddings, store });
}

const PASSAGES: Array<[string, string, string]> = [
  ["policy.md", "# Leave (chunk 0)", "Annual leave requests go to the team lead two weeks ahead."],
  ["policy.md", "# Leave (chunk 0)", "Annual leave requests go to the team lead two weeks ahead."],
  ["faq.txt", "chunk 2", "Sick leave needs no advance request."],
];

describe("AnswerService", () => {
  test("empty index short-circuits to the advisory without calling the model", async () => {
    const llm = new ScriptedLlm();
    const service = new AnswerService({ retriever: await retrieverWith([]), llm });
    expect(await service.answer("who approves leave?")).toEqual({
      answer: NO_RELEVANT_INFORMATION,
      citations: [],
    });
    expect(llm.prompts).toEqual([]);
  });

  test("successful generation returns the trimmed answer and deduplicated citations", async () => {
    const llm = new ScriptedLlm({
      kind: "ok",
      text: "  The team lead. [Source: policy.md, Locator: # Leave (chunk 0)]\n",
    });
    const service = new AnswerService({ retriever: await retrieverWith(PASSAGES), llm });
    const result = await service.answer("who approves annual leave requests?", 3);

    expect(result.answer).toBe("The team lead. [Source: policy.md, Locator: # Leave (chunk 0)]");
    expect(result.citations).toEqual([
      {
        source: "policy.md",
        locator: "# Leave (chunk 0)",
        snippet: "Annual leave requests go to the team lead two weeks ahead.",
      },
      { source: "faq.txt", locator: "chunk 2", snippet: "Sick leave needs no advance request." },
    ]);
    expect(llm.prompts[0]).toContain(
      "[1] (Source: policy.md, Locator: # Leave (chunk 0))\nAnnual leave requests go to the team lead two weeks ahead.",
    );
    expect(llm.prompts[0]).toContain("Question: who approves annual leave requests?");
  });

  test("unavailable model falls back to the top snippet and keeps citations", async () => {
    const llm = new ScriptedLlm({ kind: "unavailable", reason: "No LLM configured." });
    const service = new AnswerService({ retriever: await retrieverWith(PASSAGES.slice(2)), llm });
    expect(await service.answer("sick leave")).toEqual({
      answer: "No LLM configured. Top result: Sick leave needs no advance request.",
      citations: [
        { source: "faq.txt", locator: "chunk 2", snippet: "Sick leave needs no advance request." },
      ],
    });
  });

  test("quota failure returns an advisory and keeps citations", async () => {
    const llm = new ScriptedLlm({ kind: "transient", message: "429 insufficient_quota" });
    const service = new AnswerService({ retriever: await retrieverWith(PASSAGES.slice(2)), llm });
    const result = await service.answer("sick leave");
    expect(result.answer).toBe(
      "Relevant passages retrieved (LLM unavailable - rate limit or quota exceeded). " +
        "Please try again later. Top result: Sick leave needs no advance request.",
    );
    expect(result.citations).toHaveLength(1);
  });

  test("other provider errors are reported with the citations intact", async () => {
    const llm = new ScriptedLlm({ kind: "failed", message: "500 Internal Server Error: boom" });
    const service = new AnswerService({ retriever: await retrieverWith(PASSAGES.slice(2)), llm });
    const result = await service.answer("sick leave");
    expect(result.answer).toBe("LLM error: 500 Internal Server Error: boom");
    expect(result.citations).toHaveLength(1);
  });

  test("a client that rejects is reported as an LLM error", async () => {
    const llm: LlmClient = {
      complete: async () => {
        throw new Error("boom");
      },
    };
    const service = new AnswerService({ retriever: await retrieverWith(PASSAGES.slice(2)), llm });
    const result = await service.answer("sick leave");
    expect(result.answer).toBe("LLM error: boom");
    expect(result.citations).toEqual([
      { source: "faq.txt", locator: "chunk 2", snippet: "Sick leave needs no advance request." },
    ]);
  });

  test("remembered facts are added to the prompt", async () => {
    const llm = new ScriptedLlm({ kind: "ok", text: "ok" });
    const service = new AnswerService({
      retriever: await retrieverWith(PASSAGES.slice(2)),
      llm,
      memory: { loadContext: async () => "# USER MEMORY\n- Prefers short answers" },
    });
    await service.answer("sick leave");
    expect(llm.prompts[0]).toContain(
      "Known facts about the user and organization:\n# USER MEMORY\n- Prefers short answers",
    );
  });
});

test("buildPrompt keeps dollar signs in user text literal", () => {
  const prompt = buildPrompt("cost of $& plan?", "ctx $1");
  expect(prompt).toContain("Question: cost of $& plan?");
  expect(prompt).toContain("Context (retrieved passages):\nctx $1");
  expect(prompt).not.toContain("Known facts");
});
