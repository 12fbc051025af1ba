import { describe, expect, test, vi } from "vitest";
import { readConfig } from "./config";
import { ChatCompletionsClient, createLlmClient, isTransientFailure, NO_LLM_REASON } from "./llm";

function client(fetchImpl: typeof fetch) {
  return new ChatCompletionsClient({
    baseUrl: "http://llm.test/v1/",
    model: "test-model",
    apiKey: "test-key",
    timeoutMs: 1000,
    fetchImpl,
  });
}

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

describe("ChatCompletionsClient", () => {
  test("posts the prompt and returns the message content", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      json({ choices: [{ message: { content: "Hello" } }] }),
    );
    expect(await client(fetchImpl).complete("Say hello")).toEqual({ kind: "ok", text: "Hello" });

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("http://llm.test/v1/chat/completions");
    expect(init?.headers).toEqual({
      "content-type": "application/json",
      authorization: "Bearer test-key",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "Say hello" }],
      temperature: 0,
    });
  });

  test("429 is transient", async () => {
    const result = await client(async () => json({ error: "slow down" }, 429)).complete("x");
    expect(result.kind).toBe("transient");
  });

  test("quota wording in an error body is transient", async () => {
    const result = await client(async () =>
      json({ error: { code: "insufficient_quota" } }, 403),
    ).complete("x");
    expect(result.kind).toBe("transient");
  });

  test("other HTTP errors are failures carrying the status", async () => {
    const result = await client(async () => new Response("boom", { status: 500 })).complete("x");
    expect(result).toEqual({ kind: "failed", message: "500 : boom" });
  });

  test("network errors are failures", async () => {
    const result = await client(async () => {
      throw new TypeError("fetch failed");
    }).complete("x");
    expect(result).toEqual({ kind: "failed", message: "fetch failed" });
  });

  test("a timeout reports the model as unavailable", async () => {
    const result = await client(async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), {
        name: "TimeoutError",
      });
    }).complete("x");
    expect(result).toEqual({ kind: "unavailable", reason: "LLM request timed out after 1000ms." });
  });

  test("an unexpected response shape is a failure", async () => {
    const result = await client(async () => json({ choices: [] })).complete("x");
    expect(result).toEqual({ kind: "failed", message: "Invalid chat completion response shape" });
  });
});

describe("createLlmClient", () => {
  test("without credentials every completion is unavailable", async () => {
    const llm = createLlmClient(readConfig({}));
    expect(await llm.complete("x")).toEqual({ kind: "unavailable", reason: NO_LLM_REASON });
  });

  test("USE_OLLAMA targets the local OpenAI-compatible endpoint", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => json({ choices: [{ message: { content: "hi" } }] }));
    const llm = createLlmClient(readConfig({ USE_OLLAMA: "1" }), fetchImpl);
    await llm.complete("x");
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:11434/v1/chat/completions");
    expect(JSON.parse(String(init?.body)).model).toBe("llama3.2");
  });

  test("OPENAI_API_KEY selects OpenAI with the default model", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => json({ choices: [{ message: { content: null } }] }));
    const llm = createLlmClient(readConfig({ OPENAI_API_KEY: "test-secret" }), fetchImpl);
    expect(await llm.complete("x")).toEqual({ kind: "ok", text: "" });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("https://api.openai.com/v1/chat/completions");
    expect(JSON.parse(String(init?.body)).model).toBe("gpt-4o-mini");
  });
});

test("isTransientFailure", () => {
  expect(isTransientFailure(429, "")).toBe(true);
  expect(isTransientFailure(undefined, "Rate limit reached")).toBe(true);
  expect(isTransientFailure(500, "server error")).toBe(false);
});
