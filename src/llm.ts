import { z } from "zod";
import type { Config } from "./config";
import type { CompletionResult, LlmClient } from "./types";

export const OPENAI_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .min(1),
});

/** Provider signalled a rate limit or an exhausted quota. */
export function isTransientFailure(status: number | undefined, message: string): boolean {
  if (status === 429) return true;
  return /\b429\b|quota|rate.?limit/i.test(message);
}

export interface ChatClientOptions {
  baseUrl: string;
  model: string;
  /** Ollama accepts any bearer token; OpenAI requires a real key. */
  apiKey: string;
  timeoutMs: number;
  /** Injectable for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

/**
 * OpenAI-compatible chat completions client (OpenAI, or Ollama's /v1 endpoint).
 * Never throws: every outcome is reported as a {@link CompletionResult}.
 */
export class ChatCompletionsClient implements LlmClient {
  private readonly opts: ChatClientOptions;
  private readonly fetchImpl: typeof fetch;

  public constructor(opts: ChatClientOptions) {
    this.opts = opts;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  public async complete(prompt: string): Promise<CompletionResult> {
    let resp: Response;
    try {
      resp = await this.fetchImpl(`${this.opts.baseUrl.replace(/\/+$/, "")}/chat/completions`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.opts.apiKey}`,
        },
        body: JSON.stringify({
          model: this.opts.model,
          messages: [{ role: "user", content: prompt }],
          temperature: 0,
        }),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (e) {
      if (e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError")) {
        console.error(`[LLM] Request timed out after ${this.opts.timeoutMs}ms`);
        return { kind: "unavailable", reason: `LLM request timed out after ${this.opts.timeoutMs}ms.` };
      }
      const message = e instanceof Error ? e.message : String(e);
      console.error(`[LLM] Request failed:`, message);
      return isTransientFailure(undefined, message)
        ? { kind: "transient", message }
        : { kind: "failed", message };
    }

    if (!resp.ok) {
      const body = await safeText(resp);
      const message = `${resp.status} ${resp.statusText}: ${body}`;
      console.error(`[LLM] Provider error ${message}`);
      return isTransientFailure(resp.status, body)
        ? { kind: "transient", message }
        : { kind: "failed", message };
    }

    const parsed = ChatCompletionSchema.safeParse(await resp.json().catch(() => null));
    if (!parsed.success) {
      return { kind: "failed", message: "Invalid chat completion response shape" };
    }
    return { kind: "ok", text: parsed.data.choices[0]?.message.content ?? "" };
  }
}

/** Stand-in used when no endpoint or credentials are configured. */
export class UnavailableLlmClient implements LlmClient {
  private readonly reason: string;

  public constructor(reason: string) {
    this.reason = reason;
  }

  public async complete(): Promise<CompletionResult> {
    return { kind: "unavailable", reason: this.reason };
  }
}

/** `llm.complete`, with a rejection reported as a failed call. */
export async function completeSafely(llm: LlmClient, prompt: string): Promise<CompletionResult> {
  try {
    return await llm.complete(prompt);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(`[LLM] Completion threw: ${message}`);
    return { kind: "failed", message };
  }
}

export const NO_LLM_REASON =
  "No LLM configured. Set USE_OLLAMA=1 for local Ollama, or OPENAI_API_KEY for OpenAI.";

/**
 * Pick the LLM backend from config:
 * USE_OLLAMA wins, then OPENAI_API_KEY, otherwise an always-unavailable client.
 */
export function createLlmClient(config: Config, fetchImpl?: typeof fetch): LlmClient {
  if (config.USE_OLLAMA) {
    return new ChatCompletionsClient({
      baseUrl: config.OLLAMA_BASE_URL,
      model: config.LLM_MODEL ?? config.OLLAMA_MODEL,
      apiKey: "ollama",
      timeoutMs: config.LLM_TIMEOUT_MS,
      fetchImpl,
    });
  }
  if (config.OPENAI_API_KEY) {
    return new ChatCompletionsClient({
      baseUrl: OPENAI_BASE_URL,
      model: config.LLM_MODEL ?? DEFAULT_OPENAI_MODEL,
      apiKey: config.OPENAI_API_KEY,
      timeoutMs: config.LLM_TIMEOUT_MS,
      fetchImpl,
    });
  }
  return new UnavailableLlmClient(NO_LLM_REASON);
}

async function safeText(r: Response): Promise<string> {
  try {
    return await r.text();
  } catch {
    return "<no body>";
  }
}
