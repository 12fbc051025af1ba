import { citationMarker, formatRecords } from "./citations";
import { completeSafely } from "./llm";
import type { Retriever } from "./retriever";
import type { Citation, LlmClient } from "./types";

export const NO_RELEVANT_INFORMATION =
  "I couldn't find relevant information in the uploaded documents. " +
  "Please upload documents first or try a different question.";

export const CITATION_PROMPT = `You are a helpful assistant that answers questions based ONLY on the provided context.
If the answer cannot be found in the context, say "I couldn't find relevant information in the uploaded documents."
Do NOT make up information or cite sources that don't exist.
{memory}
Context (retrieved passages):
{context}

For each fact you state, cite the source using this exact format: ${citationMarker("filename", "locator")}
Example: ${citationMarker("report.pdf", "Results (chunk 2)")}

Question: {question}

Answer (with inline citations):`;

export interface Answer {
  answer: string;
  citations: Citation[];
}

/** Source of long-term facts to include in the prompt (the memory service). */
export interface MemoryContextSource {
  loadContext(): Promise<string>;
}

export interface AnswerServiceOptions {
  retriever: Retriever;
  llm: LlmClient;
  /** Default top_k when the caller gives none. */
  defaultTopK?: number;
  memory?: MemoryContextSource;
}

/** Fill the prompt template. Replacers are functions so "$" in user text stays literal. */
export function buildPrompt(question: string, context: string, memory = ""): string {
  const memoryBlock = memory ? `\nKnown facts about the user and organization:\n${memory}\n` : "";
  return CITATION_PROMPT.replace("{memory}", () => memoryBlock)
    .replace("{context}", () => context)
    .replace("{question}", () => question);
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Ties retrieval, citation formatting and generation together. Generation
 * failures never discard grounding: every non-empty retrieval returns its
 * citations, whatever happened to the model call.
 */
export class AnswerService {
  private readonly retriever: Retriever;
  private readonly llm: LlmClient;
  private readonly defaultTopK: number;
  private readonly memory?: MemoryContextSource;

  public constructor(opts: AnswerServiceOptions) {
    this.retriever = opts.retriever;
    this.llm = opts.llm;
    this.defaultTopK = opts.defaultTopK ?? 5;
    this.memory = opts.memory;
  }

  public async answer(question: string, topK = this.defaultTopK): Promise<Answer> {
    const records = await this.retriever.retrieve(question, topK);
    if (!records.length) return { answer: NO_RELEVANT_INFORMATION, citations: [] };

    const { context, citations } = formatRecords(records);
    const top = records[0];
    const memory = await this.loadMemory();
    const result = await completeSafely(this.llm, buildPrompt(question, context, memory));

    switch (result.kind) {
      case "ok":
        return { answer: result.text.trim(), citations };
      case "unavailable":
        return {
          answer: `${result.reason} Top result: ${truncate(top.snippet, 100)}`,
          citations,
        };
      case "transient":
        return {
          answer:
            "Relevant passages retrieved (LLM unavailable - rate limit or quota exceeded). " +
            `Please try again later. Top result: ${truncate(top.snippet, 150)}`,
          citations,
        };
      case "failed":
        return { answer: `LLM error: ${result.message}`, citations };
    }
  }

  private async loadMemory(): Promise<string> {
    if (!this.memory) return "";
    try {
      return await this.memory.loadContext();
    } catch (e) {
      console.error(`[RAG] Could not load memory context:`, e);
      return "";
    }
  }
}
