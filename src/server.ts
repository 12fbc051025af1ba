/**
 * MCP server factory and tool router.
 *
 * Tool contracts:
 *  ask
 *    Input:  { question: string, top_k?: number }
 *    Output: { answer: string, citations: Array<{ source, locator, snippet }> }
 *
 *  search
 *    Input:  { query: string, top_k?: number }
 *    Output: { records: Array<{ source, locator, snippet, text }> }
 *
 *  remember
 *    Input:  { user_message: string, assistant_message: string }
 *    Output: { memory_writes: Array<{ target: "USER" | "COMPANY", summary }> }
 *
 *  read_memory
 *    Input:  { target: "USER" | "COMPANY" }
 *    Output: { target, content }
 *
 *  index_documents
 *    Input:  {}
 *    Output: { documents, chunks, skipped: Array<{ path, reason }> }
 *
 * Invalid arguments raise InvalidParams; unknown tool names raise MethodNotFound.
 */
import { z } from "zod";
import type { AnswerService } from "./answer";
import type { Indexer } from "./indexer";
import type { MemoryService } from "./memory";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  Server,
  type CallToolResult,
  type Tool,
} from "./mcp-sdk";
import type { Retriever } from "./retriever";
import { MEMORY_TARGETS } from "./types";
import { APP_VERSION } from "./version";

export interface ToolDeps {
  answers: AnswerService;
  retriever: Retriever;
  memory: MemoryService;
  indexer: Indexer;
  /** Default top_k for ask/search when the caller omits it. */
  defaultTopK: number;
  /** Upper bound advertised in the tool schemas. */
  maxTopK: number;
  /** Display name of the document folder used in tool descriptions. */
  docsLabel: string;
}

const TopK = z.number().int().min(1).optional();

const AskArgs = z.object({ question: z.string().trim().min(1), top_k: TopK });
const SearchArgs = z.object({ query: z.string().trim().min(1), top_k: TopK });
const RememberArgs = z.object({
  user_message: z.string(),
  assistant_message: z.string(),
});
const ReadMemoryArgs = z.object({
  target: z
    .string()
    .transform((s) => s.trim().toUpperCase())
    .pipe(z.enum(MEMORY_TARGETS)),
});

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`)
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${detail}`);
  }
  return parsed.data;
}

/** Static tool schemas returned by tools/list. */
export function listTools(deps: Pick<ToolDeps, "maxTopK" | "docsLabel">): Tool[] {
  const topK = {
    type: "number",
    description: `Maximum number of passages (1-${deps.maxTopK}). Larger values are capped.`,
    minimum: 1,
  };
  return [
    {
      name: "ask",
      description: `Answer a question from the documents in '${deps.docsLabel}', with inline [Source: ..., Locator: ...] citations and a deduplicated citation list.`,
      inputSchema: {
        type: "object" as const,
        properties: {
          question: { type: "string", description: "Natural language question." },
          top_k: topK,
        },
        required: ["question"],
      },
    },
    {
      name: "search",
      description: `Semantically search '${deps.docsLabel}' and return ranked passages with source, locator and snippet.`,
      inputSchema: {
        type: "object" as const,
        properties: {
          query: { type: "string", description: "Search query." },
          top_k: topK,
        },
        required: ["query"],
      },
    },
    {
      name: "remember",
      description:
        "Extract up to two high-confidence facts from one conversation turn and append new ones to USER_MEMORY.md or COMPANY_MEMORY.md.",
      inputSchema: {
        type: "object" as const,
        properties: {
          user_message: { type: "string", description: "What the user said." },
          assistant_message: { type: "string", description: "What the assistant replied." },
        },
        required: ["user_message", "assistant_message"],
      },
    },
    {
      name: "read_memory",
      description: "Read the USER or COMPANY memory document.",
      inputSchema: {
        type: "object" as const,
        properties: {
          target: { type: "string", enum: [...MEMORY_TARGETS], description: "Memory scope." },
        },
        required: ["target"],
      },
    },
    {
      name: "index_documents",
      description: `Rebuild the search index from every supported document (.txt, .md, .pdf) in '${deps.docsLabel}'.`,
      inputSchema: { type: "object" as const, properties: {} },
    },
  ];
}

/** Execute one tool call and return its JSON payload. */
export async function callTool(deps: ToolDeps, name: string, args: unknown): Promise<unknown> {
  switch (name) {
    case "ask": {
      const { question, top_k } = parseArgs(AskArgs, args);
      return deps.answers.answer(question, top_k ?? deps.defaultTopK);
    }
    case "search": {
      const { query, top_k } = parseArgs(SearchArgs, args);
      const records = await deps.retriever.retrieve(query, top_k ?? deps.defaultTopK);
      return { records };
    }
    case "remember": {
      const { user_message, assistant_message } = parseArgs(RememberArgs, args);
      const memory_writes = await deps.memory.processMemory(user_message, assistant_message);
      return { memory_writes };
    }
    case "read_memory": {
      const { target } = parseArgs(ReadMemoryArgs, args);
      const content = await deps.memory.getStore(target).readForContext();
      return { target, content };
    }
    case "index_documents":
      return deps.indexer.reindex();
    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}

/**
 * Construct a fresh MCP Server with the tool handlers. One instance per
 * transport session; the services are shared through `deps`.
 */
export function createServer(deps: ToolDeps): Server {
  const server = new Server(
    { name: "grounded-rag-memory-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: listTools(deps) }));

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    const result = await callTool(deps, req.params.name, req.params.arguments);
    return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
  });

  return server;
}
