import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { completeSafely } from "./llm";
import { statusManager as defaultStatus, type StatusManager } from "./status";
import {
  MEMORY_TARGETS,
  type LlmClient,
  type MemoryFact,
  type MemoryTarget,
  type MemoryWrite,
} from "./types";

/** Candidates below this confidence are never persisted (boundary inclusive). */
export const CONFIDENCE_THRESHOLD = 0.8;

export const MEMORY_PROMPT = `Analyze this conversation turn. Extract ONLY high-signal, reusable facts worth remembering.
Rules:
- USER facts: personal preferences, role, workflow preferences (e.g., "User prefers weekly summaries on Mondays", "User is a Project Finance Analyst")
- COMPANY facts: org-wide learnings, workflows, bottlenecks (e.g., "Asset Management interfaces with Project Finance", "Recurring bottleneck is X")
- Do NOT store: raw transcript, secrets, PII, low-value chitchat
- Be selective: only 0-2 facts per turn, high confidence only

Conversation turn:
{turn}

Respond with a JSON array of objects. Each object: {"target": "USER" or "COMPANY", "summary": "brief fact", "confidence": 0.0-1.0}
If nothing worth storing, return: []
Example: [{"target": "USER", "summary": "User prefers weekly summaries on Mondays.", "confidence": 0.9}]`;

const MEMORY_HEADERS: Record<MemoryTarget, string> = {
  USER: `# USER MEMORY

<!--
Append only high-signal, user-specific facts worth remembering.
Do NOT dump raw conversation.
Avoid secrets or sensitive information.
-->
`,
  COMPANY: `# COMPANY MEMORY

<!--
Append reusable org-wide learnings that could help colleagues too.
Do NOT dump raw conversation.
Avoid secrets or sensitive information.
-->
`,
};

export function memoryFileName(target: MemoryTarget): string {
  return `${target}_MEMORY.md`;
}

/** Collapse internal whitespace so a summary always fits on one line. */
export function normalizeSummary(summary: string): string {
  return summary.replace(/\s+/g, " ").trim();
}

/**
 * Case-insensitive set of summaries in a memory document. Only lines that
 * start with "-" (after trimming) are facts; headers, comments, blank lines
 * and hand-edited indentation are tolerated.
 */
export function parseSummaries(content: string): Set<string> {
  const out = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    // "-->" closes the header comment
    if (!trimmed.startsWith("-") || trimmed.startsWith("-->")) continue;
    const summary = normalizeSummary(trimmed.slice(1));
    if (summary) out.add(summary.toLowerCase());
  }
  return out;
}

// Per-file critical sections, shared by every handle that points at the same path.
const fileLocks = new Map<string, Promise<unknown>>();

async function withFileLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const previous = fileLocks.get(filePath) ?? Promise.resolve();
  const run = previous.then(fn, fn);
  const tail = run.catch(() => undefined);
  fileLocks.set(filePath, tail);
  try {
    return await run;
  } finally {
    if (fileLocks.get(filePath) === tail) fileLocks.delete(filePath);
  }
}

export interface MemoryStoreOptions {
  target: MemoryTarget;
  filePath: string;
}

/** Handle on one append-only markdown memory document. */
export class MemoryStore {
  public readonly target: MemoryTarget;
  public readonly filePath: string;

  public constructor(opts: MemoryStoreOptions) {
    this.target = opts.target;
    this.filePath = path.resolve(opts.filePath);
  }

  /** Stores for both targets under one directory (USER_MEMORY.md, COMPANY_MEMORY.md). */
  public static inDirectory(dir: string): Record<MemoryTarget, MemoryStore> {
    return {
      USER: new MemoryStore({ target: "USER", filePath: path.join(dir, memoryFileName("USER")) }),
      COMPANY: new MemoryStore({
        target: "COMPANY",
        filePath: path.join(dir, memoryFileName("COMPANY")),
      }),
    };
  }

  /** Write the header if the document does not exist yet. Returns true if created. */
  public async ensureInitialized(): Promise<boolean> {
    return this.withLock(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      try {
        await fs.writeFile(this.filePath, MEMORY_HEADERS[this.target], { flag: "wx" });
        return true;
      } catch (e) {
        if (isErrnoException(e) && e.code === "EEXIST") return false;
        throw e;
      }
    });
  }

  /** Raw document text; "" when the file does not exist. */
  public async read(): Promise<string> {
    try {
      return await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return "";
      throw e;
    }
  }

  /** Trimmed contents for prompt context. */
  public async readForContext(): Promise<string> {
    return (await this.read()).trim();
  }

  public async summaries(): Promise<Set<string>> {
    return parseSummaries(await this.read());
  }

  /** Append one fact line, starting a new line if a hand edit left none. */
  public async append(summary: string): Promise<void> {
    const existing = await this.read();
    const prefix = existing && !existing.endsWith("\n") ? "\n" : "";
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, `${prefix}- ${normalizeSummary(summary)}\n`, "utf8");
  }

  /** Run `fn` with exclusive access to this document within the process. */
  public withLock<T>(fn: () => Promise<T>): Promise<T> {
    return withFileLock(this.filePath, fn);
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

const CandidateSchema = z.object({
  target: z.string(),
  summary: z.string(),
  confidence: z.number(),
});

/**
 * Parse the model's extraction reply. Markdown code fences are stripped; a
 * reply that is not a JSON array yields no candidates, and items of the wrong
 * shape are skipped individually.
 */
export function parseCandidates(reply: string): MemoryFact[] {
  let content = reply.trim();
  if (content.startsWith("```")) {
    const lines = content.split("\n");
    content = lines.length > 2 ? lines.slice(1, -1).join("\n") : "[]";
  }
  let items: unknown;
  try {
    items = JSON.parse(content);
  } catch {
    return [];
  }
  if (!Array.isArray(items)) return [];

  const out: MemoryFact[] = [];
  for (const item of items) {
    const parsed = CandidateSchema.safeParse(item);
    if (!parsed.success) continue;
    const target = parsed.data.target.trim().toUpperCase();
    const summary = normalizeSummary(parsed.data.summary);
    if (!isMemoryTarget(target) || !summary) continue;
    out.push({ target, summary, confidence: parsed.data.confidence });
  }
  return out;
}

function isMemoryTarget(v: string): v is MemoryTarget {
  return MEMORY_TARGETS.some((t) => t === v);
}

export function passesConfidence(fact: MemoryFact): boolean {
  return fact.confidence >= CONFIDENCE_THRESHOLD;
}

export interface MemoryServiceOptions {
  llm: LlmClient;
  stores: Record<MemoryTarget, MemoryStore>;
  verbose?: boolean;
  status?: StatusManager;
}

/**
 * Selective long-term memory: asks the model for a few high-confidence facts
 * about a turn and appends the new ones to the USER or COMPANY document.
 */
export class MemoryService {
  private readonly llm: LlmClient;
  private readonly stores: Record<MemoryTarget, MemoryStore>;
  private readonly verbose: boolean;
  private readonly status: StatusManager;

  public constructor(opts: MemoryServiceOptions) {
    this.llm = opts.llm;
    this.stores = opts.stores;
    this.verbose = !!opts.verbose;
    this.status = opts.status ?? defaultStatus;
  }

  public getStore(target: MemoryTarget): MemoryStore {
    return this.stores[target];
  }

  /** Create both documents with their headers when missing. */
  public async initialize(): Promise<void> {
    for (const target of MEMORY_TARGETS) await this.stores[target].ensureInitialized();
  }

  /**
   * Candidate facts for one turn that pass the confidence filter. An
   * unavailable or failing model, or an unparsable reply, yields none.
   */
  public async extractCandidates(userMessage: string, assistantMessage: string): Promise<MemoryFact[]> {
    const turn = `User: ${userMessage}\nAssistant: ${assistantMessage}`;
    const result = await completeSafely(this.llm, MEMORY_PROMPT.replace("{turn}", () => turn));
    switch (result.kind) {
      case "ok":
        return parseCandidates(result.text).filter(passesConfidence);
      case "unavailable":
        if (this.verbose) console.error(`[MEMORY][verbose] Extraction skipped: ${result.reason}`);
        return [];
      case "transient":
      case "failed":
        console.error(`[MEMORY] Extraction failed: ${result.message}`);
        return [];
    }
  }

  /**
   * Extract, filter, dedupe and append. Returns exactly the facts written by
   * this call, in candidate order.
   */
  public async processMemory(userMessage: string, assistantMessage: string): Promise<MemoryWrite[]> {
    const candidates = await this.extractCandidates(userMessage, assistantMessage);
    if (!candidates.length) return [];
    let written: MemoryWrite[];
    try {
      written = await this.persist(candidates);
    } catch (e) {
      console.error(`[MEMORY] Failed to write memory:`, e);
      return [];
    }
    if (written.length) {
      this.status.incMemoryWrites(written.length);
      console.error(`[MEMORY] Remembered ${written.length} fact(s).`);
    }
    return written;
  }

  /**
   * Dedupe against the stored summaries (and earlier candidates in the same
   * batch) and append the rest. Both documents stay locked, in a fixed order,
   * for the whole read-dedup-append sequence. An append that fails ends the
   * batch; the facts appended before it are still returned.
   */
  public async persist(candidates: readonly MemoryFact[]): Promise<MemoryWrite[]> {
    const { USER: user, COMPANY: company } = this.stores;
    const locked = <T>(fn: () => Promise<T>): Promise<T> =>
      user.filePath === company.filePath
        ? user.withLock(fn)
        : user.withLock(() => company.withLock(fn));
    return locked(async () => {
      const existing: Record<MemoryTarget, Set<string>> = {
        USER: await user.summaries(),
        COMPANY: await company.summaries(),
      };
      const written: MemoryWrite[] = [];
      for (const c of candidates) {
        const key = c.summary.toLowerCase();
        if (existing[c.target].has(key)) continue;
        try {
          await this.stores[c.target].append(c.summary);
        } catch (e) {
          // Earlier appends are already on disk; report them and stop.
          console.error(`[MEMORY] Failed to append to ${c.target} memory:`, e);
          break;
        }
        existing[c.target].add(key);
        written.push({ target: c.target, summary: c.summary });
      }
      return written;
    });
  }

  /** Both documents as a prompt section; "" when neither holds anything. */
  public async loadContext(): Promise<string> {
    const parts: string[] = [];
    for (const target of MEMORY_TARGETS) {
      if ((await this.stores[target].summaries()).size) {
        parts.push(await this.stores[target].readForContext());
      }
    }
    return parts.join("\n\n");
  }
}
