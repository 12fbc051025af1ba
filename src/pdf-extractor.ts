/**
 * PDF text extraction backed by `pdf-parse`, with the extracted text cached in
 * one `pdf-text-cache.json` so a reindex only re-parses PDFs that changed:
 *
 *   {
 *     "version": 2,
 *     "entries": {
 *       "reports/q1.pdf": { "size": 12345, "mtimeMs": 1700000000000, "pages": 10, "text": "..." }
 *     }
 *   }
 *
 * Entries are keyed by the path relative to the docs root and go stale when
 * the file's size or modification time changes.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";

interface PdfCacheEntry {
  size: number;
  mtimeMs: number;
  pages: number;
  text: string;
}

type PdfCache = Record<string, PdfCacheEntry>;

const CACHE_VERSION = 2;
export const PDF_CACHE_FILE = "pdf-text-cache.json";

function isEntry(v: unknown): v is PdfCacheEntry {
  if (typeof v !== "object" || v === null) return false;
  return (
    "size" in v &&
    typeof v.size === "number" &&
    "mtimeMs" in v &&
    typeof v.mtimeMs === "number" &&
    "pages" in v &&
    typeof v.pages === "number" &&
    "text" in v &&
    typeof v.text === "string"
  );
}

export interface PdfExtractorOptions {
  /** Docs root; cache keys are relative to it. */
  root: string;
  /** Directory for the cache file (default: the docs root). */
  cacheDir?: string;
  verbose?: boolean;
}

export class PdfExtractor {
  private readonly root: string;
  private readonly cacheFile: string;
  private readonly verbose: boolean;
  private cache: PdfCache | null = null;

  public constructor(opts: PdfExtractorOptions) {
    this.root = opts.root;
    this.cacheFile = path.join(opts.cacheDir ?? opts.root, PDF_CACHE_FILE);
    this.verbose = !!opts.verbose;
  }

  public static isPdf(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }

  /**
   * Text of every page, pages separated by a blank line so the chunker sees
   * page breaks as section boundaries.
   * @throws when the file cannot be read or parsed.
   */
  public async extractText(absPath: string): Promise<string> {
    const key = path.relative(this.root, absPath).split(path.sep).join("/");
    const { size, mtimeMs } = await fs.stat(absPath);
    const cache = await this.loadCache();
    const hit = cache[key];
    if (hit && hit.size === size && hit.mtimeMs === mtimeMs) {
      if (this.verbose) console.error(`[PDF][verbose] cache hit ${key}`);
      return hit.text;
    }

    if (this.verbose) console.error(`[PDF][verbose] extracting ${key}`);
    const parser = new PDFParse({ data: await fs.readFile(absPath) });
    try {
      const result = await parser.getText();
      const text = result.pages.map((p) => p.text).join("\n\n");
      cache[key] = { size, mtimeMs, pages: result.pages.length, text };
      await this.saveCache(cache);
      return text;
    } finally {
      await parser.destroy();
    }
  }

  private async loadCache(): Promise<PdfCache> {
    if (this.cache) return this.cache;
    const cache: PdfCache = {};
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(this.cacheFile, "utf8"));
      if (typeof parsed === "object" && parsed !== null && "version" in parsed && "entries" in parsed) {
        const { version, entries } = parsed;
        if (version === CACHE_VERSION && typeof entries === "object" && entries !== null) {
          for (const [k, v] of Object.entries(entries)) if (isEntry(v)) cache[k] = v;
        }
      }
    } catch {
      // missing or unreadable cache: start empty
    }
    this.cache = cache;
    return cache;
  }

  private async saveCache(cache: PdfCache): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.cacheFile), { recursive: true });
      await fs.writeFile(this.cacheFile, JSON.stringify({ version: CACHE_VERSION, entries: cache }));
    } catch (e) {
      console.error(`[PDF] Could not write ${this.cacheFile}:`, e);
    }
  }
}
