import fs from "node:fs/promises";
import path from "node:path";
import type { ChunkMetadata, VectorItem } from "./types";

/**
 * What produced a collection. A saved collection is only reused when every
 * field matches the running configuration.
 */
export interface IndexSettings {
  modelName: string;
  chunkSize?: number;
  chunkOverlap?: number;
}

const SETTING_KEYS = ["modelName", "chunkSize", "chunkOverlap"] as const;

/**
 * On-disk layout of a saved collection. Vectors travel as base64 of their
 * little-endian float32 bytes (`emb`).
 */
interface StoredCollection {
  version: 1;
  meta: IndexSettings & { savedAt: string; embEncoding: "f32-base64" };
  items: Array<{ id: string; document: string; metadata: ChunkMetadata; emb: string }>;
}

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

function decodeVector(emb: unknown): Float32Array | null {
  if (typeof emb !== "string" || !emb) return null;
  const bytes = Buffer.from(emb, "base64");
  if (bytes.byteLength % 4 !== 0) return null;
  // Copy into a fresh ArrayBuffer: a pooled Buffer's offset may not be 4-byte aligned.
  return new Float32Array(new Uint8Array(bytes).buffer);
}

function decodeMetadata(meta: unknown): ChunkMetadata | null {
  if (!isObject(meta)) return null;
  const { source, chunkId, locator, section } = meta;
  if (typeof source !== "string" || typeof chunkId !== "number" || typeof locator !== "string")
    return null;
  return { source, chunkId, locator, section: typeof section === "string" ? section : null };
}

/**
 * Saves the vector collection to one JSON file and reloads it at startup.
 * Without a path every call is a no-op.
 */
export class Persistence {
  private readonly storePath?: string;
  private readonly verbose: boolean;

  public constructor(storePath?: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  /**
   * Items saved under the same settings, or null when there is no file, the
   * file is unreadable, or it was built with another model or chunking.
   */
  public async load(settings: IndexSettings): Promise<VectorItem[] | null> {
    if (!this.storePath) return null;
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      if (!isObject(parsed) || !Array.isArray(parsed.items)) return null;
      const meta = isObject(parsed.meta) ? parsed.meta : {};
      const changed = SETTING_KEYS.filter((k) => meta[k] !== settings[k]);
      if (changed.length) {
        const detail = changed
          .map((k) => `${k} ${String(meta[k])} -> ${String(settings[k])}`)
          .join(", ");
        console.error(`[INDEX] Ignoring ${this.storePath}: ${detail}.`);
        return null;
      }
      const items: VectorItem[] = [];
      for (const d of parsed.items) {
        if (!isObject(d) || typeof d.id !== "string" || typeof d.document !== "string") continue;
        const vector = decodeVector(d.emb);
        const metadata = decodeMetadata(d.metadata);
        if (vector && metadata) items.push({ id: d.id, document: d.document, metadata, vector });
      }
      console.error(`[INDEX] Restored ${items.length} chunks from ${this.storePath}`);
      return items;
    } catch (e) {
      console.error(`[INDEX] Failed to read index store ${this.storePath}:`, e);
      return null;
    }
  }

  /**
   * Replace the file with the given collection. The JSON goes to a temp file
   * that is renamed over the target, so readers never see a half-written file.
   * Write failures are logged, not thrown.
   */
  public async save(items: readonly VectorItem[], settings: IndexSettings): Promise<void> {
    if (!this.storePath) return;
    const out: StoredCollection = {
      version: 1,
      meta: { ...settings, savedAt: new Date().toISOString(), embEncoding: "f32-base64" },
      items: items.map((d) => ({
        id: d.id,
        document: d.document,
        metadata: d.metadata,
        emb: encodeVector(d.vector),
      })),
    };
    const tmpPath = `${this.storePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.storePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(out));
      await fs.rename(tmpPath, this.storePath);
      if (this.verbose) console.error(`[INDEX][verbose] Saved ${items.length} chunks to ${this.storePath}`);
    } catch (e) {
      console.error(`[INDEX] Failed to save index store:`, e);
      await fs.rm(tmpPath, { force: true }).catch(() => undefined);
    }
  }
}
