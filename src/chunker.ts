import type { Chunk, ChunkFields } from "./types";

/** Display width for section labels carried into locators. */
export const SECTION_LABEL_WIDTH = 80;

export interface ChunkOptions {
  /** Target characters per chunk (word length + 1 separator per word). */
  chunkSize: number;
  /** Number of trailing words carried into the next chunk. */
  overlap: number;
}

/** A section's first line is a heading if it starts with `#` or ends with `:`. */
export function headingLabel(section: string): string | null {
  const firstLine = section.split("\n")[0] ?? "";
  if (firstLine.startsWith("#") || firstLine.endsWith(":")) {
    return firstLine.slice(0, SECTION_LABEL_WIDTH).trim();
  }
  return null;
}

/** Accumulated length of a word buffer: each word counts its length plus one separator. */
function bufferLength(words: readonly string[]): number {
  return words.reduce((n, w) => n + w.length + 1, 0);
}

/**
 * Split text into overlapping, section-tagged chunks.
 *
 * Text is first split on blank lines into sections. A section whose first
 * line looks like a heading replaces the current label, which then tags every
 * chunk emitted until the next heading. Words accumulate across section
 * boundaries; once the buffer reaches `chunkSize` characters it is emitted and
 * reseeded with its last `overlap` words. Whatever remains at the end is
 * emitted as a final, possibly short, chunk.
 *
 * `overlap >= chunkSize` is not corrected and produces near-duplicate chunks.
 */
export function* chunkText(
  text: string,
  chunkSize: number,
  overlap: number,
): Generator<ChunkFields> {
  const sections = text
    .trim()
    .split(/\n\s*\n/)
    .map((s) => s.trim())
    .filter(Boolean);

  let buffer: string[] = [];
  let length = 0;
  let index = 0;
  let section: string | null = null;

  for (const body of sections) {
    section = headingLabel(body) ?? section;

    for (const word of body.split(/\s+/).filter(Boolean)) {
      buffer.push(word);
      length += word.length + 1;
      if (length >= chunkSize) {
        yield { text: buffer.join(" "), index: index++, section };
        buffer = buffer.length > overlap ? buffer.slice(buffer.length - overlap) : buffer;
        length = bufferLength(buffer);
      }
    }
  }

  if (buffer.length) yield { text: buffer.join(" "), index, section };
}

/** `"chunk 3"`, or `"# Setup (chunk 3)"` when a section label is known. */
export function formatLocator(section: string | null, chunkId: number): string {
  const base = `chunk ${chunkId}`;
  return section ? `${section} (${base})` : base;
}

/** Materialize every chunk of one source document with its locator. */
export function buildChunks(source: string, text: string, opts: ChunkOptions): Chunk[] {
  const out: Chunk[] = [];
  for (const fields of chunkText(text, opts.chunkSize, opts.overlap)) {
    out.push({
      text: fields.text,
      source,
      chunkId: fields.index,
      section: fields.section,
      locator: formatLocator(fields.section, fields.index),
    });
  }
  return out;
}
