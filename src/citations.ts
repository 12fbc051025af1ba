import type { Citation, RetrievedRecord } from "./types";

/** Inline markup the model is asked to reproduce after each grounded statement. */
export function citationMarker(source: string, locator: string): string {
  return `[Source: ${source}, Locator: ${locator}]`;
}

/**
 * Render records as numbered context blocks in rank order. Block `[i]` is the
 * i-th ranked record, so inline citations stay traceable to retrieval rank.
 */
export function formatContext(records: readonly RetrievedRecord[]): string {
  return records
    .map((r, i) => `[${i + 1}] (Source: ${r.source}, Locator: ${r.locator})\n${r.text}`)
    .join("\n\n");
}

/** One citation per (source, locator), first-seen order, first snippet wins. */
export function buildCitations(records: readonly RetrievedRecord[]): Citation[] {
  const seen = new Set<string>();
  const out: Citation[] = [];
  for (const r of records) {
    const key = JSON.stringify([r.source, r.locator]);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push({ source: r.source, locator: r.locator, snippet: r.snippet });
  }
  return out;
}

export interface FormattedGrounding {
  context: string;
  citations: Citation[];
}

export function formatRecords(records: readonly RetrievedRecord[]): FormattedGrounding {
  return { context: formatContext(records), citations: buildCitations(records) };
}
