import fs from "node:fs/promises";
import path from "node:path";
import { PdfExtractor } from "./pdf-extractor";

/** Raised for a file type the parser does not understand. */
export class UnsupportedDocumentError extends Error {
  public readonly extension: string;

  constructor(filePath: string) {
    const extension = path.extname(filePath).toLowerCase();
    super(`Unsupported file type: ${extension || "(none)"} (${path.basename(filePath)})`);
    this.name = "UnsupportedDocumentError";
    this.extension = extension;
  }
}

/** Turns a document on disk into raw text for the chunker. */
export interface DocumentParser {
  /** @throws {UnsupportedDocumentError} for unrecognized file types. */
  parse(absPath: string): Promise<string>;
}

export const TEXT_EXTENSIONS = new Set([".txt", ".md"]);

/** Plain text and markdown are read as UTF-8; PDFs go through {@link PdfExtractor}. */
export class FileDocumentParser implements DocumentParser {
  private readonly pdf: PdfExtractor;

  public constructor(pdf: PdfExtractor) {
    this.pdf = pdf;
  }

  public async parse(absPath: string): Promise<string> {
    const ext = path.extname(absPath).toLowerCase();
    if (TEXT_EXTENSIONS.has(ext)) return fs.readFile(absPath, "utf8");
    if (PdfExtractor.isPdf(absPath)) return this.pdf.extractText(absPath);
    throw new UnsupportedDocumentError(absPath);
  }
}
