import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import fg from "fast-glob";
import { loaderLogger as log } from "./logger";
import { PdfExtractor } from "./pdf-extractor";
import type { Document, DocumentSource } from "./types";

/**
 * Normalize extracted text for mixed Hindi/English content: collapse
 * whitespace, keep letters and digits of any script, Devanagari (danda
 * included) and common punctuation, and drop "Page N" markers.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\s+/g, " ")
    .replace(/[^\p{L}\p{M}\p{N}_\s\u0900-\u097F.,;:!?()\-'"\/]/gu, "")
    .replace(/Page \d+/g, "")
    .trim();
}

export interface DirectoryDocumentSourceOptions {
  /** Directory scanned recursively for documents. */
  dir: string;
  /** Extensions to include, without leading dot (default pdf, txt, md). */
  extensions?: string[];
  /** Where the PDF text cache lives (default: `dir`). */
  cacheDir?: string;
}

/** Loads every matching file under a directory as a {@link Document}. */
export class DirectoryDocumentSource implements DocumentSource {
  private readonly dir: string;
  private readonly extensions: string[];
  private readonly pdf: PdfExtractor;

  public constructor(opts: DirectoryDocumentSourceOptions) {
    this.dir = path.resolve(opts.dir);
    this.extensions = opts.extensions ?? ["pdf", "txt", "md"];
    this.pdf = new PdfExtractor(opts.cacheDir ?? this.dir);
  }

  public async loadAll(): Promise<Document[]> {
    if (!fsSync.existsSync(this.dir)) {
      log.warn({ dir: this.dir }, "Document directory not found");
      return [];
    }
    const patterns = this.extensions.map((ext) => `**/*.${ext}`);
    const files = (
      await fg(patterns, { cwd: this.dir, absolute: true, onlyFiles: true, caseSensitiveMatch: false })
    ).sort();
    log.info({ dir: this.dir, files: files.length }, "Found documents to load");

    const documents: Document[] = [];
    for (const abs of files) {
      const doc = await this.loadOne(abs);
      if (doc) documents.push(doc);
    }
    log.info({ loaded: documents.length }, "Loaded documents");
    return documents;
  }

  /** Load a single file; null when it cannot be read or parsed. */
  public async loadOne(abs: string): Promise<Document | null> {
    const filename = path.basename(abs);
    try {
      let raw: string;
      let pageCount = 1;
      if (PdfExtractor.isPdf(abs)) {
        const st = await fs.stat(abs);
        const extracted = await this.pdf.extract(abs, st.size);
        if (!extracted) return null;
        raw = extracted.text;
        pageCount = extracted.pageCount;
      } else {
        raw = await fs.readFile(abs, "utf8");
      }
      const text = cleanText(raw);
      log.debug({ document: filename, characters: text.length }, "Loaded document");
      return { filename, text, pageCount, sourcePath: abs };
    } catch (e) {
      log.error({ err: e, document: filename }, "Error loading document");
      return null;
    }
  }
}
