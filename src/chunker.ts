import { chunkerLogger as log } from "./logger";
import type { Chunk, Document } from "./types";

/**
 * Sentence-ending markers tried in priority order when shortening a window.
 * Devanagari danda first, then Latin punctuation, then a bare newline.
 */
export const SENTENCE_BOUNDARIES = ["। ", ". ", "? ", "! ", "\n"] as const;

export interface ChunkerOptions {
  /** Target window size in characters (default 300). */
  chunkSize?: number;
  /** Characters shared between consecutive windows (default 50). */
  chunkOverlap?: number;
  /** Documents shorter than this produce no chunks (default 50). */
  minTextLength?: number;
  /** Longer documents are truncated to this length first (default 100000). */
  maxTextLength?: number;
  /** Hard cap on chunks produced per document (default 200). */
  maxChunksPerDoc?: number;
}

/**
 * Splits document text into bounded, overlapping passages that prefer to end
 * at sentence boundaries. Pure in-memory transformation.
 */
export class Chunker {
  public readonly chunkSize: number;
  public readonly chunkOverlap: number;
  public readonly minTextLength: number;
  public readonly maxTextLength: number;
  public readonly maxChunksPerDoc: number;

  public constructor(opts: ChunkerOptions = {}) {
    this.chunkSize = Math.max(1, Math.floor(opts.chunkSize ?? 300));
    this.chunkOverlap = Math.max(0, Math.floor(opts.chunkOverlap ?? 50));
    this.minTextLength = Math.max(0, opts.minTextLength ?? 50);
    this.maxTextLength = Math.max(1, opts.maxTextLength ?? 100_000);
    this.maxChunksPerDoc = Math.max(1, opts.maxChunksPerDoc ?? 200);
  }

  /**
   * Find where a window starting at `start` should end. When the raw window
   * ends strictly inside the text, the end moves back to just after the first
   * boundary marker (in priority order) lying wholly inside `[start, end)`.
   */
  public windowEnd(text: string, start: number): number {
    const end = Math.min(start + this.chunkSize, text.length);
    if (end >= text.length) return end;
    for (const marker of SENTENCE_BOUNDARIES) {
      const from = end - marker.length;
      if (from < start) continue;
      const pos = text.lastIndexOf(marker, from);
      if (pos >= start) return pos + 1;
    }
    return end;
  }

  public chunk(document: Document): Chunk[] {
    const source = document.filename || "unknown";
    let text = document.text;
    if (!text || text.length < this.minTextLength) return [];

    if (text.length > this.maxTextLength) {
      log.warn(
        { source, length: text.length, maxTextLength: this.maxTextLength },
        "Truncating oversized document",
      );
      text = text.slice(0, this.maxTextLength);
    }

    const chunks: Chunk[] = [];
    let start = 0;
    while (start < text.length && chunks.length < this.maxChunksPerDoc) {
      const end = this.windowEnd(text, start);
      const slice = text.slice(start, end).trim();
      if (slice) {
        chunks.push({
          text: slice,
          source,
          chunkId: chunks.length,
          startChar: start,
          endChar: end,
        });
      }
      if (end >= text.length) {
        start = text.length;
        break;
      }
      start = Math.max(end - this.chunkOverlap, start + 1);
    }

    if (start < text.length) {
      log.warn(
        { source, maxChunksPerDoc: this.maxChunksPerDoc, unconsumed: text.length - start },
        "Chunk cap reached; remaining text dropped",
      );
    }
    log.debug({ source, chunks: chunks.length }, "Chunked document");
    return chunks;
  }

  /** Chunk several documents at once. Only for small corpora. */
  public chunkAll(documents: readonly Document[]): Chunk[] {
    const all: Chunk[] = [];
    for (const doc of documents) all.push(...this.chunk(doc));
    log.info({ documents: documents.length, chunks: all.length }, "Chunked corpus");
    return all;
  }
}
