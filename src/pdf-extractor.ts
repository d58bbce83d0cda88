/**
 * PDF text extraction with a JSON cache.
 *
 * All extractions share one pdf-text-cache.json, keyed by absolute PDF path:
 *   { "version": 1, "entries": { "/abs/file.pdf": { pdfSize, extractedAt, text, pageCount } } }
 * An entry is stale when the PDF's size has changed. A corrupt cache file is
 * treated as empty.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { pdfLogger as log } from "./logger";

const PdfCacheEntrySchema = z.object({
  pdfSize: z.number(),
  extractedAt: z.string(),
  text: z.string(),
  pageCount: z.number().int().nonnegative(),
});

const PdfCacheStoreSchema = z.object({
  version: z.literal(1),
  entries: z.record(PdfCacheEntrySchema),
});

export type PdfCacheEntry = z.infer<typeof PdfCacheEntrySchema>;
type PdfCacheStore = z.infer<typeof PdfCacheStoreSchema>;

export interface ExtractedPdf {
  text: string;
  pageCount: number;
}

export const PDF_CACHE_FILE = "pdf-text-cache.json";

export class PdfExtractor {
  private readonly cacheFilePath: string;
  private cacheStore: PdfCacheStore | null = null;

  /** @param cacheDir Directory holding the cache file (usually the index directory). */
  constructor(cacheDir: string) {
    this.cacheFilePath = path.join(cacheDir, PDF_CACHE_FILE);
  }

  private async loadCacheStore(): Promise<PdfCacheStore> {
    if (this.cacheStore) return this.cacheStore;
    let store: PdfCacheStore = { version: 1, entries: {} };
    try {
      const parsed = PdfCacheStoreSchema.safeParse(
        JSON.parse(await fs.readFile(this.cacheFilePath, "utf8")),
      );
      if (parsed.success) store = parsed.data;
    } catch (e) {
      log.debug({ err: e, file: this.cacheFilePath }, "No usable PDF text cache; starting fresh");
    }
    this.cacheStore = store;
    return store;
  }

  private async saveCacheStore(store: PdfCacheStore): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.cacheFilePath), { recursive: true });
      await fs.writeFile(this.cacheFilePath, JSON.stringify(store, null, 2), "utf8");
    } catch (e) {
      log.error({ err: e, file: this.cacheFilePath }, "Failed to save PDF text cache");
    }
  }

  /**
   * Extract text from a PDF, using the cache when its size matches.
   * Returns null when the file cannot be parsed.
   */
  public async extract(pdfAbsPath: string, pdfSize: number): Promise<ExtractedPdf | null> {
    const store = await this.loadCacheStore();
    const cached = store.entries[pdfAbsPath];
    const name = path.basename(pdfAbsPath);
    if (cached && cached.pdfSize === pdfSize && cached.text) {
      log.debug({ file: name }, "PDF cache hit");
      return { text: cached.text, pageCount: cached.pageCount };
    }

    log.debug({ file: name }, "Extracting PDF text");
    try {
      // Loaded on first use: pdf.js is heavy and most runs hit the cache.
      const { PDFParse } = await import("pdf-parse");
      const parser = new PDFParse({ data: await fs.readFile(pdfAbsPath) });
      try {
        const result = await parser.getText();
        const extracted: ExtractedPdf = {
          text: result.pages.map((p, i) => `\n--- Page ${i + 1} ---\n${p.text}`).join(""),
          pageCount: result.pages.length,
        };
        store.entries[pdfAbsPath] = {
          pdfSize,
          extractedAt: new Date().toISOString(),
          ...extracted,
        };
        await this.saveCacheStore(store);
        return extracted;
      } finally {
        await parser.destroy();
      }
    } catch (e) {
      log.error({ err: e, file: name }, "Failed to extract PDF text");
      return null;
    }
  }

  public static isPdf(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }
}
