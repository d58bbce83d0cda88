import type { Embedder } from "./embeddings";
import { retrieverLogger as log } from "./logger";
import type { RetrievalResult } from "./types";
import type { VectorIndex } from "./vector-index";

/** Returned instead of an empty context so "nothing found" is never ambiguous. */
export const NO_RELEVANT_INFO = "कोई प्रासंगिक जानकारी नहीं मिली। (No relevant information found.)";

/** Embeds a query and looks up its nearest chunks. */
export class Retriever {
  private readonly index: VectorIndex;
  private readonly embedder: Embedder;
  public readonly topK: number;

  public constructor(index: VectorIndex, embedder: Embedder, topK = 3) {
    this.index = index;
    this.embedder = embedder;
    this.topK = topK;
  }

  public async retrieve(query: string, topK = this.topK): Promise<RetrievalResult[]> {
    log.debug({ query: query.slice(0, 50), topK }, "Retrieving");
    const vector = await this.embedder.embedOne(query);
    const hits = this.index.search(vector, topK);
    const results = hits.map(({ chunk, score }) => ({
      text: chunk.text,
      source: chunk.source || "unknown",
      score,
      chunkId: Number.isInteger(chunk.chunkId) ? chunk.chunkId : -1,
    }));
    log.debug({ results: results.length }, "Retrieved chunks");
    return results;
  }

  public async retrieveWithContext(query: string, topK = this.topK): Promise<string> {
    return Retriever.formatContext(await this.retrieve(query, topK));
  }

  /** Number each result and label it with its source; sentinel when empty. */
  public static formatContext(results: readonly RetrievalResult[]): string {
    if (results.length === 0) return NO_RELEVANT_INFO;
    return results
      .map((r, i) => `संदर्भ ${i + 1} (स्रोत: ${r.source}):\n${r.text}\n`)
      .join("\n");
  }
}
