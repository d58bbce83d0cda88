/**
 * Shared record and collaborator types for the indexing + query paths.
 */

/** A document as produced by the loader. Consumed once by the chunker. */
export interface Document {
  /** Base name of the originating file; becomes every chunk's `source`. */
  readonly filename: string;
  /** Extracted, cleaned text. */
  readonly text: string;
  readonly pageCount: number;
  /** Absolute path the document was read from. */
  readonly sourcePath: string;
}

/** A bounded passage of document text, the atomic retrievable unit. */
export interface Chunk {
  readonly text: string;
  /** Originating document's filename. */
  readonly source: string;
  /** Sequence number within its document (0-based, not globally unique). */
  readonly chunkId: number;
  /** Offsets into the (possibly truncated) document text, end exclusive. */
  readonly startChar: number;
  readonly endChar: number;
}

export type Vector = Float32Array;

/** One stored (vector, chunk) pair. */
export interface IndexEntry {
  readonly vector: Vector;
  readonly chunk: Chunk;
}

/** A chunk paired with its similarity score for one query. */
export interface SearchHit {
  readonly chunk: Chunk;
  readonly score: number;
}

export interface RetrievalResult {
  text: string;
  source: string;
  score: number;
  chunkId: number;
}

export type Language = "hindi" | "english";

export interface QueryResult {
  context: string;
  sources: string[];
  prompt: string;
  retrievedChunks: RetrievalResult[];
}

export type IndexStats =
  | { status: "not_indexed" }
  | {
      status: "indexed";
      totalVectors: number;
      dimension: number | null;
      totalChunks: number;
      docsDir: string;
    };

// -------------------- Collaborators --------------------

/** Supplies every document to index. */
export interface DocumentSource {
  loadAll(): Promise<Document[]>;
}

/** Fixed-width text encoder (the embedding model). */
export interface EmbeddingEncoder {
  readonly dimension: number;
  encodeOne(text: string): Promise<Vector>;
  encodeMany(texts: string[]): Promise<Vector[]>;
}

export interface GenerateOptions {
  maxTokens: number;
  temperature: number;
}

/** Downstream text generator that receives the assembled prompt. */
export interface TextGenerator {
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}
