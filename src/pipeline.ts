import { Chunker } from "./chunker";
import type { Embedder } from "./embeddings";
import { isProgrammerError } from "./errors";
import { pipelineLogger as log } from "./logger";
import { noContextPrompt, ragPrompt, schemeExplanationPrompt, termExplanationPrompt } from "./prompts";
import { NO_RELEVANT_INFO, Retriever } from "./retriever";
import { StatusManager } from "./status";
import type { Document, DocumentSource, IndexStats, Language, QueryResult } from "./types";
import { VectorIndex } from "./vector-index";

export enum IndexState {
  NotIndexed = "not_indexed",
  Indexed = "indexed",
}

export type BuildEvent = "build_succeeded" | "build_failed";

/**
 * The only way the pipeline changes state. A failed build keeps whatever was
 * there before: a previous index stays queryable until a rebuild succeeds.
 */
export function transition(state: IndexState, event: BuildEvent): IndexState {
  switch (event) {
    case "build_succeeded":
      return IndexState.Indexed;
    case "build_failed":
      return state;
  }
}

export interface RagPipelineOptions {
  source: DocumentSource;
  embedder: Embedder;
  /** Where the two index artifacts are saved and loaded. */
  indexDir: string;
  /** Reported in stats only. */
  docsDir?: string;
  chunker?: Chunker;
  /** Default number of chunks retrieved per query (default 3). */
  topK?: number;
  /** Embedding batch size used while building (default: the embedder's). */
  batchSize?: number;
  /**
   * After a failed build, lazy builds triggered by queries are skipped for
   * this long (default 60s). Explicit {@link RagPipeline.buildIndex} calls
   * always run.
   */
  buildRetryIntervalMs?: number;
  status?: StatusManager;
  /** Clock, in ms. */
  now?: () => number;
}

/**
 * Coordinates the build path (documents -> chunks -> vectors -> index) and
 * the query path (question -> vector -> chunks -> context -> prompt).
 *
 * Not safe for concurrent mutation beyond what is handled here: concurrent
 * builds share one in-flight promise.
 */
export class RagPipeline {
  private readonly source: DocumentSource;
  private readonly embedder: Embedder;
  private readonly chunker: Chunker;
  private readonly indexDir: string;
  private readonly docsDir: string;
  private readonly topK: number;
  private readonly batchSize: number;
  private readonly retryIntervalMs: number;
  private readonly now: () => number;
  public readonly status: StatusManager;

  private index = new VectorIndex();
  private retriever: Retriever;
  private indexState = IndexState.NotIndexed;
  private lastFailureAt: number | null = null;
  private lastError: string | null = null;
  private inflight: Promise<boolean> | null = null;
  private inflightForced = false;

  public constructor(opts: RagPipelineOptions) {
    this.source = opts.source;
    this.embedder = opts.embedder;
    this.chunker = opts.chunker ?? new Chunker();
    this.indexDir = opts.indexDir;
    this.docsDir = opts.docsDir ?? "";
    this.topK = opts.topK ?? 3;
    this.batchSize = opts.batchSize ?? opts.embedder.batchSize;
    this.retryIntervalMs = opts.buildRetryIntervalMs ?? 60_000;
    this.now = opts.now ?? Date.now;
    this.status = opts.status ?? new StatusManager();
    this.retriever = new Retriever(this.index, this.embedder, this.topK);
  }

  public get state(): IndexState {
    return this.indexState;
  }

  /** Message of the most recent failed build, cleared on success. */
  public get lastBuildError(): string | null {
    return this.lastError;
  }

  public get vectorIndex(): VectorIndex {
    return this.index;
  }

  /**
   * Warm-load the saved index, or (when forced or nothing usable is saved)
   * rebuild it from the document source one document at a time.
   *
   * Calls made while a build is running share it, except that a forced
   * rebuild arriving during a non-forced build is queued behind it.
   *
   * @returns Whether the pipeline is indexed by this build.
   */
  public buildIndex(forceRebuild = false): Promise<boolean> {
    if (this.inflight && (this.inflightForced || !forceRebuild)) return this.inflight;

    const running = this.inflight;
    // The earlier caller observes its own outcome; the queued rebuild runs regardless.
    const next = running
      ? running.then(
          () => this.runBuild(true),
          () => this.runBuild(true),
        )
      : this.runBuild(forceRebuild);
    const tracked: Promise<boolean> = next.finally(() => {
      if (this.inflight === tracked) {
        this.inflight = null;
        this.inflightForced = false;
      }
    });
    this.inflight = tracked;
    this.inflightForced = forceRebuild;
    return tracked;
  }

  private async runBuild(forceRebuild: boolean): Promise<boolean> {
    if (!forceRebuild) {
      const loaded = new VectorIndex();
      if (await loaded.load(this.indexDir)) {
        const expected = this.embedder.dimension;
        if (loaded.dimension === expected) {
          log.info({ vectors: loaded.size }, "Loaded existing index");
          this.install(loaded);
          return true;
        }
        log.warn(
          { dir: this.indexDir, saved: loaded.dimension, expected },
          "Saved index was built with a different embedding width; rebuilding",
        );
      }
    }

    log.info({ forceRebuild }, "Building new index");
    let documents: Document[];
    try {
      documents = await this.source.loadAll();
    } catch (e) {
      return this.fail("Failed to load documents", e);
    }
    if (documents.length === 0) return this.fail("No documents found");
    this.status.beginBuild(documents.length);

    // Built aside and swapped in on success; old vectors are replaced, never merged.
    const fresh = new VectorIndex();
    for (const [i, doc] of documents.entries()) {
      log.info(
        { document: doc.filename, position: i + 1, total: documents.length },
        "Processing document",
      );
      try {
        const chunks = this.chunker.chunk(doc);
        if (chunks.length === 0) {
          log.info({ document: doc.filename }, "Document too small to index; skipped");
          this.status.recordSkipped();
          continue;
        }
        const vectors = await this.embedder.embedMany(
          chunks.map((c) => c.text),
          this.batchSize,
        );
        fresh.add(vectors, chunks);
        this.status.recordIndexed(chunks.length);
      } catch (e) {
        if (isProgrammerError(e)) throw e;
        log.error({ document: doc.filename, err: e }, "Failed to index document; skipped");
        this.status.recordSkipped();
      }
    }

    if (fresh.size === 0) return this.fail("No chunks produced from any document");

    try {
      await fresh.save(this.indexDir);
    } catch (e) {
      // The in-memory index is still usable; the next start rebuilds.
      log.error({ dir: this.indexDir, err: e }, "Failed to persist index");
    }
    this.install(fresh);
    log.info({ chunks: fresh.size, documents: documents.length }, "Index built");
    return true;
  }

  private install(index: VectorIndex): void {
    this.index = index;
    this.retriever = new Retriever(index, this.embedder, this.topK);
    this.indexState = transition(this.indexState, "build_succeeded");
    this.lastFailureAt = null;
    this.lastError = null;
    this.status.markReady();
  }

  private fail(message: string, err?: unknown): false {
    log.error({ err }, message);
    this.indexState = transition(this.indexState, "build_failed");
    this.lastFailureAt = this.now();
    this.lastError = err instanceof Error ? `${message}: ${err.message}` : message;
    return false;
  }

  /** Lazy build for the query path, throttled after a failure. */
  private async ensureIndexed(): Promise<boolean> {
    if (this.indexState === IndexState.Indexed) return true;
    if (this.lastFailureAt !== null && this.now() - this.lastFailureAt < this.retryIntervalMs) {
      log.debug({ lastError: this.lastError }, "Skipping lazy build; last attempt failed recently");
      return false;
    }
    log.warn("Index not built. Building now...");
    return this.buildIndex(false);
  }

  /**
   * Retrieve context for `question` and render the grounded prompt. Never
   * throws for the "nothing to answer with" case; that gets the no-context prompt.
   */
  public async query(
    question: string,
    language: Language = "hindi",
    topK = this.topK,
  ): Promise<QueryResult> {
    const empty: QueryResult = {
      context: "",
      sources: [],
      prompt: noContextPrompt(question),
      retrievedChunks: [],
    };
    if (!(await this.ensureIndexed())) return empty;

    const results = await this.retriever.retrieve(question, topK);
    if (results.length === 0) return empty;

    const context = Retriever.formatContext(results);
    const sources = [...new Set(results.map((r) => r.source))];
    return {
      context,
      sources,
      prompt: ragPrompt(question, context, language),
      retrievedChunks: results,
    };
  }

  public async explainScheme(schemeName: string, topK = 5): Promise<string> {
    return schemeExplanationPrompt(schemeName, await this.joinedContext(schemeName, topK));
  }

  public async explainTerm(term: string, topK = 3): Promise<string> {
    return termExplanationPrompt(term, await this.joinedContext(term, topK));
  }

  private async joinedContext(query: string, topK: number): Promise<string> {
    if (!(await this.ensureIndexed())) return NO_RELEVANT_INFO;
    const results = await this.retriever.retrieve(query, topK);
    if (results.length === 0) return NO_RELEVANT_INFO;
    return results.map((r) => r.text).join("\n\n");
  }

  public getStats(): IndexStats {
    if (this.indexState !== IndexState.Indexed) return { status: "not_indexed" };
    return {
      status: "indexed",
      totalVectors: this.index.size,
      dimension: this.index.dimension,
      totalChunks: this.index.entries().length,
      docsDir: this.docsDir,
    };
  }
}
