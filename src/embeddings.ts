import { pipeline, type FeatureExtractionPipeline } from "@xenova/transformers";
import { configureModelCache } from "./cache";
import { ConfigurationError, DimensionMismatchError } from "./errors";
import { embedderLogger as log } from "./logger";
import type { EmbeddingEncoder, Vector } from "./types";

export const DEFAULT_EMBEDDING_MODEL = "Xenova/paraphrase-multilingual-MiniLM-L12-v2";

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

export interface TransformersEncoderOptions {
  modelName?: string;
  cacheDir?: string;
  /** Never download; the model must already be cached. */
  offline?: boolean;
}

/**
 * Multilingual sentence encoder backed by the @xenova/transformers
 * feature-extraction pipeline (mean pooling + L2 normalization).
 * A single instance can be reused for any number of encode calls.
 */
export class TransformersEncoder implements EmbeddingEncoder {
  private readonly modelName: string;
  private readonly cacheDir?: string;
  private readonly offline: boolean;
  private extractor: FeatureExtractionPipeline | null = null;
  private width: number | null = null;

  public constructor(opts: TransformersEncoderOptions = {}) {
    // Resolution precedence: explicit option > EMBEDDING_MODEL env var > default model
    this.modelName =
      opts.modelName?.trim() || process.env.EMBEDDING_MODEL?.trim() || DEFAULT_EMBEDDING_MODEL;
    this.cacheDir = opts.cacheDir;
    this.offline = opts.offline ?? false;
  }

  public getModelName(): string {
    return this.modelName;
  }

  /** Width of every vector this encoder produces. Known after {@link init}. */
  public get dimension(): number {
    if (this.width === null) throw new EmbedderNotInitializedError();
    return this.width;
  }

  /** Lazily configure the cache and load the model (idempotent). */
  public async init(): Promise<void> {
    if (this.extractor) return;
    await configureModelCache({ dir: this.cacheDir, offline: this.offline });
    log.info({ model: this.modelName }, "Loading embedding model");
    this.extractor = await pipeline("feature-extraction", this.modelName);
    // Probe once so the dimension is fixed before anything is indexed.
    this.width = (await this.encodeOne("dimension probe")).length;
    log.info({ model: this.modelName, dimension: this.width }, "Model ready");
  }

  /**
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   */
  public async encodeOne(text: string): Promise<Vector> {
    const [vector] = await this.encodeMany([text]);
    return vector;
  }

  public async encodeMany(texts: string[]): Promise<Vector[]> {
    if (!this.extractor) throw new EmbedderNotInitializedError();
    if (texts.length === 0) return [];
    const output = await this.extractor(texts, { pooling: "mean", normalize: true });
    const data = output.data;
    if (!(data instanceof Float32Array)) {
      throw new Error(`Unexpected embedding tensor type from ${this.modelName}`);
    }
    const width = output.dims[output.dims.length - 1];
    const vectors: Vector[] = [];
    for (let i = 0; i < texts.length; i++) {
      vectors.push(data.slice(i * width, (i + 1) * width));
    }
    return vectors;
  }
}

/**
 * Batches text through an encoder while guaranteeing output order and a
 * stable width. Batch size only trades throughput for memory.
 */
export class Embedder {
  public readonly encoder: EmbeddingEncoder;
  public readonly batchSize: number;

  public constructor(encoder: EmbeddingEncoder, batchSize = 32) {
    this.encoder = encoder;
    this.batchSize = Math.max(1, Math.floor(batchSize));
  }

  public get dimension(): number {
    return this.encoder.dimension;
  }

  public async embedOne(text: string): Promise<Vector> {
    const vector = await this.encoder.encodeOne(text);
    this.checkWidth(vector, "query");
    return vector;
  }

  /** Embed `texts` in batches; position `i` of the output belongs to `texts[i]`. */
  public async embedMany(texts: readonly string[], batchSize = this.batchSize): Promise<Vector[]> {
    const size = Math.max(1, Math.floor(batchSize));
    const out: Vector[] = [];
    for (let i = 0; i < texts.length; i += size) {
      const batch = texts.slice(i, i + size);
      const vectors = await this.encoder.encodeMany(batch);
      if (vectors.length !== batch.length) {
        throw new ConfigurationError(
          `Encoder returned ${vectors.length} vectors for ${batch.length} texts`,
        );
      }
      for (const v of vectors) {
        this.checkWidth(v, "passage");
        out.push(v);
      }
    }
    log.debug({ texts: texts.length, batchSize: size }, "Embedded batch");
    return out;
  }

  private checkWidth(vector: Vector, context: string): void {
    const expected = this.encoder.dimension;
    if (vector.length !== expected) {
      throw new DimensionMismatchError(expected, vector.length, context);
    }
  }
}
