import { Chunker } from "./chunker";
import type { Config } from "./config";
import { Embedder, TransformersEncoder } from "./embeddings";
import { DirectoryDocumentSource } from "./loader";
import { RagPipeline } from "./pipeline";
import { StatusManager } from "./status";

export interface Runtime {
  encoder: TransformersEncoder;
  pipeline: RagPipeline;
  status: StatusManager;
}

/**
 * Wire loader, chunker, encoder and index together from config. The model is
 * loaded here so a mis-configured model fails at startup rather than on the
 * first query.
 */
export async function createRuntime(config: Config): Promise<Runtime> {
  const status = new StatusManager();
  status.setDirs(config.DOCS_DIR, config.INDEX_DIR);

  const encoder = new TransformersEncoder({
    modelName: config.EMBEDDING_MODEL,
    cacheDir: config.TRANSFORMERS_CACHE,
    offline: config.TRANSFORMERS_OFFLINE,
  });
  await encoder.init();
  status.setModelName(encoder.getModelName());

  const pipeline = new RagPipeline({
    source: new DirectoryDocumentSource({
      dir: config.DOCS_DIR,
      extensions: config.DOC_EXT,
      cacheDir: config.INDEX_DIR,
    }),
    embedder: new Embedder(encoder, config.EMBED_BATCH_SIZE),
    chunker: new Chunker({
      chunkSize: config.CHUNK_SIZE,
      chunkOverlap: config.CHUNK_OVERLAP,
      minTextLength: config.MIN_TEXT_LENGTH,
      maxTextLength: config.MAX_TEXT_LENGTH,
      maxChunksPerDoc: config.MAX_CHUNKS_PER_DOC,
    }),
    indexDir: config.INDEX_DIR,
    docsDir: config.DOCS_DIR,
    topK: config.TOP_K,
    buildRetryIntervalMs: config.BUILD_RETRY_INTERVAL_MS,
    status,
  });
  return { encoder, pipeline, status };
}
