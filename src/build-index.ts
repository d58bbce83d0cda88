/**
 * Build (or warm-load) the index ahead of serving.
 *
 *   npm run build-index -- --rebuild
 */
import { Command } from "commander";
import { APP_VERSION, getConfig } from "./config";
import { logger } from "./logger";
import { createRuntime } from "./runtime";

const program = new Command()
  .name("build-index")
  .description("Chunk, embed and index every document under DOCS_DIR")
  .version(APP_VERSION)
  .option("-r, --rebuild", "ignore any saved index and rebuild from documents", false)
  .option("-d, --docs <dir>", "document directory (overrides DOCS_DIR)")
  .option("-i, --index-dir <dir>", "index directory (overrides INDEX_DIR)")
  .parse();

const opts = program.opts<{ rebuild: boolean; docs?: string; indexDir?: string }>();
const config = getConfig({
  ...process.env,
  ...(opts.docs ? { DOCS_DIR: opts.docs } : {}),
  ...(opts.indexDir ? { INDEX_DIR: opts.indexDir } : {}),
});

const { pipeline } = await createRuntime(config);
const ok = await pipeline.buildIndex(opts.rebuild);
if (!ok) {
  logger.error({ error: pipeline.lastBuildError }, "Index build failed");
  process.exitCode = 1;
} else {
  logger.info({ stats: pipeline.getStats(), indexDir: config.INDEX_DIR }, "Index ready");
}
