/**
 * Application entry point.
 *
 * 1. Parse env configuration (.env at the project root is honored).
 * 2. Load the multilingual embedding model.
 * 3. Warm-load the saved index from INDEX_DIR, or build it from DOCS_DIR.
 * 4. Serve MCP over stdio (default) or streamable HTTP (MCP_TRANSPORT=http).
 *
 * A failed build does not stop the server: queries answer with the
 * no-context prompt and retry the build lazily (see BUILD_RETRY_INTERVAL_MS).
 */
import { getConfig } from "./config";
import { logger } from "./logger";
import { createRuntime } from "./runtime";
import { createServer } from "./server";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();
if (config.VERBOSE && logger.level !== "debug") logger.level = "debug";

const { pipeline, status } = await createRuntime(config);

const ready = await pipeline.buildIndex(false);
if (!ready) {
  logger.warn({ error: pipeline.lastBuildError }, "Starting without an index");
}

if (config.MCP_TRANSPORT === "http") {
  status.markTransport("http");
  await startHttpTransport({
    createServer: () => createServer(pipeline),
    status,
    stats: () => pipeline.getStats(),
  });
} else {
  status.markTransport("stdio");
  await startStdioTransport(() => createServer(pipeline));
}
