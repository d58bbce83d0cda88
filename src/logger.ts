/**
 * Pino-based structured logging.
 *
 * Everything goes to stderr: stdout is reserved for the MCP stdio transport,
 * and a stray line there corrupts the JSON-RPC stream.
 */
import pino from "pino";

const isProd = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";
const pretty = !isProd && !isTest && process.stderr.isTTY;

export const logger = pino(
  {
    level: process.env.LOG_LEVEL?.trim() || (isTest ? "silent" : "info"),
    transport: pretty
      ? {
          target: "pino-pretty",
          options: {
            destination: 2,
            colorize: true,
            ignore: "pid,hostname",
            translateTime: "HH:MM:ss",
          },
        }
      : undefined,
  },
  pretty ? undefined : pino.destination(2),
);

// Child loggers per pipeline component
export const chunkerLogger = logger.child({ module: "chunker" });
export const embedderLogger = logger.child({ module: "embedder" });
export const indexLogger = logger.child({ module: "index" });
export const retrieverLogger = logger.child({ module: "retriever" });
export const pipelineLogger = logger.child({ module: "pipeline" });
export const loaderLogger = logger.child({ module: "loader" });
export const pdfLogger = logger.child({ module: "pdf" });
export const serverLogger = logger.child({ module: "server" });
