import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

// Single dotenv.config() call for the whole process.
// Prefer the project-root .env (resolved from this file) over the working directory's.
const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
(() => {
  const rootEnv = path.join(PROJECT_ROOT, ".env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw = fsSync.readFileSync(path.join(PROJECT_ROOT, "package.json"), "utf8");
    const parsed = PackageJsonSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

/** Application version sourced from package.json. */
export const APP_VERSION: string = readVersion();

export type TransportMode = "stdio" | "http";

export interface Config {
  DOCS_DIR: string;
  INDEX_DIR: string;
  DOC_EXT: string[];
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  MIN_TEXT_LENGTH: number;
  MAX_TEXT_LENGTH: number;
  MAX_CHUNKS_PER_DOC: number;
  EMBEDDING_MODEL: string;
  EMBED_BATCH_SIZE: number;
  TOP_K: number;
  BUILD_RETRY_INTERVAL_MS: number;
  VERBOSE: boolean;
  MCP_TRANSPORT: TransportMode;
  TRANSFORMERS_CACHE: string;
  TRANSFORMERS_OFFLINE: boolean;
}

/**
 * Parse an integer knob. Missing or invalid values fall back to `def`;
 * valid values are floored and clamped to `[min, max]`.
 */
export function intFromEnv(
  raw: string | undefined,
  def: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const v = raw?.trim();
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n) || n < min) return def;
  return Math.min(max, Math.floor(n));
}

/** Tolerant truthy parsing (1/true/yes/on). */
export function boolFromEnv(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const DOCS_DIR = path.resolve(env.DOCS_DIR?.trim() || "data/pdfs");
  const INDEX_DIR = path.resolve(env.INDEX_DIR?.trim() || "data/processed/index");

  const DOC_EXT = env.DOC_EXT?.split(",")
    .map((s) => s.trim().toLowerCase().replace(/^\./, ""))
    .filter(Boolean) ?? ["pdf", "txt", "md"];

  // 300 / 50 suits short government-scheme passages in mixed Hindi/English.
  const CHUNK_SIZE = intFromEnv(env.CHUNK_SIZE, 300, 1, 8000);
  const CHUNK_OVERLAP = intFromEnv(env.CHUNK_OVERLAP, 50, 0, 4000);

  // Memory-safety bounds applied per document.
  const MIN_TEXT_LENGTH = intFromEnv(env.MIN_TEXT_LENGTH, 50, 0, 10_000);
  const MAX_TEXT_LENGTH = intFromEnv(env.MAX_TEXT_LENGTH, 100_000, 1, 10_000_000);
  const MAX_CHUNKS_PER_DOC = intFromEnv(env.MAX_CHUNKS_PER_DOC, 200, 1, 100_000);

  const EMBEDDING_MODEL =
    env.EMBEDDING_MODEL?.trim() || "Xenova/paraphrase-multilingual-MiniLM-L12-v2";
  const EMBED_BATCH_SIZE = intFromEnv(env.EMBED_BATCH_SIZE, 32, 1, 1024);

  const TOP_K = intFromEnv(env.TOP_K_RESULTS, 3, 1, 50);
  const BUILD_RETRY_INTERVAL_MS = intFromEnv(env.BUILD_RETRY_INTERVAL_MS, 60_000, 0);

  const VERBOSE = boolFromEnv(env.VERBOSE);

  const transport = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();
  const MCP_TRANSPORT: TransportMode =
    transport === "http" || transport === "streamable-http" ? "http" : "stdio";

  const TRANSFORMERS_CACHE = path.resolve(
    env.TRANSFORMERS_CACHE?.trim() || ".cache/transformers",
  );
  const TRANSFORMERS_OFFLINE = boolFromEnv(env.TRANSFORMERS_OFFLINE);

  return {
    DOCS_DIR,
    INDEX_DIR,
    DOC_EXT,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    MIN_TEXT_LENGTH,
    MAX_TEXT_LENGTH,
    MAX_CHUNKS_PER_DOC,
    EMBEDDING_MODEL,
    EMBED_BATCH_SIZE,
    TOP_K,
    BUILD_RETRY_INTERVAL_MS,
    VERBOSE,
    MCP_TRANSPORT,
    TRANSFORMERS_CACHE,
    TRANSFORMERS_OFFLINE,
  };
}
