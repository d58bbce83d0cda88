import path from "node:path";
import { describe, expect, it } from "vitest";
import { APP_VERSION, boolFromEnv, getConfig, intFromEnv } from "../config";

describe("intFromEnv", () => {
  it("falls back to the default for missing or invalid values", () => {
    expect(intFromEnv(undefined, 7, 0)).toBe(7);
    expect(intFromEnv("  ", 7, 0)).toBe(7);
    expect(intFromEnv("abc", 7, 0)).toBe(7);
    expect(intFromEnv("-1", 7, 0)).toBe(7);
  });

  it("floors and clamps valid values", () => {
    expect(intFromEnv("12.7", 7, 0)).toBe(12);
    expect(intFromEnv("500", 7, 0, 100)).toBe(100);
  });
});

describe("boolFromEnv", () => {
  it("accepts common truthy spellings", () => {
    expect(["1", "true", "YES", " on "].map(boolFromEnv)).toEqual([true, true, true, true]);
    expect(["0", "false", "", undefined].map(boolFromEnv)).toEqual([false, false, false, false]);
  });
});

describe("getConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = getConfig({});
    expect(config).toMatchObject({
      DOCS_DIR: path.resolve("data/pdfs"),
      INDEX_DIR: path.resolve("data/processed/index"),
      DOC_EXT: ["pdf", "txt", "md"],
      CHUNK_SIZE: 300,
      CHUNK_OVERLAP: 50,
      MIN_TEXT_LENGTH: 50,
      MAX_TEXT_LENGTH: 100_000,
      MAX_CHUNKS_PER_DOC: 200,
      EMBEDDING_MODEL: "Xenova/paraphrase-multilingual-MiniLM-L12-v2",
      EMBED_BATCH_SIZE: 32,
      TOP_K: 3,
      BUILD_RETRY_INTERVAL_MS: 60_000,
      VERBOSE: false,
      MCP_TRANSPORT: "stdio",
    });
  });

  it("reads and normalizes overrides", () => {
    const config = getConfig({
      DOCS_DIR: "/srv/docs",
      DOC_EXT: ".PDF, txt,",
      CHUNK_SIZE: "99999",
      CHUNK_OVERLAP: "-5",
      TOP_K_RESULTS: "5",
      VERBOSE: "yes",
      MCP_TRANSPORT: "Streamable-HTTP",
    });
    expect(config.DOCS_DIR).toBe("/srv/docs");
    expect(config.DOC_EXT).toEqual(["pdf", "txt"]);
    expect(config.CHUNK_SIZE).toBe(8000);
    expect(config.CHUNK_OVERLAP).toBe(50);
    expect(config.TOP_K).toBe(5);
    expect(config.VERBOSE).toBe(true);
    expect(config.MCP_TRANSPORT).toBe("http");
  });

  it("reads the version from package.json", () => {
    expect(APP_VERSION).toBe("0.4.0");
  });
});
