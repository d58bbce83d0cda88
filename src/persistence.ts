import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";
import { indexLogger as log } from "./logger";
import type { Chunk, IndexEntry } from "./types";

export const VECTORS_FILE = "vectors.json";
export const CHUNKS_FILE = "chunks.json";

/**
 * Vector artifact: every vector concatenated in entry order, serialized as
 * base64-encoded 32-bit floats (platform little-endian).
 */
const VectorsFileSchema = z.object({
  version: z.literal(1),
  dimension: z.number().int().positive(),
  count: z.number().int().nonnegative(),
  encoding: z.literal("f32-base64"),
  savedAt: z.string().optional(),
  data: z.string(),
});

/** Chunk artifact. Source and chunk id may be missing in older or hand-edited files. */
const ChunksFileSchema = z.object({
  version: z.literal(1),
  savedAt: z.string().optional(),
  chunks: z.array(
    z.object({
      text: z.string(),
      source: z.string().optional(),
      chunkId: z.number().int().optional(),
      startChar: z.number().int().nonnegative(),
      endChar: z.number().int().nonnegative(),
    }),
  ),
});

export interface LoadedIndex {
  dimension: number;
  entries: IndexEntry[];
}

/**
 * Reads and writes the two index artifacts in one directory. A load either
 * yields a consistent index or null; it never throws.
 */
export class IndexStore {
  public readonly dir: string;

  public constructor(dir: string) {
    this.dir = dir;
  }

  public get vectorsPath(): string {
    return path.join(this.dir, VECTORS_FILE);
  }

  public get chunksPath(): string {
    return path.join(this.dir, CHUNKS_FILE);
  }

  /** True when both artifacts exist (they may still fail validation). */
  public exists(): boolean {
    return fsSync.existsSync(this.vectorsPath) && fsSync.existsSync(this.chunksPath);
  }

  public async save(dimension: number | null, entries: readonly IndexEntry[]): Promise<void> {
    if (dimension === null) {
      log.warn({ dir: this.dir }, "Index has no dimension yet; nothing to save");
      return;
    }
    const flat = new Float32Array(entries.length * dimension);
    entries.forEach((e, i) => flat.set(e.vector, i * dimension));
    const savedAt = new Date().toISOString();
    const vectorsOut = {
      version: 1,
      dimension,
      count: entries.length,
      encoding: "f32-base64",
      savedAt,
      data: Buffer.from(flat.buffer, flat.byteOffset, flat.byteLength).toString("base64"),
    };
    const chunksOut = { version: 1, savedAt, chunks: entries.map((e) => e.chunk) };

    // Both artifacts are staged first so a crash mid-write never replaces just one.
    await fs.mkdir(this.dir, { recursive: true });
    const vectorsTmp = `${this.vectorsPath}.${process.pid}.tmp`;
    const chunksTmp = `${this.chunksPath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(vectorsTmp, JSON.stringify(vectorsOut));
      await fs.writeFile(chunksTmp, JSON.stringify(chunksOut));
      await fs.rename(vectorsTmp, this.vectorsPath);
      await fs.rename(chunksTmp, this.chunksPath);
    } catch (e) {
      await Promise.all([fs.rm(vectorsTmp, { force: true }), fs.rm(chunksTmp, { force: true })]);
      throw e;
    }
    log.info({ dir: this.dir, vectors: entries.length, dimension }, "Index saved");
  }

  public async load(): Promise<LoadedIndex | null> {
    if (!this.exists()) {
      log.warn({ dir: this.dir }, "Index files not found");
      return null;
    }
    try {
      const [rawVectors, rawChunks] = await Promise.all([
        fs.readFile(this.vectorsPath, "utf8"),
        fs.readFile(this.chunksPath, "utf8"),
      ]);
      const vectorsFile = VectorsFileSchema.safeParse(JSON.parse(rawVectors));
      const chunksFile = ChunksFileSchema.safeParse(JSON.parse(rawChunks));
      if (!vectorsFile.success || !chunksFile.success) {
        const issues = [
          ...(vectorsFile.success ? [] : vectorsFile.error.issues),
          ...(chunksFile.success ? [] : chunksFile.error.issues),
        ].map((i) => `${i.path.join(".")}: ${i.message}`);
        log.error({ dir: this.dir, issues }, "Failed to load index: invalid artifact");
        return null;
      }
      const { dimension, count, data } = vectorsFile.data;
      const { chunks } = chunksFile.data;

      const vectorsSavedAt = vectorsFile.data.savedAt;
      const chunksSavedAt = chunksFile.data.savedAt;
      if (vectorsSavedAt && chunksSavedAt && vectorsSavedAt !== chunksSavedAt) {
        log.error(
          { dir: this.dir, vectorsSavedAt, chunksSavedAt },
          "Failed to load index: artifacts come from different saves",
        );
        return null;
      }

      // Copy into a fresh buffer: base64 decoding may hand back an unaligned slice.
      const bytes = new Uint8Array(Buffer.from(data, "base64"));
      if (chunks.length !== count || bytes.byteLength !== count * dimension * 4) {
        log.error(
          { dir: this.dir, count, chunks: chunks.length, bytes: bytes.byteLength, dimension },
          "Failed to load index: artifacts disagree",
        );
        return null;
      }
      const flat = new Float32Array(bytes.buffer);
      const entries: IndexEntry[] = chunks.map((c, i) => {
        const chunk: Chunk = {
          text: c.text,
          source: c.source ?? "",
          chunkId: c.chunkId ?? -1,
          startChar: c.startChar,
          endChar: c.endChar,
        };
        return { vector: flat.slice(i * dimension, (i + 1) * dimension), chunk };
      });
      log.info({ dir: this.dir, vectors: count, dimension }, "Loaded index");
      return { dimension, entries };
    } catch (e) {
      log.error({ dir: this.dir, err: e }, "Failed to load index");
      return null;
    }
  }
}
