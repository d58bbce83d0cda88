/**
 * In-process stand-ins for the embedding model and document source.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Document, DocumentSource, EmbeddingEncoder, Vector } from "../types";

/** FNV-1a over UTF-16 code units. */
function hash(token: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    h ^= token.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
}

/**
 * Deterministic bag-of-words encoder: each token bumps one bucket, then the
 * vector is L2-normalized. Texts sharing words land close together.
 */
export class HashingEncoder implements EmbeddingEncoder {
  public readonly dimension: number;
  public readonly batches: number[] = [];

  constructor(dimension = 16) {
    this.dimension = dimension;
  }

  public vectorFor(text: string): Vector {
    const v = new Float32Array(this.dimension);
    const tokens = text.toLowerCase().split(/[\s.,!?।]+/).filter(Boolean);
    for (const t of tokens) v[hash(t) % this.dimension] += 1;
    const norm = Math.sqrt(v.reduce((s, x) => s + x * x, 0)) || 1;
    return v.map((x) => x / norm);
  }

  async encodeOne(text: string): Promise<Vector> {
    return this.vectorFor(text);
  }

  async encodeMany(texts: string[]): Promise<Vector[]> {
    this.batches.push(texts.length);
    return texts.map((t) => this.vectorFor(t));
  }
}

/** Encoder returning fixed vectors per text (zeros when unknown). */
export class MapEncoder implements EmbeddingEncoder {
  public readonly dimension: number;
  private readonly map: Record<string, number[]>;

  constructor(map: Record<string, number[]>, dimension = 2) {
    this.map = map;
    this.dimension = dimension;
  }

  async encodeOne(text: string): Promise<Vector> {
    return Float32Array.from(this.map[text] ?? new Array<number>(this.dimension).fill(0));
  }

  async encodeMany(texts: string[]): Promise<Vector[]> {
    return Promise.all(texts.map((t) => this.encodeOne(t)));
  }
}

export class InMemorySource implements DocumentSource {
  public documents: Document[];
  public calls = 0;

  constructor(documents: Document[] = []) {
    this.documents = documents;
  }

  async loadAll(): Promise<Document[]> {
    this.calls++;
    return [...this.documents];
  }
}

export function doc(filename: string, text: string): Document {
  return { filename, text, pageCount: 1, sourcePath: `/docs/${filename}` };
}

export function tmpDir(prefix = "rag-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function rmDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
