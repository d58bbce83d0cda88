import { env } from "@xenova/transformers";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Embedder, EmbedderNotInitializedError, TransformersEncoder } from "../embeddings";
import { ConfigurationError, DimensionMismatchError } from "../errors";
import type { EmbeddingEncoder, Vector } from "../types";
import { HashingEncoder, rmDir, tmpDir } from "./helpers";

const { pipelineMock } = vi.hoisted(() => ({ pipelineMock: vi.fn() }));

vi.mock("@xenova/transformers", () => ({ pipeline: pipelineMock, env: {} }));

/** Fake feature extractor: the i-th text of a call maps to [i+1, i+1, i+1]. */
const extractor = vi.fn(async (texts: string[]) => {
  const data = new Float32Array(texts.length * 3);
  texts.forEach((_, i) => data.fill(i + 1, i * 3, (i + 1) * 3));
  return { data, dims: [texts.length, 3] };
});

describe("TransformersEncoder", () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = tmpDir("rag-model-cache-");
    pipelineMock.mockReset();
    pipelineMock.mockResolvedValue(extractor);
    extractor.mockClear();
  });

  afterEach(() => {
    rmDir(cacheDir);
  });

  it("refuses to encode before init", async () => {
    const encoder = new TransformersEncoder({ cacheDir });
    await expect(encoder.encodeOne("x")).rejects.toBeInstanceOf(EmbedderNotInitializedError);
    expect(() => encoder.dimension).toThrow(EmbedderNotInitializedError);
  });

  it("loads the model once and probes its dimension", async () => {
    const encoder = new TransformersEncoder({ modelName: "test/model", cacheDir });
    await encoder.init();
    await encoder.init();
    expect(pipelineMock).toHaveBeenCalledTimes(1);
    expect(pipelineMock).toHaveBeenCalledWith("feature-extraction", "test/model");
    expect(encoder.dimension).toBe(3);
    expect(encoder.getModelName()).toBe("test/model");
    expect(env.cacheDir).toBe(cacheDir);
    expect(env.allowRemoteModels).toBe(true);
  });

  it("disables downloads in offline mode", async () => {
    await new TransformersEncoder({ cacheDir, offline: true }).init();
    expect(env.allowRemoteModels).toBe(false);
  });

  it("splits a batch output into one vector per text", async () => {
    const encoder = new TransformersEncoder({ cacheDir });
    await encoder.init();
    const vectors = await encoder.encodeMany(["a", "b"]);
    expect(vectors.map((v) => Array.from(v))).toEqual([
      [1, 1, 1],
      [2, 2, 2],
    ]);
    expect(extractor).toHaveBeenLastCalledWith(["a", "b"], { pooling: "mean", normalize: true });
    expect(await encoder.encodeMany([])).toEqual([]);
  });
});

describe("Embedder", () => {
  it("batches texts and preserves their order", async () => {
    const encoder = new HashingEncoder(8);
    const embedder = new Embedder(encoder, 2);
    const texts = ["one", "two", "three", "four", "five"];
    const vectors = await embedder.embedMany(texts);
    expect(encoder.batches).toEqual([2, 2, 1]);
    expect(vectors).toEqual(texts.map((t) => encoder.vectorFor(t)));
  });

  it("produces the same vectors whatever the batch size", async () => {
    const embedder = new Embedder(new HashingEncoder(8));
    const texts = ["alpha beta", "gamma", "delta epsilon", "zeta"];
    expect(await embedder.embedMany(texts, 1)).toEqual(await embedder.embedMany(texts, 3));
  });

  it("returns nothing for no texts", async () => {
    expect(await new Embedder(new HashingEncoder()).embedMany([])).toEqual([]);
  });

  it("rejects vectors whose width differs from the encoder's", async () => {
    const narrow: EmbeddingEncoder = {
      dimension: 4,
      encodeOne: async () => new Float32Array(3),
      encodeMany: async (texts: string[]) => texts.map(() => new Float32Array(3)),
    };
    const embedder = new Embedder(narrow);
    await expect(embedder.embedMany(["x"])).rejects.toThrow(
      "Dimension mismatch for passage: expected 4, got 3",
    );
    await expect(embedder.embedOne("x")).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it("rejects an encoder that drops texts", async () => {
    const lossy: EmbeddingEncoder = {
      dimension: 2,
      encodeOne: async () => new Float32Array(2),
      encodeMany: async (): Promise<Vector[]> => [new Float32Array(2)],
    };
    await expect(new Embedder(lossy).embedMany(["a", "b"])).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });
});
