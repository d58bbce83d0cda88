import { afterEach, describe, expect, it, vi } from "vitest";
import { Chunker } from "../chunker";
import { chunkerLogger } from "../logger";
import { doc } from "./helpers";

describe("Chunker", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("produces nothing for empty or short documents", () => {
    const chunker = new Chunker();
    expect(chunker.chunk(doc("empty.txt", ""))).toEqual([]);
    expect(chunker.chunk(doc("short.txt", "short"))).toEqual([]);
    expect(chunker.chunk(doc("edge.txt", "x".repeat(49)))).toEqual([]);
    expect(chunker.chunk(doc("edge.txt", "x".repeat(50)))).toHaveLength(1);
  });

  it("keeps a document shorter than the window as a single chunk", () => {
    const text = "लोन क्या है। यह पैसा उधार लेने की सुविधा है।";
    const chunks = new Chunker({ minTextLength: 20 }).chunk(doc("a.txt", text));
    expect(chunks).toEqual([{ text, source: "a.txt", chunkId: 0, startChar: 0, endChar: 44 }]);
  });

  it("cuts raw windows with overlap when no boundary exists", () => {
    const chunks = new Chunker().chunk(doc("raw.txt", "x".repeat(700)));
    expect(chunks.map((c) => [c.chunkId, c.startChar, c.endChar])).toEqual([
      [0, 0, 300],
      [1, 250, 550],
      [2, 500, 700],
    ]);
  });

  it("ends a window just after a sentence boundary", () => {
    const text = `${"a".repeat(280)}. ${"b".repeat(200)}`;
    const chunks = new Chunker().chunk(doc("s.txt", text));
    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toMatchObject({ startChar: 0, endChar: 281, text: `${"a".repeat(280)}.` });
    expect(chunks[1]).toMatchObject({
      startChar: 231,
      endChar: 482,
      text: `${"a".repeat(49)}. ${"b".repeat(200)}`,
    });
  });

  it("recognizes the Devanagari danda", () => {
    const text = `${"क".repeat(100)}। ${"ख".repeat(250)}`;
    const [first] = new Chunker().chunk(doc("hi.txt", text));
    expect(first.endChar).toBe(101);
    expect(first.text).toBe(`${"क".repeat(100)}।`);
  });

  it("tries boundary markers in priority order", () => {
    // ". " at 250 outranks "? " at 280 even though it is further from the window end.
    const text = `${"a".repeat(250)}. ${"b".repeat(28)}? ${"c".repeat(200)}`;
    expect(new Chunker().windowEnd(text, 0)).toBe(251);
  });

  it("always advances when the overlap is not smaller than the window", () => {
    const chunks = new Chunker({ chunkSize: 10, chunkOverlap: 20, minTextLength: 0 }).chunk(
      doc("w.txt", "w".repeat(60)),
    );
    expect(chunks).toHaveLength(51);
    expect(chunks.map((c) => c.startChar)).toEqual(Array.from({ length: 51 }, (_, i) => i));
    expect(chunks[50].endChar).toBe(60);
  });

  it("skips whitespace-only windows without consuming an id", () => {
    const text = `abcdefghij${" ".repeat(10)}klmnopqrst`;
    const chunks = new Chunker({ chunkSize: 10, chunkOverlap: 0, minTextLength: 0 }).chunk(
      doc("gap.txt", text),
    );
    expect(chunks.map((c) => [c.chunkId, c.startChar, c.text])).toEqual([
      [0, 0, "abcdefghij"],
      [1, 20, "klmnopqrst"],
    ]);
  });

  it("truncates oversized documents and warns", () => {
    const warn = vi.spyOn(chunkerLogger, "warn");
    const chunks = new Chunker({ chunkOverlap: 0, maxTextLength: 1000 }).chunk(
      doc("big.txt", "y".repeat(1500)),
    );
    expect(chunks.map((c) => c.endChar)).toEqual([300, 600, 900, 1000]);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ source: "big.txt", length: 1500 }),
      "Truncating oversized document",
    );
  });

  it("stops at the per-document chunk cap and warns", () => {
    const warn = vi.spyOn(chunkerLogger, "warn");
    const chunks = new Chunker({ maxChunksPerDoc: 5 }).chunk(doc("cap.txt", "z".repeat(10_000)));
    expect(chunks).toHaveLength(5);
    expect(chunks.map((c) => c.chunkId)).toEqual([0, 1, 2, 3, 4]);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ source: "cap.txt", maxChunksPerDoc: 5 }),
      "Chunk cap reached; remaining text dropped",
    );
  });

  it("labels chunks of an unnamed document as unknown", () => {
    const [chunk] = new Chunker().chunk(doc("", "n".repeat(80)));
    expect(chunk.source).toBe("unknown");
  });

  it("keeps every chunk inside the text with start before end", () => {
    const text = "Mudra loan. ".repeat(120);
    const chunks = new Chunker().chunk(doc("m.txt", text));
    for (const c of chunks) {
      expect(c.startChar).toBeLessThan(c.endChar);
      expect(c.endChar).toBeLessThanOrEqual(text.length);
      expect(c.text.length).toBeLessThanOrEqual(300);
      expect(c.text).toBe(text.slice(c.startChar, c.endChar).trim());
    }
  });

  it("chunks a corpus document by document", () => {
    const all = new Chunker().chunkAll([doc("a.txt", "a".repeat(60)), doc("b.txt", "b".repeat(400))]);
    expect(all.map((c) => [c.source, c.chunkId])).toEqual([
      ["a.txt", 0],
      ["b.txt", 0],
      ["b.txt", 1],
    ]);
  });
});
