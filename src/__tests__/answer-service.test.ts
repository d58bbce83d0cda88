import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import {
  ANSWER_UNAVAILABLE,
  AnswerService,
  NO_INFO_ANSWER,
  SCHEME_UNAVAILABLE,
  TERM_UNAVAILABLE,
} from "../answer-service";
import { Chunker } from "../chunker";
import { Embedder } from "../embeddings";
import { RagPipeline } from "../pipeline";
import type { GenerateOptions, TextGenerator } from "../types";
import { HashingEncoder, InMemorySource, doc, rmDir, tmpDir } from "./helpers";

const DOCS = [
  doc("kcc.txt", "Kisan Credit Card gives farmers short term credit for crops."),
  doc("mudra.txt", "Mudra Yojana gives loans up to 10 lakhs to small businesses."),
];

describe("AnswerService", () => {
  let indexDir: string;
  let generate: Mock<(prompt: string, options: GenerateOptions) => Promise<string>>;
  let generator: TextGenerator;

  beforeEach(() => {
    indexDir = tmpDir("rag-answers-");
    generate = vi.fn<(prompt: string, options: GenerateOptions) => Promise<string>>(
      async () => "Generated answer",
    );
    generator = { generate };
  });

  afterEach(() => {
    rmDir(indexDir);
  });

  function pipelineOver(documents = DOCS): RagPipeline {
    return new RagPipeline({
      source: new InMemorySource(documents),
      embedder: new Embedder(new HashingEncoder()),
      indexDir,
      chunker: new Chunker({ minTextLength: 20 }),
    });
  }

  it("generates from the grounded prompt and appends sources", async () => {
    const pipeline = pipelineOver();
    const service = new AnswerService(pipeline, generator);
    const answer = await service.answerQuestion("Mudra loan", { language: "english" });

    const rag = await pipeline.query("Mudra loan", "english");
    const mean = rag.retrievedChunks.reduce((s, c) => s + c.score, 0) / rag.retrievedChunks.length;
    expect(generate).toHaveBeenCalledWith(rag.prompt, { maxTokens: 400, temperature: 0.3 });
    expect(answer).toEqual({
      answer: `Generated answer\n\n📚 स्रोत: ${rag.sources.join(", ")}`,
      sources: rag.sources,
      contextUsed: rag.context.slice(0, 500),
      confidence: Math.round(mean * 100) / 100,
    });
  });

  it("omits the source line on request", async () => {
    const service = new AnswerService(pipelineOver(), generator);
    const answer = await service.answerQuestion("Mudra loan", { includeSources: false });
    expect(answer.answer).toBe("Generated answer");
  });

  it("does not call the generator without context", async () => {
    const service = new AnswerService(pipelineOver([]), generator);
    expect(await service.answerQuestion("anything")).toEqual({
      answer: NO_INFO_ANSWER,
      sources: [],
      contextUsed: "",
      confidence: 0,
    });
    expect(generate).not.toHaveBeenCalled();
  });

  it("falls back when generation fails", async () => {
    generate.mockRejectedValue(new Error("model offline"));
    const service = new AnswerService(pipelineOver(), generator);
    expect((await service.answerQuestion("Mudra loan")).answer).toBe(ANSWER_UNAVAILABLE);
    expect(await service.explainScheme("Mudra")).toBe(SCHEME_UNAVAILABLE);
    expect(await service.explainTerm("EMI")).toBe(TERM_UNAVAILABLE);
  });

  it("explains schemes and terms with their token budgets", async () => {
    const service = new AnswerService(pipelineOver(), generator);
    expect(await service.explainScheme("Mudra Yojana")).toBe("Generated answer");
    expect(generate).toHaveBeenLastCalledWith(expect.stringContaining('"Mudra Yojana" योजना'), {
      maxTokens: 600,
      temperature: 0.3,
    });
    expect(await service.explainTerm("credit")).toBe("Generated answer");
    expect(generate).toHaveBeenLastCalledWith(expect.stringContaining('"credit" का मतलब'), {
      maxTokens: 300,
      temperature: 0.3,
    });
  });

  it("reports service health from the index", async () => {
    const pipeline = pipelineOver();
    const service = new AnswerService(pipeline, generator);
    expect(service.getServiceStatus()).toEqual({
      ragStatus: "not_indexed",
      totalChunks: 0,
      serviceHealthy: false,
    });
    await pipeline.buildIndex(true);
    expect(service.getServiceStatus()).toEqual({
      ragStatus: "indexed",
      totalChunks: 2,
      serviceHealthy: true,
    });
  });
});
