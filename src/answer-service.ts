import { pipelineLogger } from "./logger";
import type { RagPipeline } from "./pipeline";
import { formatAnswerWithSources } from "./prompts";
import type { Language, TextGenerator } from "./types";

const log = pipelineLogger.child({ component: "answer-service" });

export const NO_INFO_ANSWER =
  "क्षमा करें, मुझे इस प्रश्न का उत्तर देने के लिए पर्याप्त जानकारी नहीं है।";
export const ANSWER_UNAVAILABLE = "क्षमा करें, अभी उत्तर उपलब्ध नहीं है।";
export const SCHEME_UNAVAILABLE = "क्षमा करें, योजना की जानकारी नहीं मिली।";
export const TERM_UNAVAILABLE = "क्षमा करें, शब्द का अर्थ नहीं मिला।";

export interface Answer {
  answer: string;
  sources: string[];
  /** First 500 characters of the context handed to the generator. */
  contextUsed: string;
  /** Mean retrieval score, rounded to 2 decimals; 0 without context. */
  confidence: number;
}

export interface AnswerOptions {
  language?: Language;
  includeSources?: boolean;
}

export interface ServiceStatus {
  ragStatus: "indexed" | "not_indexed";
  totalChunks: number;
  serviceHealthy: boolean;
}

/** Sends the pipeline's grounded prompts to a text generator. */
export class AnswerService {
  private readonly pipeline: RagPipeline;
  private readonly generator: TextGenerator;

  public constructor(pipeline: RagPipeline, generator: TextGenerator) {
    this.pipeline = pipeline;
    this.generator = generator;
  }

  public async answerQuestion(question: string, opts: AnswerOptions = {}): Promise<Answer> {
    const { language = "hindi", includeSources = true } = opts;
    try {
      const rag = await this.pipeline.query(question, language);
      if (!rag.context) {
        return { answer: NO_INFO_ANSWER, sources: [], contextUsed: "", confidence: 0 };
      }

      let answer = await this.generator.generate(rag.prompt, { maxTokens: 400, temperature: 0.3 });
      const mean =
        rag.retrievedChunks.reduce((sum, c) => sum + c.score, 0) / rag.retrievedChunks.length;
      if (includeSources) answer = formatAnswerWithSources(answer, rag.sources);

      return {
        answer,
        sources: rag.sources,
        contextUsed: rag.context.slice(0, 500),
        confidence: Math.round(mean * 100) / 100,
      };
    } catch (e) {
      log.error({ err: e }, "Answer generation failed");
      return { answer: ANSWER_UNAVAILABLE, sources: [], contextUsed: "", confidence: 0 };
    }
  }

  public async explainScheme(schemeName: string, topK?: number): Promise<string> {
    try {
      const prompt = await this.pipeline.explainScheme(schemeName, topK);
      return await this.generator.generate(prompt, { maxTokens: 600, temperature: 0.3 });
    } catch (e) {
      log.error({ err: e, schemeName }, "Scheme explanation failed");
      return SCHEME_UNAVAILABLE;
    }
  }

  public async explainTerm(term: string, topK?: number): Promise<string> {
    try {
      const prompt = await this.pipeline.explainTerm(term, topK);
      return await this.generator.generate(prompt, { maxTokens: 300, temperature: 0.3 });
    } catch (e) {
      log.error({ err: e, term }, "Term explanation failed");
      return TERM_UNAVAILABLE;
    }
  }

  public getServiceStatus(): ServiceStatus {
    const stats = this.pipeline.getStats();
    return {
      ragStatus: stats.status,
      totalChunks: stats.status === "indexed" ? stats.totalChunks : 0,
      serviceHealthy: stats.status === "indexed",
    };
  }
}
