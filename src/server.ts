/**
 * MCP server factory.
 *
 * Tool contracts:
 *  rag_query        { query, language?, top_k? }          -> QueryResult (context, sources, prompt, retrievedChunks)
 *  explain_scheme   { name, top_k?, generate? }           -> prompt string, or the generated explanation
 *  explain_term     { term, top_k?, generate? }           -> prompt string, or the generated explanation
 *  answer_question  { question, language?, include_sources? } -> Answer, generated by the client via sampling
 *  index_stats      {}                                    -> IndexStats + service health
 *  rebuild_index    {}                                    -> { rebuilt, stats }
 *
 * Bad arguments raise InvalidParams; unknown tools raise MethodNotFound.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { AnswerService } from "./answer-service";
import { APP_VERSION } from "./config";
import { parseLanguage } from "./language";
import { serverLogger as log } from "./logger";
import type { RagPipeline } from "./pipeline";
import type { GenerateOptions, TextGenerator } from "./types";

export const SERVER_NAME = "finlit-rag-server";

const TopK = z.number().int().min(1).max(50).optional();

const RagQueryArgs = z.object({
  query: z.string().trim().min(1),
  language: z.string().optional(),
  top_k: TopK,
});
const Generate = z.boolean().optional();
const ExplainSchemeArgs = z.object({ name: z.string().trim().min(1), top_k: TopK, generate: Generate });
const ExplainTermArgs = z.object({ term: z.string().trim().min(1), top_k: TopK, generate: Generate });
const AnswerArgs = z.object({
  question: z.string().trim().min(1),
  language: z.string().optional(),
  include_sources: z.boolean().optional(),
});

const TextBlock = z.object({ type: z.literal("text"), text: z.string() });

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`);
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

function jsonResult(value: unknown): CallToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

/**
 * Text generator that asks the connected MCP client to run the prompt
 * (sampling/createMessage). The client decides which model answers.
 */
export class SamplingGenerator implements TextGenerator {
  private readonly server: Server;

  public constructor(server: Server) {
    this.server = server;
  }

  public async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const result = await this.server.createMessage({
      messages: [{ role: "user", content: { type: "text", text: prompt } }],
      maxTokens: options.maxTokens,
      temperature: options.temperature,
    });
    const content: unknown = result.content;
    const blocks: unknown[] = Array.isArray(content) ? content : [content];
    const text = blocks
      .map((b) => TextBlock.safeParse(b))
      .flatMap((p) => (p.success ? [p.data.text] : []))
      .join("")
      .trim();
    if (!text) throw new Error("Sampling response contained no text");
    return text;
  }
}

const TOOLS = [
  {
    name: "rag_query",
    description:
      "Search the indexed banking / government-scheme documents and return a grounded prompt with its context, source filenames and scored chunks.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "User question in Hindi or English." },
        language: {
          type: "string",
          enum: ["hindi", "english"],
          description: "Prompt language. Detected from the query when omitted.",
        },
        top_k: {
          type: "number",
          description: "Number of chunks to retrieve (1-50). Defaults to the server setting.",
          minimum: 1,
          maximum: 50,
        },
      },
      required: ["query"],
    },
  },
  {
    name: "explain_scheme",
    description:
      "Build a prompt that explains a government scheme in simple Hindi, or with generate=true have the client answer it.",
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string", description: "Scheme name, e.g. 'Kisan Credit Card'." },
        top_k: { type: "number", minimum: 1, maximum: 50, description: "Chunks to use (default 5)." },
        generate: { type: "boolean", description: "Return the generated explanation instead of the prompt." },
      },
      required: ["name"],
    },
  },
  {
    name: "explain_term",
    description:
      "Build a prompt that explains a banking term in simple Hindi, or with generate=true have the client answer it.",
    inputSchema: {
      type: "object",
      properties: {
        term: { type: "string", description: "Banking or financial term, e.g. 'EMI'." },
        top_k: { type: "number", minimum: 1, maximum: 50, description: "Chunks to use (default 3)." },
        generate: { type: "boolean", description: "Return the generated explanation instead of the prompt." },
      },
      required: ["term"],
    },
  },
  {
    name: "answer_question",
    description:
      "Answer a question from the indexed documents. The answer is generated by the calling client through MCP sampling.",
    inputSchema: {
      type: "object",
      properties: {
        question: { type: "string" },
        language: { type: "string", enum: ["hindi", "english"] },
        include_sources: { type: "boolean", description: "Append source filenames (default true)." },
      },
      required: ["question"],
    },
  },
  {
    name: "index_stats",
    description: "Report index status, vector count, dimension, chunk count and answer-service health.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "rebuild_index",
    description: "Rebuild the index from the document directory, replacing the current one.",
    inputSchema: { type: "object", properties: {} },
  },
] satisfies Tool[];

/**
 * Construct a new MCP Server over a shared pipeline. HTTP mode creates one per
 * session; the pipeline (and its index) is shared across all of them.
 */
export function createServer(pipeline: RagPipeline): Server {
  const server = new Server(
    { name: SERVER_NAME, version: APP_VERSION },
    { capabilities: { tools: {} } },
  );
  const answers = new AnswerService(pipeline, new SamplingGenerator(server));

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const { name, arguments: args } = req.params;
    log.debug({ tool: name }, "Tool call");

    switch (name) {
      case "rag_query": {
        const { query, language, top_k } = parseArgs(RagQueryArgs, args);
        return jsonResult(await pipeline.query(query, parseLanguage(language, query), top_k));
      }
      case "explain_scheme": {
        const { name: scheme, top_k, generate } = parseArgs(ExplainSchemeArgs, args);
        return textResult(
          generate
            ? await answers.explainScheme(scheme, top_k)
            : await pipeline.explainScheme(scheme, top_k),
        );
      }
      case "explain_term": {
        const { term, top_k, generate } = parseArgs(ExplainTermArgs, args);
        return textResult(
          generate ? await answers.explainTerm(term, top_k) : await pipeline.explainTerm(term, top_k),
        );
      }
      case "answer_question": {
        const { question, language, include_sources } = parseArgs(AnswerArgs, args);
        return jsonResult(
          await answers.answerQuestion(question, {
            language: parseLanguage(language, question),
            includeSources: include_sources,
          }),
        );
      }
      case "index_stats":
        return jsonResult({ ...pipeline.getStats(), service: answers.getServiceStatus() });
      case "rebuild_index": {
        const rebuilt = await pipeline.buildIndex(true);
        return jsonResult({ rebuilt, stats: pipeline.getStats(), error: pipeline.lastBuildError });
      }
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  });

  return server;
}
