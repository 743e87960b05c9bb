import { z } from "zod";
import { DEFAULT_ENRICHMENT_INPUT_LIMIT, type LlmConfig } from "../config";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { type OpenRouterChatMessage, openrouterChat, parseJsonReply } from "../utils/openrouter";
import { truncate } from "../utils/string";
import { EnrichmentError } from "./errors";
import type {
  MetadataResult,
  QualityAssessment,
  StructureAnalysis,
  SummaryResult,
  TextCompletionService,
} from "./types";

const score = z.number().min(0).max(1);

const structureSchema = z.object({
  sections: z.array(
    z.object({
      title: z.string(),
      level: z.number().int().min(1).max(6),
      start: z.number().int().nonnegative().optional(),
    }),
  ),
  confidence: score,
});

const summarySchema = z.object({
  summary: z.string(),
  keywords: z.array(z.string()).default([]),
});

const metadataSchema = z.object({
  keywords: z.array(z.string()).default([]),
  entities: z.array(z.string()).default([]),
  topic: z.string().optional(),
  domain: z.string().optional(),
});

const qualitySchema = z.object({
  clarity: score,
  completeness: score,
  relevance: score,
  overall: score,
});

const SYSTEM_PROMPT =
  "You analyze documents for a retrieval pipeline. When asked for JSON, reply with a single JSON object and nothing else.";

/**
 * Text-completion service backed by an OpenRouter-compatible chat API. The
 * structured operations request JSON replies and validate them; any transport
 * or validation failure rejects with an EnrichmentError.
 */
export class OpenRouterCompletionService implements TextCompletionService {
  constructor(
    private readonly config: LlmConfig,
    private readonly inputLimit = DEFAULT_ENRICHMENT_INPUT_LIMIT,
  ) {}

  isAvailable(): boolean {
    return Boolean(this.config.apiKey);
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    return this.chat("generate", [{ role: "user", content: prompt }], {}, signal);
  }

  async analyzeStructure(
    text: string,
    documentType: string,
    signal?: AbortSignal,
  ): Promise<StructureAnalysis> {
    return this.requestJson(
      "analyzeStructure",
      structureSchema,
      `Identify the sections of this ${documentType} document. Reply as JSON: {"sections": [{"title": string, "level": 1-6, "start": character offset}], "confidence": 0-1}.\n\n${this.limit(text)}`,
      signal,
    );
  }

  async summarize(text: string, maxLength: number, signal?: AbortSignal): Promise<SummaryResult> {
    const result = await this.requestJson(
      "summarize",
      summarySchema,
      `Summarize the following text in at most ${maxLength} characters and list up to 8 keywords. Reply as JSON: {"summary": string, "keywords": string[]}.\n\n${this.limit(text)}`,
      signal,
    );
    return { summary: truncate(result.summary.trim(), maxLength), keywords: result.keywords };
  }

  async extractMetadata(
    text: string,
    documentType: string,
    signal?: AbortSignal,
  ): Promise<MetadataResult> {
    return this.requestJson(
      "extractMetadata",
      metadataSchema,
      `Extract metadata from this ${documentType} document. Reply as JSON: {"keywords": string[], "entities": string[], "topic": string, "domain": string}.\n\n${this.limit(text)}`,
      signal,
    );
  }

  async assessQuality(text: string, signal?: AbortSignal): Promise<QualityAssessment> {
    return this.requestJson(
      "assessQuality",
      qualitySchema,
      `Rate this text for clarity, completeness and relevance as a standalone retrieval passage. Reply as JSON with scores between 0 and 1: {"clarity": number, "completeness": number, "relevance": number, "overall": number}.\n\n${this.limit(text)}`,
      signal,
    );
  }

  private limit(text: string): string {
    return truncate(text, this.inputLimit);
  }

  private async requestJson<T>(
    operation: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    prompt: string,
    signal?: AbortSignal,
  ): Promise<T> {
    const reply = await this.chat(
      operation,
      [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      { response_format: { type: "json_object" }, temperature: 0 },
      signal,
    );

    let json: unknown;
    try {
      json = parseJsonReply(reply);
    } catch (error) {
      throw new EnrichmentError("Reply is not valid JSON", operation, toError(error));
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new EnrichmentError(`Unexpected reply: ${parsed.error.message}`, operation);
    }
    return parsed.data;
  }

  private async chat(
    operation: string,
    messages: OpenRouterChatMessage[],
    extraBody: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<string> {
    if (!this.isAvailable()) {
      throw new EnrichmentError("No API key configured", operation);
    }
    logger.debug(`Calling ${this.config.model} for ${operation}`);
    try {
      return await openrouterChat({ config: this.config, messages, extraBody, signal });
    } catch (error) {
      const cause = toError(error);
      throw new EnrichmentError(cause.message, operation, cause);
    }
  }
}
