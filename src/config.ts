import { z } from "zod";
import { ConfigurationError } from "./utils/errors";

/**
 * Default configuration values for the refinement, chunking and evaluation pipeline
 */

/** Hard upper bound for a chunk, in characters */
export const DEFAULT_MAX_CHUNK_SIZE = 1024;

/** Chunks smaller than this are merged into a neighbour when possible */
export const DEFAULT_MIN_CHUNK_SIZE = 200;

/** Characters shared between adjacent chunks */
export const DEFAULT_OVERLAP_SIZE = 128;

/** Size at which the sentence strategy closes a chunk */
export const DEFAULT_TARGET_CHUNK_SIZE = 512;

/** Number of leading characters inspected when resolving the `auto` strategy */
export const STRATEGY_ANALYSIS_SAMPLE_SIZE = 10_000;

/** Number of document keywords propagated to every chunk */
export const DOCUMENT_KEYWORD_COUNT = 8;

/** Default OpenRouter-compatible endpoint */
export const DEFAULT_LLM_BASE_URL = "https://openrouter.ai/api/v1";

/** Default completion model */
export const DEFAULT_LLM_MODEL = "openrouter/auto";

/** Maximum characters of chunk text sent to a completion service per request */
export const DEFAULT_ENRICHMENT_INPUT_LIMIT = 4000;

/** Maximum summary length requested from the completion service */
export const DEFAULT_SUMMARY_LENGTH = 200;

/** Default weights of the six quality metrics in the composite score */
export const DEFAULT_QUALITY_WEIGHTS = {
  semanticCompleteness: 0.25,
  contextPreservation: 0.2,
  informationDensity: 0.15,
  structuralIntegrity: 0.15,
  retrievalReadiness: 0.15,
  boundaryQuality: 0.1,
} as const;

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const llmEnvSchema = z.object({
  OPENAI_API_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
  OPENAI_API_BASE: z.preprocess(
    emptyToUndefined,
    z.string().url().default(DEFAULT_LLM_BASE_URL),
  ),
  MODEL_ID: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_LLM_MODEL)),
  VISION_MODEL_ID: z.preprocess(emptyToUndefined, z.string().optional()),
  OPENROUTER_REFERER: z.preprocess(emptyToUndefined, z.string().url().optional()),
  OPENROUTER_TITLE: z.preprocess(emptyToUndefined, z.string().optional()),
});

/**
 * Connection settings of the OpenRouter-compatible language model services
 */
export interface LlmConfig {
  /** Without a key the services report themselves unavailable */
  apiKey?: string;
  baseURL: string;
  model: string;
  visionModel: string;
  /** Sent as `HTTP-Referer` */
  referer?: string;
  /** Sent as `X-Title` */
  appTitle?: string;
}

/**
 * Reads the language model settings from the environment.
 */
export function loadLlmConfig(env: Record<string, string | undefined> = process.env): LlmConfig {
  const parsed = llmEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment configuration: ${parsed.error.message}`);
  }
  const {
    OPENAI_API_KEY,
    OPENAI_API_BASE,
    MODEL_ID,
    VISION_MODEL_ID,
    OPENROUTER_REFERER,
    OPENROUTER_TITLE,
  } = parsed.data;
  return {
    apiKey: OPENAI_API_KEY,
    baseURL: OPENAI_API_BASE.replace(/\/+$/, ""),
    model: MODEL_ID,
    visionModel: VISION_MODEL_ID ?? MODEL_ID,
    referer: OPENROUTER_REFERER,
    appTitle: OPENROUTER_TITLE,
  };
}
