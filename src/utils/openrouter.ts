import axios from "axios";
import { z } from "zod";
import type { LlmConfig } from "../config";

export type OpenRouterContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface OpenRouterChatMessage {
  role: "user" | "assistant" | "system";
  /** Plain text, or text and image parts for multimodal models */
  content: string | OpenRouterContentPart[];
}

export interface OpenRouterChatOptions {
  config: LlmConfig;
  messages: OpenRouterChatMessage[];
  /** Overrides the configured model */
  model?: string;
  /** Extra request body fields such as `temperature` or `response_format` */
  extraBody?: Record<string, unknown>;
  signal?: AbortSignal;
}

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
});

/**
 * Calls the chat-completions endpoint of an OpenRouter-compatible API and
 * returns the content of the first choice. Rejects on transport errors and on
 * responses without content.
 */
export async function openrouterChat({
  config,
  messages,
  model = config.model,
  extraBody = {},
  signal,
}: OpenRouterChatOptions): Promise<string> {
  const finalHeaders: Record<string, string> = {
    Authorization: `Bearer ${config.apiKey ?? ""}`,
    "Content-Type": "application/json",
  };
  // OpenRouter attributes requests to an app through these two headers
  if (config.referer) finalHeaders["HTTP-Referer"] = config.referer;
  if (config.appTitle) finalHeaders["X-Title"] = config.appTitle;

  const response = await axios.post(
    `${config.baseURL}/chat/completions`,
    {
      model,
      messages,
      ...extraBody,
    },
    {
      headers: finalHeaders,
      signal,
    },
  );

  const parsed = chatResponseSchema.safeParse(response.data);
  if (!parsed.success) {
    throw new Error(`Unexpected chat completion response: ${parsed.error.message}`);
  }
  const content = parsed.data.choices[0].message.content;
  if (!content) {
    throw new Error("Chat completion returned no content");
  }
  return content;
}

/**
 * Parses the JSON object in a model reply, tolerating surrounding prose and
 * markdown code fences.
 */
export function parseJsonReply(reply: string): unknown {
  const start = reply.indexOf("{");
  const end = reply.lastIndexOf("}");
  if (start === -1 || end < start) {
    throw new Error("Reply contains no JSON object");
  }
  return JSON.parse(reply.slice(start, end + 1));
}
