import { z } from "zod";
import type { LlmConfig } from "../config";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { openrouterChat, parseJsonReply } from "../utils/openrouter";
import { EnrichmentError } from "./errors";
import type { ImageTextResult, ImageToTextOptions, ImageToTextService } from "./types";

const imageTextSchema = z.object({
  text: z.string(),
  confidence: z.number().min(0).max(1).default(0.5),
});

/**
 * Image-to-text service backed by a vision model behind an
 * OpenRouter-compatible chat API. Images are sent inline as data URLs.
 */
export class OpenRouterImageToTextService implements ImageToTextService {
  constructor(private readonly config: LlmConfig) {}

  isAvailable(): boolean {
    return Boolean(this.config.apiKey);
  }

  async extractText(
    image: Uint8Array,
    mimeType: string,
    options: ImageToTextOptions = {},
    signal?: AbortSignal,
  ): Promise<ImageTextResult> {
    if (!this.isAvailable()) {
      throw new EnrichmentError("No API key configured", "extractText");
    }

    const hints = [
      options.imageType ? `The image is likely a ${options.imageType}.` : "",
      options.language ? `Answer in ${options.language}.` : "",
    ]
      .filter(Boolean)
      .join(" ");
    const prompt = `Transcribe all text in this image and describe any chart or diagram briefly. ${hints} Reply as JSON: {"text": string, "confidence": 0-1}.`;
    const url = `data:${mimeType};base64,${Buffer.from(image).toString("base64")}`;

    logger.debug(`Calling ${this.config.visionModel} for image text (${image.byteLength} bytes)`);
    let reply: string;
    try {
      reply = await openrouterChat({
        config: this.config,
        model: this.config.visionModel,
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: prompt.replace(/\s+/g, " ").trim() },
              { type: "image_url", image_url: { url } },
            ],
          },
        ],
        extraBody: { temperature: 0 },
        signal,
      });
    } catch (error) {
      const cause = toError(error);
      throw new EnrichmentError(cause.message, "extractText", cause);
    }

    let json: unknown;
    try {
      json = parseJsonReply(reply);
    } catch {
      // Plain-text reply
      return { text: reply.trim(), confidence: 0.5 };
    }
    const parsed = imageTextSchema.safeParse(json);
    if (!parsed.success) {
      throw new EnrichmentError(`Unexpected reply: ${parsed.error.message}`, "extractText");
    }
    return { text: parsed.data.text.trim(), confidence: parsed.data.confidence };
  }
}
