import axios from "axios";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { LlmConfig } from "../config";
import { EnrichmentError } from "./errors";
import { OpenRouterCompletionService } from "./OpenRouterCompletionService";

vi.mock("axios");
vi.mock("../utils/logger");
const mockedAxios = vi.mocked(axios, true);

const config: LlmConfig = {
  apiKey: "test-secret",
  baseURL: "https://llm.example.com/v1",
  model: "test-model",
  visionModel: "test-vision-model",
};

const reply = (content: string | null) => ({ data: { choices: [{ message: { content } }] } });

describe("OpenRouterCompletionService", () => {
  beforeEach(() => {
    mockedAxios.post.mockReset();
  });

  it("reports availability from the API key", () => {
    expect(new OpenRouterCompletionService(config).isAvailable()).toBe(true);
    expect(new OpenRouterCompletionService({ ...config, apiKey: undefined }).isAvailable()).toBe(
      false,
    );
  });

  it("sends a plain prompt to the chat completions endpoint", async () => {
    mockedAxios.post.mockResolvedValue(reply("Generated text"));
    const service = new OpenRouterCompletionService(config);

    await expect(service.generate("Say something")).resolves.toBe("Generated text");
    expect(mockedAxios.post).toHaveBeenCalledWith(
      "https://llm.example.com/v1/chat/completions",
      { model: "test-model", messages: [{ role: "user", content: "Say something" }] },
      {
        headers: { Authorization: "Bearer test-secret", "Content-Type": "application/json" },
        signal: undefined,
      },
    );
  });

  it("sends the app attribution headers when configured", async () => {
    mockedAxios.post.mockResolvedValue(reply("Generated text"));
    const service = new OpenRouterCompletionService({
      ...config,
      referer: "https://docs.example.com",
      appTitle: "Docs",
    });

    await service.generate("Say something");

    expect(mockedAxios.post.mock.calls[0][2]).toEqual({
      headers: {
        Authorization: "Bearer test-secret",
        "Content-Type": "application/json",
        "HTTP-Referer": "https://docs.example.com",
        "X-Title": "Docs",
      },
      signal: undefined,
    });
  });

  it("parses a JSON summary wrapped in a code fence", async () => {
    mockedAxios.post.mockResolvedValue(
      reply('```json\n{"summary": "  Installing the tool.  ", "keywords": ["install"]}\n```'),
    );
    const service = new OpenRouterCompletionService(config);

    await expect(service.summarize("Install the tool with npm.", 200)).resolves.toEqual({
      summary: "Installing the tool.",
      keywords: ["install"],
    });
    const body = mockedAxios.post.mock.calls[0][1];
    expect(body).toMatchObject({ response_format: { type: "json_object" }, temperature: 0 });
  });

  it("fills defaults for missing metadata lists", async () => {
    mockedAxios.post.mockResolvedValue(reply('{"topic": "Networking"}'));
    const service = new OpenRouterCompletionService(config);

    await expect(service.extractMetadata("Routers forward packets.", "MD")).resolves.toEqual({
      keywords: [],
      entities: [],
      topic: "Networking",
    });
  });

  it("rejects a reply without JSON", async () => {
    mockedAxios.post.mockResolvedValue(reply("I cannot help with that."));
    const service = new OpenRouterCompletionService(config);

    const result = service.assessQuality("Some text.");
    await expect(result).rejects.toBeInstanceOf(EnrichmentError);
    await expect(result).rejects.toThrow("assessQuality failed: Reply is not valid JSON");
  });

  it("rejects scores outside the unit range", async () => {
    mockedAxios.post.mockResolvedValue(
      reply('{"clarity": 2, "completeness": 0.5, "relevance": 0.5, "overall": 0.5}'),
    );
    const service = new OpenRouterCompletionService(config);

    await expect(service.assessQuality("Some text.")).rejects.toThrow(
      /^assessQuality failed: Unexpected reply/,
    );
  });

  it("wraps transport errors", async () => {
    mockedAxios.post.mockRejectedValue(new Error("socket hang up"));
    const service = new OpenRouterCompletionService(config);

    await expect(service.generate("Hello")).rejects.toThrow("generate failed: socket hang up");
  });

  it("rejects a response without content", async () => {
    mockedAxios.post.mockResolvedValue(reply(null));
    const service = new OpenRouterCompletionService(config);

    await expect(service.generate("Hello")).rejects.toThrow(
      "generate failed: Chat completion returned no content",
    );
  });

  it("never calls the API without a key", async () => {
    const service = new OpenRouterCompletionService({ ...config, apiKey: undefined });

    await expect(service.generate("Hello")).rejects.toThrow(
      "generate failed: No API key configured",
    );
    expect(mockedAxios.post).not.toHaveBeenCalled();
  });

  it("truncates long input to the configured limit", async () => {
    mockedAxios.post.mockResolvedValue(reply('{"sections": [], "confidence": 0.4}'));
    const service = new OpenRouterCompletionService(config, 10);

    await service.analyzeStructure("x".repeat(50), "TXT");
    const body = mockedAxios.post.mock.calls[0][1];
    expect(JSON.stringify(body)).not.toContain("x".repeat(11));
  });
});
