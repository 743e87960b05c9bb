import { describe, expect, it } from "vitest";
import { DEFAULT_LLM_BASE_URL, DEFAULT_LLM_MODEL, loadLlmConfig } from "./config";
import { ConfigurationError } from "./utils/errors";

describe("loadLlmConfig", () => {
  it("uses the defaults for an empty environment", () => {
    expect(loadLlmConfig({})).toEqual({
      apiKey: undefined,
      baseURL: DEFAULT_LLM_BASE_URL,
      model: DEFAULT_LLM_MODEL,
      visionModel: DEFAULT_LLM_MODEL,
    });
  });

  it("reads the key, endpoint and models", () => {
    const config = loadLlmConfig({
      OPENAI_API_KEY: "test-secret",
      OPENAI_API_BASE: "https://llm.example.com/v1/",
      MODEL_ID: "text-model",
      VISION_MODEL_ID: "vision-model",
      OPENROUTER_REFERER: "https://docs.example.com",
      OPENROUTER_TITLE: "Docs",
    });

    expect(config).toEqual({
      apiKey: "test-secret",
      baseURL: "https://llm.example.com/v1",
      model: "text-model",
      visionModel: "vision-model",
      referer: "https://docs.example.com",
      appTitle: "Docs",
    });
  });

  it("treats empty values as unset", () => {
    const config = loadLlmConfig({ OPENAI_API_KEY: "", MODEL_ID: "text-model", VISION_MODEL_ID: "" });

    expect(config.apiKey).toBeUndefined();
    expect(config.visionModel).toBe("text-model");
  });

  it("rejects an invalid endpoint", () => {
    expect(() => loadLlmConfig({ OPENAI_API_BASE: "not a url" })).toThrow(ConfigurationError);
  });
});
