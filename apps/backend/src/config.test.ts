import { describe, it, expect } from "vitest";
import { loadConfig, validateConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config.LLM_PROVIDER).toBe("openai");
    expect(config.LLM_MODEL).toBe("gpt-4o");
    expect(config.MAX_TOKENS).toBe(2000);
    expect(config.TEMPERATURE).toBe(0.3);
    expect(config.DEFAULT_SAFETY_LEVEL).toBe("medium");
    expect(config.QUEUE_NAME).toBe("playforge-executions");
  });

  it("reads and trims values", () => {
    const config = loadConfig({
      LLM_PROVIDER: "mistral",
      LLM_MODEL: " mistral-small ",
      MAX_TOKENS: "512",
      TEMPERATURE: "not-a-number",
    });
    expect(config.LLM_PROVIDER).toBe("mistral");
    expect(config.LLM_MODEL).toBe("mistral-small");
    expect(config.MAX_TOKENS).toBe(512);
    expect(config.TEMPERATURE).toBe(0.3);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});

describe("validateConfig", () => {
  it("requires the selected provider's key", () => {
    expect(validateConfig(loadConfig({}))).toEqual([
      "OPENAI_API_KEY is required when LLM_PROVIDER is 'openai'",
    ]);
    expect(
      validateConfig(loadConfig({ LLM_PROVIDER: "azure", AZURE_API_KEY: "k" })),
    ).toEqual(["AZURE_RESOURCE_NAME is required when LLM_PROVIDER is 'azure'"]);
  });

  it("reports unknown enumerations and bad ranges", () => {
    const config = loadConfig({
      LLM_PROVIDER: "cohere",
      DEFAULT_SAFETY_LEVEL: "extreme",
      OPENAI_API_KEY: "test-key",
      TEMPERATURE: "3",
      MAX_TOKENS: "0",
    });
    expect(validateConfig(config)).toEqual([
      "Unsupported LLM_PROVIDER: cohere",
      "Unsupported DEFAULT_SAFETY_LEVEL: extreme",
      "MAX_TOKENS must be a positive integer",
      "TEMPERATURE must be between 0 and 2",
    ]);
  });

  it("skips the provider key check when asked", () => {
    const config = loadConfig({ WORKER_CONCURRENCY: "0" });
    expect(validateConfig(config, { requireProviderKey: false })).toEqual([
      "WORKER_CONCURRENCY must be a positive integer",
    ]);
  });

  it("passes a complete config", () => {
    expect(
      validateConfig(
        loadConfig({ LLM_PROVIDER: "deepseek", DEEPSEEK_API_KEY: "test-key" }),
      ),
    ).toEqual([]);
  });
});
