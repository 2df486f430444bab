import { createOpenAI } from "@ai-sdk/openai";
import { createAzure } from "@ai-sdk/azure";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createMistral } from "@ai-sdk/mistral";
import { createDeepSeek } from "@ai-sdk/deepseek";
import type { LanguageModel } from "ai";
import type { AppConfig } from "../config.js";
import { ProviderError } from "../errors.js";

/** AI SDK language model for the configured provider. */
export function getLanguageModel(config: AppConfig): LanguageModel {
  const modelId = config.LLM_MODEL;

  switch (config.LLM_PROVIDER) {
    case "openai": {
      const apiKey = config.OPENAI_API_KEY.trim();
      if (!apiKey) {
        throw new ProviderError(
          "auth",
          "OpenAI provider requires OPENAI_API_KEY.",
        );
      }
      return createOpenAI({ apiKey })(modelId);
    }
    case "azure": {
      const resourceName = config.AZURE_RESOURCE_NAME.trim();
      const apiKey = config.AZURE_API_KEY.trim();
      if (!resourceName || !apiKey) {
        throw new ProviderError(
          "auth",
          "Azure provider requires AZURE_RESOURCE_NAME and AZURE_API_KEY.",
        );
      }
      return createAzure({
        resourceName,
        apiKey,
        apiVersion: config.AZURE_API_VERSION.trim() || undefined,
      })(modelId);
    }
    case "anthropic": {
      const apiKey = config.ANTHROPIC_API_KEY.trim();
      if (!apiKey) {
        throw new ProviderError(
          "auth",
          "Anthropic provider requires ANTHROPIC_API_KEY.",
        );
      }
      return createAnthropic({ apiKey })(modelId);
    }
    case "google": {
      const apiKey = config.GOOGLE_GENERATIVE_AI_API_KEY.trim();
      if (!apiKey) {
        throw new ProviderError(
          "auth",
          "Google Generative AI provider requires " +
            "GOOGLE_GENERATIVE_AI_API_KEY.",
        );
      }
      return createGoogleGenerativeAI({ apiKey })(modelId);
    }
    case "mistral": {
      const apiKey = config.MISTRAL_API_KEY.trim();
      if (!apiKey) {
        throw new ProviderError(
          "auth",
          "Mistral provider requires MISTRAL_API_KEY.",
        );
      }
      return createMistral({ apiKey })(modelId);
    }
    case "deepseek": {
      const apiKey = config.DEEPSEEK_API_KEY.trim();
      if (!apiKey) {
        throw new ProviderError(
          "auth",
          "DeepSeek provider requires DEEPSEEK_API_KEY.",
        );
      }
      return createDeepSeek({ apiKey })(modelId);
    }
    default: {
      const unknown: never = config.LLM_PROVIDER;
      throw new ProviderError(
        "unknown",
        `Unknown LLM provider: ${String(unknown)}`,
      );
    }
  }
}
