/**
 * Provider capability: one `complete` signature regardless of backend. The
 * concrete backend is chosen once from config (see model-provider.ts).
 */
import createDebug from "debug";
import {
  generateText,
  APICallError,
  LoadAPIKeyError,
  type LanguageModel,
} from "ai";
import type { AppConfig, LLMProviderId } from "../config.js";
import { ProviderError } from "../errors.js";
import { getLanguageModel } from "./model-provider.js";

const debug = createDebug("playforge:llm");

export interface CompletionOptions {
  system?: string;
  maxTokens: number;
  temperature: number;
}

export interface Completion {
  text: string;
  /** "length" means the token budget cut the output short. */
  finishReason: string;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  complete(prompt: string, options: CompletionOptions): Promise<Completion>;
}

/** Map an SDK failure onto the provider error kinds callers act on. */
export function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (LoadAPIKeyError.isInstance(err)) {
    return new ProviderError("auth", err.message);
  }
  if (APICallError.isInstance(err)) {
    const status = err.statusCode;
    if (status === 401 || status === 403) {
      return new ProviderError("auth", err.message);
    }
    if (status === 429) return new ProviderError("quota", err.message);
    return new ProviderError("unknown", err.message);
  }
  return new ProviderError(
    "unknown",
    err instanceof Error ? err.message : String(err),
  );
}

export class AiSdkProvider implements LLMProvider {
  constructor(
    readonly name: LLMProviderId,
    readonly model: string,
    private readonly languageModel: LanguageModel,
  ) {}

  async complete(
    prompt: string,
    options: CompletionOptions,
  ): Promise<Completion> {
    try {
      const result = await generateText({
        model: this.languageModel,
        system: options.system,
        prompt,
        maxOutputTokens: options.maxTokens,
        temperature: options.temperature,
        // Retries are the caller's decision; the bounded wait must hold.
        maxRetries: 0,
      });
      return { text: result.text, finishReason: result.finishReason };
    } catch (err) {
      debug("%s completion failed: %o", this.name, err);
      throw toProviderError(err);
    }
  }
}

/**
 * Build the provider selected by LLM_PROVIDER. Throws ProviderError(auth)
 * when credentials are missing.
 */
export function createLLMProvider(config: AppConfig): LLMProvider {
  return new AiSdkProvider(
    config.LLM_PROVIDER,
    config.LLM_MODEL,
    getLanguageModel(config),
  );
}
