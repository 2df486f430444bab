/**
 * Script generator: request → prompt → provider → extracted playbook → safety
 * verdict → GenerationResult. Provider failures come back as an invalid
 * result, never as a thrown error.
 */
import createDebug from "debug";
import type { AppConfig } from "../config.js";
import { ProviderError } from "../errors.js";
import type { LLMProvider } from "../llm/provider.js";
import { toProviderError } from "../llm/provider.js";
import { evaluate } from "../safety/policy.js";
import type {
  GenerationMetadata,
  GenerationRequest,
  GenerationResult,
  SafetyLevel,
} from "../types.js";
import { runWithTimeout } from "../utils/helpers.js";
import { extractScript } from "./extract.js";
import { buildGenerationPrompt, SYSTEM_INSTRUCTIONS } from "./prompts.js";

const debug = createDebug("playforge:generator");

export const TRUNCATED_OUTPUT = "truncated output";

export type GeneratorSettings = Pick<
  AppConfig,
  "MAX_TOKENS" | "TEMPERATURE" | "LLM_TIMEOUT_MS" | "DEFAULT_SAFETY_LEVEL"
>;

export interface ScriptGeneratorOptions {
  provider: LLMProvider;
  settings: GeneratorSettings;
  /** Prompt template; defaults to the loaded generate-playbook prompt. */
  promptTemplate?: string;
  now?: () => Date;
}

export class ScriptGenerator {
  private readonly provider: LLMProvider;
  private readonly settings: GeneratorSettings;
  private readonly promptTemplate?: string;
  private readonly now: () => Date;

  constructor(options: ScriptGeneratorOptions) {
    this.provider = options.provider;
    this.settings = options.settings;
    this.promptTemplate = options.promptTemplate;
    this.now = options.now ?? (() => new Date());
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const level = request.safetyLevel ?? this.settings.DEFAULT_SAFETY_LEVEL;
    const metadata = this.metadata(level, request.variables);
    const prompt = buildGenerationPrompt(request, this.promptTemplate);

    let text: string;
    let finishReason: string;
    try {
      const completion = await runWithTimeout(
        () =>
          this.provider.complete(prompt, {
            system: SYSTEM_INSTRUCTIONS,
            maxTokens: this.settings.MAX_TOKENS,
            temperature: this.settings.TEMPERATURE,
          }),
        this.settings.LLM_TIMEOUT_MS,
        new ProviderError(
          "timeout",
          `No response within ${this.settings.LLM_TIMEOUT_MS}ms`,
        ),
      );
      text = completion.text;
      finishReason = completion.finishReason;
    } catch (err) {
      const providerError = toProviderError(err);
      debug(
        "provider %s failed (%s): %s",
        this.provider.name,
        providerError.kind,
        providerError.message,
      );
      return Object.freeze({
        script: null,
        isValid: false,
        errors: [
          `Provider error (${providerError.kind}): ${providerError.message}`,
        ],
        warnings: [],
        safetyScore: 0,
        requiresApproval: false,
        metadata,
      });
    }

    const script = extractScript(text);
    if (finishReason === "length") {
      debug("provider %s hit the token limit", this.provider.name);
      return Object.freeze({
        script,
        isValid: false,
        errors: [TRUNCATED_OUTPUT],
        warnings: [],
        safetyScore: 0,
        requiresApproval: false,
        metadata,
      });
    }

    return this.validate(script, level, metadata);
  }

  /** Score an existing script (e.g. operator-edited) without the provider. */
  validate(
    script: string,
    level: SafetyLevel = this.settings.DEFAULT_SAFETY_LEVEL,
    metadata: Readonly<GenerationMetadata> = this.metadata(level),
  ): GenerationResult {
    const verdict = evaluate(script, level);
    debug(
      "generated script scored %d at %s (valid=%s)",
      verdict.score,
      level,
      verdict.accepted,
    );
    return Object.freeze({
      script,
      isValid: verdict.accepted,
      errors: verdict.errors,
      warnings: verdict.warnings,
      safetyScore: verdict.score,
      requiresApproval: verdict.requiresApproval,
      metadata,
    });
  }

  private metadata(
    level: SafetyLevel,
    variables?: Readonly<Record<string, unknown>>,
  ): Readonly<GenerationMetadata> {
    return Object.freeze({
      provider: this.provider.name,
      model: this.provider.model,
      timestamp: this.now().toISOString(),
      safetyLevel: level,
      ...(variables ? { variables: Object.freeze({ ...variables }) } : {}),
    });
  }
}
