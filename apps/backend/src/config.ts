import { join } from "path";
import { z } from "zod";
import { WORKSPACE_ROOT, str, num, type EnvSource } from "./env.js";
import type { SafetyLevel } from "./types.js";

/** LLM provider identifier for playbook generation. */
export type LLMProviderId =
  | "openai"
  | "azure"
  | "anthropic"
  | "google"
  | "mistral"
  | "deepseek";

export const LLM_PROVIDER_IDS = [
  "openai",
  "azure",
  "anthropic",
  "google",
  "mistral",
  "deepseek",
] as const satisfies readonly LLMProviderId[];

const DEFAULT_MODELS: Record<LLMProviderId, string> = {
  openai: "gpt-4o",
  azure: "gpt-4o",
  anthropic: "claude-3-5-sonnet-latest",
  google: "gemini-1.5-pro",
  mistral: "mistral-large-latest",
  deepseek: "deepseek-chat",
};

const providerSchema = z.enum(LLM_PROVIDER_IDS);
const safetyLevelSchema = z.enum(["low", "medium", "high"]);

export interface AppConfig {
  readonly LLM_PROVIDER: LLMProviderId;
  readonly LLM_MODEL: string;
  readonly OPENAI_API_KEY: string;
  /** Azure OpenAI */
  readonly AZURE_RESOURCE_NAME: string;
  readonly AZURE_API_KEY: string;
  readonly AZURE_API_VERSION: string;
  readonly ANTHROPIC_API_KEY: string;
  readonly GOOGLE_GENERATIVE_AI_API_KEY: string;
  readonly MISTRAL_API_KEY: string;
  readonly DEEPSEEK_API_KEY: string;
  /** Output token budget for one generation. */
  readonly MAX_TOKENS: number;
  readonly TEMPERATURE: number;
  /** Max ms to wait for the provider before reporting a timeout. */
  readonly LLM_TIMEOUT_MS: number;
  readonly DEFAULT_SAFETY_LEVEL: SafetyLevel;
  readonly DATABASE_PATH: string;
  readonly REDIS_URL: string;
  readonly QUEUE_NAME: string;
  readonly WORKER_CONCURRENCY: number;
  readonly ANSIBLE_PLAYBOOK_BIN: string;
  /** Generated playbooks are written here before ansible-playbook runs them. */
  readonly PLAYBOOKS_DIR: string;
  /** Raw values that did not parse; reported by validateConfig. */
  readonly rejected: Readonly<Record<string, string>>;
}

/**
 * Build the immutable application config from an env-like record. Called once
 * per process; components receive the result through their constructors.
 */
export function loadConfig(source: EnvSource): AppConfig {
  const rejected: Record<string, string> = {};

  const rawProvider = str(source, "LLM_PROVIDER", "openai");
  const provider = providerSchema.safeParse(rawProvider);
  if (!provider.success) rejected.LLM_PROVIDER = rawProvider;
  const LLM_PROVIDER = provider.success ? provider.data : "openai";

  const rawLevel = str(source, "DEFAULT_SAFETY_LEVEL", "medium");
  const level = safetyLevelSchema.safeParse(rawLevel);
  if (!level.success) rejected.DEFAULT_SAFETY_LEVEL = rawLevel;

  return Object.freeze({
    LLM_PROVIDER,
    LLM_MODEL: str(source, "LLM_MODEL", DEFAULT_MODELS[LLM_PROVIDER]),
    OPENAI_API_KEY: str(source, "OPENAI_API_KEY", ""),
    AZURE_RESOURCE_NAME: str(source, "AZURE_RESOURCE_NAME", ""),
    AZURE_API_KEY: str(source, "AZURE_API_KEY", ""),
    AZURE_API_VERSION: str(source, "AZURE_API_VERSION", ""),
    ANTHROPIC_API_KEY: str(source, "ANTHROPIC_API_KEY", ""),
    GOOGLE_GENERATIVE_AI_API_KEY: str(
      source,
      "GOOGLE_GENERATIVE_AI_API_KEY",
      "",
    ),
    MISTRAL_API_KEY: str(source, "MISTRAL_API_KEY", ""),
    DEEPSEEK_API_KEY: str(source, "DEEPSEEK_API_KEY", ""),
    MAX_TOKENS: num(source, "MAX_TOKENS", 2000),
    TEMPERATURE: num(source, "TEMPERATURE", 0.3),
    LLM_TIMEOUT_MS: num(source, "LLM_TIMEOUT_MS", 60_000),
    DEFAULT_SAFETY_LEVEL: level.success ? level.data : "medium",
    DATABASE_PATH: str(
      source,
      "DATABASE_PATH",
      join(WORKSPACE_ROOT, "playforge.db"),
    ),
    REDIS_URL: str(source, "REDIS_URL", "redis://localhost:6379"),
    QUEUE_NAME: str(source, "QUEUE_NAME", "playforge-executions"),
    WORKER_CONCURRENCY: num(source, "WORKER_CONCURRENCY", 4),
    ANSIBLE_PLAYBOOK_BIN: str(
      source,
      "ANSIBLE_PLAYBOOK_BIN",
      "ansible-playbook",
    ),
    PLAYBOOKS_DIR: str(
      source,
      "PLAYBOOKS_DIR",
      join(WORKSPACE_ROOT, "playbooks"),
    ),
    rejected: Object.freeze(rejected),
  });
}

const REQUIRED_KEYS: Record<LLMProviderId, (keyof AppConfig)[]> = {
  openai: ["OPENAI_API_KEY"],
  azure: ["AZURE_RESOURCE_NAME", "AZURE_API_KEY"],
  anthropic: ["ANTHROPIC_API_KEY"],
  google: ["GOOGLE_GENERATIVE_AI_API_KEY"],
  mistral: ["MISTRAL_API_KEY"],
  deepseek: ["DEEPSEEK_API_KEY"],
};

export interface ValidateConfigOptions {
  /** Check the selected provider's credentials. Off for the worker. */
  requireProviderKey?: boolean;
}

/** Every configuration problem, in a stable order. Empty when usable. */
export function validateConfig(
  config: AppConfig,
  options: ValidateConfigOptions = {},
): string[] {
  const { requireProviderKey = true } = options;
  const errors: string[] = [];
  if (config.rejected.LLM_PROVIDER !== undefined) {
    errors.push(`Unsupported LLM_PROVIDER: ${config.rejected.LLM_PROVIDER}`);
  }
  if (config.rejected.DEFAULT_SAFETY_LEVEL !== undefined) {
    errors.push(
      "Unsupported DEFAULT_SAFETY_LEVEL: " +
        config.rejected.DEFAULT_SAFETY_LEVEL,
    );
  }
  const keys = requireProviderKey ? REQUIRED_KEYS[config.LLM_PROVIDER] : [];
  for (const key of keys) {
    if (config[key] === "") {
      errors.push(
        `${key} is required when LLM_PROVIDER is '${config.LLM_PROVIDER}'`,
      );
    }
  }
  if (!Number.isInteger(config.MAX_TOKENS) || config.MAX_TOKENS <= 0) {
    errors.push("MAX_TOKENS must be a positive integer");
  }
  if (config.TEMPERATURE < 0 || config.TEMPERATURE > 2) {
    errors.push("TEMPERATURE must be between 0 and 2");
  }
  if (config.LLM_TIMEOUT_MS <= 0) {
    errors.push("LLM_TIMEOUT_MS must be positive");
  }
  if (
    !Number.isInteger(config.WORKER_CONCURRENCY) ||
    config.WORKER_CONCURRENCY <= 0
  ) {
    errors.push("WORKER_CONCURRENCY must be a positive integer");
  }
  return errors;
}
