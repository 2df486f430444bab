import { readFile } from "fs/promises";
import { join } from "path";
import createDebug from "debug";
import { BACKEND_ROOT } from "../env.js";
import type { GenerationRequest } from "../types.js";

const debug = createDebug("playforge:prompts");

const PROMPTS_DIR = join(BACKEND_ROOT, "prompts");

export const SYSTEM_INSTRUCTIONS =
  "You are an expert Ansible playbook developer. " +
  "Generate only valid YAML playbooks.";

/** Used when prompts/generate-playbook.md has not been loaded. */
export const DEFAULT_GENERATION_PROMPT = `You are an expert Ansible playbook developer. Create a safe and well-structured Ansible playbook based on the following requirements:

DESCRIPTION: {description}
HOSTS: {hosts}
ADDITIONAL CONTEXT: {additional_context}
VARIABLES: {variables}

Requirements:
1. Use only safe, idempotent operations
2. Give every task a clear, descriptive name
3. Use handlers for service restarts
4. Avoid destructive operations: no recursive deletes, disk formatting or partitioning, power-state changes, firewall resets or account removal
5. Prefer purpose-built modules over shell or command
6. Use become only when necessary
7. Use variables where appropriate, and declare every listed variable under vars

Return a complete, valid YAML playbook in a single \`\`\`yaml code block.
`;

interface PromptCache {
  generation?: string;
}

const cache: PromptCache = {};

/**
 * Load prompt files from apps/backend/prompts/ into memory. Call once at
 * startup; a missing file leaves the built-in default in place.
 */
export async function loadPrompts(dir: string = PROMPTS_DIR): Promise<void> {
  const path = join(dir, "generate-playbook.md");
  try {
    cache.generation = await readFile(path, "utf-8");
    debug("loaded generation prompt from %s", path);
  } catch (err) {
    debug("prompt file not loaded %s: %o", path, err);
  }
}

export function getGenerationPrompt(): string {
  return cache.generation ?? DEFAULT_GENERATION_PROMPT;
}

const PLACEHOLDER = /\{(description|hosts|additional_context|variables)\}/g;

function describeVariables(
  variables: Readonly<Record<string, unknown>> | undefined,
): string {
  if (!variables || Object.keys(variables).length === 0) return "None";
  return JSON.stringify(variables);
}

/**
 * Fill the prompt template from the request. Single pass, so text inside the
 * request that looks like a placeholder is kept as written.
 */
export function buildGenerationPrompt(
  request: GenerationRequest,
  template: string = getGenerationPrompt(),
): string {
  const values: Record<string, string> = {
    description: request.description.trim(),
    hosts: request.hosts.trim() || "all",
    additional_context: request.additionalContext?.trim() || "None",
    variables: describeVariables(request.variables),
  };
  return template.replace(PLACEHOLDER, (_, key: string) => values[key] ?? "");
}
