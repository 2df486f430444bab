import createDebug from "debug";
import type { AppConfig } from "./config.js";
import { openDatabase, type Db } from "./data/db.js";
import { closeRedis } from "./data/redis.js";
import { initTaskStore, type TaskStore } from "./data/task-store.js";
import { initTemplateStore } from "./data/template-store.js";
import { ScriptGenerator } from "./generation/script-generator.js";
import { getGenerationPrompt, loadPrompts } from "./generation/prompts.js";
import { createLLMProvider, type LLMProvider } from "./llm/provider.js";
import {
  createExecutionQueue,
  type ExecutionQueue,
} from "./queue/execution-queue.js";
import { Scheduler } from "./scheduling/scheduler.js";
import { createAutomationService, type AutomationService } from "./service.js";

const debug = createDebug("playforge:bootstrap");

export interface BootstrapOverrides {
  /** Build the LLM provider and script generator. Defaults to true. */
  generation?: boolean;
  provider?: LLMProvider;
  queue?: ExecutionQueue;
  db?: Db;
}

export interface Runtime {
  service: AutomationService;
  store: TaskStore;
  queue: ExecutionQueue;
  db: Db;
  close(): Promise<void>;
}

/**
 * Wire config → database → stores → provider → queue → service. Overrides
 * replace the external collaborators (tests pass in-process stand-ins).
 * With `generation: false` no provider is built, so no LLM key is needed.
 */
export async function bootstrap(
  config: AppConfig,
  overrides: BootstrapOverrides = {},
): Promise<Runtime> {
  await loadPrompts();
  const db = overrides.db ?? openDatabase(config.DATABASE_PATH);
  const store = initTaskStore(db);
  const templates = initTemplateStore(db);
  const seeded = await templates.seedDefaults();
  if (seeded > 0) debug("Seeded %d default templates", seeded);

  let generator: ScriptGenerator | undefined;
  if (overrides.generation !== false) {
    const provider = overrides.provider ?? createLLMProvider(config);
    generator = new ScriptGenerator({
      provider,
      settings: config,
      promptTemplate: getGenerationPrompt(),
    });
    debug("Generating with %s (%s)", provider.name, provider.model);
  }

  const ownsQueue = !overrides.queue;
  const queue =
    overrides.queue ??
    createExecutionQueue({
      redisUrl: config.REDIS_URL,
      queueName: config.QUEUE_NAME,
      concurrency: config.WORKER_CONCURRENCY,
    });
  const scheduler = new Scheduler({ store, queue });
  const service = createAutomationService({ generator, templates, scheduler });
  debug("Bootstrapped with database %s", config.DATABASE_PATH);

  return {
    service,
    store,
    queue,
    db,
    async close(): Promise<void> {
      await queue.close();
      if (ownsQueue) await closeRedis();
      db.close();
    },
  };
}

export { loadConfig, validateConfig } from "./config.js";
export type { AppConfig, ValidateConfigOptions } from "./config.js";
export { loadEnv } from "./env.js";
export type { AutomationService } from "./service.js";
export type { LevelPolicy } from "./safety/policy.js";
export * from "./types.js";
