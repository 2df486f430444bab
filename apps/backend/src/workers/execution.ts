/**
 * Execution worker: reconciles tasks with the queue after a restart, then runs
 * the BullMQ worker that executes due playbooks. Run as its own process.
 */
import createDebug from "debug";
import { loadConfig, validateConfig } from "../config.js";
import { waitForRedis } from "../data/redis.js";
import { loadEnv } from "../env.js";
import { createAnsibleEngine } from "../execution/engine.js";
import { createTaskRunner } from "../execution/task-runner.js";
import { bootstrap } from "../index.js";

const debug = createDebug("playforge:workers:execution");

async function main() {
  const config = loadConfig(loadEnv());
  const problems = validateConfig(config, { requireProviderKey: false });
  if (problems.length > 0) {
    for (const p of problems) debug("Config: %s", p);
    process.exit(1);
  }

  const runtime = await bootstrap(config, { generation: false });
  await waitForRedis();

  const report = await runtime.service.recoverOnRestart();
  for (const id of report.stale) {
    debug("Task %s missed its run time while the queue was down", id);
  }
  for (const id of report.running) {
    debug("Task %s was running at shutdown; reconcile it manually", id);
  }

  const engine = createAnsibleEngine(config);
  runtime.queue.startWorker(createTaskRunner(runtime.store, engine));
  debug(
    "Execution worker started on %s (concurrency %d)",
    config.QUEUE_NAME,
    config.WORKER_CONCURRENCY,
  );

  const shutdown = async () => {
    debug("Shutting down execution worker…");
    await runtime.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      debug("Shutdown failed: %o", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  debug("Execution worker failed: %o", err);
  process.exit(1);
});
