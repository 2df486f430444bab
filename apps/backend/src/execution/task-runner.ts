import createDebug from "debug";
import type { TaskStore } from "../data/task-store.js";
import type { ExecutionJob, Task } from "../types.js";
import { truncateForMax } from "../utils/helpers.js";
import type { ExecutionEngine, ScriptSource } from "./engine.js";

const debug = createDebug("playforge:task-runner");

/** Engine output kept on the task row. */
const MAX_OUTPUT_CHARS = 64_000;

function sourceOf(task: Task): ScriptSource | null {
  if (task.scriptContent) {
    return { kind: "content", content: task.scriptContent };
  }
  if (task.scriptPath) return { kind: "path", path: task.scriptPath };
  return null;
}

/**
 * Queue processor: claims the task (PENDING → RUNNING), runs it, and records
 * the terminal status with the engine output. A task that is no longer
 * PENDING (revoked, removed, or claimed by another worker) is skipped.
 */
export function createTaskRunner(
  store: TaskStore,
  engine: ExecutionEngine,
): (job: ExecutionJob) => Promise<void> {
  return async (job: ExecutionJob): Promise<void> => {
    const task = await store.get(job.taskId);
    if (!task) {
      debug("task %s no longer exists; skipping", job.taskId);
      return;
    }
    if (!(await store.transition(task.id, "PENDING", "RUNNING"))) {
      debug("task %s was not pending; skipping", task.id);
      return;
    }

    const source = sourceOf(task);
    if (!source) {
      await store.transition(
        task.id,
        "RUNNING",
        "FAILURE",
        "Task has no script",
      );
      return;
    }

    try {
      const result = await engine.run(source, task.target, task.inventory);
      const to = result.status === "success" ? "SUCCESS" : "FAILURE";
      await store.transition(
        task.id,
        "RUNNING",
        to,
        truncateForMax(result.output, MAX_OUTPUT_CHARS),
      );
      debug("task %s finished: %s", task.id, to);
    } catch (err) {
      debug("task %s engine error: %o", task.id, err);
      const message = err instanceof Error ? err.message : String(err);
      await store.transition(
        task.id,
        "RUNNING",
        "FAILURE",
        `Engine error: ${message}`,
      );
    }
  };
}
