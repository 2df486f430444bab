/**
 * Persists tasks and hands them to the execution queue. The task store is the
 * source of truth; the queue only holds job ids pointing back at task rows.
 */
import createDebug from "debug";
import { randomUUID } from "crypto";
import { z } from "zod";
import type { TaskStore } from "../data/task-store.js";
import type { ExecutionQueue } from "../queue/execution-queue.js";
import type { GenerationResult, Task, TaskDefinition } from "../types.js";
import { isTransitionAllowed } from "./task-state.js";

const debug = createDebug("playforge:scheduler");

export type SubmitOutcome =
  | { ok: true; taskId: string; jobId: string }
  | { ok: false; error: string };

export interface RecoveryReport {
  /** Future PENDING tasks whose job was lost and has been queued again. */
  requeued: string[];
  /** PENDING tasks whose run time passed while their job was lost. */
  stale: string[];
  /** Tasks that were RUNNING when the process stopped. Left as they are. */
  running: string[];
}

const definitionSchema = z
  .object({
    scriptPath: z.string().trim().min(1).optional(),
    scriptContent: z.string().min(1).optional(),
    inventory: z.string().trim().min(1, "inventory is required"),
    target: z.string().trim().min(1).optional(),
    runAt: z.union([z.string(), z.date()]).transform((value, ctx) => {
      const date = new Date(value);
      if (Number.isNaN(date.getTime())) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "runAt must be a valid date",
        });
        return z.NEVER;
      }
      return date;
    }),
    isGenerated: z.boolean().default(false),
    safetyValidated: z.boolean().default(false),
    generationMetadata: z.record(z.string(), z.unknown()).optional(),
    validationErrors: z.array(z.string()).default([]),
  })
  .superRefine((def, ctx) => {
    if (!def.scriptPath && !def.scriptContent) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "either scriptPath or scriptContent is required",
      });
    }
    if (def.scriptPath && def.scriptContent) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "provide scriptPath or scriptContent, not both",
      });
    }
    if (def.isGenerated && !def.safetyValidated) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "generated scripts must pass safety validation before scheduling",
      });
    }
  });

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
    )
    .join("; ");
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface SchedulerOptions {
  store: TaskStore;
  queue: ExecutionQueue;
  now?: () => Date;
}

export class Scheduler {
  private readonly store: TaskStore;
  private readonly queue: ExecutionQueue;
  private readonly now: () => Date;

  constructor(options: SchedulerOptions) {
    this.store = options.store;
    this.queue = options.queue;
    this.now = options.now ?? (() => new Date());
  }

  /** Persist the task in PENDING, then queue a job for its run time. */
  async submit(definition: TaskDefinition): Promise<SubmitOutcome> {
    const parsed = definitionSchema.safeParse(definition);
    if (!parsed.success) {
      return {
        ok: false,
        error: `Invalid task: ${describeIssues(parsed.error)}`,
      };
    }
    const def = parsed.data;
    const task = await this.store.insert({
      id: randomUUID(),
      scriptPath: def.scriptPath ?? null,
      scriptContent: def.scriptContent ?? null,
      inventory: def.inventory,
      target: def.target ?? "all",
      runAt: def.runAt.toISOString(),
      isGenerated: def.isGenerated,
      safetyValidated: def.safetyValidated,
      generationMetadata: def.generationMetadata ?? null,
      validationErrors: def.validationErrors,
    });

    let jobId: string;
    try {
      jobId = await this.queue.enqueue({ taskId: task.id }, def.runAt);
    } catch (err) {
      debug("enqueue failed for task %s: %o", task.id, err);
      await this.store.remove(task.id);
      return { ok: false, error: `Queue error: ${errorMessage(err)}` };
    }
    await this.store.setJobId(task.id, jobId);
    debug("submitted task %s as job %s", task.id, jobId);
    return { ok: true, taskId: task.id, jobId };
  }

  /** Schedule a generated script. Refuses results that failed validation. */
  async submitGenerated(
    result: GenerationResult,
    definition: Omit<TaskDefinition, "scriptPath" | "scriptContent">,
  ): Promise<SubmitOutcome> {
    if (!result.isValid || result.script === null) {
      const reasons = result.errors.join("; ") || "no script";
      return {
        ok: false,
        error: `Generated script failed validation: ${reasons}`,
      };
    }
    return this.submit({
      ...definition,
      scriptContent: result.script,
      isGenerated: true,
      safetyValidated: true,
      generationMetadata: {
        ...result.metadata,
        safetyScore: result.safetyScore,
      },
      validationErrors: [...result.warnings],
    });
  }

  /**
   * Revoke a job that has not started. Returns false, leaving the task as it
   * was, when the task is already running or finished or the queue no longer
   * holds the job.
   */
  async cancel(jobId: string): Promise<boolean> {
    const task = await this.store.findByJobId(jobId);
    if (!task) {
      debug("cancel: no task for job %s", jobId);
      return false;
    }
    if (!isTransitionAllowed(task.status, "REVOKED")) {
      debug("cancel: task %s is %s; cannot revoke", task.id, task.status);
      return false;
    }
    if (!(await this.queue.revoke(jobId))) {
      debug("cancel: queue refused to revoke job %s", jobId);
      return false;
    }
    return this.store.transition(task.id, "PENDING", "REVOKED");
  }

  get(taskId: string): Promise<Task | null> {
    return this.store.get(taskId);
  }

  list(): Promise<Task[]> {
    return this.store.list();
  }

  /** Revoke the task's job if it is still waiting, then delete the row. */
  async remove(taskId: string): Promise<boolean> {
    const task = await this.store.get(taskId);
    if (!task) return false;
    if (task.jobId && task.status === "PENDING") {
      await this.queue.revoke(task.jobId);
    }
    return this.store.remove(taskId);
  }

  /**
   * Reconcile the task store with the queue after a restart. Only future
   * PENDING tasks are queued again; nothing that may already have run is.
   */
  async recoverOnRestart(): Promise<RecoveryReport> {
    const report: RecoveryReport = { requeued: [], stale: [], running: [] };
    const nowMs = this.now().getTime();

    for (const task of await this.store.listByStatus("PENDING")) {
      if (task.jobId && (await this.queue.isKnown(task.jobId))) continue;
      const runAt = new Date(task.runAt);
      if (runAt.getTime() <= nowMs) {
        report.stale.push(task.id);
        continue;
      }
      const jobId = await this.queue.enqueue({ taskId: task.id }, runAt);
      await this.store.setJobId(task.id, jobId);
      report.requeued.push(task.id);
    }
    for (const task of await this.store.listByStatus("RUNNING")) {
      report.running.push(task.id);
    }

    debug(
      "recovery: %d requeued, %d stale, %d running",
      report.requeued.length,
      report.stale.length,
      report.running.length,
    );
    return report;
  }
}
