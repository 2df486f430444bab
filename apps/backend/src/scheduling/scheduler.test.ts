import { describe, it, expect, beforeEach } from "vitest";
import { openDatabase } from "../data/db.js";
import { initTaskStore, type TaskStore } from "../data/task-store.js";
import { createTaskRunner } from "../execution/task-runner.js";
import { FakeEngine, InMemoryQueue } from "../testing/fakes.js";
import type { GenerationResult, TaskStatus } from "../types.js";
import { Scheduler } from "./scheduler.js";
import { isTerminal, isTransitionAllowed } from "./task-state.js";
import { StateError } from "../errors.js";

const NOW = new Date("2026-05-01T12:00:00.000Z");
const LATER = "2026-05-01T13:00:00.000Z";
const EARLIER = "2026-05-01T11:00:00.000Z";

const DEFINITION = {
  scriptPath: "playbooks/site.yml",
  inventory: "inventory/hosts.ini",
  runAt: LATER,
};

const STATUSES: TaskStatus[] = [
  "PENDING",
  "RUNNING",
  "SUCCESS",
  "FAILURE",
  "REVOKED",
];

describe("task state machine", () => {
  it("allows exactly the documented transitions", () => {
    const allowed = STATUSES.flatMap((from) =>
      STATUSES.filter((to) => isTransitionAllowed(from, to)).map(
        (to) => `${from}->${to}`,
      ),
    );
    expect(allowed).toEqual([
      "PENDING->RUNNING",
      "PENDING->REVOKED",
      "RUNNING->SUCCESS",
      "RUNNING->FAILURE",
    ]);
  });

  it("has no way out of terminal states", () => {
    expect(STATUSES.filter(isTerminal)).toEqual([
      "SUCCESS",
      "FAILURE",
      "REVOKED",
    ]);
  });
});

describe("Scheduler", () => {
  let store: TaskStore;
  let queue: InMemoryQueue;
  let scheduler: Scheduler;

  beforeEach(() => {
    store = initTaskStore(openDatabase(":memory:"), () => NOW);
    queue = new InMemoryQueue();
    scheduler = new Scheduler({ store, queue, now: () => NOW });
  });

  async function submitOk(definition = DEFINITION) {
    const outcome = await scheduler.submit(definition);
    if (!outcome.ok) throw new Error(outcome.error);
    return outcome;
  }

  it("persists a PENDING task and queues a job for its run time", async () => {
    const { taskId, jobId } = await submitOk();

    const task = await scheduler.get(taskId);
    expect(task).toMatchObject({
      status: "PENDING",
      jobId,
      scriptPath: "playbooks/site.yml",
      scriptContent: null,
      inventory: "inventory/hosts.ini",
      target: "all",
      runAt: LATER,
    });
    expect(queue.jobs.get(jobId)).toMatchObject({
      job: { taskId },
      runAt: new Date(LATER),
    });
  });

  it("rejects a definition without a script", async () => {
    const outcome = await scheduler.submit({
      inventory: "hosts",
      runAt: LATER,
    });
    expect(outcome).toEqual({
      ok: false,
      error: "Invalid task: either scriptPath or scriptContent is required",
    });
    expect(await scheduler.list()).toEqual([]);
  });

  it("rejects an unparseable run time", async () => {
    const outcome = await scheduler.submit({
      ...DEFINITION,
      runAt: "next tuesday",
    });
    expect(outcome).toEqual({
      ok: false,
      error: "Invalid task: runAt: runAt must be a valid date",
    });
  });

  it("rejects generated scripts that were not safety validated", async () => {
    const outcome = await scheduler.submit({
      scriptContent: "- hosts: all\n  tasks:\n    - ping:\n",
      inventory: "hosts",
      runAt: LATER,
      isGenerated: true,
    });
    expect(outcome).toEqual({
      ok: false,
      error:
        "Invalid task: " +
        "generated scripts must pass safety validation before scheduling",
    });
  });

  it("removes the task row when the queue is unavailable", async () => {
    queue.failNextEnqueue = new Error("connection refused");
    const outcome = await scheduler.submit(DEFINITION);
    expect(outcome).toEqual({
      ok: false,
      error: "Queue error: connection refused",
    });
    expect(await scheduler.list()).toEqual([]);
  });

  describe("submitGenerated", () => {
    const result: GenerationResult = {
      script: "- hosts: all\n  tasks:\n    - ping:\n",
      isValid: true,
      errors: [],
      warnings: [
        "Play 1 uses become - ensure elevated privileges are necessary",
      ],
      safetyScore: 95,
      requiresApproval: true,
      metadata: {
        provider: "openai",
        model: "gpt-test",
        timestamp: NOW.toISOString(),
        safetyLevel: "medium",
      },
    };

    it("schedules a valid result with its metadata", async () => {
      const outcome = await scheduler.submitGenerated(result, {
        inventory: "hosts",
        runAt: LATER,
      });
      if (!outcome.ok) throw new Error(outcome.error);

      expect(await scheduler.get(outcome.taskId)).toMatchObject({
        scriptContent: result.script,
        isGenerated: true,
        safetyValidated: true,
        generationMetadata: {
          provider: "openai",
          model: "gpt-test",
          safetyScore: 95,
        },
        validationErrors: result.warnings,
      });
    });

    it("refuses an invalid result", async () => {
      const outcome = await scheduler.submitGenerated(
        {
          ...result,
          isValid: false,
          errors: ["Dangerous pattern detected: rm -rf"],
        },
        { inventory: "hosts", runAt: LATER },
      );
      expect(outcome).toEqual({
        ok: false,
        error:
          "Generated script failed validation: " +
          "Dangerous pattern detected: rm -rf",
      });
      expect(queue.jobs.size).toBe(0);
    });
  });

  describe("cancel", () => {
    it("revokes a pending job", async () => {
      const { taskId, jobId } = await submitOk();

      expect(await scheduler.cancel(jobId)).toBe(true);
      expect((await scheduler.get(taskId))?.status).toBe("REVOKED");
      expect(queue.jobs.has(jobId)).toBe(false);
    });

    it("returns false for an unknown job", async () => {
      expect(await scheduler.cancel("job-missing")).toBe(false);
    });

    it("leaves a finished task unchanged", async () => {
      const { taskId, jobId } = await submitOk();
      queue.startWorker(createTaskRunner(store, new FakeEngine()));
      await queue.runJob(jobId);

      expect(await scheduler.cancel(jobId)).toBe(false);
      expect((await scheduler.get(taskId))?.status).toBe("SUCCESS");
    });

    it("returns false when the queue no longer holds the job", async () => {
      const { taskId, jobId } = await submitOk();
      queue.forgetAll();

      expect(await scheduler.cancel(jobId)).toBe(false);
      expect((await scheduler.get(taskId))?.status).toBe("PENDING");
    });
  });

  it("removes a task and its waiting job", async () => {
    const { taskId, jobId } = await submitOk();

    expect(await scheduler.remove(taskId)).toBe(true);
    expect(await scheduler.get(taskId)).toBeNull();
    expect(queue.jobs.has(jobId)).toBe(false);
    expect(await scheduler.remove(taskId)).toBe(false);
  });

  describe("recoverOnRestart", () => {
    it("requeues future tasks whose job was lost", async () => {
      const { taskId, jobId } = await submitOk();
      queue.forgetAll();

      const report = await scheduler.recoverOnRestart();

      expect(report).toEqual({ requeued: [taskId], stale: [], running: [] });
      const task = await scheduler.get(taskId);
      expect(task?.jobId).not.toBe(jobId);
      expect(task?.jobId && queue.jobs.has(task.jobId)).toBe(true);
    });

    it("leaves tasks whose job is still queued alone", async () => {
      await submitOk();
      expect(await scheduler.recoverOnRestart()).toEqual({
        requeued: [],
        stale: [],
        running: [],
      });
      expect(queue.jobs.size).toBe(1);
    });

    it("reports elapsed and running tasks without rerunning", async () => {
      const stale = await submitOk({ ...DEFINITION, runAt: EARLIER });
      const running = await submitOk();
      await store.transition(running.taskId, "PENDING", "RUNNING");
      queue.forgetAll();

      expect(await scheduler.recoverOnRestart()).toEqual({
        requeued: [],
        stale: [stale.taskId],
        running: [running.taskId],
      });
      expect(queue.jobs.size).toBe(0);
      expect((await scheduler.get(stale.taskId))?.status).toBe("PENDING");
    });
  });
});

describe("task store transitions", () => {
  it("refuses transitions the state machine does not allow", async () => {
    const store = initTaskStore(openDatabase(":memory:"), () => NOW);
    await expect(
      store.transition("t1", "SUCCESS", "RUNNING"),
    ).rejects.toBeInstanceOf(StateError);
  });

  it("applies a transition only from the expected state", async () => {
    const store = initTaskStore(openDatabase(":memory:"), () => NOW);
    await store.insert({
      id: "t1",
      scriptPath: "site.yml",
      scriptContent: null,
      inventory: "hosts",
      target: "all",
      runAt: LATER,
      isGenerated: false,
      safetyValidated: false,
      generationMetadata: null,
      validationErrors: [],
    });

    expect(await store.transition("t1", "PENDING", "RUNNING")).toBe(true);
    expect(await store.transition("t1", "PENDING", "REVOKED")).toBe(false);
    expect(await store.transition("t1", "RUNNING", "SUCCESS", "done")).toBe(
      true,
    );
    expect(await store.get("t1")).toMatchObject({
      status: "SUCCESS",
      output: "done",
    });
  });
});
