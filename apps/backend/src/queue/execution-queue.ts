/**
 * BullMQ-backed execution queue. Jobs are delayed until the task's run time
 * and carry only the task id; the worker reads the rest from the task store.
 */
import createDebug from "debug";
import { randomUUID } from "crypto";
import { Queue, Worker } from "bullmq";
import type { ExecutionJob } from "../types.js";
import { initRedis } from "../data/redis.js";

const debug = createDebug("playforge:execution-queue");

export interface ExecutionQueue {
  /** Schedule a job for runAt (now when it has passed). Returns the job id. */
  enqueue(job: ExecutionJob, runAt: Date): Promise<string>;
  /** Remove a job that has not started. False once it is running or gone. */
  revoke(jobId: string): Promise<boolean>;
  /** Whether the queue still holds this job in any state. */
  isKnown(jobId: string): Promise<boolean>;
  /** Start processing jobs. Call once, in the worker process only. */
  startWorker(processor: (job: ExecutionJob) => Promise<void>): void;
  /** Close queue and worker. Does not close the shared Redis client. */
  close(): Promise<void>;
}

export interface ExecutionQueueOptions {
  /** e.g. redis://localhost:6379; shared with the rest of the process. */
  redisUrl: string;
  queueName: string;
  concurrency?: number;
  now?: () => number;
}

const REVOCABLE_STATES = new Set(["delayed", "waiting", "prioritized"]);

/**
 * Create the BullMQ queue (and, on demand, its worker) on the shared Redis
 * client from data/redis.
 */
export function createExecutionQueue(
  options: ExecutionQueueOptions,
): ExecutionQueue {
  const connection = initRedis(options.redisUrl);
  const now = options.now ?? Date.now;
  const concurrency = options.concurrency ?? 1;

  const queue = new Queue<ExecutionJob>(options.queueName, {
    connection,
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });

  let worker: Worker<ExecutionJob, void> | null = null;

  return {
    async enqueue(job: ExecutionJob, runAt: Date): Promise<string> {
      const jobId = randomUUID();
      const delay = Math.max(0, runAt.getTime() - now());
      const added = await queue.add("execute", job, { jobId, delay });
      debug("Queued task %s as job %s (delay %dms)", job.taskId, jobId, delay);
      return added.id ?? jobId;
    },

    async revoke(jobId: string): Promise<boolean> {
      const job = await queue.getJob(jobId);
      if (!job) return false;
      const state = await job.getState();
      if (!REVOCABLE_STATES.has(state)) {
        debug("Job %s is %s; not revoking", jobId, state);
        return false;
      }
      try {
        await job.remove();
        return true;
      } catch (err) {
        // the worker locked the job between getState and remove
        debug("Could not remove job %s: %o", jobId, err);
        return false;
      }
    },

    async isKnown(jobId: string): Promise<boolean> {
      const job = await queue.getJob(jobId);
      if (!job) return false;
      return (await job.getState()) !== "unknown";
    },

    startWorker(processor: (job: ExecutionJob) => Promise<void>): void {
      if (worker) {
        debug("Execution worker already started");
        return;
      }
      worker = new Worker<ExecutionJob, void>(
        options.queueName,
        async (job) => {
          await processor(job.data);
        },
        {
          connection,
          concurrency,
        },
      );
      worker.on("completed", (job) => {
        debug("Execution job %s completed", job.id);
      });
      worker.on("failed", (job, err) => {
        debug("Execution job %s failed: %o", job?.id, err);
      });
      debug("Execution worker started (concurrency %d)", concurrency);
    },

    async close(): Promise<void> {
      if (worker) {
        await worker.close();
        worker = null;
      }
      await queue.close();
    },
  };
}
