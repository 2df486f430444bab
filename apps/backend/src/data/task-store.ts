import createDebug from "debug";
import { assertTransition } from "../scheduling/task-state.js";
import type { Task, TaskStatus } from "../types.js";
import { isRecord, isStringArray, parseJson } from "../utils/helpers.js";
import type { Db } from "./db.js";

const debug = createDebug("playforge:tasks");

export type NewTask = Omit<
  Task,
  "status" | "jobId" | "output" | "createdAt" | "updatedAt"
>;

export interface TaskStore {
  /** Persist a new task in PENDING. */
  insert(task: NewTask): Promise<Task>;
  get(id: string): Promise<Task | null>;
  list(): Promise<Task[]>;
  findByJobId(jobId: string): Promise<Task | null>;
  listByStatus(status: TaskStatus): Promise<Task[]>;
  /**
   * Move a task from `from` to `to` only if it is still in `from`. Returns
   * false when another writer got there first. Throws StateError for a pair
   * the state machine does not allow.
   */
  transition(
    id: string,
    from: TaskStatus,
    to: TaskStatus,
    output?: string,
  ): Promise<boolean>;
  setJobId(id: string, jobId: string): Promise<void>;
  remove(id: string): Promise<boolean>;
}

interface TaskRow {
  id: string;
  script_path: string | null;
  script_content: string | null;
  inventory: string;
  target: string;
  run_at: string;
  is_generated: number;
  safety_validated: number;
  generation_metadata: string | null;
  validation_errors: string;
  status: TaskStatus;
  job_id: string | null;
  output: string | null;
  created_at: string;
  updated_at: string;
}

function isMetadata(v: unknown): v is Record<string, unknown> | null {
  return v === null || isRecord(v);
}

function toTask(r: TaskRow): Task {
  return {
    id: r.id,
    scriptPath: r.script_path,
    scriptContent: r.script_content,
    inventory: r.inventory,
    target: r.target,
    runAt: r.run_at,
    isGenerated: r.is_generated !== 0,
    safetyValidated: r.safety_validated !== 0,
    generationMetadata: parseJson(r.generation_metadata, isMetadata, null),
    validationErrors: parseJson(r.validation_errors, isStringArray, []),
    status: r.status,
    jobId: r.job_id,
    output: r.output,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

export function initTaskStore(
  db: Db,
  now: () => Date = () => new Date(),
): TaskStore {
  const insertRow = db.prepare<[TaskRow]>(`
    INSERT INTO tasks (
      id, script_path, script_content, inventory, target, run_at,
      is_generated, safety_validated, generation_metadata,
      validation_errors, status, job_id, output, created_at, updated_at
    ) VALUES (
      @id, @script_path, @script_content, @inventory, @target, @run_at,
      @is_generated, @safety_validated, @generation_metadata,
      @validation_errors, @status, @job_id, @output, @created_at, @updated_at
    )
  `);
  const selectById = db.prepare<[string], TaskRow>(
    "SELECT * FROM tasks WHERE id = ?",
  );
  const selectByJob = db.prepare<[string], TaskRow>(
    "SELECT * FROM tasks WHERE job_id = ? LIMIT 1",
  );
  const selectAll = db.prepare<[], TaskRow>(
    "SELECT * FROM tasks ORDER BY created_at ASC, rowid ASC",
  );
  const selectByStatus = db.prepare<[string], TaskRow>(
    "SELECT * FROM tasks WHERE status = ? ORDER BY run_at ASC, rowid ASC",
  );
  const compareAndSet = db.prepare<
    [
      {
        id: string;
        from: string;
        to: string;
        output: string | null;
        updated_at: string;
      },
    ]
  >(`
    UPDATE tasks
    SET status = @to, output = COALESCE(@output, output),
        updated_at = @updated_at
    WHERE id = @id AND status = @from
  `);
  const updateJob = db.prepare<[string, string, string]>(
    "UPDATE tasks SET job_id = ?, updated_at = ? WHERE id = ?",
  );
  const deleteRow = db.prepare<[string]>("DELETE FROM tasks WHERE id = ?");

  return {
    async insert(task: NewTask): Promise<Task> {
      const stamp = now().toISOString();
      const row: TaskRow = {
        id: task.id,
        script_path: task.scriptPath,
        script_content: task.scriptContent,
        inventory: task.inventory,
        target: task.target,
        run_at: task.runAt,
        is_generated: task.isGenerated ? 1 : 0,
        safety_validated: task.safetyValidated ? 1 : 0,
        generation_metadata:
          task.generationMetadata === null
            ? null
            : JSON.stringify(task.generationMetadata),
        validation_errors: JSON.stringify(task.validationErrors),
        status: "PENDING",
        job_id: null,
        output: null,
        created_at: stamp,
        updated_at: stamp,
      };
      insertRow.run(row);
      debug("inserted task %s for %s", task.id, task.runAt);
      return toTask(row);
    },

    async get(id: string): Promise<Task | null> {
      const row = selectById.get(id);
      return row ? toTask(row) : null;
    },

    async list(): Promise<Task[]> {
      return selectAll.all().map(toTask);
    },

    async findByJobId(jobId: string): Promise<Task | null> {
      const row = selectByJob.get(jobId);
      return row ? toTask(row) : null;
    },

    async listByStatus(status: TaskStatus): Promise<Task[]> {
      return selectByStatus.all(status).map(toTask);
    },

    async transition(
      id: string,
      from: TaskStatus,
      to: TaskStatus,
      output?: string,
    ): Promise<boolean> {
      assertTransition(from, to);
      const result = compareAndSet.run({
        id,
        from,
        to,
        output: output ?? null,
        updated_at: now().toISOString(),
      });
      const moved = result.changes > 0;
      debug(
        "task %s %s -> %s %s",
        id,
        from,
        to,
        moved ? "applied" : "skipped (state changed)",
      );
      return moved;
    },

    async setJobId(id: string, jobId: string): Promise<void> {
      updateJob.run(jobId, now().toISOString(), id);
    },

    async remove(id: string): Promise<boolean> {
      return deleteRow.run(id).changes > 0;
    },
  };
}
