import { describe, it, expect, beforeEach } from "vitest";
import { mkdtemp, readdir } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { openDatabase } from "../data/db.js";
import {
  initTaskStore,
  type NewTask,
  type TaskStore,
} from "../data/task-store.js";
import { FakeEngine } from "../testing/fakes.js";
import { createAnsibleEngine, runCommand } from "./engine.js";
import { createTaskRunner } from "./task-runner.js";

const BASE: NewTask = {
  id: "task-1",
  scriptPath: null,
  scriptContent: "- hosts: all\n  tasks:\n    - ping:\n",
  inventory: "inventory/hosts.ini",
  target: "web",
  runAt: "2026-05-01T13:00:00.000Z",
  isGenerated: true,
  safetyValidated: true,
  generationMetadata: null,
  validationErrors: [],
};

describe("createTaskRunner", () => {
  let store: TaskStore;

  beforeEach(async () => {
    store = initTaskStore(openDatabase(":memory:"));
    await store.insert(BASE);
  });

  it("runs a pending task and records success", async () => {
    const engine = new FakeEngine(async () => ({
      status: "success",
      output: "PLAY RECAP ok=1",
    }));
    await createTaskRunner(store, engine)({ taskId: "task-1" });

    expect(engine.calls).toEqual([
      {
        source: { kind: "content", content: BASE.scriptContent },
        target: "web",
        inventory: "inventory/hosts.ini",
      },
    ]);
    expect(await store.get("task-1")).toMatchObject({
      status: "SUCCESS",
      output: "PLAY RECAP ok=1",
    });
  });

  it("records engine failures with their output", async () => {
    const engine = new FakeEngine(async () => ({
      status: "failure",
      output: "unreachable",
    }));
    await createTaskRunner(store, engine)({ taskId: "task-1" });

    expect(await store.get("task-1")).toMatchObject({
      status: "FAILURE",
      output: "unreachable",
    });
  });

  it("turns an engine exception into FAILURE", async () => {
    const engine = new FakeEngine(async () => {
      throw new Error("spawn failed");
    });
    await createTaskRunner(store, engine)({ taskId: "task-1" });

    expect(await store.get("task-1")).toMatchObject({
      status: "FAILURE",
      output: "Engine error: spawn failed",
    });
  });

  it("skips a task that is no longer pending", async () => {
    await store.transition("task-1", "PENDING", "REVOKED");
    const engine = new FakeEngine();
    await createTaskRunner(store, engine)({ taskId: "task-1" });

    expect(engine.calls).toEqual([]);
    expect((await store.get("task-1"))?.status).toBe("REVOKED");
  });

  it("skips a task that was removed", async () => {
    const engine = new FakeEngine();
    await createTaskRunner(store, engine)({ taskId: "missing" });
    expect(engine.calls).toEqual([]);
  });
});

describe("runCommand", () => {
  it("collects stdout and the exit code", async () => {
    expect(await runCommand("echo", ["hello"])).toEqual({
      stdout: "hello\n",
      stderr: "",
      code: 0,
    });
  });

  it("reports a missing binary as a failed run", async () => {
    const result = await runCommand("playforge-no-such-binary", []);
    expect(result.code).not.toBe(0);
    expect(result.stderr).toContain("ENOENT");
  });
});

describe("createAnsibleEngine", () => {
  it("passes the playbook, inventory and limit to the binary", async () => {
    const engine = createAnsibleEngine({
      ANSIBLE_PLAYBOOK_BIN: "echo",
      PLAYBOOKS_DIR: "unused",
    });
    const result = await engine.run(
      { kind: "path", path: "site.yml" },
      "web",
      "hosts.ini",
    );
    expect(result).toEqual({
      status: "success",
      output: "site.yml -i hosts.ini --limit web\n",
    });
  });

  it("runs script content from a temporary playbook file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "playforge-"));
    const engine = createAnsibleEngine({
      ANSIBLE_PLAYBOOK_BIN: "echo",
      PLAYBOOKS_DIR: dir,
    });

    const result = await engine.run(
      { kind: "content", content: "- hosts: all\n" },
      "all",
      "hosts.ini",
    );

    expect(result.status).toBe("success");
    expect(result.output.startsWith(join(dir, "generated-"))).toBe(true);
    const tail = ".yml -i hosts.ini --limit all\n";
    expect(result.output.endsWith(tail)).toBe(true);
    expect(await readdir(dir)).toEqual([]);
  });
});
