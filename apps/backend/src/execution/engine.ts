import createDebug from "debug";
import { spawn } from "child_process";
import { randomUUID } from "crypto";
import { mkdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import type { AppConfig } from "../config.js";

const debug = createDebug("playforge:engine");

export type ScriptSource =
  | { kind: "path"; path: string }
  | { kind: "content"; content: string };

export interface EngineResult {
  status: "success" | "failure";
  output: string;
}

/** Runs a playbook against a target host group. Used by the worker only. */
export interface ExecutionEngine {
  run(
    source: ScriptSource,
    target: string,
    inventory: string,
  ): Promise<EngineResult>;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number | null;
}

/** Run a command without a shell, collecting its output. Never rejects. */
export function runCommand(
  bin: string,
  args: string[],
): Promise<CommandResult> {
  return new Promise((resolve) => {
    const proc = spawn(bin, args, { stdio: ["ignore", "pipe", "pipe"] });

    let stdout = "";
    let stderr = "";
    proc.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.on("close", (code) => {
      resolve({ stdout, stderr, code: code ?? null });
    });
    proc.on("error", (err) => {
      stderr += err.message;
      resolve({ stdout, stderr, code: 1 });
    });
  });
}

export type AnsibleEngineSettings = Pick<
  AppConfig,
  "ANSIBLE_PLAYBOOK_BIN" | "PLAYBOOKS_DIR"
>;

/**
 * Engine backed by the ansible-playbook CLI. Script content is written to a
 * file under PLAYBOOKS_DIR for the duration of the run.
 */
export function createAnsibleEngine(
  settings: AnsibleEngineSettings,
): ExecutionEngine {
  return {
    async run(
      source: ScriptSource,
      target: string,
      inventory: string,
    ): Promise<EngineResult> {
      let path: string;
      let cleanup: string | null = null;
      if (source.kind === "path") {
        path = source.path;
      } else {
        await mkdir(settings.PLAYBOOKS_DIR, { recursive: true });
        path = join(settings.PLAYBOOKS_DIR, `generated-${randomUUID()}.yml`);
        await writeFile(path, source.content, "utf-8");
        cleanup = path;
      }

      const args = [path, "-i", inventory, "--limit", target];
      debug("running %s %o", settings.ANSIBLE_PLAYBOOK_BIN, args);
      try {
        const result = await runCommand(settings.ANSIBLE_PLAYBOOK_BIN, args);
        const output = [result.stdout, result.stderr]
          .filter(Boolean)
          .join("\n");
        debug("%s exited with %s", settings.ANSIBLE_PLAYBOOK_BIN, result.code);
        return { status: result.code === 0 ? "success" : "failure", output };
      } finally {
        if (cleanup) {
          await rm(cleanup, { force: true }).catch((err: unknown) => {
            debug("could not remove %s: %o", cleanup, err);
          });
        }
      }
    },
  };
}
