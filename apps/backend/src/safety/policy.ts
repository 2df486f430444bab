/**
 * Safety policy engine: scores playbook text against the denylist and the
 * per-level policy. Pure; no I/O and no shared state.
 */
import createDebug from "debug";
import { load as parseYaml, YAMLException } from "js-yaml";
import type {
  SafetyLevel,
  SafetyVerdict,
  Violation,
} from "../types.js";
import {
  findDangerousPatterns,
  moduleShortName,
  SHELL_MODULES,
} from "./patterns.js";

const debug = createDebug("playforge:safety");

export type Capability = "shell-module" | "elevated-privilege";

export interface LevelPolicy {
  threshold: number;
  /** Capabilities that force rejection at this level. */
  blocked: readonly Capability[];
  /** Capabilities recorded as violations instead of warnings. */
  strict: readonly Capability[];
  requireZeroViolations: boolean;
}

export const POLICIES: Readonly<Record<SafetyLevel, LevelPolicy>> = {
  low: {
    threshold: 50,
    blocked: [],
    strict: [],
    requireZeroViolations: false,
  },
  medium: {
    threshold: 70,
    blocked: [],
    strict: [],
    requireZeroViolations: false,
  },
  high: {
    threshold: 90,
    blocked: ["shell-module"],
    strict: ["shell-module", "elevated-privilege"],
    requireZeroViolations: true,
  },
};

/** Point deductions. Tunable policy, not a calibrated risk model. */
export const PENALTIES = {
  dangerousPattern: 20,
  elevatedPrivilege: 5,
  shellModule: 30,
} as const;

const TASK_SECTIONS = ["pre_tasks", "tasks", "post_tasks", "handlers"];
const BLOCK_SECTIONS = ["block", "rescue", "always"];
const FALSY = new Set(["false", "no", "off", "n", "0"]);

type Play = Record<string, unknown>;

interface TaskRef {
  label: string;
  task: Record<string, unknown>;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Whether a `become` value may escalate. Only an absent value or an explicit
 * false literal does not; templated values such as "{{ use_sudo }}" count.
 */
function mayEscalate(v: unknown): boolean {
  if (v === undefined || v === null || v === false || v === 0) return false;
  if (typeof v === "string") return !FALSY.has(v.trim().toLowerCase());
  return true;
}

function hasHosts(play: Play): boolean {
  const hosts = play.hosts;
  if (typeof hosts === "string") return hosts.trim() !== "";
  return Array.isArray(hosts) && hosts.length > 0;
}

export type ParseOutcome =
  | { ok: true; plays: Play[] }
  | { ok: false; errors: string[] };

/** Parse the script and check the play/host/task shape. */
export function parsePlaybook(script: string): ParseOutcome {
  if (script.trim() === "") {
    return { ok: false, errors: ["Empty or invalid YAML content"] };
  }
  let data: unknown;
  try {
    data = parseYaml(script);
  } catch (err) {
    if (err instanceof YAMLException) {
      return { ok: false, errors: [`YAML parsing error: ${err.reason}`] };
    }
    throw err;
  }
  if (data === null || data === undefined) {
    return { ok: false, errors: ["Empty or invalid YAML content"] };
  }
  if (!Array.isArray(data)) {
    return { ok: false, errors: ["Playbook must be a list of plays"] };
  }
  if (data.length === 0) {
    return { ok: false, errors: ["Playbook must contain at least one play"] };
  }

  const errors: string[] = [];
  const plays: Play[] = [];
  data.forEach((play: unknown, i) => {
    if (!isRecord(play)) {
      errors.push(`Play ${i} must be a mapping`);
      return;
    }
    if (!hasHosts(play)) errors.push(`Play ${i} missing 'hosts' field`);
    if (!Array.isArray(play.tasks)) {
      errors.push(`Play ${i} missing 'tasks' field`);
    } else if (play.tasks.length === 0) {
      errors.push(`Play ${i} has an empty 'tasks' list`);
    }
    plays.push(play);
  });
  return errors.length > 0 ? { ok: false, errors } : { ok: true, plays };
}

function collectTasks(
  items: unknown,
  prefix: string,
  section: string,
  out: TaskRef[],
): void {
  if (!Array.isArray(items)) return;
  items.forEach((task: unknown, j) => {
    if (!isRecord(task)) return;
    const label =
      typeof task.name === "string" && task.name.trim()
        ? `${prefix} task "${task.name.trim()}"`
        : `${prefix} ${section}[${j}]`;
    out.push({ label, task });
    for (const nested of BLOCK_SECTIONS) {
      collectTasks(task[nested], prefix, `${section}[${j}].${nested}`, out);
    }
  });
}

function tasksOf(play: Play, index: number): TaskRef[] {
  const out: TaskRef[] = [];
  for (const section of TASK_SECTIONS) {
    collectTasks(play[section], `Play ${index}`, section, out);
  }
  return out;
}

/** The task key naming a shell-like module, as written in the task. */
function shellModuleOf(task: Record<string, unknown>): string | null {
  return (
    Object.keys(task).find((key) =>
      SHELL_MODULES.includes(moduleShortName(key)),
    ) ?? null
  );
}

/**
 * Score a script at the given safety level. A denylisted pattern always
 * rejects; a structural failure rejects with score 0 and skips scoring.
 */
export function evaluate(script: string, level: SafetyLevel): SafetyVerdict {
  const policy = POLICIES[level];
  const errors: string[] = [];
  const warnings: string[] = [];
  const violations: Violation[] = [];
  let score = 100;
  let hardViolation = false;
  let needsReview = false;

  for (const match of findDangerousPatterns(script)) {
    violations.push({
      kind: "dangerous-pattern",
      pattern: match.pattern,
      segment: match.segment,
    });
    errors.push(`Dangerous pattern detected: ${match.pattern}`);
    score -= PENALTIES.dangerousPattern;
    hardViolation = true;
  }

  const parsed = parsePlaybook(script);
  if (!parsed.ok) {
    debug("structural failure: %o", parsed.errors);
    return {
      accepted: false,
      score: 0,
      level,
      violations,
      errors: [...parsed.errors, ...errors],
      warnings,
      requiresApproval: false,
    };
  }

  const elevated = (label: string) => {
    needsReview = true;
    score -= PENALTIES.elevatedPrivilege;
    if (policy.strict.includes("elevated-privilege")) {
      violations.push({
        kind: "elevated-privilege",
        pattern: "become",
        segment: label,
      });
      errors.push(
        `${label} uses become; elevated privileges are not allowed at ` +
          `${level} safety level`,
      );
    } else {
      warnings.push(
        `${label} uses become - ensure elevated privileges are necessary`,
      );
    }
  };

  parsed.plays.forEach((play, i) => {
    if (mayEscalate(play.become)) elevated(`Play ${i}`);
    for (const { label, task } of tasksOf(play, i)) {
      if (mayEscalate(task.become)) elevated(label);
      const module = shellModuleOf(task);
      if (!module) continue;
      needsReview = true;
      if (policy.blocked.includes("shell-module")) {
        score -= PENALTIES.shellModule;
        hardViolation = true;
        violations.push({
          kind: "shell-module",
          pattern: module,
          segment: label,
        });
        errors.push(
          `${label} uses the ${module} module, which is blocked at ` +
            `${level} safety level`,
        );
      } else {
        warnings.push(
          `${label} uses the ${module} module; prefer a purpose-built module`,
        );
      }
    }
  });

  score = Math.max(0, Math.min(100, score));
  if (score < policy.threshold) {
    errors.push(
      `Safety score ${score} is below the ${level} threshold of ` +
        `${policy.threshold}`,
    );
  }
  const accepted =
    !hardViolation &&
    score >= policy.threshold &&
    (!policy.requireZeroViolations || violations.length === 0);

  debug(
    "level=%s score=%d accepted=%s violations=%d",
    level,
    score,
    accepted,
    violations.length,
  );
  return {
    accepted,
    score,
    level,
    violations,
    errors,
    warnings,
    requiresApproval: accepted && needsReview,
  };
}

export function describePolicy(level: SafetyLevel): LevelPolicy {
  return POLICIES[level];
}
