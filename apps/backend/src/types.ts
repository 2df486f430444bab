// Generation
export type SafetyLevel = "low" | "medium" | "high";

export const SAFETY_LEVELS: readonly SafetyLevel[] = ["low", "medium", "high"];

export interface GenerationRequest {
  readonly description: string;
  /** Host group the playbook targets (the play's `hosts`). */
  readonly hosts: string;
  readonly additionalContext?: string;
  readonly safetyLevel?: SafetyLevel;
  /** Values the playbook should expose as play vars. */
  readonly variables?: Readonly<Record<string, unknown>>;
}

export interface GenerationMetadata {
  provider: string;
  model: string;
  /** ISO timestamp of the generation attempt. */
  timestamp: string;
  safetyLevel: SafetyLevel;
  /** Request variables, when the request carried any. */
  variables?: Readonly<Record<string, unknown>>;
}

export interface GenerationResult {
  readonly script: string | null;
  readonly isValid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  /** 0..100 */
  readonly safetyScore: number;
  readonly requiresApproval: boolean;
  readonly metadata: Readonly<GenerationMetadata>;
}

// Safety
export type ViolationKind =
  | "dangerous-pattern"
  | "shell-module"
  | "elevated-privilege";

export interface Violation {
  kind: ViolationKind;
  pattern: string;
  /** The text in the script that triggered the violation. */
  segment: string;
}

export interface SafetyVerdict {
  accepted: boolean;
  score: number;
  level: SafetyLevel;
  violations: Violation[];
  errors: string[];
  warnings: string[];
  requiresApproval: boolean;
}

// Templates
export type FieldType =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "array"
  | "object";

export interface FieldSchema {
  type?: FieldType;
  description?: string;
  enum?: unknown[];
  default?: unknown;
}

export interface VariableSchema {
  type: "object";
  properties: Record<string, FieldSchema>;
  required?: string[];
}

export interface Template {
  id: string;
  name: string;
  description: string;
  body: string;
  variablesSchema: VariableSchema;
  createdAt: string;
  /** Logical deletion; rows are never purged. */
  deleted: boolean;
}

export type RenderResult =
  | { ok: true; script: string }
  | { ok: false; errors: string[] };

// Tasks
export type TaskStatus =
  | "PENDING"
  | "RUNNING"
  | "SUCCESS"
  | "FAILURE"
  | "REVOKED";

export interface TaskDefinition {
  /** Path of an authored playbook. Either this or scriptContent is required. */
  scriptPath?: string;
  scriptContent?: string;
  inventory: string;
  /** Host group the run is limited to. Defaults to the whole inventory. */
  target?: string;
  /** ISO string or Date of the scheduled run. */
  runAt: string | Date;
  isGenerated?: boolean;
  safetyValidated?: boolean;
  generationMetadata?: Record<string, unknown>;
  validationErrors?: string[];
}

export interface Task {
  id: string;
  scriptPath: string | null;
  scriptContent: string | null;
  inventory: string;
  target: string;
  runAt: string;
  isGenerated: boolean;
  safetyValidated: boolean;
  generationMetadata: Record<string, unknown> | null;
  validationErrors: string[];
  status: TaskStatus;
  jobId: string | null;
  /** Engine output once the task reaches a terminal state. */
  output: string | null;
  createdAt: string;
  updatedAt: string;
}

/** Payload carried by a queued execution job. */
export interface ExecutionJob {
  taskId: string;
}
