import { StateError } from "../errors.js";
import type { TaskStatus } from "../types.js";

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  PENDING: ["RUNNING", "REVOKED"],
  RUNNING: ["SUCCESS", "FAILURE"],
  SUCCESS: [],
  FAILURE: [],
  REVOKED: [],
};

export function isTransitionAllowed(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: TaskStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

export function assertTransition(from: TaskStatus, to: TaskStatus): void {
  if (!isTransitionAllowed(from, to)) {
    throw new StateError(from, to);
  }
}
