/**
 * Errors thrown between internal layers. Public operations turn them into
 * result values: structural, safety and template-variable problems are
 * reported as message lists and never thrown.
 */
export class PlayforgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "PlayforgeError";
  }
}

export type ProviderErrorKind =
  | "timeout"
  | "auth"
  | "quota"
  | "unknown";

/** LLM call failure. Safe for the caller to retry. */
export class ProviderError extends PlayforgeError {
  constructor(
    public readonly kind: ProviderErrorKind,
    message: string,
  ) {
    super(message, "PROVIDER_ERROR");
    this.name = "ProviderError";
  }
}

/** Illegal task transition, e.g. cancelling a finished task. */
export class StateError extends PlayforgeError {
  constructor(
    public readonly from: string,
    public readonly to: string,
    message = `Invalid task transition: ${from} -> ${to}`,
  ) {
    super(message, "INVALID_STATE_TRANSITION");
    this.name = "StateError";
  }
}
