/**
 * Serialize value to string and truncate to at most maxChars, appending
 * "… (N chars total)" when truncated.
 */
export function truncateForMax(value: unknown, maxChars: number): string {
  const s =
    typeof value === "string"
      ? value
      : typeof value === "object" && value !== null
        ? JSON.stringify(value)
        : String(value);
  if (s.length <= maxChars) return s;
  return `${s.slice(0, maxChars)}… (${s.length} chars total)`;
}

export async function runWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  timeoutError: Error,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let timedOut = false;
  const task = fn();
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(timeoutError);
    }, timeoutMs);
  });
  try {
    return await Promise.race([task, timeoutPromise]);
  } finally {
    if (timer) clearTimeout(timer);
    if (timedOut) task.catch(() => undefined);
  }
}

/** Parse a JSON column, falling back when the value is empty or malformed. */
export function parseJson<T>(
  s: string | null,
  guard: (v: unknown) => v is T,
  fallback: T,
): T {
  if (s == null || s === "") return fallback;
  try {
    const v = JSON.parse(s) as unknown;
    return guard(v) ? v : fallback;
  } catch {
    return fallback;
  }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === "string");
}
