import dotenv from "dotenv";
import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const BACKEND_ROOT = resolve(join(__dirname, ".."));
const PROJECT_ROOT = resolve(join(__dirname, "..", "..", ".."));
const WORKSPACE_ROOT = join(PROJECT_ROOT, "workspace");

export { BACKEND_ROOT, PROJECT_ROOT, WORKSPACE_ROOT };

export type EnvSource = Record<string, string | undefined>;

/**
 * Load .env from the project root and return the process environment.
 * Only process entry points call this; everything else receives an AppConfig.
 */
export function loadEnv(): EnvSource {
  dotenv.config({ path: join(PROJECT_ROOT, ".env") });
  return process.env;
}

export function str(
  source: EnvSource,
  name: string,
  defaultValue: string,
): string {
  const v = source[name];
  return (typeof v === "string" && v.trim()) || defaultValue;
}

export function num(
  source: EnvSource,
  name: string,
  defaultValue: number,
): number {
  const v = source[name];
  if (v === undefined || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) ? n : defaultValue;
}
