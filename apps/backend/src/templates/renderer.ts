import type { RenderResult, Template, VariableSchema } from "../types.js";
import { checkField } from "./variable-schema.js";

/**
 * `{{ name <filters> }}`. Quoted literals in the filter chain may contain
 * braces or parentheses.
 */
const PLACEHOLDER =
  /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)((?:[^}'"]|'[^']*'|"[^"]*"|\}(?!\}))*)\}\}/g;

/** One `| name` or `| name(literal)` step of a filter chain. */
const FILTER_STEP =
  /^\s*\|\s*([A-Za-z_][A-Za-z0-9_]*)\s*(?:\(\s*('[^']*'|"[^"]*"|[^()'",]*?)\s*\))?/;

/**
 * Every problem with the supplied variables, in a stable order: required
 * fields first (in schema order), then each supplied field in input order.
 * An empty list means the variables can be rendered.
 */
export function validateVariables(
  schema: VariableSchema,
  variables: Readonly<Record<string, unknown>>,
): string[] {
  const errors: string[] = [];
  for (const name of schema.required ?? []) {
    if (!Object.hasOwn(variables, name)) {
      errors.push(`Required field missing: ${name}`);
    }
  }
  for (const [name, value] of Object.entries(variables)) {
    const field = Object.hasOwn(schema.properties, name)
      ? schema.properties[name]
      : undefined;
    if (!field) {
      errors.push(`Unknown field: ${name}`);
      continue;
    }
    errors.push(...checkField(name, field, value));
  }
  return errors;
}

/** Supplied values merged over the schema's declared defaults. */
export function applyDefaults(
  schema: VariableSchema,
  variables: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [name, field] of Object.entries(schema.properties)) {
    if (field.default !== undefined) values[name] = field.default;
  }
  return { ...values, ...variables };
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function unquote(literal: string): string {
  const m = /^(['"])(.*)\1$/s.exec(literal);
  return m ? m[2] : literal;
}

function toInt(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string") {
    const n = Number.parseInt(value.trim(), 10);
    return Number.isNaN(n) ? 0 : n;
  }
  return 0;
}

type Filter = (value: unknown, arg: string | undefined) => unknown;

/** Filters applied at render time; any other filter on a schema field fails. */
const FILTERS: Readonly<Record<string, Filter>> = {
  default: (value, arg) =>
    value === undefined ? unquote(arg ?? "") : value,
  int: (value) => toInt(value),
  string: (value) => formatValue(value),
  lower: (value) => formatValue(value).toLowerCase(),
  upper: (value) => formatValue(value).toUpperCase(),
  to_json: (value) => JSON.stringify(value ?? null),
  join: (value, arg) =>
    Array.isArray(value)
      ? value.map(formatValue).join(unquote(arg ?? ""))
      : formatValue(value),
};

const TAKES_ARGUMENT = new Set(["default", "join"]);

type Filtered = { ok: true; value: unknown } | { ok: false };

/** Run the filter chain written after a field name, left to right. */
function applyFilters(value: unknown, chain: string): Filtered {
  let rest = chain.trim();
  let current = value;
  while (rest.length > 0) {
    const m = FILTER_STEP.exec(rest);
    if (!m || !Object.hasOwn(FILTERS, m[1])) return { ok: false };
    const [step, name, arg] = m;
    if (arg !== undefined && !TAKES_ARGUMENT.has(name)) return { ok: false };
    current = FILTERS[name](current, arg);
    rest = rest.slice(step.length).trim();
  }
  return { ok: true, value: current };
}

/**
 * Substitute validated variables into the template body in one pass, so a
 * substituted value containing `{{ ... }}` is never expanded again.
 * Placeholders that name no schema field are kept verbatim for the
 * execution engine's own templating. A schema field used with a filter the
 * renderer cannot apply is reported instead of being left half-rendered.
 */
export function render(
  template: Pick<Template, "body" | "variablesSchema">,
  variables: Readonly<Record<string, unknown>>,
): RenderResult {
  const schema = template.variablesSchema;
  const errors = validateVariables(schema, variables);
  if (errors.length > 0) return { ok: false, errors };

  const values = applyDefaults(schema, variables);
  const unsupported = new Set<string>();
  const script = template.body.replace(
    PLACEHOLDER,
    (match: string, name: string, chain: string) => {
      if (!Object.hasOwn(schema.properties, name)) return match;
      const value = Object.hasOwn(values, name) ? values[name] : undefined;
      const result = applyFilters(value, chain);
      if (!result.ok) {
        unsupported.add(`Field ${name} uses an unsupported filter`);
        return match;
      }
      return formatValue(result.value);
    },
  );
  if (unsupported.size > 0) return { ok: false, errors: [...unsupported] };
  return { ok: true, script };
}
