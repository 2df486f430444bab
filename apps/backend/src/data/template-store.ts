import createDebug from "debug";
import { randomUUID } from "crypto";
import { readFileSync } from "fs";
import { join } from "path";
import { BACKEND_ROOT } from "../env.js";
import {
  EMPTY_SCHEMA,
  parseVariableSchema,
} from "../templates/variable-schema.js";
import type { Template, VariableSchema } from "../types.js";
import { parseJson } from "../utils/helpers.js";
import type { Db } from "./db.js";

const debug = createDebug("playforge:templates");

export const DEFAULT_TEMPLATES_PATH = join(
  BACKEND_ROOT,
  "data",
  "default-templates.json",
);

export interface TemplateInput {
  name: string;
  description?: string;
  body: string;
  /** Unvalidated schema document; absent means no variables are accepted. */
  variablesSchema?: unknown;
}

export type TemplatePatch = Partial<TemplateInput>;

export type TemplateOutcome =
  | { ok: true; template: Template }
  | { ok: false; errors: string[] };

export interface ListOptions {
  includeDeleted?: boolean;
}

export interface TemplateStore {
  create(input: TemplateInput): Promise<TemplateOutcome>;
  get(id: string, options?: ListOptions): Promise<Template | null>;
  list(options?: ListOptions): Promise<Template[]>;
  update(id: string, patch: TemplatePatch): Promise<TemplateOutcome>;
  softDelete(id: string): Promise<boolean>;
  /** Insert each definition whose name is not stored yet. Returns the count. */
  seedDefaults(definitions?: TemplateInput[]): Promise<number>;
}

interface TemplateRow {
  id: string;
  name: string;
  description: string;
  body: string;
  variables_schema: string;
  created_at: string;
  deleted: number;
}

function isVariableSchema(v: unknown): v is VariableSchema {
  return parseVariableSchema(v).ok;
}

function toTemplate(r: TemplateRow): Template {
  return {
    id: r.id,
    name: r.name,
    description: r.description,
    body: r.body,
    variablesSchema: parseJson(
      r.variables_schema,
      isVariableSchema,
      EMPTY_SCHEMA,
    ),
    createdAt: r.created_at,
    deleted: r.deleted !== 0,
  };
}

function checkInput(input: TemplateInput): string[] | VariableSchema {
  const errors: string[] = [];
  if (!input.name.trim()) errors.push("Template name is required");
  if (!input.body.trim()) errors.push("Template body is required");
  const schema = parseVariableSchema(input.variablesSchema);
  if (!schema.ok) {
    errors.push(...schema.errors.map((e) => `Invalid variables schema: ${e}`));
  }
  if (errors.length > 0 || !schema.ok) return errors;
  return schema.schema;
}

/** Read the bundled template definitions. */
export function loadDefaultTemplates(
  path = DEFAULT_TEMPLATES_PATH,
): TemplateInput[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!Array.isArray(raw)) {
    throw new Error(`Default templates file must contain a list: ${path}`);
  }
  return raw.map((entry: unknown, i) => {
    if (
      typeof entry !== "object" ||
      entry === null ||
      !("name" in entry) ||
      typeof entry.name !== "string" ||
      !("body" in entry) ||
      typeof entry.body !== "string"
    ) {
      throw new Error(`Default template ${i} needs a name and a body`);
    }
    return {
      name: entry.name,
      body: entry.body,
      description:
        "description" in entry && typeof entry.description === "string"
          ? entry.description
          : "",
      variablesSchema:
        "variablesSchema" in entry ? entry.variablesSchema : undefined,
    };
  });
}

export function initTemplateStore(
  db: Db,
  now: () => Date = () => new Date(),
): TemplateStore {
  const selectById = db.prepare<[string], TemplateRow>(
    "SELECT * FROM templates WHERE id = ?",
  );
  const selectByName = db.prepare<[string], TemplateRow>(
    "SELECT * FROM templates WHERE name = ? LIMIT 1",
  );
  const selectAll = db.prepare<[], TemplateRow>(
    "SELECT * FROM templates ORDER BY created_at ASC, rowid ASC",
  );
  const selectLive = db.prepare<[], TemplateRow>(
    `SELECT * FROM templates WHERE deleted = 0
     ORDER BY created_at ASC, rowid ASC`,
  );
  const insert = db.prepare<[TemplateRow]>(`
    INSERT INTO templates
      (id, name, description, body, variables_schema, created_at, deleted)
    VALUES (
      @id, @name, @description, @body, @variables_schema, @created_at,
      @deleted
    )
  `);
  const updateRow = db.prepare<
    [
      Pick<
        TemplateRow,
        "id" | "name" | "description" | "body" | "variables_schema"
      >,
    ]
  >(`
    UPDATE templates
    SET name = @name, description = @description, body = @body,
        variables_schema = @variables_schema
    WHERE id = @id AND deleted = 0
  `);
  const markDeleted = db.prepare<[string]>(
    "UPDATE templates SET deleted = 1 WHERE id = ? AND deleted = 0",
  );

  function getLive(id: string): TemplateRow | undefined {
    const row = selectById.get(id);
    return row && row.deleted === 0 ? row : undefined;
  }

  function createSync(input: TemplateInput): TemplateOutcome {
    const checked = checkInput(input);
    if (Array.isArray(checked)) return { ok: false, errors: checked };
    const row: TemplateRow = {
      id: randomUUID(),
      name: input.name.trim(),
      description: input.description ?? "",
      body: input.body,
      variables_schema: JSON.stringify(checked),
      created_at: now().toISOString(),
      deleted: 0,
    };
    insert.run(row);
    debug("created template %s (%s)", row.name, row.id);
    return { ok: true, template: toTemplate(row) };
  }

  return {
    async create(input: TemplateInput): Promise<TemplateOutcome> {
      return createSync(input);
    },

    async get(id: string, options: ListOptions = {}): Promise<Template | null> {
      const row = options.includeDeleted ? selectById.get(id) : getLive(id);
      return row ? toTemplate(row) : null;
    },

    async list(options: ListOptions = {}): Promise<Template[]> {
      const rows = options.includeDeleted ? selectAll.all() : selectLive.all();
      return rows.map(toTemplate);
    },

    async update(id: string, patch: TemplatePatch): Promise<TemplateOutcome> {
      const current = getLive(id);
      if (!current) return { ok: false, errors: [`Template not found: ${id}`] };
      const merged: TemplateInput = {
        name: patch.name ?? current.name,
        description: patch.description ?? current.description,
        body: patch.body ?? current.body,
        variablesSchema:
          patch.variablesSchema !== undefined
            ? patch.variablesSchema
            : toTemplate(current).variablesSchema,
      };
      const checked = checkInput(merged);
      if (Array.isArray(checked)) return { ok: false, errors: checked };
      const row = {
        id,
        name: merged.name.trim(),
        description: merged.description ?? "",
        body: merged.body,
        variables_schema: JSON.stringify(checked),
      };
      updateRow.run(row);
      debug("updated template %s", id);
      return { ok: true, template: toTemplate({ ...current, ...row }) };
    },

    async softDelete(id: string): Promise<boolean> {
      const deleted = markDeleted.run(id).changes > 0;
      if (deleted) debug("deleted template %s", id);
      return deleted;
    },

    async seedDefaults(
      definitions: TemplateInput[] = loadDefaultTemplates(),
    ): Promise<number> {
      const seed = db.transaction((defs: TemplateInput[]) => {
        let added = 0;
        for (const def of defs) {
          if (selectByName.get(def.name.trim())) continue;
          const outcome = createSync(def);
          if (!outcome.ok) {
            const reasons = outcome.errors.join("; ");
            throw new Error(`Invalid default template ${def.name}: ${reasons}`);
          }
          added++;
        }
        return added;
      });
      const added = seed(definitions);
      debug("seeded %d default templates", added);
      return added;
    },
  };
}
