import { z } from "zod";
import type { FieldSchema, FieldType, VariableSchema } from "../types.js";

const FIELD_TYPES = [
  "string",
  "integer",
  "number",
  "boolean",
  "array",
  "object",
] as const satisfies readonly FieldType[];

const TYPE_CHECKS: Record<FieldType, { schema: z.ZodTypeAny; label: string }> =
  {
    string: { schema: z.string(), label: "a string" },
    integer: { schema: z.number().int(), label: "an integer" },
    number: { schema: z.number(), label: "a number" },
    boolean: { schema: z.boolean(), label: "a boolean" },
    array: { schema: z.array(z.unknown()), label: "a list" },
    object: {
      schema: z.record(z.string(), z.unknown()),
      label: "an object",
    },
  };

/**
 * Problems with a single value against its field definition: the type check
 * first, then the enum check (skipped when the type is already wrong).
 */
export function checkField(
  name: string,
  field: FieldSchema,
  value: unknown,
): string[] {
  if (field.type) {
    const check = TYPE_CHECKS[field.type];
    if (!check.schema.safeParse(value).success) {
      return [`Field ${name} must be ${check.label}`];
    }
  }
  if (field.enum && !field.enum.includes(value)) {
    const allowed = field.enum.map(String).join(", ");
    return [`Field ${name} must be one of: ${allowed}`];
  }
  return [];
}

const fieldSchema = z.object({
  type: z.enum(FIELD_TYPES).optional(),
  description: z.string().optional(),
  enum: z.array(z.unknown()).min(1).optional(),
  default: z.unknown().optional(),
});

const variableSchemaSchema = z
  .object({
    type: z.literal("object").default("object"),
    properties: z.record(z.string(), fieldSchema).default({}),
    required: z.array(z.string()).optional(),
  })
  .superRefine((schema, ctx) => {
    for (const name of schema.required ?? []) {
      if (!(name in schema.properties)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["required"],
          message: `required field ${name} is not defined in properties`,
        });
      }
    }
    for (const [name, field] of Object.entries(schema.properties)) {
      if (field.default === undefined) continue;
      for (const message of checkField(name, field, field.default)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["properties", name, "default"],
          message: `default does not satisfy its field: ${message}`,
        });
      }
    }
  });

export type SchemaOutcome =
  | { ok: true; schema: VariableSchema }
  | { ok: false; errors: string[] };

/** Validate a variable schema document, as stored or submitted. */
export function parseVariableSchema(input: unknown): SchemaOutcome {
  const parsed = variableSchemaSchema.safeParse(input ?? {});
  if (parsed.success) return { ok: true, schema: parsed.data };
  return {
    ok: false,
    errors: parsed.error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    ),
  };
}

export const EMPTY_SCHEMA: VariableSchema = { type: "object", properties: {} };
