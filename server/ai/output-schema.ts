import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { isJsonObject } from "./parsers.js";
import type { FieldSpec, FieldType, OutputSchema, StructuredPayload } from "../../shared/schema.js";

function compileFieldType(type: FieldType): z.ZodTypeAny {
  switch (type.kind) {
    case "string": {
      const base = z.string();
      return type.minLength !== undefined ? base.min(type.minLength) : base;
    }
    case "number":
    case "integer": {
      let base = type.kind === "integer" ? z.number().int() : z.number();
      if (type.min !== undefined) base = base.min(type.min);
      if (type.max !== undefined) base = base.max(type.max);
      return base;
    }
    case "boolean":
      return z.boolean();
    case "enum":
      return z.string().refine((value) => type.values.includes(value), {
        message: `Expected one of: ${type.values.join(", ")}`,
      });
    case "array": {
      const base = z.array(compileFieldType(type.items));
      return type.minItems !== undefined ? base.min(type.minItems) : base;
    }
    case "object":
      return compileFields(type.fields);
  }
}

function compileFields(fields: FieldSpec[]): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const field of fields) {
    const compiled = compileFieldType(field.type);
    // Models often emit null for absent optional values.
    shape[field.name] =
      field.required === false
        ? z.preprocess((value) => (value === null ? undefined : value), compiled.optional())
        : compiled;
  }
  return z.object(shape);
}

export interface CompiledOutputSchema {
  descriptor: OutputSchema;
  parse(value: unknown): { success: true; data: StructuredPayload } | { success: false; error: string };
}

/**
 * Turns a declarative field list into a checker. Unknown keys are dropped,
 * so a validated payload only ever carries declared fields.
 */
export function compileOutputSchema(descriptor: OutputSchema): CompiledOutputSchema {
  const schema = compileFields(descriptor.fields);
  return {
    descriptor,
    parse(value: unknown) {
      const result = schema.safeParse(value);
      if (result.success) {
        // Drops keys whose optional value came back as undefined.
        const data: unknown = JSON.parse(JSON.stringify(result.data));
        if (isJsonObject(data)) {
          return { success: true, data };
        }
        return { success: false, error: `Response does not match "${descriptor.name}": payload is not plain JSON` };
      }
      return {
        success: false,
        error: fromZodError(result.error, { prefix: `Response does not match "${descriptor.name}"` }).message,
      };
    },
  };
}

export function describeFieldType(type: FieldType): string {
  switch (type.kind) {
    case "string":
      return type.minLength ? `string, at least ${type.minLength} characters` : "string";
    case "number":
    case "integer": {
      const bounds: string[] = [];
      if (type.min !== undefined) bounds.push(`>= ${type.min}`);
      if (type.max !== undefined) bounds.push(`<= ${type.max}`);
      return bounds.length ? `${type.kind} ${bounds.join(" and ")}` : type.kind;
    }
    case "boolean":
      return "boolean";
    case "enum":
      return `one of ${type.values.map((v) => JSON.stringify(v)).join(" | ")}`;
    case "array":
      return `array of ${describeFieldType(type.items)}${type.minItems ? `, at least ${type.minItems} items` : ""}`;
    case "object":
      return "object";
  }
}

function renderFields(fields: FieldSpec[], depth: number): string[] {
  const indent = "  ".repeat(depth);
  const lines: string[] = [];
  for (const field of fields) {
    const required = field.required === false ? "optional" : "required";
    const description = field.description ? `: ${field.description}` : "";
    lines.push(`${indent}- "${field.name}" (${describeFieldType(field.type)}, ${required})${description}`);
    if (field.type.kind === "object") {
      lines.push(...renderFields(field.type.fields, depth + 1));
    } else if (field.type.kind === "array" && field.type.items.kind === "object") {
      lines.push(...renderFields(field.type.items.fields, depth + 1));
    }
  }
  return lines;
}

/** Prompt section steering the backend toward the declared structure. */
export function renderSchemaInstructions(descriptor: OutputSchema): string {
  const header = descriptor.description
    ? `Respond with a single JSON object describing ${descriptor.name} (${descriptor.description}).`
    : `Respond with a single JSON object describing ${descriptor.name}.`;
  return [
    header,
    "Do not wrap it in prose. Use exactly these fields:",
    ...renderFields(descriptor.fields, 0),
  ].join("\n");
}
