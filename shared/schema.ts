import { z } from "zod";

// ============================================
// OUTPUT SCHEMA DESCRIPTOR
// ============================================

export type FieldType =
  | { kind: "string"; minLength?: number }
  | { kind: "number"; min?: number; max?: number }
  | { kind: "integer"; min?: number; max?: number }
  | { kind: "boolean" }
  | { kind: "enum"; values: string[] }
  | { kind: "array"; items: FieldType; minItems?: number }
  | { kind: "object"; fields: FieldSpec[] };

export interface FieldSpec {
  name: string;
  type: FieldType;
  /** Defaults to true when omitted. */
  required?: boolean;
  description?: string;
}

export const fieldTypeSchema: z.ZodType<FieldType> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("string"), minLength: z.number().int().nonnegative().optional() }),
    z.object({ kind: z.literal("number"), min: z.number().optional(), max: z.number().optional() }),
    z.object({ kind: z.literal("integer"), min: z.number().int().optional(), max: z.number().int().optional() }),
    z.object({ kind: z.literal("boolean") }),
    z.object({ kind: z.literal("enum"), values: z.array(z.string().min(1)).min(1, "Enum needs at least one value") }),
    z.object({
      kind: z.literal("array"),
      items: fieldTypeSchema,
      minItems: z.number().int().nonnegative().optional(),
    }),
    z.object({ kind: z.literal("object"), fields: z.array(fieldSpecSchema).min(1, "Object needs at least one field") }),
  ])
);

export const fieldSpecSchema: z.ZodType<FieldSpec> = z.lazy(() =>
  z.object({
    name: z.string().min(1, "Field name required"),
    type: fieldTypeSchema,
    required: z.boolean().optional(),
    description: z.string().optional(),
  })
);

export const outputSchemaSchema = z.object({
  name: z.string().min(1, "Schema name required"),
  description: z.string().optional(),
  fields: z.array(fieldSpecSchema).min(1, "At least 1 field required"),
});

export type OutputSchema = z.infer<typeof outputSchemaSchema>;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type StructuredPayload = { [key: string]: JsonValue };

// ============================================
// MEDIA
// ============================================

export const mediaReferenceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("path"), path: z.string().min(1, "Media path required") }),
  z.object({ kind: z.literal("bytes"), data: z.instanceof(Uint8Array), label: z.string().optional() }),
  z.object({ kind: z.literal("dataUrl"), url: z.string().startsWith("data:", "Expected a data: URL") }),
]);

export type MediaReference = z.infer<typeof mediaReferenceSchema>;

// ============================================
// REQUEST
// ============================================

export const promptMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

export type PromptMessage = z.infer<typeof promptMessageSchema>;

export const generationParamsSchema = z.object({
  temperature: z.number().min(0).max(2).default(0.2),
  maxTokens: z.number().int().positive().optional(),
});

export type GenerationParams = z.infer<typeof generationParamsSchema>;

export const engineRequestSchema = z.object({
  model: z
    .string()
    .min(1, "Model identifier required")
    .regex(/^[a-z0-9_-]+\/.+$/i, "Model identifier must look like <family>/<model>"),
  messages: z
    .array(promptMessageSchema)
    .min(1, "At least 1 message required")
    .refine((messages) => messages.some((m) => m.role === "user" && m.content.trim() !== ""), "A non-empty user message is required"),
  params: generationParamsSchema.default({}),
  schema: outputSchemaSchema.optional(),
  media: z.array(mediaReferenceSchema).default([]),
  minContentLength: z.number().int().nonnegative().optional(),
});

export type EngineRequestInput = z.input<typeof engineRequestSchema>;
export type EngineRequest = Readonly<z.infer<typeof engineRequestSchema>>;

// ============================================
// JUDGE
// ============================================

export const judgeInputSchema = z.object({
  response: z.string(),
  reference: z.string().min(1, "Reference answer required"),
  prompt: z.string().optional(),
  context: z.string().optional(),
});

export type JudgeInput = z.infer<typeof judgeInputSchema>;

export const criteriaScoresSchema = z.object({
  accuracy: z.number().min(0).max(1),
  completeness: z.number().min(0).max(1),
  relevance: z.number().min(0).max(1),
  clarity: z.number().min(0).max(1),
});

export type CriteriaScores = z.infer<typeof criteriaScoresSchema>;

export const judgeVerdictSchema = z.object({
  score: z.number().min(0).max(1),
  rationale: z.string(),
  reference: z.string(),
  isCorrect: z.boolean(),
  feedback: z.string().optional(),
  criteria: criteriaScoresSchema.optional(),
  lexicalOverlap: z.number().min(0).max(1),
  model: z.string(),
});

export type JudgeVerdict = z.infer<typeof judgeVerdictSchema>;
