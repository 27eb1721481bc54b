import crypto from "crypto";
import path from "path";
import type { EngineRequest, FieldSpec, FieldType, JsonValue, MediaReference } from "../../shared/schema.js";
import { FINGERPRINT_VERSION } from "./constants.js";

/**
 * Collapses formatting that does not change what the backend is asked:
 * line endings, trailing spaces on each line, runs of blank lines and
 * surrounding whitespace.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/[ \t\u00A0]+$/g, ""))
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** JSON with object keys sorted at every depth. */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const keys = Object.keys(value).sort();
    return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

function canonicalFieldType(type: FieldType): JsonValue {
  switch (type.kind) {
    case "string":
      return { kind: type.kind, minLength: type.minLength ?? null };
    case "number":
    case "integer":
      return { kind: type.kind, min: type.min ?? null, max: type.max ?? null };
    case "boolean":
      return { kind: type.kind };
    case "enum":
      return { kind: type.kind, values: [...type.values] };
    case "array":
      return { kind: type.kind, items: canonicalFieldType(type.items), minItems: type.minItems ?? null };
    case "object":
      return { kind: type.kind, fields: canonicalFields(type.fields) };
  }
}

function canonicalFields(fields: FieldSpec[]): JsonValue {
  return fields.map((field) => ({
    name: field.name,
    type: canonicalFieldType(field.type),
    required: field.required !== false,
    description: field.description ? normalizeText(field.description) : null,
  }));
}

function mediaIdentity(media: MediaReference, contentDigest: string | undefined): JsonValue {
  switch (media.kind) {
    case "path":
      // Content decides identity; the location only stands in when the file could not be read.
      return contentDigest ? { kind: "bytes", sha256: contentDigest } : { kind: "path", path: path.resolve(media.path) };
    case "bytes":
      return { kind: "bytes", sha256: crypto.createHash("sha256").update(media.data).digest("hex") };
    case "dataUrl":
      // Same digest as the decoded bytes, so both spellings of one image match.
      return {
        kind: "bytes",
        sha256: crypto.createHash("sha256").update(Buffer.from(media.url.replace(/^data:[^,]*,/, ""), "base64")).digest("hex"),
      };
  }
}

/**
 * `pathDigests` holds the SHA-256 of the file behind each path reference,
 * aligned with `request.media`.
 */
export function canonicalRequest(request: EngineRequest, pathDigests: ReadonlyArray<string | undefined> = []): JsonValue {
  return {
    version: FINGERPRINT_VERSION,
    model: request.model.trim(),
    messages: request.messages
      .map((message) => ({ role: message.role, content: normalizeText(message.content) }))
      .filter((message) => message.content !== ""),
    params: {
      temperature: request.params.temperature,
      maxTokens: request.params.maxTokens ?? null,
    },
    schema: request.schema
      ? {
          name: request.schema.name,
          description: request.schema.description ? normalizeText(request.schema.description) : null,
          fields: canonicalFields(request.schema.fields),
        }
      : null,
    media: request.media.map((media, i) => mediaIdentity(media, pathDigests[i])),
    minContentLength: request.minContentLength ?? null,
  };
}

/** Fixed-width (64 hex chars) digest of the canonical request. */
export function fingerprint(request: EngineRequest, pathDigests: ReadonlyArray<string | undefined> = []): string {
  return crypto.createHash("sha256").update(canonicalJson(canonicalRequest(request, pathDigests))).digest("hex");
}
