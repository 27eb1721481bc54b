import type { JsonValue, StructuredPayload } from "../../shared/schema.js";
import logger from "../logger.js";
import { errorMessage, OutputParseError } from "./types.js";

function stripInvisible(text: string): string {
  return text
    .replace(/^\uFEFF/, "")
    .replace(/\u00A0/g, " ")
    .replace(/[\u200B\u200C\u200D\u2060\uFEFF]/g, "");
}

function unwrapCodeBlock(text: string): string {
  const codeBlockMatch = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (codeBlockMatch) {
    return codeBlockMatch[1].trim();
  }

  const openCodeBlockMatch = text.match(/```(?:json)?\s*\n([\s\S]*)/i);
  if (openCodeBlockMatch) {
    logger.debug("Extracted JSON from open code block (no closing backticks)");
    return openCodeBlockMatch[1].trim();
  }

  return text;
}

function repairJson(text: string): string {
  return text
    .replace(/[\u201C\u201D]/g, "\"")
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/,\s*}/g, "}")
    .replace(/,\s*]/g, "]");
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

/**
 * Pulls the first JSON object out of free-form model output.
 * Throws OutputParseError when no object can be recovered.
 */
export function extractJsonObject(text: string): Record<string, unknown> {
  const cleanText = unwrapCodeBlock(stripInvisible(text).trim()).trim();
  if (!cleanText) {
    throw new OutputParseError("Empty model output");
  }

  const direct = tryParse(cleanText);
  if (direct.ok && isPlainObject(direct.value)) {
    return direct.value;
  }

  const start = cleanText.indexOf("{");
  const end = cleanText.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) {
    logger.warn("No JSON object found in model output", { textPreview: text.substring(0, 200) });
    throw new OutputParseError("No JSON object found in response");
  }

  const sliced = cleanText.slice(start, end + 1);
  const parsed = tryParse(sliced);
  if (parsed.ok && isPlainObject(parsed.value)) {
    return parsed.value;
  }

  const repaired = tryParse(repairJson(sliced));
  if (repaired.ok && isPlainObject(repaired.value)) {
    return repaired.value;
  }

  const reason = repaired.ok ? "top-level value is not an object" : repaired.error;
  logger.warn("JSON parse error", { error: reason, textPreview: sliced.substring(0, 200) });
  throw new OutputParseError(`Failed to parse JSON response: ${reason}`);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  return isPlainObject(value) && Object.values(value).every(isJsonValue);
}

export function isJsonObject(value: unknown): value is StructuredPayload {
  return isPlainObject(value) && Object.values(value).every(isJsonValue);
}
