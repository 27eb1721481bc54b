import type { GenerationParams, PromptMessage } from "../../../shared/schema.js";
import type { FinishReason, PreparedMedia } from "../types.js";

export interface ProviderCall {
  /** Backend-native model name, without the family prefix. */
  model: string;
  messages: PromptMessage[];
  params: GenerationParams;
  media: PreparedMedia[];
  /** Ask the backend for a JSON object where it supports that. */
  json: boolean;
}

export interface TransportReply {
  text: string;
  finishReason: FinishReason;
}

/**
 * One backend family. Implementations map the call to their wire format,
 * throw ProviderError for classified failures and never retry.
 */
export interface ProviderTransport {
  readonly family: string;
  generate(call: ProviderCall, signal?: AbortSignal): Promise<TransportReply>;
}

/** Media is attached to the last user turn. */
export function lastUserIndex(messages: PromptMessage[]): number {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === "user") return i;
  }
  return -1;
}
