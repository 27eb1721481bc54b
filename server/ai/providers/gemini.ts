import { ApiError, FinishReason as GeminiFinishReason, type Content, type GoogleGenAI, type Part } from "@google/genai";
import { DEFAULT_MAX_TOKENS } from "../constants.js";
import type { FinishReason } from "../types.js";
import { connectionError, errorFromStatus, parseRetryDelayMs } from "./errors.js";
import { lastUserIndex, type ProviderCall, type ProviderTransport, type TransportReply } from "./types.js";

function toGeminiContents(call: ProviderCall): { systemInstruction?: string; contents: Content[] } {
  const system = call.messages.filter((m) => m.role === "system").map((m) => m.content);
  const attachAt = call.media.length > 0 ? lastUserIndex(call.messages) : -1;

  const contents: Content[] = [];
  call.messages.forEach((message, i) => {
    if (message.role === "system") return;

    const parts: Part[] = [];
    if (i === attachAt) {
      for (const media of call.media) {
        parts.push({ inlineData: { mimeType: media.mimeType, data: media.data } });
      }
    }
    parts.push({ text: message.content });
    contents.push({ role: message.role === "assistant" ? "model" : "user", parts });
  });

  return {
    systemInstruction: system.length > 0 ? system.join("\n\n") : undefined,
    contents,
  };
}

function toFinishReason(reason: GeminiFinishReason | undefined): FinishReason {
  if (reason === GeminiFinishReason.STOP) return "stop";
  if (reason === GeminiFinishReason.MAX_TOKENS) return "length";
  return "other";
}

export class GeminiTransport implements ProviderTransport {
  readonly family = "gemini";

  constructor(private readonly client: () => GoogleGenAI) {}

  async generate(call: ProviderCall, signal?: AbortSignal): Promise<TransportReply> {
    const ai = this.client();
    const { systemInstruction, contents } = toGeminiContents(call);

    try {
      const response = await ai.models.generateContent({
        model: call.model,
        contents,
        config: {
          systemInstruction,
          temperature: call.params.temperature,
          maxOutputTokens: call.params.maxTokens ?? DEFAULT_MAX_TOKENS,
          responseMimeType: call.json ? "application/json" : undefined,
          abortSignal: signal,
        },
      });

      return {
        text: response.text || "",
        finishReason: toFinishReason(response.candidates?.[0]?.finishReason),
      };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      if (error instanceof ApiError) {
        throw errorFromStatus(this.family, error.status, error.message, undefined, parseRetryDelayMs(error.message));
      }
      throw connectionError(this.family, error);
    }
  }
}
