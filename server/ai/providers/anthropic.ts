import Anthropic from "@anthropic-ai/sdk";
import type { ContentBlockParam, MessageParam } from "@anthropic-ai/sdk/resources/messages";
import { DEFAULT_MAX_TOKENS } from "../constants.js";
import { ProviderError, type FinishReason, type PreparedMedia } from "../types.js";
import { connectionError, errorFromStatus } from "./errors.js";
import { lastUserIndex, type ProviderCall, type ProviderTransport, type TransportReply } from "./types.js";

type ImageMediaType = "image/jpeg" | "image/png" | "image/gif" | "image/webp";

function isImageMediaType(mimeType: string): mimeType is ImageMediaType {
  return mimeType === "image/jpeg" || mimeType === "image/png" || mimeType === "image/gif" || mimeType === "image/webp";
}

function toImageBlock(media: PreparedMedia): ContentBlockParam {
  if (!isImageMediaType(media.mimeType)) {
    throw new ProviderError(`anthropic does not accept ${media.mimeType}`, "permanent", "anthropic");
  }
  return { type: "image", source: { type: "base64", media_type: media.mimeType, data: media.data } };
}

function toAnthropicMessages(call: ProviderCall): { system?: string; messages: MessageParam[] } {
  const system = call.messages.filter((m) => m.role === "system").map((m) => m.content);
  const attachAt = call.media.length > 0 ? lastUserIndex(call.messages) : -1;

  const messages: MessageParam[] = [];
  call.messages.forEach((message, i) => {
    if (message.role === "system") return;
    if (message.role === "assistant") {
      messages.push({ role: "assistant", content: message.content });
      return;
    }
    if (i !== attachAt) {
      messages.push({ role: "user", content: message.content });
      return;
    }
    messages.push({
      role: "user",
      content: [...call.media.map(toImageBlock), { type: "text", text: message.content }],
    });
  });

  return { system: system.length > 0 ? system.join("\n\n") : undefined, messages };
}

function toFinishReason(reason: string | null): FinishReason {
  if (reason === "end_turn" || reason === "stop_sequence") return "stop";
  if (reason === "max_tokens") return "length";
  return "other";
}

export class AnthropicTransport implements ProviderTransport {
  readonly family = "anthropic";

  constructor(private readonly client: () => Anthropic) {}

  async generate(call: ProviderCall, signal?: AbortSignal): Promise<TransportReply> {
    const anthropic = this.client();
    const { system, messages } = toAnthropicMessages(call);

    try {
      const response = await anthropic.messages.create(
        {
          model: call.model,
          max_tokens: call.params.maxTokens ?? DEFAULT_MAX_TOKENS,
          // Messages API caps temperature at 1.
          temperature: Math.min(1, call.params.temperature),
          ...(system ? { system } : {}),
          messages,
        },
        { signal }
      );

      const text = response.content.map((block) => (block.type === "text" ? block.text : "")).join("");
      return { text, finishReason: toFinishReason(response.stop_reason) };
    } catch (error) {
      if (error instanceof Anthropic.APIUserAbortError) {
        throw error;
      }
      if (error instanceof Anthropic.APIError && typeof error.status === "number") {
        throw errorFromStatus(this.family, error.status, error.message, error.headers);
      }
      throw connectionError(this.family, error);
    }
  }
}
