import OpenAI from "openai";
import type { ChatCompletionContentPart, ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { DEFAULT_MAX_TOKENS } from "../constants.js";
import type { FinishReason } from "../types.js";
import { connectionError, errorFromStatus } from "./errors.js";
import { lastUserIndex, type ProviderCall, type ProviderTransport, type TransportReply } from "./types.js";

function toOpenAIMessages(call: ProviderCall): ChatCompletionMessageParam[] {
  const attachAt = call.media.length > 0 ? lastUserIndex(call.messages) : -1;

  return call.messages.map((message, i): ChatCompletionMessageParam => {
    switch (message.role) {
      case "system":
        return { role: "system", content: message.content };
      case "assistant":
        return { role: "assistant", content: message.content };
      case "user": {
        if (i !== attachAt) {
          return { role: "user", content: message.content };
        }
        const parts: ChatCompletionContentPart[] = [{ type: "text", text: message.content }];
        for (const media of call.media) {
          parts.push({ type: "image_url", image_url: { url: `data:${media.mimeType};base64,${media.data}` } });
        }
        return { role: "user", content: parts };
      }
    }
  });
}

function toFinishReason(reason: string | null | undefined): FinishReason {
  if (reason === "stop") return "stop";
  if (reason === "length") return "length";
  return "other";
}

export interface OpenAITransportOptions {
  family: string;
  client: () => OpenAI;
  /** Perplexity rejects `response_format: json_object`. */
  supportsJsonMode?: boolean;
}

/**
 * Transport for the OpenAI chat completions API and servers that mimic it.
 */
export class OpenAITransport implements ProviderTransport {
  readonly family: string;
  private readonly client: () => OpenAI;
  private readonly supportsJsonMode: boolean;

  constructor(options: OpenAITransportOptions) {
    this.family = options.family;
    this.client = options.client;
    this.supportsJsonMode = options.supportsJsonMode ?? true;
  }

  async generate(call: ProviderCall, signal?: AbortSignal): Promise<TransportReply> {
    const client = this.client();

    try {
      const response = await client.chat.completions.create(
        {
          model: call.model,
          messages: toOpenAIMessages(call),
          temperature: call.params.temperature,
          max_tokens: call.params.maxTokens ?? DEFAULT_MAX_TOKENS,
          ...(call.json && this.supportsJsonMode ? { response_format: { type: "json_object" as const } } : {}),
        },
        { signal }
      );

      const choice = response.choices[0];
      return {
        text: choice?.message?.content || "",
        finishReason: toFinishReason(choice?.finish_reason),
      };
    } catch (error) {
      if (error instanceof OpenAI.APIUserAbortError) {
        throw error;
      }
      if (error instanceof OpenAI.APIError && typeof error.status === "number") {
        throw errorFromStatus(this.family, error.status, error.message, error.headers);
      }
      throw connectionError(this.family, error);
    }
  }
}
