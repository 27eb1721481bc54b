import { GoogleGenAI } from "@google/genai";
import OpenAI from "openai";
import Anthropic from "@anthropic-ai/sdk";
import { PERPLEXITY_BASE_URL } from "./constants.js";
import { ProviderError } from "./types.js";

// One SDK client per family and credential, built on first use.
const clients = new Map<string, GoogleGenAI | OpenAI | Anthropic>();

function requireKey(apiKey: string | undefined, variable: string, family: string): string {
  if (!apiKey) {
    throw new ProviderError(`Missing ${variable}`, "permanent", family);
  }
  return apiKey;
}

function cached<T extends GoogleGenAI | OpenAI | Anthropic>(
  key: string,
  matches: (client: GoogleGenAI | OpenAI | Anthropic) => client is T,
  build: () => T
): T {
  const existing = clients.get(key);
  if (existing && matches(existing)) return existing;
  const client = build();
  clients.set(key, client);
  return client;
}

const isGemini = (client: GoogleGenAI | OpenAI | Anthropic): client is GoogleGenAI => client instanceof GoogleGenAI;
const isOpenAI = (client: GoogleGenAI | OpenAI | Anthropic): client is OpenAI => client instanceof OpenAI;
const isAnthropic = (client: GoogleGenAI | OpenAI | Anthropic): client is Anthropic => client instanceof Anthropic;

// Retries belong to the engine's controller, so every SDK runs with maxRetries 0.

export function getGemini(apiKey: string | undefined): GoogleGenAI {
  const key = requireKey(apiKey, "GEMINI_API_KEY", "gemini");
  return cached(`gemini|${key}`, isGemini, () => new GoogleGenAI({ apiKey: key }));
}

export function getOpenAI(apiKey: string | undefined): OpenAI {
  const key = requireKey(apiKey, "OPENAI_API_KEY", "openai");
  return cached(`openai|${key}`, isOpenAI, () => new OpenAI({ apiKey: key, maxRetries: 0 }));
}

export function getAnthropic(apiKey: string | undefined): Anthropic {
  const key = requireKey(apiKey, "ANTHROPIC_API_KEY", "anthropic");
  return cached(`anthropic|${key}`, isAnthropic, () => new Anthropic({ apiKey: key, maxRetries: 0 }));
}

export function getPerplexity(apiKey: string | undefined): OpenAI {
  const key = requireKey(apiKey, "PERPLEXITY_API_KEY", "perplexity");
  return getOpenAICompatible(PERPLEXITY_BASE_URL, key);
}

/**
 * Client for servers speaking the OpenAI chat API (Ollama, Perplexity).
 * Local servers accept any key.
 */
export function getOpenAICompatible(baseURL: string, apiKey: string): OpenAI {
  return cached(`compatible|${baseURL}|${apiKey}`, isOpenAI, () => new OpenAI({ baseURL, apiKey, maxRetries: 0 }));
}

export function resetClients(): void {
  clients.clear();
}
