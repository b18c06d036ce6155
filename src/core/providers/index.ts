import { GeminiClient } from "./geminiClient";
import { OpenAIClient } from "./openaiClient";
import type { LlmClient } from "./types";

type Env = Record<string, string | undefined>;

/** Gemini first, OpenAI second, none when neither key is configured. */
export function createDefaultLlmClient(env: Env = process.env): LlmClient | null {
  const geminiKey = env.GEMINI_API_KEY || env.GOOGLE_API_KEY || "";
  if (geminiKey) {
    return new GeminiClient(geminiKey, env.GEMINI_MODEL || undefined, env.GEMINI_FALLBACK_MODEL || undefined);
  }
  const openaiKey = env.OPENAI_API_KEY || "";
  if (openaiKey) {
    return new OpenAIClient(openaiKey, env.OPENAI_MODEL || undefined);
  }
  return null;
}

export type { LlmClient, CompletionOptions } from "./types";
