import { GoogleGenerativeAI } from "@google/generative-ai";
import { CompletionOptions, LlmClient, withTimeout } from "./types";

const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";
const FALLBACK_GEMINI_MODEL = "gemini-1.5-flash";

export class GeminiClient implements LlmClient {
  readonly name = "gemini";
  private client: GoogleGenerativeAI;
  private models: string[];

  constructor(apiKey: string, primary = DEFAULT_GEMINI_MODEL, fallback = FALLBACK_GEMINI_MODEL) {
    this.client = new GoogleGenerativeAI(apiKey);
    this.models = [primary, fallback].filter((m, idx, arr) => arr.indexOf(m) === idx);
  }

  private async callModel(modelName: string, prompt: string, options: CompletionOptions): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: modelName,
      systemInstruction: options.system,
      generationConfig: {
        maxOutputTokens: options.maxOutputTokens,
        temperature: options.temperature
      }
    });
    const result = await model.generateContent(prompt);
    return result.response.text();
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    let lastErr: unknown = null;
    for (const model of this.models) {
      try {
        return await withTimeout(this.callModel(model, prompt, options), options.timeoutMs, "Gemini");
      } catch (err) {
        lastErr = err;
      }
    }
    throw lastErr instanceof Error ? lastErr : new Error("Gemini failed");
  }
}
