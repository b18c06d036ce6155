import OpenAI from "openai";
import { CompletionOptions, LlmClient } from "./types";

const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

export class OpenAIClient implements LlmClient {
  readonly name = "openai";
  private client: OpenAI;
  private model: string;

  constructor(apiKey: string, model = DEFAULT_OPENAI_MODEL) {
    this.client = new OpenAI({ apiKey });
    this.model = model;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);
    try {
      const input: { role: "system" | "user"; content: string }[] = [];
      if (options.system) input.push({ role: "system", content: options.system });
      input.push({ role: "user", content: prompt });
      const response = await this.client.responses.create(
        {
          model: this.model,
          input,
          max_output_tokens: options.maxOutputTokens ?? 250,
          temperature: options.temperature ?? 0.6
        },
        { signal: controller.signal }
      );
      return response.output_text?.trim() || "";
    } finally {
      clearTimeout(timer);
    }
  }
}
