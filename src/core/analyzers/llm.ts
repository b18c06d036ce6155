import type { LlmClient } from "../providers/types";
import { extractJson, isRecord, withTimeout } from "../providers/types";
import { clamp01 } from "../../utils/mask";
import { ConversationMessage, LlmVerdict, Result, fail, ok } from "../../utils/types";
import { describeError } from "../../utils/logging";

export type AnalyzerFailure = {
  analyzer: string;
  reason: "unavailable" | "timeout" | "malformed" | "error";
  detail: string;
};

export const NEUTRAL_LLM_VERDICT: Readonly<LlmVerdict> = Object.freeze({
  isScam: null,
  confidence: 0.5,
  scamType: "unknown",
  reasoning: "",
  redFlags: [],
  legitimacySignals: []
});

const SYSTEM_PROMPT = [
  "You are a fraud analyst reviewing messages sent to Indian mobile users.",
  "Decide whether the latest message is a scam attempt.",
  "Consider impersonation, urgency, payment or credential requests, prizes, job offers and suspicious links.",
  "Return STRICT JSON only."
].join(" ");

function buildPrompt(message: string, history: ConversationMessage[]): string {
  const recent = history
    .slice(-4)
    .map((m) => `${m.sender}: ${m.text.slice(0, 160)}`)
    .join("\n");
  return [
    `history:\n${recent || "none"}`,
    `message: ${message}`,
    "JSON shape:",
    '{"is_scam":true|false,"confidence":0.0-1.0,"scam_type":"bank_fraud|upi_fraud|phishing|job_scam|lottery|investment|tech_support|other|legitimate","reasoning":"...","red_flags":["..."],"legitimacy_signals":["..."]}'
  ].join("\n");
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string").map((v) => v.trim()).filter(Boolean);
}

/** Fills every missing field with its documented default. */
export function normalizeLlmVerdict(raw: Record<string, unknown>): LlmVerdict {
  const isScam = typeof raw.is_scam === "boolean" ? raw.is_scam : null;
  const confidence = typeof raw.confidence === "number" ? clamp01(raw.confidence) : 0.5;
  return {
    isScam,
    confidence,
    scamType: typeof raw.scam_type === "string" ? raw.scam_type.trim().toLowerCase() : "unknown",
    reasoning: typeof raw.reasoning === "string" ? raw.reasoning.trim() : "",
    redFlags: stringList(raw.red_flags),
    legitimacySignals: stringList(raw.legitimacy_signals)
  };
}

export function llmFactorScore(llm: LlmVerdict): number {
  if (llm.isScam === null) return 0.5;
  return llm.isScam ? llm.confidence : 1 - llm.confidence;
}

export class LlmDetector {
  constructor(private readonly client: LlmClient | null) {}

  async analyze(
    message: string,
    history: ConversationMessage[],
    timeoutMs: number
  ): Promise<Result<LlmVerdict, AnalyzerFailure>> {
    if (!this.client) {
      return fail({ analyzer: "llm", reason: "unavailable", detail: "no LLM client configured" });
    }
    let text: string;
    try {
      text = await withTimeout(
        this.client.complete(buildPrompt(message, history), {
          system: SYSTEM_PROMPT,
          timeoutMs,
          maxOutputTokens: 300,
          temperature: 0.1
        }),
        timeoutMs,
        "llm"
      );
    } catch (err) {
      const detail = describeError(err);
      return fail({ analyzer: "llm", reason: /timeout|abort/i.test(detail) ? "timeout" : "error", detail });
    }
    const parsed = extractJson(text);
    if (!isRecord(parsed)) {
      return fail({ analyzer: "llm", reason: "malformed", detail: text.slice(0, 120) });
    }
    return ok(normalizeLlmVerdict(parsed));
  }
}
