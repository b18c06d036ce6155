export type FactorName = "linguistic" | "behavioral" | "technical" | "context" | "llm";

export type FactorScores = Record<FactorName, number>;

export const SCAM_TYPES = [
  "bank_fraud",
  "upi_fraud",
  "phishing",
  "job_scam",
  "lottery",
  "investment",
  "tech_support",
  "other",
  "unknown"
] as const;

export type ScamType = (typeof SCAM_TYPES)[number];

export type UrgencyLevel = "critical" | "high" | "medium" | "low";

/**
 * Final decision for one scammer message.
 *
 * `confidence` does not have a single meaning: with `isScam === true` it is the
 * probability the message is a scam; with `isScam === false` it is the same
 * (low) overall score, and the legitimacy probability is `1 - confidence`.
 * `isScam === null` only appears on the neutral fallback verdict.
 */
export type Verdict = {
  isScam: boolean | null;
  confidence: number;
  scamType: ScamType;
  urgencyLevel: UrgencyLevel;
  redFlags: string[];
  legitimacySignals: string[];
  reasoning: string;
  factorScores: Partial<FactorScores>;
  llmAnalysis: string;
};

export type LlmVerdict = {
  isScam: boolean | null;
  confidence: number;
  scamType: string;
  reasoning: string;
  redFlags: string[];
  legitimacySignals: string[];
};

export type Sender = "scammer" | "victim";

export type ConversationMessage = {
  sender: Sender;
  text: string;
  timestamp?: string;
};

export type MessageMetadata = {
  channel?: string;
  language?: string;
  locale?: string;
};

export const INTEL_CATEGORIES = ["upi_ids", "bank_accounts", "phishing_links", "phone_numbers"] as const;

export type IntelCategory = (typeof INTEL_CATEGORIES)[number];

export type IntelState = Record<IntelCategory, string[]>;

export type TacticRecord = {
  tacticId: string;
  msg: number;
};

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function emptyIntel(): IntelState {
  return {
    upi_ids: [],
    bank_accounts: [],
    phishing_links: [],
    phone_numbers: []
  };
}
