import type { HoneypotConfig } from "./config";
import type { LinguisticAnalysis } from "./analyzers/linguistic";
import type { BehavioralAnalysis } from "./analyzers/behavioral";
import type { TechnicalAnalysis } from "./analyzers/technical";
import type { ContextAnalysis } from "./analyzers/context";
import { llmFactorScore } from "./analyzers/llm";
import { FactorName, FactorScores, LlmVerdict, SCAM_TYPES, ScamType, UrgencyLevel, Verdict } from "../utils/types";

export type FactorAnalyses = {
  linguistic: LinguisticAnalysis;
  behavioral: BehavioralAnalysis;
  technical: TechnicalAnalysis;
  context: ContextAnalysis;
};

type CombinerConfig = Pick<
  HoneypotConfig,
  "factorWeights" | "confidenceThreshold" | "llmHighConfidenceThreshold" | "redFlagThreshold"
>;

// Checked in declaration order; the first type with any contained keyword wins.
const SCAM_TYPE_KEYWORDS: ReadonlyArray<[ScamType, string[]]> = [
  ["bank_fraud", ["bank", "kyc", "blocked", "suspended"]],
  ["upi_fraud", ["upi", "paytm", "phonepe", "googlepay", "@"]],
  ["phishing", ["http", "www", "link"]],
  ["job_scam", ["job", "hiring", "selected", "position", "work from home"]],
  ["lottery", ["won", "prize", "winner", "lottery", "lucky draw"]],
  ["investment", ["invest", "profit", "return", "trading", "crypto"]],
  ["tech_support", ["virus", "hacked", "microsoft", "apple", "tech support"]]
];

const FACTOR_ORDER: FactorName[] = ["linguistic", "behavioral", "technical", "context", "llm"];

/** Insertion-ordered set of red flags; repeats are dropped, first occurrence wins. */
class RedFlags {
  private readonly seen = new Set<string>();

  add(flag: string): void {
    this.seen.add(flag);
  }

  addWhen(condition: boolean, flag: string): void {
    if (condition) this.add(flag);
  }

  toArray(): string[] {
    return Array.from(this.seen);
  }
}

export function collectRedFlags(analyses: FactorAnalyses, llm: LlmVerdict, threshold: number): string[] {
  const { linguistic, behavioral, technical, context } = analyses;
  const flags = new RedFlags();

  flags.addWhen(linguistic.urgencyScore > threshold, "High urgency language detected");
  flags.addWhen(linguistic.threatScore > threshold, "Threatening language detected");
  flags.addWhen(linguistic.authorityScore > threshold, "Authority impersonation detected");
  flags.addWhen(linguistic.manipulationScore > threshold, "Emotional manipulation detected");

  flags.addWhen(behavioral.informationRequestScore > 0.7, "Requests sensitive personal information");
  flags.addWhen(behavioral.paymentDemandScore > 0.7, "Demands payment or money transfer");
  flags.addWhen(behavioral.secrecyScore > 0.5, "Requests secrecy or confidentiality");
  flags.addWhen(behavioral.timePressureScore > threshold, "Creates artificial time pressure");

  flags.addWhen(technical.urlScore > threshold, "Suspicious URL structure detected");
  flags.addWhen(technical.domainScore > threshold, "Suspicious domain or link shortener detected");

  flags.addWhen(context.expectedCommunicationScore > 0.7, "Unsolicited/unexpected communication");
  flags.addWhen(context.channelScore > 0.7, "Inappropriate channel for sensitive request");

  for (const flag of llm.redFlags) flags.add(flag);

  return flags.toArray();
}

function isScamType(value: string): value is ScamType {
  return (SCAM_TYPES as readonly string[]).includes(value);
}

export function determineScamType(message: string, llm: LlmVerdict): ScamType {
  const llmType = llm.scamType;
  if (llmType && llmType !== "unknown" && llmType !== "legitimate") {
    return isScamType(llmType) ? llmType : "other";
  }
  const lower = message.toLowerCase();
  for (const [scamType, keywords] of SCAM_TYPE_KEYWORDS) {
    if (keywords.some((word) => lower.includes(word))) return scamType;
  }
  return "other";
}

export function determineUrgency(linguistic: LinguisticAnalysis, behavioral: BehavioralAnalysis): UrgencyLevel {
  const combined = (linguistic.urgencyScore + linguistic.threatScore + behavioral.timePressureScore) / 3;
  if (combined >= 0.7) return "critical";
  if (combined >= 0.5) return "high";
  if (combined >= 0.3) return "medium";
  return "low";
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export function buildReasoning(
  isScam: boolean,
  confidence: number,
  factorScores: FactorScores,
  redFlags: string[],
  legitimacySignals: string[],
  llm: LlmVerdict
): string {
  let reasoning: string;
  if (isScam) {
    reasoning = `Classified as SCAM with ${percent(confidence)} confidence. `;
    // stable sort keeps FACTOR_ORDER for equal scores
    const top = FACTOR_ORDER.map((name) => [name, factorScores[name]] as const)
      .sort((a, b) => b[1] - a[1])
      .slice(0, 2)
      .filter(([, score]) => score > 0.5)
      .map(([name]) => `${name} analysis`);
    if (top.length > 0) reasoning += `Primary indicators: ${top.join(", ")}. `;
    if (redFlags.length > 0) reasoning += `Red flags: ${redFlags.slice(0, 3).join(", ")}.`;
  } else {
    reasoning = `Classified as LEGITIMATE with ${percent(1 - confidence)} confidence. `;
    reasoning +=
      legitimacySignals.length > 0
        ? `Legitimacy indicators: ${legitimacySignals.slice(0, 2).join(", ")}.`
        : "No significant scam indicators detected.";
  }
  if (llm.reasoning) reasoning += ` LLM: ${llm.reasoning}`;
  return reasoning;
}

export function weightedScore(factorScores: FactorScores, weights: FactorScores): number {
  return FACTOR_ORDER.reduce((sum, name) => sum + weights[name] * factorScores[name], 0);
}

/**
 * Merges the per-factor analyses into one verdict. A very confident LLM
 * verdict replaces the weighted decision outright.
 */
export function combine(
  analyses: FactorAnalyses,
  llm: LlmVerdict,
  message: string,
  config: CombinerConfig
): Verdict {
  const factorScores: FactorScores = {
    linguistic: analyses.linguistic.overall,
    behavioral: analyses.behavioral.overall,
    technical: analyses.technical.overall,
    context: analyses.context.overall,
    llm: llmFactorScore(llm)
  };

  let overall = weightedScore(factorScores, config.factorWeights);
  let isScam = overall >= config.confidenceThreshold;

  if (llm.confidence >= config.llmHighConfidenceThreshold && llm.isScam !== null) {
    isScam = llm.isScam;
    overall = llm.isScam ? llm.confidence : 1 - llm.confidence;
  }

  const redFlags = collectRedFlags(analyses, llm, config.redFlagThreshold);
  const legitimacySignals = [...llm.legitimacySignals];

  return {
    isScam,
    confidence: overall,
    scamType: determineScamType(message, llm),
    urgencyLevel: determineUrgency(analyses.linguistic, analyses.behavioral),
    redFlags,
    legitimacySignals,
    reasoning: buildReasoning(isScam, overall, factorScores, redFlags, legitimacySignals, llm),
    factorScores,
    llmAnalysis: llm.reasoning
  };
}

/** Neutral verdict used when an analyzer fails: uncertain, never fail-closed. */
export function fallbackVerdict(): Verdict {
  return {
    isScam: null,
    confidence: 0.5,
    scamType: "unknown",
    urgencyLevel: "medium",
    redFlags: [],
    legitimacySignals: [],
    reasoning: "Analysis failed, uncertain classification",
    factorScores: {},
    llmAnalysis: "Error in analysis"
  };
}
