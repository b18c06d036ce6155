import strategies from "../data/extractionTactics.json";
import type { HoneypotConfig } from "./config";
import type { PsychProfile } from "./profiler";
import { INTEL_CATEGORIES, IntelCategory, IntelState, TacticRecord } from "../utils/types";
import { logEvent } from "../utils/logging";

export type StrategyKey = "need_upi" | "need_bank_account" | "need_link" | "need_phone_number";

export type ExtractionStrategy = {
  tactics: string[];
  baseSuccessRate: number;
  priority: number;
};

export type StrategyTable = Record<StrategyKey, ExtractionStrategy>;

export const EXTRACTION_STRATEGIES: StrategyTable = strategies;

export const INTEL_TO_STRATEGY: Record<IntelCategory, StrategyKey> = {
  upi_ids: "need_upi",
  bank_accounts: "need_bank_account",
  phishing_links: "need_link",
  phone_numbers: "need_phone_number"
};

export type TrackerConfig = Pick<
  HoneypotConfig,
  "earlyStageLimit" | "midStageLimit" | "tacticCooldownMessages" | "extractionEnabled"
>;

export type IntelGap = {
  type: IntelCategory;
  strategy: StrategyKey;
  priority: number;
  status: "missing";
};

export type CollectedIntel = {
  type: IntelCategory;
  count: number;
  status: "collected";
};

export type GapAnalysis = {
  gaps: IntelGap[];
  collected: CollectedIntel[];
  totalGaps: number;
  totalCollected: number;
  topGap: IntelCategory | null;
  extractionHint: string;
};

export type TacticChoice = {
  text: string;
  tacticId: string;
};

const NO_TACTIC: TacticChoice = { text: "", tacticId: "" };

// Cooldown lookups only inspect this many of the most recent history entries.
const HISTORY_LOOKBACK = 10;

export function isEligible(messageNumber: number, config: TrackerConfig): boolean {
  return config.extractionEnabled && messageNumber > config.earlyStageLimit;
}

function buildExtractionHint(gap: IntelGap, messageNumber: number, config: TrackerConfig): string {
  const gapName = gap.type.replace(/_/g, " ");
  if (messageNumber <= config.midStageLimit) {
    return `Try to naturally ask for scammer's ${gapName} (be subtle, don't push)`;
  }
  return `Actively try to extract scammer's ${gapName} (you trust them now)`;
}

export function analyzeGaps(
  intel: IntelState,
  messageNumber: number,
  config: TrackerConfig,
  table: StrategyTable = EXTRACTION_STRATEGIES
): GapAnalysis {
  const gaps: IntelGap[] = [];
  const collected: CollectedIntel[] = [];

  for (const type of INTEL_CATEGORIES) {
    const items = intel[type] || [];
    const strategy = INTEL_TO_STRATEGY[type];
    if (items.length === 0) {
      gaps.push({ type, strategy, priority: table[strategy]?.priority ?? 99, status: "missing" });
    } else {
      collected.push({ type, count: items.length, status: "collected" });
    }
  }

  gaps.sort((a, b) => a.priority - b.priority);

  const top = gaps[0];
  const extractionHint = top && isEligible(messageNumber, config) ? buildExtractionHint(top, messageNumber, config) : "";

  const result: GapAnalysis = {
    gaps,
    collected,
    totalGaps: gaps.length,
    totalCollected: collected.length,
    topGap: top ? top.type : null,
    extractionHint
  };
  logEvent("GAPS", { gaps: result.totalGaps, collected: result.totalCollected, topGap: result.topGap });
  return result;
}

/**
 * Strategies to try, most valuable first. Payment identifiers come before
 * links, links before phone numbers.
 */
export function prioritizedStrategies(intel: IntelState): StrategyKey[] {
  const needUpi = intel.upi_ids.length === 0;
  const needBank = intel.bank_accounts.length === 0;
  const order: StrategyKey[] = [];
  if (needUpi && needBank) {
    order.push("need_upi", "need_bank_account");
  } else {
    if (needUpi) order.push("need_upi");
    if (needBank) order.push("need_bank_account");
  }
  if (intel.phishing_links.length === 0) order.push("need_link");
  if (intel.phone_numbers.length === 0) order.push("need_phone_number");
  return order;
}

/** The most recent matching entry decides; unseen tactics are always allowed. */
export function isCooldownOk(
  history: TacticRecord[],
  tacticId: string,
  messageNumber: number,
  cooldownMessages: number
): boolean {
  const recent = history.slice(-HISTORY_LOOKBACK);
  for (let i = recent.length - 1; i >= 0; i -= 1) {
    if (recent[i].tacticId === tacticId) {
      return messageNumber - recent[i].msg >= cooldownMessages;
    }
  }
  return true;
}

export function shuffledIndices(length: number, random: () => number = Math.random): number[] {
  const indices = Array.from({ length }, (_, i) => i);
  for (let i = indices.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [indices[i], indices[j]] = [indices[j], indices[i]];
  }
  return indices;
}

/** Early and mid conversation asks read as tentative questions. */
export function softenTactic(text: string, messageNumber: number, config: TrackerConfig): string {
  if (messageNumber <= config.midStageLimit && !text.includes("?")) {
    return `${text}?`;
  }
  return text;
}

/**
 * Picks a tactic for one strategy that is not on cooldown. When every tactic
 * is cooling down the first one is reused so the conversation keeps moving.
 */
export function chooseTactic(
  strategyKey: StrategyKey,
  history: TacticRecord[],
  messageNumber: number,
  config: TrackerConfig,
  random: () => number = Math.random,
  table: StrategyTable = EXTRACTION_STRATEGIES
): TacticChoice {
  if (!isEligible(messageNumber, config)) return NO_TACTIC;
  const tactics = table[strategyKey]?.tactics ?? [];
  if (tactics.length === 0) return NO_TACTIC;

  let picked = 0;
  let found = false;
  for (const idx of shuffledIndices(tactics.length, random)) {
    if (isCooldownOk(history, `${strategyKey}:${idx}`, messageNumber, config.tacticCooldownMessages)) {
      picked = idx;
      found = true;
      break;
    }
  }
  if (!found) picked = 0;

  return {
    text: softenTactic(tactics[picked], messageNumber, config),
    tacticId: `${strategyKey}:${picked}`
  };
}

export function getGuidedTactic(
  intel: IntelState,
  history: TacticRecord[],
  messageNumber: number,
  config: TrackerConfig,
  random: () => number = Math.random,
  table: StrategyTable = EXTRACTION_STRATEGIES
): TacticChoice {
  if (!isEligible(messageNumber, config)) return NO_TACTIC;
  for (const strategyKey of prioritizedStrategies(intel)) {
    const choice = chooseTactic(strategyKey, history, messageNumber, config, random, table);
    if (choice.text) return choice;
  }
  return NO_TACTIC;
}

/** Appends in place; the history belongs to the caller's session. */
export function recordTactic(history: TacticRecord[], tacticId: string, messageNumber: number): void {
  if (!tacticId) return;
  history.push({ tacticId, msg: messageNumber });
}

/**
 * Extraction hint plus a profile-based modifier, joined with " | " (meant to
 * stay under ~200 chars; callers truncate if needed).
 */
export function getExtractionPromptHint(
  intel: IntelState,
  messageNumber: number,
  profile: PsychProfile | null,
  config: TrackerConfig
): string {
  if (!isEligible(messageNumber, config)) return "";
  const parts: string[] = [];
  const analysis = analyzeGaps(intel, messageNumber, config);
  if (analysis.extractionHint) parts.push(analysis.extractionHint);

  if (profile) {
    if (profile.patienceScore < 0.4 && profile.recommendedTactic === "show_more_confusion") {
      parts.push("Scammer is impatient, be extra confused when asking");
    } else if (profile.recommendedTactic === "strategic_almost_compliance") {
      parts.push("Show willingness to help while asking for their details");
    }
  }
  return parts.join(" | ");
}
