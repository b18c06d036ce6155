import markers from "../data/profilerMarkers.json";
import { countMarkerOccurrences } from "./markers";
import { round2 } from "../utils/mask";
import { safeLog } from "../utils/logging";

export const MANIPULATION_TYPES = ["fear", "urgency", "authority", "guilt", "greed"] as const;

export type ManipulationType = (typeof MANIPULATION_TYPES)[number];

export type RecommendedTactic =
  | "show_more_confusion"
  | "more_realistic_persona"
  | "strategic_almost_compliance"
  | "dangle_compliance"
  | "maintain_engagement";

export type Weakness =
  | "frustration"
  | "anger_management"
  | "low_adaptability"
  | "over_reliance_on_scripts"
  | "time_pressure"
  | "overconfidence"
  | "generic_engagement";

export type PsychProfile = {
  aggressionLevel: number;
  patienceScore: number;
  sophistication: number;
  emotionalManipulation: number;
  dominantManipulationType: ManipulationType | "none";
  predictedWeaknesses: Weakness[];
  recommendedTactic: RecommendedTactic;
  messageCountAnalyzed: number;
};

export type ProfileInputMessage = {
  sender: string;
  text: string;
};

type Scores = {
  aggression: number;
  patience: number;
  sophistication: number;
  manipulation: number;
};

const MANIPULATION_MARKERS: Record<ManipulationType, string[]> = markers.manipulation;

const REFERENCE_NUMBER = /(ref|case|ticket|id)[:\s#-]*\w{4,}/;
const FORMAL_GREETING =
  /(dear\s+(sir|madam|customer)|we\s+regret\s+to\s+inform|as\s+per\s+(our|the)\s+records|kindly\s+note)/;

/** Baseline for a scammer who has not spoken yet. */
export function defaultProfile(): PsychProfile {
  return {
    aggressionLevel: 0.3,
    patienceScore: 0.7,
    sophistication: 0.3,
    emotionalManipulation: 0.3,
    dominantManipulationType: "none",
    predictedWeaknesses: ["generic_engagement"],
    recommendedTactic: "maintain_engagement",
    messageCountAnalyzed: 0
  };
}

function countShoutedWords(originalText: string): number {
  return originalText
    .split(/\s+/)
    .filter((word) => word.length > 2 && /[a-z]/i.test(word) && word === word.toUpperCase()).length;
}

export function scoreAggression(originalText: string, lowerText: string): number {
  const hits = countMarkerOccurrences(lowerText, markers.aggression);
  const shouted = countShoutedWords(originalText);
  const exclamations = lowerText.split("!").length - 1;
  return Math.min(1, hits * 0.08 + shouted * 0.03 + exclamations * 0.04);
}

function tokens(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

/** Adjacent pairs among the last four messages that mostly repeat each other. */
export function countRepeatedMessages(messages: string[]): number {
  if (messages.length < 3) return 0;
  const recent = messages.slice(-4).map((m) => m.toLowerCase().trim());
  let repeated = 0;
  for (let i = 0; i < recent.length - 1; i += 1) {
    const first = tokens(recent[i]);
    const second = new Set(tokens(recent[i + 1]));
    const overlap = new Set(first.filter((t) => second.has(t))).size;
    if (overlap > Math.max(first.length * 0.6, 3)) repeated += 1;
  }
  return repeated;
}

/** +0.1 when messages grow (still engaged), -0.1 when they shrink (curt). */
export function lengthTrend(messages: string[]): number {
  if (messages.length < 3) return 0;
  const earlyAvg = (messages[0].length + messages[1].length) / 2;
  const lateAvg = (messages[messages.length - 2].length + messages[messages.length - 1].length) / 2;
  if (earlyAvg <= 0) return 0;
  const ratio = lateAvg / earlyAvg;
  if (ratio > 1.2) return 0.1;
  if (ratio < 0.6) return -0.1;
  return 0;
}

export function scorePatience(messages: string[], lowerText: string): number {
  const impatienceHits = countMarkerOccurrences(lowerText, markers.impatience);
  const rawImpatience = impatienceHits * 0.1 + countRepeatedMessages(messages) * 0.15 - lengthTrend(messages);
  return Math.min(1, Math.max(0, 1 - rawImpatience));
}

export function scoreSophistication(lowerText: string): number {
  const hits = countMarkerOccurrences(lowerText, markers.sophistication);
  const reference = REFERENCE_NUMBER.test(lowerText) ? 0.15 : 0;
  const formal = FORMAL_GREETING.test(lowerText) ? 0.15 : 0;
  return Math.min(1, hits * 0.07 + reference + formal);
}

function manipulationCounts(lowerText: string): Record<ManipulationType, number> {
  const counts: Record<ManipulationType, number> = { fear: 0, urgency: 0, authority: 0, guilt: 0, greed: 0 };
  for (const type of MANIPULATION_TYPES) {
    counts[type] = countMarkerOccurrences(lowerText, MANIPULATION_MARKERS[type]);
  }
  return counts;
}

export function scoreEmotionalManipulation(lowerText: string): number {
  const counts = manipulationCounts(lowerText);
  const total = MANIPULATION_TYPES.reduce((sum, type) => sum + counts[type], 0);
  return Math.min(1, total * 0.06);
}

export function dominantManipulationType(lowerText: string): ManipulationType | "none" {
  const counts = manipulationCounts(lowerText);
  let best: ManipulationType | "none" = "none";
  let bestCount = 0;
  for (const type of MANIPULATION_TYPES) {
    if (counts[type] > bestCount) {
      best = type;
      bestCount = counts[type];
    }
  }
  return best;
}

export function predictWeaknesses(scores: Scores): Weakness[] {
  const { aggression, patience, sophistication, manipulation } = scores;
  const weaknesses: Weakness[] = [];
  if (patience < 0.4) weaknesses.push("frustration");
  if (aggression > 0.6) weaknesses.push("anger_management");
  if (sophistication < 0.3) weaknesses.push("low_adaptability");
  if (manipulation > 0.6) weaknesses.push("over_reliance_on_scripts");
  if (patience < 0.3 && aggression > 0.5) weaknesses.push("time_pressure");
  if (sophistication > 0.6) weaknesses.push("overconfidence");
  return weaknesses.length > 0 ? weaknesses : ["generic_engagement"];
}

export function recommendTactic(scores: Scores): RecommendedTactic {
  const { aggression, patience, sophistication, manipulation } = scores;
  if (patience < 0.4 && aggression > 0.5) return "show_more_confusion";
  if (sophistication > 0.6) return "more_realistic_persona";
  if (manipulation > 0.6) return "strategic_almost_compliance";
  if (patience < 0.4) return "dangle_compliance";
  return "maintain_engagement";
}

/**
 * Profiles the scammer from the full history. Recomputed from scratch on every
 * call; victim turns are ignored.
 */
export function profileScammer(history: ProfileInputMessage[]): PsychProfile {
  const messages = history.filter((m) => m.sender.toLowerCase() === "scammer").map((m) => m.text || "");
  if (messages.length === 0) return defaultProfile();

  const originalText = messages.join(" ");
  const lowerText = originalText.toLowerCase();

  const scores: Scores = {
    aggression: scoreAggression(originalText, lowerText),
    patience: scorePatience(messages, lowerText),
    sophistication: scoreSophistication(lowerText),
    manipulation: scoreEmotionalManipulation(lowerText)
  };

  const profile: PsychProfile = {
    aggressionLevel: round2(scores.aggression),
    patienceScore: round2(scores.patience),
    sophistication: round2(scores.sophistication),
    emotionalManipulation: round2(scores.manipulation),
    dominantManipulationType: dominantManipulationType(lowerText),
    predictedWeaknesses: predictWeaknesses(scores),
    recommendedTactic: recommendTactic(scores),
    messageCountAnalyzed: messages.length
  };

  safeLog(
    `[PROFILE] aggr=${profile.aggressionLevel} pat=${profile.patienceScore} soph=${profile.sophistication} manip=${profile.emotionalManipulation} -> ${profile.recommendedTactic}`
  );
  return profile;
}

const TACTIC_HINTS: Record<RecommendedTactic, string> = {
  show_more_confusion: "Scammer is impatient, act MORE confused, give shorter replies",
  more_realistic_persona: "Scammer is sophisticated, be very realistic, avoid any AI patterns",
  strategic_almost_compliance: "Scammer uses emotional tactics, almost comply, ask for THEIR details",
  dangle_compliance: "Scammer is frustrated, show willingness but create small obstacles",
  maintain_engagement: "Keep scammer engaged naturally"
};

/** Short `PSYCHOLOGY: ...` hint for the reply prompt (meant to stay under ~120 chars). */
export function profilePromptModifier(profile: PsychProfile): string {
  const hints = [TACTIC_HINTS[profile.recommendedTactic]];
  if (profile.dominantManipulationType !== "none") {
    hints.push(`Scammer uses ${profile.dominantManipulationType} tactics`);
  }
  return `PSYCHOLOGY: ${hints.join(" | ")}`;
}
