import type { FactorScores } from "../utils/types";

export type HoneypotConfig = {
  factorWeights: FactorScores;
  confidenceThreshold: number;
  llmHighConfidenceThreshold: number;
  redFlagThreshold: number;
  earlyStageLimit: number;
  midStageLimit: number;
  tacticCooldownMessages: number;
  extractionEnabled: boolean;
  analyzerTimeoutMs: number;
  maxTurns: number;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: Readonly<HoneypotConfig> = Object.freeze({
  factorWeights: Object.freeze({
    linguistic: 0.2,
    behavioral: 0.2,
    technical: 0.15,
    context: 0.15,
    llm: 0.3
  }),
  confidenceThreshold: 0.6,
  llmHighConfidenceThreshold: 0.85,
  redFlagThreshold: 0.6,
  earlyStageLimit: 3,
  midStageLimit: 6,
  tacticCooldownMessages: 3,
  extractionEnabled: true,
  analyzerTimeoutMs: 1200,
  maxTurns: 14
});

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export function loadConfig(env: Env = process.env): HoneypotConfig {
  const d = DEFAULT_CONFIG;
  return {
    factorWeights: {
      linguistic: num(env, "WEIGHT_LINGUISTIC", d.factorWeights.linguistic),
      behavioral: num(env, "WEIGHT_BEHAVIORAL", d.factorWeights.behavioral),
      technical: num(env, "WEIGHT_TECHNICAL", d.factorWeights.technical),
      context: num(env, "WEIGHT_CONTEXT", d.factorWeights.context),
      llm: num(env, "WEIGHT_LLM", d.factorWeights.llm)
    },
    confidenceThreshold: num(env, "CONFIDENCE_THRESHOLD", d.confidenceThreshold),
    llmHighConfidenceThreshold: num(env, "LLM_HIGH_CONFIDENCE_THRESHOLD", d.llmHighConfidenceThreshold),
    redFlagThreshold: num(env, "RED_FLAG_THRESHOLD", d.redFlagThreshold),
    earlyStageLimit: num(env, "EARLY_STAGE_LIMIT", d.earlyStageLimit),
    midStageLimit: num(env, "MID_STAGE_LIMIT", d.midStageLimit),
    tacticCooldownMessages: num(env, "TACTIC_COOLDOWN_MESSAGES", d.tacticCooldownMessages),
    extractionEnabled: env.EXTRACTION_ENABLED !== "false",
    analyzerTimeoutMs: num(env, "ANALYZER_TIMEOUT_MS", d.analyzerTimeoutMs),
    maxTurns: num(env, "MAX_TURNS", d.maxTurns)
  };
}
