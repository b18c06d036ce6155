import { HoneypotConfig } from "./config";
import { analyzeLinguistic } from "./analyzers/linguistic";
import { analyzeBehavioral } from "./analyzers/behavioral";
import { analyzeTechnical } from "./analyzers/technical";
import { analyzeContext } from "./analyzers/context";
import { AnalyzerFailure, LlmDetector, NEUTRAL_LLM_VERDICT } from "./analyzers/llm";
import { FactorAnalyses, combine, fallbackVerdict } from "./combiner";
import type { LlmClient } from "./providers/types";
import { ConversationMessage, LlmVerdict, MessageMetadata, Result, Verdict, fail, ok } from "../utils/types";
import { describeError, logEvent, safeLog } from "../utils/logging";

export type HeuristicAnalyzers = {
  linguistic: typeof analyzeLinguistic;
  behavioral: typeof analyzeBehavioral;
  technical: typeof analyzeTechnical;
  context: typeof analyzeContext;
};

const DEFAULT_ANALYZERS: HeuristicAnalyzers = {
  linguistic: analyzeLinguistic,
  behavioral: analyzeBehavioral,
  technical: analyzeTechnical,
  context: analyzeContext
};

function attempt<T>(analyzer: string, run: () => T): Result<T, AnalyzerFailure> {
  try {
    return ok(run());
  } catch (err) {
    return fail({ analyzer, reason: "error", detail: describeError(err) });
  }
}

function runHeuristics(
  analyzers: HeuristicAnalyzers,
  message: string,
  metadata: MessageMetadata,
  history: ConversationMessage[]
): Result<FactorAnalyses, AnalyzerFailure> {
  const linguistic = attempt("linguistic", () => analyzers.linguistic(message));
  if (!linguistic.ok) return linguistic;
  const behavioral = attempt("behavioral", () => analyzers.behavioral(message));
  if (!behavioral.ok) return behavioral;
  const technical = attempt("technical", () => analyzers.technical(message));
  if (!technical.ok) return technical;
  const context = attempt("context", () => analyzers.context(message, metadata, history));
  if (!context.ok) return context;
  return ok({
    linguistic: linguistic.value,
    behavioral: behavioral.value,
    technical: technical.value,
    context: context.value
  });
}

export class ScamDetector {
  private readonly llmDetector: LlmDetector;

  constructor(
    private readonly config: HoneypotConfig,
    llmClient: LlmClient | null,
    private readonly analyzers: HeuristicAnalyzers = DEFAULT_ANALYZERS
  ) {
    this.llmDetector = new LlmDetector(llmClient);
  }

  /**
   * `history` holds the turns before `message`. Never rejects: a failed
   * heuristic analyzer yields the neutral fallback verdict, a failed or slow
   * LLM analysis counts as a neutral 0.5 factor.
   */
  async analyze(
    message: string,
    metadata: MessageMetadata = {},
    history: ConversationMessage[] = []
  ): Promise<Verdict> {
    safeLog(`[DETECT] analyzing: ${message.slice(0, 50)}...`);

    const [heuristics, llmResult] = await Promise.all([
      Promise.resolve().then(() => runHeuristics(this.analyzers, message, metadata, history)),
      this.llmDetector.analyze(message, history, this.config.analyzerTimeoutMs)
    ]);

    if (!heuristics.ok) {
      logEvent("DETECT", { failed: heuristics.error });
      return fallbackVerdict();
    }

    let llm: LlmVerdict = { ...NEUTRAL_LLM_VERDICT };
    if (llmResult.ok) {
      llm = llmResult.value;
    } else if (llmResult.error.reason !== "unavailable") {
      logEvent("DETECT", { llm: llmResult.error });
    }

    const verdict = combine(heuristics.value, llm, message, this.config);
    safeLog(
      `[DETECT] is_scam=${verdict.isScam}, confidence=${verdict.confidence.toFixed(2)}, type=${verdict.scamType}`
    );
    return verdict;
  }
}
