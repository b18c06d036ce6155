import type { HoneypotConfig } from "./config";
import { ScamDetector } from "./detector";
import { extractIntelligence, mergeIntelligence } from "./extractor";
import { PsychProfile, profilePromptModifier, profileScammer } from "./profiler";
import { GapAnalysis, TacticChoice, analyzeGaps, getExtractionPromptHint, getGuidedTactic, recordTactic } from "./gapTracker";
import { getPersona, selectPersona } from "./persona";
import { generateVictimReply } from "./responder";
import { SessionRecord, SessionStore } from "./sessionStore";
import { SessionArchive } from "./supabase";
import { FinalReporter, buildFinalReport, shouldSendFinalReport } from "./callback";
import type { LlmClient } from "./providers/types";
import { IntelState, MessageMetadata, Verdict } from "../utils/types";
import { describeError, logEvent, safeLog } from "../utils/logging";

export type TurnInput = {
  sessionId: string;
  message: string;
  metadata?: MessageMetadata;
  timestamp?: string;
};

export type TurnResult = {
  sessionId: string;
  reply: string;
  replySource: "llm" | "fallback";
  verdict: Verdict;
  scamDetected: boolean;
  profile: PsychProfile;
  intelligence: IntelState;
  gaps: GapAnalysis;
  tactic: TacticChoice;
  persona: string;
  messageNumber: number;
  totalMessagesExchanged: number;
  finalReportQueued: boolean;
};

export type AgentDeps = {
  config: HoneypotConfig;
  store: SessionStore;
  llmClient: LlmClient | null;
  detector?: ScamDetector;
  archive?: SessionArchive;
  reporter?: FinalReporter;
  random?: () => number;
};

/** Runs one honeypot turn per scammer message. */
export class HoneypotAgent {
  private readonly config: HoneypotConfig;
  private readonly store: SessionStore;
  private readonly llmClient: LlmClient | null;
  private readonly detector: ScamDetector;
  private readonly archive: SessionArchive;
  private readonly reporter: FinalReporter;
  private readonly random: () => number;
  private readonly inFlight = new Map<string, Promise<unknown>>();
  private readonly deliveries = new Set<Promise<void>>();

  constructor(deps: AgentDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.llmClient = deps.llmClient;
    this.detector = deps.detector ?? new ScamDetector(deps.config, deps.llmClient);
    this.archive = deps.archive ?? new SessionArchive(null);
    this.reporter = deps.reporter ?? new FinalReporter("");
    this.random = deps.random ?? Math.random;
  }

  /** Turns for the same session run one after another. */
  handleTurn(input: TurnInput): Promise<TurnResult> {
    const previous = this.inFlight.get(input.sessionId) ?? Promise.resolve();
    const next = previous.then(
      () => this.runTurn(input),
      () => this.runTurn(input)
    );
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.inFlight.set(input.sessionId, settled);
    void settled.then(() => {
      if (this.inFlight.get(input.sessionId) === settled) this.inFlight.delete(input.sessionId);
    });
    return next;
  }

  private async runTurn(input: TurnInput): Promise<TurnResult> {
    const timestamp = input.timestamp || new Date().toISOString();
    const metadata = input.metadata ?? {};
    let session = this.store.getOrCreate(input.sessionId, timestamp);
    if (session.callbackSent && session.messageCount >= this.config.maxTurns) {
      // a finished engagement that is messaged again starts over
      session = this.store.reset(input.sessionId, timestamp);
    }

    const priorHistory = [...session.conversationHistory];
    const verdict = await this.detector.analyze(input.message, metadata, priorHistory);

    session.conversationHistory.push({ sender: "scammer", text: input.message, timestamp });
    session.messageCount += 1;
    const messageNumber = session.messageCount;

    const extracted = extractIntelligence([input.message]);
    session.intelligence = mergeIntelligence(session.intelligence, extracted);
    session.suspiciousKeywords = Array.from(new Set([...session.suspiciousKeywords, ...extracted.suspiciousKeywords]));
    session.scamDetected = session.scamDetected || verdict.isScam === true;
    session.lastVerdict = verdict;

    if (!session.persona && verdict.isScam === true) {
      session.persona = selectPersona(verdict.scamType, this.random).name;
    }
    const persona = getPersona(session.persona ?? undefined);

    const profile = profileScammer(session.conversationHistory);
    session.lastProfile = profile;

    const gaps = analyzeGaps(session.intelligence, messageNumber, this.config);
    const tactic = session.scamDetected
      ? getGuidedTactic(
          session.intelligence,
          session.strategyState.tacticHistory,
          messageNumber,
          this.config,
          this.random
        )
      : { text: "", tacticId: "" };
    const extractionHint = session.scamDetected
      ? getExtractionPromptHint(session.intelligence, messageNumber, profile, this.config)
      : "";

    const { reply, source } = await generateVictimReply(
      {
        sessionId: session.sessionId,
        persona,
        messageNumber,
        lastScammerMessage: input.message,
        history: session.conversationHistory,
        lastReplies: session.lastReplies,
        psychologyHint: profilePromptModifier(profile),
        extractionHint,
        guidedTactic: tactic.text,
        timeoutMs: this.config.analyzerTimeoutMs
      },
      this.llmClient
    );

    if (tactic.tacticId) {
      recordTactic(session.strategyState.tacticHistory, tactic.tacticId, messageNumber);
      session.strategyState.lastTactic = { tacticId: tactic.tacticId, text: tactic.text, msg: messageNumber };
    }

    const repliedAt = new Date().toISOString();
    session.conversationHistory.push({ sender: "victim", text: reply, timestamp: repliedAt });
    session.lastReplies = [...session.lastReplies, reply].slice(-5);
    session.lastMessageAt = repliedAt;

    let finalReportQueued = false;
    if (this.reporter.enabled && shouldSendFinalReport(session, this.config.maxTurns)) {
      session.callbackAttempted = true;
      this.queueFinalReport(session);
      finalReportQueued = true;
    }

    this.store.update(session);

    await Promise.all([
      this.archive.logMessage({
        sessionId: session.sessionId,
        turnIndex: messageNumber,
        sender: "scammer",
        text: input.message,
        timestamp,
        channel: metadata.channel
      }),
      this.archive.logMessage({
        sessionId: session.sessionId,
        turnIndex: messageNumber,
        sender: "victim",
        text: reply,
        timestamp: repliedAt,
        channel: metadata.channel
      }),
      this.archive.logVerdict({
        sessionId: session.sessionId,
        turnIndex: messageNumber,
        verdict,
        recommendedTactic: profile.recommendedTactic,
        tacticId: tactic.tacticId
      })
    ]);

    logEvent("TURN", {
      sessionId: session.sessionId,
      messageNumber,
      isScam: verdict.isScam,
      tacticId: tactic.tacticId,
      replySource: source
    });

    return {
      sessionId: session.sessionId,
      reply,
      replySource: source,
      verdict,
      scamDetected: session.scamDetected,
      profile,
      intelligence: session.intelligence,
      gaps,
      tactic,
      persona: persona.name,
      messageNumber,
      totalMessagesExchanged: session.conversationHistory.length,
      finalReportQueued
    };
  }

  /** Resolves once every queued final report has been delivered or given up on. */
  async settleReports(): Promise<void> {
    await Promise.all(Array.from(this.deliveries));
  }

  private queueFinalReport(session: SessionRecord): void {
    const delivery = this.reporter
      .send(buildFinalReport(session))
      .then((delivered) => {
        // a reset in the meantime replaced the record; leave the new one alone
        if (!delivered || this.store.get(session.sessionId) !== session) return;
        session.callbackSent = true;
        this.store.update(session);
      })
      .catch((err: unknown) => {
        safeLog(`[CALLBACK] ${session.sessionId} bookkeeping failed: ${describeError(err)}`);
      })
      .finally(() => {
        this.deliveries.delete(delivery);
      });
    this.deliveries.add(delivery);
  }
}
