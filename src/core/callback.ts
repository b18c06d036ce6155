import axios from "axios";
import type { SessionRecord } from "./sessionStore";
import { countFilledCategories } from "./extractor";
import { describeError, safeLog } from "../utils/logging";

export type FinalReportPayload = {
  sessionId: string;
  scamDetected: boolean;
  scamType: string;
  totalMessagesExchanged: number;
  extractedIntelligence: {
    bankAccounts: string[];
    upiIds: string[];
    phishingLinks: string[];
    phoneNumbers: string[];
    suspiciousKeywords: string[];
  };
  agentNotes: string;
};

export type PostFn = (url: string, payload: FinalReportPayload, timeoutMs: number) => Promise<void>;

const ATTEMPTS = 3;
const TIMEOUT_MS = 5000;

const axiosPost: PostFn = async (url, payload, timeoutMs) => {
  await axios.post(url, payload, { timeout: timeoutMs });
};

export function shouldSendFinalReport(session: SessionRecord, maxTurns: number): boolean {
  if (session.callbackAttempted || session.callbackSent || !session.scamDetected) return false;
  if (session.messageCount >= maxTurns) return true;
  const confidence = session.lastVerdict?.isScam ? session.lastVerdict.confidence : 0;
  return confidence >= 0.95 && countFilledCategories(session.intelligence) >= 2;
}

export function buildFinalReport(session: SessionRecord): FinalReportPayload {
  const profile = session.lastProfile;
  const notes = [
    `persona=${session.persona ?? "none"}`,
    profile ? `tactic=${profile.recommendedTactic}` : "",
    profile ? `manipulation=${profile.dominantManipulationType}` : "",
    `redFlags=${(session.lastVerdict?.redFlags ?? []).slice(0, 3).join("; ")}`
  ].filter(Boolean);
  return {
    sessionId: session.sessionId,
    scamDetected: session.scamDetected,
    scamType: session.lastVerdict?.scamType ?? "unknown",
    totalMessagesExchanged: session.conversationHistory.length,
    extractedIntelligence: {
      bankAccounts: session.intelligence.bank_accounts,
      upiIds: session.intelligence.upi_ids,
      phishingLinks: session.intelligence.phishing_links,
      phoneNumbers: session.intelligence.phone_numbers,
      suspiciousKeywords: session.suspiciousKeywords
    },
    agentNotes: notes.join(", ")
  };
}

export class FinalReporter {
  constructor(
    private readonly url: string,
    private readonly post: PostFn = axiosPost
  ) {}

  get enabled(): boolean {
    return this.url.length > 0;
  }

  async send(payload: FinalReportPayload): Promise<boolean> {
    if (!this.enabled) return false;
    for (let attempt = 1; attempt <= ATTEMPTS; attempt += 1) {
      try {
        await this.post(this.url, payload, TIMEOUT_MS);
        safeLog(`[CALLBACK] ${payload.sessionId} delivered on attempt ${attempt}`);
        return true;
      } catch (err) {
        safeLog(`[CALLBACK] ${payload.sessionId} attempt ${attempt} failed: ${describeError(err)}`);
      }
    }
    return false;
  }
}
