import fs from "fs";
import path from "path";
import type { PsychProfile } from "./profiler";
import type { PersonaName } from "./persona";
import { ConversationMessage, IntelState, TacticRecord, Verdict, emptyIntel } from "../utils/types";
import { describeError, safeLog } from "../utils/logging";

export type LastTactic = {
  tacticId: string;
  text: string;
  msg: number;
};

export type StrategyState = {
  tacticHistory: TacticRecord[];
  lastTactic: LastTactic | null;
};

export type SessionRecord = {
  sessionId: string;
  conversationHistory: ConversationMessage[];
  intelligence: IntelState;
  suspiciousKeywords: string[];
  strategyState: StrategyState;
  messageCount: number;
  persona: PersonaName | null;
  scamDetected: boolean;
  lastVerdict: Verdict | null;
  lastProfile: PsychProfile | null;
  lastReplies: string[];
  startedAt: string;
  lastMessageAt: string;
  /** Set when the final report is queued; a failed delivery is not retried. */
  callbackAttempted: boolean;
  callbackSent: boolean;
};

export type SessionStoreOptions = {
  persistFile?: string | null;
};

export function createSession(sessionId: string, timestamp: string): SessionRecord {
  return {
    sessionId,
    conversationHistory: [],
    intelligence: emptyIntel(),
    suspiciousKeywords: [],
    strategyState: { tacticHistory: [], lastTactic: null },
    messageCount: 0,
    persona: null,
    scamDetected: false,
    lastVerdict: null,
    lastProfile: null,
    lastReplies: [],
    startedAt: timestamp,
    lastMessageAt: timestamp,
    callbackAttempted: false,
    callbackSent: false
  };
}

function hydrate(raw: Partial<SessionRecord> & { sessionId: string }): SessionRecord {
  const base = createSession(raw.sessionId, raw.startedAt || new Date().toISOString());
  const strategy = raw.strategyState;
  return {
    ...base,
    ...raw,
    intelligence: { ...base.intelligence, ...(raw.intelligence || {}) },
    strategyState: {
      tacticHistory: strategy && Array.isArray(strategy.tacticHistory) ? strategy.tacticHistory : [],
      lastTactic: strategy?.lastTactic ?? null
    },
    conversationHistory: Array.isArray(raw.conversationHistory) ? raw.conversationHistory : [],
    lastReplies: Array.isArray(raw.lastReplies) ? raw.lastReplies : []
  };
}

/**
 * In-memory sessions with optional JSON file persistence. Callers serialize
 * access per session; nothing here locks.
 */
export class SessionStore {
  private sessions = new Map<string, SessionRecord>();
  private persistFile: string | null;

  constructor(options: SessionStoreOptions = {}) {
    if (options.persistFile !== undefined) {
      this.persistFile = options.persistFile ? path.resolve(options.persistFile) : null;
    } else {
      const persistEnabled = process.env.SESSION_PERSIST === "true";
      const file = process.env.SESSIONS_FILE || "sessions.json";
      this.persistFile = persistEnabled ? path.resolve(file) : null;
    }
    if (this.persistFile) {
      this.loadFromFile();
    }
  }

  private loadFromFile(): void {
    if (!this.persistFile || !fs.existsSync(this.persistFile)) return;
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.persistFile, "utf-8"));
      if (!Array.isArray(parsed)) return;
      for (const item of parsed) {
        if (typeof item?.sessionId !== "string") continue;
        const session = hydrate(item);
        this.sessions.set(session.sessionId, session);
      }
    } catch (err) {
      safeLog(`[SESSIONS] could not load ${this.persistFile}: ${describeError(err)}`);
    }
  }

  private saveToFile(): void {
    if (!this.persistFile) return;
    const payload = Array.from(this.sessions.values());
    fs.writeFileSync(this.persistFile, JSON.stringify(payload, null, 2));
  }

  getOrCreate(sessionId: string, timestamp: string): SessionRecord {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;
    const fresh = createSession(sessionId, timestamp);
    this.sessions.set(sessionId, fresh);
    this.saveToFile();
    return fresh;
  }

  get(sessionId: string): SessionRecord | undefined {
    return this.sessions.get(sessionId);
  }

  reset(sessionId: string, timestamp: string): SessionRecord {
    const fresh = createSession(sessionId, timestamp);
    this.sessions.set(sessionId, fresh);
    this.saveToFile();
    return fresh;
  }

  update(session: SessionRecord): void {
    this.sessions.set(session.sessionId, session);
    this.saveToFile();
  }

  size(): number {
    return this.sessions.size;
  }
}
