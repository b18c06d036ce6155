import { createClient, SupabaseClient } from "@supabase/supabase-js";
import type { Verdict } from "../utils/types";
import { describeError, safeLog } from "../utils/logging";

export type LogMessageInput = {
  sessionId: string;
  turnIndex: number;
  sender: "scammer" | "victim";
  text: string;
  timestamp: string;
  channel?: string;
};

export type LogVerdictInput = {
  sessionId: string;
  turnIndex: number;
  verdict: Verdict;
  recommendedTactic: string;
  tacticId: string;
};

type Env = Record<string, string | undefined>;

/** Turn archive. Inserts are best effort; failures are logged, never thrown. */
export class SessionArchive {
  constructor(private readonly client: SupabaseClient | null) {}

  static fromEnv(env: Env = process.env): SessionArchive {
    const url = env.SUPABASE_URL;
    const key = env.SUPABASE_SERVICE_ROLE_KEY;
    if (!url || !key || env.ENABLE_SUPABASE_LOG === "false") return new SessionArchive(null);
    return new SessionArchive(createClient(url, key, { auth: { persistSession: false } }));
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  private async insert(table: string, row: Record<string, unknown>): Promise<void> {
    if (!this.client) return;
    try {
      const { error } = await this.client.from(table).insert(row);
      if (error) safeLog(`[ARCHIVE] ${table} insert failed: ${error.message}`);
    } catch (err) {
      safeLog(`[ARCHIVE] ${table} insert failed: ${describeError(err)}`);
    }
  }

  logMessage(input: LogMessageInput): Promise<void> {
    return this.insert("honeypot_messages", {
      session_id: input.sessionId,
      turn_index: input.turnIndex,
      sender: input.sender,
      text: input.text,
      ts: input.timestamp,
      channel: input.channel || ""
    });
  }

  logVerdict(input: LogVerdictInput): Promise<void> {
    return this.insert("honeypot_verdicts", {
      session_id: input.sessionId,
      turn_index: input.turnIndex,
      is_scam: input.verdict.isScam,
      confidence: input.verdict.confidence,
      scam_type: input.verdict.scamType,
      urgency_level: input.verdict.urgencyLevel,
      red_flags: input.verdict.redFlags,
      recommended_tactic: input.recommendedTactic,
      tactic_id: input.tacticId
    });
  }
}
