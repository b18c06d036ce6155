import type { LlmClient } from "./providers/types";
import { extractJson, isRecord } from "./providers/types";
import type { Persona } from "./persona";
import type { ConversationMessage } from "../utils/types";
import { describeError, safeLog } from "../utils/logging";

export type ReplyInput = {
  sessionId: string;
  persona: Persona;
  messageNumber: number;
  lastScammerMessage: string;
  history: ConversationMessage[];
  lastReplies: string[];
  psychologyHint: string;
  extractionHint: string;
  guidedTactic: string;
  timeoutMs: number;
};

export type ReplyOutput = {
  reply: string;
  source: "llm" | "fallback";
};

const FALLBACK_BY_STAGE: { upTo: number; replies: string[] }[] = [
  { upTo: 2, replies: ["What happened? Why is my account blocked?", "I don't understand, what is this about?"] },
  { upTo: 5, replies: ["I see, that's serious. What do I need to do?", "Okay, tell me slowly, what should I do first?"] },
  { upTo: 8, replies: ["Before I do anything, can you verify who you are?", "How do I know this is really from the bank?"] },
  { upTo: 12, replies: ["Okay, I'll do it. Where should I send the payment?", "Fine, give me the details again, I'll try now."] },
  { upTo: Infinity, replies: ["The link isn't working. Can you send it again?", "It keeps failing on my side. Is there another way?"] }
];

const FORBIDDEN = ["honeypot", "scam", "fraud", "as an ai", "language model"];

const SIMILARITY_THRESHOLD = 0.7;

const VARY_WORDING = "Vary wording from previous messages. End with proper punctuation.";

export function stageGuidance(messageNumber: number): string {
  if (messageNumber <= 3) return "STAGE: Initial - show confusion/concern, don't ask for details yet";
  if (messageNumber <= 6) return "STAGE: Understanding - ask clarifying questions, start asking about their details";
  if (messageNumber <= 10) return "STAGE: Extracting - confirm or ask for their payment details/links";
  return "STAGE: Prolonging - report issues, ask for alternative methods";
}

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function wordSet(text: string): Set<string> {
  return new Set(normalize(text).split(" ").filter(Boolean));
}

/** Word-set Jaccard overlap above `threshold` with any of the last three replies. */
export function isTooSimilar(reply: string, lastReplies: string[], threshold = SIMILARITY_THRESHOLD): boolean {
  const words = wordSet(reply);
  if (words.size === 0) return false;
  return lastReplies.slice(-3).some((prev) => {
    const other = wordSet(prev);
    if (other.size === 0) return false;
    const shared = Array.from(words).filter((w) => other.has(w)).length;
    return shared / (words.size + other.size - shared) > threshold;
  });
}

export function ensureTerminalPunctuation(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) return trimmed;
  return /[.!?]$/.test(trimmed) ? trimmed : `${trimmed}.`;
}

export function fallbackReply(input: Pick<ReplyInput, "messageNumber" | "lastReplies" | "guidedTactic">): string {
  if (input.guidedTactic && !isTooSimilar(input.guidedTactic, input.lastReplies)) {
    return ensureTerminalPunctuation(input.guidedTactic);
  }
  const stage = FALLBACK_BY_STAGE.find((s) => input.messageNumber <= s.upTo) ?? FALLBACK_BY_STAGE[FALLBACK_BY_STAGE.length - 1];
  const fresh = stage.replies.find((r) => !isTooSimilar(r, input.lastReplies));
  return fresh ?? stage.replies[0];
}

export function buildReplyPrompt(input: ReplyInput): string {
  const recent = input.history
    .slice(-4)
    .map((m) => `${m.sender === "scammer" ? "S" : "V"}: ${m.text.slice(0, 120)}`)
    .join(" | ");
  const lines = [
    `PERSONA: ${input.persona.systemPrompt}`,
    `QUIRKS: ${input.persona.quirks.join(", ")}`,
    stageGuidance(input.messageNumber),
    input.psychologyHint,
    input.extractionHint ? `EXTRACTION: ${input.extractionHint}` : "",
    input.guidedTactic ? `GUIDED: ${input.guidedTactic}` : "",
    `HISTORY: ${recent || "[First message]"}`,
    `LAST_REPLIES: ${input.lastReplies.slice(-3).join(" | ") || "none"}`,
    `SCAMMER: ${input.lastScammerMessage}`,
    'Reply as the victim in 1-2 short sentences. Return JSON only: {"reply":"..."}'
  ];
  return lines.filter(Boolean).join("\n");
}

const SYSTEM_PROMPT = [
  "You play a potential scam victim chatting on a phone.",
  "Stay in persona, sound human and imperfect, keep the other side talking.",
  "Never reveal real OTPs, PINs or passwords. Never mention scams, fraud or AI."
].join(" ");

function acceptable(reply: string, lastReplies: string[]): boolean {
  if (reply.length < 3) return false;
  const lower = reply.toLowerCase();
  if (FORBIDDEN.some((w) => lower.includes(w))) return false;
  return !isTooSimilar(reply, lastReplies);
}

async function requestReply(
  client: LlmClient,
  prompt: string,
  input: ReplyInput,
  temperature: number
): Promise<string | null> {
  try {
    const text = await client.complete(prompt, {
      system: SYSTEM_PROMPT,
      timeoutMs: input.timeoutMs,
      maxOutputTokens: 160,
      temperature
    });
    const parsed = extractJson(text);
    const raw = isRecord(parsed) && typeof parsed.reply === "string" ? parsed.reply : "";
    const reply = ensureTerminalPunctuation(raw);
    if (acceptable(reply, input.lastReplies)) return reply;
    safeLog(`[REPLY] ${input.sessionId} rejected llm reply`);
  } catch (err) {
    safeLog(`[REPLY] ${input.sessionId} ${client.name} failed: ${describeError(err)}`);
  }
  return null;
}

/** One regeneration with a variation nudge before the canned fallback. */
export async function generateVictimReply(input: ReplyInput, client: LlmClient | null): Promise<ReplyOutput> {
  if (!client) {
    return { reply: fallbackReply(input), source: "fallback" };
  }
  const prompt = buildReplyPrompt(input);
  const reply =
    (await requestReply(client, prompt, input, 0.8)) ??
    (await requestReply(client, `${prompt}\n${VARY_WORDING}`, input, 0.6));
  if (reply) return { reply, source: "llm" };
  safeLog(`[REPLY] ${input.sessionId} using fallback`);
  return { reply: fallbackReply(input), source: "fallback" };
}
