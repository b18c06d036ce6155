import type { IncomingHttpHeaders } from "http";

const DIGIT_RUN = /\d{3,}/g;
const SECRET_HEADERS = new Set(["x-api-key", "authorization"]);
const TRUNCATION_MARK = "...(truncated)";

function keepTail(secret: string, visible: number): string {
  const tail = visible > 0 ? secret.slice(-visible) : "";
  return tail.padStart(secret.length, "*");
}

/** Phone numbers, account numbers and OTPs keep only their last two digits in logs. */
export function maskDigits(input: string): string {
  return input.replace(DIGIT_RUN, (run) => keepTail(run, 2));
}

export function maskApiKey(value?: string): string {
  if (!value) return "missing";
  return keepTail(value, value.length > 4 ? 4 : 0);
}

export function sanitizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const entries = Object.entries(headers).flatMap(([name, raw]): [string, string][] => {
    if (raw === undefined) return [];
    const key = name.toLowerCase();
    const joined = typeof raw === "string" ? raw : raw.join(",");
    return [[key, SECRET_HEADERS.has(key) ? maskApiKey(joined) : joined]];
  });
  return Object.fromEntries(entries);
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // cyclic payloads
    return String(value);
  }
}

export function safeStringify(value: unknown, maxLen: number): string {
  const masked = maskDigits(toText(value));
  return masked.length > maxLen ? masked.slice(0, maxLen) + TRUNCATION_MARK : masked;
}

export function safeLog(message: string): void {
  try {
    console.info(message);
  } catch (err) {
    process.stderr.write(`[LOG] console unavailable: ${describeError(err)}\n`);
  }
}

export function logEvent(tag: string, payload: unknown, maxLen = 2000): void {
  safeLog(`[${tag}] ${safeStringify(payload, maxLen)}`);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
