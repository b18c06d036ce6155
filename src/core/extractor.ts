import { IntelState, emptyIntel } from "../utils/types";

export type ExtractedIntelligence = IntelState & {
  suspiciousKeywords: string[];
};

const suspiciousKeywordList = [
  "urgent",
  "immediately",
  "verify",
  "otp",
  "blocked",
  "suspended",
  "kyc",
  "penalty",
  "legal",
  "refund",
  "reward",
  "prize",
  "lottery",
  "upi",
  "transfer",
  "payment",
  "police",
  "rbi",
  "customs",
  "courier",
  "fine",
  "click",
  "password",
  "pin"
];

const phoneRegex = /(?:\+91[\s-]?|(?<!\d))[6-9]\d{9}(?!\d)/g;
const urlRegex = /https?:\/\/[^\s/$.?#].[^\s]*/gi;
const paymentLinkRegex = /(?:upi:\/\/pay|payto:)[^\s]+/gi;
const upiRegex =
  /[a-z0-9._-]{2,}@(?:upi|ybl|okhdfcbank|oksbi|okicici|okaxis|okpaytm|paytm|ibl|axl|sbi|hdfcbank|icici|kotak|baroda|upiicici)\b/gi;
const bankAccountRegex = /\b\d{11,18}\b/g;

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

function uniqueMerge(base: string[], next: string[]): string[] {
  const set = new Set(base.map((v) => v.trim()).filter(Boolean));
  for (const item of next) {
    const value = item.trim();
    if (value) set.add(value);
  }
  return Array.from(set);
}

function normalizeUrl(url: string): string {
  return url.replace(/[),\].}'"]+$/g, "").trim();
}

function digitsOnly(value: string): string {
  return value.replace(/\D/g, "");
}

export function extractIntelligence(texts: string[]): ExtractedIntelligence {
  const combined = texts.join(" \n ");
  const normalized = normalizeText(combined);

  const phones = (normalized.match(phoneRegex) || []).map((p) => digitsOnly(p).slice(-10));
  const urls = (combined.match(urlRegex) || []).map(normalizeUrl);
  const payLinks = (combined.match(paymentLinkRegex) || []).map(normalizeUrl);
  const upiIds = normalized.match(upiRegex) || [];
  const bankDigits = (normalized.match(bankAccountRegex) || []).filter(
    (d) => !phones.includes(d) && !phones.includes(d.slice(-10))
  );

  return {
    upi_ids: uniqueMerge([], upiIds),
    bank_accounts: uniqueMerge([], bankDigits),
    phishing_links: uniqueMerge([], [...urls, ...payLinks]),
    phone_numbers: uniqueMerge([], phones),
    suspiciousKeywords: suspiciousKeywordList.filter((kw) => normalized.includes(kw))
  };
}

export function mergeIntelligence(existing: IntelState, incoming: IntelState): IntelState {
  const merged = emptyIntel();
  merged.upi_ids = uniqueMerge(existing.upi_ids, incoming.upi_ids);
  merged.bank_accounts = uniqueMerge(existing.bank_accounts, incoming.bank_accounts);
  merged.phishing_links = uniqueMerge(existing.phishing_links, incoming.phishing_links);
  merged.phone_numbers = uniqueMerge(existing.phone_numbers, incoming.phone_numbers);
  return merged;
}

export function countFilledCategories(intel: IntelState): number {
  return [intel.upi_ids, intel.bank_accounts, intel.phishing_links, intel.phone_numbers].filter(
    (items) => items.length > 0
  ).length;
}
