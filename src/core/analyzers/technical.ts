import LEXICON from "../../data/detectionLexicon.json";

export type TechnicalAnalysis = {
  urlScore: number;
  domainScore: number;
  overall: number;
  urls: string[];
};

const URL_PATTERN = /\b(?:https?:\/\/|www\.)[^\s]+/gi;
const IPV4_HOST = /^\d{1,3}(?:\.\d{1,3}){3}$/;

function parseUrl(raw: string): URL | null {
  const candidate = raw.startsWith("www.") ? `http://${raw}` : raw;
  try {
    return new URL(candidate.replace(/[),\].'"]+$/g, ""));
  } catch {
    return null;
  }
}

function scoreUrl(raw: string, url: URL): number {
  const { suspiciousPathWords } = LEXICON.technical;
  let score = 0.4;
  if (IPV4_HOST.test(url.hostname)) score += 0.2;
  if (raw.toLowerCase().startsWith("http://")) score += 0.2;
  const path = `${url.pathname}${url.search}`.toLowerCase();
  if (suspiciousPathWords.some((word) => path.includes(word))) score += 0.2;
  return Math.min(1, score);
}

function scoreDomain(url: URL): number {
  const { shorteners, suspiciousTlds } = LEXICON.technical;
  const host = url.hostname.toLowerCase();
  if (shorteners.some((s) => host === s || host.endsWith(`.${s}`))) return 0.8;
  if (suspiciousTlds.some((tld) => host.endsWith(tld))) return 0.6;
  return 0;
}

export function analyzeTechnical(message: string): TechnicalAnalysis {
  const urls = message.match(URL_PATTERN) || [];
  let urlScore = 0;
  let domainScore = 0;

  for (const raw of urls) {
    const parsed = parseUrl(raw);
    if (!parsed) continue;
    urlScore = Math.max(urlScore, scoreUrl(raw, parsed));
    domainScore = Math.max(domainScore, scoreDomain(parsed));
  }

  return { urlScore, domainScore, overall: Math.max(urlScore, domainScore), urls };
}
