import LEXICON from "../../data/detectionLexicon.json";
import { scaledHits } from "../markers";

export type LinguisticAnalysis = {
  urgencyScore: number;
  threatScore: number;
  authorityScore: number;
  manipulationScore: number;
  overall: number;
};

const PER_HIT = 0.34;

export function analyzeLinguistic(message: string): LinguisticAnalysis {
  const text = message.toLowerCase();
  const { urgency, threat, authority, manipulation } = LEXICON.linguistic;

  const urgencyScore = scaledHits(text, urgency, PER_HIT);
  const threatScore = scaledHits(text, threat, PER_HIT);
  const authorityScore = scaledHits(text, authority, PER_HIT);
  const manipulationScore = scaledHits(text, manipulation, PER_HIT);

  return {
    urgencyScore,
    threatScore,
    authorityScore,
    manipulationScore,
    overall: (urgencyScore + threatScore + authorityScore + manipulationScore) / 4
  };
}
