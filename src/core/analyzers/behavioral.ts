import LEXICON from "../../data/detectionLexicon.json";
import { scaledHits } from "../markers";

export type BehavioralAnalysis = {
  informationRequestScore: number;
  paymentDemandScore: number;
  secrecyScore: number;
  timePressureScore: number;
  overall: number;
};

const PER_HIT = 0.4;

export function analyzeBehavioral(message: string): BehavioralAnalysis {
  const text = message.toLowerCase();
  const { informationRequest, paymentDemand, secrecy, timePressure } = LEXICON.behavioral;

  const scores = {
    informationRequestScore: scaledHits(text, informationRequest, PER_HIT),
    paymentDemandScore: scaledHits(text, paymentDemand, PER_HIT),
    secrecyScore: scaledHits(text, secrecy, PER_HIT),
    timePressureScore: scaledHits(text, timePressure, PER_HIT)
  };
  const values = Object.values(scores);
  const max = Math.max(...values);
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;

  // one strong behaviour (e.g. an OTP ask) should dominate a quiet message
  return { ...scores, overall: 0.6 * max + 0.4 * mean };
}
