import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { HeuristicAnalyzers, ScamDetector } from "../core/detector";
import { fallbackVerdict } from "../core/combiner";
import { DEFAULT_CONFIG } from "../core/config";
import { analyzeLinguistic } from "../core/analyzers/linguistic";
import { analyzeBehavioral } from "../core/analyzers/behavioral";
import { analyzeTechnical } from "../core/analyzers/technical";
import { analyzeContext } from "../core/analyzers/context";
import { FakeLlmClient, near } from "./fakes";

const BANK_SMS = "URGENT: your bank account will be blocked immediately. Share OTP and PIN now.";

const REAL: HeuristicAnalyzers = {
  linguistic: analyzeLinguistic,
  behavioral: analyzeBehavioral,
  technical: analyzeTechnical,
  context: analyzeContext
};

describe("ScamDetector", () => {
  it("flags the bank sms heuristics-only once the threshold is lowered", async () => {
    const config = { ...DEFAULT_CONFIG, confidenceThreshold: 0.45 };
    const verdict = await new ScamDetector(config, null).analyze(BANK_SMS, { channel: "sms" });
    assert.ok(near(verdict.confidence, 0.458));
    assert.equal(verdict.isScam, true);
  });

  it("runs heuristics only when no llm client is configured", async () => {
    const verdict = await new ScamDetector(DEFAULT_CONFIG, null).analyze(BANK_SMS, { channel: "sms" });
    // 0.2*0.34 + 0.2*0.6 + 0.15*0 + 0.15*0.8 + 0.3*0.5
    assert.ok(near(verdict.confidence, 0.458));
    assert.equal(verdict.isScam, false);
    assert.equal(verdict.factorScores.llm, 0.5);
    assert.equal(verdict.scamType, "bank_fraud");
    assert.deepEqual(verdict.redFlags, [
      "High urgency language detected",
      "Requests sensitive personal information",
      "Unsolicited/unexpected communication",
      "Inappropriate channel for sensitive request"
    ]);
  });

  it("follows a confident llm verdict", async () => {
    const client = FakeLlmClient.fixed(
      '{"is_scam": true, "confidence": 0.95, "scam_type": "upi_fraud", "red_flags": ["OTP request"]}'
    );
    const verdict = await new ScamDetector(DEFAULT_CONFIG, client).analyze(BANK_SMS, { channel: "sms" });
    assert.equal(verdict.isScam, true);
    assert.equal(verdict.confidence, 0.95);
    assert.equal(verdict.scamType, "upi_fraud");
    assert.equal(verdict.redFlags[verdict.redFlags.length - 1], "OTP request");
  });

  it("treats a failing llm as a neutral factor", async () => {
    const withoutLlm = await new ScamDetector(DEFAULT_CONFIG, null).analyze(BANK_SMS, { channel: "sms" });
    const failing = await new ScamDetector(DEFAULT_CONFIG, FakeLlmClient.failing("network down")).analyze(BANK_SMS, {
      channel: "sms"
    });
    assert.equal(failing.confidence, withoutLlm.confidence);
    assert.equal(failing.isScam, withoutLlm.isScam);
  });

  it("returns the neutral fallback when a heuristic analyzer throws", async () => {
    const broken: HeuristicAnalyzers = {
      ...REAL,
      technical: () => {
        throw new Error("bad url table");
      }
    };
    const verdict = await new ScamDetector(DEFAULT_CONFIG, null, broken).analyze(BANK_SMS);
    assert.deepEqual(verdict, fallbackVerdict());
  });

  it("passes prior history to the context analyzer", async () => {
    const verdict = await new ScamDetector(DEFAULT_CONFIG, null).analyze(BANK_SMS, { channel: "sms" }, [
      { sender: "scammer", text: "hello sir" },
      { sender: "victim", text: "who is this?" }
    ]);
    // context drops to (0.2 + 0.8) / 2
    assert.equal(verdict.factorScores.context, 0.5);
  });
});
