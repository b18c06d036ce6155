import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { FinalReportPayload, FinalReporter, buildFinalReport, shouldSendFinalReport } from "../core/callback";
import { createSession } from "../core/sessionStore";
import { fallbackVerdict } from "../core/combiner";

function scamSession(confidence: number) {
  const session = createSession("s-9", "2024-05-01T10:00:00.000Z");
  session.scamDetected = true;
  session.lastVerdict = { ...fallbackVerdict(), isScam: true, confidence, scamType: "upi_fraud", redFlags: ["a", "b"] };
  return session;
}

describe("shouldSendFinalReport", () => {
  it("fires when the conversation reaches the turn limit", () => {
    const session = scamSession(0.7);
    session.messageCount = 14;
    assert.equal(shouldSendFinalReport(session, 14), true);
  });

  it("fires early on a near-certain scam with two kinds of intel", () => {
    const session = scamSession(0.96);
    session.messageCount = 3;
    session.intelligence.upi_ids.push("desk@ybl");
    assert.equal(shouldSendFinalReport(session, 14), false);
    session.intelligence.phone_numbers.push("9876543210");
    assert.equal(shouldSendFinalReport(session, 14), true);
  });

  it("never fires twice or without a scam", () => {
    const sent = scamSession(0.7);
    sent.messageCount = 20;
    sent.callbackSent = true;
    assert.equal(shouldSendFinalReport(sent, 14), false);

    const attempted = scamSession(0.7);
    attempted.messageCount = 20;
    attempted.callbackAttempted = true;
    assert.equal(shouldSendFinalReport(attempted, 14), false);

    const clean = createSession("s-10", "2024-05-01T10:00:00.000Z");
    clean.messageCount = 20;
    assert.equal(shouldSendFinalReport(clean, 14), false);
  });
});

describe("FinalReporter", () => {
  it("builds the report from the session", () => {
    const session = scamSession(0.9);
    session.persona = "elderly_confused";
    session.intelligence.upi_ids.push("desk@ybl");
    session.suspiciousKeywords = ["upi"];
    const report = buildFinalReport(session);
    assert.equal(report.scamType, "upi_fraud");
    assert.deepEqual(report.extractedIntelligence.upiIds, ["desk@ybl"]);
    assert.equal(report.agentNotes, "persona=elderly_confused, redFlags=a; b");
  });

  it("retries up to three times", async () => {
    const calls: string[] = [];
    const reporter = new FinalReporter("http://callback.test/report", async (url: string, _payload: FinalReportPayload) => {
      calls.push(url);
      if (calls.length < 3) throw new Error("503");
    });
    const delivered = await reporter.send(buildFinalReport(scamSession(0.9)));
    assert.equal(delivered, true);
    assert.equal(calls.length, 3);
  });

  it("gives up after three failures", async () => {
    let attempts = 0;
    const reporter = new FinalReporter("http://callback.test/report", async () => {
      attempts += 1;
      throw new Error("down");
    });
    assert.equal(await reporter.send(buildFinalReport(scamSession(0.9))), false);
    assert.equal(attempts, 3);
  });

  it("does nothing without a url", async () => {
    const reporter = new FinalReporter("");
    assert.equal(reporter.enabled, false);
    assert.equal(await reporter.send(buildFinalReport(scamSession(0.9))), false);
  });
});
