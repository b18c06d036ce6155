import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  countRepeatedMessages,
  defaultProfile,
  dominantManipulationType,
  lengthTrend,
  profilePromptModifier,
  predictWeaknesses,
  profileScammer,
  recommendTactic,
  scoreAggression
} from "../core/profiler";

function scammer(...texts: string[]) {
  return texts.map((text) => ({ sender: "scammer", text }));
}

describe("profileScammer", () => {
  it("returns the default profile without scammer messages", () => {
    const profile = profileScammer([{ sender: "victim", text: "hello?" }]);
    assert.deepEqual(profile, defaultProfile());
    assert.equal(profile.aggressionLevel, 0.3);
    assert.equal(profile.patienceScore, 0.7);
    assert.equal(profile.sophistication, 0.3);
    assert.equal(profile.emotionalManipulation, 0.3);
    assert.equal(profile.recommendedTactic, "maintain_engagement");
  });

  it("rates a shouting, threatening scammer as aggressive", () => {
    const profile = profileScammer(
      scammer("give me the money NOW!!!", "I SAID NOW", "do it immediately or face consequences")
    );
    // four marker hits, three shouted words, three exclamation marks
    assert.equal(profile.aggressionLevel, 0.53);
    assert.ok(profile.aggressionLevel > 0.5);
    assert.equal(profile.messageCountAnalyzed, 3);
  });

  it("ignores the sender's letter case and skips victim turns", () => {
    const profile = profileScammer([
      { sender: "Scammer", text: "hello" },
      { sender: "victim", text: "URGENT URGENT URGENT" }
    ]);
    assert.equal(profile.messageCountAnalyzed, 1);
    assert.equal(profile.aggressionLevel, 0);
  });

  it("picks up formal, reference-heavy scripts", () => {
    const profile = profileScammer(
      scammer("Dear customer, as per our records your verification is pending. Ref: ABC12345, department of compliance.")
    );
    // verification, department, compliance + reference + formal greeting
    assert.equal(profile.sophistication, 0.51);
  });

  it("reports the dominant manipulation type", () => {
    const profile = profileScammer(scammer("Congratulations winner! You are lucky, guaranteed prize."));
    assert.equal(profile.dominantManipulationType, "greed");
    assert.equal(profile.emotionalManipulation, 0.24);
  });
});

describe("scoreAggression", () => {
  it("never decreases with another marker and never exceeds one", () => {
    let text = "pay";
    let previous = scoreAggression(text, text.toLowerCase());
    for (let i = 0; i < 30; i += 1) {
      text += " police";
      const score = scoreAggression(text, text.toLowerCase());
      assert.ok(score >= previous);
      assert.ok(score <= 1);
      previous = score;
    }
    assert.equal(previous, 1);
  });
});

describe("patience signals", () => {
  it("needs at least three messages", () => {
    assert.equal(countRepeatedMessages(["a", "a"]), 0);
    assert.equal(lengthTrend(["a", "bbbbbbbb"]), 0);
  });

  it("counts near-identical adjacent messages", () => {
    const line = "send the otp to me right now please";
    assert.equal(countRepeatedMessages([line, line, line]), 2);
  });

  it("tracks whether messages grow or shrink", () => {
    assert.equal(lengthTrend(["aaaa", "aaaa", "aaaaaaaaaa", "aaaaaaaaaa"]), 0.1);
    assert.equal(lengthTrend(["aaaaaaaaaa", "aaaaaaaaaa", "aa", "aa"]), -0.1);
  });
});

describe("tactic recommendation", () => {
  it("confuses an impatient aggressive scammer", () => {
    assert.equal(recommendTactic({ aggression: 0.6, patience: 0.3, sophistication: 0.2, manipulation: 0 }), "show_more_confusion");
    assert.equal(recommendTactic({ aggression: 0.1, patience: 0.3, sophistication: 0.2, manipulation: 0 }), "dangle_compliance");
    assert.equal(recommendTactic({ aggression: 0.1, patience: 0.9, sophistication: 0.7, manipulation: 0 }), "more_realistic_persona");
  });

  it("plays along with a heavily manipulative scammer", () => {
    assert.equal(
      recommendTactic({ aggression: 0.2, patience: 0.8, sophistication: 0.3, manipulation: 0.7 }),
      "strategic_almost_compliance"
    );
    assert.equal(
      recommendTactic({ aggression: 0.2, patience: 0.8, sophistication: 0.3, manipulation: 0.3 }),
      "maintain_engagement"
    );
  });

  it("builds a psychology hint", () => {
    const hint = profilePromptModifier({ ...defaultProfile(), dominantManipulationType: "fear" });
    assert.equal(hint, "PSYCHOLOGY: Keep scammer engaged naturally | Scammer uses fear tactics");
  });

  it("returns none when no manipulation marker is present", () => {
    assert.equal(dominantManipulationType("hello there"), "none");
  });

  it("breaks ties by manipulation type order", () => {
    assert.equal(dominantManipulationType("danger only today"), "fear");
    assert.equal(dominantManipulationType("officer help me"), "authority");
    assert.equal(dominantManipulationType("help me officer, help me"), "guilt");
  });
});

describe("predictWeaknesses", () => {
  it("collects every weakness whose rule fires, in rule order", () => {
    assert.deepEqual(predictWeaknesses({ aggression: 0.7, patience: 0.2, sophistication: 0.2, manipulation: 0.7 }), [
      "frustration",
      "anger_management",
      "low_adaptability",
      "over_reliance_on_scripts",
      "time_pressure"
    ]);
  });

  it("flags overconfidence in a sophisticated scammer", () => {
    assert.deepEqual(predictWeaknesses({ aggression: 0, patience: 1, sophistication: 0.7, manipulation: 0 }), [
      "overconfidence"
    ]);
  });

  it("needs low patience and high aggression for time pressure", () => {
    assert.deepEqual(predictWeaknesses({ aggression: 0.55, patience: 0.25, sophistication: 0.4, manipulation: 0 }), [
      "frustration",
      "time_pressure"
    ]);
  });

  it("falls back to generic engagement", () => {
    assert.deepEqual(predictWeaknesses({ aggression: 0.3, patience: 0.7, sophistication: 0.4, manipulation: 0.3 }), [
      "generic_engagement"
    ]);
  });
});
