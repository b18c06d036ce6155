import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  ReplyInput,
  buildReplyPrompt,
  ensureTerminalPunctuation,
  fallbackReply,
  generateVictimReply,
  isTooSimilar,
  stageGuidance
} from "../core/responder";
import { getPersona, selectPersona } from "../core/persona";
import { FakeLlmClient, sequence } from "./fakes";

function input(overrides: Partial<ReplyInput> = {}): ReplyInput {
  return {
    sessionId: "s-1",
    persona: getPersona("elderly_confused"),
    messageNumber: 1,
    lastScammerMessage: "Your account is blocked",
    history: [{ sender: "scammer", text: "Your account is blocked" }],
    lastReplies: [],
    psychologyHint: "PSYCHOLOGY: Keep scammer engaged naturally",
    extractionHint: "",
    guidedTactic: "",
    timeoutMs: 100,
    ...overrides
  };
}

describe("fallbackReply", () => {
  it("answers by conversation stage", () => {
    assert.equal(fallbackReply(input()), "What happened? Why is my account blocked?");
    assert.equal(fallbackReply(input({ messageNumber: 7 })), "Before I do anything, can you verify who you are?");
    assert.equal(fallbackReply(input({ messageNumber: 30 })), "The link isn't working. Can you send it again?");
  });

  it("prefers the guided tactic", () => {
    const reply = fallbackReply(input({ messageNumber: 5, guidedTactic: "My phone is slow, what was that payment ID?" }));
    assert.equal(reply, "My phone is slow, what was that payment ID?");
  });

  it("avoids repeating a recent reply", () => {
    const reply = fallbackReply(input({ lastReplies: ["What happened? Why is my account blocked?"] }));
    assert.equal(reply, "I don't understand, what is this about?");
  });
});

describe("reply helpers", () => {
  it("ends replies with punctuation", () => {
    assert.equal(ensureTerminalPunctuation(" ok sir "), "ok sir.");
    assert.equal(ensureTerminalPunctuation("really?"), "really?");
    assert.equal(ensureTerminalPunctuation("  "), "");
  });

  it("compares replies loosely", () => {
    assert.equal(isTooSimilar("OK, sending now!", ["ok sending now"]), true);
    assert.equal(isTooSimilar("ok", ["ok", "a", "b", "c"]), false);
  });

  it("treats heavy word overlap as a repeat", () => {
    // 6 shared of 8 distinct words
    assert.equal(isTooSimilar("I will send the money to you now.", ["I will send the money now."]), true);
  });

  it("needs overlap above 0.7", () => {
    const reply = "one two three four five six seven eight nine ten";
    assert.equal(isTooSimilar(reply, ["one two three four five six seven"]), false);
    assert.equal(isTooSimilar(reply, ["one two three four five six seven eight"]), true);
  });

  it("ignores empty replies", () => {
    assert.equal(isTooSimilar("...", ["..."]), false);
  });

  it("describes the stage", () => {
    assert.equal(stageGuidance(2), "STAGE: Initial - show confusion/concern, don't ask for details yet");
    assert.equal(stageGuidance(11), "STAGE: Prolonging - report issues, ask for alternative methods");
  });

  it("includes the hints in the prompt", () => {
    const prompt = buildReplyPrompt(input({ extractionHint: "ask for upi", guidedTactic: "Which UPI?" }));
    assert.match(prompt, /^PERSONA: You are a 68 year old retired teacher/);
    assert.match(prompt, /\nPSYCHOLOGY: Keep scammer engaged naturally\n/);
    assert.match(prompt, /\nEXTRACTION: ask for upi\n/);
    assert.match(prompt, /\nGUIDED: Which UPI\?\n/);
    assert.match(prompt, /\nHISTORY: S: Your account is blocked\n/);
  });
});

describe("generateVictimReply", () => {
  it("falls back without a client", async () => {
    const output = await generateVictimReply(input(), null);
    assert.deepEqual(output, { reply: "What happened? Why is my account blocked?", source: "fallback" });
  });

  it("uses the llm reply when acceptable", async () => {
    const output = await generateVictimReply(input(), FakeLlmClient.fixed('{"reply":"Which bank are you calling from"}'));
    assert.deepEqual(output, { reply: "Which bank are you calling from.", source: "llm" });
  });

  it("rejects replies that break character", async () => {
    const output = await generateVictimReply(input(), FakeLlmClient.fixed('{"reply":"Is this a scam?"}'));
    assert.equal(output.source, "fallback");
  });

  it("rejects a reply it already gave", async () => {
    const output = await generateVictimReply(
      input({ lastReplies: ["Hello?"] }),
      FakeLlmClient.fixed('{"reply":"hello"}')
    );
    assert.deepEqual(output, { reply: "What happened? Why is my account blocked?", source: "fallback" });
  });

  it("asks once more with a variation note before falling back", async () => {
    const temperatures: (number | undefined)[] = [];
    const replies = ['{"reply":"Is this a scam?"}', '{"reply":"Which branch is this from?"}'];
    const client = new FakeLlmClient((_prompt, options) => {
      temperatures.push(options.temperature);
      return replies[temperatures.length - 1];
    });
    const output = await generateVictimReply(input(), client);
    assert.deepEqual(output, { reply: "Which branch is this from?", source: "llm" });
    assert.equal(client.prompts.length, 2);
    assert.equal(client.prompts[1], `${client.prompts[0]}\nVary wording from previous messages. End with proper punctuation.`);
    assert.deepEqual(temperatures, [0.8, 0.6]);
  });

  it("gives up after the second attempt", async () => {
    const client = FakeLlmClient.fixed('{"reply":"hello"}');
    const output = await generateVictimReply(input({ lastReplies: ["Hello?"] }), client);
    assert.equal(output.source, "fallback");
    assert.equal(client.prompts.length, 2);
  });

  it("falls back when the client fails", async () => {
    const output = await generateVictimReply(input(), FakeLlmClient.failing("gemini timeout"));
    assert.equal(output.source, "fallback");
  });
});

describe("personas", () => {
  it("matches personas to scam types", () => {
    assert.equal(selectPersona("job_scam").name, "desperate_job_seeker");
    assert.equal(selectPersona("bank_fraud", sequence([0])).name, "tech_naive_parent");
    assert.equal(selectPersona("bank_fraud", sequence([0.9])).name, "elderly_confused");
    assert.equal(selectPersona("other").name, "busy_professional");
  });

  it("defaults unknown names to the busy professional", () => {
    assert.equal(getPersona("nobody").name, "busy_professional");
    assert.equal(getPersona(undefined).name, "busy_professional");
  });
});
