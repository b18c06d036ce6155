import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { countFilledCategories, extractIntelligence, mergeIntelligence } from "../core/extractor";
import { emptyIntel } from "../utils/types";

describe("extractIntelligence", () => {
  it("finds upi ids, links, phones and bank accounts", () => {
    const intel = extractIntelligence([
      "Pay to refund.desk@ybl or open https://secure-kyc.example.xyz/verify now.",
      "Call +91 9876543210 and deposit to 123456789012"
    ]);
    assert.deepEqual(intel.upi_ids, ["refund.desk@ybl"]);
    assert.deepEqual(intel.phishing_links, ["https://secure-kyc.example.xyz/verify"]);
    assert.deepEqual(intel.phone_numbers, ["9876543210"]);
    assert.deepEqual(intel.bank_accounts, ["123456789012"]);
  });

  it("does not report a +91 mobile number as a bank account", () => {
    const intel = extractIntelligence(["my number is +919876543210"]);
    assert.deepEqual(intel.bank_accounts, []);
  });

  it("collects upi payment links", () => {
    const intel = extractIntelligence(["scan upi://pay?pa=desk@ybl&am=500 quickly"]);
    assert.deepEqual(intel.phishing_links, ["upi://pay?pa=desk@ybl&am=500"]);
  });

  it("lists suspicious keywords in declaration order", () => {
    const intel = extractIntelligence(["URGENT: your account is blocked, share OTP"]);
    assert.deepEqual(intel.suspiciousKeywords, ["urgent", "otp", "blocked"]);
  });
});

describe("mergeIntelligence", () => {
  it("appends only new distinct values", () => {
    const existing = { ...emptyIntel(), upi_ids: ["a@ybl"] };
    const merged = mergeIntelligence(existing, { ...emptyIntel(), upi_ids: ["a@ybl", "b@ybl"], phone_numbers: ["9876543210"] });
    assert.deepEqual(merged.upi_ids, ["a@ybl", "b@ybl"]);
    assert.deepEqual(merged.phone_numbers, ["9876543210"]);
    assert.equal(countFilledCategories(merged), 2);
  });
});
