import assert from "assert";
import { describe, it } from "node:test";
import { extractIntelligence } from "../core/extractor";
import { mergeAll, mergeIntelligence, mergeOtherItems, newFindings, sameIntelligence } from "../core/merge";
import { emptyIntelligence, ENTITY_TYPES, ExtractedIntelligence } from "../utils/types";

function record(patch: Partial<ExtractedIntelligence>): ExtractedIntelligence {
  return { ...emptyIntelligence(), ...patch };
}

const first = record({
  phoneNumbers: ["9876543210"],
  upiIds: ["scammer@ybl"],
  other_critical_info: [{ label: "Employee ID", value: "EMP123" }]
});

const second = record({
  phoneNumbers: ["+91 91234 56789", "9876543210"],
  upiIds: ["SCAMMER@YBL"],
  bankAccounts: ["123456789012"],
  other_critical_info: [
    { label: "Employee ID", value: "EMP123" },
    { label: "employee id", value: "EMP123" }
  ]
});

describe("mergeIntelligence", () => {
  it("unions values under normalized equality in first-seen order", () => {
    const merged = mergeIntelligence(first, second);
    assert.deepEqual(merged.phoneNumbers, ["9876543210", "9123456789"]);
    assert.deepEqual(merged.upiIds, ["scammer@ybl"]);
    assert.deepEqual(merged.bankAccounts, ["123456789012"]);
    assert.deepEqual(merged.other_critical_info, [
      { label: "Employee ID", value: "EMP123" },
      { label: "employee id", value: "EMP123" }
    ]);
  });

  it("is idempotent", () => {
    const a = extractIntelligence("Call 9876543210 or pay scammer@ybl, A/C 123456789012");
    assert.deepEqual(mergeIntelligence(a, a), a);
  });

  it("never loses a value from either side", () => {
    const merged = mergeIntelligence(first, second);
    for (const type of ENTITY_TYPES) {
      for (const value of mergeIntelligence(first, emptyIntelligence())[type]) {
        assert.ok(merged[type].includes(value), `${type}:${value}`);
      }
    }
    assert.ok(merged.bankAccounts.includes("123456789012"));
  });

  it("is commutative as sets", () => {
    assert.ok(sameIntelligence(mergeIntelligence(first, second), mergeIntelligence(second, first)));
  });

  it("does not mutate its inputs", () => {
    const before = JSON.stringify(first);
    mergeIntelligence(first, second);
    assert.equal(JSON.stringify(first), before);
  });
});

describe("merge helpers", () => {
  it("folds any number of records and skips missing ones", () => {
    const merged = mergeAll([null, first, undefined, second]);
    assert.ok(sameIntelligence(merged, mergeIntelligence(first, second)));
    assert.deepEqual(mergeAll([]), emptyIntelligence());
  });

  it("dedups other items by exact label and value", () => {
    const items = mergeOtherItems(
      [{ label: "Case", value: "A1" }],
      [
        { label: "Case", value: "A1" },
        { label: "Case", value: "a1" }
      ]
    );
    assert.deepEqual(items, [
      { label: "Case", value: "A1" },
      { label: "Case", value: "a1" }
    ]);
  });

  it("reports only values that are new", () => {
    const merged = mergeIntelligence(first, second);
    assert.deepEqual(newFindings(first, merged), {
      phoneNumbers: ["9123456789"],
      bankAccounts: ["123456789012"]
    });
  });
});
