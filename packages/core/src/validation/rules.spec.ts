import test from "node:test";
import assert from "node:assert/strict";
import { evaluateRules, field, reference } from "./rules";
import { boolean, number, numericString, optional, string } from "./schema";

const knownIds = new Set([1, 2]);

const rules = {
  title: field(string({ minLength: 3, transform: (value) => value.trim(), messages: { minLength: "too short" } })),
  price: field(numericString({ positive: true, messages: { type: "not a number", positive: "not positive" } })),
  category: reference(number({ integer: true, coerce: true }), (id) => knownIds.has(id), "unknown category"),
  is_active: field(optional(boolean(), false)),
};

test("collects every failing field instead of stopping at the first", async () => {
  const outcome = await evaluateRules(rules, { title: " a ", price: "abc", category: "9" });
  assert.equal(outcome.success, false);
  if (outcome.success) return;
  assert.deepEqual(outcome.errors, [
    { path: "title", message: "too short", code: "invalid" },
    { path: "price", message: "not a number", code: "invalid" },
    { path: "category", message: "unknown category", code: "invalid_reference" },
  ]);
});

test("returns typed, transformed values when every rule passes", async () => {
  const outcome = await evaluateRules(rules, { title: "  Lamp  ", price: "19.99", category: "2", is_active: "true" });
  assert.deepEqual(outcome, {
    success: true,
    data: { title: "Lamp", price: "19.99", category: 2, is_active: true },
  });
});

test("an omitted optional field takes its default", async () => {
  const outcome = await evaluateRules(rules, { title: "Lamp", price: "5", category: "1", is_active: "" });
  assert.deepEqual(outcome, {
    success: true,
    data: { title: "Lamp", price: "5", category: 1, is_active: false },
  });
});

test("string lengths count characters, not UTF-16 units", async () => {
  const outcome = await evaluateRules(rules, { title: "🪴🪴", price: "5", category: "1" });
  assert.equal(outcome.success, false);
  if (outcome.success) return;
  assert.deepEqual(outcome.errors, [{ path: "title", message: "too short", code: "invalid" }]);
});

test("malformed ids are field errors, not reference errors", async () => {
  const outcome = await evaluateRules(rules, { title: "Lamp", price: "1", category: "abc" });
  assert.equal(outcome.success, false);
  if (outcome.success) return;
  assert.deepEqual(outcome.errors, [{ path: "category", message: "Expected number", code: "invalid" }]);
});

test("missing values are reported as required", async () => {
  const outcome = await evaluateRules(rules, {});
  assert.equal(outcome.success, false);
  if (outcome.success) return;
  assert.deepEqual(
    outcome.errors.map((error) => [error.path, error.code]),
    [
      ["title", "required"],
      ["price", "required"],
      ["category", "required"],
    ],
  );
});
