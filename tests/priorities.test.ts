import test from "node:test";
import assert from "node:assert/strict";
import { PriorityManager, UNKNOWN_PRIORITY, describePriority } from "../src/assess/priorities.js";

test("default priorities put format first and unknown categories last", () => {
  const manager = new PriorityManager();
  assert.equal(manager.getPriority("format"), 1);
  assert.equal(manager.getPriority("security"), 2);
  assert.equal(manager.getPriority("lint"), 4);
  assert.equal(manager.getPriority("dates"), UNKNOWN_PRIORITY);
});

test("orderCategories sorts by priority then name", () => {
  const manager = new PriorityManager();
  assert.deepEqual(manager.orderCategories(["repo-status", "lint", "dependencies", "format", "security"]), [
    "format",
    "security",
    "lint",
    "dependencies",
    "repo-status",
  ]);
});

test("priority strings accept numbers and words and can reset to default", () => {
  const manager = new PriorityManager();
  manager.parsePriorityString("security=1, lint=highest, format=lowest");
  assert.equal(manager.getPriority("security"), 1);
  assert.equal(manager.getPriority("lint"), 1);
  assert.equal(manager.getPriority("format"), 5);

  manager.parsePriorityString("format=default");
  assert.equal(manager.getPriority("format"), 1);
  assert.deepEqual(manager.orderCategories(["format", "lint", "security"]), ["format", "lint", "security"]);
});

test("empty priority string changes nothing", () => {
  const manager = new PriorityManager();
  manager.parsePriorityString("   ");
  assert.equal(manager.getPriority("lint"), 4);
});

test("malformed priority strings are rejected with the offending entry", () => {
  const manager = new PriorityManager();
  assert.throws(() => manager.parsePriorityString("security"), {
    message: "invalid priority format: security (expected category=priority)",
  });
  assert.throws(() => manager.parsePriorityString("typo=1"), {
    message: "unknown assessment category in priority string: typo",
  });
  assert.throws(() => manager.parsePriorityString("lint=9"), {
    message: "invalid priority value: 9 (expected 1-5 or highest/lowest)",
  });
  assert.throws(() => manager.parsePriorityString(",,"), {
    message: "no valid priority entries found in: ,,",
  });
});

test("priority descriptions name each phase", () => {
  assert.equal(describePriority(1), "Quick wins, often auto-fixable");
  assert.equal(describePriority(2), "Critical issues that may block progress");
  assert.equal(describePriority(UNKNOWN_PRIORITY), "Remaining issues");
  assert.equal(new PriorityManager().describe("lint"), "Code quality improvements");
});

test("object prototype names are not priority words", () => {
  const manager = new PriorityManager();
  for (const word of ["constructor", "toString", "__proto__"]) {
    assert.throws(
      () => manager.parsePriorityString(`lint=${word}`),
      { message: `invalid priority value: ${word.toLowerCase()} (expected 1-5 or highest/lowest)` },
    );
  }
  assert.equal(manager.getPriority("lint"), 4);
});
