import test from "node:test";
import assert from "node:assert/strict";
import {
  compareSeverity,
  createSeverityMapper,
  isAtLeast,
  parseSeverity,
  severityRank,
} from "../src/assess/severity.js";
import { estimateIssueTime, estimateIssuesTime } from "../src/assess/estimates.js";
import { issue } from "./helpers/fakes.js";

test("severity ranks run info < low < medium < high < critical", () => {
  assert.equal(severityRank("info"), 0);
  assert.equal(severityRank("critical"), 4);
  assert.ok(compareSeverity("high", "medium") > 0);
  assert.equal(isAtLeast("high", "high"), true);
  assert.equal(isAtLeast("medium", "high"), false);
});

test("parseSeverity trims and lowercases, rejecting unknown words", () => {
  assert.equal(parseSeverity(" HIGH "), "high");
  assert.equal(parseSeverity("severe"), null);
});

test("severity mapper falls back to medium for unknown tool vocabulary", () => {
  const map = createSeverityMapper({ Error: "high", note: "low" });
  assert.equal(map("error"), "high");
  assert.equal(map(" NOTE "), "low");
  assert.equal(map("bogus"), "medium");
  assert.equal(map(undefined), "medium");
  assert.deepEqual(map.table, { error: "high", note: "low" });
});

test("severity mapper honours a custom fallback", () => {
  const map = createSeverityMapper({}, "low");
  assert.equal(map("whatever"), "low");
});

test("issue estimates prefer the adapter value and fall back to the severity default", () => {
  assert.equal(estimateIssueTime(issue("lint", "a.ts", "high")), 15 * 60_000);
  assert.equal(estimateIssueTime(issue("format", "a.ts", "low", { estimatedTimeMs: 30_000 })), 30_000);
  assert.equal(estimateIssueTime(issue("format", "a.ts", "low", { estimatedTimeMs: 0 })), 2 * 60_000);
  assert.equal(
    estimateIssuesTime([issue("lint", "a.ts", "info"), issue("lint", "b.ts", "critical")]),
    60_000 + 30 * 60_000,
  );
});

test("tool severities named like object members fall back to medium", () => {
  const mapper = createSeverityMapper({ error: "high" });
  assert.equal(mapper("constructor"), "medium");
  assert.equal(mapper("__proto__"), "medium");
  assert.equal(mapper("hasOwnProperty"), "medium");
  assert.equal(mapper("ERROR"), "high");
});
