import test from "node:test";
import assert from "node:assert/strict";
import { calculateHealth, calculateSummary, validateHealthWeights } from "../src/assess/summary.js";
import { estimateIssueTime } from "../src/assess/estimates.js";
import { generateWorkflow } from "../src/assess/workflow.js";
import { SEVERITIES, type HealthWeights, type Issue } from "../src/types.js";
import { categoryResult, issue } from "./helpers/fakes.js";

test("summary counts issues and reuses the workflow estimates", () => {
  const categories = {
    format: categoryResult("format", 1, [issue("format", "a.go"), issue("format", "b.go")]),
    security: categoryResult("security", 2, [issue("security", "Cargo.lock", "critical")]),
    lint: categoryResult("lint", 4, []),
  };
  const plan = generateWorkflow(categories);

  const summary = calculateSummary(categories, plan);

  assert.equal(summary.totalIssues, 3);
  assert.equal(summary.criticalIssues, 1);
  assert.equal(summary.categoriesWithIssues, 2);
  assert.equal(summary.parallelGroups, 3);
  assert.equal(summary.estimatedTimeMs, plan.totalTimeMs);
  assert.ok(Math.abs(summary.overallHealth - 0.86) < 1e-9, `health was ${summary.overallHealth}`);
});

test("health is clamped at zero and is one without issues", () => {
  const many = Array.from({ length: 15 }, (_value, index) => issue("security", `f${index}`, "critical"));
  assert.equal(calculateHealth([categoryResult("security", 2, many)]), 0);
  assert.equal(calculateHealth([categoryResult("lint", 4, [])]), 1);
});

test("custom weights change the penalty", () => {
  const weights = { critical: 0.5, high: 0.25, medium: 0.1, low: 0.05, info: 0 };
  const health = calculateHealth([categoryResult("lint", 4, [issue("lint", "a.py", "high"), issue("lint", "a.py", "info")])], weights);
  assert.equal(health, 0.75);
});

test("weights must be non-negative and ordered by severity", () => {
  assert.deepEqual(validateHealthWeights({ critical: 0.1, high: 0.05, medium: 0.02, low: 0.01, info: 0.005 }), []);
  assert.deepEqual(validateHealthWeights({ critical: 0.1, high: 0.2, medium: 0.02, low: 0.01, info: -1 }), [
    "info weight must be a non-negative number",
    "critical weight must be at least the high weight",
  ]);
});

test("an issue's own estimate wins over the severity default", () => {
  assert.equal(estimateIssueTime(issue("lint", "a.py", "high")), 900_000);
  assert.equal(estimateIssueTime(issue("lint", "a.py", "high", { estimatedTimeMs: 1000 })), 1000);
  assert.equal(estimateIssueTime(issue("lint", "a.py", "low", { estimatedTimeMs: 0 })), 120_000);
});

test("adding an issue of any severity never raises health", () => {
  const weightSets: HealthWeights[] = [
    { critical: 0.1, high: 0.05, medium: 0.02, low: 0.01, info: 0.005 },
    { critical: 0.5, high: 0.25, medium: 0.1, low: 0.05, info: 0 },
  ];
  for (const weights of weightSets) {
    const issues: Issue[] = [];
    let previous = calculateHealth([categoryResult("lint", 4, issues)], weights);
    assert.equal(previous, 1);
    for (let round = 0; round < 8; round += 1) {
      for (const severity of SEVERITIES) {
        issues.push(issue("lint", `src/f${round}.ts`, severity));
        const health = calculateHealth([categoryResult("lint", 4, [...issues])], weights);
        assert.ok(health <= previous, `${severity} issue raised health from ${previous} to ${health}`);
        assert.ok(health >= 0 && health <= 1, `health ${health} left [0, 1]`);
        previous = health;
      }
    }
    assert.equal(previous, 0);
  }
});
