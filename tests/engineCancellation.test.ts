import test from "node:test";
import assert from "node:assert/strict";
import { AssessmentEngine } from "../src/assess/engine.js";
import { RunnerRegistry } from "../src/assess/registry.js";
import { FakeRunner, testConfig } from "./helpers/fakes.js";

function slowRegistry(): RunnerRegistry {
  const registry = new RunnerRegistry();
  registry.registerRunner("format", new FakeRunner("format", { delayMs: 500 }));
  registry.registerRunner("security", new FakeRunner("security", { delayMs: 500, ignoreSignal: true }));
  registry.registerRunner("lint", new FakeRunner("lint", { delayMs: 500 }));
  return registry;
}

test("cancelling a run gives every category a terminal status", async () => {
  const controller = new AbortController();
  const engine = new AssessmentEngine({ registry: slowRegistry() });
  setTimeout(() => controller.abort(new Error("user interrupt")), 30);

  const startedAt = Date.now();
  const report = await engine.runAssessment("/repo", testConfig({ concurrency: 2 }), controller.signal);

  assert.ok(Date.now() - startedAt < 400, "run should return without waiting for the stuck runner");
  assert.deepEqual(Object.keys(report.categories), ["format", "security", "lint"]);
  assert.equal(report.categories.format.status, "error");
  assert.equal(report.categories.format.error, "format assessment cancelled: user interrupt");
  assert.equal(report.categories.security.status, "error");
  assert.equal(report.categories.security.error, "security assessment cancelled: user interrupt");
  assert.equal(report.categories.lint.status, "skipped");
  assert.equal(report.categories.lint.skipReason, "run cancelled before start: user interrupt");
});

test("an already aborted signal skips every category", async () => {
  const controller = new AbortController();
  controller.abort(new Error("stopped early"));
  const registry = slowRegistry();
  const engine = new AssessmentEngine({ registry });

  const report = await engine.runAssessment("/repo", testConfig({ extended: true }), controller.signal);

  for (const result of Object.values(report.categories)) {
    assert.equal(result.status, "skipped");
    assert.equal(result.skipReason, "run cancelled before start: stopped early");
  }
  assert.deepEqual(report.workplan?.categoriesPlanned, []);
  assert.equal(report.summary.totalIssues, 0);
});

test("the total timeout cancels running categories and names the limit", async () => {
  const engine = new AssessmentEngine({ registry: slowRegistry() });

  const report = await engine.runAssessment("/repo", testConfig({ concurrency: 3, totalTimeoutMs: 30 }));

  for (const category of ["format", "security", "lint"]) {
    assert.equal(report.categories[category].status, "error");
    assert.equal(report.categories[category].error, `${category} assessment cancelled: total timeout of 30ms exceeded`);
  }
});

test("categories that never start keep their runner's parallel flag", async () => {
  const controller = new AbortController();
  controller.abort(new Error("stopped early"));
  const registry = new RunnerRegistry();
  registry.registerRunner("format", new FakeRunner("format"));
  registry.registerRunner("security", new FakeRunner("security", { parallel: false }));
  const engine = new AssessmentEngine({ registry });

  const report = await engine.runAssessment("/repo", testConfig(), controller.signal);

  assert.equal(report.categories.format.parallelizable, true);
  assert.equal(report.categories.security.parallelizable, false);
  assert.equal(report.categories.security.status, "skipped");
});
