import test from "node:test";
import assert from "node:assert/strict";
import { AssessmentEngine, type EngineEvent } from "../src/assess/engine.js";
import { RunnerRegistry } from "../src/assess/registry.js";
import { ConfigError } from "../src/errors.js";
import type { AssessmentCategory } from "../src/types.js";
import { MemoryLogger } from "../src/utils/logger.js";
import { FakeRunner, issue, testConfig } from "./helpers/fakes.js";

function registryOf(runners: FakeRunner[]): RunnerRegistry {
  const registry = new RunnerRegistry();
  for (const runner of runners) {
    registry.registerRunner(runner.getCategory(), runner);
  }
  return registry;
}

test("engine runs available categories and lists them in priority order", async () => {
  const registry = registryOf([
    new FakeRunner("lint", { issues: [issue("lint", "src/a.ts"), issue("lint", "src/b.ts", "high")] }),
    new FakeRunner("format", { issues: [issue("format", "src/a.ts", "low")] }),
    new FakeRunner("security", { available: false }),
  ]);
  const engine = new AssessmentEngine({ registry, cpuCount: 4 });

  const report = await engine.runAssessment("/repo", testConfig({ extended: true }));

  assert.deepEqual(Object.keys(report.categories), ["format", "lint"]);
  assert.equal(report.categories.format.status, "success");
  assert.equal(report.categories.lint.issueCount, 2);
  assert.equal(report.summary.totalIssues, 3);
  assert.equal(report.summary.categoriesWithIssues, 2);
  assert.deepEqual(report.metadata.commandsRun, ["fake-format", "fake-lint"]);
  assert.equal(report.metadata.workerCount, 2);
  assert.equal(report.metadata.failOn, "critical");
  assert.equal(report.workplan?.skipReasons.security, "tool not available");
  assert.deepEqual(report.workplan?.categoriesPlanned, ["format", "lint"]);
  assert.deepEqual(report.workplan?.categoriesSkipped, ["security"]);
});

test("workplan is only attached in extended mode", async () => {
  const engine = new AssessmentEngine({ registry: registryOf([new FakeRunner("format")]) });
  const report = await engine.runAssessment("/repo", testConfig());
  assert.equal(report.workplan, undefined);
  assert.equal("workplan" in report, false);
});

test("a failing category is recorded as an error without aborting its siblings", async () => {
  const registry = registryOf([
    new FakeRunner("format", { throws: "biome crashed" }),
    new FakeRunner("lint", { issues: [issue("lint", "a.py")] }),
    new FakeRunner("security", { error: "cargo-audit: database fetch failed", issues: [issue("security", "Cargo.lock", "high")] }),
  ]);
  const engine = new AssessmentEngine({ registry });

  const report = await engine.runAssessment("/repo", testConfig({ concurrency: 2 }));

  assert.equal(report.categories.format.status, "error");
  assert.equal(report.categories.format.error, "biome crashed");
  assert.equal(report.categories.lint.status, "success");
  assert.equal(report.categories.security.status, "error");
  assert.equal(report.categories.security.error, "cargo-audit: database fetch failed");
  assert.equal(report.categories.security.issueCount, 1);
});

test("a runner with neither success nor error is recorded as skipped", async () => {
  const runner = new FakeRunner("lint");
  runner.assess = async () => ({
    commandName: "lint-runner",
    category: "lint",
    success: false,
    executionTimeMs: 0,
    issues: [],
  });
  const engine = new AssessmentEngine({ registry: registryOf([runner]) });

  const report = await engine.runAssessment("/repo", testConfig());

  assert.equal(report.categories.lint.status, "skipped");
  assert.equal(report.categories.lint.skipReason, "lint-runner reported no result");
});

test("a category exceeding its timeout ends as an error naming the timeout", async () => {
  const registry = registryOf([
    new FakeRunner("lint", { delayMs: 500 }),
    new FakeRunner("format", { delayMs: 500, ignoreSignal: true }),
    new FakeRunner("security"),
  ]);
  const engine = new AssessmentEngine({ registry });

  const report = await engine.runAssessment("/repo", testConfig({ timeoutMs: 20, concurrency: 3 }));

  assert.equal(report.categories.lint.status, "error");
  assert.equal(report.categories.lint.error, "lint assessment timed out after 20ms");
  assert.equal(report.categories.format.status, "error");
  assert.equal(report.categories.format.error, "format assessment timed out after 20ms");
  assert.equal(report.categories.security.status, "success");
});

async function timeRun(concurrency: number): Promise<{ elapsedMs: number; peak: number }> {
  let running = 0;
  let peak = 0;
  const hooks = {
    onStart: () => {
      running += 1;
      peak = Math.max(peak, running);
    },
    onEnd: () => {
      running -= 1;
    },
  };
  const categories: AssessmentCategory[] = ["format", "lint", "static-analysis", "performance"];
  const registry = registryOf(categories.map((category) => new FakeRunner(category, { delayMs: 60, ...hooks })));
  const engine = new AssessmentEngine({ registry });

  const startedAt = Date.now();
  await engine.runAssessment("/repo", testConfig({ concurrency }));
  return { elapsedMs: Date.now() - startedAt, peak };
}

test("worker bound of one runs categories serially; a wider bound overlaps them", async () => {
  const serial = await timeRun(1);
  const parallel = await timeRun(4);

  assert.equal(serial.peak, 1);
  assert.equal(parallel.peak, 4);
  assert.ok(serial.elapsedMs >= 200, `serial run took ${serial.elapsedMs}ms`);
  assert.ok(parallel.elapsedMs < serial.elapsedMs, `parallel ${parallel.elapsedMs}ms vs serial ${serial.elapsedMs}ms`);
});

test("non-parallel categories never overlap each other", async () => {
  let running = 0;
  let peak = 0;
  const hooks = {
    parallel: false,
    delayMs: 30,
    onStart: () => {
      running += 1;
      peak = Math.max(peak, running);
    },
    onEnd: () => {
      running -= 1;
    },
  };
  const registry = registryOf([
    new FakeRunner("security", hooks),
    new FakeRunner("dependencies", hooks),
    new FakeRunner("format", { delayMs: 30 }),
  ]);
  const engine = new AssessmentEngine({ registry });

  const report = await engine.runAssessment("/repo", testConfig({ concurrency: 4 }));

  assert.equal(peak, 1);
  assert.equal(report.categories.security.parallelizable, false);
  assert.equal(report.categories.format.parallelizable, true);
});

test("selected categories filter the run and unknown ones are explained", async () => {
  const registry = registryOf([new FakeRunner("format"), new FakeRunner("lint")]);
  const engine = new AssessmentEngine({ registry });

  const report = await engine.runAssessment("/repo", testConfig({ selectedCategories: ["lint", "dates"], extended: true }));

  assert.deepEqual(Object.keys(report.categories), ["lint"]);
  assert.equal(report.workplan?.skipReasons.format, "not selected");
  assert.equal(report.workplan?.skipReasons.dates, "no runner registered");
  assert.deepEqual(report.workplan?.categoriesSkipped, ["format"]);
});

test("priority overrides reorder the categories", async () => {
  const registry = registryOf([new FakeRunner("format"), new FakeRunner("security"), new FakeRunner("lint")]);
  const engine = new AssessmentEngine({ registry });

  const report = await engine.runAssessment("/repo", testConfig({ priorityString: "lint=1,format=lowest" }));

  assert.deepEqual(Object.keys(report.categories), ["lint", "security", "format"]);
  assert.equal(report.categories.format.priority, 5);
});

test("an invalid priority string is a configuration error", async () => {
  const engine = new AssessmentEngine({ registry: registryOf([new FakeRunner("format")]) });
  await assert.rejects(
    engine.runAssessment("/repo", testConfig({ priorityString: "format=urgent" })),
    (error: unknown) =>
      error instanceof ConfigError && error.message === "invalid priority value: urgent (expected 1-5 or highest/lowest)",
  );
});

test("timeouts too long for a timer and bad health weights are configuration errors", async () => {
  const registry = registryOf([new FakeRunner("lint", { delayMs: 20 })]);
  const engine = new AssessmentEngine({ registry });

  await assert.rejects(
    engine.runAssessment("/repo", testConfig({ timeoutMs: 30 * 24 * 3_600_000 })),
    (error: unknown) => error instanceof ConfigError && error.message === "timeouts must not exceed 596.5h",
  );
  await assert.rejects(
    engine.runAssessment(
      "/repo",
      testConfig({ healthWeights: { critical: 0.1, high: 0.05, medium: 0.02, low: 0.01, info: -0.5 } }),
    ),
    (error: unknown) =>
      error instanceof ConfigError && error.message === "healthWeights: info weight must be a non-negative number",
  );

  const report = await engine.runAssessment("/repo", testConfig({ timeoutMs: 596 * 3_600_000 }));
  assert.equal(report.categories.lint.status, "success");
});

test("engine emits planned, start and end events for each category", async () => {
  const events: string[] = [];
  const onEvent = (event: EngineEvent): void => {
    events.push(event.type === "planned" ? `planned:${event.categories.join(",")}` : `${event.type}:${event.category}`);
  };
  const engine = new AssessmentEngine({ registry: registryOf([new FakeRunner("format")]), onEvent });

  await engine.runAssessment("/repo", testConfig());

  assert.deepEqual(events, ["planned:format", "start:format", "end:format"]);
});

test("suppressions returned by a runner become a suppression report when tracking is on", async () => {
  const runner = new FakeRunner("lint");
  runner.assess = async () => ({
    commandName: "lint",
    category: "lint",
    success: true,
    executionTimeMs: 1,
    issues: [],
    suppressions: [{ tool: "ruff", ruleId: "E501", file: "a.py", line: 3, syntax: "# noqa: E501" }],
  });
  const registry = registryOf([runner]);

  const tracked = await new AssessmentEngine({ registry }).runAssessment("/repo", testConfig({ trackSuppressions: true }));
  const untracked = await new AssessmentEngine({ registry }).runAssessment("/repo", testConfig());

  assert.equal(tracked.categories.lint.suppressionReport?.summary.total, 1);
  assert.deepEqual(tracked.categories.lint.suppressionReport?.summary.byRule, { E501: 1 });
  assert.equal(untracked.categories.lint.suppressionReport, undefined);
});

test("engine logs the plan and each category stage", async () => {
  const logger = new MemoryLogger();
  const engine = new AssessmentEngine({ registry: registryOf([new FakeRunner("format")]), logger, cpuCount: 2 });

  await engine.runAssessment("/repo", testConfig());

  assert.ok(logger.messages("info").includes("running 1 categories with 1 worker(s): format (estimated 1s serial)"));
  assert.deepEqual(
    logger.entries.filter((entry) => entry.event === "start").map((entry) => entry.stage),
    ["assess", "assess:format"],
  );
});
