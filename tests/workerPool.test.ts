import test from "node:test";
import assert from "node:assert/strict";
import { resolveWorkerCount, runPool, type PoolJob } from "../src/assess/workerPool.js";
import { delay } from "./helpers/fakes.js";

test("explicit concurrency wins over the CPU percentage", () => {
  assert.equal(resolveWorkerCount({ concurrency: 3, concurrencyPercent: 100, cpuCount: 16 }), 3);
});

test("worker count is a floored share of CPUs and never below one", () => {
  assert.equal(resolveWorkerCount({ concurrencyPercent: 50, cpuCount: 8 }), 4);
  assert.equal(resolveWorkerCount({ concurrencyPercent: 30, cpuCount: 5 }), 1);
  assert.equal(resolveWorkerCount({ concurrencyPercent: 10, cpuCount: 2 }), 1);
  assert.equal(resolveWorkerCount({ concurrencyPercent: 250, cpuCount: 4 }), 4);
});

test("invalid percentages fall back to half the CPUs", () => {
  assert.equal(resolveWorkerCount({ concurrencyPercent: 0, cpuCount: 8 }), 4);
  assert.equal(resolveWorkerCount({ concurrencyPercent: -20, cpuCount: 8 }), 4);
  assert.equal(resolveWorkerCount({ concurrencyPercent: Number.NaN, cpuCount: 8 }), 4);
});

function trackedJobs(count: number, ms: number, exclusive = false): { jobs: PoolJob<string>[]; peak: () => number } {
  let running = 0;
  let peak = 0;
  const jobs = Array.from({ length: count }, (_unused, index) => ({
    key: `job-${index}`,
    exclusive,
    run: async () => {
      running += 1;
      peak = Math.max(peak, running);
      await delay(ms);
      running -= 1;
      return `done-${index}`;
    },
  }));
  return { jobs, peak: () => peak };
}

test("pool never runs more jobs than workers and returns outcomes in job order", async () => {
  const { jobs, peak } = trackedJobs(6, 20);
  const outcomes = await runPool(jobs, { workers: 2 });

  assert.equal(peak(), 2);
  assert.deepEqual(
    outcomes.map((outcome) => (outcome.started && outcome.ok ? outcome.value : null)),
    ["done-0", "done-1", "done-2", "done-3", "done-4", "done-5"],
  );
});

test("exclusive jobs never overlap each other even with spare workers", async () => {
  const { jobs, peak } = trackedJobs(3, 15, true);
  await runPool(jobs, { workers: 4 });
  assert.equal(peak(), 1);
});

test("a throwing job is captured without stopping its siblings", async () => {
  const jobs: PoolJob<number>[] = [
    { key: "bad", exclusive: false, run: () => { throw new Error("boom"); } },
    { key: "good", exclusive: false, run: async () => 7 },
  ];
  const outcomes = await runPool(jobs, { workers: 1 });

  const [bad, good] = outcomes;
  assert.ok(bad.started && !bad.ok);
  assert.equal(bad.started && !bad.ok && bad.error instanceof Error ? bad.error.message : "", "boom");
  assert.deepEqual(good, { key: "good", started: true, ok: true, value: 7 });
});

test("after abort no further job starts", async () => {
  const controller = new AbortController();
  const started: string[] = [];
  const jobs: PoolJob<void>[] = ["a", "b", "c"].map((key) => ({
    key,
    exclusive: false,
    run: async () => {
      if (key === "a") controller.abort();
      await delay(5);
    },
  }));
  const outcomes = await runPool(jobs, {
    workers: 1,
    signal: controller.signal,
    onStart: (key) => started.push(key),
  });

  assert.deepEqual(started, ["a"]);
  assert.deepEqual(
    outcomes.map((outcome) => outcome.started),
    [true, false, false],
  );
});
