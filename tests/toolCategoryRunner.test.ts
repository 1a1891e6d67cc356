import test from "node:test";
import assert from "node:assert/strict";
import type { AdapterContext, AdapterDefinition, SuppressingToolAdapter, ToolAdapter } from "../src/adapters/types.js";
import { ToolCategoryRunner } from "../src/runners/toolCategoryRunner.js";
import type { Issue } from "../src/types.js";
import { MemoryLogger } from "../src/utils/logger.js";
import { issue, testConfig } from "./helpers/fakes.js";

function definition(name: string, adapter: Omit<ToolAdapter, "name" | "category">, seen?: AdapterContext[]): AdapterDefinition {
  return {
    name,
    binary: "sh",
    create: (context) => {
      seen?.push(context);
      return { name, category: "lint", ...adapter };
    },
  };
}

const signal = new AbortController().signal;

test("findings from every applicable adapter are merged", async () => {
  const contexts: AdapterContext[] = [];
  const runner = new ToolCategoryRunner({
    category: "lint",
    definitions: [
      definition("alpha", { isAvailable: () => true, run: async () => [issue("lint", "a.py")] }, contexts),
      definition("beta", { isAvailable: () => false, run: async () => [issue("lint", "never.py")] }),
      definition("gamma", { isAvailable: () => true, run: async () => [issue("lint", "b.ts", "high")] }),
    ],
    listFiles: async () => ["a.py", "b.ts"],
  });

  const result = await runner.assess(signal, "/repo", testConfig({ timeoutMs: 1234 }));

  assert.equal(result.success, true);
  assert.equal(result.error, undefined);
  assert.deepEqual(
    result.issues.map((item) => item.file),
    ["a.py", "b.ts"],
  );
  assert.deepEqual(result.metrics, { adapters_run: 2, adapters: "alpha,gamma", files_considered: 2 });
  assert.deepEqual(contexts[0], { rootDir: "/repo", files: ["a.py", "b.ts"], mode: "check", timeoutMs: 1234, env: undefined });
});

test("a failing adapter keeps the others' findings and names itself in the error", async () => {
  const logger = new MemoryLogger();
  const runner = new ToolCategoryRunner({
    category: "lint",
    logger,
    definitions: [
      definition("alpha", {
        isAvailable: () => true,
        run: async () => {
          throw new Error("exited with code 2");
        },
      }),
      definition("gamma", { isAvailable: () => true, run: async () => [issue("lint", "b.ts")] }),
    ],
  });

  const result = await runner.assess(signal, "/repo", testConfig());

  assert.equal(result.success, false);
  assert.equal(result.error, "alpha: exited with code 2");
  assert.equal(result.issues.length, 1);
  assert.deepEqual(logger.messages("warn"), ["alpha failed: exited with code 2"]);
});

test("suppressions are collected only when tracking is on", async () => {
  const found: Issue[] = [issue("lint", "a.py")];
  const adapter: SuppressingToolAdapter = {
    name: "ruff",
    category: "lint",
    isAvailable: () => true,
    run: async () => found,
    runWithSuppressions: async () => ({
      issues: found,
      suppressions: [{ tool: "ruff", file: "a.py", line: 1, syntax: "# noqa" }],
    }),
  };
  const runner = new ToolCategoryRunner({
    category: "lint",
    definitions: [{ name: "ruff", binary: "sh", create: () => adapter }],
  });

  const tracked = await runner.assess(signal, "/repo", testConfig({ trackSuppressions: true }));
  const untracked = await runner.assess(signal, "/repo", testConfig());

  assert.equal(tracked.suppressions?.length, 1);
  assert.equal(untracked.suppressions, undefined);
});

test("availability is a PATH lookup of any adapter binary", () => {
  const runner = new ToolCategoryRunner({ category: "lint", definitions: [definition("alpha", { isAvailable: () => true, run: async () => [] })] });
  assert.equal(runner.isAvailable(), true);

  const noPath = new ToolCategoryRunner({
    category: "lint",
    env: { PATH: "" },
    definitions: [definition("alpha", { isAvailable: () => true, run: async () => [] })],
  });
  assert.equal(noPath.isAvailable(), false);
  assert.equal(noPath.getEstimatedTime(), 30_000);
  assert.equal(noPath.canRunInParallel(), true);
});
