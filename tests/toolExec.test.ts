import test from "node:test";
import assert from "node:assert/strict";
import os from "node:os";
import { z } from "zod";
import { parseJsonDocument, parseJsonLines, runTool, runToolExpectSuccess } from "../src/adapters/toolExec.js";
import type { AdapterContext } from "../src/adapters/types.js";
import { ToolExecutionError } from "../src/errors.js";

function context(overrides: Partial<AdapterContext> = {}): AdapterContext {
  return { rootDir: os.tmpdir(), files: [], mode: "check", timeoutMs: 5000, ...overrides };
}

function isToolError(kind: ToolExecutionError["kind"], message: string) {
  return (error: unknown): boolean => error instanceof ToolExecutionError && error.kind === kind && error.message === message;
}

test("non-zero exits are returned, not thrown", async () => {
  const result = await runTool(
    { tool: "demo", command: "sh", args: ["-c", "echo found; exit 3"] },
    context(),
    new AbortController().signal,
  );
  assert.equal(result.exitCode, 3);
  assert.equal(result.stdout, "found\n");
});

test("a missing binary is a launch failure", async () => {
  await assert.rejects(
    runTool({ tool: "demo", command: "definitely-not-installed-tool", args: [] }, context(), new AbortController().signal),
    isToolError("launch", "definitely-not-installed-tool not found on PATH"),
  );
});

test("a tool running past its timeout is a timeout failure", async () => {
  await assert.rejects(
    runTool({ tool: "demo", command: "sh", args: ["-c", "sleep 5"] }, context({ timeoutMs: 50 }), new AbortController().signal),
    isToolError("timeout", "demo timed out after 50ms"),
  );
});

test("aborting the signal cancels the tool", async () => {
  const controller = new AbortController();
  setTimeout(() => controller.abort(), 30);
  await assert.rejects(
    runTool({ tool: "demo", command: "sh", args: ["-c", "sleep 5"] }, context(), controller.signal),
    isToolError("cancelled", "demo cancelled"),
  );
});

test("output past the limit fails instead of keeping only its tail", async () => {
  await assert.rejects(
    runTool(
      { tool: "demo", command: "sh", args: ["-c", "echo first finding; echo second finding"], maxOutputChars: 10 },
      context(),
      new AbortController().signal,
    ),
    isToolError("parse", "demo output exceeded 10 characters"),
  );
});

test("fix passes fail on a non-zero exit with the last stderr line", async () => {
  await assert.rejects(
    runToolExpectSuccess(
      { tool: "demo", command: "sh", args: ["-c", "echo first >&2; echo cannot write file >&2; exit 1"] },
      context(),
      new AbortController().signal,
    ),
    isToolError("launch", "sh -c failed: cannot write file"),
  );
});

test("json helpers try each shape and skip bad lines", () => {
  const Named = z.object({ name: z.string() });
  const Titled = z.object({ title: z.string() }).transform((value) => ({ name: value.title }));

  assert.deepEqual(parseJsonDocument(' {"title": "report"} ', [Named, Titled]), { name: "report" });
  assert.equal(parseJsonDocument("not json", [Named]), null);
  assert.equal(parseJsonDocument("[]", [Named]), null);
  assert.deepEqual(parseJsonLines('{"name":"a"}\nnoise\n{"name":1}\n{broken\n{"name":"b"}', Named), [{ name: "a" }, { name: "b" }]);
});
