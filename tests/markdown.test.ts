import test from "node:test";
import assert from "node:assert/strict";
import { formatHealth, formatLocation, renderIssueLine, renderReportMarkdown } from "../src/output/markdown.js";
import { categoryResult, issue, sampleReport } from "./helpers/fakes.js";

test("markdown report has metadata, summary, workflow and issues", () => {
  const lines = renderReportMarkdown(sampleReport()).split("\n");

  assert.equal(lines[0], "# Assessment Report");
  assert.deepEqual(lines.slice(2, 10), [
    "```yaml",
    "generated_at: 2026-01-02T03:04:05.000Z",
    "target: /work/repo",
    "tool_version: assayer 0.1.0",
    "worker_count: 2",
    "execution_time: 1s",
    "fail_on: high",
    "```",
  ]);
  for (const expected of [
    "| Overall health | 50% |",
    "| Estimated fix time | 1m |",
    "| format | 1 | success | 1 | 30s | 0ms |",
    "| security | 2 | success | 1 | 30m | 0ms |",
    "### Phase 1: Quick wins, often auto-fixable",
    "- Parallel groups: group_1",
    "| group_1 | `src/a.ts` | format | 1 | 30s |",
    "### security (1)",
    "- `Cargo.lock:1` **critical** security finding in Cargo.lock",
  ]) {
    assert.ok(lines.includes(expected), `missing line: ${expected}`);
  }
  assert.equal(lines.at(-1), "");
  assert.equal(lines.at(-2), "- `Cargo.lock:1` **critical** security finding in Cargo.lock");
  assert.equal(lines.includes("## Suppressions"), false);
});

test("failed and skipped categories get a note and long issue lists are cut", () => {
  const report = sampleReport();
  report.categories = {
    lint: categoryResult("lint", 4, [issue("lint", "a.py"), issue("lint", "b.py"), issue("lint", "c.py")]),
    security: categoryResult("security", 2, [], { status: "error", error: "cargo-audit: timed out" }),
    format: categoryResult("format", 1, [], { status: "skipped", skipReason: "run cancelled before start: interrupted" }),
  };
  report.workflow = { phases: [], parallelGroups: [], totalTimeMs: 0 };

  const lines = renderReportMarkdown(report, { maxIssuesPerCategory: 1 }).split("\n");

  assert.ok(lines.includes("- **security** failed: cargo-audit: timed out"));
  assert.ok(lines.includes("- **format** skipped: run cancelled before start: interrupted"));
  assert.ok(lines.includes("- Nothing to fix."));
  assert.ok(lines.includes("- ... and 2 more"));
  assert.equal(lines.includes("## Parallel Groups"), false);
});

test("issue lines show location, severity and fixability", () => {
  assert.equal(
    renderIssueLine(issue("lint", "src/a.ts", "high", { line: 3, column: 7, message: "first\n  second", autoFixable: true })),
    "`src/a.ts:3:7` **high** first second (auto-fixable)",
  );
  assert.equal(formatLocation({ file: "", line: 2 }), "(no file):2");
  assert.equal(formatLocation({ file: "a.py", column: 4 }), "a.py");
  assert.equal(formatHealth(0.876), "88%");
});
