import test from "node:test";
import assert from "node:assert/strict";
import { buildIssuesSarif, severityToSarifLevel } from "../src/output/sarif.js";
import { categoryResult, issue, sampleReport } from "./helpers/fakes.js";

test("sarif has one rule per tool source with its worst level", () => {
  const report = sampleReport();
  report.categories.lint = categoryResult("lint", 4, [
    issue("lint", "a.py", "low", { subCategory: "python:ruff" }),
    issue("lint", "b.py", "high", { subCategory: "python:ruff" }),
  ]);

  const [run] = buildIssuesSarif(report).runs;

  assert.equal(run.tool.driver.name, "assayer");
  assert.equal(run.tool.driver.version, "0.1.0");
  assert.deepEqual(
    run.tool.driver.rules.map((rule) => [rule.id, rule.defaultConfiguration.level]),
    [
      ["format", "note"],
      ["rust:cargo-audit", "error"],
      ["python:ruff", "error"],
    ],
  );
  assert.equal(run.results.length, 4);
});

test("results carry a region only when the issue has a line", () => {
  const [run] = buildIssuesSarif(sampleReport()).runs;

  assert.deepEqual(run.results[0].locations, [{ physicalLocation: { artifactLocation: { uri: "src/a.ts" } } }]);
  assert.deepEqual(run.results[1].locations, [
    { physicalLocation: { artifactLocation: { uri: "Cargo.lock" }, region: { startLine: 1 } } },
  ]);
  assert.equal(run.results[1].level, "error");
  assert.equal(run.results[1].ruleId, "rust:cargo-audit");
});

test("repository-wide findings have no location", () => {
  const report = sampleReport();
  report.categories = { "repo-status": categoryResult("repo-status", 999, [issue("repo-status", "repository", "high")]) };

  const [result] = buildIssuesSarif(report).runs[0].results;

  assert.equal("locations" in result, false);
  assert.equal(result.ruleId, "repo-status");
});

test("severities map onto sarif levels", () => {
  assert.equal(severityToSarifLevel("critical"), "error");
  assert.equal(severityToSarifLevel("medium"), "warning");
  assert.equal(severityToSarifLevel("info"), "note");
});
