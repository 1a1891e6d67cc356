import test from "node:test";
import assert from "node:assert/strict";
import { buildParallelGroups, buildPhases, generateWorkflow } from "../src/assess/workflow.js";
import { categoryResult, issue } from "./helpers/fakes.js";

function sampleCategories() {
  return {
    format: categoryResult("format", 1, [issue("format", "a.go")]),
    lint: categoryResult("lint", 1, [issue("lint", "a.go"), issue("lint", "b.go")]),
    security: categoryResult("security", 2, [issue("security", "Cargo.lock", "critical")]),
    performance: categoryResult("performance", 5, []),
  };
}

test("phases group categories with issues by priority", () => {
  const phases = buildPhases(sampleCategories());

  assert.deepEqual(
    phases.map((phase) => ({ name: phase.name, categories: phase.categories, time: phase.estimatedTimeMs })),
    [
      { name: "Phase 1", categories: ["format", "lint"], time: 900_000 },
      { name: "Phase 2", categories: ["security"], time: 1_800_000 },
    ],
  );
  assert.equal(phases[0].description, "Quick wins, often auto-fixable");
  assert.equal(phases[1].description, "Critical issues that may block progress");
});

test("issues sharing a file land in the same parallel group", () => {
  const groups = buildParallelGroups(sampleCategories());

  assert.deepEqual(groups, [
    {
      name: "group_1",
      description: "2 issue(s) across 1 file(s)",
      files: ["a.go"],
      categories: ["format", "lint"],
      issueCount: 2,
      estimatedTimeMs: 600_000,
    },
    {
      name: "group_2",
      description: "1 issue(s) across 1 file(s)",
      files: ["b.go"],
      categories: ["lint"],
      issueCount: 1,
      estimatedTimeMs: 300_000,
    },
    {
      name: "group_3",
      description: "1 issue(s) across 1 file(s)",
      files: ["Cargo.lock"],
      categories: ["security"],
      issueCount: 1,
      estimatedTimeMs: 1_800_000,
    },
  ]);
});

test("issues without a file each get their own group", () => {
  const groups = buildParallelGroups({
    lint: categoryResult("lint", 4, [issue("lint", ""), issue("lint", "  ")]),
  });

  assert.equal(groups.length, 2);
  assert.deepEqual(groups[0].files, []);
  assert.equal(groups[0].description, "1 issue(s) across 0 file(s)");
});

test("repository-wide findings share one group and equivalent paths merge", () => {
  const groups = buildParallelGroups({
    "repo-status": categoryResult("repo-status", 999, [issue("repo-status", "repository"), issue("repo-status", "repository")]),
    lint: categoryResult("lint", 4, [issue("lint", "./src/x.ts"), issue("lint", "src\\x.ts")]),
  });

  assert.deepEqual(
    groups.map((group) => [group.files, group.issueCount]),
    [
      [["src/x.ts"], 2],
      [["repository"], 2],
    ],
  );
});

test("workflow links phases to the groups touching their categories", () => {
  const plan = generateWorkflow(sampleCategories());

  assert.deepEqual(plan.phases[0].parallelGroups, ["group_1", "group_2"]);
  assert.deepEqual(plan.phases[1].parallelGroups, ["group_3"]);
  assert.equal(plan.totalTimeMs, 2_700_000);
});

test("a run without issues has an empty workflow", () => {
  const plan = generateWorkflow({ format: categoryResult("format", 1, []) });
  assert.deepEqual(plan, { phases: [], parallelGroups: [], totalTimeMs: 0 });
});
