import test from "node:test";
import assert from "node:assert/strict";
import { collectDoctorChecks } from "../src/commands/doctor.js";

test("without tools on PATH every adapter is reported missing", async () => {
  const checks = await collectDoctorChecks({ PATH: "" });

  assert.deepEqual(
    checks.map((check) => `${check.category}/${check.tool}`),
    [
      "format/biome-format",
      "format/ruff-format",
      "lint/cargo-clippy",
      "lint/biome",
      "lint/ruff",
      "static-analysis/tsc",
      "security/cargo-deny",
      "security/cargo-audit",
      "dependencies/cargo-deny",
      "repo-status/git-status",
    ],
  );
  assert.ok(checks.every((check) => !check.available));
  assert.equal(checks[2].note, "cargo not found on PATH");
});
