import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "../src/errors.js";
import { parseReport } from "../src/output/json.js";
import { parseReportFormats, writeReportArtifacts } from "../src/output/writer.js";
import { sampleReport } from "./helpers/fakes.js";

test("report formats are normalized to a fixed order", () => {
  assert.deepEqual(parseReportFormats("md,JSON"), ["json", "md"]);
  assert.deepEqual(parseReportFormats("markdown, sarif,md"), ["md", "sarif"]);
});

test("unknown or empty format lists are configuration errors", () => {
  assert.throws(
    () => parseReportFormats("md,pdf"),
    (error: unknown) => error instanceof ConfigError && error.message === '--format: unknown report format "pdf" (expected json, md, sarif)',
  );
  assert.throws(
    () => parseReportFormats(" , "),
    (error: unknown) => error instanceof ConfigError && error.message === "--format: at least one report format is required",
  );
});

test("artifacts are written under the output directory", async () => {
  const dir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), "assayer-out-")), "nested");
  const report = sampleReport();

  const written = await writeReportArtifacts(dir, report, ["json", "sarif"]);

  assert.deepEqual(written, [path.join(dir, "report.json"), path.join(dir, "report.sarif")]);
  assert.deepEqual(parseReport(await fs.readFile(written[0], "utf8")), report);
  const sarif: unknown = JSON.parse(await fs.readFile(written[1], "utf8"));
  assert.ok(typeof sarif === "object" && sarif !== null && "version" in sarif && sarif.version === "2.1.0");
  await assert.rejects(fs.access(path.join(dir, "report.md")));
});
