import test from "node:test";
import assert from "node:assert/strict";
import { CategoryBoard, renderBoard, renderBoardLine } from "../src/ui/categoryBoard.js";
import { detectTerminalCapabilities } from "../src/ui/capabilities.js";
import { OutputRenderer } from "../src/ui/renderer.js";
import { createTheme } from "../src/ui/theme.js";
import { categoryResult, issue } from "./helpers/fakes.js";

const caps = detectTerminalCapabilities({ isTTY: false, platform: "linux", env: {} });
const theme = createTheme(caps);

test("board lines show the state of each category", () => {
  assert.equal(renderBoardLine({ category: "lint", state: "pending" }, theme), `. ${"lint".padEnd(16)} waiting`);
  assert.equal(renderBoardLine({ category: "lint", state: "running" }, theme, 1), `\\ ${"lint".padEnd(16)} running`);
  assert.equal(
    renderBoardLine({ category: "format", state: "success", issues: 3, durationMs: 1500 }, theme),
    `[ok] ${"format".padEnd(16)} 3 issue(s) in 2s`,
  );
  assert.equal(
    renderBoardLine({ category: "security", state: "skipped", detail: "run cancelled before start: interrupted" }, theme),
    `[-] ${"security".padEnd(16)} skipped: run cancelled before start: interrupted`,
  );
});

test("board header counts finished categories", () => {
  const text = renderBoard(
    [
      { category: "format", state: "success", issues: 0, durationMs: 5 },
      { category: "lint", state: "running" },
    ],
    2,
    theme,
  );
  assert.equal(text.split("\n")[0], "Assessing 2 categories with 2 worker(s) [1/2]");
});

test("off a terminal the board prints the plan and one line per finished category", () => {
  const written: string[] = [];
  const renderer = new OutputRenderer(caps, theme, { write: (text) => written.push(text) });
  const board = new CategoryBoard(renderer, caps, theme);

  board.handleEvent({ type: "planned", categories: ["format", "lint"], workerCount: 2 });
  board.handleEvent({ type: "start", category: "format" });
  board.handleEvent({
    type: "end",
    category: "format",
    result: categoryResult("format", 1, [issue("format", "a.ts"), issue("format", "b.ts")]),
  });
  board.handleEvent({ type: "end", category: "lint", result: categoryResult("lint", 4, [], { status: "error", error: "boom" }) });
  board.stop();

  assert.deepEqual(written, [
    "Assessing 2 categories with 2 worker(s): format, lint\n",
    `[ok] ${"format".padEnd(16)} 2 issue(s) in 0ms\n`,
    `[x] ${"lint".padEnd(16)} error: boom\n`,
  ]);
  assert.deepEqual(
    board.snapshot().map((entry) => entry.state),
    ["success", "error"],
  );
});

test("a quiet board prints nothing", () => {
  const quietCaps = detectTerminalCapabilities({ isTTY: false, quiet: true, env: {} });
  const written: string[] = [];
  const board = new CategoryBoard(new OutputRenderer(quietCaps, theme, { write: (text) => written.push(text) }), quietCaps, theme);

  board.handleEvent({ type: "planned", categories: ["lint"], workerCount: 1 });
  board.handleEvent({ type: "end", category: "lint", result: categoryResult("lint", 4, []) });
  board.stop();

  assert.deepEqual(written, []);
});
