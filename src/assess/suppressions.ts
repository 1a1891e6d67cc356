import fs from "node:fs/promises";
import path from "node:path";
import type { Suppression, SuppressionReport, SuppressionSummary, TopItem } from "../types.js";

interface SuppressionPattern {
  tool: string;
  regex: RegExp;
}

const PATTERNS: Record<string, RegExp[]> = {
  gosec: [/(?:\/\/|\/\*)\s*#nosec(?:\s+(G\d{3}))?(?:\s*[-–]\s*(.*))?/, /^\s*#nosec(?:\s+(G\d{3}))?(?:\s*[-–]\s*(.*))?/],
  bandit: [/#\s*nosec(?:\s+(B\d{3}))?(?:\s*[-–]\s*(.*))?/],
  semgrep: [/(?:#|\/\/)\s*nosemgrep(?:\s*:\s*(\S+))?(?:\s*[-–]\s*(.*))?/],
  biome: [/\/\/\s*biome-ignore\s+([^:]+?)(?:\s*:\s*(.*))?$/],
  eslint: [
    /\/\/\s*eslint-disable-next-line(?:\s+([^\s-][^\s]*))?(?:\s*--\s*(.*))?/,
    /\/\*\s*eslint-disable(?:\s+([^\s*]+))?\s*\*\//,
  ],
  ruff: [/#\s*noqa(?:\s*:\s*([A-Z]+\d+))?(?:\s*[-–]\s*(.*))?/],
};

const TOOLS_BY_EXTENSION: Record<string, string[]> = {
  ".go": ["gosec"],
  ".py": ["bandit", "ruff"],
  ".js": ["biome", "eslint", "semgrep"],
  ".jsx": ["biome", "eslint", "semgrep"],
  ".ts": ["biome", "eslint", "semgrep"],
  ".tsx": ["biome", "eslint", "semgrep"],
  ".mjs": ["biome", "eslint", "semgrep"],
  ".cjs": ["biome", "eslint", "semgrep"],
  ".java": ["semgrep"],
};

export const SUPPRESSION_EXTENSIONS = new Set([
  ".go", ".py", ".js", ".jsx", ".ts", ".tsx", ".mjs", ".cjs", ".java", ".rb", ".php", ".cs", ".c", ".h", ".cpp", ".hpp", ".rs",
]);

function patternsFor(file: string): SuppressionPattern[] {
  const ext = path.extname(file).toLowerCase();
  const tools = TOOLS_BY_EXTENSION[ext] ?? Object.keys(PATTERNS);
  return tools.flatMap((tool) => (PATTERNS[tool] ?? []).map((regex) => ({ tool, regex })));
}

/** Finds inline suppression comments; at most one entry per tool per line. */
export function parseSuppressionsInText(text: string, file: string): Suppression[] {
  const patterns = patternsFor(file);
  const found: Suppression[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    const matchedTools = new Set<string>();
    for (const { tool, regex } of patterns) {
      if (matchedTools.has(tool)) continue;
      const match = regex.exec(line);
      if (!match) continue;
      matchedTools.add(tool);

      const suppression: Suppression = {
        tool,
        file,
        line: index + 1,
        syntax: match[0].trim(),
      };
      const ruleId = match[1]?.trim();
      if (ruleId) suppression.ruleId = ruleId;
      const reason = match[2]?.trim();
      if (reason) suppression.reason = reason;
      found.push(suppression);
    }
  });

  return found;
}

export async function parseSuppressionsInFiles(rootDir: string, relFiles: readonly string[]): Promise<Suppression[]> {
  const all: Suppression[] = [];
  for (const relFile of relFiles) {
    if (!SUPPRESSION_EXTENSIONS.has(path.extname(relFile).toLowerCase())) continue;
    const text = await fs.readFile(path.join(rootDir, relFile), "utf8");
    all.push(...parseSuppressionsInText(text, relFile));
  }
  return all;
}

function topK(counts: ReadonlyMap<string, number>, k: number): TopItem[] {
  return Array.from(counts)
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => (b.count !== a.count ? b.count - a.count : a.name.localeCompare(b.name)))
    .slice(0, k);
}

export function summarizeSuppressions(suppressions: readonly Suppression[], top = 5): SuppressionSummary {
  // Rule ids and file names are arbitrary text, so count in Maps rather than on plain objects.
  const byTool = new Map<string, number>();
  const byRule = new Map<string, number>();
  const byFile = new Map<string, number>();
  let withReason = 0;

  for (const item of suppressions) {
    byTool.set(item.tool, (byTool.get(item.tool) ?? 0) + 1);
    if (item.ruleId) byRule.set(item.ruleId, (byRule.get(item.ruleId) ?? 0) + 1);
    if (item.file) byFile.set(item.file, (byFile.get(item.file) ?? 0) + 1);
    if (item.reason) withReason += 1;
  }

  return {
    total: suppressions.length,
    byTool: Object.fromEntries(byTool),
    byRule: Object.fromEntries(byRule),
    byFile: Object.fromEntries(byFile),
    topRules: topK(byRule, top),
    topFiles: topK(byFile, top),
    withReason,
    withoutReason: suppressions.length - withReason,
  };
}

export function buildSuppressionReport(suppressions: readonly Suppression[]): SuppressionReport {
  return {
    suppressions: [...suppressions],
    summary: summarizeSuppressions(suppressions),
  };
}
