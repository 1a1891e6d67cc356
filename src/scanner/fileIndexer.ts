import fs from "node:fs/promises";
import path from "node:path";
import { readTextIfExists } from "../utils/fs.js";
import { relPosix } from "../utils/path.js";
import { createGlobMatcher, isIgnored, parseIgnoreRules, type IgnoreRule } from "./glob.js";

export interface FileIndexEntry {
  absPath: string;
  relPath: string;
  sizeBytes: number;
  ext: string;
  depth: number;
}

export interface BuildFileIndexOptions {
  rootDir: string;
  maxDepth?: number;
  maxFiles?: number;
  includeFiles?: string[];
  excludeFiles?: string[];
  /** Skip .assayerignore and .gitignore rules. */
  noIgnore?: boolean;
  /** Paths kept even when an ignore file would drop them. */
  forceInclude?: string[];
}

export const IGNORE_FILES = [".assayerignore", ".gitignore"];

const EXCLUDED_DIRS = new Set([
  ".git",
  "node_modules",
  ".assayer",
  "target",
  "dist",
  "build",
  ".next",
  ".turbo",
  "coverage",
  ".venv",
  "venv",
  "__pycache__",
  ".idea",
  ".vscode",
]);

const DEFAULT_MAX_DEPTH = 32;
const DEFAULT_MAX_FILES = 50_000;

export async function loadIgnoreRules(rootDir: string): Promise<IgnoreRule[]> {
  const rules: IgnoreRule[] = [];
  for (const name of IGNORE_FILES) {
    const text = await readTextIfExists(path.join(rootDir, name));
    if (text !== null) {
      rules.push(...parseIgnoreRules(text));
    }
  }
  return rules;
}

export async function buildFileIndex(options: BuildFileIndexOptions): Promise<FileIndexEntry[]> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const maxFiles = options.maxFiles ?? DEFAULT_MAX_FILES;
  const rules = options.noIgnore ? [] : await loadIgnoreRules(options.rootDir);
  const included = createGlobMatcher(options.includeFiles ?? []);
  const excluded = createGlobMatcher(options.excludeFiles ?? []);
  const forced = createGlobMatcher(options.forceInclude ?? []);
  const hasIncludes = (options.includeFiles ?? []).some((pattern) => pattern.trim());
  const hasForced = (options.forceInclude ?? []).some((pattern) => pattern.trim());
  const entries: FileIndexEntry[] = [];

  async function walk(dir: string, depth: number, underIgnored: boolean): Promise<void> {
    if (entries.length >= maxFiles || depth > maxDepth) {
      return;
    }

    const children = await fs.readdir(dir, { withFileTypes: true });
    for (const child of children) {
      if (entries.length >= maxFiles) {
        break;
      }
      const absPath = path.join(dir, child.name);
      const relPath = relPosix(options.rootDir, absPath);

      if (child.isDirectory()) {
        if (EXCLUDED_DIRS.has(child.name) || (child.name.startsWith(".") && child.name !== ".github")) {
          continue;
        }
        const ignored = underIgnored || isIgnored(relPath, true, rules);
        // Ignored directories are only entered when something inside may be forced back in.
        if (ignored && !hasForced) {
          continue;
        }
        await walk(absPath, depth + 1, ignored);
        continue;
      }

      if (!child.isFile()) {
        continue;
      }
      const ignored = underIgnored || isIgnored(relPath, false, rules);
      if (ignored && !forced(relPath)) {
        continue;
      }
      if (hasIncludes && !included(relPath)) {
        continue;
      }
      if (excluded(relPath)) {
        continue;
      }

      const stat = await fs.stat(absPath);
      entries.push({
        absPath,
        relPath,
        sizeBytes: stat.size,
        ext: path.extname(child.name).toLowerCase(),
        depth,
      });
    }
  }

  await walk(options.rootDir, 0, false);
  entries.sort((a, b) => a.relPath.localeCompare(b.relPath));
  return entries;
}
