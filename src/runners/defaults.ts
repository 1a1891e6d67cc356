import { biomeFormatDefinition, biomeLintDefinition } from "../adapters/biome.js";
import { cargoAuditDefinition } from "../adapters/cargoAudit.js";
import { cargoDenyDependencyDefinition, cargoDenySecurityDefinition } from "../adapters/cargoDeny.js";
import { clippyDefinition } from "../adapters/clippy.js";
import { gitStatusDefinition } from "../adapters/gitStatus.js";
import { ruffCheckDefinition, ruffFormatDefinition } from "../adapters/ruff.js";
import { tscDefinition } from "../adapters/tsc.js";
import type { AdapterDefinition } from "../adapters/types.js";
import { RunnerRegistry } from "../assess/registry.js";
import { buildFileIndex } from "../scanner/fileIndexer.js";
import type { AssessmentCategory, AssessmentConfig, Logger } from "../types.js";
import { ToolCategoryRunner, type FileListProvider } from "./toolCategoryRunner.js";

interface CategorySetup {
  category: AssessmentCategory;
  definitions: AdapterDefinition[];
  parallel: boolean;
  estimatedTimeMs: number;
  needsFiles: boolean;
}

// Security and dependency scans share cargo's advisory database and lock, so they never overlap.
export const DEFAULT_CATEGORY_SETUP: readonly CategorySetup[] = [
  { category: "format", definitions: [biomeFormatDefinition, ruffFormatDefinition], parallel: true, estimatedTimeMs: 15_000, needsFiles: true },
  { category: "lint", definitions: [clippyDefinition, biomeLintDefinition, ruffCheckDefinition], parallel: true, estimatedTimeMs: 60_000, needsFiles: true },
  { category: "static-analysis", definitions: [tscDefinition], parallel: true, estimatedTimeMs: 300_000, needsFiles: true },
  { category: "security", definitions: [cargoDenySecurityDefinition, cargoAuditDefinition], parallel: false, estimatedTimeMs: 90_000, needsFiles: false },
  { category: "dependencies", definitions: [cargoDenyDependencyDefinition], parallel: false, estimatedTimeMs: 60_000, needsFiles: false },
  { category: "repo-status", definitions: [gitStatusDefinition], parallel: true, estimatedTimeMs: 500, needsFiles: false },
];

/** One walk per target and filter set, shared by every category in a run. */
export function createCachedFileListProvider(): FileListProvider {
  const cache = new Map<string, Promise<string[]>>();
  return (target: string, config: AssessmentConfig) => {
    const key = JSON.stringify([target, config.includeFiles, config.excludeFiles, config.noIgnore, config.forceInclude]);
    let pending = cache.get(key);
    if (!pending) {
      pending = buildFileIndex({
        rootDir: target,
        includeFiles: config.includeFiles,
        excludeFiles: config.excludeFiles,
        noIgnore: config.noIgnore,
        forceInclude: config.forceInclude,
      }).then((entries) => entries.map((entry) => entry.relPath));
      cache.set(key, pending);
      // A failed walk is not cached, so a later category can retry.
      void pending.catch(() => cache.delete(key));
    }
    return pending;
  };
}

export interface DefaultRegistryOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  listFiles?: FileListProvider;
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): RunnerRegistry {
  const registry = new RunnerRegistry();
  const listFiles = options.listFiles ?? createCachedFileListProvider();
  for (const setup of DEFAULT_CATEGORY_SETUP) {
    registry.registerRunner(
      setup.category,
      new ToolCategoryRunner({
        category: setup.category,
        definitions: setup.definitions,
        parallel: setup.parallel,
        estimatedTimeMs: setup.estimatedTimeMs,
        listFiles: setup.needsFiles ? listFiles : undefined,
        env: options.env,
        logger: options.logger,
      }),
    );
  }
  return registry;
}
