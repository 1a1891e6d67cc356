import path from "node:path";
import { fileExistsSync, readTextSync } from "../utils/fs.js";

export interface RustProject {
  root: string;
  cargoTomlPath: string;
  isWorkspace: boolean;
}

export function detectRustProject(rootDir: string): RustProject | null {
  const cargoTomlPath = path.join(rootDir, "Cargo.toml");
  const manifest = readTextSync(cargoTomlPath);
  if (manifest === null) {
    return null;
  }
  return {
    root: rootDir,
    cargoTomlPath,
    isWorkspace: /^\s*\[workspace\]/m.test(manifest),
  };
}

/** Crate-level findings are pinned to the lock file when there is one, else the manifest. */
export function rustIssueFile(project: RustProject): string {
  return fileExistsSync(path.join(project.root, "Cargo.lock")) ? "Cargo.lock" : "Cargo.toml";
}
