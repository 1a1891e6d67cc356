import path from "node:path";

export function toPosixPath(input: string): string {
  return input.split(path.sep).join("/");
}

export function relPosix(from: string, to: string): string {
  return toPosixPath(path.relative(from, to));
}

/** Normalizes a tool-reported path to a repository-relative POSIX path where possible. */
export function normalizeIssuePath(rootDir: string, filePath: string): string {
  if (!filePath) return "";
  const posix = filePath.replace(/\\/g, "/");
  if (path.isAbsolute(filePath)) {
    const rel = relPosix(rootDir, filePath);
    if (rel && !rel.startsWith("..")) {
      return rel;
    }
    return posix;
  }
  return posix.replace(/^(\.\/)+/, "");
}
