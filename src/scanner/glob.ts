/** Index of the `]` closing the bracket expression at `start`, or -1 when it is unclosed. */
function classEnd(glob: string, start: number): number {
  let j = start + 1;
  if (glob[j] === "!" || glob[j] === "^") j += 1;
  // A `]` right after the opening bracket is a literal member.
  if (glob[j] === "]") j += 1;
  return glob.indexOf("]", j);
}

function bracketClass(body: string): string {
  const negated = body.startsWith("!") || body.startsWith("^");
  const members = (negated ? body.slice(1) : body).replace(/[\\\]^]/g, "\\$&");
  // A negated class still never crosses a directory separator.
  return negated ? `[^/${members}]` : `[${members}]`;
}

/**
 * Compiles a glob to a regular expression over repository-relative POSIX paths.
 * `**` spans directories; `*`, `?` and `[...]` classes stay inside one segment. A pattern without a
 * slash matches at any depth; a leading slash anchors it to the root.
 */
export function globToRegExp(pattern: string): RegExp {
  let glob = pattern.trim().replace(/\\/g, "/");
  let anchored = false;
  if (glob.startsWith("/")) {
    anchored = true;
    glob = glob.slice(1);
  } else if (glob.replace(/\/+$/, "").includes("/")) {
    anchored = true;
  }
  glob = glob.replace(/^\.\//, "");

  let source = "";
  for (let i = 0; i < glob.length; i += 1) {
    const char = glob[i];
    if (char === "*") {
      if (glob[i + 1] === "*") {
        const slashAfter = glob[i + 2] === "/";
        source += slashAfter ? "(?:.*/)?" : ".*";
        i += slashAfter ? 2 : 1;
      } else {
        source += "[^/]*";
      }
    } else if (char === "?") {
      source += "[^/]";
    } else if (char === "[" && classEnd(glob, i) !== -1) {
      const end = classEnd(glob, i);
      source += bracketClass(glob.slice(i + 1, end));
      i = end;
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }

  // A trailing slash names a directory; match it and everything beneath.
  if (source.endsWith("/")) {
    source = `${source.slice(0, -1)}(?:/.*)?`;
  } else {
    source = `${source}(?:/.*)?`;
  }

  return new RegExp(anchored ? `^${source}$` : `^(?:.*/)?${source}$`);
}

export interface IgnoreRule {
  regex: RegExp;
  negated: boolean;
  directoryOnly: boolean;
}

/** Parses .gitignore-style text; blank lines and comments are skipped. */
export function parseIgnoreRules(text: string): IgnoreRule[] {
  const rules: IgnoreRule[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    let negated = false;
    if (line.startsWith("!")) {
      negated = true;
      line = line.slice(1);
    }
    const directoryOnly = line.endsWith("/");
    rules.push({ regex: globToRegExp(line), negated, directoryOnly });
  }
  return rules;
}

/** Last matching rule wins, as in git. */
export function isIgnored(relPath: string, isDirectory: boolean, rules: readonly IgnoreRule[]): boolean {
  let ignored = false;
  for (const rule of rules) {
    if (rule.directoryOnly && !isDirectory) continue;
    if (rule.regex.test(relPath)) {
      ignored = !rule.negated;
    }
  }
  return ignored;
}

export function createGlobMatcher(patterns: readonly string[]): (relPath: string) => boolean {
  const compiled = patterns.filter((pattern) => pattern.trim()).map(globToRegExp);
  return (relPath) => compiled.some((regex) => regex.test(relPath));
}
