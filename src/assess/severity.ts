import { SEVERITIES, type Severity } from "../types.js";

const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export function severityRank(severity: Severity): number {
  return SEVERITY_RANK[severity];
}

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function isAtLeast(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

export function parseSeverity(value: string): Severity | null {
  const normalized = value.trim().toLowerCase();
  return isSeverity(normalized) ? normalized : null;
}

/** Tool vocabulary (case-insensitive) to canonical severity. */
export type SeverityTable = Readonly<Record<string, Severity>>;

export interface SeverityMapper {
  (toolSeverity: string | undefined | null): Severity;
  readonly table: SeverityTable;
}

/**
 * Builds the lookup an adapter uses for its tool's severity strings.
 * Anything not in the table becomes `medium`.
 */
export function createSeverityMapper(table: SeverityTable, fallback: Severity = "medium"): SeverityMapper {
  // A Map, so tool words such as "constructor" never resolve to Object.prototype members.
  const normalized = new Map<string, Severity>();
  for (const [key, value] of Object.entries(table)) {
    normalized.set(key.trim().toLowerCase(), value);
  }
  const mapper = (toolSeverity: string | undefined | null): Severity => {
    if (!toolSeverity) return fallback;
    return normalized.get(toolSeverity.trim().toLowerCase()) ?? fallback;
  };
  return Object.assign(mapper, { table: Object.freeze(Object.fromEntries(normalized)) });
}
