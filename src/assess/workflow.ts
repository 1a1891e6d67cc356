import {
  REPOSITORY_FILE,
  type AssessmentCategory,
  type CategoryResult,
  type Issue,
  type ParallelGroup,
  type WorkflowPhase,
  type WorkflowPlan,
} from "../types.js";
import { DisjointSet } from "./disjointSet.js";
import { estimateIssueTime } from "./estimates.js";
import { describePriority } from "./priorities.js";

const SENTINEL_FILES = new Set([REPOSITORY_FILE]);

function byPriorityThenName(a: CategoryResult, b: CategoryResult): number {
  return a.priority !== b.priority ? a.priority - b.priority : a.category.localeCompare(b.category);
}

function normalizeFile(file: string): string {
  let value = file.trim().replace(/\\/g, "/");
  while (value.startsWith("./")) value = value.slice(2);
  return value;
}

interface FileKey {
  key: string;
  display?: string;
}

function fileKeyFor(issue: Issue, index: number): FileKey {
  const normalized = normalizeFile(issue.file);
  if (!normalized) {
    return { key: `none:${index}` };
  }
  if (SENTINEL_FILES.has(normalized)) {
    return { key: `sentinel:${normalized}`, display: normalized };
  }
  return { key: `path:${normalized}`, display: normalized };
}

export function buildPhases(categories: Record<string, CategoryResult>): WorkflowPhase[] {
  const byPriority = new Map<number, CategoryResult[]>();
  for (const result of Object.values(categories)) {
    if (result.issueCount === 0) continue;
    const members = byPriority.get(result.priority) ?? [];
    members.push(result);
    byPriority.set(result.priority, members);
  }

  return Array.from(byPriority.entries())
    .sort(([a], [b]) => a - b)
    .map(([priority, members]) => {
      members.sort(byPriorityThenName);
      return {
        name: `Phase ${priority}`,
        description: describePriority(priority),
        priority,
        categories: members.map((member) => member.category),
        estimatedTimeMs: members.reduce((sum, member) => sum + member.estimatedTimeMs, 0),
        parallelGroups: [],
      };
    });
}

/** Issues sharing a file, directly or through a chain of files, land in one group. */
export function buildParallelGroups(categories: Record<string, CategoryResult>): ParallelGroup[] {
  const issues = Object.values(categories)
    .sort(byPriorityThenName)
    .flatMap((result) => result.issues);

  const keys = issues.map((issue, index) => fileKeyFor(issue, index));
  const sets = new DisjointSet(issues.length);
  const firstIssueForKey = new Map<string, number>();
  keys.forEach(({ key }, index) => {
    const first = firstIssueForKey.get(key);
    if (first === undefined) {
      firstIssueForKey.set(key, index);
    } else {
      sets.union(first, index);
    }
  });

  interface Draft {
    files: Set<string>;
    categories: Set<AssessmentCategory>;
    issueCount: number;
    estimatedTimeMs: number;
  }
  const drafts = new Map<number, Draft>();
  issues.forEach((issue, index) => {
    const root = sets.find(index);
    let draft = drafts.get(root);
    if (!draft) {
      draft = { files: new Set(), categories: new Set(), issueCount: 0, estimatedTimeMs: 0 };
      drafts.set(root, draft);
    }
    const display = keys[index].display;
    if (display) draft.files.add(display);
    draft.categories.add(issue.category);
    draft.issueCount += 1;
    draft.estimatedTimeMs += estimateIssueTime(issue);
  });

  return Array.from(drafts.values()).map((draft, index) => {
    const files = Array.from(draft.files);
    return {
      name: `group_${index + 1}`,
      description: `${draft.issueCount} issue(s) across ${files.length} file(s)`,
      files,
      categories: Array.from(draft.categories),
      issueCount: draft.issueCount,
      estimatedTimeMs: draft.estimatedTimeMs,
    };
  });
}

export function generateWorkflow(categories: Record<string, CategoryResult>): WorkflowPlan {
  const phases = buildPhases(categories);
  const parallelGroups = buildParallelGroups(categories);

  for (const phase of phases) {
    const members = new Set<AssessmentCategory>(phase.categories);
    phase.parallelGroups = parallelGroups
      .filter((group) => group.categories.some((category) => members.has(category)))
      .map((group) => group.name);
  }

  return {
    phases,
    parallelGroups,
    // Phases run one after another; groups inside a phase overlap, so only phases add up.
    totalTimeMs: phases.reduce((sum, phase) => sum + phase.estimatedTimeMs, 0),
  };
}
