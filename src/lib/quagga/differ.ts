import type { ConfigTree, ContextPath } from "./context-tree.js";

/**
 * One delta. `line: null` targets the whole context at `path`.
 */
export interface DiffEntry {
  path: ContextPath;
  line: string | null;
}

export interface ConfigDiff {
  toDelete: DiffEntry[];
  toAdd: DiffEntry[];
}

const GLOBAL_CONTEXT: ContextPath = [];

/**
 * Lines and contexts to remove from `running` so that nothing is left that
 * `desired` does not have.
 */
export function computeDeletions(desired: ConfigTree, running: ConfigTree): DiffEntry[] {
  const toDelete: DiffEntry[] = [];

  for (const ctx of running) {
    if (desired.has(ctx.path)) continue;

    if (ctx.path.length === 0) {
      for (const line of ctx.lines) {
        toDelete.push({ path: GLOBAL_CONTEXT, line });
      }
    } else if (ctx.singleLine) {
      // "no ip forwarding" is a statement in the global context
      toDelete.push({ path: GLOBAL_CONTEXT, line: ctx.path[0] });
    } else {
      toDelete.push({ path: ctx.path, line: null });
    }
  }

  for (const ctx of desired) {
    const current = running.get(ctx.path);
    if (!current) continue;

    for (const line of current.lines) {
      if (!ctx.has(line)) {
        toDelete.push({ path: ctx.path, line });
      }
    }
  }

  return toDelete;
}

/**
 * Lines and contexts to create in `running` so that it holds everything in `desired`.
 */
export function computeAdditions(desired: ConfigTree, running: ConfigTree): DiffEntry[] {
  const toAdd: DiffEntry[] = [];

  for (const ctx of desired) {
    const current = running.get(ctx.path);
    if (!current) continue;

    for (const line of ctx.lines) {
      if (!current.has(line)) {
        toAdd.push({ path: ctx.path, line });
      }
    }
  }

  for (const ctx of desired) {
    if (running.has(ctx.path)) continue;

    toAdd.push({ path: ctx.path, line: null });
    for (const line of ctx.lines) {
      toAdd.push({ path: ctx.path, line });
    }
  }

  return toAdd;
}

/**
 * Diff two trees. Deletions are computed first and must be applied first:
 * adding a line before its predecessor is gone can leave two values for a
 * statement that only takes one.
 */
export function diffConfigs(desired: ConfigTree, running: ConfigTree): ConfigDiff {
  const toDelete = computeDeletions(desired, running);
  const toAdd = computeAdditions(desired, running);
  return { toDelete, toAdd };
}

export function isEmptyDiff(diff: ConfigDiff): boolean {
  return diff.toDelete.length === 0 && diff.toAdd.length === 0;
}
