import type { Branch } from '../types/index.js';

/** Separator between reasoning steps when a chain is rendered */
export const STEP_SEPARATOR = '\n\n→ ';

export function indexBranches(branches: readonly Branch[]): Map<string, Branch> {
  return new Map(branches.map((b) => [b.id, b]));
}

/**
 * Walk parentId links back to the root.
 * Returns the chain root first. Stops at a missing parent or a cycle.
 */
export function ancestorPath(branch: Branch, index: ReadonlyMap<string, Branch>): Branch[] {
  const path: Branch[] = [branch];
  const seen = new Set<string>([branch.id]);
  let current = branch;

  while (current.parentId !== null) {
    const parent = index.get(current.parentId);
    if (!parent || seen.has(parent.id)) {
      break;
    }
    path.push(parent);
    seen.add(parent.id);
    current = parent;
  }

  return path.reverse();
}

/**
 * Render the reasoning chain below the root (the root holds the problem itself).
 */
export function renderReasoning(path: readonly Branch[]): string {
  return path
    .filter((b) => b.parentId !== null)
    .map((b) => b.content)
    .join(STEP_SEPARATOR);
}
