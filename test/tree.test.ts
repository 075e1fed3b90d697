/**
 * Branch Tree Tests
 * Branch lifecycle, pruning and reasoning paths
 */

import { describe, it, expect } from 'vitest';
import { BranchStatus, type Branch } from '../src/types/index.js';
import {
  canTransitionBranch,
  createBranch,
  scoreBranch,
  transitionBranch,
} from '../src/tree/branch.js';
import { prune } from '../src/tree/pruner.js';
import { ancestorPath, indexBranches, renderReasoning } from '../src/tree/path.js';
import { InvalidBranchTransitionError, ScoreAlreadySetError } from '../src/errors/index.js';

function scored(id: string, score: number | null, parent: Branch | null = null): Branch {
  const branch = createBranch({ id, parent, content: id });
  return score === null ? branch : scoreBranch(branch, { score, isTerminal: false });
}

describe('Branch', () => {
  describe('createBranch()', () => {
    it('should create a root at depth 0', () => {
      const root = createBranch({ id: 'root', parent: null, content: 'problem', status: BranchStatus.EXPANDED });

      expect(root.parentId).toBeNull();
      expect(root.depth).toBe(0);
      expect(root.status).toBe('expanded');
      expect(root.score).toBeNull();
    });

    it('should place a child one level below its parent', () => {
      const root = createBranch({ id: 'root', parent: null, content: 'problem' });
      const child = createBranch({ id: 'c1', parent: root, content: 'step' });
      const grandchild = createBranch({ id: 'c2', parent: child, content: 'next' });

      expect(child.parentId).toBe('root');
      expect(child.depth).toBe(1);
      expect(child.status).toBe('pending');
      expect(grandchild.depth).toBe(2);
    });
  });

  describe('scoreBranch()', () => {
    it('should record the evaluation and mark the branch evaluated', () => {
      const branch = createBranch({ id: 'b', parent: null, content: 'x' });
      const result = scoreBranch(branch, { score: 0.8, isTerminal: true, answer: '42', rationale: 'checks out' });

      expect(result.status).toBe('evaluated');
      expect(result.score).toBe(0.8);
      expect(result.terminalSignal).toBe(true);
      expect(result.answer).toBe('42');
      expect(result.rationale).toBe('checks out');
      expect(branch.score).toBeNull();
    });

    it('should refuse to score a branch twice', () => {
      const branch = scored('b', 0.5);

      expect(() => scoreBranch(branch, { score: 0.9, isTerminal: false })).toThrow(ScoreAlreadySetError);
    });
  });

  describe('transitionBranch()', () => {
    it('should allow forward moves', () => {
      expect(canTransitionBranch(BranchStatus.PENDING, BranchStatus.PRUNED)).toBe(true);
      expect(canTransitionBranch(BranchStatus.EVALUATED, BranchStatus.EXPANDED)).toBe(true);
      expect(canTransitionBranch(BranchStatus.PRUNED, BranchStatus.TERMINAL)).toBe(true);
    });

    it('should reject backward moves', () => {
      const pruned = transitionBranch(scored('b', 0.1), BranchStatus.PRUNED);

      expect(canTransitionBranch(BranchStatus.EXPANDED, BranchStatus.EVALUATED)).toBe(false);
      expect(() => transitionBranch(pruned, BranchStatus.EVALUATED)).toThrow(InvalidBranchTransitionError);
      expect(() => transitionBranch(pruned, BranchStatus.PENDING)).toThrow(
        "Branch b cannot move from 'pruned' to 'pending'"
      );
    });

    it('should not change the original record', () => {
      const branch = scored('b', 0.4);
      const expanded = transitionBranch(branch, BranchStatus.EXPANDED);

      expect(expanded.status).toBe('expanded');
      expect(branch.status).toBe('evaluated');
    });
  });
});

describe('prune()', () => {
  it('should keep the highest scores up to the beam width', () => {
    const branches = [scored('a', 0.4), scored('b', 0.9), scored('c', 0.6)];

    expect(prune(branches, 2, 0).map((b) => b.id)).toEqual(['b', 'c']);
  });

  it('should drop branches below the threshold', () => {
    const branches = [scored('a', 0.29), scored('b', 0.3), scored('c', 0.1)];

    expect(prune(branches, 5, 0.3).map((b) => b.id)).toEqual(['b']);
  });

  it('should keep generation order on equal scores', () => {
    const branches = [scored('a', 0.5), scored('b', 0.7), scored('c', 0.5), scored('d', 0.5)];

    expect(prune(branches, 3, 0).map((b) => b.id)).toEqual(['b', 'a', 'c']);
  });

  it('should never keep unscored branches', () => {
    const branches = [scored('a', null), scored('b', 0)];

    expect(prune(branches, 2, 0).map((b) => b.id)).toEqual(['b']);
  });

  it('should return nothing for an empty input or a zero beam', () => {
    expect(prune([], 3, 0)).toEqual([]);
    expect(prune([scored('a', 1)], 0, 0)).toEqual([]);
  });

  it('should not reorder the input', () => {
    const branches = [scored('a', 0.1), scored('b', 0.9)];
    prune(branches, 2, 0);

    expect(branches.map((b) => b.id)).toEqual(['a', 'b']);
  });
});

describe('Reasoning path', () => {
  const root = createBranch({ id: 'r', parent: null, content: 'What is 6 x 7?', status: BranchStatus.EXPANDED });
  const first = createBranch({ id: 'x', parent: root, content: 'Multiply 6 by 7' });
  const second = createBranch({ id: 'y', parent: first, content: 'That gives 42' });
  const index = indexBranches([root, first, second]);

  it('should walk back to the root, root first', () => {
    expect(ancestorPath(second, index).map((b) => b.id)).toEqual(['r', 'x', 'y']);
  });

  it('should render the steps below the root', () => {
    expect(renderReasoning(ancestorPath(second, index))).toBe('Multiply 6 by 7\n\n→ That gives 42');
    expect(renderReasoning([root])).toBe('');
  });

  it('should stop at a missing parent', () => {
    const orphan = createBranch({ id: 'z', parent: second, content: 'lost' });

    expect(ancestorPath(orphan, indexBranches([orphan])).map((b) => b.id)).toEqual(['z']);
  });
});
