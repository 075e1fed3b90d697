/**
 * Branch lifecycle operations.
 * Branches are immutable; every operation returns a new record.
 */

import { BranchStatus, type Branch, type BranchEvaluation } from '../types/index.js';
import { InvalidBranchTransitionError, ScoreAlreadySetError } from '../errors/index.js';

/**
 * Allowed status moves. Nothing is ever revisited.
 */
const transitions: Record<BranchStatus, readonly BranchStatus[]> = {
  [BranchStatus.PENDING]: [BranchStatus.EVALUATED, BranchStatus.PRUNED],
  [BranchStatus.EVALUATED]: [BranchStatus.PRUNED, BranchStatus.EXPANDED, BranchStatus.TERMINAL],
  [BranchStatus.PRUNED]: [BranchStatus.TERMINAL],
  [BranchStatus.EXPANDED]: [BranchStatus.TERMINAL],
  [BranchStatus.TERMINAL]: [],
};

export interface CreateBranchOptions {
  id: string;
  parent: Branch | null;
  content: string;
  status?: BranchStatus;
}

export function createBranch(options: CreateBranchOptions): Branch {
  return {
    id: options.id,
    parentId: options.parent?.id ?? null,
    depth: options.parent ? options.parent.depth + 1 : 0,
    content: options.content,
    score: null,
    status: options.status ?? BranchStatus.PENDING,
    terminalSignal: false,
    answer: null,
    rationale: null,
    createdAt: new Date().toISOString(),
  };
}

export function canTransitionBranch(from: BranchStatus, to: BranchStatus): boolean {
  return transitions[from].includes(to);
}

export function transitionBranch(branch: Branch, to: BranchStatus): Branch {
  if (!canTransitionBranch(branch.status, to)) {
    throw new InvalidBranchTransitionError(branch.id, branch.status, to);
  }
  return { ...branch, status: to };
}

/**
 * Attach an evaluation to a pending branch and mark it evaluated.
 */
export function scoreBranch(branch: Branch, evaluation: BranchEvaluation): Branch {
  if (branch.score !== null) {
    throw new ScoreAlreadySetError(branch.id);
  }
  return {
    ...transitionBranch(branch, BranchStatus.EVALUATED),
    score: evaluation.score,
    terminalSignal: evaluation.isTerminal,
    answer: evaluation.answer ?? null,
    rationale: evaluation.rationale ?? null,
  };
}
