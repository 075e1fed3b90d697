import type { BranchEvaluation } from './branch.js';

// Input to a generation call
export interface GenerationRequest {
  problem: string;
  /** Rendered reasoning chain of the parent; the problem itself for the root */
  parentContent: string;
  /** Desired number of child steps */
  count: number;
  isRoot: boolean;
}

// Input to an evaluation call
export interface EvaluationRequest {
  problem: string;
  /** Rendered reasoning chain down to the branch being scored */
  branchContent: string;
}

/**
 * Proposes candidate next reasoning steps.
 * May return fewer (or more) than requested; blank entries are ignored.
 */
export interface BranchGenerator {
  generate(request: GenerationRequest, signal: AbortSignal): Promise<string[]>;
}

/**
 * Scores a reasoning chain in [0, 1] and flags complete answers.
 */
export interface BranchEvaluator {
  evaluate(request: EvaluationRequest, signal: AbortSignal): Promise<BranchEvaluation>;
}
