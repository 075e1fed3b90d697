// Branch Status (forward-only lifecycle)
export const BranchStatus = {
  PENDING: 'pending',
  EVALUATED: 'evaluated',
  PRUNED: 'pruned',
  EXPANDED: 'expanded',
  TERMINAL: 'terminal',
} as const;

export type BranchStatus = (typeof BranchStatus)[keyof typeof BranchStatus];

// Branch
export interface Branch {
  readonly id: string;
  readonly parentId: string | null;
  readonly depth: number;
  readonly content: string;
  readonly score: number | null;
  readonly status: BranchStatus;
  /** Set when the evaluator reported a complete, final answer */
  readonly terminalSignal: boolean;
  readonly answer: string | null;
  readonly rationale: string | null;
  readonly createdAt: string;
}

// Evaluation applied to a pending branch
export interface BranchEvaluation {
  score: number;
  isTerminal: boolean;
  answer?: string | null;
  rationale?: string | null;
}
