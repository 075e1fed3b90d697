import { z } from 'zod';
import type { Branch } from './branch.js';

// Search Phase (orchestrator state machine states)
export const SearchPhase = {
  INITIALIZING: 'initializing',
  GENERATING: 'generating',
  EVALUATING: 'evaluating',
  PRUNING: 'pruning',
  CHECKING_TERMINATION: 'checking_termination',
  FINALIZING: 'finalizing',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type SearchPhase = (typeof SearchPhase)[keyof typeof SearchPhase];

// Search Events
export const SearchEvent = {
  STARTED: 'started',
  BRANCHES_GENERATED: 'branches_generated',
  BRANCHES_EVALUATED: 'branches_evaluated',
  FRONTIER_PRUNED: 'frontier_pruned',
  DEPTH_ADVANCED: 'depth_advanced',
  TERMINATION_REACHED: 'termination_reached',
  RESULT_BUILT: 'result_built',
  FATAL_ERROR: 'fatal_error',
} as const;

export type SearchEvent = (typeof SearchEvent)[keyof typeof SearchEvent];

// Why a search stopped searching
export const TerminationReason = {
  TERMINAL_ANSWER: 'terminal-answer',
  FRONTIER_EXHAUSTED: 'frontier-exhausted',
  DEPTH_LIMIT: 'depth-limit',
} as const;

export type TerminationReason = (typeof TerminationReason)[keyof typeof TerminationReason];

// Why a search failed
export const FailureReason = {
  NO_INITIAL_BRANCHES: 'NoInitialBranches',
  NO_SCORED_BRANCHES: 'NoScoredBranches',
  SUBSTRATE_FAULT: 'SubstrateFault',
} as const;

export type FailureReason = (typeof FailureReason)[keyof typeof FailureReason];

export const DEFAULT_SEARCH_CONFIG = {
  maxDepth: 3,
  branchesPerNode: 3,
  beamWidth: 2,
  minScoreThreshold: 0.3,
} as const;

/**
 * Search configuration supplied at submission time.
 * beamWidth <= branchesPerNode is expected but not enforced.
 */
export const searchConfigSchema = z.object({
  maxDepth: z.number().int().positive().default(DEFAULT_SEARCH_CONFIG.maxDepth),
  branchesPerNode: z.number().int().positive().default(DEFAULT_SEARCH_CONFIG.branchesPerNode),
  beamWidth: z.number().int().positive().default(DEFAULT_SEARCH_CONFIG.beamWidth),
  minScoreThreshold: z.number().min(0).max(1).default(DEFAULT_SEARCH_CONFIG.minScoreThreshold),
});

export type SearchConfig = z.infer<typeof searchConfigSchema>;
export type SearchConfigInput = z.input<typeof searchConfigSchema>;

// Search Result
export interface SearchResult {
  searchId: string;
  problem: string;
  answer: string;
  score: number;
  depth: number;
  branch: Branch;
  /** Root first, winner last */
  path: Branch[];
  terminationReason: TerminationReason;
  totalBranchesExplored: number;
}

export interface SearchFailure {
  reason: FailureReason;
  message: string;
}

// What the submitter observes
export type SearchOutcome =
  | { status: 'completed'; result: SearchResult }
  | { status: 'failed'; reason: FailureReason; message: string };

// Durable state of one search
export interface SearchState {
  searchId: string;
  problem: string;
  config: SearchConfig;
  phase: SearchPhase;
  currentDepth: number;
  rootId: string | null;
  /** Every branch ever created, in generation order */
  branches: Branch[];
  /** Ids generated at the active depth, in generation order */
  candidates: string[];
  /** Surviving beam, best first */
  frontier: string[];
  bestSoFarId: string | null;
  winnerId: string | null;
  terminationReason: TerminationReason | null;
  result: SearchResult | null;
  failure: SearchFailure | null;
  totalExplored: number;
  createdAt: string;
  updatedAt: string;
}

// Search Status (for queries)
export interface SearchStatus {
  searchId: string;
  problem: string;
  phase: SearchPhase;
  currentDepth: number;
  maxDepth: number;
  frontierSize: number;
  bestScore: number | null;
  totalExplored: number;
  progress: string;
  outcome: SearchOutcome | null;
  createdAt: string;
  updatedAt: string;
}
