// Branch Types
export {
  BranchStatus,
  type Branch,
  type BranchEvaluation,
} from './branch.js';

// Search Types
export {
  SearchPhase,
  SearchEvent,
  TerminationReason,
  FailureReason,
  DEFAULT_SEARCH_CONFIG,
  searchConfigSchema,
  type SearchConfig,
  type SearchConfigInput,
  type SearchResult,
  type SearchFailure,
  type SearchOutcome,
  type SearchState,
  type SearchStatus,
} from './search.js';

// Call Types
export {
  CallKind,
  CallErrorType,
  callKey,
  type CallIdentity,
  type CallRecord,
  type CallRecordBase,
  type GeneratedChild,
  type EvaluationOutput,
} from './call.js';

// Collaborator Types
export type {
  GenerationRequest,
  EvaluationRequest,
  BranchGenerator,
  BranchEvaluator,
} from './collaborator.js';
