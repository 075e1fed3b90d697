// Kinds of collaborator call the orchestrator issues
export const CallKind = {
  GENERATE: 'generate',
  EVALUATE: 'evaluate',
} as const;

export type CallKind = (typeof CallKind)[keyof typeof CallKind];

// Error classification for the retry policy
export const CallErrorType = {
  TIMEOUT: 'timeout',
  CANCELLED: 'cancelled',
  INVALID_OUTPUT: 'invalid_output',
  COLLABORATOR_ERROR: 'collaborator_error',
  UNKNOWN: 'unknown',
} as const;

export type CallErrorType = (typeof CallErrorType)[keyof typeof CallErrorType];

/**
 * Stable identity of a collaborator call.
 * Generation calls are keyed by their parent, evaluation calls by the branch they score.
 */
export interface CallIdentity {
  searchId: string;
  depth: number;
  subjectId: string;
  kind: CallKind;
}

export interface GeneratedChild {
  id: string;
  content: string;
}

export interface EvaluationOutput {
  score: number;
  isTerminal: boolean;
  answer: string | null;
  rationale: string | null;
}

export interface CallRecordBase {
  key: string;
  searchId: string;
  depth: number;
  subjectId: string;
  attempts: number;
  committedAt: string;
}

// A committed call outcome, as stored in the call ledger
export type CallRecord =
  | (CallRecordBase & { kind: 'generate'; status: 'succeeded'; children: GeneratedChild[] })
  | (CallRecordBase & { kind: 'evaluate'; status: 'succeeded'; evaluation: EvaluationOutput })
  | (CallRecordBase & { kind: CallKind; status: 'failed'; errorType: CallErrorType; error: string });

export function callKey(identity: CallIdentity): string {
  return `${identity.searchId}:${identity.depth}:${identity.subjectId}:${identity.kind}`;
}
