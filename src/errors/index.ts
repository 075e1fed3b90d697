/**
 * Error classes shared across the search engine.
 */

import type { BranchStatus } from '../types/index.js';
import type { SearchEvent, SearchPhase } from '../types/index.js';

/**
 * Error thrown when an invalid search phase transition is attempted.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly searchId: string,
    public readonly fromPhase: SearchPhase,
    public readonly event: SearchEvent,
    public readonly validEvents: SearchEvent[]
  ) {
    super(
      `Invalid transition: Cannot apply '${event}' to search ${searchId} ` +
      `in phase '${fromPhase}'. Valid events: [${validEvents.join(', ')}]`
    );
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Error thrown when a branch status would move backwards or sideways.
 */
export class InvalidBranchTransitionError extends Error {
  constructor(
    public readonly branchId: string,
    public readonly from: BranchStatus,
    public readonly to: BranchStatus
  ) {
    super(`Branch ${branchId} cannot move from '${from}' to '${to}'`);
    this.name = 'InvalidBranchTransitionError';
  }
}

export class ScoreAlreadySetError extends Error {
  constructor(public readonly branchId: string) {
    super(`Branch ${branchId} already has a score`);
    this.name = 'ScoreAlreadySetError';
  }
}

/**
 * The durable store (checkpoint or call ledger) cannot guarantee integrity.
 */
export class SubstrateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SubstrateError';
  }
}

export class CallTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Call exceeded ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
  }
}

export class CallCancelledError extends Error {
  constructor() {
    super('Call cancelled');
    this.name = 'CallCancelledError';
  }
}

/**
 * Collaborator returned output that does not match its contract.
 */
export class InvalidOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOutputError';
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: { path: string; message: string }[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class SearchNotFoundError extends Error {
  constructor(public readonly searchId: string) {
    super(`Search not found: ${searchId}`);
    this.name = 'SearchNotFoundError';
  }
}
