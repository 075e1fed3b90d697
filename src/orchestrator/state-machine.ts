/**
 * State machine for search execution.
 * Manages phase transitions for the generate-evaluate-prune loop.
 */

import { SearchPhase, SearchEvent, type SearchState } from '../types/index.js';
import { InvalidTransitionError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('state-machine');

/**
 * State transition table.
 * Maps (current phase, event) -> next phase
 */
const transitions: Record<SearchPhase, Partial<Record<SearchEvent, SearchPhase>>> = {
  [SearchPhase.INITIALIZING]: {
    [SearchEvent.STARTED]: SearchPhase.GENERATING,
    [SearchEvent.FATAL_ERROR]: SearchPhase.FAILED,
  },
  [SearchPhase.GENERATING]: {
    [SearchEvent.BRANCHES_GENERATED]: SearchPhase.EVALUATING,
    [SearchEvent.FATAL_ERROR]: SearchPhase.FAILED,
  },
  [SearchPhase.EVALUATING]: {
    [SearchEvent.BRANCHES_EVALUATED]: SearchPhase.PRUNING,
    [SearchEvent.FATAL_ERROR]: SearchPhase.FAILED,
  },
  [SearchPhase.PRUNING]: {
    [SearchEvent.FRONTIER_PRUNED]: SearchPhase.CHECKING_TERMINATION,
    [SearchEvent.FATAL_ERROR]: SearchPhase.FAILED,
  },
  [SearchPhase.CHECKING_TERMINATION]: {
    [SearchEvent.DEPTH_ADVANCED]: SearchPhase.GENERATING,
    [SearchEvent.TERMINATION_REACHED]: SearchPhase.FINALIZING,
    [SearchEvent.FATAL_ERROR]: SearchPhase.FAILED,
  },
  [SearchPhase.FINALIZING]: {
    [SearchEvent.RESULT_BUILT]: SearchPhase.COMPLETED,
    [SearchEvent.FATAL_ERROR]: SearchPhase.FAILED,
  },
  // Terminal phases - no transitions out
  [SearchPhase.COMPLETED]: {},
  [SearchPhase.FAILED]: {},
};

/**
 * Check if a phase is terminal (no more transitions possible).
 */
export function isTerminalPhase(phase: SearchPhase): boolean {
  return phase === SearchPhase.COMPLETED || phase === SearchPhase.FAILED;
}

export function canTransition(currentPhase: SearchPhase, event: SearchEvent): boolean {
  return transitions[currentPhase][event] !== undefined;
}

/**
 * Get the next phase for a given transition.
 * Returns null if the transition is invalid.
 */
export function getNextPhase(currentPhase: SearchPhase, event: SearchEvent): SearchPhase | null {
  return transitions[currentPhase][event] ?? null;
}

/**
 * Apply a phase transition to a search.
 * Returns the updated state or throws if the transition is invalid.
 */
export function applyTransition(state: SearchState, event: SearchEvent): SearchState {
  const nextPhase = getNextPhase(state.phase, event);

  if (nextPhase === null) {
    const validEvents = Object.keys(transitions[state.phase]).filter(
      (e): e is SearchEvent => (Object.values(SearchEvent) as string[]).includes(e)
    );
    log.error({ searchId: state.searchId, currentPhase: state.phase, event }, 'Invalid transition');
    throw new InvalidTransitionError(state.searchId, state.phase, event, validEvents);
  }

  log.debug(
    {
      searchId: state.searchId,
      from: state.phase,
      event,
      to: nextPhase,
      depth: state.currentDepth,
    },
    'Phase transition'
  );

  return {
    ...state,
    phase: nextPhase,
    updatedAt: new Date().toISOString(),
  };
}

/**
 * Get human-readable progress description.
 */
export function getProgressDescription(state: SearchState): string {
  const depth = `depth ${state.currentDepth}/${state.config.maxDepth}`;
  switch (state.phase) {
    case SearchPhase.INITIALIZING:
      return 'Preparing search';
    case SearchPhase.GENERATING:
      return `Generating branches (${depth})`;
    case SearchPhase.EVALUATING:
      return `Evaluating ${state.candidates.length} branches (${depth})`;
    case SearchPhase.PRUNING:
      return `Pruning to beam width ${state.config.beamWidth} (${depth})`;
    case SearchPhase.CHECKING_TERMINATION:
      return `Checking termination (${depth})`;
    case SearchPhase.FINALIZING:
      return 'Building result';
    case SearchPhase.COMPLETED:
      return `Completed (${state.terminationReason ?? 'unknown'})`;
    case SearchPhase.FAILED:
      return `Failed: ${state.failure?.reason ?? 'Unknown error'}`;
    default:
      return 'Unknown phase';
  }
}
