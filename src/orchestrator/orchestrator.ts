/**
 * Search Orchestrator.
 * Drives one beam search through its phases, checkpointing after every
 * transition and committing every collaborator call to the ledger before
 * its result is used.
 */

import { nanoid } from 'nanoid';
import { z } from 'zod';
import {
  BranchStatus,
  CallKind,
  FailureReason,
  SearchEvent,
  SearchPhase,
  TerminationReason,
  callKey,
  type Branch,
  type BranchEvaluator,
  type BranchGenerator,
  CallErrorType,
  type CallIdentity,
  type CallRecord,
  type CallRecordBase,
  type EvaluationOutput,
  type GeneratedChild,
  type SearchConfig,
  type SearchOutcome,
  type SearchResult,
  type SearchState,
} from '../types/index.js';
import { SubstrateError } from '../errors/index.js';
import { ancestorPath, indexBranches, renderReasoning } from '../tree/path.js';
import { createBranch, scoreBranch, transitionBranch } from '../tree/branch.js';
import { prune } from '../tree/pruner.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { awaitBarrier, type BarrierOutcome } from './barrier.js';
import { CallExecutor, type CallOutcome } from './call-executor.js';
import type { CallLedger } from './call-ledger.js';
import type { CheckpointStore } from './search-store.js';
import { applyTransition, isTerminalPhase } from './state-machine.js';

const log = createLogger('orchestrator');

const generationOutputSchema = z.array(z.string());

const evaluationOutputSchema = z.object({
  score: z.number().min(0).max(1),
  isTerminal: z.boolean(),
  answer: z.string().nullish(),
  rationale: z.string().nullish(),
});

/**
 * Normalize raw generator output: trimmed, blanks dropped, at most `count`.
 */
export function normalizeGeneration(output: unknown, count: number): string[] {
  return generationOutputSchema
    .parse(output)
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .slice(0, count);
}

export function normalizeEvaluation(output: unknown): EvaluationOutput {
  const parsed = evaluationOutputSchema.parse(output);
  return {
    score: parsed.score,
    isTerminal: parsed.isTerminal,
    answer: parsed.answer ?? null,
    rationale: parsed.rationale ?? null,
  };
}

type Serial = (work: () => Promise<void>) => Promise<void>;

/**
 * Run async work one item at a time, in the order it was queued.
 */
function serialize(): Serial & { drain: () => Promise<void> } {
  let tail: Promise<void> = Promise.resolve();
  const run = (work: () => Promise<void>): Promise<void> => {
    const next = tail.then(work);
    // Failures reach the caller through `next`; the queue itself keeps going
    tail = next.catch(() => undefined);
    return next;
  };
  return Object.assign(run, { drain: () => tail });
}

/**
 * Wait for commits still queued when the barrier closed, then surface the
 * first task that failed to commit.
 */
async function settleCommits<T>(
  outcomes: readonly BarrierOutcome<T>[],
  commit: { drain: () => Promise<void> }
): Promise<void> {
  await commit.drain();
  for (const outcome of outcomes) {
    if (outcome.status === 'rejected') {
      throw outcome.error;
    }
  }
}

/**
 * The outcome of a search in a terminal phase, or null while it is still running.
 */
export function toOutcome(state: SearchState): SearchOutcome | null {
  if (state.phase === SearchPhase.COMPLETED && state.result) {
    return { status: 'completed', result: state.result };
  }
  if (state.phase === SearchPhase.FAILED && state.failure) {
    return { status: 'failed', reason: state.failure.reason, message: state.failure.message };
  }
  return null;
}

function requireBranch(index: ReadonlyMap<string, Branch>, id: string): Branch {
  const branch = index.get(id);
  if (!branch) {
    throw new SubstrateError(`Checkpoint references unknown branch ${id}`);
  }
  return branch;
}

function replaceBranches(branches: readonly Branch[], updates: ReadonlyMap<string, Branch>): Branch[] {
  return branches.map((b) => updates.get(b.id) ?? b);
}

export interface SearchOrchestratorOptions {
  generator: BranchGenerator;
  evaluator: BranchEvaluator;
  checkpoints: CheckpointStore;
  ledger: CallLedger;
  executor?: CallExecutor;
  /** Source of search and branch ids */
  idGenerator?: () => string;
}

export class SearchOrchestrator {
  private readonly generator: BranchGenerator;
  private readonly evaluator: BranchEvaluator;
  private readonly checkpoints: CheckpointStore;
  private readonly ledger: CallLedger;
  private readonly executor: CallExecutor;
  private readonly idGenerator: () => string;

  constructor(options: SearchOrchestratorOptions) {
    this.generator = options.generator;
    this.evaluator = options.evaluator;
    this.checkpoints = options.checkpoints;
    this.ledger = options.ledger;
    this.executor = options.executor ?? new CallExecutor();
    this.idGenerator = options.idGenerator ?? (() => nanoid());
  }

  /**
   * Build the initial (not yet persisted) state of a search.
   */
  createState(problem: string, config: SearchConfig, searchId: string = this.idGenerator()): SearchState {
    const now = new Date().toISOString();
    return {
      searchId,
      problem,
      config,
      phase: SearchPhase.INITIALIZING,
      currentDepth: 0,
      rootId: null,
      branches: [],
      candidates: [],
      frontier: [],
      bestSoFarId: null,
      winnerId: null,
      terminationReason: null,
      result: null,
      failure: null,
      totalExplored: 0,
      createdAt: now,
      updatedAt: now,
    };
  }

  /**
   * Run a search from whatever phase its state is in until it completes or fails.
   * Never throws: every failure is reported as a failed outcome.
   */
  async run(initial: SearchState): Promise<SearchOutcome> {
    let state = initial;
    const existing = toOutcome(state);
    if (existing) {
      return existing;
    }

    log.info(
      {
        searchId: state.searchId,
        phase: state.phase,
        depth: state.currentDepth,
        config: state.config,
      },
      state.phase === SearchPhase.INITIALIZING ? 'Starting search' : 'Resuming search'
    );

    try {
      const records = await this.ledger.load(state.searchId);

      while (!isTerminalPhase(state.phase)) {
        state = await this.step(state, records);
        await this.checkpoints.save(state);
      }
    } catch (error) {
      log.error({ searchId: state.searchId, phase: state.phase, error: errorMessage(error) }, 'Search aborted');
      state = await this.failOnFault(state, errorMessage(error));
    }

    const outcome = toOutcome(state);
    if (!outcome) {
      return {
        status: 'failed',
        reason: FailureReason.SUBSTRATE_FAULT,
        message: 'Search stopped without an outcome',
      };
    }

    if (outcome.status === 'completed') {
      log.info(
        {
          searchId: state.searchId,
          score: outcome.result.score,
          depth: outcome.result.depth,
          reason: outcome.result.terminationReason,
          explored: outcome.result.totalBranchesExplored,
        },
        'Search completed'
      );
    } else {
      log.warn({ searchId: state.searchId, reason: outcome.reason, message: outcome.message }, 'Search failed');
    }

    return outcome;
  }

  private step(state: SearchState, records: Map<string, CallRecord>): Promise<SearchState> | SearchState {
    switch (state.phase) {
      case SearchPhase.INITIALIZING:
        return this.initialize(state);
      case SearchPhase.GENERATING:
        return this.generate(state, records);
      case SearchPhase.EVALUATING:
        return this.evaluate(state, records);
      case SearchPhase.PRUNING:
        return this.pruneFrontier(state);
      case SearchPhase.CHECKING_TERMINATION:
        return this.checkTermination(state);
      case SearchPhase.FINALIZING:
        return this.finalize(state);
      default:
        throw new SubstrateError(`Cannot step a search in phase '${state.phase}'`);
    }
  }

  private initialize(state: SearchState): SearchState {
    const root = createBranch({
      id: this.idGenerator(),
      parent: null,
      content: state.problem,
      status: BranchStatus.EXPANDED,
    });

    return applyTransition(
      {
        ...state,
        rootId: root.id,
        branches: [root],
        frontier: [root.id],
        currentDepth: 1,
      },
      SearchEvent.STARTED
    );
  }

  private async generate(state: SearchState, records: Map<string, CallRecord>): Promise<SearchState> {
    const { searchId, currentDepth: depth, config } = state;
    const index = indexBranches(state.branches);
    const parents = state.frontier.map((id) => requireBranch(index, id));

    const identityOf = (parent: Branch): CallIdentity => ({
      searchId,
      depth,
      subjectId: parent.id,
      kind: CallKind.GENERATE,
    });

    const live = parents.filter((p) => !records.has(callKey(identityOf(p))));
    log.debug(
      { searchId, depth, parents: parents.length, replayed: parents.length - live.length },
      'Generating branches'
    );

    const commit = serialize();
    const outcomes = await awaitBarrier(
      live.map((parent) => async (signal: AbortSignal) => {
        const call = await this.executor.execute(
          async (callSignal) =>
            normalizeGeneration(
              await this.generator.generate(
                {
                  problem: state.problem,
                  parentContent:
                    parent.parentId === null
                      ? state.problem
                      : renderReasoning(ancestorPath(parent, index)),
                  count: config.branchesPerNode,
                  isRoot: parent.parentId === null,
                },
                callSignal
              ),
              config.branchesPerNode
            ),
          { signal, context: { searchId, depth, parentId: parent.id, kind: CallKind.GENERATE } }
        );
        await this.commitOutcome(records, identityOf(parent), call, signal, commit, (base, value) => ({
          ...base,
          kind: CallKind.GENERATE,
          status: 'succeeded',
          children: value.map((content): GeneratedChild => ({ id: this.idGenerator(), content })),
        }));
        return call;
      }),
      { name: `generate:${depth}` }
    );
    await settleCommits(outcomes, commit);

    const updates = new Map<string, Branch>();
    const children: Branch[] = [];
    for (const parent of parents) {
      const record = records.get(callKey(identityOf(parent)));
      if (record?.status === 'succeeded' && record.kind === 'generate') {
        for (const child of record.children) {
          children.push(createBranch({ id: child.id, parent, content: child.content }));
        }
      } else if (record?.status === 'failed') {
        log.warn(
          { searchId, depth, parentId: parent.id, error: record.error },
          'Generation failed; parent yields no children'
        );
      }
      if (parent.status !== BranchStatus.EXPANDED) {
        updates.set(parent.id, transitionBranch(parent, BranchStatus.EXPANDED));
      }
    }

    if (children.length === 0 && depth === 1) {
      return this.fail(state, FailureReason.NO_INITIAL_BRANCHES, 'Generator produced no initial branches');
    }

    return applyTransition(
      {
        ...state,
        branches: [...replaceBranches(state.branches, updates), ...children],
        candidates: children.map((c) => c.id),
        totalExplored: state.totalExplored + children.length,
      },
      SearchEvent.BRANCHES_GENERATED
    );
  }

  private async evaluate(state: SearchState, records: Map<string, CallRecord>): Promise<SearchState> {
    const { searchId, currentDepth: depth } = state;
    const index = indexBranches(state.branches);
    const candidates = state.candidates
      .map((id) => requireBranch(index, id))
      .filter((b) => b.status === BranchStatus.PENDING);

    const identityOf = (branch: Branch): CallIdentity => ({
      searchId,
      depth,
      subjectId: branch.id,
      kind: CallKind.EVALUATE,
    });

    const replayedTerminal = candidates.some((b) => {
      const record = records.get(callKey(identityOf(b)));
      return record?.status === 'succeeded' && record.kind === 'evaluate' && record.evaluation.isTerminal;
    });
    const live = replayedTerminal
      ? []
      : candidates.filter((b) => !records.has(callKey(identityOf(b))));

    log.debug(
      { searchId, depth, candidates: candidates.length, live: live.length, replayedTerminal },
      'Evaluating branches'
    );

    const commit = serialize();
    const outcomes = await awaitBarrier(
      live.map((branch) => async (signal: AbortSignal) => {
        const call = await this.executor.execute(
          async (callSignal) =>
            normalizeEvaluation(
              await this.evaluator.evaluate(
                {
                  problem: state.problem,
                  branchContent: renderReasoning(ancestorPath(branch, index)),
                },
                callSignal
              )
            ),
          { signal, context: { searchId, depth, branchId: branch.id, kind: CallKind.EVALUATE } }
        );
        await this.commitOutcome(records, identityOf(branch), call, signal, commit, (base, evaluation) => ({
          ...base,
          kind: CallKind.EVALUATE,
          status: 'succeeded',
          evaluation,
        }));
        return call;
      }),
      {
        name: `evaluate:${depth}`,
        stopWhen: (outcome) => outcome.ok && outcome.value.isTerminal,
      }
    );
    await settleCommits(outcomes, commit);

    const updates = new Map<string, Branch>();
    let dropped = 0;
    for (const branch of candidates) {
      const record = records.get(callKey(identityOf(branch)));
      if (record?.status === 'succeeded' && record.kind === 'evaluate') {
        updates.set(branch.id, scoreBranch(branch, record.evaluation));
      } else {
        // Failed permanently, or abandoned after a terminal answer
        updates.set(branch.id, transitionBranch(branch, BranchStatus.PRUNED));
        dropped++;
      }
    }

    if (dropped > 0) {
      log.info({ searchId, depth, dropped }, 'Candidates dropped without a score');
    }

    return applyTransition(
      { ...state, branches: replaceBranches(state.branches, updates) },
      SearchEvent.BRANCHES_EVALUATED
    );
  }

  /**
   * Commit one call as soon as it settles, through the depth's serial queue.
   * Cancelled calls, and calls whose barrier already closed, are never
   * committed, so a replay issues them again.
   */
  private async commitOutcome<T>(
    records: Map<string, CallRecord>,
    identity: CallIdentity,
    call: CallOutcome<T>,
    signal: AbortSignal,
    commit: Serial,
    toRecord: (base: CallRecordBase, value: T) => CallRecord
  ): Promise<void> {
    if (signal.aborted || (!call.ok && call.errorType === CallErrorType.CANCELLED)) {
      return;
    }

    const key = callKey(identity);
    await commit(async () => {
      if (records.has(key)) {
        return;
      }
      const base: CallRecordBase = {
        key,
        searchId: identity.searchId,
        depth: identity.depth,
        subjectId: identity.subjectId,
        attempts: call.attempts,
        committedAt: new Date().toISOString(),
      };
      const record: CallRecord = call.ok
        ? toRecord(base, call.value)
        : { ...base, kind: identity.kind, status: 'failed', errorType: call.errorType, error: call.error };

      await this.ledger.commit(record);
      records.set(key, record);
    });
  }

  private pruneFrontier(state: SearchState): SearchState {
    const { config } = state;
    const index = indexBranches(state.branches);
    const evaluated = state.candidates
      .map((id) => requireBranch(index, id))
      .filter((b) => b.status === BranchStatus.EVALUATED);

    const survivors = prune(evaluated, config.beamWidth, config.minScoreThreshold);
    const survivorIds = new Set(survivors.map((b) => b.id));

    const updates = new Map<string, Branch>();
    for (const branch of evaluated) {
      if (!survivorIds.has(branch.id)) {
        updates.set(branch.id, transitionBranch(branch, BranchStatus.PRUNED));
      }
    }

    let best = state.bestSoFarId ? requireBranch(index, state.bestSoFarId) : null;
    for (const branch of evaluated) {
      if (branch.score !== null && (best?.score == null || branch.score > best.score)) {
        best = branch;
      }
    }

    log.debug(
      {
        searchId: state.searchId,
        depth: state.currentDepth,
        evaluated: evaluated.length,
        kept: survivors.length,
        bestScore: best?.score ?? null,
      },
      'Frontier pruned'
    );

    return applyTransition(
      {
        ...state,
        branches: replaceBranches(state.branches, updates),
        frontier: survivors.map((b) => b.id),
        bestSoFarId: best?.id ?? null,
      },
      SearchEvent.FRONTIER_PRUNED
    );
  }

  private checkTermination(state: SearchState): SearchState {
    const index = indexBranches(state.branches);

    let terminal: Branch | null = null;
    for (const id of state.candidates) {
      const branch = requireBranch(index, id);
      if (!branch.terminalSignal || branch.score === null) {
        continue;
      }
      if (terminal?.score == null || branch.score > terminal.score) {
        terminal = branch;
      }
    }

    const stop = (winnerId: string, reason: TerminationReason): SearchState => {
      log.info({ searchId: state.searchId, depth: state.currentDepth, winnerId, reason }, 'Search terminating');
      return applyTransition(
        { ...state, winnerId, terminationReason: reason },
        SearchEvent.TERMINATION_REACHED
      );
    };

    if (terminal) {
      return stop(terminal.id, TerminationReason.TERMINAL_ANSWER);
    }

    const [head] = state.frontier;
    if (head === undefined) {
      if (state.bestSoFarId === null) {
        return this.fail(state, FailureReason.NO_SCORED_BRANCHES, 'No branch was ever scored');
      }
      return stop(state.bestSoFarId, TerminationReason.FRONTIER_EXHAUSTED);
    }

    if (state.currentDepth >= state.config.maxDepth) {
      return stop(head, TerminationReason.DEPTH_LIMIT);
    }

    return applyTransition(
      { ...state, currentDepth: state.currentDepth + 1, candidates: [] },
      SearchEvent.DEPTH_ADVANCED
    );
  }

  private finalize(state: SearchState): SearchState {
    if (state.winnerId === null || state.terminationReason === null) {
      throw new SubstrateError(`Search ${state.searchId} reached finalizing without a winner`);
    }

    const index = indexBranches(state.branches);
    const selected = requireBranch(index, state.winnerId);
    if (selected.score === null) {
      throw new SubstrateError(`Winning branch ${selected.id} has no score`);
    }

    const winner =
      selected.status === BranchStatus.TERMINAL ? selected : transitionBranch(selected, BranchStatus.TERMINAL);
    const branches = replaceBranches(state.branches, new Map([[winner.id, winner]]));
    const path = ancestorPath(winner, indexBranches(branches));

    const result: SearchResult = {
      searchId: state.searchId,
      problem: state.problem,
      answer: winner.answer?.trim() ? winner.answer : renderReasoning(path),
      score: selected.score,
      depth: winner.depth,
      branch: winner,
      path,
      terminationReason: state.terminationReason,
      totalBranchesExplored: state.totalExplored,
    };

    return applyTransition({ ...state, branches, result }, SearchEvent.RESULT_BUILT);
  }

  private fail(state: SearchState, reason: FailureReason, message: string): SearchState {
    return applyTransition({ ...state, failure: { reason, message } }, SearchEvent.FATAL_ERROR);
  }

  /**
   * Move to failed(SubstrateFault) and try once to record it. The outcome is
   * returned even when that write fails too.
   */
  private async failOnFault(state: SearchState, message: string): Promise<SearchState> {
    if (isTerminalPhase(state.phase)) {
      // The final checkpoint was not written, so the outcome cannot be trusted
      return {
        ...state,
        phase: SearchPhase.FAILED,
        result: null,
        failure: { reason: FailureReason.SUBSTRATE_FAULT, message },
      };
    }

    const failed = this.fail(state, FailureReason.SUBSTRATE_FAULT, message);
    try {
      await this.checkpoints.save(failed);
    } catch (error) {
      log.error({ searchId: state.searchId, error: errorMessage(error) }, 'Failed to record substrate fault');
    }
    return failed;
  }
}
