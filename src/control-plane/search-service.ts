import type {
  BranchEvaluator,
  BranchGenerator,
  SearchOutcome,
  SearchState,
  SearchStatus,
} from '../types/index.js';
import { FailureReason } from '../types/index.js';
import { SearchNotFoundError, SubstrateError } from '../errors/index.js';
import type { BranchwiseConfig } from '../config/index.js';
import { AgentBranchEvaluator, AgentBranchGenerator, createAgentsRunner } from '../agent/index.js';
import { CallExecutor } from '../orchestrator/call-executor.js';
import { FileCallLedger, type CallLedger } from '../orchestrator/call-ledger.js';
import { SearchOrchestrator, toOutcome } from '../orchestrator/orchestrator.js';
import { createRetryPolicyEngine } from '../orchestrator/retry-policy.js';
import { FileCheckpointStore, type CheckpointStore } from '../orchestrator/search-store.js';
import { getProgressDescription } from '../orchestrator/state-machine.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { validateSubmission } from './validators.js';

const log = createLogger('search-service');

/**
 * A submitted search.
 */
export interface SearchHandle {
  searchId: string;
  /** Resolves once the search completes or fails; never rejects */
  result(): Promise<SearchOutcome>;
  status(): Promise<SearchStatus | null>;
}

export interface SearchServiceOptions {
  generator: BranchGenerator;
  evaluator: BranchEvaluator;
  checkpoints?: CheckpointStore;
  ledger?: CallLedger;
  executor?: CallExecutor;
  idGenerator?: () => string;
}

/**
 * Summarize a search state for polling.
 */
export function toSearchStatus(state: SearchState): SearchStatus {
  const best = state.bestSoFarId ? state.branches.find((b) => b.id === state.bestSoFarId) : undefined;
  return {
    searchId: state.searchId,
    problem: state.problem,
    phase: state.phase,
    currentDepth: state.currentDepth,
    maxDepth: state.config.maxDepth,
    frontierSize: state.frontier.length,
    bestScore: best?.score ?? null,
    totalExplored: state.totalExplored,
    progress: getProgressDescription(state),
    outcome: toOutcome(state),
    createdAt: state.createdAt,
    updatedAt: state.updatedAt,
  };
}

/**
 * Search Service - submission, resumption and inspection of searches.
 */
export class SearchService {
  private readonly orchestrator: SearchOrchestrator;
  private readonly checkpoints: CheckpointStore;
  private readonly active = new Map<string, Promise<SearchOutcome>>();

  constructor(options: SearchServiceOptions) {
    this.checkpoints = options.checkpoints ?? new FileCheckpointStore();
    this.orchestrator = new SearchOrchestrator({
      generator: options.generator,
      evaluator: options.evaluator,
      checkpoints: this.checkpoints,
      ledger: options.ledger ?? new FileCallLedger(),
      executor: options.executor,
      idGenerator: options.idGenerator,
    });
  }

  /**
   * Start a search in the background.
   *
   * @throws ValidationError when the problem or config is invalid; no search is created
   */
  submit(problem: unknown, config?: unknown): SearchHandle {
    const input = validateSubmission(problem, config);
    const initial = this.orchestrator.createState(input.problem, input.config);
    const { searchId } = initial;

    log.info({ searchId, config: input.config }, 'Search submitted');

    const outcome = this.track(
      searchId,
      this.checkpoints.save(initial).then(
        () => this.orchestrator.run(initial),
        (error: unknown): SearchOutcome => ({
          status: 'failed',
          reason: FailureReason.SUBSTRATE_FAULT,
          message: `Failed to persist new search: ${errorMessage(error)}`,
        })
      )
    );

    return {
      searchId,
      result: () => outcome,
      status: async () => (await this.getStatus(searchId)) ?? toSearchStatus(initial),
    };
  }

  /**
   * Submit a search and wait for its outcome.
   */
  run(problem: unknown, config?: unknown): Promise<SearchOutcome> {
    return this.submit(problem, config).result();
  }

  /**
   * Reopen a search from its checkpoint and continue it in the background.
   * A finished search yields its stored outcome; a running one is joined.
   *
   * @throws SearchNotFoundError if no checkpoint exists
   * @throws SubstrateError if the checkpoint cannot be read
   */
  async reopen(searchId: string): Promise<SearchHandle> {
    const status = async (): Promise<SearchStatus | null> => this.getStatus(searchId);

    const running = this.active.get(searchId);
    if (running) {
      return { searchId, result: () => running, status };
    }

    const state = await this.checkpoints.load(searchId);
    if (!state) {
      throw new SearchNotFoundError(searchId);
    }

    const finished = toOutcome(state);
    if (finished) {
      return { searchId, result: () => Promise.resolve(finished), status };
    }

    log.info({ searchId, phase: state.phase, depth: state.currentDepth }, 'Search resumed');
    const outcome = this.track(searchId, this.orchestrator.run(state));
    return { searchId, result: () => outcome, status };
  }

  /**
   * Continue an interrupted search and wait for its outcome.
   *
   * @throws SearchNotFoundError if no checkpoint exists
   */
  async resume(searchId: string): Promise<SearchOutcome> {
    let handle: SearchHandle;
    try {
      handle = await this.reopen(searchId);
    } catch (error) {
      if (error instanceof SubstrateError) {
        log.error({ searchId, error: error.message }, 'Checkpoint unreadable');
        return { status: 'failed', reason: FailureReason.SUBSTRATE_FAULT, message: error.message };
      }
      throw error;
    }
    return handle.result();
  }

  /**
   * Whether a search is running in this process.
   */
  isActive(searchId: string): boolean {
    return this.active.has(searchId);
  }

  async getStatus(searchId: string): Promise<SearchStatus | null> {
    const state = await this.checkpoints.load(searchId);
    if (!state) {
      log.debug({ searchId }, 'Search not found');
      return null;
    }
    return toSearchStatus(state);
  }

  async list(
    options: { limit?: number; offset?: number } = {}
  ): Promise<{ items: SearchStatus[]; total: number }> {
    const { items, total } = await this.checkpoints.list(options);
    return { items: items.map(toSearchStatus), total };
  }

  private track(searchId: string, outcome: Promise<SearchOutcome>): Promise<SearchOutcome> {
    const tracked = outcome.then((result) => {
      this.active.delete(searchId);
      return result;
    });
    this.active.set(searchId, tracked);
    return tracked;
  }
}

/**
 * Build a service wired to the agent collaborators and file stores.
 */
export function createSearchService(config: BranchwiseConfig): SearchService {
  const runner = createAgentsRunner({ model: config.model });
  return new SearchService({
    generator: new AgentBranchGenerator(runner),
    evaluator: new AgentBranchEvaluator(runner),
    executor: new CallExecutor({
      timeoutMs: config.callTimeoutMs,
      retry: createRetryPolicyEngine(config.retry),
    }),
  });
}
