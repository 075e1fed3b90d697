/**
 * Search Orchestrator Tests
 * Beam search behavior, failure modes and replay from the call ledger
 */

import { describe, it, expect, vi } from 'vitest';
import { SearchOrchestrator, normalizeGeneration } from '../src/orchestrator/orchestrator.js';
import {
  DEFAULT_SEARCH_CONFIG,
  type BranchEvaluation,
  type SearchConfig,
  type SearchOutcome,
  type SearchResult,
} from '../src/types/index.js';
import {
  MemoryCallLedger,
  MemoryCheckpointStore,
  ScriptedEvaluator,
  ScriptedGenerator,
  deferred,
  fastExecutor,
  scoresByContent,
  sequentialIds,
} from './helpers/fakes.js';

const PROBLEM = 'What is 6 x 7?';

function searchConfig(overrides: Partial<SearchConfig>): SearchConfig {
  return { ...DEFAULT_SEARCH_CONFIG, ...overrides };
}

function createOrchestrator(options: {
  generator: ScriptedGenerator;
  evaluator: ScriptedEvaluator;
  checkpoints?: MemoryCheckpointStore;
  ledger?: MemoryCallLedger;
}): { orchestrator: SearchOrchestrator; checkpoints: MemoryCheckpointStore; ledger: MemoryCallLedger } {
  const checkpoints = options.checkpoints ?? new MemoryCheckpointStore();
  const ledger = options.ledger ?? new MemoryCallLedger();
  const orchestrator = new SearchOrchestrator({
    generator: options.generator,
    evaluator: options.evaluator,
    checkpoints,
    ledger,
    executor: fastExecutor(),
    idGenerator: sequentialIds(),
  });
  return { orchestrator, checkpoints, ledger };
}

function expectCompleted(outcome: SearchOutcome): SearchResult {
  if (outcome.status !== 'completed') {
    throw new Error(`Expected a completed search, got ${outcome.reason}: ${outcome.message}`);
  }
  return outcome.result;
}

const rootOnly = (...thoughts: string[]): ScriptedGenerator =>
  new ScriptedGenerator((request) => (request.isRoot ? thoughts : []));

describe('SearchOrchestrator', () => {
  describe('beam search', () => {
    it('should stop at the depth limit with the best frontier branch', async () => {
      const generator = rootOnly('multiply directly', 'add six sevens');
      const evaluator = scoresByContent({ 'multiply directly': 0.9, 'add six sevens': 0.4 });
      const { orchestrator, checkpoints } = createOrchestrator({ generator, evaluator });

      const state = orchestrator.createState(
        PROBLEM,
        searchConfig({ maxDepth: 1, branchesPerNode: 2, beamWidth: 1, minScoreThreshold: 0 }),
        'search-a'
      );
      const result = expectCompleted(await orchestrator.run(state));

      expect(result.branch.id).toBe('b2');
      expect(result.branch.status).toBe('terminal');
      expect(result.score).toBe(0.9);
      expect(result.depth).toBe(1);
      expect(result.answer).toBe('multiply directly');
      expect(result.terminationReason).toBe('depth-limit');
      expect(result.totalBranchesExplored).toBe(2);
      expect(result.path.map((b) => b.id)).toEqual(['b1', 'b2']);
      expect(result.path[0]?.content).toBe(PROBLEM);

      expect(generator.calls).toEqual([
        { problem: PROBLEM, parentContent: PROBLEM, count: 2, isRoot: true },
      ]);

      const saved = await checkpoints.load('search-a');
      expect(saved?.phase).toBe('completed');
      expect(saved?.frontier).toEqual(['b2']);
      expect(saved?.branches.map((b) => [b.id, b.status])).toEqual([
        ['b1', 'expanded'],
        ['b2', 'terminal'],
        ['b3', 'pruned'],
      ]);
    });

    it('should fall back to the best branch seen when nothing passes the threshold', async () => {
      const generator = rootOnly('guess 40', 'guess 41');
      const evaluator = scoresByContent({ 'guess 40': 0.1, 'guess 41': 0.05 });
      const { orchestrator } = createOrchestrator({ generator, evaluator });

      const state = orchestrator.createState(
        PROBLEM,
        searchConfig({ maxDepth: 1, branchesPerNode: 2, beamWidth: 1, minScoreThreshold: 0.3 }),
        'search-b'
      );
      const result = expectCompleted(await orchestrator.run(state));

      expect(result.branch.id).toBe('b2');
      expect(result.score).toBe(0.1);
      expect(result.terminationReason).toBe('frontier-exhausted');
    });

    it('should keep the earliest branch as best on equal scores', async () => {
      const generator = rootOnly('first', 'second');
      const evaluator = scoresByContent({ first: 0.1, second: 0.1 });
      const { orchestrator } = createOrchestrator({ generator, evaluator });

      const state = orchestrator.createState(
        PROBLEM,
        searchConfig({ maxDepth: 1, branchesPerNode: 2, beamWidth: 1, minScoreThreshold: 0.3 }),
        'search-tie'
      );
      const result = expectCompleted(await orchestrator.run(state));

      expect(result.branch.content).toBe('first');
    });

    it('should stop on a terminal answer and discard the late sibling', async () => {
      const late = deferred<BranchEvaluation>();
      const lateSignals: AbortSignal[] = [];

      const generator = rootOnly('guess 42', 'work it out');
      const evaluator = new ScriptedEvaluator((request, signal) => {
        if (request.branchContent === 'guess 42') {
          return { score: 0.95, isTerminal: true, answer: '42' };
        }
        lateSignals.push(signal);
        return late.promise;
      });
      const { orchestrator, checkpoints, ledger } = createOrchestrator({ generator, evaluator });

      const state = orchestrator.createState(
        PROBLEM,
        searchConfig({ maxDepth: 3, branchesPerNode: 2, beamWidth: 2, minScoreThreshold: 0.3 }),
        'search-c'
      );
      const result = expectCompleted(await orchestrator.run(state));

      expect(result.branch.id).toBe('b2');
      expect(result.answer).toBe('42');
      expect(result.score).toBe(0.95);
      expect(result.depth).toBe(1);
      expect(result.terminationReason).toBe('terminal-answer');
      expect(generator.calls).toHaveLength(1);
      expect(lateSignals).toHaveLength(1);
      expect(lateSignals[0]?.aborted).toBe(true);

      late.resolve({ score: 0.99, isTerminal: false });
      await new Promise((resolve) => setImmediate(resolve));

      expect(ledger.records.has('search-c:1:b3:evaluate')).toBe(false);
      const saved = await checkpoints.load('search-c');
      const sibling = saved?.branches.find((b) => b.id === 'b3');
      expect(sibling?.status).toBe('pruned');
      expect(sibling?.score).toBeNull();
      expect(saved?.result?.branch.id).toBe('b2');
    });

    it('should pass the reasoning chain to deeper calls and fall back to the best ancestor', async () => {
      const generator = new ScriptedGenerator((request) => {
        if (request.isRoot) {
          return ['A', 'B'];
        }
        return request.parentContent === 'A' ? ['A1', 'A2'] : [];
      });
      const evaluator = scoresByContent({
        A: 0.8,
        B: 0.5,
        'A\n\n→ A1': 0.1,
        'A\n\n→ A2': 0.2,
      });
      const { orchestrator } = createOrchestrator({ generator, evaluator });

      const state = orchestrator.createState(
        PROBLEM,
        searchConfig({ maxDepth: 2, branchesPerNode: 2, beamWidth: 1, minScoreThreshold: 0.3 }),
        'search-deep'
      );
      const result = expectCompleted(await orchestrator.run(state));

      expect(generator.calls[1]).toEqual({
        problem: PROBLEM,
        parentContent: 'A',
        count: 2,
        isRoot: false,
      });
      expect(evaluator.calls.map((c) => c.branchContent)).toContain('A\n\n→ A2');

      expect(result.branch.content).toBe('A');
      expect(result.score).toBe(0.8);
      expect(result.depth).toBe(1);
      expect(result.terminationReason).toBe('frontier-exhausted');
      expect(result.totalBranchesExplored).toBe(4);
    });

    it('should never exceed the beam width or the depth limit', async () => {
      let step = 0;
      const generator = new ScriptedGenerator(() => [`step ${step++}`, `step ${step++}`, `step ${step++}`]);
      const evaluator = new ScriptedEvaluator((request) => {
        const match = /step (\d+)$/.exec(request.branchContent);
        return { score: (Number(match?.[1] ?? 0) % 7) / 10, isTerminal: false };
      });
      const { orchestrator, checkpoints } = createOrchestrator({ generator, evaluator });

      const state = orchestrator.createState(
        PROBLEM,
        searchConfig({ maxDepth: 3, branchesPerNode: 3, beamWidth: 2, minScoreThreshold: 0 }),
        'search-bounds'
      );
      const result = expectCompleted(await orchestrator.run(state));

      expect(result.terminationReason).toBe('depth-limit');
      expect(result.depth).toBe(3);
      expect(result.totalBranchesExplored).toBe(15);
      expect(generator.calls).toHaveLength(5);
      expect(evaluator.calls).toHaveLength(15);
      for (const saved of checkpoints.history) {
        expect(saved.frontier.length).toBeLessThanOrEqual(2);
        expect(saved.currentDepth).toBeLessThanOrEqual(3);
      }
    });

    it('should drop a candidate whose evaluation fails', async () => {
      const generator = rootOnly('A', 'B');
      const evaluator = new ScriptedEvaluator((request) => {
        if (request.branchContent === 'B') {
          throw new Error('evaluator unavailable');
        }
        return { score: 0.7, isTerminal: false };
      });
      const { orchestrator, checkpoints, ledger } = createOrchestrator({ generator, evaluator });

      const state = orchestrator.createState(
        PROBLEM,
        searchConfig({ maxDepth: 1, branchesPerNode: 2, beamWidth: 2, minScoreThreshold: 0 }),
        'search-drop'
      );
      const result = expectCompleted(await orchestrator.run(state));

      expect(result.branch.content).toBe('A');
      const record = ledger.records.get('search-drop:1:b3:evaluate');
      expect(record?.status).toBe('failed');
      if (record?.status === 'failed') {
        expect(record.errorType).toBe('collaborator_error');
        expect(record.error).toBe('evaluator unavailable');
      }
      const saved = await checkpoints.load('search-drop');
      expect(saved?.branches.find((b) => b.id === 'b3')?.status).toBe('pruned');
    });

    it('should truncate generator output to the requested count', async () => {
      const generator = rootOnly('  ', 'one', ' two ', 'three');
      const evaluator = scoresByContent({ one: 0.5, two: 0.6 });
      const { orchestrator } = createOrchestrator({ generator, evaluator });

      const state = orchestrator.createState(
        PROBLEM,
        searchConfig({ maxDepth: 1, branchesPerNode: 2, beamWidth: 2, minScoreThreshold: 0 }),
        'search-trunc'
      );
      const result = expectCompleted(await orchestrator.run(state));

      expect(evaluator.calls.map((c) => c.branchContent)).toEqual(['one', 'two']);
      expect(result.branch.content).toBe('two');
      expect(result.totalBranchesExplored).toBe(2);
    });
  });

  describe('failures', () => {
    it('should fail with NoInitialBranches when the root yields nothing', async () => {
      const generator = rootOnly(' ', '');
      const evaluator = scoresByContent({});
      const { orchestrator, checkpoints } = createOrchestrator({ generator, evaluator });

      const state = orchestrator.createState(PROBLEM, searchConfig({}), 'search-empty');
      const outcome = await orchestrator.run(state);

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'NoInitialBranches',
        message: 'Generator produced no initial branches',
      });
      expect(evaluator.calls).toHaveLength(0);
      expect((await checkpoints.load('search-empty'))?.phase).toBe('failed');
    });

    it('should fail with NoInitialBranches when root generation fails', async () => {
      const generator = new ScriptedGenerator(() => {
        throw new Error('model unavailable');
      });
      const { orchestrator, ledger } = createOrchestrator({ generator, evaluator: scoresByContent({}) });

      const state = orchestrator.createState(PROBLEM, searchConfig({}), 'search-gen-fail');
      const outcome = await orchestrator.run(state);

      expect(outcome.status === 'failed' && outcome.reason).toBe('NoInitialBranches');
      expect(ledger.records.get('search-gen-fail:1:b1:generate')?.status).toBe('failed');
    });

    it('should fail with NoScoredBranches when every evaluation fails', async () => {
      const generator = rootOnly('A', 'B');
      const evaluator = new ScriptedEvaluator(() => {
        throw new Error('evaluator unavailable');
      });
      const { orchestrator } = createOrchestrator({ generator, evaluator });

      const state = orchestrator.createState(PROBLEM, searchConfig({ maxDepth: 2 }), 'search-unscored');
      const outcome = await orchestrator.run(state);

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'NoScoredBranches',
        message: 'No branch was ever scored',
      });
    });

    it('should fail with SubstrateFault when the ledger cannot be written', async () => {
      const ledger = new MemoryCallLedger();
      ledger.failCommits = true;
      const { orchestrator, checkpoints } = createOrchestrator({
        generator: rootOnly('A'),
        evaluator: scoresByContent({ A: 0.5 }),
        ledger,
      });

      const state = orchestrator.createState(PROBLEM, searchConfig({}), 'search-ledger-fault');
      const outcome = await orchestrator.run(state);

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'SubstrateFault',
        message: 'simulated ledger failure',
      });
      const saved = await checkpoints.load('search-ledger-fault');
      expect(saved?.phase).toBe('failed');
      expect(saved?.result).toBeNull();
    });

    it('should fail with SubstrateFault when a checkpoint cannot be written', async () => {
      const checkpoints = new MemoryCheckpointStore((s) => s.phase === 'pruning');
      const { orchestrator } = createOrchestrator({
        generator: rootOnly('A'),
        evaluator: scoresByContent({ A: 0.5 }),
        checkpoints,
      });

      const state = orchestrator.createState(PROBLEM, searchConfig({}), 'search-ckpt-fault');
      const outcome = await orchestrator.run(state);

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'SubstrateFault',
        message: 'simulated checkpoint failure',
      });
    });
  });

  describe('replay', () => {
    const config = searchConfig({ maxDepth: 1, branchesPerNode: 2, beamWidth: 1, minScoreThreshold: 0 });
    const scores = { 'multiply directly': 0.9, 'add six sevens': 0.4 };

    async function crashBeforePruning(
      searchId: string,
      evaluator: ScriptedEvaluator = scoresByContent(scores)
    ): Promise<{ checkpoints: MemoryCheckpointStore; ledger: MemoryCallLedger }> {
      const checkpoints = new MemoryCheckpointStore((s) => s.phase === 'pruning');
      const { orchestrator, ledger } = createOrchestrator({
        generator: rootOnly('multiply directly', 'add six sevens'),
        evaluator,
        checkpoints,
      });
      const outcome = await orchestrator.run(orchestrator.createState(PROBLEM, config, searchId));
      expect(outcome.status).toBe('failed');
      return { checkpoints, ledger };
    }

    it('should resume from the last checkpoint without calling collaborators again', async () => {
      const crashed = await crashBeforePruning('search-r1');
      const state = await crashed.checkpoints.load('search-r1');
      expect(state?.phase).toBe('evaluating');
      if (!state) return;

      const generator = rootOnly('something else');
      const evaluator = scoresByContent({});
      const { orchestrator } = createOrchestrator({ generator, evaluator, ledger: crashed.ledger });

      const result = expectCompleted(await orchestrator.run(state));

      expect(generator.calls).toHaveLength(0);
      expect(evaluator.calls).toHaveLength(0);
      expect(result.branch.id).toBe('b2');
      expect(result.score).toBe(0.9);
    });

    it('should only reissue calls that were never committed', async () => {
      const crashed = await crashBeforePruning('search-r2');
      crashed.ledger.records.delete('search-r2:1:b3:evaluate');
      const state = await crashed.checkpoints.load('search-r2');
      if (!state) throw new Error('checkpoint missing');

      const evaluator = scoresByContent(scores);
      const { orchestrator } = createOrchestrator({
        generator: rootOnly(),
        evaluator,
        ledger: crashed.ledger,
      });

      const result = expectCompleted(await orchestrator.run(state));

      expect(evaluator.calls.map((c) => c.branchContent)).toEqual(['add six sevens']);
      expect(result.branch.id).toBe('b2');
    });

    it('should not issue live calls after a replayed terminal answer', async () => {
      const never = deferred<BranchEvaluation>();
      const crashed = await crashBeforePruning(
        'search-r3',
        new ScriptedEvaluator((request) =>
          request.branchContent === 'multiply directly'
            ? { score: 0.95, isTerminal: true, answer: '42' }
            : never.promise
        )
      );
      const state = await crashed.checkpoints.load('search-r3');
      if (!state) throw new Error('checkpoint missing');

      const evaluator = scoresByContent(scores);
      const { orchestrator } = createOrchestrator({
        generator: rootOnly(),
        evaluator,
        ledger: crashed.ledger,
      });

      const result = expectCompleted(await orchestrator.run(state));

      expect(evaluator.calls).toHaveLength(0);
      expect(result.answer).toBe('42');
      expect(result.terminationReason).toBe('terminal-answer');
    });

    it('should return the stored outcome of a finished search', async () => {
      const generator = rootOnly('A');
      const { orchestrator, checkpoints } = createOrchestrator({
        generator,
        evaluator: scoresByContent({ A: 0.5 }),
      });
      const first = await orchestrator.run(orchestrator.createState(PROBLEM, config, 'search-done'));
      const state = await checkpoints.load('search-done');
      if (!state) throw new Error('checkpoint missing');

      const second = await orchestrator.run(state);

      expect(second).toEqual(first);
      expect(generator.calls).toHaveLength(1);
    });

    it('should commit a finished call while a sibling is still running', async () => {
      const slow = deferred<BranchEvaluation>();
      const generator = rootOnly('fast', 'slow');
      const evaluator = new ScriptedEvaluator((request) =>
        request.branchContent === 'fast' ? { score: 0.9, isTerminal: false } : slow.promise
      );
      const { orchestrator, ledger } = createOrchestrator({ generator, evaluator });

      const running = orchestrator.run(
        orchestrator.createState(
          PROBLEM,
          searchConfig({ maxDepth: 1, branchesPerNode: 2, beamWidth: 1, minScoreThreshold: 0 }),
          'search-eager'
        )
      );

      await vi.waitFor(() => {
        expect([...ledger.records.keys()]).toContain('search-eager:1:b2:evaluate');
      });
      expect(ledger.records.has('search-eager:1:b3:evaluate')).toBe(false);

      slow.resolve({ score: 0.4, isTerminal: false });
      const result = expectCompleted(await running);

      expect(result.branch.id).toBe('b2');
      expect([...ledger.records.keys()]).toEqual([
        'search-eager:1:b1:generate',
        'search-eager:1:b2:evaluate',
        'search-eager:1:b3:evaluate',
      ]);
    });
  });
});

describe('normalizeGeneration', () => {
  it('should trim, drop blanks and cap the count', () => {
    expect(normalizeGeneration(['  ', 'a', ' b ', 'c'], 2)).toEqual(['a', 'b']);
  });

  it('should reject output that is not a list of strings', () => {
    expect(() => normalizeGeneration('a, b', 2)).toThrow();
  });
});
