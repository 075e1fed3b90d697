/**
 * CLI, formatter and configuration tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createProgram } from '../src/control-plane/cli.js';
import { setBranchwiseRoot } from '../src/artifacts/paths.js';
import { toSearchConfig } from '../src/control-plane/commands/run.js';
import {
  formatOutcome,
  formatPhase,
  formatResult,
  formatScore,
  formatSearchList,
  formatValidationErrors,
  truncate,
} from '../src/control-plane/formatter.js';
import { loadConfig, getConfig, resetConfig } from '../src/config/index.js';
import { createBranch, scoreBranch, transitionBranch } from '../src/tree/branch.js';
import { BranchStatus, type SearchResult } from '../src/types/index.js';

const ENV_KEYS = [
  'NO_COLOR',
  'FORCE_COLOR',
  'OPENAI_MODEL',
  'BRANCHWISE_MODEL',
  'BRANCHWISE_CALL_TIMEOUT_MS',
  'BRANCHWISE_RETRY_MAX_ATTEMPTS',
  'BRANCHWISE_PORT',
  'BRANCHWISE_API_KEY',
];

describe('CLI', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    process.env.NO_COLOR = '1';
    resetConfig();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetConfig();
  });

  describe('createProgram()', () => {
    it('should register every command', () => {
      const program = createProgram();

      expect(program.name()).toBe('branchwise');
      expect(program.commands.map((c) => c.name())).toEqual(['run', 'resume', 'status', 'list', 'serve']);
    });

    it.each(['status', 'resume'])('should refuse a %s ID outside the nanoid alphabet', async (command) => {
      const root = await mkdtemp(join(tmpdir(), 'branchwise-cli-'));
      setBranchwiseRoot(root);
      const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      try {
        await createProgram().parseAsync(['node', 'branchwise', command, '../other']);

        expect(errors).toHaveBeenCalledWith('✗ Search ID may only contain letters, digits, "_" and "-"');
        expect(process.exitCode).toBe(1);
      } finally {
        process.exitCode = undefined;
        errors.mockRestore();
        setBranchwiseRoot(null);
        await rm(root, { recursive: true, force: true });
      }
    });
  });

  describe('toSearchConfig()', () => {
    it('should map only the options that were given', () => {
      expect(toSearchConfig({ problem: 'p', maxDepth: 2, beam: 1, json: false })).toEqual({
        maxDepth: 2,
        beamWidth: 1,
      });
      expect(toSearchConfig({ problem: 'p', branches: 4, threshold: 0.5, json: true })).toEqual({
        branchesPerNode: 4,
        minScoreThreshold: 0.5,
      });
    });
  });

  describe('Formatter', () => {
    const root = createBranch({ id: 'r', parent: null, content: 'What is 6 x 7?', status: BranchStatus.EXPANDED });
    const step = transitionBranch(
      scoreBranch(createBranch({ id: 'a', parent: root, content: 'Multiply 6 by 7' }), {
        score: 0.9,
        isTerminal: false,
      }),
      BranchStatus.TERMINAL
    );
    const result: SearchResult = {
      searchId: 's1',
      problem: 'What is 6 x 7?',
      answer: 'Multiply 6 by 7',
      score: 0.9,
      depth: 1,
      branch: step,
      path: [root, step],
      terminationReason: 'depth-limit',
      totalBranchesExplored: 2,
    };

    it('should format scores', () => {
      expect(formatScore(0.5)).toBe('0.50');
      expect(formatScore(null)).toBe('-');
    });

    it('should format phases without color', () => {
      expect(formatPhase('checking_termination')).toBe('CHECKING_TERMINATION');
    });

    it('should format a result with its reasoning path', () => {
      expect(formatResult(result)).toBe(
        [
          'Answer:',
          '  Multiply 6 by 7',
          '',
          'Score:        0.90',
          'Depth:        1',
          'Stopped by:   depth-limit',
          'Explored:     2 branches',
          '',
          'Reasoning path:',
          '  1. Multiply 6 by 7 (0.90)',
        ].join('\n')
      );
    });

    it('should format a failed outcome', () => {
      expect(
        formatOutcome({ status: 'failed', reason: 'NoScoredBranches', message: 'No branch was ever scored' })
      ).toBe('✗ NoScoredBranches: No branch was ever scored');
    });

    it('should format an empty search list', () => {
      expect(formatSearchList([])).toBe('No searches found.');
    });

    it('should format validation errors', () => {
      expect(formatValidationErrors([{ path: 'config.maxDepth', message: 'Too small' }])).toBe(
        '✗ Validation failed:\n  • config.maxDepth: Too small'
      );
    });

    it('should truncate long text', () => {
      expect(truncate('abcdefghij', 6)).toBe('abc...');
      expect(truncate('abc', 6)).toBe('abc');
    });
  });

  describe('Configuration', () => {
    it('should apply defaults', () => {
      const config = loadConfig();

      expect(config.model).toBe('gpt-4o-mini');
      expect(config.callTimeoutMs).toBe(120000);
      expect(config.retry).toEqual({
        initialIntervalMs: 2000,
        backoffCoefficient: 2,
        maxIntervalMs: 30000,
        maxAttempts: 4,
      });
      expect(config.port).toBe(3001);
      expect(config.host).toBe('0.0.0.0');
      expect(config.apiKey).toBeUndefined();
    });

    it('should read environment variables', () => {
      process.env.BRANCHWISE_MODEL = 'test-model';
      process.env.BRANCHWISE_CALL_TIMEOUT_MS = '5000';
      process.env.BRANCHWISE_RETRY_MAX_ATTEMPTS = '2';
      process.env.BRANCHWISE_API_KEY = 'test-secret';

      const config = loadConfig();

      expect(config.model).toBe('test-model');
      expect(config.callTimeoutMs).toBe(5000);
      expect(config.retry.maxAttempts).toBe(2);
      expect(config.apiKey).toBe('test-secret');
    });

    it('should fall back to OPENAI_MODEL', () => {
      process.env.OPENAI_MODEL = 'fallback-model';

      expect(loadConfig().model).toBe('fallback-model');
    });

    it('should reject invalid values', () => {
      process.env.BRANCHWISE_PORT = '99999';

      expect(() => loadConfig()).toThrow(/^Configuration validation failed/);
    });

    it('should cache the loaded configuration', () => {
      const first = getConfig();
      process.env.BRANCHWISE_MODEL = 'changed';

      expect(getConfig()).toBe(first);
      resetConfig();
      expect(getConfig().model).toBe('changed');
    });
  });
});
