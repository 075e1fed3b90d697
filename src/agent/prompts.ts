/**
 * Fixed instructions and input templates for the reasoning agents.
 */

import type { EvaluationRequest, GenerationRequest } from '../types/index.js';

export const GENERATOR_INSTRUCTIONS = [
  'You are an expert problem-solver exploring a problem as a tree of thoughts.',
  'Given a problem, propose distinct reasoning branches to explore.',
  'Each branch must take a meaningfully different approach. Be concrete and specific.',
].join(' ');

export const EXPANDER_INSTRUCTIONS = [
  'You are continuing a chain of reasoning in a tree of thoughts.',
  'Given the problem and the reasoning so far, propose the next concrete steps.',
  'Each step must build directly on the previous one and move toward a solution.',
].join(' ');

export const EVALUATOR_INSTRUCTIONS = [
  'You are a critical evaluator of reasoning chains in a tree of thoughts.',
  'Score how promising the chain is for solving the problem, from 0.0 (dead end or wrong) to 1.0 (correct).',
  'If the chain fully and correctly answers the problem, set isTerminal to true and give the final answer;',
  'otherwise set answer to null.',
].join(' ');

export function buildGenerationInput(request: GenerationRequest): string {
  if (request.isRoot) {
    return [
      `Problem: ${request.problem}`,
      '',
      `Propose ${request.count} distinct high-level approaches to solving this.`,
    ].join('\n');
  }

  return [
    `Problem: ${request.problem}`,
    '',
    'Reasoning so far:',
    request.parentContent,
    '',
    `Propose ${request.count} distinct next steps that continue this reasoning.`,
  ].join('\n');
}

export function buildEvaluationInput(request: EvaluationRequest): string {
  return [`Problem: ${request.problem}`, '', 'Reasoning to evaluate:', request.branchContent].join('\n');
}
