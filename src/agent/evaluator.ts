import { z } from 'zod';
import type { BranchEvaluation, BranchEvaluator, EvaluationRequest } from '../types/index.js';
import { InvalidOutputError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';
import { EVALUATOR_INSTRUCTIONS, buildEvaluationInput } from './prompts.js';
import type { StructuredRunner } from './runner.js';

const logger = createLogger('agent:evaluator');

export const evaluationOutputSchema = z.object({
  score: z.number().min(0).max(1).describe('How promising the reasoning is, 0.0 to 1.0'),
  isTerminal: z.boolean().describe('True when the reasoning fully answers the problem'),
  answer: z.string().nullable().describe('The final answer when isTerminal is true'),
  rationale: z.string().describe('Short justification of the score'),
});

export class AgentBranchEvaluator implements BranchEvaluator {
  constructor(private readonly runner: StructuredRunner) {}

  async evaluate(request: EvaluationRequest, signal: AbortSignal): Promise<BranchEvaluation> {
    const output = await this.runner({
      name: 'branch-evaluator',
      instructions: EVALUATOR_INSTRUCTIONS,
      input: buildEvaluationInput(request),
      outputType: evaluationOutputSchema,
      signal,
    });

    const parsed = evaluationOutputSchema.safeParse(output);
    if (!parsed.success) {
      throw new InvalidOutputError(`Evaluator returned malformed output: ${parsed.error.message}`);
    }

    logger.debug({ score: parsed.data.score, isTerminal: parsed.data.isTerminal }, 'Evaluated branch');
    return parsed.data;
  }
}
