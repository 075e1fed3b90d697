import { z } from 'zod';
import type { BranchGenerator, GenerationRequest } from '../types/index.js';
import { InvalidOutputError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';
import { EXPANDER_INSTRUCTIONS, GENERATOR_INSTRUCTIONS, buildGenerationInput } from './prompts.js';
import type { StructuredRunner } from './runner.js';

const logger = createLogger('agent:generator');

export const generationOutputSchema = z.object({
  thoughts: z.array(z.string()).describe('Distinct reasoning steps, one per entry'),
});

/**
 * Branch generator backed by a structured agent call.
 * Root calls use the approach prompt, deeper calls the expansion prompt.
 */
export class AgentBranchGenerator implements BranchGenerator {
  constructor(private readonly runner: StructuredRunner) {}

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<string[]> {
    const output = await this.runner({
      name: request.isRoot ? 'branch-generator' : 'branch-expander',
      instructions: request.isRoot ? GENERATOR_INSTRUCTIONS : EXPANDER_INSTRUCTIONS,
      input: buildGenerationInput(request),
      outputType: generationOutputSchema,
      signal,
    });

    const parsed = generationOutputSchema.safeParse(output);
    if (!parsed.success) {
      throw new InvalidOutputError(`Generator returned malformed output: ${parsed.error.message}`);
    }

    logger.debug({ isRoot: request.isRoot, count: parsed.data.thoughts.length }, 'Generated thoughts');
    return parsed.data.thoughts;
  }
}
