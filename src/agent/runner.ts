/**
 * Structured single-turn agent calls through the OpenAI Agents SDK.
 */

import { Agent, run } from '@openai/agents';
import type { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('agent:runner');

export interface StructuredRunRequest {
  name: string;
  instructions: string;
  input: string;
  outputType: z.AnyZodObject;
  signal: AbortSignal;
}

/**
 * Runs one agent turn and returns its raw final output.
 * Callers validate the output against their own schema.
 */
export type StructuredRunner = (request: StructuredRunRequest) => Promise<unknown>;

export interface AgentsRunnerConfig {
  model: string;
  /** Upper bound on model turns for one call */
  maxTurns?: number;
}

export function createAgentsRunner(config: AgentsRunnerConfig): StructuredRunner {
  return async (request) => {
    const agent = new Agent({
      name: request.name,
      instructions: request.instructions,
      model: config.model,
      outputType: request.outputType,
    });

    const startTime = Date.now();
    const result = await run(agent, request.input, {
      maxTurns: config.maxTurns ?? 3,
      signal: request.signal,
    });

    logger.debug(
      { agent: request.name, model: config.model, durationMs: Date.now() - startTime },
      'Agent call completed'
    );

    return result.finalOutput;
  };
}
