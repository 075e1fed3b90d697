export { AgentBranchGenerator, generationOutputSchema } from './generator.js';
export { AgentBranchEvaluator, evaluationOutputSchema } from './evaluator.js';
export { createAgentsRunner } from './runner.js';
export type { StructuredRunner, StructuredRunRequest, AgentsRunnerConfig } from './runner.js';
export {
  GENERATOR_INSTRUCTIONS,
  EXPANDER_INSTRUCTIONS,
  EVALUATOR_INSTRUCTIONS,
  buildGenerationInput,
  buildEvaluationInput,
} from './prompts.js';
