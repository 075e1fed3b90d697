export { SearchOrchestrator, toOutcome, normalizeGeneration, normalizeEvaluation } from './orchestrator.js';
export type { SearchOrchestratorOptions } from './orchestrator.js';
export { CallExecutor, classifyCallError, runWithTimeout, DEFAULT_CALL_TIMEOUT_MS } from './call-executor.js';
export type { CallOutcome, CallExecutorOptions } from './call-executor.js';
export {
  RetryPolicyEngine,
  createRetryPolicyEngine,
  DEFAULT_RETRY_POLICY,
  NO_RETRY_POLICY,
} from './retry-policy.js';
export type { RetryPolicy, RetryResult } from './retry-policy.js';
export { awaitBarrier } from './barrier.js';
export type { BarrierTask, BarrierOutcome, BarrierOptions } from './barrier.js';
export { FileCallLedger, parseLedger } from './call-ledger.js';
export type { CallLedger } from './call-ledger.js';
export { FileCheckpointStore, parseCheckpoint } from './search-store.js';
export type { CheckpointStore } from './search-store.js';
export {
  applyTransition,
  canTransition,
  getNextPhase,
  getProgressDescription,
  isTerminalPhase,
} from './state-machine.js';
