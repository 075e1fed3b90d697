export {
  createBranch,
  canTransitionBranch,
  transitionBranch,
  scoreBranch,
  type CreateBranchOptions,
} from './branch.js';
export { prune } from './pruner.js';
export { STEP_SEPARATOR, indexBranches, ancestorPath, renderReasoning } from './path.js';
