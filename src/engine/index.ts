export * from './types';
export { ConfigError, StepExecutionError, EvaluationError } from './errors';
export { substitute, type Variables } from './substitution';
export { parseTemplates, parseEvent } from './schema';
export {
  expandMatrix,
  getCombinations,
  matrixPipelineName,
  DEFAULT_PLATFORM,
  type MatrixCombination,
} from './matrix-expander';
export { buildDependencyGraph, findCycle } from './dependency-graph';
export {
  evaluateTrigger,
  isEligible,
  matchPattern,
  eventBranch,
  eventTag,
  type TriggerDecision,
} from './trigger-evaluator';
export { ConcurrencyLimiter, type Release, type AcquireResult } from './concurrency-limiter';
export {
  ExecutionBackend,
  SecretStore,
  type OutputStream,
  type StepRunContext,
} from './collaborators';
export {
  Scheduler,
  getStepUnits,
  type SchedulerEvent,
  type SchedulerListener,
  type SchedulerOptions,
  type RunOptions,
} from './scheduler';
export {
  compile,
  evaluate,
  buildVariables,
  repositorySlug,
  type CompileOptions,
  type EligibilityReport,
  type RepositoryInfo,
} from './compiler';
