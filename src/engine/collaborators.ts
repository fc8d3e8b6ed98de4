import type { ResolvedStep } from './types';

export type OutputStream = 'stdout' | 'stderr';

export interface StepRunContext {
  /** Aborted when the step must stop (sibling failure or build cancel) */
  signal: AbortSignal;
  /** Report one line of step output */
  onOutput: (line: string, stream: OutputStream) => void;
}

/**
 * Runs one step (container image + commands) and returns its exit status.
 * This is the only call the scheduler makes outward per step.
 */
export abstract class ExecutionBackend {
  abstract runStep(step: ResolvedStep, context: StepRunContext): Promise<number>;
}

/**
 * Resolves a secret by name at execution time. The scheduler never keeps
 * the value beyond the step it was resolved for.
 */
export abstract class SecretStore {
  abstract resolve(name: string): Promise<string>;
}
