/**
 * Errors raised by the pipeline engine.
 *
 * ConfigError halts compilation, StepExecutionError stays local to one
 * pipeline, EvaluationError only ever becomes a trigger diagnostic.
 */

export class ConfigError extends Error {
  /** JSON path of the offending template field, when known */
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
    this.path = path;
  }
}

export class StepExecutionError extends Error {
  constructor(
    readonly pipeline: string,
    readonly step: string,
    readonly exitCode: number | null,
    detail?: string,
  ) {
    super(
      detail ??
        `Step '${step}' of pipeline '${pipeline}' exited with status ${exitCode ?? 'unknown'}`,
    );
    this.name = 'StepExecutionError';
  }
}

export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationError';
  }
}
