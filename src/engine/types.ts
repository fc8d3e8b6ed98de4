/**
 * Pipeline templates, compiled pipelines and run reports.
 *
 * Templates are what a project stores (JSON). Compilation turns them into
 * concrete pipelines with every placeholder substituted; the scheduler turns
 * a compiled graph plus an event into a BuildReport.
 */

export const EVENT_TYPES = ['push', 'tag', 'pull_request', 'manual', 'cron', 'deployment'] as const;
export type EventType = (typeof EVENT_TYPES)[number];

export const BUILD_STATUSES = ['success', 'failure'] as const;
export type BuildStatus = (typeof BUILD_STATUSES)[number];

export interface PatternFilter {
  include?: string[];
  exclude?: string[];
}

/** One pattern, a list of alternatives, or an include/exclude pair. */
export type PatternCondition = string | string[] | PatternFilter;

export interface TriggerAlternative {
  event?: EventType | EventType[];
  ref?: PatternCondition;
  branch?: PatternCondition;
  /** Matched against the event's prior status. */
  status?: BuildStatus | BuildStatus[];
}

/** Empty list means always eligible. */
export type TriggerPredicate = TriggerAlternative[];

/**
 * Event delivered by the event source (webhook, manual trigger, cron).
 */
export interface EventDescriptor {
  type: EventType;
  /** Full git ref, e.g. refs/heads/main or refs/tags/v1.0.0 */
  ref: string;
  /** Branch name; derived from refs/heads/* when absent */
  branch?: string;
  actor?: string;
  priorStatus?: BuildStatus;
  commit?: string;
  message?: string;
}

export interface SecretReference {
  fromSecret: string;
}

export type EnvValue = string | SecretReference;

export interface SecretBinding {
  /** Secret name in the secret store */
  source: string;
  /** Environment variable to expose it as */
  target: string;
}

export interface StepTemplate {
  name: string;
  image: string;
  commands: string[];
  environment?: Record<string, EnvValue>;
  secrets?: SecretBinding[];
  /** Steps sharing a group run concurrently */
  group?: string;
  when?: TriggerPredicate;
}

export interface MatrixAxis {
  name: string;
  values: string[];
}

export interface ConcurrencyLimit {
  group: string;
  limit: number;
}

export interface PipelineTemplate {
  name: string;
  /** os/arch, e.g. linux/arm64 */
  platform?: string;
  steps: StepTemplate[];
  dependsOn?: string[];
  when?: TriggerPredicate;
  concurrency?: ConcurrencyLimit;
  matrix?: MatrixAxis[];
}

export interface Step {
  name: string;
  image: string;
  commands: string[];
  environment: Record<string, EnvValue>;
  secrets: SecretBinding[];
  group?: string;
  when: TriggerPredicate;
}

export interface Pipeline {
  name: string;
  /** Name of the template this pipeline was expanded from */
  templateName: string;
  platform: string;
  steps: Step[];
  dependsOn: string[];
  when: TriggerPredicate;
  concurrency?: ConcurrencyLimit;
  /** Axis values of this matrix combination (empty without a matrix) */
  matrix: Record<string, string>;
}

export interface CompiledPipeline extends Pipeline {
  index: number;
  /** dependsOn resolved to pipeline indices */
  dependencies: number[];
  /** Topological layer, 0 for pipelines without dependencies */
  layer: number;
}

export interface CompiledGraph {
  pipelines: CompiledPipeline[];
  layers: number[][];
  byName: ReadonlyMap<string, number>;
}

export type PipelineState = 'pending' | 'eligible' | 'running' | 'succeeded' | 'failed' | 'skipped';

export type StepStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped' | 'cancelled';

export const TERMINAL_PIPELINE_STATES: ReadonlySet<PipelineState> = new Set<PipelineState>([
  'succeeded',
  'failed',
  'skipped',
]);

export interface StepReport {
  name: string;
  status: StepStatus;
  exitCode?: number;
  error?: string;
  startedAt?: Date;
  finishedAt?: Date;
}

export interface PipelineReport {
  name: string;
  state: PipelineState;
  /** Dependency whose outcome caused a skip */
  blockedBy?: string;
  /** Why the pipeline was skipped or failed */
  reason?: string;
  startedAt?: Date;
  finishedAt?: Date;
  steps: StepReport[];
}

export interface BuildReport {
  status: 'success' | 'failure' | 'skipped';
  pipelines: PipelineReport[];
}

/** Environment a step runs with, after secrets have been resolved. */
export interface ResolvedStep {
  pipeline: string;
  name: string;
  image: string;
  platform: string;
  commands: string[];
  environment: Record<string, string>;
}
