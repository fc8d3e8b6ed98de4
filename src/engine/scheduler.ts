/**
 * Scheduler
 *
 * Runs a compiled graph for one event. Pipelines move through
 * pending → eligible → running → succeeded | failed | skipped; a pipeline
 * starts once all of its dependencies succeeded and its trigger matches,
 * and waits in eligible for a concurrency slot. Within a pipeline, grouped
 * steps run together and everything else runs in declaration order; the
 * first failing step stops the pipeline.
 */
import { ConcurrencyLimiter, type Release } from './concurrency-limiter';
import type { ExecutionBackend, OutputStream, SecretStore } from './collaborators';
import { StepExecutionError } from './errors';
import { evaluateTrigger, eventBranch, eventTag } from './trigger-evaluator';
import {
  TERMINAL_PIPELINE_STATES,
  type BuildReport,
  type CompiledGraph,
  type CompiledPipeline,
  type EventDescriptor,
  type PipelineReport,
  type PipelineState,
  type ResolvedStep,
  type Step,
  type StepReport,
  type StepStatus,
} from './types';

export type SchedulerEvent =
  | {
      kind: 'pipeline';
      pipeline: string;
      state: PipelineState;
      blockedBy?: string;
      reason?: string;
      at: Date;
    }
  | {
      kind: 'step';
      pipeline: string;
      step: string;
      status: StepStatus;
      exitCode?: number;
      error?: string;
      at: Date;
    }
  | {
      kind: 'output';
      pipeline: string;
      step: string;
      stream: OutputStream;
      line: string;
    };

export type SchedulerListener = (event: SchedulerEvent) => void;

export interface SchedulerOptions {
  backend: ExecutionBackend;
  secrets: SecretStore;
  /** Shared across runs so concurrency groups hold across builds */
  limiter?: ConcurrencyLimiter;
  /** Cap on pipelines of one run executing at once (unlimited when absent) */
  maxParallelPipelines?: number;
  /** Must not throw */
  listener?: SchedulerListener;
}

export interface RunOptions {
  signal?: AbortSignal;
  /**
   * Namespace for concurrency groups in the shared limiter, e.g. a project
   * id. Runs with different scopes never share a group.
   */
  scope?: string;
}

const RUN_SLOT_GROUP = '*';

/**
 * Split steps into units that start together: each run of consecutive
 * steps sharing a group is one unit, every other step is a unit of its own.
 */
export function getStepUnits(steps: Step[]): Step[][] {
  const units: Step[][] = [];
  let previous: Step | undefined;

  for (const step of steps) {
    const current = units[units.length - 1];
    if (current && step.group && previous?.group === step.group) {
      current.push(step);
    } else {
      units.push([step]);
    }
    previous = step;
  }
  return units;
}

export class Scheduler {
  private readonly limiter: ConcurrencyLimiter;

  constructor(private readonly options: SchedulerOptions) {
    this.limiter = options.limiter ?? new ConcurrencyLimiter();
  }

  run(graph: CompiledGraph, event: EventDescriptor, runOptions: RunOptions = {}): Promise<BuildReport> {
    return new BuildRun(graph, event, this.options, this.limiter, runOptions).execute();
  }
}

class BuildRun {
  private readonly reports: PipelineReport[];
  private readonly active = new Map<number, Promise<void>>();
  private readonly runSlots = new ConcurrencyLimiter();

  constructor(
    private readonly graph: CompiledGraph,
    private readonly event: EventDescriptor,
    private readonly options: SchedulerOptions,
    private readonly limiter: ConcurrencyLimiter,
    private readonly runOptions: RunOptions,
  ) {
    this.reports = graph.pipelines.map(
      (p): PipelineReport => ({
        name: p.name,
        state: 'pending',
        steps: p.steps.map((s): StepReport => ({ name: s.name, status: 'pending' })),
      }),
    );
  }

  private get signal(): AbortSignal | undefined {
    return this.runOptions.signal;
  }

  private limiterKey(group: string): string {
    const { scope } = this.runOptions;
    return scope === undefined ? group : `${scope}/${group}`;
  }

  private get cancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  async execute(): Promise<BuildReport> {
    this.advance();
    while (this.active.size > 0) {
      await Promise.race(this.active.values());
      this.advance();
    }

    // Nothing is running, so whatever is still pending can never start.
    for (const pipeline of this.graph.pipelines) {
      if (this.reports[pipeline.index].state === 'pending') {
        this.skip(pipeline, { reason: 'no further progress possible' });
      }
    }

    return { status: this.overallStatus(), pipelines: this.reports };
  }

  private overallStatus(): BuildReport['status'] {
    if (this.reports.some((r) => r.state === 'failed')) return 'failure';
    if (this.reports.every((r) => r.state === 'skipped')) return 'skipped';
    return 'success';
  }

  /**
   * Promote pending pipelines until nothing changes: skip the blocked and
   * the non-matching ones, start the ones whose dependencies all succeeded.
   */
  private advance(): void {
    let changed = true;
    while (changed) {
      changed = false;
      for (const pipeline of this.graph.pipelines) {
        if (this.reports[pipeline.index].state !== 'pending') continue;

        if (this.cancelled) {
          this.skip(pipeline, { reason: 'cancelled' });
          changed = true;
          continue;
        }

        const blocking = pipeline.dependencies.find((dep) => {
          const state = this.reports[dep].state;
          return state === 'failed' || state === 'skipped';
        });
        if (blocking !== undefined) {
          const dep = this.reports[blocking];
          this.skip(pipeline, {
            blockedBy: dep.name,
            reason: `dependency '${dep.name}' ${dep.state}`,
          });
          changed = true;
          continue;
        }

        if (!pipeline.dependencies.every((dep) => this.reports[dep].state === 'succeeded')) {
          continue;
        }

        const decision = evaluateTrigger(pipeline.when, this.event);
        if (!decision.eligible) {
          this.skip(pipeline, {
            reason: decision.diagnostic ?? 'trigger predicate did not match the event',
          });
          changed = true;
          continue;
        }

        this.setState(pipeline, 'eligible');
        this.start(pipeline);
      }
    }
  }

  private start(pipeline: CompiledPipeline): void {
    const task = this.runPipeline(pipeline)
      .catch((err: unknown) => {
        const reason = err instanceof Error ? err.message : String(err);
        if (!TERMINAL_PIPELINE_STATES.has(this.reports[pipeline.index].state)) {
          this.setState(pipeline, 'failed', { reason });
        }
      })
      .finally(() => {
        this.active.delete(pipeline.index);
      });
    this.active.set(pipeline.index, task);
  }

  private async runPipeline(pipeline: CompiledPipeline): Promise<void> {
    const releases: Release[] = [];
    try {
      try {
        if (pipeline.concurrency) {
          const { group, limit } = pipeline.concurrency;
          releases.push(await this.limiter.acquire(this.limiterKey(group), limit, this.signal));
        }
        if (this.options.maxParallelPipelines !== undefined) {
          releases.push(
            await this.runSlots.acquire(
              RUN_SLOT_GROUP,
              this.options.maxParallelPipelines,
              this.signal,
            ),
          );
        }
      } catch {
        this.skip(pipeline, { reason: 'cancelled' });
        return;
      }

      if (this.cancelled) {
        this.skip(pipeline, { reason: 'cancelled' });
        return;
      }

      this.setState(pipeline, 'running');
      const failure = await this.runSteps(pipeline);
      if (failure) {
        this.setState(pipeline, 'failed', { reason: failure });
      } else {
        this.setState(pipeline, 'succeeded');
      }
    } finally {
      for (const release of releases.reverse()) release();
    }
  }

  /**
   * Run the units of a pipeline in order. Returns the failure message of
   * the first failing step, or null when every step succeeded or was skipped.
   */
  private async runSteps(pipeline: CompiledPipeline): Promise<string | null> {
    const units = getStepUnits(pipeline.steps);

    for (let i = 0; i < units.length; i++) {
      const unit = units[i];
      const controller = new AbortController();
      const onCancel = () => controller.abort();
      this.signal?.addEventListener('abort', onCancel, { once: true });
      if (this.cancelled) controller.abort();

      let failure: string | null = null;
      try {
        const outcomes = await Promise.all(
          unit.map((step) => this.runStep(pipeline, step, controller)),
        );
        failure = outcomes.find((o): o is string => typeof o === 'string') ?? null;
        if (failure === null && controller.signal.aborted) failure = 'cancelled';
      } finally {
        this.signal?.removeEventListener('abort', onCancel);
      }

      if (failure !== null) {
        for (const rest of units.slice(i + 1)) {
          for (const step of rest) this.setStep(pipeline, step, 'cancelled');
        }
        return failure;
      }
    }
    return null;
  }

  /**
   * Run one step. Resolves to the failure message when the step failed,
   * otherwise null. Aborts the unit's controller on failure so siblings stop.
   */
  private async runStep(
    pipeline: CompiledPipeline,
    step: Step,
    controller: AbortController,
  ): Promise<string | null> {
    if (controller.signal.aborted) {
      this.setStep(pipeline, step, 'cancelled');
      return null;
    }

    const decision = evaluateTrigger(step.when, { ...this.event, priorStatus: 'success' });
    if (!decision.eligible) {
      this.setStep(pipeline, step, 'skipped', { error: decision.diagnostic });
      return null;
    }

    this.setStep(pipeline, step, 'running');

    let exitCode: number;
    try {
      const resolved = await this.resolveStep(pipeline, step);
      exitCode = await this.options.backend.runStep(resolved, {
        signal: controller.signal,
        onOutput: (line, stream) =>
          this.options.listener?.({
            kind: 'output',
            pipeline: pipeline.name,
            step: step.name,
            stream,
            line,
          }),
      });
    } catch (err) {
      if (controller.signal.aborted) {
        this.setStep(pipeline, step, 'cancelled');
        return null;
      }
      const detail = err instanceof Error ? err.message : String(err);
      const error = new StepExecutionError(
        pipeline.name,
        step.name,
        null,
        `Step '${step.name}' of pipeline '${pipeline.name}' could not run: ${detail}`,
      );
      this.setStep(pipeline, step, 'failed', { error: error.message });
      controller.abort();
      return error.message;
    }

    if (exitCode === 0) {
      this.setStep(pipeline, step, 'succeeded', { exitCode });
      return null;
    }
    if (controller.signal.aborted) {
      this.setStep(pipeline, step, 'cancelled', { exitCode });
      return null;
    }

    const error = new StepExecutionError(pipeline.name, step.name, exitCode);
    this.setStep(pipeline, step, 'failed', { exitCode, error: error.message });
    controller.abort();
    return error.message;
  }

  /**
   * Build the environment a step runs with. Secret values are fetched here
   * and only handed to the backend.
   */
  private async resolveStep(pipeline: CompiledPipeline, step: Step): Promise<ResolvedStep> {
    const environment: Record<string, string> = {
      CI: 'true',
      CI_PIPELINE_EVENT: this.event.type,
      CI_COMMIT_REF: this.event.ref,
      CI_COMMIT_BRANCH: eventBranch(this.event) ?? '',
      CI_COMMIT_TAG: eventTag(this.event) ?? '',
      CI_COMMIT_SHA: this.event.commit ?? '',
      CI_WORKFLOW_NAME: pipeline.name,
      CI_STEP_NAME: step.name,
      CI_SYSTEM_PLATFORM: pipeline.platform,
    };

    for (const [key, value] of Object.entries(step.environment)) {
      environment[key] =
        typeof value === 'string' ? value : await this.options.secrets.resolve(value.fromSecret);
    }
    for (const binding of step.secrets) {
      environment[binding.target] = await this.options.secrets.resolve(binding.source);
    }

    return {
      pipeline: pipeline.name,
      name: step.name,
      image: step.image,
      platform: pipeline.platform,
      commands: step.commands,
      environment,
    };
  }

  private skip(pipeline: CompiledPipeline, detail: { blockedBy?: string; reason?: string }): void {
    for (const step of pipeline.steps) {
      if (this.findStep(pipeline, step).status === 'pending') this.setStep(pipeline, step, 'skipped');
    }
    this.setState(pipeline, 'skipped', detail);
  }

  private setState(
    pipeline: CompiledPipeline,
    state: PipelineState,
    detail: { blockedBy?: string; reason?: string } = {},
  ): void {
    const report = this.reports[pipeline.index];
    const at = new Date();
    report.state = state;
    if (detail.blockedBy !== undefined) report.blockedBy = detail.blockedBy;
    if (detail.reason !== undefined) report.reason = detail.reason;
    if (state === 'running') report.startedAt = at;
    if (TERMINAL_PIPELINE_STATES.has(state)) report.finishedAt = at;

    this.options.listener?.({ kind: 'pipeline', pipeline: pipeline.name, state, at, ...detail });
  }

  private setStep(
    pipeline: CompiledPipeline,
    step: Step,
    status: StepStatus,
    detail: { exitCode?: number; error?: string } = {},
  ): void {
    const report = this.findStep(pipeline, step);
    const at = new Date();
    report.status = status;
    if (detail.exitCode !== undefined) report.exitCode = detail.exitCode;
    if (detail.error !== undefined) report.error = detail.error;
    if (status === 'running') report.startedAt = at;
    else if (report.startedAt) report.finishedAt = at;

    this.options.listener?.({
      kind: 'step',
      pipeline: pipeline.name,
      step: step.name,
      status,
      at,
      ...detail,
    });
  }

  private findStep(pipeline: CompiledPipeline, step: Step): StepReport {
    const report = this.reports[pipeline.index].steps.find((s) => s.name === step.name);
    if (!report) {
      throw new Error(`Step '${step.name}' not found in pipeline '${pipeline.name}'`);
    }
    return report;
  }
}
