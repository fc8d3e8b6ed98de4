import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ConcurrencyLimiter,
  ConfigError,
  ExecutionBackend,
  Scheduler,
  SecretStore,
  eventBranch,
  type BuildReport,
  type CompiledGraph,
  type EventDescriptor,
  type SchedulerEvent,
} from '../engine';
import { BuildHistoryStore, type BuildRecord } from '../database/build-history.store';
import type { BuildRecordStatus } from '../database/entities';
import { BuildEventsService } from '../streaming/build-events.service';
import { compileProject, type CompilableProject } from '../common/compile-project';

export interface BuildTarget extends CompilableProject {
  id: string;
}

export interface StartedBuild {
  build: BuildRecord;
  /** Settles once the build is finished and recorded; null when it did not run to the end */
  done: Promise<BuildReport | null>;
}

interface RunState {
  id: string;
  /** Concurrency groups are shared between builds of the same project */
  projectId: string;
  controller: AbortController;
  /** Progress writes, applied in event order */
  writes: Promise<void>;
  writeFailed: boolean;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** MAX_PARALLEL_PIPELINES: a positive integer, anything else means no cap. */
export function parseMaxParallel(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Runs builds in-process:
 * - fills the event's prior status from the branch's last finished build
 * - compiles the project's templates (a ConfigError records the build as 'error')
 * - schedules the graph with the process-wide concurrency limiter
 * - records every pipeline/step transition and streams it to SSE subscribers
 */
@Injectable()
export class BuildRunnerService implements OnModuleDestroy {
  private readonly logger = new Logger(BuildRunnerService.name);
  private readonly active = new Map<string, { controller: AbortController; done: Promise<unknown> }>();
  private readonly maxParallelPipelines: number | undefined;

  constructor(
    private readonly backend: ExecutionBackend,
    private readonly secrets: SecretStore,
    private readonly history: BuildHistoryStore,
    private readonly events: BuildEventsService,
    private readonly limiter: ConcurrencyLimiter,
    config: ConfigService,
  ) {
    this.maxParallelPipelines = parseMaxParallel(config.get<string>('MAX_PARALLEL_PIPELINES'));
  }

  isRunning(buildId: string): boolean {
    return this.active.has(buildId);
  }

  async start(project: BuildTarget, event: EventDescriptor): Promise<StartedBuild> {
    const branch = eventBranch(event) ?? null;
    const priorStatus =
      event.priorStatus === undefined && branch !== null
        ? await this.history.lastStatus(project.id, branch)
        : undefined;
    const resolved: EventDescriptor = priorStatus ? { ...event, priorStatus } : event;

    const build = await this.history.createBuild(project.id, resolved, branch);

    let graph: CompiledGraph;
    try {
      graph = compileProject(project, resolved);
    } catch (err) {
      const message = errorMessage(err);
      if (err instanceof ConfigError) {
        this.logger.warn(`Build ${build.id} not scheduled: ${message}`);
      } else {
        this.logger.error(`Build ${build.id} could not be compiled: ${message}`);
      }
      await this.history.finishBuild(build.id, 'error', message);
      this.publishFinished(build.id, 'error', message);
      if (!(err instanceof ConfigError)) throw err;
      return { build: { ...build, status: 'error', error: message }, done: Promise.resolve(null) };
    }

    try {
      await this.history.recordGraph(build.id, graph);
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`Build ${build.id} could not be recorded: ${message}`);
      await this.history.finishBuild(build.id, 'error', message).catch((writeErr: unknown) => {
        this.logger.error(`Could not record the end of build ${build.id}: ${errorMessage(writeErr)}`);
      });
      this.publishFinished(build.id, 'error', message);
      throw err;
    }

    const run: RunState = {
      id: build.id,
      projectId: project.id,
      controller: new AbortController(),
      writes: Promise.resolve(),
      writeFailed: false,
    };
    const done = this.execute(run, graph, resolved);
    this.active.set(build.id, { controller: run.controller, done });
    this.logger.log(
      `Build ${build.id} started for ${resolved.type} ${resolved.ref} (${graph.pipelines.length} pipelines)`,
    );

    return { build: { ...build, status: 'running' }, done };
  }

  /** Abort a running build. Returns false when the build is not running here. */
  cancel(buildId: string): boolean {
    const run = this.active.get(buildId);
    if (!run) return false;
    this.logger.log(`Cancelling build ${buildId}`);
    run.controller.abort();
    return true;
  }

  async onModuleDestroy(): Promise<void> {
    const pending = [...this.active.values()].map((run) => {
      run.controller.abort();
      return run.done;
    });
    if (pending.length > 0) {
      await Promise.race([Promise.allSettled(pending), sleep(2000)]);
    }
  }

  private async execute(
    run: RunState,
    graph: CompiledGraph,
    event: EventDescriptor,
  ): Promise<BuildReport | null> {
    const scheduler = new Scheduler({
      backend: this.backend,
      secrets: this.secrets,
      limiter: this.limiter,
      maxParallelPipelines: this.maxParallelPipelines,
      listener: (ev) => this.onSchedulerEvent(run, ev),
    });

    try {
      const report = await scheduler.run(graph, event, {
        signal: run.controller.signal,
        scope: run.projectId,
      });
      await run.writes;

      let status: BuildRecordStatus = run.controller.signal.aborted ? 'cancelled' : report.status;
      let error: string | undefined;
      if (run.writeFailed) {
        status = 'error';
        error = 'Build progress could not be recorded';
      }
      await this.history.finishBuild(run.id, status, error);
      this.publishFinished(run.id, status, error);
      this.logger.log(`Build ${run.id} finished: ${status}`);
      return report;
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`Build ${run.id} failed: ${message}`, err instanceof Error ? err.stack : undefined);
      await this.history.finishBuild(run.id, 'error', message).catch((writeErr: unknown) => {
        this.logger.error(`Could not record the end of build ${run.id}: ${errorMessage(writeErr)}`);
      });
      this.publishFinished(run.id, 'error', message);
      return null;
    } finally {
      this.active.delete(run.id);
    }
  }

  private onSchedulerEvent(run: RunState, event: SchedulerEvent): void {
    this.events.publish({ buildId: run.id, ...event });

    switch (event.kind) {
      case 'pipeline': {
        const { pipeline, state, blockedBy, reason, at } = event;
        this.record(run, () =>
          this.history.updatePipeline(run.id, pipeline, { state, blockedBy, reason, at }),
        );
        break;
      }
      case 'step': {
        const { pipeline, step, status, exitCode, error, at } = event;
        this.record(run, () =>
          this.history.updateStep(run.id, pipeline, step, { status, exitCode, error, at }),
        );
        break;
      }
      case 'output':
        // streamed only
        break;
    }
  }

  private record(run: RunState, write: () => Promise<void>): void {
    run.writes = run.writes.then(write).catch((err: unknown) => {
      run.writeFailed = true;
      this.logger.error(`Could not record progress of build ${run.id}: ${errorMessage(err)}`);
    });
  }

  private publishFinished(buildId: string, status: BuildRecordStatus, error?: string): void {
    this.events.publish({ buildId, kind: 'build', status, error, at: new Date() });
  }
}
