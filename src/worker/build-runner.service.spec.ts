import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  ConcurrencyLimiter,
  ExecutionBackend,
  SecretStore,
  type BuildStatus,
  type CompiledGraph,
  type EventDescriptor,
  type PipelineTemplate,
  type ResolvedStep,
  type StepRunContext,
} from '../engine';
import {
  BuildHistoryStore,
  type BuildRecord,
  type PipelineUpdate,
  type StepUpdate,
} from '../database/build-history.store';
import type { BuildRecordStatus } from '../database/entities';
import { BuildEventsService, type BuildStreamEvent } from '../streaming/build-events.service';
import { BuildRunnerService, parseMaxParallel, type BuildTarget } from './build-runner.service';

type Behavior = (step: ResolvedStep, context: StepRunContext) => number | Promise<number>;

class FakeBackend extends ExecutionBackend {
  readonly calls: ResolvedStep[] = [];
  behavior: Behavior = () => 0;

  async runStep(step: ResolvedStep, context: StepRunContext): Promise<number> {
    this.calls.push(step);
    context.onOutput(`running ${step.name}`, 'stdout');
    return this.behavior(step, context);
  }
}

class FakeSecrets extends SecretStore {
  async resolve(name: string): Promise<string> {
    throw new Error(`Unknown secret '${name}'`);
  }
}

class MemoryHistoryStore extends BuildHistoryStore {
  readonly events: EventDescriptor[] = [];
  readonly finished = new Map<string, { status: BuildRecordStatus; error?: string }>();
  readonly pipelineUpdates: string[] = [];
  readonly stepUpdates: string[] = [];
  graphs = 0;
  last: BuildStatus | undefined;
  private nextId = 1;

  async createBuild(projectId: string, event: EventDescriptor): Promise<BuildRecord> {
    this.events.push(event);
    return { id: `build-${this.nextId++}`, projectId, status: 'pending' };
  }

  async recordGraph(_buildId: string, _graph: CompiledGraph): Promise<void> {
    this.graphs++;
  }

  async updatePipeline(_buildId: string, pipeline: string, update: PipelineUpdate): Promise<void> {
    this.pipelineUpdates.push(`${pipeline}:${update.state}`);
  }

  async updateStep(
    _buildId: string,
    pipeline: string,
    step: string,
    update: StepUpdate,
  ): Promise<void> {
    this.stepUpdates.push(`${pipeline}/${step}:${update.status}`);
  }

  async finishBuild(buildId: string, status: BuildRecordStatus, error?: string): Promise<void> {
    this.finished.set(buildId, { status, error });
  }

  async lastStatus(): Promise<BuildStatus | undefined> {
    return this.last;
  }
}

function project(pipelines: unknown[]): BuildTarget {
  return {
    id: 'project-1',
    repository: 'https://github.com/example/widgets.git',
    default_branch: 'main',
    config: { pipelines },
  };
}

function singleStep(name: string, extra: Partial<PipelineTemplate> = {}): PipelineTemplate {
  return {
    name,
    steps: [{ name: 'run', image: 'alpine:3.19', commands: [`echo ${name}`] }],
    ...extra,
  };
}

const pushMain: EventDescriptor = { type: 'push', ref: 'refs/heads/main' };

describe('BuildRunnerService', () => {
  let runner: BuildRunnerService;
  let backend: FakeBackend;
  let history: MemoryHistoryStore;
  let streamed: BuildStreamEvent[];

  beforeEach(async () => {
    backend = new FakeBackend();
    history = new MemoryHistoryStore();
    streamed = [];

    const moduleRef = await Test.createTestingModule({
      providers: [
        BuildRunnerService,
        BuildEventsService,
        { provide: ExecutionBackend, useValue: backend },
        { provide: SecretStore, useValue: new FakeSecrets() },
        { provide: BuildHistoryStore, useValue: history },
        { provide: ConcurrencyLimiter, useValue: new ConcurrencyLimiter() },
        { provide: ConfigService, useValue: new ConfigService({ MAX_PARALLEL_PIPELINES: '2' }) },
      ],
    }).compile();

    runner = moduleRef.get(BuildRunnerService);
    moduleRef
      .get(BuildEventsService)
      .getStream()
      .subscribe((event) => streamed.push(event));
  });

  it('runs a build and records every transition', async () => {
    const { build, done } = await runner.start(
      project([singleStep('lint'), singleStep('test', { dependsOn: ['lint'] })]),
      pushMain,
    );

    expect(build).toEqual({ id: 'build-1', projectId: 'project-1', status: 'running' });
    expect(runner.isRunning('build-1')).toBe(true);

    const report = await done;

    expect(report?.status).toBe('success');
    expect(history.graphs).toBe(1);
    expect(history.finished.get('build-1')).toEqual({ status: 'success', error: undefined });
    expect(history.pipelineUpdates).toEqual([
      'lint:eligible',
      'lint:running',
      'lint:succeeded',
      'test:eligible',
      'test:running',
      'test:succeeded',
    ]);
    expect(history.stepUpdates).toEqual([
      'lint/run:running',
      'lint/run:succeeded',
      'test/run:running',
      'test/run:succeeded',
    ]);
    expect(runner.isRunning('build-1')).toBe(false);
  });

  it('streams scheduler events and a final build event', async () => {
    const { done } = await runner.start(project([singleStep('lint')]), pushMain);
    await done;

    expect(streamed.every((event) => event.buildId === 'build-1')).toBe(true);
    expect(streamed).toContainEqual(
      expect.objectContaining({ kind: 'output', pipeline: 'lint', step: 'run', line: 'running run' }),
    );
    expect(streamed[streamed.length - 1]).toMatchObject({ kind: 'build', status: 'success' });
  });

  it('records a build with invalid templates as error without running it', async () => {
    const { build, done } = await runner.start(
      project([{ name: 'lint', steps: [] }]),
      pushMain,
    );

    const message = '[0].steps: a pipeline needs at least one step';
    expect(build).toEqual({ id: 'build-1', projectId: 'project-1', status: 'error', error: message });
    await expect(done).resolves.toBeNull();
    expect(history.graphs).toBe(0);
    expect(history.finished.get('build-1')).toEqual({ status: 'error', error: message });
    expect(streamed).toEqual([
      expect.objectContaining({ buildId: 'build-1', kind: 'build', status: 'error', error: message }),
    ]);
    expect(backend.calls).toHaveLength(0);
  });

  it('fills the prior status from the branch history', async () => {
    history.last = 'failure';
    const { done } = await runner.start(
      project([
        singleStep('recover', { when: [{ status: 'failure' }] }),
        singleStep('report', { when: [{ status: 'success' }] }),
      ]),
      pushMain,
    );
    const report = await done;

    expect(history.events[0]).toEqual({ ...pushMain, priorStatus: 'failure' });
    expect(report?.pipelines.map((p) => p.state)).toEqual(['succeeded', 'skipped']);
  });

  it('keeps an explicit prior status', async () => {
    history.last = 'failure';
    const { done } = await runner.start(project([singleStep('lint')]), {
      ...pushMain,
      priorStatus: 'success',
    });
    await done;

    expect(history.events[0].priorStatus).toBe('success');
  });

  it('records a failed step as a failed build', async () => {
    backend.behavior = () => 3;
    const { done } = await runner.start(project([singleStep('lint')]), pushMain);
    await done;

    expect(history.finished.get('build-1')?.status).toBe('failure');
    expect(history.stepUpdates).toEqual(['lint/run:running', 'lint/run:failed']);
  });

  it('cancels a running build', async () => {
    let markStarted = () => {};
    const stepStarted = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    backend.behavior = (_step, context) => {
      markStarted();
      return new Promise((resolve) =>
        context.signal.addEventListener('abort', () => resolve(137), { once: true }),
      );
    };

    const { build, done } = await runner.start(project([singleStep('deploy')]), pushMain);
    await stepStarted;

    expect(runner.cancel(build.id)).toBe(true);
    const report = await done;

    expect(report?.pipelines[0]).toMatchObject({ state: 'failed', reason: 'cancelled' });
    expect(history.finished.get('build-1')?.status).toBe('cancelled');
    expect(runner.cancel(build.id)).toBe(false);
  });

  it('finishes the build as error when its graph cannot be recorded', async () => {
    history.recordGraph = () => Promise.reject(new Error('db down'));

    await expect(runner.start(project([singleStep('lint')]), pushMain)).rejects.toThrow('db down');

    expect(history.finished.get('build-1')).toEqual({ status: 'error', error: 'db down' });
    expect(streamed).toEqual([
      expect.objectContaining({ buildId: 'build-1', kind: 'build', status: 'error', error: 'db down' }),
    ]);
    expect(runner.isRunning('build-1')).toBe(false);
    expect(backend.calls).toHaveLength(0);
  });

  it('records the steps of a skipped pipeline as skipped', async () => {
    backend.behavior = (step) => (step.pipeline === 'lint' ? 1 : 0);
    const { done } = await runner.start(
      project([singleStep('lint'), singleStep('test', { dependsOn: ['lint'] })]),
      pushMain,
    );
    await done;

    expect(history.pipelineUpdates).toEqual(['lint:eligible', 'lint:running', 'lint:failed', 'test:skipped']);
    expect(history.stepUpdates).toEqual(['lint/run:running', 'lint/run:failed', 'test/run:skipped']);
  });

  it('marks the build error when progress cannot be recorded', async () => {
    history.updateStep = () => Promise.reject(new Error('connection lost'));
    const { done } = await runner.start(project([singleStep('lint')]), pushMain);
    await done;

    expect(history.finished.get('build-1')).toEqual({
      status: 'error',
      error: 'Build progress could not be recorded',
    });
  });
});

describe('parseMaxParallel', () => {
  it.each<[string | undefined, number | undefined]>([
    [undefined, undefined],
    ['', undefined],
    ['4', 4],
    ['0', undefined],
    ['-1', undefined],
    ['2.5', undefined],
    ['many', undefined],
  ])('parses %p as %p', (value, expected) => {
    expect(parseMaxParallel(value)).toBe(expected);
  });
});
