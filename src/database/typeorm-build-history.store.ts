import { Injectable } from '@nestjs/common';
import { DataSource, In } from 'typeorm';
import {
  TERMINAL_PIPELINE_STATES,
  type BuildStatus,
  type CompiledGraph,
  type EventDescriptor,
} from '../engine';
import {
  BuildHistoryStore,
  type BuildRecord,
  type PipelineUpdate,
  type StepUpdate,
} from './build-history.store';
import { Build, BuildPipeline, BuildStep, type BuildRecordStatus } from './entities';

const FINISHED_STEP_STATUSES = new Set(['succeeded', 'failed', 'skipped', 'cancelled']);

/**
 * Build history in PostgreSQL. One row per build, pipeline and step;
 * progress updates address pipelines and steps by name within a build.
 */
@Injectable()
export class TypeOrmBuildHistoryStore extends BuildHistoryStore {
  constructor(private readonly dataSource: DataSource) {
    super();
  }

  async createBuild(
    projectId: string,
    event: EventDescriptor,
    branch: string | null,
  ): Promise<BuildRecord> {
    const repo = this.dataSource.getRepository(Build);
    const build = await repo.save(
      repo.create({ project_id: projectId, event, branch, status: 'pending' }),
    );
    return { id: build.id, projectId, status: build.status };
  }

  async recordGraph(buildId: string, graph: CompiledGraph): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      for (const pipeline of graph.pipelines) {
        const row = await manager.save(
          manager.create(BuildPipeline, {
            build_id: buildId,
            name: pipeline.name,
            position: pipeline.index,
            layer: pipeline.layer,
            state: 'pending',
          }),
        );
        await manager.save(
          pipeline.steps.map((step, position) =>
            manager.create(BuildStep, {
              build_id: buildId,
              build_pipeline_id: row.id,
              pipeline_name: pipeline.name,
              name: step.name,
              position,
              status: 'pending',
            }),
          ),
        );
      }
      await manager.update(Build, { id: buildId }, { status: 'running', started_at: new Date() });
    });
  }

  async updatePipeline(buildId: string, pipeline: string, update: PipelineUpdate): Promise<void> {
    await this.dataSource.getRepository(BuildPipeline).update(
      { build_id: buildId, name: pipeline },
      {
        state: update.state,
        ...(update.blockedBy !== undefined ? { blocked_by: update.blockedBy } : {}),
        ...(update.reason !== undefined ? { reason: update.reason } : {}),
        ...(update.state === 'running' ? { started_at: update.at } : {}),
        ...(TERMINAL_PIPELINE_STATES.has(update.state) ? { completed_at: update.at } : {}),
      },
    );
  }

  async updateStep(
    buildId: string,
    pipeline: string,
    step: string,
    update: StepUpdate,
  ): Promise<void> {
    await this.dataSource.getRepository(BuildStep).update(
      { build_id: buildId, pipeline_name: pipeline, name: step },
      {
        status: update.status,
        ...(update.exitCode !== undefined ? { exit_code: update.exitCode } : {}),
        ...(update.error !== undefined ? { error: update.error } : {}),
        ...(update.status === 'running' ? { started_at: update.at } : {}),
        ...(FINISHED_STEP_STATUSES.has(update.status) ? { completed_at: update.at } : {}),
      },
    );
  }

  async finishBuild(buildId: string, status: BuildRecordStatus, error?: string): Promise<void> {
    await this.dataSource
      .getRepository(Build)
      .update({ id: buildId }, { status, error: error ?? null, completed_at: new Date() });
  }

  async lastStatus(projectId: string, branch: string): Promise<BuildStatus | undefined> {
    const build = await this.dataSource.getRepository(Build).findOne({
      where: { project_id: projectId, branch, status: In<BuildRecordStatus>(['success', 'failure']) },
      order: { created_at: 'DESC' },
    });
    if (!build) return undefined;
    const status = build.status;
    return status === 'success' || status === 'failure' ? status : undefined;
  }
}
