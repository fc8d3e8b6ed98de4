import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { parseEvent } from '../../engine';
import { Build } from '../../database/entities';
import type { BuildRecord } from '../../database/build-history.store';
import { ProjectsService } from '../projects/projects.service';
import { BuildRunnerService } from '../../worker/build-runner.service';

/**
 * trigger builds, list them, read results, cancel running ones.
 */
@Injectable()
export class BuildsService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly projectsService: ProjectsService,
    private readonly runner: BuildRunnerService,
  ) {}

  async findAll(projectId?: string): Promise<Build[]> {
    return this.dataSource.getRepository(Build).find({
      where: projectId ? { project_id: projectId } : undefined,
      order: { created_at: 'DESC' },
      take: 100,
    });
  }

  // Build with pipeline and step results, in graph order
  async findOne(buildId: string): Promise<Build | null> {
    return this.dataSource.getRepository(Build).findOne({
      where: { id: buildId },
      relations: { pipelines: { steps: true } },
      order: { pipelines: { position: 'ASC', steps: { position: 'ASC' } } },
    });
  }

  /**
   * Start a build of a project for an event. The raw event is validated
   * here; the build itself runs in the background.
   */
  async trigger(projectId: string, rawEvent: unknown): Promise<BuildRecord> {
    const event = parseEvent(rawEvent);
    const project = await this.projectsService.findOne(projectId);
    if (!project) throw new NotFoundException('Project not found');

    const { build } = await this.runner.start(project, event);
    return build;
  }

  async cancel(buildId: string): Promise<{ id: string; cancelled: true }> {
    if (this.runner.cancel(buildId)) return { id: buildId, cancelled: true };

    const build = await this.dataSource.getRepository(Build).findOne({ where: { id: buildId } });
    if (!build) throw new NotFoundException('Build not found');
    throw new ConflictException(`Build is not running (status: ${build.status})`);
  }
}
