import { BadRequestException, Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  evaluate,
  parseEvent,
  repositorySlug,
  type ConcurrencyLimit,
  type EligibilityReport,
} from '../../engine';
import { Project, type ProjectConfig } from '../../database/entities';
import { compileProject } from '../../common/compile-project';
import type { CreateProjectDto } from '../../dto/create-project.dto';
import type { UpdateProjectDto } from '../../dto/update-project.dto';

export interface CompiledPipelineSummary {
  name: string;
  templateName: string;
  platform: string;
  layer: number;
  dependsOn: string[];
  steps: { name: string; image: string; group?: string }[];
  concurrency?: ConcurrencyLimit;
  matrix: Record<string, string>;
}

export interface CompileSummary {
  pipelines: CompiledPipelineSummary[];
  /** Pipeline names per topological layer */
  layers: string[][];
}

function checkConfig(config: ProjectConfig | undefined): ProjectConfig {
  if (!config || !Array.isArray(config.pipelines)) {
    throw new BadRequestException('config.pipelines must be an array of pipeline templates');
  }
  return config;
}

/**
 * Projects and their templates. Templates are compiled on every save so a
 * project never holds templates that cannot build.
 */
@Injectable()
export class ProjectsService {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(Project);
  }

  async findAll(): Promise<Project[]> {
    return this.repo.find({ order: { created_at: 'DESC' } });
  }

  async findOne(id: string): Promise<Project | null> {
    return this.repo.findOne({ where: { id } });
  }

  /** Match by owner/name so clone URLs, scp addresses and slugs all resolve. */
  async findByRepository(repository: string): Promise<Project | null> {
    const slug = repositorySlug(repository);
    const projects = await this.repo.find({ order: { created_at: 'ASC' } });
    return projects.find((p) => repositorySlug(p.repository) === slug) ?? null;
  }

  async create(dto: CreateProjectDto): Promise<Project> {
    if (!dto.name || !dto.repository) {
      throw new BadRequestException('name and repository are required');
    }
    const project = this.repo.create({
      name: dto.name,
      repository: dto.repository,
      default_branch: dto.defaultBranch ?? 'main',
      config: checkConfig(dto.config),
    });
    compileProject(project);
    return this.repo.save(project);
  }

  async update(project: Project, dto: UpdateProjectDto): Promise<Project> {
    if (dto.name !== undefined) project.name = dto.name;
    if (dto.repository !== undefined) project.repository = dto.repository;
    if (dto.defaultBranch !== undefined) project.default_branch = dto.defaultBranch;
    if (dto.config !== undefined) project.config = checkConfig(dto.config);
    compileProject(project);
    return this.repo.save(project);
  }

  async remove(id: string): Promise<boolean> {
    const result = await this.repo.delete(id);
    return result.affected !== 0;
  }

  /** Compile for an optional event; the raw event is validated first. */
  compile(project: Project, rawEvent?: unknown): CompileSummary {
    const event = rawEvent === undefined ? undefined : parseEvent(rawEvent);
    const graph = compileProject(project, event);
    const names = graph.pipelines.map((p) => p.name);

    return {
      pipelines: graph.pipelines.map((p) => ({
        name: p.name,
        templateName: p.templateName,
        platform: p.platform,
        layer: p.layer,
        dependsOn: p.dependencies.map((i) => names[i]),
        steps: p.steps.map((s) => ({ name: s.name, image: s.image, group: s.group })),
        concurrency: p.concurrency,
        matrix: p.matrix,
      })),
      layers: graph.layers.map((layer) => layer.map((i) => names[i])),
    };
  }

  /** Which pipelines an event would make eligible by trigger alone. */
  evaluate(project: Project, rawEvent: unknown): EligibilityReport {
    const event = parseEvent(rawEvent);
    return evaluate(compileProject(project, event), event);
  }
}
