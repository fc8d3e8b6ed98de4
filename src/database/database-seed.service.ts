import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { Project } from './entities/project.entity';
import { PROJECT_SEED } from './seed/project.seed';

/**
 * Runs seed data on app startup. Inserts example projects only if the
 * projects table is empty and SEED_DATABASE is not 'false'.
 */
@Injectable()
export class DatabaseSeedService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseSeedService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly config: ConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    if (this.config.get<string>('SEED_DATABASE') === 'false') return;
    await this.seedProjectsIfEmpty();
  }

  private async seedProjectsIfEmpty(): Promise<void> {
    const repo = this.dataSource.getRepository(Project);
    const count = await repo.count();
    if (count > 0) return;

    for (const row of PROJECT_SEED) {
      await repo.save(repo.create(row));
    }
    this.logger.log(`Seeded ${PROJECT_SEED.length} projects`);
  }
}
