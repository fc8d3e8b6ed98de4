import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Project, Build, BuildPipeline, BuildStep } from './entities';
import { DatabaseSeedService } from './database-seed.service';
import { BuildHistoryStore } from './build-history.store';
import { TypeOrmBuildHistoryStore } from './typeorm-build-history.store';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService) => ({
        type: 'postgres',
        url: config.getOrThrow<string>('DATABASE_URL'),
        entities: [Project, Build, BuildPipeline, BuildStep],
        // Only one process should synchronize the database (see SYNC_DATABASE)
        synchronize: config.get('SYNC_DATABASE') !== 'false',
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [DatabaseSeedService, { provide: BuildHistoryStore, useClass: TypeOrmBuildHistoryStore }],
  exports: [BuildHistoryStore],
})
export class DatabaseModule {}
