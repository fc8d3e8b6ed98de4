import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { DatabaseModule } from './database/database.module';
import { ExecutionModule } from './execution/execution.module';
import { ProjectsModule } from './api/projects/projects.module';
import { BuildsModule } from './api/builds/builds.module';
import { WebhooksModule } from './api/webhooks/webhooks.module';
import { StreamingModule } from './streaming/streaming.module';
import { WorkerModule } from './worker/worker.module';
import { EngineExceptionFilter } from './common/engine-exception.filter';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    DatabaseModule,
    ExecutionModule,
    StreamingModule,
    WorkerModule,
    ProjectsModule,
    BuildsModule,
    WebhooksModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: EngineExceptionFilter }],
})
export class AppModule {}
