import { Module } from '@nestjs/common';
import { BuildsController } from './builds.controller';
import { BuildsService } from './builds.service';
import { ProjectsModule } from '../projects/projects.module';
import { WorkerModule } from '../../worker/worker.module';

@Module({
  imports: [ProjectsModule, WorkerModule],
  controllers: [BuildsController],
  providers: [BuildsService],
  exports: [BuildsService],
})
export class BuildsModule {}
