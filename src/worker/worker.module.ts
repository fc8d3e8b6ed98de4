import { Module } from '@nestjs/common';
import { ConcurrencyLimiter } from '../engine';
import { DatabaseModule } from '../database/database.module';
import { ExecutionModule } from '../execution/execution.module';
import { StreamingModule } from '../streaming/streaming.module';
import { BuildRunnerService } from './build-runner.service';

@Module({
  imports: [DatabaseModule, ExecutionModule, StreamingModule],
  providers: [
    BuildRunnerService,
    // One limiter per process: concurrency groups hold across builds
    { provide: ConcurrencyLimiter, useValue: new ConcurrencyLimiter() },
  ],
  exports: [BuildRunnerService],
})
export class WorkerModule {}
