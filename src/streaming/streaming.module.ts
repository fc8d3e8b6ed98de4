import { Module } from '@nestjs/common';
import { BuildEventsService } from './build-events.service';
import { SSEController } from './sse.controller';

@Module({
  controllers: [SSEController],
  providers: [BuildEventsService],
  exports: [BuildEventsService],
})
export class StreamingModule {}
