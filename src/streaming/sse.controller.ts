import { Controller, Param, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { BuildEventsService, type BuildStreamEvent } from './build-events.service';

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly buildEvents: BuildEventsService) {}

  /**
   * SSE endpoint for one build.
   * GET /stream/builds/:id - pipeline/step transitions and output lines as they happen.
   */
  @Sse('builds/:id')
  @ApiOperation({ summary: 'SSE: real-time events for a build' })
  streamBuild(@Param('id') id: string): Observable<{ data: BuildStreamEvent }> {
    return this.buildEvents.getStreamForBuild(id).pipe(map((ev) => ({ data: ev })));
  }

  /**
   * SSE endpoint for every build.
   */
  @Sse('builds')
  @ApiOperation({ summary: 'SSE: real-time events for all builds' })
  streamAllBuilds(): Observable<{ data: BuildStreamEvent }> {
    return this.buildEvents.getStream().pipe(map((ev) => ({ data: ev })));
  }
}
