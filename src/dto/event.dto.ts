import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { BUILD_STATUSES, EVENT_TYPES, type BuildStatus, type EventType } from '../engine';

/**
 * Event a build is triggered for. Validated against the engine's event
 * schema; a malformed event is answered with 422.
 */
export class EventDto {
  @ApiProperty({ enum: [...EVENT_TYPES], example: 'push' })
  type!: EventType;

  @ApiProperty({ example: 'refs/heads/main', description: 'Full git ref' })
  ref!: string;

  @ApiPropertyOptional({ description: 'Derived from refs/heads/* when absent' })
  branch?: string;

  @ApiPropertyOptional({ example: 'abc123' })
  commit?: string;

  @ApiPropertyOptional()
  message?: string;

  @ApiPropertyOptional()
  actor?: string;

  @ApiPropertyOptional({
    enum: [...BUILD_STATUSES],
    description: 'Defaults to the status of the last finished build of the branch',
  })
  priorStatus?: BuildStatus;
}

export class ProjectEventDto {
  @ApiPropertyOptional({
    type: EventDto,
    description: 'Event to substitute into templates; omitted means empty event variables',
  })
  event?: EventDto;
}
