import { ApiProperty } from '@nestjs/swagger';
import { EventDto } from './event.dto';

export class TriggerBuildDto {
  @ApiProperty({ description: 'Project id to build' })
  projectId!: string;

  @ApiProperty({
    type: EventDto,
    example: { type: 'manual', ref: 'refs/heads/main', actor: 'octocat' },
  })
  event!: EventDto;
}
