import { ApiPropertyOptional } from '@nestjs/swagger';
import type { ProjectConfig } from '../database/entities';

export class UpdateProjectDto {
  @ApiPropertyOptional({ example: 'ansible-later' })
  name?: string;

  @ApiPropertyOptional({ example: 'example/ansible-later' })
  repository?: string;

  @ApiPropertyOptional({ example: 'main' })
  defaultBranch?: string;

  @ApiPropertyOptional({
    description: 'Pipeline templates. Validated by compiling them; stored in projects.config (jsonb).',
  })
  config?: ProjectConfig;
}
