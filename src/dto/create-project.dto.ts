import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import type { ProjectConfig } from '../database/entities';

export class CreateProjectDto {
  @ApiProperty({ example: 'ansible-later' })
  name!: string;

  @ApiProperty({
    example: 'https://github.com/example/ansible-later',
    description: 'Clone URL or owner/name; matched against git webhook payloads',
  })
  repository!: string;

  @ApiPropertyOptional({ example: 'main', description: "Default: 'main'" })
  defaultBranch?: string;

  @ApiProperty({
    description:
      'Pipeline templates. Validated by compiling them; stored in projects.config (jsonb).',
    example: {
      pipelines: [
        {
          name: 'test',
          matrix: [{ name: 'PYTHON_VERSION', values: ['3.11', '3.12'] }],
          steps: [
            { name: 'pytest', image: 'python:${PYTHON_VERSION}', commands: ['pytest'] },
          ],
          when: [{ event: 'push', branch: '${CI_REPO_DEFAULT_BRANCH}' }],
        },
      ],
    },
  })
  config!: ProjectConfig;
}
