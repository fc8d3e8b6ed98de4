import { Controller, Post, Body, BadRequestException, NotFoundException } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { ProjectsService } from '../projects/projects.service';
import { BuildsService } from '../builds/builds.service';
import { getRepoFromPayload, toEventDescriptor } from './git-event';

@Controller('webhooks')
@ApiTags('webhooks')
export class GitWebhookController {
  constructor(
    private readonly projectsService: ProjectsService,
    private readonly buildsService: BuildsService,
  ) {}

  /**
   * Receive a Git webhook (GitHub, GitLab, or any POST with repo/repository).
   * Resolves the project by repository and triggers a build for the event.
   */
  @Post('git')
  @ApiOperation({ summary: 'Receive a git push, tag or pull request webhook and trigger a build' })
  @ApiBody({
    description:
      'GitHub/GitLab payload. The repo comes from repo/repository/project fields, the event from ref, pull_request or object_attributes.',
    schema: { type: 'object', additionalProperties: true },
  })
  async handleEvent(@Body() body: unknown) {
    const repo = getRepoFromPayload(body);
    if (!repo) {
      throw new BadRequestException(
        'Missing repo. Send repo, repository.full_name, repository.clone_url, or project.path_with_namespace',
      );
    }

    const project = await this.projectsService.findByRepository(repo);
    if (!project) {
      throw new NotFoundException(`No project found for repository: ${repo}`);
    }

    const build = await this.buildsService.trigger(project.id, toEventDescriptor(body));
    return { buildId: build.id, projectId: project.id, status: build.status };
  }
}
