import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  NotFoundException,
  BadRequestException,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { BuildsService } from './builds.service';
import { TriggerBuildDto } from '../../dto/trigger-build.dto';

@ApiTags('builds')
@Controller('builds')
export class BuildsController {
  constructor(private readonly buildsService: BuildsService) {}

  @Get()
  @ApiOperation({ summary: 'List builds (optionally filtered by projectId)' })
  async findAll(@Query('projectId') projectId?: string) {
    return this.buildsService.findAll(projectId);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a build with its pipeline and step results' })
  async findOne(@Param('id') id: string) {
    const build = await this.buildsService.findOne(id);
    if (!build) throw new NotFoundException('Build not found');
    return build;
  }

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Trigger a build of a project for an event' })
  async trigger(@Body() body: TriggerBuildDto) {
    if (!body.projectId || !body.event) {
      throw new BadRequestException('projectId and event are required');
    }
    return this.buildsService.trigger(body.projectId, body.event);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Cancel a running build' })
  async cancel(@Param('id') id: string) {
    return this.buildsService.cancel(id);
  }
}
