import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  NotFoundException,
  BadRequestException,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ProjectsService } from './projects.service';
import { CreateProjectDto } from '../../dto/create-project.dto';
import { UpdateProjectDto } from '../../dto/update-project.dto';
import { ProjectEventDto } from '../../dto/event.dto';

@ApiTags('projects')
@Controller('projects')
export class ProjectsController {
  constructor(private readonly projectsService: ProjectsService) {}

  private async getProject(id: string) {
    const project = await this.projectsService.findOne(id);
    if (!project) throw new NotFoundException('Project not found');
    return project;
  }

  @Get()
  @ApiOperation({ summary: 'List projects' })
  async findAll() {
    return this.projectsService.findAll();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one project' })
  async findOne(@Param('id') id: string) {
    return this.getProject(id);
  }

  @Post()
  @ApiOperation({ summary: 'Create a project (templates must compile)' })
  async create(@Body() dto: CreateProjectDto) {
    return this.projectsService.create(dto);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a project (templates must compile)' })
  async update(@Param('id') id: string, @Body() dto: UpdateProjectDto) {
    const project = await this.getProject(id);
    return this.projectsService.update(project, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a project and its builds' })
  async remove(@Param('id') id: string) {
    const removed = await this.projectsService.remove(id);
    if (!removed) throw new NotFoundException('Project not found');
  }

  @Post(':id/compile')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Compile the templates into pipelines and layers' })
  async compile(@Param('id') id: string, @Body() body: ProjectEventDto) {
    const project = await this.getProject(id);
    return this.projectsService.compile(project, body?.event);
  }

  @Post(':id/evaluate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Which pipelines an event makes eligible by trigger' })
  async evaluate(@Param('id') id: string, @Body() body: ProjectEventDto) {
    if (!body?.event) throw new BadRequestException('event is required');
    const project = await this.getProject(id);
    return this.projectsService.evaluate(project, body.event);
  }
}
