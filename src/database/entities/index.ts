/**
 * Database entities: projects, builds, build_pipelines, build_steps.
 */
export { Project, type ProjectConfig } from './project.entity';
export { Build, BUILD_RECORD_STATUSES, type BuildRecordStatus } from './build.entity';
export { BuildPipeline } from './build-pipeline.entity';
export { BuildStep } from './build-step.entity';
