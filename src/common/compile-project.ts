import { buildVariables, compile, type CompiledGraph, type EventDescriptor } from '../engine';
import type { ProjectConfig } from '../database/entities';

/** What compiling needs to know about a project. */
export interface CompilableProject {
  repository: string;
  default_branch: string;
  config: ProjectConfig;
}

/**
 * Compile a project's templates with its build variables. Without an event
 * the event variables are empty, which is enough to validate the templates.
 */
export function compileProject(project: CompilableProject, event?: EventDescriptor): CompiledGraph {
  const variables = buildVariables(
    { repository: project.repository, defaultBranch: project.default_branch },
    event,
  );
  return compile(project.config.pipelines, { variables });
}
