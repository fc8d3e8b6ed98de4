/**
 * Compiler facade: raw templates → validated templates → matrix expansion
 * → dependency graph. Any ConfigError aborts the whole compilation.
 */
import { buildDependencyGraph } from './dependency-graph';
import { ConfigError } from './errors';
import { expandMatrix } from './matrix-expander';
import { parseTemplates } from './schema';
import type { Variables } from './substitution';
import { evaluateTrigger, eventBranch, eventTag } from './trigger-evaluator';
import type { CompiledGraph, EventDescriptor, PipelineTemplate } from './types';

export interface CompileOptions {
  /** Build variables available to ${...} placeholders besides matrix axes */
  variables?: Variables;
}

export interface RepositoryInfo {
  /** Clone URL or owner/name */
  repository: string;
  defaultBranch: string;
}

export interface EligibilityReport {
  eligible: string[];
  ineligible: { name: string; diagnostic?: string }[];
}

/**
 * owner/name of a repository given as URL, scp-style address or slug.
 */
export function repositorySlug(repository: string): string {
  return repository
    .trim()
    .replace(/^[a-z][a-z0-9+.-]*:\/\/[^/]+\//i, '')
    .replace(/^[^@\s]+@[^:]+:/, '')
    .replace(/\/+$/, '')
    .replace(/\.git$/, '');
}

/**
 * Compile-time build variables for a repository and, optionally, the event
 * being compiled for. Event fields are empty strings without an event.
 */
export function buildVariables(repo: RepositoryInfo, event?: EventDescriptor): Record<string, string> {
  const slug = repositorySlug(repo.repository);
  const segments = slug.split('/');
  return {
    CI_REPO: slug,
    CI_REPO_OWNER: segments.length > 1 ? segments.slice(0, -1).join('/') : '',
    CI_REPO_NAME: segments[segments.length - 1],
    CI_REPO_DEFAULT_BRANCH: repo.defaultBranch,
    CI_PIPELINE_EVENT: event?.type ?? '',
    CI_COMMIT_REF: event?.ref ?? '',
    CI_COMMIT_BRANCH: event ? (eventBranch(event) ?? '') : '',
    CI_COMMIT_TAG: event ? (eventTag(event) ?? '') : '',
    CI_COMMIT_SHA: event?.commit ?? '',
  };
}

function checkTemplates(templates: PipelineTemplate[]): void {
  const names = new Set<string>();
  const groupLimits = new Map<string, number>();

  templates.forEach((template, i) => {
    if (names.has(template.name)) {
      throw new ConfigError(`Duplicate pipeline name '${template.name}'`, `[${i}].name`);
    }
    names.add(template.name);

    const stepNames = new Set<string>();
    template.steps.forEach((step, j) => {
      if (stepNames.has(step.name)) {
        throw new ConfigError(
          `Duplicate step name '${step.name}' in pipeline '${template.name}'`,
          `[${i}].steps[${j}].name`,
        );
      }
      stepNames.add(step.name);
    });

    if (template.concurrency) {
      const { group, limit } = template.concurrency;
      const known = groupLimits.get(group);
      if (known !== undefined && known !== limit) {
        throw new ConfigError(
          `Concurrency group '${group}' is declared with limits ${known} and ${limit}`,
          `[${i}].concurrency`,
        );
      }
      groupLimits.set(group, limit);
    }
  });
}

/**
 * Turn raw templates into a concrete, acyclic pipeline graph.
 */
export function compile(templates: unknown, options: CompileOptions = {}): CompiledGraph {
  const parsed = parseTemplates(templates);
  checkTemplates(parsed);

  const variables = options.variables ?? {};
  const pipelines = parsed.flatMap((template) =>
    expandMatrix(template, template.matrix ?? [], variables),
  );
  return buildDependencyGraph(pipelines);
}

/**
 * Which pipelines of a graph the event makes eligible by trigger alone.
 * Dependency outcomes are the scheduler's concern.
 */
export function evaluate(graph: CompiledGraph, event: EventDescriptor): EligibilityReport {
  const report: EligibilityReport = { eligible: [], ineligible: [] };
  for (const pipeline of graph.pipelines) {
    const decision = evaluateTrigger(pipeline.when, event);
    if (decision.eligible) {
      report.eligible.push(pipeline.name);
    } else {
      report.ineligible.push({ name: pipeline.name, diagnostic: decision.diagnostic });
    }
  }
  return report;
}
