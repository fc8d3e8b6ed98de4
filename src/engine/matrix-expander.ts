/**
 * Matrix Expansion
 *
 * Expands one pipeline template into one concrete pipeline per combination
 * of its matrix axes, substituting axis values and build variables into
 * platforms, images, commands, environment values and trigger patterns.
 */
import { ConfigError } from './errors';
import { substitute, substituteRecord, type Variables } from './substitution';
import type {
  EnvValue,
  MatrixAxis,
  PatternCondition,
  Pipeline,
  PipelineTemplate,
  Step,
  StepTemplate,
  TriggerPredicate,
} from './types';

export const DEFAULT_PLATFORM = 'linux/amd64';

const PLATFORM = /^[a-z0-9]+\/[a-z0-9]+(\/[a-z0-9]+)?$/;

export type MatrixCombination = Record<string, string>;

/**
 * Check axes for names and values that would make the expansion ambiguous.
 */
export function validateAxes(templateName: string, axes: MatrixAxis[]): void {
  const seen = new Set<string>();
  axes.forEach((axis, i) => {
    const path = `${templateName}.matrix[${i}]`;
    if (seen.has(axis.name)) {
      throw new ConfigError(`Duplicate matrix axis '${axis.name}'`, path);
    }
    seen.add(axis.name);

    if (axis.values.length === 0) {
      throw new ConfigError(`Matrix axis '${axis.name}' has no values`, path);
    }
    const values = new Set(axis.values);
    if (values.size !== axis.values.length) {
      throw new ConfigError(`Matrix axis '${axis.name}' lists a value more than once`, path);
    }
  });
}

/**
 * Cartesian product of the axes, last axis varying fastest.
 */
export function getCombinations(axes: MatrixAxis[]): MatrixCombination[] {
  let combos: MatrixCombination[] = [{}];
  for (const axis of axes) {
    const next: MatrixCombination[] = [];
    for (const combo of combos) {
      for (const value of axis.values) {
        next.push({ ...combo, [axis.name]: value });
      }
    }
    combos = next;
  }
  return combos;
}

export function matrixPipelineName(templateName: string, combo: MatrixCombination): string {
  const entries = Object.entries(combo);
  if (entries.length === 0) return templateName;
  return `${templateName} (${entries.map(([k, v]) => `${k}=${v}`).join(', ')})`;
}

/**
 * Expand a template across its axes. Without axes the result is a single
 * pipeline with the template's name.
 */
export function expandMatrix(
  template: PipelineTemplate,
  axes: MatrixAxis[] = template.matrix ?? [],
  variables: Variables = {},
): Pipeline[] {
  validateAxes(template.name, axes);
  return getCombinations(axes).map((combo) => concretize(template, combo, variables));
}

function concretize(
  template: PipelineTemplate,
  combo: MatrixCombination,
  variables: Variables,
): Pipeline {
  const vars: Variables = { ...variables, ...combo };
  const name = matrixPipelineName(template.name, combo);

  const platform = substitute(template.platform ?? DEFAULT_PLATFORM, vars, `${name}.platform`);
  if (!PLATFORM.test(platform)) {
    throw new ConfigError(`Platform '${platform}' must look like os/arch`, `${name}.platform`);
  }

  return {
    name,
    templateName: template.name,
    platform,
    steps: template.steps.map((step, i) =>
      concretizeStep(step, combo, vars, `${name}.steps[${i}]`),
    ),
    dependsOn: [...(template.dependsOn ?? [])],
    when: substitutePredicate(template.when ?? [], vars, `${name}.when`),
    concurrency: template.concurrency ? { ...template.concurrency } : undefined,
    matrix: { ...combo },
  };
}

function concretizeStep(
  step: StepTemplate,
  combo: MatrixCombination,
  vars: Variables,
  path: string,
): Step {
  const environment: Record<string, EnvValue> = substituteRecord(
    step.environment ?? {},
    (value, key) =>
      typeof value === 'string'
        ? substitute(value, vars, `${path}.environment.${key}`)
        : { fromSecret: value.fromSecret },
  );
  for (const [axis, value] of Object.entries(combo)) {
    if (!(axis in environment)) environment[axis] = value;
  }

  return {
    name: step.name,
    image: substitute(step.image, vars, `${path}.image`),
    commands: step.commands.map((cmd, i) => substitute(cmd, vars, `${path}.commands[${i}]`)),
    environment,
    secrets: (step.secrets ?? []).map((s) => ({ ...s })),
    group: step.group,
    when: substitutePredicate(step.when ?? [], vars, `${path}.when`),
  };
}

function substitutePredicate(
  predicate: TriggerPredicate,
  vars: Variables,
  path: string,
): TriggerPredicate {
  return predicate.map((alt, i) => ({
    ...alt,
    ref: alt.ref === undefined ? undefined : substituteCondition(alt.ref, vars, `${path}[${i}].ref`),
    branch:
      alt.branch === undefined
        ? undefined
        : substituteCondition(alt.branch, vars, `${path}[${i}].branch`),
  }));
}

function substituteCondition(
  condition: PatternCondition,
  vars: Variables,
  path: string,
): PatternCondition {
  if (typeof condition === 'string') return substitute(condition, vars, path);
  if (Array.isArray(condition)) return condition.map((p) => substitute(p, vars, path));
  return {
    include: condition.include?.map((p) => substitute(p, vars, `${path}.include`)),
    exclude: condition.exclude?.map((p) => substitute(p, vars, `${path}.exclude`)),
  };
}
