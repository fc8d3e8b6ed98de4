import { z } from 'zod';
import { ConfigError, EvaluationError } from './errors';
import {
  BUILD_STATUSES,
  EVENT_TYPES,
  type EventDescriptor,
  type PatternCondition,
  type PipelineTemplate,
  type StepTemplate,
  type TriggerAlternative,
} from './types';

const nonEmpty = z.string().min(1);
const envName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid variable name');

const eventType = z.enum(EVENT_TYPES);
const buildStatus = z.enum(BUILD_STATUSES);

const patternCondition: z.ZodType<PatternCondition> = z.union([
  nonEmpty,
  z.array(nonEmpty),
  z
    .object({
      include: z.array(nonEmpty).optional(),
      exclude: z.array(nonEmpty).optional(),
    })
    .strict(),
]);

export const triggerAlternativeSchema: z.ZodType<TriggerAlternative> = z
  .object({
    event: z.union([eventType, z.array(eventType)]).optional(),
    ref: patternCondition.optional(),
    branch: patternCondition.optional(),
    status: z.union([buildStatus, z.array(buildStatus)]).optional(),
  })
  .strict();

export const triggerPredicateSchema = z.array(triggerAlternativeSchema);

const stepSchema: z.ZodType<StepTemplate> = z
  .object({
    name: nonEmpty,
    image: nonEmpty,
    commands: z.array(z.string()),
    environment: z
      .record(envName, z.union([z.string(), z.object({ fromSecret: nonEmpty }).strict()]))
      .optional(),
    secrets: z.array(z.object({ source: nonEmpty, target: envName }).strict()).optional(),
    group: nonEmpty.optional(),
    when: triggerPredicateSchema.optional(),
  })
  .strict();

export const pipelineTemplateSchema: z.ZodType<PipelineTemplate> = z
  .object({
    name: nonEmpty,
    platform: nonEmpty.optional(),
    steps: z.array(stepSchema).min(1, 'a pipeline needs at least one step'),
    dependsOn: z.array(nonEmpty).optional(),
    when: triggerPredicateSchema.optional(),
    concurrency: z
      .object({ group: nonEmpty, limit: z.number().int().positive() })
      .strict()
      .optional(),
    matrix: z.array(z.object({ name: envName, values: z.array(z.string()) }).strict()).optional(),
  })
  .strict();

export const pipelineTemplatesSchema = z.array(pipelineTemplateSchema);

export const eventDescriptorSchema: z.ZodType<EventDescriptor> = z
  .object({
    type: eventType,
    ref: z.string().regex(/^refs\/.+/, 'must be a full git ref'),
    branch: nonEmpty.optional(),
    actor: z.string().optional(),
    priorStatus: buildStatus.optional(),
    commit: z.string().optional(),
    message: z.string().optional(),
  })
  .strict();

function describeIssue(issue: z.ZodIssue): { path: string; message: string } {
  const path = issue.path
    .map((segment, i) => (typeof segment === 'number' ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
    .join('');
  return { path, message: issue.message };
}

/**
 * Validate raw template JSON. Throws ConfigError naming the first bad field.
 */
export function parseTemplates(raw: unknown): PipelineTemplate[] {
  const result = pipelineTemplatesSchema.safeParse(raw);
  if (!result.success) {
    const { path, message } = describeIssue(result.error.issues[0]);
    throw new ConfigError(message, path === '' ? undefined : path);
  }
  return result.data;
}

/**
 * Validate an event descriptor. Throws EvaluationError.
 */
export function parseEvent(raw: unknown): EventDescriptor {
  const result = eventDescriptorSchema.safeParse(raw);
  if (!result.success) {
    const { path, message } = describeIssue(result.error.issues[0]);
    throw new EvaluationError(`Malformed event${path ? ` (${path})` : ''}: ${message}`);
  }
  return result.data;
}
