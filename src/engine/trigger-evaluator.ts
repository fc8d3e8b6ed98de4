import { minimatch } from 'minimatch';
import { EvaluationError } from './errors';
import { parseEvent, triggerPredicateSchema } from './schema';
import type {
  EventDescriptor,
  PatternCondition,
  TriggerAlternative,
  TriggerPredicate,
} from './types';

export interface TriggerDecision {
  eligible: boolean;
  /** Set when the predicate or the event could not be evaluated */
  diagnostic?: string;
}

const BRANCH_REF_PREFIX = 'refs/heads/';
const GLOB_CHARS = /[*?[\]{}!()+@]/;

/**
 * Branch of an event: the explicit branch, else the name under refs/heads/.
 */
export function eventBranch(event: EventDescriptor): string | undefined {
  if (event.branch) return event.branch;
  if (event.ref.startsWith(BRANCH_REF_PREFIX)) return event.ref.slice(BRANCH_REF_PREFIX.length);
  return undefined;
}

/** Tag name for refs/tags/* refs. */
export function eventTag(event: EventDescriptor): string | undefined {
  return event.ref.startsWith('refs/tags/') ? event.ref.slice('refs/tags/'.length) : undefined;
}

/**
 * Glob match with a trailing-wildcard shortcut: a pattern whose only
 * wildcard is one final '*' matches any value with that prefix, across '/'.
 */
export function matchPattern(value: string, pattern: string): boolean {
  if (pattern.endsWith('*') && !pattern.endsWith('**')) {
    const prefix = pattern.slice(0, -1);
    if (!GLOB_CHARS.test(prefix)) return value.startsWith(prefix);
  }
  return minimatch(value, pattern, { dot: true });
}

function matchCondition(value: string | undefined, condition: PatternCondition): boolean {
  if (value === undefined) return false;
  if (typeof condition === 'string') return matchPattern(value, condition);
  if (Array.isArray(condition)) return condition.some((p) => matchPattern(value, p));

  const { include, exclude } = condition;
  if (include && include.length > 0 && !include.some((p) => matchPattern(value, p))) return false;
  if (exclude && exclude.some((p) => matchPattern(value, p))) return false;
  return true;
}

function asList<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? value : [value];
}

function matchAlternative(alt: TriggerAlternative, event: EventDescriptor): boolean {
  if (alt.event !== undefined && !asList(alt.event).includes(event.type)) return false;
  if (alt.ref !== undefined && !matchCondition(event.ref, alt.ref)) return false;
  if (alt.branch !== undefined && !matchCondition(eventBranch(event), alt.branch)) return false;
  if (alt.status !== undefined) {
    if (event.priorStatus === undefined || !asList(alt.status).includes(event.priorStatus)) {
      return false;
    }
  }
  return true;
}

function checkPredicate(predicate: unknown): TriggerPredicate {
  const result = triggerPredicateSchema.safeParse(predicate);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new EvaluationError(
      `Malformed trigger predicate at [${issue.path.join('.')}]: ${issue.message}`,
    );
  }
  return result.data;
}

/**
 * Decide whether an event satisfies a trigger predicate.
 *
 * Pure: the same predicate and event always give the same decision. A
 * malformed predicate or event is never eligible and carries a diagnostic.
 */
export function evaluateTrigger(predicate: TriggerPredicate, event: EventDescriptor): TriggerDecision {
  try {
    const alternatives = checkPredicate(predicate);
    const checked = parseEvent(event);
    if (alternatives.length === 0) return { eligible: true };
    return { eligible: alternatives.some((alt) => matchAlternative(alt, checked)) };
  } catch (err) {
    if (err instanceof EvaluationError) {
      return { eligible: false, diagnostic: err.message };
    }
    throw err;
  }
}

export function isEligible(predicate: TriggerPredicate, event: EventDescriptor): boolean {
  return evaluateTrigger(predicate, event).eligible;
}
