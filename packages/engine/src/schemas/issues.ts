// Translate zod issues into the engine's error taxonomy

import type { z } from 'zod';
import {
  InvalidAssumptionsError,
  ParameterOutOfRangeError,
  type RangeBounds,
} from '../errors.js';

export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, key) => {
    if (typeof key === 'number') return `${acc}[${key}]`;
    return acc ? `${acc}.${key}` : key;
  }, '');
}

export function valueAtPath(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * The issue worth reporting. For a failed union it is the first issue of the
 * branch whose `method` literal matched, so the caller sees the real field.
 */
export function primaryIssue(error: z.ZodError): z.ZodIssue {
  const issue = error.issues[0];
  if (issue.code !== 'invalid_union') return issue;
  const branch = issue.unionErrors.find(
    e => !e.issues.some(i => i.code === 'invalid_literal' && i.path[i.path.length - 1] === 'method'),
  );
  return branch ? primaryIssue(branch) : issue;
}

function boundsOf(issue: z.ZodIssue): RangeBounds {
  if (issue.code === 'too_small' && typeof issue.minimum === 'number') {
    return { min: issue.minimum, exclusiveMin: !issue.inclusive };
  }
  if (issue.code === 'too_big' && typeof issue.maximum === 'number') {
    return { max: issue.maximum };
  }
  return {};
}

/** First issue of a failed asset parse, as a ParameterOutOfRangeError. */
export function toParameterError(error: z.ZodError, input: unknown): ParameterOutOfRangeError {
  const issue = primaryIssue(error);
  const parameter = formatPath(issue.path) || '(root)';
  return new ParameterOutOfRangeError(
    parameter,
    valueAtPath(input, issue.path),
    boundsOf(issue),
    `${parameter}: ${issue.message}`,
  );
}

export function toAssumptionsError(error: z.ZodError, input: unknown): InvalidAssumptionsError {
  const issue = primaryIssue(error);
  const parameter = formatPath(issue.path) || '(root)';
  return new InvalidAssumptionsError(`${parameter}: ${issue.message}`, {
    parameter,
    value: valueAtPath(input, issue.path),
    issues: error.issues.length,
  });
}
