/**
 * @fileoverview Zod-to-ValidationError bridge.
 *
 * Schemas describe the expectation in their issue messages; the first issue
 * becomes a ValidationError naming the offending field, what was expected and
 * the value that was actually supplied.
 */

import { z } from 'zod';
import { ValidationError, describeValue } from './errors.js';

function valueAtPath(input: unknown, path: readonly (string | number)[]): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

const BOUND_SUBJECT: Record<'array' | 'string' | 'number' | 'set' | 'date' | 'bigint', string> = {
  array: 'an array with length',
  string: 'a string with length',
  number: 'a number',
  set: 'a set with size',
  date: 'a date',
  bigint: 'a number',
};

/**
 * Expectation text for an issue. A message set on the schema is kept as is;
 * zod's built-in wording is rephrased to read after "expected".
 */
function expectationOf(issue: z.ZodIssue): string {
  const builtIn = z.defaultErrorMap(issue, { defaultError: issue.message, data: undefined }).message;
  if (issue.message !== builtIn) return issue.message;

  switch (issue.code) {
    case 'invalid_type':
      return `a value of type ${issue.expected}`;
    case 'invalid_enum_value':
      return `one of ${issue.options.map((option) => `'${String(option)}'`).join(', ')}`;
    case 'too_small':
      return `${BOUND_SUBJECT[issue.type]} ${issue.inclusive ? '>=' : '>'} ${String(issue.minimum)}`;
    case 'too_big':
      return `${BOUND_SUBJECT[issue.type]} ${issue.inclusive ? '<=' : '<'} ${String(issue.maximum)}`;
    case 'unrecognized_keys':
      return `no keys besides the known ones (found ${issue.keys.join(', ')})`;
    default:
      return 'a valid value';
  }
}

export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  rootField = 'input',
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }
  const issue = parsed.error.issues[0];
  if (!issue) {
    throw new ValidationError(rootField, 'a valid value', describeValue(input));
  }
  const field = issue.path.length > 0 ? issue.path.join('.') : rootField;
  throw new ValidationError(field, expectationOf(issue), describeValue(valueAtPath(input, issue.path)));
}
