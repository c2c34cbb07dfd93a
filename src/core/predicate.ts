/**
 * Predicast – Typed predicates
 *
 * A predicate is a boolean expression over one record of a known type. It
 * can be evaluated with `test`, inspected through `body`, or rendered back
 * to text.
 *
 * License: Apache-2.0
 */

import { createBindingError } from './errors';
import { evaluatesToTrue } from './evaluator';
import {
  andAlso,
  not,
  orElse,
  parameter,
  type Expression,
  type ParameterExpression,
} from './expressions';
import { typeName, type RecordType } from './schema';

export interface Predicate<T> {
  readonly type: RecordType<T>;
  readonly parameter: ParameterExpression;
  readonly body: Expression;

  /** Text the predicate was compiled from, when it came from text. */
  readonly source?: string;

  /**
   * Evaluate against one record. Unknown results (`null`) count as `false`.
   */
  test(record: T): boolean;
}

/**
 * Wrap a bound body into a predicate. The body must be boolean.
 */
export function createPredicate<T>(
  type: RecordType<T>,
  param: ParameterExpression,
  body: Expression,
  source?: string,
): Predicate<T> {
  if (body.valueType.kind !== 'boolean') {
    throw createBindingError({
      message: `Predicast: a predicate over "${type.name}" must be boolean, got ${typeName(body.valueType)}.`,
      typeName: type.name,
      member: typeName(body.valueType),
    });
  }

  const predicate: Predicate<T> = {
    type,
    parameter: param,
    body,
    source,
    test: (record: T): boolean => evaluatesToTrue(body, record),
  };
  return Object.freeze(predicate);
}

/**
 * Build a predicate in code:
 *
 *   const adult = lambda(PersonType, (p) => greaterThan(property(p, 'Age'), constant(17)));
 */
export function lambda<T>(
  type: RecordType<T>,
  build: (param: ParameterExpression) => Expression,
  parameterName = 'x',
): Predicate<T> {
  const param = parameter(type, parameterName);
  return createPredicate(type, param, build(param));
}

/**
 * Conjunction of predicates over the same record type.
 */
export function allOf<T>(first: Predicate<T>, ...rest: Predicate<T>[]): Predicate<T> {
  return combine(first, rest, andAlso);
}

/**
 * Disjunction of predicates over the same record type.
 */
export function anyOf<T>(first: Predicate<T>, ...rest: Predicate<T>[]): Predicate<T> {
  return combine(first, rest, orElse);
}

export function negate<T>(predicate: Predicate<T>): Predicate<T> {
  return createPredicate(predicate.type, predicate.parameter, not(predicate.body));
}

function combine<T>(
  first: Predicate<T>,
  rest: readonly Predicate<T>[],
  join: (l: Expression, r: Expression) => Expression,
): Predicate<T> {
  let body = first.body;
  for (const next of rest) {
    if (next.type !== first.type) {
      throw new Error(
        `Predicast: cannot combine predicates over "${first.type.name}" and "${next.type.name}".`,
      );
    }
    body = join(body, next.body);
  }
  return createPredicate(first.type, first.parameter, body);
}
