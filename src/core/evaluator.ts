/**
 * Predicast – Evaluator core
 *
 * Evaluates a typed expression against one input record.
 *
 * Semantics:
 *  - member access on `null` / `undefined` yields `null`; `undefined` field
 *    values are read as `null`
 *  - `==` / `!=` use strict equality
 *  - a relational comparison with a non-number side is `false`
 *  - `&&`, `||` and `!` use three-valued logic (`null` is "unknown")
 *  - calls on a `null` receiver yield `null`
 *
 * Every `Parameter` node stands for the input record.
 *
 * License: Apache-2.0
 */

import { createInternalError } from './errors';
import type { BinaryExpression, Expression } from './expressions';

/////////////////////
// Public API      //
/////////////////////

export function evaluate(expr: Expression, input: unknown): unknown {
  switch (expr.kind) {
    case 'Parameter':
      return input ?? null;

    case 'Member': {
      const target = evaluate(expr.target, input);
      if (target === null) return null;
      return expr.member.read(target) ?? null;
    }

    case 'Constant':
      return expr.value;

    case 'Convert':
      return evaluate(expr.operand, input);

    case 'Not': {
      const value = evaluate(expr.operand, input);
      return typeof value === 'boolean' ? !value : null;
    }

    case 'Binary':
      return evaluateBinary(expr, input);

    case 'Call': {
      const target = evaluate(expr.target, input);
      if (target === null) return null;
      const args = expr.arguments.map((arg) => evaluate(arg, input));
      return expr.method.invoke(target, args) ?? null;
    }
  }
}

/**
 * `true` only when the expression evaluates to `true`.
 */
export function evaluatesToTrue(expr: Expression, input: unknown): boolean {
  return evaluate(expr, input) === true;
}

/////////////////////
// Binary          //
/////////////////////

function evaluateBinary(expr: BinaryExpression, input: unknown): unknown {
  switch (expr.operator) {
    case '&&': {
      const left = truth(evaluate(expr.left, input));
      if (left === false) return false;
      const right = truth(evaluate(expr.right, input));
      if (right === false) return false;
      return left === true && right === true ? true : null;
    }

    case '||': {
      const left = truth(evaluate(expr.left, input));
      if (left === true) return true;
      const right = truth(evaluate(expr.right, input));
      if (right === true) return true;
      return left === false && right === false ? false : null;
    }

    case '==':
      return evaluate(expr.left, input) === evaluate(expr.right, input);

    case '!=':
      return evaluate(expr.left, input) !== evaluate(expr.right, input);

    case '>':
    case '>=':
    case '<':
    case '<=': {
      const left = evaluate(expr.left, input);
      const right = evaluate(expr.right, input);
      if (typeof left !== 'number' || typeof right !== 'number') return false;
      return compare(expr.operator, left, right);
    }

    default:
      throw createInternalError({
        message: `Predicast: no evaluation rule for operator "${String(expr.operator)}".`,
      });
  }
}

function compare(operator: '>' | '>=' | '<' | '<=', left: number, right: number): boolean {
  switch (operator) {
    case '>':
      return left > right;
    case '>=':
      return left >= right;
    case '<':
      return left < right;
    case '<=':
      return left <= right;
  }
}

function truth(value: unknown): boolean | null {
  return typeof value === 'boolean' ? value : null;
}
