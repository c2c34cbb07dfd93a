/**
 * Predicast – Renderer
 *
 * Turns a typed predicate back into expression text that the parser reads
 * again into the same tree shape:
 *
 *   Binary   → (left op right)
 *   Not      → !operand
 *   Member   → Company.Name          (declared names, parameter omitted)
 *   Constant → "text" | 42 | 1.5 | 2.0 | true | false | null
 *   Call     → Name.StartsWith("J")
 *   Convert  → operand
 *
 * Numbers the grammar cannot spell (negative values, exponent form) are
 * written as quoted text, which the binder reads back as a number.
 *
 * License: Apache-2.0
 */

import { createUnsupportedError } from './errors';
import type { ConstantExpression, Expression } from './expressions';
import type { Predicate } from './predicate';

export function renderPredicate<T>(predicate: Predicate<T>): string {
  return renderExpression(predicate.body);
}

export function renderExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'Binary':
      return `(${renderExpression(expr.left)} ${expr.operator} ${renderExpression(expr.right)})`;

    case 'Not':
      return `!${renderExpression(expr.operand)}`;

    case 'Member':
      return renderMemberPath(expr);

    case 'Constant':
      return renderConstant(expr);

    case 'Call': {
      const target = renderMemberPath(expr.target);
      const args = expr.arguments.map(renderExpression).join(', ');
      return `${target}.${expr.method.name}(${args})`;
    }

    case 'Convert':
      return renderExpression(expr.operand);

    case 'Parameter':
      throw unsupported('Parameter', 'a bare parameter reference has no text form');
  }
}

/**
 * Dotted member names from the parameter down to `expr`.
 */
function renderMemberPath(expr: Expression): string {
  const names: string[] = [];
  let current = expr;
  while (current.kind === 'Member') {
    names.unshift(current.member.name);
    current = current.target;
  }
  if (current.kind !== 'Parameter') {
    throw unsupported(
      current.kind,
      `member access on a ${current.kind} node has no text form`,
    );
  }
  if (names.length === 0) {
    throw unsupported('Parameter', 'a method call on the parameter itself has no text form');
  }
  return names.join('.');
}

const PLAIN_NUMBER = /^\d+(?:\.\d+)?$/;

function renderConstant(expr: ConstantExpression): string {
  const { value } = expr;

  if (value === null) return 'null';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'string') return quote(value);

  if (!Number.isFinite(value)) {
    throw unsupported('Constant', `the number ${String(value)} has no text form`);
  }
  let text = String(value);
  // Integral floats keep a fraction so they read back as floats.
  if (expr.valueType.kind === 'float' && /^-?\d+$/.test(text)) text += '.0';
  return PLAIN_NUMBER.test(text) ? text : quote(text);
}

function quote(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function unsupported(construct: string, reason: string): Error {
  return createUnsupportedError({
    message: `Predicast: cannot render ${construct}: ${reason}.`,
    construct,
  });
}
