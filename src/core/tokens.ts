/**
 * Predicast – Token definitions
 *
 * This module defines the canonical token shapes produced by the lexer and
 * consumed by the parser, along with the closed operator vocabulary.
 *
 * License: Apache-2.0
 */

/////////////////////
// Token categories //
/////////////////////

export type TokenType =
  | 'identifier'
  | 'string'
  | 'number'
  | 'boolean'
  | 'null'
  | 'operator'
  | 'dot'
  | 'comma'
  | 'openParen'
  | 'closeParen'
  | 'eof';

/**
 * A single lexed token.
 *
 * Notes:
 *  - `value` is:
 *      - identifier: raw identifier text ("Name", "Company")
 *      - string:     contents without quotes, escapes already applied
 *      - number:     raw numeric text ("42", "3.14", "12.")
 *      - boolean:    "true" | "false"
 *      - null:       "null"
 *      - operator:   operator text ("&&", "==", "!", …)
 *      - dot/comma/openParen/closeParen: the punctuation character
 *      - eof:        ""
 *  - `start`/`end` are 0-based offsets into the source (end is exclusive).
 */
export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly start: number;
  readonly end: number;
}

//////////////////////////////
// Canonical operator sets  //
//////////////////////////////

export const LOGICAL_OPERATORS = ['&&', '||'] as const;
export const EQUALITY_OPERATORS = ['==', '!='] as const;
export const RELATIONAL_OPERATORS = ['>', '>=', '<', '<='] as const;

export const BINARY_OPERATORS = [
  ...LOGICAL_OPERATORS,
  ...EQUALITY_OPERATORS,
  ...RELATIONAL_OPERATORS,
] as const;

export const UNARY_OPERATORS = ['!'] as const;

/**
 * Complete operator vocabulary.
 */
export const OPERATORS = [...BINARY_OPERATORS, ...UNARY_OPERATORS] as const;

export type LogicalOperator = (typeof LOGICAL_OPERATORS)[number];
export type EqualityOperator = (typeof EQUALITY_OPERATORS)[number];
export type RelationalOperator = (typeof RELATIONAL_OPERATORS)[number];
export type BinaryOperator = (typeof BINARY_OPERATORS)[number];
export type UnaryOperator = (typeof UNARY_OPERATORS)[number];
export type Operator = (typeof OPERATORS)[number];

//////////////////////////////
// Type guards & utilities  //
//////////////////////////////

const BINARY_SET: ReadonlySet<string> = new Set(BINARY_OPERATORS);
const LOGICAL_SET: ReadonlySet<string> = new Set(LOGICAL_OPERATORS);
const EQUALITY_SET: ReadonlySet<string> = new Set(EQUALITY_OPERATORS);
const RELATIONAL_SET: ReadonlySet<string> = new Set(RELATIONAL_OPERATORS);

export function isBinaryOperator(op: string): op is BinaryOperator {
  return BINARY_SET.has(op);
}

export function isLogicalOperator(op: string): op is LogicalOperator {
  return LOGICAL_SET.has(op);
}

export function isEqualityOperator(op: string): op is EqualityOperator {
  return EQUALITY_SET.has(op);
}

export function isRelationalOperator(op: string): op is RelationalOperator {
  return RELATIONAL_SET.has(op);
}

/**
 * Convenience function to build a token.
 *
 * Mostly useful in tests and tooling that synthesize tokens.
 */
export function createToken(
  type: TokenType,
  value: string,
  start: number,
  end: number = start + value.length,
): Token {
  return { type, value, start, end };
}
