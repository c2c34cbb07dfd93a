/**
 * Predicast – Core / public types
 *
 * Collects the public type aliases in one place so consumers can import them
 * without knowing the internal file layout. Nothing here has runtime
 * behavior.
 *
 *   import type { Engine, Predicate, RecordType, StoredPredicate } from 'predicast';
 *
 * License: Apache-2.0
 */

import type { Predicate } from './predicate';
import type { RecordType } from './schema';

export type { ExpressionNode, NodeType } from './ast';
export type { Token, TokenType, Operator, BinaryOperator } from './tokens';
export type { PredicastErrorCode } from './errors';
export type { Engine, EngineOptions, NormalizedEngineOptions } from './engine';
export type { Expression, ExpressionKind } from './expressions';
export type { MethodDescriptor } from './methods';
export type { Predicate } from './predicate';
export type { RecordType, ValueType, ScalarKind, FieldDescriptor, FieldSpec } from './schema';

/////////////////////////////
// Locations               //
/////////////////////////////

/**
 * Where a validation issue points in the source text.
 *
 * `line` and `column` are 1-based and present whenever the index is known
 * relative to a source string.
 */
export interface DiagnosticLocation {
  /** 0-based character offset. */
  index: number;
  line?: number;
  column?: number;
  length?: number;
}

/////////////////////////////
// Utility types           //
/////////////////////////////

/**
 * The record shape a record type describes.
 *
 *   type P = RecordOf<typeof PersonType>; // Person
 */
export type RecordOf<R> = R extends RecordType<infer T> ? T : never;

/**
 * The record shape a predicate tests.
 */
export type PredicateTarget<P> = P extends Predicate<infer T> ? T : never;

/**
 * A predicate as it is usually persisted next to other data: its text and
 * the name of the record type it was written against.
 */
export interface StoredPredicate {
  id: string;
  typeName: string;
  source: string;
  description?: string;
}
