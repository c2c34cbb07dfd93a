/**
 * Predicast – Public entry point
 *
 * This file defines the public API surface:
 *  - Engine factory (`createEngine`) and one-shot helpers (`deserialize`,
 *    `serialize`, `parse`).
 *  - Record types, the method table and the typed expression factories.
 *  - Errors, plugins, and the inspection / validation utilities.
 *
 * Typical usage:
 *
 *   import { defineRecord, deserialize, serialize } from 'predicast';
 *
 *   interface Person { Name: string; Age: number }
 *   const PersonType = defineRecord<Person>('Person', { Name: 'string', Age: 'int' });
 *
 *   const adultJ = deserialize('Age > 18 && Name.StartsWith("J")', PersonType);
 *   adultJ.test({ Name: 'Jane', Age: 30 }); // true
 *   serialize(adultJ);                      // '((Age > 18) && Name.StartsWith("J"))'
 *
 * License: Apache-2.0
 */

import type { ExpressionNode } from './core/ast';
import { createEngine, type Engine, type EngineOptions } from './core/engine';
import type { Predicate } from './core/predicate';
import type { RecordType } from './core/schema';

/////////////////////////////
// Convenience helpers     //
/////////////////////////////

let defaultEngine: Engine | undefined;

/**
 * Use `engineOrOptions` as-is when it is an engine, otherwise build one.
 * Calls without options share one default engine.
 */
function resolveEngine(engineOrOptions?: Engine | EngineOptions): Engine {
  if (engineOrOptions === undefined) {
    defaultEngine ??= createEngine();
    return defaultEngine;
  }
  if ('deserialize' in engineOrOptions) return engineOrOptions;
  return createEngine(engineOrOptions);
}

/**
 * Compile text into a predicate over `type`.
 */
export function deserialize<T>(
  source: string,
  type: RecordType<T>,
  engineOrOptions?: Engine | EngineOptions,
): Predicate<T> {
  return resolveEngine(engineOrOptions).deserialize(source, type);
}

/**
 * Render a predicate as canonical text.
 */
export function serialize<T>(predicate: Predicate<T>): string {
  return resolveEngine().serialize(predicate);
}

/**
 * Validate and parse text into an AST without binding it to a type.
 */
export function parse(source: string, engineOrOptions?: Engine | EngineOptions): ExpressionNode {
  return resolveEngine(engineOrOptions).parse(source);
}

/////////////////////////////
// Public exports          //
/////////////////////////////

// Engine
export { createEngine, DEFAULT_MAX_EXPRESSION_LENGTH } from './core/engine';

// Lexer, parser, binder, renderer
export { tokenize, TokenStream } from './core/tokenizer';
export { parseExpression, DEFAULT_MAX_DEPTH } from './core/parser';
export type { ParseOptions } from './core/parser';
export { bindPredicate, inferLiteral } from './core/binder';
export type { BindOptions } from './core/binder';
export { renderPredicate, renderExpression } from './core/renderer';
export { evaluate } from './core/evaluator';

// Record types & methods
export {
  defineRecord,
  findMember,
  StringType,
  IntType,
  FloatType,
  BooleanType,
  NullType,
} from './core/schema';
export type { FieldMap, ScalarType } from './core/schema';
export { defineMethod, MethodTable, builtinMethods } from './core/methods';

// Typed expressions & predicates
export {
  parameter,
  property,
  member,
  constant,
  convert,
  equal,
  notEqual,
  greaterThan,
  greaterThanOrEqual,
  lessThan,
  lessThanOrEqual,
  andAlso,
  orElse,
  not,
  call,
} from './core/expressions';
export type {
  ParameterExpression,
  MemberExpression,
  ConstantExpression,
  BinaryExpression,
  NotExpression,
  CallExpression,
  ConvertExpression,
  ConstantValue,
} from './core/expressions';
export { lambda, allOf, anyOf, negate } from './core/predicate';

// AST
export { traverse, structurallyEqual, printAst } from './core/ast';
export type {
  BinaryExpressionNode,
  UnaryExpressionNode,
  MemberPathNode,
  ConstantNode,
  MethodCallNode,
  LiteralKind,
  Visitor,
  VisitResult,
} from './core/ast';

// Errors
export {
  PredicastError,
  InputValidationError,
  TokenizationError,
  ParseError,
  BindingError,
  UnsupportedError,
  isPredicastError,
} from './core/errors';

// Public types
export type * from './core/types';

// Plugins
export { textPlugin, textMethods, applyPlugins, createPluginSet } from './plugins';
export type { TextPluginOptions, Plugin, ConfigurablePlugin, PluginSet } from './plugins';

// Utilities: inspection
export {
  formatPredicastError,
  formatPredicastErrorText,
  analyzeAst,
  inspectPredicate,
  inspectSourceExpression,
} from './utils/inspect';
export type {
  FormattedPredicastError,
  ExpressionAstInsight,
  InspectSourceOptions,
} from './utils/inspect';

// Utilities: validation
export { validateAst, validateExpression } from './utils/validation';
export type {
  IssueSeverity,
  ExpressionValidationIssue,
  ExpressionValidationStats,
  ExpressionValidationResult,
  ExpressionValidationReport,
  AstValidationOptions,
  ValidateExpressionOptions,
} from './utils/validation';
