/**
 * Predicast – Engine core
 *
 * The public entry point for compiling text into typed predicates and
 * rendering predicates back into text.
 *
 * Responsibilities of the engine:
 *  - Reject blank and oversized input before any lexing.
 *  - Run lexer → parser → binder for `deserialize`.
 *  - Hold the method table expressions may call.
 *
 * Parsing, binding and rendering live in their own modules. Engines are
 * immutable; `withMethod` returns a new engine.
 *
 * License: Apache-2.0
 */

import type { ExpressionNode } from './ast';
import { bindPredicate } from './binder';
import { createInputError } from './errors';
import { builtinMethods, MethodTable, type MethodDescriptor } from './methods';
import { DEFAULT_MAX_DEPTH, parse } from './parser';
import type { Predicate } from './predicate';
import { renderPredicate } from './renderer';
import type { RecordType } from './schema';
import { tokenize } from './tokenizer';

//////////////////////
// Public interfaces //
//////////////////////

/**
 * Engine-level options. All are optional; defaults are applied if omitted.
 */
export interface EngineOptions {
  /**
   * Longest accepted source, in characters. Longer input is rejected before
   * lexing. Default: 10 000.
   */
  maxExpressionLength?: number;

  /**
   * Deepest accepted nesting of parentheses.
   * Default: 100.
   */
  maxDepth?: number;

  /**
   * Extra methods callable from expressions, added to the built-ins.
   */
  methods?: readonly MethodDescriptor[];
}

/**
 * Options with defaults applied.
 */
export interface NormalizedEngineOptions {
  readonly maxExpressionLength: number;
  readonly maxDepth: number;
  readonly methods: MethodTable;
}

export interface Engine {
  readonly options: NormalizedEngineOptions;

  /**
   * A new engine that can also call `descriptor`. An existing overload with
   * the same receiver, name and parameter kinds is replaced.
   */
  withMethod(descriptor: MethodDescriptor): Engine;

  /**
   * Compile `source` into a predicate over `type`.
   *
   * Throws:
   *  - InputValidationError for blank or oversized input
   *  - TokenizationError / ParseError for malformed text
   *  - BindingError when the text does not fit `type`
   */
  deserialize<T>(source: string, type: RecordType<T>): Predicate<T>;

  /**
   * Render a predicate as canonical expression text.
   *
   * Throws UnsupportedError for shapes with no text form.
   */
  serialize<T>(predicate: Predicate<T>): string;

  /**
   * Validate, lex and parse `source` without binding. For tooling.
   */
  parse(source: string): ExpressionNode;
}

//////////////////////////////
// Default options & helpers //
//////////////////////////////

export const DEFAULT_MAX_EXPRESSION_LENGTH = 10_000;

function normalizeOptions(opts?: EngineOptions): NormalizedEngineOptions {
  const maxExpressionLength = opts?.maxExpressionLength ?? DEFAULT_MAX_EXPRESSION_LENGTH;
  const maxDepth = opts?.maxDepth ?? DEFAULT_MAX_DEPTH;

  if (!Number.isInteger(maxExpressionLength) || maxExpressionLength < 1) {
    throw new Error(
      `Predicast: maxExpressionLength must be a positive integer, got ${String(maxExpressionLength)}.`,
    );
  }
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new Error(
      `Predicast: maxDepth must be a positive integer, got ${String(maxDepth)}.`,
    );
  }

  let methods = builtinMethods;
  for (const descriptor of opts?.methods ?? []) {
    methods = methods.with(descriptor);
  }

  return Object.freeze({ maxExpressionLength, maxDepth, methods });
}

/**
 * Reject input that must never reach the lexer.
 */
function validateSource(source: unknown, maxLength: number): string {
  if (typeof source !== 'string') {
    throw createInputError({
      message: `Predicast: expression source must be a string, got ${source === null ? 'null' : typeof source}.`,
    });
  }
  if (source.trim() === '') {
    throw createInputError({
      message: 'Predicast: expression source must not be empty.',
    });
  }
  if (source.length > maxLength) {
    throw createInputError({
      message: `Predicast: expression length ${source.length} exceeds the maximum of ${maxLength} characters.`,
      index: maxLength,
    });
  }
  return source;
}

///////////////////////////////
// Engine implementation core //
///////////////////////////////

class EngineImpl implements Engine {
  public readonly options: NormalizedEngineOptions;

  constructor(options: NormalizedEngineOptions) {
    this.options = options;
  }

  withMethod(descriptor: MethodDescriptor): Engine {
    return new EngineImpl(
      Object.freeze({ ...this.options, methods: this.options.methods.with(descriptor) }),
    );
  }

  deserialize<T>(source: string, type: RecordType<T>): Predicate<T> {
    const ast = this.parse(source);
    return bindPredicate(ast, type, { methods: this.options.methods, source });
  }

  serialize<T>(predicate: Predicate<T>): string {
    return renderPredicate(predicate);
  }

  parse(source: string): ExpressionNode {
    const text = validateSource(source, this.options.maxExpressionLength);
    return parse(tokenize(text), { maxDepth: this.options.maxDepth });
  }
}

////////////////////////
// Public entry point //
////////////////////////

/**
 * Create a new engine.
 *
 * ```ts
 * import { createEngine, defineMethod } from 'predicast';
 *
 * const engine = createEngine({ maxExpressionLength: 2_000 }).withMethod(
 *   defineMethod({
 *     owner: 'string',
 *     name: 'IsBlank',
 *     parameters: [],
 *     returns: 'boolean',
 *     invoke: (self) => typeof self === 'string' && self.trim() === '',
 *   }),
 * );
 *
 * const active = engine.deserialize('!Name.IsBlank() && Age >= 18', PersonType);
 * active.test({ Name: 'Jane', Age: 30 }); // true
 * ```
 */
export function createEngine(options?: EngineOptions): Engine {
  return new EngineImpl(normalizeOptions(options));
}
