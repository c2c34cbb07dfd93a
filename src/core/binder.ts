/**
 * Predicast – Type binder
 *
 * Walks a parsed AST against a record type and produces a typed predicate.
 * Binding is purely structural: nothing is evaluated.
 *
 *  - member paths resolve segment by segment from the implicit parameter,
 *    case-insensitively, through the record's field registry and then the
 *    scalar members (`string.Length`)
 *  - string and number literals get a concrete type from their text: int,
 *    then float, then boolean, otherwise string
 *  - a constant inferred from a quoted literal is read back as its text when
 *    it meets a string operand or a string parameter
 *  - calls need an explicit receiver and resolve through the method table
 *
 * License: Apache-2.0
 */

import type {
  BinaryExpressionNode,
  ConstantNode,
  ExpressionNode,
  MemberPathNode,
  MethodCallNode,
  UnaryExpressionNode,
} from './ast';
import { createBindingError, createUnsupportedError, type BindingError } from './errors';
import {
  binaryTypeError,
  constant,
  makeBinary,
  memberAccess,
  not,
  parameter,
  resolveMethod,
  retypeAsString,
  type ConstantExpression,
  type Expression,
  type ParameterExpression,
} from './expressions';
import { builtinMethods, type MethodTable } from './methods';
import { createPredicate, type Predicate } from './predicate';
import {
  BooleanType,
  FloatType,
  IntType,
  NullType,
  StringType,
  findMember,
  scalarType,
  typeName,
  type RecordType,
  type ScalarType,
} from './schema';
import { isBinaryOperator } from './tokens';

/////////////////////
// Public API      //
/////////////////////

export interface BindOptions {
  /** Methods callable from the expression. Defaults to the built-ins. */
  methods?: MethodTable;

  /** Source text, for error snippets and `predicate.source`. */
  source?: string;

  /** Name given to the predicate parameter. Defaults to `x`. */
  parameterName?: string;
}

/**
 * Bind an AST to `type`.
 *
 * Throws:
 *  - BindingError for unresolvable members or methods and type mismatches
 *  - UnsupportedError for node shapes with no binding rule
 */
export function bindPredicate<T>(
  ast: ExpressionNode,
  type: RecordType<T>,
  options: BindOptions = {},
): Predicate<T> {
  const binder = new Binder(type, options);
  const body = binder.bind(ast);

  if (body.valueType.kind !== 'boolean') {
    throw binder.error(
      ast,
      `Predicast: expression must evaluate to a boolean, got ${typeName(body.valueType)}.`,
      typeName(body.valueType),
    );
  }

  return createPredicate(type, binder.parameter, body, options.source);
}

/////////////////////
// Literal typing  //
/////////////////////

const INT32 = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(?:\d[\d,]*(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Infer a typed value from literal text.
 *
 *   "42"     → int 42
 *   " -7 "   → int -7
 *   "1,000.5"→ float 1000.5
 *   "2e3"    → float 2000
 *   "TRUE"   → boolean true
 *   "abc"    → string "abc"
 */
export function inferLiteral(raw: string): { value: string | number | boolean; type: ScalarType } {
  const text = raw.trim();

  if (INT32.test(text)) {
    const n = Number(text);
    if (n >= -2147483648 && n <= 2147483647) {
      return { value: n, type: IntType };
    }
  }

  if (FLOAT.test(text)) {
    const n = Number(text.replace(/,/g, ''));
    if (Number.isFinite(n)) {
      return { value: n, type: FloatType };
    }
  }

  const lower = text.toLowerCase();
  if (lower === 'true' || lower === 'false') {
    return { value: lower === 'true', type: BooleanType };
  }

  return { value: raw, type: StringType };
}

/////////////////////
// Binder          //
/////////////////////

class Binder {
  readonly parameter: ParameterExpression;
  private readonly type: RecordType<unknown>;
  private readonly methods: MethodTable;
  private readonly source: string | undefined;

  constructor(type: RecordType<unknown>, options: BindOptions) {
    this.type = type;
    this.parameter = parameter(type, options.parameterName);
    this.methods = options.methods ?? builtinMethods;
    this.source = options.source;
  }

  bind(node: ExpressionNode): Expression {
    switch (node.type) {
      case 'Constant':
        return this.bindConstant(node);
      case 'MemberPath':
        return this.bindPath(node);
      case 'UnaryExpression':
        return this.bindUnary(node);
      case 'BinaryExpression':
        return this.bindBinary(node);
      case 'MethodCall':
        return this.bindCall(node);
      default:
        throw createUnsupportedError({
          message: `Predicast: no binding rule for node "${describe(node)}".`,
          construct: describe(node),
        });
    }
  }

  error(node: ExpressionNode, message: string, member: string, onType = this.type.name): BindingError {
    return createBindingError({
      message,
      source: this.source,
      index: node.start,
      length: Math.max(1, node.end - node.start),
      typeName: onType,
      member,
    });
  }

  private bindConstant(node: ConstantNode): ConstantExpression {
    const { value } = node;
    if (value === null) return constant(null, NullType);
    if (typeof value === 'boolean') return constant(value, BooleanType);

    const inferred = inferLiteral(value);
    const typed = constant(inferred.value, inferred.type);
    if (node.literal === 'string' && inferred.type !== StringType) {
      return { ...typed, literalText: value };
    }
    return typed;
  }

  private bindPath(node: MemberPathNode): Expression {
    let expr: Expression = this.parameter;
    for (const segment of node.segments) {
      const member = findMember(expr.valueType, segment);
      if (!member) {
        const path = node.segments.join('.');
        throw this.error(
          node,
          `Predicast: member "${path}" could not be resolved on type "${this.type.name}".`,
          path,
        );
      }
      expr = memberAccess(expr, member);
    }
    return expr;
  }

  private bindUnary(node: UnaryExpressionNode): Expression {
    const operand = this.bind(node.operand);
    if (operand.valueType.kind !== 'boolean') {
      throw this.error(
        node,
        `Predicast: operator "!" requires a boolean operand, got ${typeName(operand.valueType)}.`,
        '!',
      );
    }
    return not(operand);
  }

  private bindBinary(node: BinaryExpressionNode): Expression {
    if (!isBinaryOperator(node.operator)) {
      throw createUnsupportedError({
        message: `Predicast: operator "${String(node.operator)}" is not supported.`,
        source: this.source,
        index: node.start,
        construct: String(node.operator),
      });
    }

    let left = this.bind(node.left);
    let right = this.bind(node.right);

    if (left.valueType.kind === 'string') right = readAsText(right);
    if (right.valueType.kind === 'string') left = readAsText(left);

    const problem = binaryTypeError(node.operator, left.valueType, right.valueType);
    if (problem !== undefined) {
      throw this.error(node, `Predicast: ${problem}.`, node.operator);
    }
    return makeBinary(node.operator, left, right);
  }

  private bindCall(node: MethodCallNode): Expression {
    if (node.target === null) {
      throw this.error(
        node,
        `Predicast: method "${node.name}" requires an explicit target.`,
        node.name,
      );
    }

    const target = this.bindPath(node.target);
    const args = node.arguments.map((arg) => this.bind(arg));
    const resolved = resolveMethod(target.valueType, node.name, args, this.methods);

    if (!resolved) {
      const onType = typeName(target.valueType);
      throw this.error(
        node,
        `Predicast: method "${node.name}" with ${args.length} argument(s) could not be resolved on type "${onType}".`,
        node.name,
        onType,
      );
    }

    return {
      kind: 'Call',
      target,
      method: resolved.method,
      arguments: resolved.arguments,
      valueType: scalarType(resolved.method.returns),
    };
  }
}

function readAsText(expr: Expression): Expression {
  if (expr.kind === 'Constant' && expr.literalText !== undefined) {
    return retypeAsString(expr);
  }
  return expr;
}

function describe(node: never): string {
  const value: unknown = node;
  if (typeof value === 'object' && value !== null && 'type' in value) {
    return String(value.type);
  }
  return typeof value;
}
