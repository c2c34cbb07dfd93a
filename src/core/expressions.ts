/**
 * Predicast – Typed expression model
 *
 * The bound form of a predicate: every node carries its value type, every
 * member access points at a field descriptor and every call at a method
 * descriptor. The binder produces these nodes from an AST; applications can
 * also build them directly with the factory functions below and hand the
 * result to the renderer.
 *
 *   const p = parameter(PersonType);
 *   const body = andAlso(
 *     greaterThan(property(p, 'Age'), constant(18)),
 *     call(property(p, 'Name'), 'StartsWith', [constant('J')]),
 *   );
 *
 * Factories check operand types and throw a `BindingError` on a mismatch.
 *
 * License: Apache-2.0
 */

import { createBindingError } from './errors';
import { builtinMethods, type MethodDescriptor, type MethodTable } from './methods';
import {
  BooleanType,
  FloatType,
  IntType,
  NullType,
  StringType,
  findMember,
  isNumericType,
  isScalarKind,
  scalarType,
  sameType,
  typeName,
  type FieldDescriptor,
  type RecordType,
  type ScalarKind,
  type ValueType,
} from './schema';
import {
  isEqualityOperator,
  isLogicalOperator,
  isRelationalOperator,
  type BinaryOperator,
} from './tokens';

//////////////////////
// Node shapes      //
//////////////////////

export type ExpressionKind =
  | 'Parameter'
  | 'Member'
  | 'Constant'
  | 'Binary'
  | 'Not'
  | 'Call'
  | 'Convert';

export interface ParameterExpression {
  readonly kind: 'Parameter';
  readonly name: string;
  readonly valueType: RecordType<unknown>;
}

export interface MemberExpression {
  readonly kind: 'Member';
  readonly target: Expression;
  readonly member: FieldDescriptor;
  readonly valueType: ValueType;
}

export type ConstantValue = string | number | boolean | null;

export interface ConstantExpression {
  readonly kind: 'Constant';
  readonly value: ConstantValue;
  readonly valueType: ValueType;

  /**
   * Text of the quoted literal this constant was inferred from. Lets the
   * binder read `"123"` as a string when it meets a string operand.
   */
  readonly literalText?: string;
}

export interface BinaryExpression {
  readonly kind: 'Binary';
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
  readonly valueType: ValueType;
}

export interface NotExpression {
  readonly kind: 'Not';
  readonly operand: Expression;
  readonly valueType: ValueType;
}

export interface CallExpression {
  readonly kind: 'Call';
  readonly target: Expression;
  readonly method: MethodDescriptor;
  readonly arguments: readonly Expression[];
  readonly valueType: ValueType;
}

export interface ConvertExpression {
  readonly kind: 'Convert';
  readonly operand: Expression;
  readonly valueType: ValueType;
}

export type Expression =
  | ParameterExpression
  | MemberExpression
  | ConstantExpression
  | BinaryExpression
  | NotExpression
  | CallExpression
  | ConvertExpression;

//////////////////////
// Type rules       //
//////////////////////

/**
 * Why `left operator right` does not type-check, or `undefined` when it does.
 */
export function binaryTypeError(
  operator: BinaryOperator,
  left: ValueType,
  right: ValueType,
): string | undefined {
  if (isLogicalOperator(operator)) {
    if (left.kind === 'boolean' && right.kind === 'boolean') return undefined;
    return `operator "${operator}" requires boolean operands, got ${typeName(left)} and ${typeName(right)}`;
  }

  if (isRelationalOperator(operator)) {
    if (isNumericType(left) && isNumericType(right)) return undefined;
    return `operator "${operator}" requires numeric operands, got ${typeName(left)} and ${typeName(right)}`;
  }

  if (isEqualityOperator(operator)) {
    if (left.kind === 'null' || right.kind === 'null') return undefined;
    if (isNumericType(left) && isNumericType(right)) return undefined;
    if (sameType(left, right)) return undefined;
    return `operator "${operator}" cannot compare ${typeName(left)} with ${typeName(right)}`;
  }

  return `operator "${String(operator)}" is not supported`;
}

/**
 * Whether a value of type `from` may be passed where `to` is expected.
 */
export function isImplicitlyConvertible(from: ValueType, to: ValueType): boolean {
  if (sameType(from, to)) return true;
  if (from.kind === 'int' && to.kind === 'float') return true;
  if (from.kind === 'null') return to.kind === 'string' || to.kind === 'record';
  return false;
}

//////////////////////
// Factories        //
//////////////////////

export function parameter(type: RecordType<unknown>, name = 'x'): ParameterExpression {
  return { kind: 'Parameter', name, valueType: type };
}

/**
 * Access a member by name (case-insensitive) on a record or string value.
 */
export function property(target: Expression, name: string): MemberExpression {
  const member = findMember(target.valueType, name);
  if (!member) {
    throw createBindingError({
      message: `Predicast: member "${name}" could not be resolved on type "${typeName(target.valueType)}".`,
      typeName: typeName(target.valueType),
      member: name,
    });
  }
  return memberAccess(target, member);
}

/**
 * Access a member through a known descriptor.
 */
export function memberAccess(target: Expression, member: FieldDescriptor): MemberExpression {
  return { kind: 'Member', target, member, valueType: member.type };
}

/**
 * Follow a dotted path from `target`, e.g. `member(p, 'Company.Name')`.
 */
export function member(target: Expression, path: string): Expression {
  return path.split('.').reduce<Expression>((expr, segment) => property(expr, segment), target);
}

/**
 * A typed constant. Numbers are `int` when they are safe 32-bit integers and
 * `float` otherwise, unless `type` says otherwise.
 */
export function constant(value: ConstantValue, type?: ValueType): ConstantExpression {
  return { kind: 'Constant', value, valueType: type ?? inferConstantType(value) };
}

function inferConstantType(value: ConstantValue): ValueType {
  if (value === null) return NullType;
  if (typeof value === 'string') return StringType;
  if (typeof value === 'boolean') return BooleanType;
  return Number.isInteger(value) && value >= -2147483648 && value <= 2147483647
    ? IntType
    : FloatType;
}

export function convert(operand: Expression, type: ValueType): ConvertExpression {
  if (!isImplicitlyConvertible(operand.valueType, type)) {
    throw createBindingError({
      message: `Predicast: cannot convert ${typeName(operand.valueType)} to ${typeName(type)}.`,
      typeName: typeName(operand.valueType),
      member: typeName(type),
    });
  }
  return { kind: 'Convert', operand, valueType: type };
}

/**
 * Build a binary node after checking operand types. An `int` operand meeting
 * a `float` one is wrapped in a conversion.
 */
export function makeBinary(
  operator: BinaryOperator,
  left: Expression,
  right: Expression,
): BinaryExpression {
  const problem = binaryTypeError(operator, left.valueType, right.valueType);
  if (problem !== undefined) {
    throw createBindingError({
      message: `Predicast: ${problem}.`,
      typeName: typeName(left.valueType),
      member: operator,
    });
  }

  let l = left;
  let r = right;
  if (l.valueType.kind === 'int' && r.valueType.kind === 'float') {
    l = convert(l, FloatType);
  } else if (l.valueType.kind === 'float' && r.valueType.kind === 'int') {
    r = convert(r, FloatType);
  }

  return { kind: 'Binary', operator, left: l, right: r, valueType: BooleanType };
}

export const equal = (l: Expression, r: Expression): BinaryExpression => makeBinary('==', l, r);
export const notEqual = (l: Expression, r: Expression): BinaryExpression => makeBinary('!=', l, r);
export const greaterThan = (l: Expression, r: Expression): BinaryExpression => makeBinary('>', l, r);
export const greaterThanOrEqual = (l: Expression, r: Expression): BinaryExpression =>
  makeBinary('>=', l, r);
export const lessThan = (l: Expression, r: Expression): BinaryExpression => makeBinary('<', l, r);
export const lessThanOrEqual = (l: Expression, r: Expression): BinaryExpression =>
  makeBinary('<=', l, r);
export const andAlso = (l: Expression, r: Expression): BinaryExpression => makeBinary('&&', l, r);
export const orElse = (l: Expression, r: Expression): BinaryExpression => makeBinary('||', l, r);

export function not(operand: Expression): NotExpression {
  if (operand.valueType.kind !== 'boolean') {
    throw createBindingError({
      message: `Predicast: operator "!" requires a boolean operand, got ${typeName(operand.valueType)}.`,
      typeName: typeName(operand.valueType),
      member: '!',
    });
  }
  return { kind: 'Not', operand, valueType: BooleanType };
}

/**
 * Call a method from `methods` on `target`.
 *
 * Resolution: the first overload whose parameter kinds match the argument
 * types exactly, then the first overload of the same arity whose arguments
 * all convert implicitly.
 */
export function call(
  target: Expression,
  name: string,
  args: readonly Expression[] = [],
  methods: MethodTable = builtinMethods,
): CallExpression {
  const resolved = resolveMethod(target.valueType, name, args, methods);
  if (!resolved) {
    throw createBindingError({
      message: `Predicast: method "${name}" with ${args.length} argument(s) could not be resolved on type "${typeName(target.valueType)}".`,
      typeName: typeName(target.valueType),
      member: name,
    });
  }
  return {
    kind: 'Call',
    target,
    method: resolved.method,
    arguments: resolved.arguments,
    valueType: scalarType(resolved.method.returns),
  };
}

export interface ResolvedMethod {
  readonly method: MethodDescriptor;
  /** Arguments with conversions applied. */
  readonly arguments: readonly Expression[];
}

export function resolveMethod(
  receiver: ValueType,
  name: string,
  args: readonly Expression[],
  methods: MethodTable,
): ResolvedMethod | undefined {
  if (!isScalarKind(receiver.kind)) return undefined;

  const candidates = methods
    .find(receiver.kind, name)
    .filter((m) => m.parameters.length === args.length);

  const exact = candidates.find((m) =>
    m.parameters.every((kind, i) => args[i].valueType.kind === kind),
  );
  if (exact) return { method: exact, arguments: args };

  for (const candidate of candidates) {
    const converted = convertArguments(args, candidate.parameters);
    if (converted) return { method: candidate, arguments: converted };
  }
  return undefined;
}

function convertArguments(
  args: readonly Expression[],
  parameters: readonly ScalarKind[],
): Expression[] | undefined {
  const out: Expression[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const target = scalarType(parameters[i]);

    if (sameType(arg.valueType, target)) {
      out.push(arg);
    } else if (target.kind === 'string' && arg.kind === 'Constant' && arg.literalText !== undefined) {
      out.push(retypeAsString(arg));
    } else if (isImplicitlyConvertible(arg.valueType, target)) {
      out.push(convert(arg, target));
    } else {
      return undefined;
    }
  }
  return out;
}

/**
 * Re-read a constant inferred from a quoted literal as its original text.
 */
export function retypeAsString(constantExpr: ConstantExpression): ConstantExpression {
  return {
    kind: 'Constant',
    value: constantExpr.literalText ?? String(constantExpr.value),
    valueType: StringType,
  };
}
