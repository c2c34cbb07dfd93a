/**
 * Predicast – AST core types
 *
 * The syntax tree produced by the parser and consumed by the binder and the
 * tooling in `utils/`. Nodes are plain immutable objects discriminated by
 * `type`; every node owns its children and carries the source span it was
 * parsed from.
 *
 * License: Apache-2.0
 */

import type { BinaryOperator, UnaryOperator } from './tokens';

/////////////////////////
// Base node & helpers //
/////////////////////////

export type NodeType =
  | 'BinaryExpression'
  | 'UnaryExpression'
  | 'MemberPath'
  | 'Constant'
  | 'MethodCall';

export interface BaseNode {
  readonly type: NodeType;
  /** 0-based offset of the first character of the node. */
  readonly start: number;
  /** 0-based offset one past the last character of the node. */
  readonly end: number;
}

////////////////////
// Concrete nodes //
////////////////////

export interface BinaryExpressionNode extends BaseNode {
  readonly type: 'BinaryExpression';
  readonly operator: BinaryOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryExpressionNode extends BaseNode {
  readonly type: 'UnaryExpression';
  readonly operator: UnaryOperator;
  readonly operand: ExpressionNode;
}

/**
 * Dotted member access rooted at the predicate's implicit parameter.
 * `Company.Name` → `segments: ['Company', 'Name']`.
 */
export interface MemberPathNode extends BaseNode {
  readonly type: 'MemberPath';
  readonly segments: readonly string[];
}

/**
 * Where a constant came from in the source text.
 */
export type LiteralKind = 'string' | 'number' | 'boolean' | 'null';

/**
 * A literal value.
 *
 *  - string / number literals keep their raw text; the binder infers the
 *    concrete type later
 *  - boolean literals hold `true` / `false`
 *  - the `null` keyword holds `null`
 */
export interface ConstantNode extends BaseNode {
  readonly type: 'Constant';
  readonly value: string | boolean | null;
  readonly literal: LiteralKind;
}

/**
 * `Name.StartsWith("J")` → target `Name`, name `StartsWith`.
 * A call written without a receiver (`Foo()`) has a `null` target.
 */
export interface MethodCallNode extends BaseNode {
  readonly type: 'MethodCall';
  readonly target: MemberPathNode | null;
  readonly name: string;
  readonly arguments: readonly ExpressionNode[];
}

export type ExpressionNode =
  | BinaryExpressionNode
  | UnaryExpressionNode
  | MemberPathNode
  | ConstantNode
  | MethodCallNode;

////////////////////
// Type guards    //
////////////////////

export function isBinary(node: ExpressionNode): node is BinaryExpressionNode {
  return node.type === 'BinaryExpression';
}

export function isUnary(node: ExpressionNode): node is UnaryExpressionNode {
  return node.type === 'UnaryExpression';
}

export function isMemberPath(node: ExpressionNode): node is MemberPathNode {
  return node.type === 'MemberPath';
}

export function isConstant(node: ExpressionNode): node is ConstantNode {
  return node.type === 'Constant';
}

export function isMethodCall(node: ExpressionNode): node is MethodCallNode {
  return node.type === 'MethodCall';
}

///////////////////////////////
// Traversal / visitor utils //
///////////////////////////////

/**
 * Returning `"skip"` from `enter` skips the children of that node.
 * Returning `"break"` aborts the whole traversal.
 */
export type VisitResult = void | 'skip' | 'break';

export interface Visitor {
  enter?(node: ExpressionNode, parent: ExpressionNode | null): VisitResult;
  leave?(node: ExpressionNode, parent: ExpressionNode | null): void;
}

/**
 * Depth-first, pre-order traversal. A method call's target path is visited
 * before its arguments.
 */
export function traverse(root: ExpressionNode, visitor: Visitor): void {
  walk(root, null, visitor);
}

function walk(
  node: ExpressionNode,
  parent: ExpressionNode | null,
  visitor: Visitor,
): 'break' | void {
  const entered = visitor.enter?.(node, parent);
  if (entered === 'break') return 'break';
  if (entered === 'skip') return;

  switch (node.type) {
    case 'MemberPath':
    case 'Constant':
      break;

    case 'UnaryExpression':
      if (walk(node.operand, node, visitor) === 'break') return 'break';
      break;

    case 'BinaryExpression':
      if (walk(node.left, node, visitor) === 'break') return 'break';
      if (walk(node.right, node, visitor) === 'break') return 'break';
      break;

    case 'MethodCall':
      if (node.target && walk(node.target, node, visitor) === 'break') {
        return 'break';
      }
      for (const arg of node.arguments) {
        if (walk(arg, node, visitor) === 'break') return 'break';
      }
      break;
  }

  visitor.leave?.(node, parent);
}

//////////////////////////
// Structural equality  //
//////////////////////////

/**
 * Compare two trees by shape, ignoring source positions and the literal
 * origin of constants (`"1"` and `1` compare equal, as do `"true"` and
 * `true`). Constant values are compared by their text.
 */
export function structurallyEqual(a: ExpressionNode, b: ExpressionNode): boolean {
  switch (a.type) {
    case 'BinaryExpression':
      return (
        b.type === 'BinaryExpression' &&
        a.operator === b.operator &&
        structurallyEqual(a.left, b.left) &&
        structurallyEqual(a.right, b.right)
      );

    case 'UnaryExpression':
      return (
        b.type === 'UnaryExpression' &&
        a.operator === b.operator &&
        structurallyEqual(a.operand, b.operand)
      );

    case 'MemberPath':
      return b.type === 'MemberPath' && sameSegments(a.segments, b.segments);

    case 'Constant':
      return b.type === 'Constant' && constantText(a) === constantText(b);

    case 'MethodCall': {
      if (b.type !== 'MethodCall' || a.name !== b.name) return false;
      if (a.target === null || b.target === null) {
        if (a.target !== b.target) return false;
      } else if (!sameSegments(a.target.segments, b.target.segments)) {
        return false;
      }
      if (a.arguments.length !== b.arguments.length) return false;
      return a.arguments.every((arg, i) => structurallyEqual(arg, b.arguments[i]));
    }
  }
}

function sameSegments(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((s, i) => s === b[i]);
}

function constantText(node: ConstantNode): string | null {
  return node.value === null ? null : String(node.value);
}

////////////////////
// Debug printing //
////////////////////

/**
 * Render a tree as a compact S-expression, e.g.
 *
 *   (|| (== a 1) (&& (== b 2) (== c 3)))
 */
export function printAst(node: ExpressionNode): string {
  switch (node.type) {
    case 'BinaryExpression':
      return `(${node.operator} ${printAst(node.left)} ${printAst(node.right)})`;
    case 'UnaryExpression':
      return `(${node.operator} ${printAst(node.operand)})`;
    case 'MemberPath':
      return node.segments.join('.');
    case 'Constant':
      if (node.literal === 'string') return JSON.stringify(node.value);
      return String(node.value);
    case 'MethodCall': {
      const callee = node.target
        ? `${node.target.segments.join('.')}.${node.name}`
        : node.name;
      const args = node.arguments.map(printAst);
      return args.length > 0 ? `(call ${callee} ${args.join(' ')})` : `(call ${callee})`;
    }
  }
}
