/**
 * Predicast – Utils / validation
 *
 * Validation that never throws: every problem with an expression becomes an
 * issue in the result, ready to show next to a filter input or to return
 * from an API.
 *
 * On top of what compiling already enforces, callers can restrict:
 *  - which member paths may be referenced (`allowedMembers`)
 *  - which methods may be called (`allowedMethods`, `forbiddenMethods`)
 *  - how large the expression may be (`maxNodes`, `maxMemberPathSegments`)
 *
 * License: Apache-2.0
 */

import { traverse, type ExpressionNode } from '../core/ast';
import { createEngine, type Engine } from '../core/engine';
import { computeLineAndColumn, isPredicastError } from '../core/errors';
import type { Predicate } from '../core/predicate';
import type { RecordType } from '../core/schema';
import type { DiagnosticLocation } from '../core/types';

/////////////////////////////
// Public types            //
/////////////////////////////

export type IssueSeverity = 'error' | 'warning';

export interface ExpressionValidationIssue {
  /**
   * Machine-readable code: a `PredicastErrorCode` for compile failures,
   * `VAL_*` for rule violations.
   */
  code: string;
  message: string;
  note?: string;
  severity: IssueSeverity;
  location?: DiagnosticLocation;

  /** Option that produced the issue, e.g. "allowedMembers", or "compile". */
  rule?: string;
}

export interface ExpressionValidationStats {
  nodeCount: number;
  memberPaths: number;
  methodCalls: number;
}

export interface ExpressionValidationResult {
  /** `true` when no issue has severity "error". */
  ok: boolean;
  issues: ExpressionValidationIssue[];
  stats: ExpressionValidationStats;
}

export interface AstValidationOptions {
  /** Source text, to attach line/column to issue locations. */
  source?: string;

  /** Largest accepted AST node count. */
  maxNodes?: number;

  /** Longest accepted member path, in segments. */
  maxMemberPathSegments?: number;

  /**
   * Member paths that may be referenced, case-insensitive. An entry also
   * allows everything below it: "Company" allows "Company.Name".
   */
  allowedMembers?: readonly string[];

  /** Method names that may be called. */
  allowedMethods?: readonly string[];

  /** Method names that may never be called. Checked after `allowedMethods`. */
  forbiddenMethods?: readonly string[];
}

export interface ValidateExpressionOptions extends Omit<AstValidationOptions, 'source'> {
  /** Engine to compile with. Defaults to a fresh default engine. */
  engine?: Engine;
}

export interface ExpressionValidationReport<T> extends ExpressionValidationResult {
  /** Present only when `ok` is true. */
  predicate?: Predicate<T>;
  /** Present whenever the text parsed. */
  ast?: ExpressionNode;
}

/////////////////////////////
// AST validation          //
/////////////////////////////

/**
 * Check a parsed expression against the optional rules.
 */
export function validateAst(
  ast: ExpressionNode,
  options: AstValidationOptions = {},
): ExpressionValidationResult {
  const { source, maxNodes, maxMemberPathSegments, allowedMembers, allowedMethods, forbiddenMethods } =
    options;

  const issues: ExpressionValidationIssue[] = [];
  const stats: ExpressionValidationStats = { nodeCount: 0, memberPaths: 0, methodCalls: 0 };
  let nodeLimitReported = false;

  const allowedMemberSet = allowedMembers?.map((m) => m.toLowerCase());
  const allowedMethodSet = allowedMethods ? new Set(allowedMethods) : undefined;
  const forbiddenMethodSet = new Set(forbiddenMethods ?? []);

  const locate = (node: ExpressionNode): DiagnosticLocation => {
    const loc: DiagnosticLocation = {
      index: node.start,
      length: Math.max(1, node.end - node.start),
    };
    if (source !== undefined) {
      const lc = computeLineAndColumn(source, node.start);
      loc.line = lc.line;
      loc.column = lc.column;
    }
    return loc;
  };

  traverse(ast, {
    enter(node) {
      stats.nodeCount++;

      if (maxNodes !== undefined && stats.nodeCount > maxNodes && !nodeLimitReported) {
        nodeLimitReported = true;
        issues.push({
          code: 'VAL_MAX_NODE_COUNT',
          rule: 'maxNodes',
          severity: 'error',
          message: `Expression has more than ${maxNodes} nodes.`,
          note: 'Split the filter into smaller expressions.',
          location: locate(node),
        });
      }

      if (node.type === 'MemberPath') {
        stats.memberPaths++;
        const path = node.segments.join('.');

        if (maxMemberPathSegments !== undefined && node.segments.length > maxMemberPathSegments) {
          issues.push({
            code: 'VAL_MAX_PATH_SEGMENTS',
            rule: 'maxMemberPathSegments',
            severity: 'error',
            message: `Member path "${path}" has more than ${maxMemberPathSegments} segments.`,
            location: locate(node),
          });
        }

        if (allowedMemberSet && !isMemberAllowed(path, allowedMemberSet)) {
          issues.push({
            code: 'VAL_MEMBER_NOT_ALLOWED',
            rule: 'allowedMembers',
            severity: 'error',
            message: `Member "${path}" is not allowed.`,
            location: locate(node),
          });
        }
      }

      if (node.type === 'MethodCall') {
        stats.methodCalls++;

        if (allowedMethodSet && !allowedMethodSet.has(node.name)) {
          issues.push({
            code: 'VAL_METHOD_NOT_ALLOWED',
            rule: 'allowedMethods',
            severity: 'error',
            message: `Method "${node.name}" is not allowed.`,
            location: locate(node),
          });
        } else if (forbiddenMethodSet.has(node.name)) {
          issues.push({
            code: 'VAL_METHOD_FORBIDDEN',
            rule: 'forbiddenMethods',
            severity: 'error',
            message: `Method "${node.name}" is forbidden.`,
            location: locate(node),
          });
        }
      }
    },
  });

  return {
    ok: issues.every((i) => i.severity !== 'error'),
    issues,
    stats,
  };
}

function isMemberAllowed(path: string, allowed: readonly string[]): boolean {
  const lower = path.toLowerCase();
  return allowed.some((entry) => lower === entry || lower.startsWith(`${entry}.`));
}

/////////////////////////////
// Source validation       //
/////////////////////////////

/**
 * Compile `source` against `type` and apply the rules. Never throws: compile
 * failures come back as issues carrying the error's code.
 *
 *   const report = validateExpression('Salary > 0', PersonType, {
 *     allowedMembers: ['Name', 'Age'],
 *   });
 *   report.ok;                // false
 *   report.issues[0].message; // 'Member "Salary" is not allowed.'
 */
export function validateExpression<T>(
  source: string,
  type: RecordType<T>,
  options: ValidateExpressionOptions = {},
): ExpressionValidationReport<T> {
  const { engine: providedEngine, ...rules } = options;
  const engine = providedEngine ?? createEngine();

  let ast: ExpressionNode;
  try {
    ast = engine.parse(source);
  } catch (err) {
    return failed(err, source);
  }

  const result = validateAst(ast, { ...rules, source });
  if (!result.ok) {
    return { ...result, ast };
  }

  try {
    const predicate = engine.deserialize(source, type);
    return { ...result, ast, predicate };
  } catch (err) {
    return { ...failed(err, source, result.stats), ast };
  }
}

function failed<T>(
  err: unknown,
  source: string,
  stats: ExpressionValidationStats = { nodeCount: 0, memberPaths: 0, methodCalls: 0 },
): ExpressionValidationReport<T> {
  const issue: ExpressionValidationIssue = {
    code: 'E_INTERNAL',
    rule: 'compile',
    severity: 'error',
    message: err instanceof Error ? err.message : String(err),
  };

  if (isPredicastError(err)) {
    issue.code = err.code;
    if (err.note !== undefined) issue.note = err.note;
    if (err.index !== null) {
      issue.location = { index: err.index, length: 1 };
      if (typeof source === 'string') {
        const lc = computeLineAndColumn(source, err.index);
        issue.location.line = lc.line;
        issue.location.column = lc.column;
      }
    }
  }

  return { ok: false, issues: [issue], stats };
}
