/**
 * Predicast – Utils / inspect
 *
 * Helpers for:
 *  - Formatting Predicast errors for logs and user-facing messages.
 *  - Introspecting parsed expressions (AST-level).
 *  - Producing a readable report for a predicate or a source string.
 *
 * The library never logs on its own; these helpers turn what it throws into
 * something a logger or UI can take.
 *
 * License: Apache-2.0
 */

import { traverse, type ExpressionNode } from '../core/ast';
import { createEngine, type Engine } from '../core/engine';
import {
  BindingError,
  ParseError,
  TokenizationError,
  UnsupportedError,
  buildSnippet,
  isPredicastError,
  type PredicastErrorCode,
} from '../core/errors';
import type { Predicate } from '../core/predicate';
import { renderPredicate } from '../core/renderer';
import type { RecordType } from '../core/schema';

/////////////////////////////
// Error formatting        //
/////////////////////////////

/**
 * Flat, JSON-serializable view of a thrown value.
 */
export interface FormattedPredicastError {
  /** `E_UNKNOWN` for values that are not Predicast errors. */
  code: PredicastErrorCode | 'E_UNKNOWN';
  name: string;
  message: string;
  index: number | null;
  line: number | null;
  column: number | null;
  snippet: string;
  note?: string;

  /** TokenizationError */
  character?: string;
  /** ParseError */
  tokenText?: string;
  /** BindingError */
  typeName?: string;
  /** BindingError */
  member?: string;
  /** UnsupportedError */
  construct?: string;

  /**
   * Single line: `[E_PARSE] Predicast: ... at line 1, col 5`.
   */
  summary: string;
}

/**
 * Turn any thrown value into a flat record for a structured logger.
 *
 * When the error carries an index but no snippet (the source was not known
 * where it was thrown) and `source` is given, the snippet is built here.
 */
export function formatPredicastError(err: unknown, source?: string): FormattedPredicastError {
  if (!isPredicastError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      code: 'E_UNKNOWN',
      name: err instanceof Error ? err.name : typeof err,
      message,
      index: null,
      line: null,
      column: null,
      snippet: '',
      summary: `Error: ${message}`,
    };
  }

  let { line, column, snippet } = err;
  if (snippet === '' && source !== undefined && err.index !== null) {
    const built = buildSnippet(source, err.index, 1, err.message);
    line = built.line;
    column = built.column;
    snippet = built.snippet;
  }

  const at: string[] = [];
  if (line !== null) at.push(`line ${line}`);
  if (column !== null) at.push(`col ${column}`);

  const formatted: FormattedPredicastError = {
    code: err.code,
    name: err.name,
    message: err.message,
    index: err.index,
    line,
    column,
    snippet,
    summary: `[${err.code}] ${err.message}${at.length > 0 ? ` at ${at.join(', ')}` : ''}`,
  };

  if (err.note !== undefined) formatted.note = err.note;
  if (err instanceof TokenizationError) formatted.character = err.character;
  if (err instanceof ParseError) formatted.tokenText = err.tokenText;
  if (err instanceof BindingError) {
    formatted.typeName = err.typeName;
    formatted.member = err.member;
  }
  if (err instanceof UnsupportedError) formatted.construct = err.construct;

  return formatted;
}

/**
 * Multi-line, human-readable rendering of `formatPredicastError`:
 *
 *   [E_TOKENIZE] Predicast: unexpected "=" at position 4 (did you mean "=="?). at line 1, col 5
 *
 *   Age = 18
 *       ^ --- Predicast: unexpected "=" ...
 *
 *   Hint: did you mean "=="?
 */
export function formatPredicastErrorText(err: unknown, source?: string): string {
  const formatted = formatPredicastError(err, source);
  let detail = formatted.summary;
  if (formatted.snippet.trim() !== '') {
    detail += `\n\n${formatted.snippet}`;
  }
  if (formatted.note !== undefined && formatted.note.trim() !== '') {
    detail += `\n\nHint: ${formatted.note}`;
  }
  return detail;
}

/////////////////////////////
// Expression introspection //
/////////////////////////////

export interface ExpressionAstInsight {
  /** Total number of AST nodes, call targets included. */
  nodeCount: number;

  /** Deepest node, root = 1. */
  maxDepth: number;

  /**
   * Member paths as written, including call targets. Sorted, unique.
   */
  memberPaths: string[];

  /**
   * Names of called methods. Sorted, unique.
   */
  methods: string[];
}

/**
 * Collect high-level facts about a parsed expression. Pure; needs no type.
 */
export function analyzeAst(root: ExpressionNode): ExpressionAstInsight {
  let nodeCount = 0;
  let maxDepth = 0;
  let depth = 0;
  const memberPaths = new Set<string>();
  const methods = new Set<string>();

  traverse(root, {
    enter(node) {
      nodeCount++;
      depth++;
      if (depth > maxDepth) maxDepth = depth;

      if (node.type === 'MemberPath') {
        memberPaths.add(node.segments.join('.'));
      } else if (node.type === 'MethodCall') {
        methods.add(node.name);
      }
    },
    leave() {
      depth--;
    },
  });

  return {
    nodeCount,
    maxDepth,
    memberPaths: [...memberPaths].sort(),
    methods: [...methods].sort(),
  };
}

/////////////////////////////
// Reports                 //
/////////////////////////////

/**
 * Multi-line description of a predicate, for debug logs.
 */
export function inspectPredicate<T>(predicate: Predicate<T>, ast?: ExpressionNode): string {
  const lines: string[] = [];
  lines.push(`Predicast: predicate over ${predicate.type.name}`);
  lines.push('──────────────────────────────');
  if (predicate.source !== undefined) {
    lines.push(`Source: ${JSON.stringify(predicate.source)}`);
  }
  lines.push(`Canonical: ${renderPredicate(predicate)}`);

  if (ast) {
    const insight = analyzeAst(ast);
    lines.push('');
    lines.push(`Nodes: ${insight.nodeCount}`);
    lines.push(`Depth: ${insight.maxDepth}`);
    lines.push(`Member paths: ${insight.memberPaths.length ? insight.memberPaths.join(', ') : '—'}`);
    lines.push(`Methods: ${insight.methods.length ? insight.methods.join(', ') : '—'}`);
  }

  return lines.join('\n');
}

export interface InspectSourceOptions {
  /** Engine to compile with. Defaults to a fresh default engine. */
  engine?: Engine;
}

/**
 * Compile `source` against `type` and describe the result, or the failure.
 * Never throws for bad input.
 */
export function inspectSourceExpression<T>(
  source: string,
  type: RecordType<T>,
  options: InspectSourceOptions = {},
): string {
  const engine = options.engine ?? createEngine();

  try {
    const ast = engine.parse(source);
    const predicate = engine.deserialize(source, type);
    return inspectPredicate(predicate, ast);
  } catch (err) {
    return [
      'Predicast: failed to compile expression',
      '──────────────────────────────',
      `Source: ${JSON.stringify(source)}`,
      '',
      formatPredicastErrorText(err, source),
    ].join('\n');
  }
}
