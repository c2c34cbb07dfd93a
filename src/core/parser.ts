/**
 * Predicast – Parser core
 *
 * Recursive-descent parser that turns a token sequence into exactly one AST
 * root. Precedence, lowest to highest:
 *
 *   ||  →  &&  →  == !=  →  > >= < <=  →  !  →  primary
 *
 * Every binary level is a left-associative loop. Parenthesized groups count
 * towards a nesting ceiling that is checked before the parser recurses.
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
import { createParseError } from './errors';
import type { Token, TokenType } from './tokens';
import {
  isEqualityOperator,
  isRelationalOperator,
  type BinaryOperator,
} from './tokens';
import { tokenize, TokenStream } from './tokenizer';

/////////////////////
// Public API      //
/////////////////////

export const DEFAULT_MAX_DEPTH = 100;

export interface ParseOptions {
  /**
   * Maximum nesting of parenthesized groups. Defaults to 100.
   */
  maxDepth?: number;

  /**
   * Source text used for error snippets. Taken from the stream itself when
   * `tokens` is a `TokenStream`.
   */
  source?: string;
}

/**
 * Parse a token sequence into an AST.
 *
 * Throws:
 *  - TokenizationError raised by the lexer while tokens are pulled
 *  - ParseError on any syntax problem
 */
export function parse(
  tokens: Iterable<Token>,
  options: ParseOptions = {},
): ExpressionNode {
  const source =
    options.source ?? (tokens instanceof TokenStream ? tokens.source : undefined);
  const parser = new Parser(tokens[Symbol.iterator](), {
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    source,
  });
  return parser.parseRoot();
}

/**
 * Tokenize and parse a source string.
 */
export function parseExpression(
  source: string,
  options: Omit<ParseOptions, 'source'> = {},
): ExpressionNode {
  return parse(tokenize(source), { ...options, source });
}

/////////////////////
// Parser class    //
/////////////////////

interface ParserConfig {
  maxDepth: number;
  source: string | undefined;
}

class Parser {
  private readonly tokens: Iterator<Token>;
  private readonly maxDepth: number;
  private readonly src: string | undefined;
  private token: Token;
  private depth = 0;
  private exhausted = false;

  constructor(tokens: Iterator<Token>, config: ParserConfig) {
    this.tokens = tokens;
    this.maxDepth = config.maxDepth;
    this.src = config.source;
    this.token = { type: 'eof', value: '', start: 0, end: 0 };
    this.nextToken();
  }

  parseRoot(): ExpressionNode {
    const expr = this.parseOr();
    if (this.token.type !== 'eof') {
      this.fail(
        `Predicast: unexpected token "${this.token.value}" after end of expression at position ${this.token.start}.`,
      );
    }
    return expr;
  }

  ///////////////////////////
  // Binary levels         //
  ///////////////////////////

  private parseOr(): ExpressionNode {
    let expr = this.parseAnd();
    while (this.matchOperator('||')) {
      this.nextToken();
      expr = binary('||', expr, this.parseAnd());
    }
    return expr;
  }

  private parseAnd(): ExpressionNode {
    let expr = this.parseEquality();
    while (this.matchOperator('&&')) {
      this.nextToken();
      expr = binary('&&', expr, this.parseEquality());
    }
    return expr;
  }

  private parseEquality(): ExpressionNode {
    let expr = this.parseRelational();
    for (;;) {
      const op = this.token.value;
      if (this.token.type !== 'operator' || !isEqualityOperator(op)) break;
      this.nextToken();
      expr = binary(op, expr, this.parseRelational());
    }
    return expr;
  }

  private parseRelational(): ExpressionNode {
    let expr = this.parseUnary();
    for (;;) {
      const op = this.token.value;
      if (this.token.type !== 'operator' || !isRelationalOperator(op)) break;
      this.nextToken();
      expr = binary(op, expr, this.parseUnary());
    }
    return expr;
  }

  ///////////////////////////
  // Unary & primary       //
  ///////////////////////////

  private parseUnary(): ExpressionNode {
    // A run of `!` is collected in a loop; only parentheses count towards
    // the nesting ceiling.
    const starts: number[] = [];
    while (this.matchOperator('!')) {
      starts.push(this.token.start);
      this.nextToken();
    }

    let expr = this.parsePrimary();
    for (let i = starts.length - 1; i >= 0; i--) {
      const node: UnaryExpressionNode = {
        type: 'UnaryExpression',
        operator: '!',
        operand: expr,
        start: starts[i],
        end: expr.end,
      };
      expr = node;
    }
    return expr;
  }

  private parsePrimary(): ExpressionNode {
    const tok = this.token;

    switch (tok.type) {
      case 'openParen':
        return this.nested(() => {
          this.nextToken();
          const inner = this.parseOr();
          this.expectCloseParen();
          return inner;
        });

      case 'identifier':
        return this.parsePathOrCall();

      case 'string':
      case 'number':
        this.nextToken();
        return constant(tok.value, tok.type, tok);

      case 'boolean':
        this.nextToken();
        return constant(tok.value === 'true', 'boolean', tok);

      case 'null':
        this.nextToken();
        return constant(null, 'null', tok);

      case 'eof':
        return this.fail(
          `Predicast: unexpected end of input at position ${tok.start}.`,
        );

      default:
        return this.fail(
          `Predicast: unexpected token "${tok.value}" at position ${tok.start}.`,
        );
    }
  }

  /**
   * path := IDENT ('.' IDENT)*, optionally followed by an argument list.
   * With an argument list the last segment is the method name and the
   * preceding ones, if any, the receiver.
   */
  private parsePathOrCall(): ExpressionNode {
    const first = this.token;
    const segments: string[] = [first.value];
    const ends: number[] = [first.end];
    this.nextToken();

    while (this.check('dot')) {
      this.nextToken();
      if (!this.check('identifier')) {
        this.fail(
          `Predicast: expected an identifier after "." at position ${this.token.start}.`,
        );
      }
      segments.push(this.token.value);
      ends.push(this.token.end);
      this.nextToken();
    }

    if (!this.check('openParen')) {
      const path: MemberPathNode = {
        type: 'MemberPath',
        segments,
        start: first.start,
        end: ends[ends.length - 1],
      };
      return path;
    }

    const name = segments[segments.length - 1];
    const targetSegments = segments.slice(0, -1);
    let target: MemberPathNode | null = null;
    if (targetSegments.length > 0) {
      target = {
        type: 'MemberPath',
        segments: targetSegments,
        start: first.start,
        end: ends[targetSegments.length - 1],
      };
    }

    this.nextToken(); // consume '('
    const args: ExpressionNode[] = [];
    if (!this.check('closeParen')) {
      args.push(this.parseOr());
      while (this.check('comma')) {
        this.nextToken();
        args.push(this.parseOr());
      }
    }
    const closeEnd = this.expectCloseParen();

    const node: MethodCallNode = {
      type: 'MethodCall',
      target,
      name,
      arguments: args,
      start: first.start,
      end: closeEnd,
    };
    return node;
  }

  ///////////////////////////
  // Token helpers & depth //
  ///////////////////////////

  /**
   * Run `body` one nesting level deeper. The ceiling is checked before
   * recursing and the level is restored however `body` exits.
   */
  private nested<T>(body: () => T): T {
    if (this.depth + 1 > this.maxDepth) {
      this.fail(
        `Predicast: maximum nesting depth of ${this.maxDepth} exceeded at position ${this.token.start}.`,
      );
    }
    this.depth++;
    try {
      return body();
    } finally {
      this.depth--;
    }
  }

  private check(type: TokenType): boolean {
    return this.token.type === type;
  }

  private matchOperator(op: string): boolean {
    return this.token.type === 'operator' && this.token.value === op;
  }

  /**
   * Consume a `)` and return its end offset.
   */
  private expectCloseParen(): number {
    if (!this.check('closeParen')) {
      this.fail(`Predicast: expected ")" at position ${this.token.start}.`);
    }
    const end = this.token.end;
    this.nextToken();
    return end;
  }

  private nextToken(): void {
    if (this.exhausted) return;
    const next = this.tokens.next();
    if (next.done) {
      // A hand-built token list without an EOF marker.
      this.exhausted = true;
      this.token = { type: 'eof', value: '', start: this.token.end, end: this.token.end };
      return;
    }
    this.token = next.value;
    this.exhausted = next.value.type === 'eof';
  }

  private fail(message: string): never {
    throw createParseError({
      message,
      source: this.src,
      index: this.token.start,
      length: Math.max(1, this.token.end - this.token.start),
      tokenText: this.token.value,
    });
  }
}

//////////////////////
// Node builders    //
//////////////////////

function binary(
  operator: BinaryOperator,
  left: ExpressionNode,
  right: ExpressionNode,
): BinaryExpressionNode {
  return {
    type: 'BinaryExpression',
    operator,
    left,
    right,
    start: left.start,
    end: right.end,
  };
}

function constant(
  value: ConstantNode['value'],
  literal: ConstantNode['literal'],
  tok: Token,
): ConstantNode {
  return { type: 'Constant', value, literal, start: tok.start, end: tok.end };
}
