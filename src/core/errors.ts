/**
 * Predicast – Error types & helpers
 *
 * This module defines the error hierarchy used throughout the library and a
 * small set of utilities to create consistent, helpful error messages.
 *
 * Every failure raised while compiling an expression is a `PredicastError`.
 * The subclass tells which stage failed:
 *
 *  - InputValidationError – blank / oversized input, rejected before lexing
 *  - TokenizationError    – invalid character or malformed operator
 *  - ParseError           – unexpected token, missing ")", depth ceiling, …
 *  - BindingError         – member / method cannot be resolved on the type
 *  - UnsupportedError     – a construct with no binding or rendering rule
 *
 * Common usage:
 *
 *   throw createParseError({
 *     message: 'Predicast: expected ")" at position 12.',
 *     source,
 *     index: 12,
 *     tokenText: '',
 *   });
 *
 * License: Apache-2.0
 */

//////////////////////
// Error code enum  //
//////////////////////

/**
 * High-level error categories.
 *
 * Keep this list small and stable; detailed information should go into
 * the `message`, `note`, `snippet`, and the subclass fields.
 */
export type PredicastErrorCode =
  /**
   * Input rejected before lexing:
   *  - not a string, empty or whitespace only
   *  - longer than `maxExpressionLength`
   */
  | 'E_INPUT'
  /**
   * Lexer failures: unknown characters, lone `=`, `&` or `|`.
   */
  | 'E_TOKENIZE'
  /**
   * Syntax problems found by the parser.
   */
  | 'E_PARSE'
  /**
   * The expression is well-formed but cannot be bound to the target type.
   */
  | 'E_BINDING'
  /**
   * A node or operator with no handling rule.
   */
  | 'E_UNSUPPORTED'
  /**
   * Internal / unexpected errors in the compiler itself.
   * Reserved for invariants that should "never happen".
   */
  | 'E_INTERNAL';

/**
 * Options used when constructing a PredicastError.
 */
export interface PredicastErrorOptions {
  code: PredicastErrorCode;

  /**
   * Human-readable error message (short, single-line where possible).
   */
  message: string;

  /**
   * Optionally, the full original expression source string.
   */
  source?: string;

  /**
   * 0-based character offset in the source string where the error
   * originated (or is best represented).
   */
  index?: number;

  /**
   * Optional length (number of characters) of the offending span.
   * Used to draw a multi-character caret range in the snippet.
   */
  length?: number;

  /**
   * Optional hint appended by UIs, e.g. "did you mean '=='?".
   */
  note?: string;

  /**
   * Optional underlying error (for wrapping).
   */
  cause?: unknown;
}

/**
 * Base class of every error raised while compiling or rendering a predicate.
 *
 * Adds to `Error`:
 *  - `code`    – PredicastErrorCode
 *  - `index`   – 0-based index in the source
 *  - `line`    – 1-based line number
 *  - `column`  – 1-based column number
 *  - `snippet` – the problematic line and caret(s)
 *  - `note`    – optional hint or suggestion
 */
export class PredicastError extends Error {
  public override readonly name: string = 'PredicastError';
  public readonly code: PredicastErrorCode;

  /** 0-based offset in the source (if known). */
  public readonly index: number | null;

  /** 1-based line number (if known). */
  public readonly line: number | null;

  /** 1-based column number (if known). */
  public readonly column: number | null;

  /**
   * Human-friendly snippet with the expression line and a caret under the
   * offending segment, e.g.:
   *
   *   Age > 18 && && Name == "Jane"
   *               ^^ --- unexpected token "&&"
   */
  public readonly snippet: string;

  public readonly note?: string;

  constructor(opts: PredicastErrorOptions) {
    const { message, code, cause } = opts;
    super(message, cause === undefined ? undefined : { cause });

    // Keep `instanceof` working for subclasses after transpilation.
    Object.setPrototypeOf(this, new.target.prototype);

    this.code = code;

    const index =
      typeof opts.index === 'number' && opts.index >= 0 ? opts.index : null;

    let line: number | null = null;
    let column: number | null = null;
    let snippet = '';

    if (opts.source !== undefined && index != null) {
      const snip = buildSnippet(opts.source, index, opts.length ?? 1, message);
      line = snip.line;
      column = snip.column;
      snippet = snip.snippet;
    }

    this.index = index;
    this.line = line;
    this.column = column;
    this.snippet = snippet;
    this.note = opts.note;
  }
}

export class InputValidationError extends PredicastError {
  public override readonly name: string = 'InputValidationError';
}

export class TokenizationError extends PredicastError {
  public override readonly name: string = 'TokenizationError';

  /** The character the lexer could not handle. */
  public readonly character: string;

  constructor(opts: PredicastErrorOptions & { character: string }) {
    super(opts);
    this.character = opts.character;
  }
}

export class ParseError extends PredicastError {
  public override readonly name: string = 'ParseError';

  /** Text of the offending token ("" at end of input). */
  public readonly tokenText: string;

  constructor(opts: PredicastErrorOptions & { tokenText: string }) {
    super(opts);
    this.tokenText = opts.tokenText;
  }
}

export class BindingError extends PredicastError {
  public override readonly name: string = 'BindingError';

  /** Name of the type the lookup ran against. */
  public readonly typeName: string;

  /** Member path, method name or operator that could not be bound. */
  public readonly member: string;

  constructor(
    opts: PredicastErrorOptions & { typeName: string; member: string },
  ) {
    super(opts);
    this.typeName = opts.typeName;
    this.member = opts.member;
  }
}

export class UnsupportedError extends PredicastError {
  public override readonly name: string = 'UnsupportedError';

  /** The node kind or operator with no rule. */
  public readonly construct: string;

  constructor(opts: PredicastErrorOptions & { construct: string }) {
    super(opts);
    this.construct = opts.construct;
  }
}

/**
 * Type guard for PredicastError (any subclass).
 */
export function isPredicastError(err: unknown): err is PredicastError {
  return err instanceof PredicastError;
}

/////////////////////////////
// Public factory helpers  //
/////////////////////////////

type FactoryOptions = Omit<PredicastErrorOptions, 'code'>;

export function createInputError(opts: FactoryOptions): InputValidationError {
  return new InputValidationError({ ...opts, code: 'E_INPUT' });
}

export function createTokenizeError(
  opts: FactoryOptions & { character: string },
): TokenizationError {
  return new TokenizationError({ ...opts, code: 'E_TOKENIZE' });
}

export function createParseError(
  opts: FactoryOptions & { tokenText: string },
): ParseError {
  return new ParseError({ ...opts, code: 'E_PARSE' });
}

export function createBindingError(
  opts: FactoryOptions & { typeName: string; member: string },
): BindingError {
  return new BindingError({ ...opts, code: 'E_BINDING' });
}

export function createUnsupportedError(
  opts: FactoryOptions & { construct: string },
): UnsupportedError {
  return new UnsupportedError({ ...opts, code: 'E_UNSUPPORTED' });
}

/**
 * Create an internal error (broken invariants).
 * Not meant for end users, but gives logs a consistent shape.
 */
export function createInternalError(opts: FactoryOptions): PredicastError {
  return new PredicastError({ ...opts, code: 'E_INTERNAL' });
}

/////////////////////////////
// Snippet & position util //
/////////////////////////////

interface SnippetInfo {
  line: number;
  column: number;
  snippet: string;
}

/**
 * Compute line and column for a given index in the source string.
 * Both are 1-based; CRLF counts as a single line break.
 */
export function computeLineAndColumn(
  source: string,
  index: number,
): { line: number; column: number } {
  index = clamp(index, 0, source.length);

  let line = 1;
  let lastLineStart = 0;

  for (let i = 0; i < source.length && i < index; i++) {
    const ch = source.charCodeAt(i);
    if (ch === 10 /* \n */) {
      line++;
      lastLineStart = i + 1;
    } else if (ch === 13 /* \r */) {
      line++;
      if (i + 1 < source.length && source.charCodeAt(i + 1) === 10) {
        i++;
      }
      lastLineStart = i + 1;
    }
  }

  const column = index - lastLineStart + 1;
  return { line, column };
}

/**
 * Build a snippet showing the line where the error occurred, with one or
 * more carets under the offending span:
 *
 *   Name = "x"
 *        ^ --- Predicast: unexpected "=" (did you mean "=="?)
 */
export function buildSnippet(
  source: string,
  index: number,
  length: number,
  messageForArrow: string,
): SnippetInfo {
  const { line, column } = computeLineAndColumn(source, index);
  const lines = splitLines(source);
  const errorLine = lines[line - 1] ?? '';

  // One past the end is allowed so "end of input" gets a caret too.
  const startCol = clamp(column, 1, errorLine.length + 1);
  const caretLength = Math.max(
    1,
    Math.min(length, errorLine.length - startCol + 1),
  );

  const spaces = ' '.repeat(startCol - 1);
  const carets = '^'.repeat(caretLength);
  const arrowMessage =
    messageForArrow.trim().length > 0 ? ` --- ${messageForArrow}` : '';

  return {
    line,
    column,
    snippet: `${errorLine}\n${spaces}${carets}${arrowMessage}`,
  };
}

function clamp(n: number, min: number, max: number): number {
  if (Number.isNaN(n)) return min;
  if (n < min) return min;
  if (n > max) return max;
  return n;
}

/**
 * Split on \n, \r\n and \r, dropping the line breaks.
 */
function splitLines(source: string): string[] {
  const lines: string[] = [];
  let start = 0;

  for (let i = 0; i < source.length; i++) {
    const ch = source.charCodeAt(i);
    if (ch === 10 /* \n */ || ch === 13 /* \r */) {
      lines.push(source.slice(start, i));
      if (
        ch === 13 &&
        i + 1 < source.length &&
        source.charCodeAt(i + 1) === 10
      ) {
        i++;
      }
      start = i + 1;
    }
  }

  lines.push(source.slice(start));
  return lines;
}
