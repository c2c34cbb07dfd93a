/**
 * Predicast – Tokenizer
 *
 * Turns a raw source string into a stream of tokens. This is the only part
 * of the compiler that looks at raw characters.
 *
 * Token categories:
 *  - "identifier" – member and method names
 *  - "boolean"    – true / false
 *  - "null"       – null
 *  - "string"     – "..." with backslash escapes
 *  - "number"     – digits with at most one decimal point
 *  - "operator"   – &&, ||, ==, !=, >, >=, <, <=, !
 *  - "dot", "comma", "openParen", "closeParen"
 *  - "eof"        – artificial end-of-input marker
 *
 * Escapes are not interpreted: the character after a backslash is copied
 * verbatim, so `"a\nb"` lexes to `anb`. Persisted expressions rely on this.
 *
 * License: Apache-2.0
 */

import { createTokenizeError } from './errors';
import type { Token } from './tokens';

/////////////////////
// Public API      //
/////////////////////

/**
 * A lazy, restartable token sequence.
 *
 * Every iteration lexes the source again from the start, so a stream can be
 * walked any number of times. Tokenization errors surface when the
 * iteration reaches the offending character.
 */
export class TokenStream implements Iterable<Token> {
  constructor(public readonly source: string) {}

  [Symbol.iterator](): Iterator<Token> {
    return scan(this.source);
  }

  /**
   * Lex the whole source eagerly. The list always ends with one EOF token.
   */
  toArray(): Token[] {
    return [...this];
  }
}

/**
 * Tokenize an expression source.
 *
 * Throws (lazily, while iterating):
 *  - TokenizationError on unknown characters and lone `=`, `&`, `|`.
 */
export function tokenize(source: string): TokenStream {
  return new TokenStream(source);
}

/////////////////////
// Implementation  //
/////////////////////

function* scan(src: string): Generator<Token, void, undefined> {
  const len = src.length;
  let pos = 0;

  while (pos < len) {
    const ch = src[pos];

    if (isWhitespace(ch)) {
      pos++;
      continue;
    }

    if (isIdentifierStart(ch)) {
      const start = pos;
      pos++;
      while (pos < len && isIdentifierPart(src[pos])) {
        pos++;
      }
      yield classifyWord(src.slice(start, pos), start);
      continue;
    }

    if (ch === '"') {
      const read = readString(src, pos);
      pos = read.token.end;
      yield read.token;
      continue;
    }

    if (isDigit(ch)) {
      const start = pos;
      let sawDot = false;
      while (pos < len && (isDigit(src[pos]) || (!sawDot && src[pos] === '.'))) {
        if (src[pos] === '.') sawDot = true;
        pos++;
      }
      yield { type: 'number', value: src.slice(start, pos), start, end: pos };
      continue;
    }

    const next = pos + 1 < len ? src[pos + 1] : '';
    const start = pos;

    switch (ch) {
      case '.':
        pos++;
        yield { type: 'dot', value: ch, start, end: pos };
        break;

      case ',':
        pos++;
        yield { type: 'comma', value: ch, start, end: pos };
        break;

      case '(':
        pos++;
        yield { type: 'openParen', value: ch, start, end: pos };
        break;

      case ')':
        pos++;
        yield { type: 'closeParen', value: ch, start, end: pos };
        break;

      case '!':
      case '>':
      case '<':
        if (next === '=') {
          pos += 2;
          yield { type: 'operator', value: ch + next, start, end: pos };
        } else {
          pos++;
          yield { type: 'operator', value: ch, start, end: pos };
        }
        break;

      case '=':
      case '&':
      case '|': {
        if (next !== ch) {
          throw createTokenizeError({
            message: `Predicast: unexpected "${ch}" at position ${start} (did you mean "${ch}${ch}"?).`,
            source: src,
            index: start,
            character: ch,
            note: `did you mean "${ch}${ch}"?`,
          });
        }
        pos += 2;
        yield { type: 'operator', value: ch + next, start, end: pos };
        break;
      }

      default:
        throw createTokenizeError({
          message: `Predicast: unexpected character "${ch}" at position ${start}.`,
          source: src,
          index: start,
          character: ch,
        });
    }
  }

  yield { type: 'eof', value: '', start: len, end: len };
}

function classifyWord(word: string, start: number): Token {
  const end = start + word.length;
  if (word === 'true' || word === 'false') {
    return { type: 'boolean', value: word, start, end };
  }
  if (word === 'null') {
    return { type: 'null', value: word, start, end };
  }
  return { type: 'identifier', value: word, start, end };
}

/**
 * Read a double-quoted string starting at `start`.
 *
 * An unterminated literal runs to the end of input. A backslash that is the
 * last character of the source is kept as-is.
 */
function readString(src: string, start: number): { token: Token } {
  const len = src.length;
  let pos = start + 1; // skip opening quote
  let value = '';

  while (pos < len) {
    const ch = src[pos];
    if (ch === '\\' && pos + 1 < len) {
      value += src[pos + 1];
      pos += 2;
    } else if (ch === '"') {
      pos++;
      break;
    } else {
      value += ch;
      pos++;
    }
  }

  return { token: { type: 'string', value, start, end: pos } };
}

////////////////////////////
// Character classification
////////////////////////////

const WHITESPACE = /\s/;
const LETTER = /\p{L}/u;
const LETTER_OR_DIGIT = /[\p{L}\p{Nd}]/u;

function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string): boolean {
  return ch === '_' || LETTER.test(ch);
}

function isIdentifierPart(ch: string): boolean {
  return ch === '_' || LETTER_OR_DIGIT.test(ch);
}
