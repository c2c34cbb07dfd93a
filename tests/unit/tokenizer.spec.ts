// tests/unit/tokenizer.spec.ts
//
// Unit tests for the Predicast tokenizer.
//
// Focus areas:
//  - Token kinds, values and offsets.
//  - Keyword literals, unicode identifiers, numbers.
//  - String literals: verbatim escapes, unterminated input.
//  - Error reporting for unknown characters and lone `=`, `&`, `|`.
//  - Laziness and restartability of the token stream.

import { describe, it, expect } from 'vitest';
import { tokenize, TokenizationError } from '../../src';
import type { Token } from '../../src';

function kinds(source: string): string[] {
  return tokenize(source)
    .toArray()
    .map((t) => t.type);
}

function values(source: string): string[] {
  return tokenize(source)
    .toArray()
    .map((t) => t.value);
}

function captureError(source: string): TokenizationError {
  try {
    tokenize(source).toArray();
  } catch (err) {
    if (err instanceof TokenizationError) return err;
    throw err;
  }
  throw new Error(`expected "${source}" to fail tokenization`);
}

describe('tokenizer', () => {
  describe('basic tokens', () => {
    it('lexes a comparison with offsets', () => {
      const tokens: Token[] = tokenize('Age >= 18').toArray();
      expect(tokens).toEqual([
        { type: 'identifier', value: 'Age', start: 0, end: 3 },
        { type: 'operator', value: '>=', start: 4, end: 6 },
        { type: 'number', value: '18', start: 7, end: 9 },
        { type: 'eof', value: '', start: 9, end: 9 },
      ]);
    });

    it('always ends with exactly one eof token', () => {
      expect(kinds('')).toEqual(['eof']);
      expect(kinds('   ')).toEqual(['eof']);
    });

    it('matches two-character operators greedily', () => {
      expect(values('a&&b||c==d!=e>=f<=g')).toEqual([
        'a', '&&', 'b', '||', 'c', '==', 'd', '!=', 'e', '>=', 'f', '<=', 'g', '',
      ]);
    });

    it('lexes single-character operators and punctuation', () => {
      expect(kinds('!a.b(c, d) > e < f')).toEqual([
        'operator',
        'identifier',
        'dot',
        'identifier',
        'openParen',
        'identifier',
        'comma',
        'identifier',
        'closeParen',
        'operator',
        'identifier',
        'operator',
        'identifier',
        'eof',
      ]);
    });

    it('skips any whitespace, including line breaks and tabs', () => {
      expect(values('\tAge\n>\r\n18 ')).toEqual(['Age', '>', '18', '']);
    });
  });

  describe('identifiers and keywords', () => {
    it('reclassifies true, false and null', () => {
      expect(kinds('true false null')).toEqual(['boolean', 'boolean', 'null', 'eof']);
    });

    it('keeps keyword spellings case-sensitive', () => {
      expect(kinds('True NULL')).toEqual(['identifier', 'identifier', 'eof']);
    });

    it('accepts underscores, digits and unicode letters', () => {
      expect(tokenize('_x1 Größe').toArray().slice(0, 2)).toEqual([
        { type: 'identifier', value: '_x1', start: 0, end: 3 },
        { type: 'identifier', value: 'Größe', start: 4, end: 9 },
      ]);
    });
  });

  describe('numbers', () => {
    it('takes at most one decimal point', () => {
      expect(tokenize('1.2.3').toArray().map((t) => [t.type, t.value])).toEqual([
        ['number', '1.2'],
        ['dot', '.'],
        ['number', '3'],
        ['eof', ''],
      ]);
    });

    it('keeps a trailing decimal point in the number', () => {
      expect(values('12.')).toEqual(['12.', '']);
    });

    it('does not lex a sign', () => {
      const err = captureError('Age > -5');
      expect(err.message).toBe('Predicast: unexpected character "-" at position 6.');
      expect(err.character).toBe('-');
      expect(err.index).toBe(6);
    });
  });

  describe('strings', () => {
    it('reads a double-quoted literal', () => {
      expect(tokenize('Name == "Jane"').toArray()[2]).toEqual({
        type: 'string',
        value: 'Jane',
        start: 8,
        end: 14,
      });
    });

    it('copies the character after a backslash verbatim', () => {
      expect(tokenize('"a\\"b\\\\c\\nd"').toArray()[0].value).toBe('a"b\\cnd');
    });

    it('runs an unterminated literal to the end of input', () => {
      expect(tokenize('"abc').toArray()).toEqual([
        { type: 'string', value: 'abc', start: 0, end: 4 },
        { type: 'eof', value: '', start: 4, end: 4 },
      ]);
    });

    it('keeps a backslash that ends the source', () => {
      expect(tokenize('"ab\\').toArray()[0].value).toBe('ab\\');
    });

    it('keeps whitespace inside the literal', () => {
      expect(tokenize('" a b "').toArray()[0].value).toBe(' a b ');
    });
  });

  describe('errors', () => {
    it('reports a lone "=" with a hint', () => {
      const err = captureError('Age = 18');
      expect(err.code).toBe('E_TOKENIZE');
      expect(err.message).toBe('Predicast: unexpected "=" at position 4 (did you mean "=="?).');
      expect(err.character).toBe('=');
      expect(err.note).toBe('did you mean "=="?');
      expect(err.line).toBe(1);
      expect(err.column).toBe(5);
      expect(err.snippet).toBe(`Age = 18\n    ^ --- ${err.message}`);
    });

    it('reports a lone "&" and a lone "|"', () => {
      expect(captureError('a & b').message).toBe(
        'Predicast: unexpected "&" at position 2 (did you mean "&&"?).',
      );
      expect(captureError('a |').message).toBe(
        'Predicast: unexpected "|" at position 2 (did you mean "||"?).',
      );
    });

    it('reports unknown characters with their position', () => {
      const err = captureError('Age > 1 + 2');
      expect(err.message).toBe('Predicast: unexpected character "+" at position 8.');
      expect(err.character).toBe('+');
    });

    it('rejects brackets and other punctuation', () => {
      expect(captureError('a[0]').character).toBe('[');
      expect(captureError("Name == 'x'").character).toBe("'");
    });
  });

  describe('stream behavior', () => {
    it('is lazy: errors surface only when the bad character is reached', () => {
      const iterator = tokenize('a #')[Symbol.iterator]();
      expect(iterator.next().value).toEqual({ type: 'identifier', value: 'a', start: 0, end: 1 });
      expect(() => iterator.next()).toThrow(TokenizationError);
    });

    it('is restartable', () => {
      const stream = tokenize('Age > 18');
      expect(stream.toArray()).toEqual(stream.toArray());
      expect([...stream]).toHaveLength(4);
    });

    it('exposes its source', () => {
      expect(tokenize('Active').source).toBe('Active');
    });
  });
});
