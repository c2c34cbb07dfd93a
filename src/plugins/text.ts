/**
 * Predicast – Text plugin
 *
 * Extra string methods for filters typed by people rather than programs:
 *
 *   - EqualsIgnoreCase(string)     → boolean
 *   - ContainsIgnoreCase(string)   → boolean
 *   - StartsWithIgnoreCase(string) → boolean
 *   - EndsWithIgnoreCase(string)   → boolean
 *   - IsEmpty()                    → boolean (true for "" and whitespace)
 *
 * Case folding uses `toLocaleLowerCase` with the configured locale.
 *
 *   const engine = textPlugin(createEngine());
 *   engine.deserialize('Name.ContainsIgnoreCase("ja")', PersonType);
 *
 * License: Apache-2.0
 */

import type { Engine } from '../core/engine';
import { defineMethod, type MethodDescriptor } from '../core/methods';

export interface TextPluginOptions {
  /**
   * Prefix added in front of each method name, e.g. "Text" → "TextIsEmpty".
   * Default: '' (no prefix).
   */
  prefix?: string;

  /**
   * Locale passed to `toLocaleLowerCase`. Default: undefined (host default).
   */
  locale?: string;
}

export function textPlugin(engine: Engine, options: TextPluginOptions = {}): Engine {
  return textMethods(options).reduce((eng, method) => eng.withMethod(method), engine);
}

export default textPlugin;

/**
 * The descriptors `textPlugin` registers, for callers that build their own
 * method tables.
 */
export function textMethods(options: TextPluginOptions = {}): MethodDescriptor[] {
  const { prefix = '', locale } = options;
  const fold = (s: string): string => s.toLocaleLowerCase(locale);

  const compare = (
    base: string,
    test: (self: string, arg: string) => boolean,
  ): MethodDescriptor =>
    defineMethod({
      owner: 'string',
      name: `${prefix}${base}`,
      parameters: ['string'],
      returns: 'boolean',
      invoke(self, [arg]) {
        if (typeof self !== 'string' || typeof arg !== 'string') return null;
        return test(fold(self), fold(arg));
      },
    });

  return [
    compare('EqualsIgnoreCase', (s, a) => s === a),
    compare('ContainsIgnoreCase', (s, a) => s.includes(a)),
    compare('StartsWithIgnoreCase', (s, a) => s.startsWith(a)),
    compare('EndsWithIgnoreCase', (s, a) => s.endsWith(a)),
    defineMethod({
      owner: 'string',
      name: `${prefix}IsEmpty`,
      parameters: [],
      returns: 'boolean',
      invoke: (self) => (typeof self === 'string' ? self.trim() === '' : null),
    }),
  ];
}
