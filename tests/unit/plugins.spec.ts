// tests/unit/plugins.spec.ts
//
// Unit tests for the text plugin and plugin composition helpers.

import { describe, it, expect } from 'vitest';
import {
  applyPlugins,
  BindingError,
  builtinMethods,
  createEngine,
  createPluginSet,
  defineMethod,
  textMethods,
  textPlugin,
} from '../../src';
import type { ConfigurablePlugin, Plugin, TextPluginOptions } from '../../src';
import defaultTextPlugin from '../../src/plugins/text';
import { PersonType, person } from '../fixtures/people';

describe('textPlugin', () => {
  const engine = textPlugin(createEngine());

  it('registers the case-insensitive methods', () => {
    expect(textMethods().map((m) => m.name)).toEqual([
      'EqualsIgnoreCase',
      'ContainsIgnoreCase',
      'StartsWithIgnoreCase',
      'EndsWithIgnoreCase',
      'IsEmpty',
    ]);
    expect(engine.options.methods.size).toBe(builtinMethods.size + 5);
    expect(defaultTextPlugin).toBe(textPlugin);
  });

  it('compares ignoring case', () => {
    const jane = person({ Name: 'Jane' });
    expect(engine.deserialize('Name.EqualsIgnoreCase("JANE")', PersonType).test(jane)).toBe(true);
    expect(engine.deserialize('Name.ContainsIgnoreCase("AN")', PersonType).test(jane)).toBe(true);
    expect(engine.deserialize('Name.StartsWithIgnoreCase("j")', PersonType).test(jane)).toBe(true);
    expect(engine.deserialize('Name.EndsWithIgnoreCase("NE")', PersonType).test(jane)).toBe(true);
    expect(engine.deserialize('Name.EndsWithIgnoreCase("JA")', PersonType).test(jane)).toBe(false);
  });

  it('treats whitespace-only text as empty', () => {
    const isEmpty = engine.deserialize('Name.IsEmpty()', PersonType);
    expect(isEmpty.test(person({ Name: ' \t' }))).toBe(true);
    expect(isEmpty.test(person({ Name: 'x' }))).toBe(false);
  });

  it('yields null on null values', () => {
    const nick = engine.deserialize('Nickname.IsEmpty() || Name.EqualsIgnoreCase(Nickname)', PersonType);
    expect(nick.test(person({ Nickname: null }))).toBe(false);
    expect(nick.test(person({ Name: 'ann', Nickname: 'ANN' }))).toBe(true);
  });

  it('prefixes method names', () => {
    const prefixed = textPlugin(createEngine(), { prefix: 'Text' });
    expect(prefixed.deserialize('Name.TextIsEmpty()', PersonType).test(person({ Name: '' }))).toBe(true);
    expect(() => prefixed.deserialize('Name.IsEmpty()', PersonType)).toThrow(BindingError);
  });

  it('folds case with the configured locale', () => {
    const turkish = textPlugin(createEngine(), { locale: 'tr' });
    const source = 'Name.EqualsIgnoreCase("ıstanbul")';
    const city = person({ Name: 'ISTANBUL' });
    expect(turkish.deserialize(source, PersonType).test(city)).toBe(true);
    expect(textPlugin(createEngine(), { locale: 'en' }).deserialize(source, PersonType).test(city)).toBe(false);
  });
});

describe('plugin composition', () => {
  const isAdultAge = defineMethod({
    owner: 'int',
    name: 'IsAdult',
    parameters: [],
    returns: 'boolean',
    invoke: (self) => (typeof self === 'number' ? self >= 18 : null),
  });
  const adults: Plugin = (engine) => engine.withMethod(isAdultAge);

  it('applies plugins left to right', () => {
    const engine = applyPlugins(createEngine(), textPlugin, adults);
    expect(engine.options.methods.size).toBe(builtinMethods.size + 6);
    const predicate = engine.deserialize('Age.IsAdult() && !Name.IsEmpty()', PersonType);
    expect(predicate.test(person({ Age: 18 }))).toBe(true);
    expect(predicate.test(person({ Age: 17 }))).toBe(false);
  });

  it('returns the engine unchanged without plugins', () => {
    const engine = createEngine();
    expect(applyPlugins(engine)).toBe(engine);
  });

  it('groups plugins into a named set', () => {
    const set = createPluginSet('filters', textPlugin, adults);
    expect(set.name).toBe('filters');
    expect(set.plugins).toHaveLength(2);
    expect(Object.isFrozen(set.plugins)).toBe(true);
    expect(set.attach(createEngine()).options.methods.size).toBe(builtinMethods.size + 6);
  });

  it('supports configurable plugins', () => {
    const text: ConfigurablePlugin<TextPluginOptions> = (options) => (engine) => textPlugin(engine, options);
    const engine = applyPlugins(createEngine(), text({ prefix: 'Str' }));
    expect(engine.options.methods.find('string', 'StrIsEmpty')).toHaveLength(1);
  });
});
