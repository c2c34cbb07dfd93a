// tests/integration/complex-rules.spec.ts
//
// End-to-end scenarios: filters written as text, stored, reloaded and run
// against collections of records.

import { describe, it, expect } from 'vitest';
import {
  allOf,
  applyPlugins,
  createEngine,
  defineRecord,
  negate,
  textPlugin,
  validateExpression,
} from '../../src';
import type { Predicate, StoredPredicate } from '../../src';
import { people, PersonType, type Person } from '../fixtures/people';

const engine = applyPlugins(createEngine(), textPlugin);

function names(predicate: Predicate<Person>): string[] {
  return people.filter((p) => predicate.test(p)).map((p) => p.Name);
}

describe('filtering collections', () => {
  it('selects adults', () => {
    expect(names(engine.deserialize('Age > 18', PersonType))).toEqual(['Jane', 'Ann', 'Joe']);
  });

  it('combines conditions across nested records', () => {
    const predicate = engine.deserialize(
      'Active && Company.Name == "Acme" && Company.Employees >= 100',
      PersonType,
    );
    expect(names(predicate)).toEqual(['Jane', 'Joe']);
  });

  it('mixes methods, logic and null checks', () => {
    const predicate = engine.deserialize(
      '(Name.StartsWith("J") && Salary > 1000) || (Nickname != null && Nickname.ContainsIgnoreCase("ANN"))',
      PersonType,
    );
    expect(names(predicate)).toEqual(['Jane', 'Ann']);
  });

  it('reads comparisons through a missing company as false', () => {
    expect(names(engine.deserialize('Company.Employees < 50', PersonType))).toEqual(['Ann']);
    expect(names(engine.deserialize('!(Company.Employees < 50)', PersonType))).toEqual(['Jane', 'John', 'Joe']);
    expect(names(engine.deserialize('!Company.Name.StartsWith("A")', PersonType))).toEqual(['Ann']);
    expect(names(engine.deserialize('Company == null', PersonType))).toEqual(['John']);
  });

  it('combines compiled predicates', () => {
    const adult = engine.deserialize('Age >= 18', PersonType);
    const acme = engine.deserialize('Company.Name.EqualsIgnoreCase("acme")', PersonType);
    const both = allOf(adult, acme);

    expect(names(both)).toEqual(['Jane', 'Joe']);
    expect(names(negate(both))).toEqual(['John', 'Ann']);
    expect(engine.serialize(both)).toBe('((Age >= 18) && Company.Name.EqualsIgnoreCase("acme"))');
  });
});

describe('stored filters', () => {
  const stored: StoredPredicate[] = [
    { id: 'adults', typeName: 'Person', source: 'Age >= 18' },
    { id: 'j-names', typeName: 'Person', source: 'name.StartsWith("J")' },
    { id: 'big-employers', typeName: 'Person', source: 'Company.Employees > 100', description: 'Staff over 100' },
  ];

  it('reload from text and render canonically', () => {
    const reloaded = stored.map((entry) => engine.deserialize(entry.source, PersonType));
    expect(reloaded.map((p) => engine.serialize(p))).toEqual([
      '(Age >= 18)',
      'Name.StartsWith("J")',
      '(Company.Employees > 100)',
    ]);
    expect(reloaded.map((p) => names(p))).toEqual([
      ['Jane', 'Ann', 'Joe'],
      ['Jane', 'John', 'Joe'],
      ['Jane', 'Joe'],
    ]);
  });

  it('stay valid when the canonical text is stored instead', () => {
    for (const entry of stored) {
      const canonical = engine.serialize(engine.deserialize(entry.source, PersonType));
      const again = engine.deserialize(canonical, PersonType);
      expect(names(again)).toEqual(names(engine.deserialize(entry.source, PersonType)));
    }
  });
});

describe('user-supplied filters', () => {
  it('restricts what a filter may reference', () => {
    const rules = { allowedMembers: ['Name', 'Age'], allowedMethods: ['StartsWith', 'Contains'], engine };

    const good = validateExpression('Age > 18 && Name.Contains("o")', PersonType, rules);
    expect(good.ok).toBe(true);
    if (good.predicate) expect(names(good.predicate)).toEqual(['Joe']);

    const bad = validateExpression('Salary > 0 || Name.ToLower() == "x"', PersonType, rules);
    expect(bad.issues.map((i) => i.code)).toEqual(['VAL_MEMBER_NOT_ALLOWED', 'VAL_METHOD_NOT_ALLOWED']);
  });

  it('works with types declared elsewhere', () => {
    interface Order {
      Reference: string;
      Total: number;
      Paid: boolean;
    }
    const OrderType = defineRecord<Order>('Order', { Reference: 'string', Total: 'float', Paid: 'boolean' });
    const orders: Order[] = [
      { Reference: 'A-1', Total: 19.99, Paid: true },
      { Reference: 'A-2', Total: 250, Paid: false },
      { Reference: 'B-1', Total: 75.5, Paid: true },
    ];

    const open = engine.deserialize('!Paid || Total > "1,000"', OrderType);
    expect(orders.filter((o) => open.test(o)).map((o) => o.Reference)).toEqual(['A-2']);

    const series = engine.deserialize('Reference.StartsWith("A") && Total < 100', OrderType);
    expect(orders.filter((o) => series.test(o)).map((o) => o.Reference)).toEqual(['A-1']);
    expect(engine.serialize(series)).toBe('(Reference.StartsWith("A") && (Total < 100))');
  });
});
