// tests/unit/evaluator.spec.ts
//
// Unit tests for evaluating typed predicates against records.
//
// Focus areas:
//  - Comparisons, logic and method calls on plain records.
//  - Null propagation through members and calls.
//  - Three-valued logic for && / || / !.
//  - Built-in string, number and boolean methods.

import { describe, it, expect } from 'vitest';
import { createEngine, defineRecord, evaluate, parameter } from '../../src';
import { PersonType, person, type Person } from '../fixtures/people';

const engine = createEngine();

function check(source: string, record: Person): boolean {
  return engine.deserialize(source, PersonType).test(record);
}

describe('evaluator', () => {
  describe('comparisons', () => {
    it('compares ints', () => {
      expect(check('Age > 18', person({ Age: 25 }))).toBe(true);
      expect(check('Age > 18', person({ Age: 10 }))).toBe(false);
      expect(check('Age >= 30 && Age <= 30', person({ Age: 30 }))).toBe(true);
      expect(check('Age < 30', person({ Age: 30 }))).toBe(false);
    });

    it('compares mixed int and float values', () => {
      expect(check('Salary > 1500', person({ Salary: 1500.5 }))).toBe(true);
      expect(check('Age < 30.5', person({ Age: 30 }))).toBe(true);
      expect(check('Salary == "1,500.5"', person({ Salary: 1500.5 }))).toBe(true);
    });

    it('compares strings and booleans by value', () => {
      expect(check('Name == "Jane"', person())).toBe(true);
      expect(check('Name != "jane"', person())).toBe(true);
      expect(check('Active == false', person({ Active: false }))).toBe(true);
    });

    it('compares quoted digits as text against strings', () => {
      expect(check('Name == "007"', person({ Name: '007' }))).toBe(true);
      expect(check('Name == "7"', person({ Name: '007' }))).toBe(false);
    });
  });

  describe('logic', () => {
    it('combines conditions', () => {
      const source = '(Age > 18) && (Name == "Jane")';
      expect(check(source, person({ Age: 30, Name: 'Jane' }))).toBe(true);
      expect(check(source, person({ Age: 30, Name: 'John' }))).toBe(false);
      expect(check(source, person({ Age: 10, Name: 'Jane' }))).toBe(false);
    });

    it('applies precedence', () => {
      const source = 'Name == "A" || Name == "Jane" && Age > 40';
      expect(check(source, person({ Name: 'A', Age: 1 }))).toBe(true);
      expect(check(source, person({ Name: 'Jane', Age: 30 }))).toBe(false);
    });

    it('negates', () => {
      expect(check('!Active', person({ Active: true }))).toBe(false);
      expect(check('!(Age > 18)', person({ Age: 10 }))).toBe(true);
    });
  });

  describe('null handling', () => {
    const noCompany = person({ Company: null });

    it('yields null for members below a null value', () => {
      expect(check('Company.Name == "Acme"', noCompany)).toBe(false);
      expect(check('Company.Name != "Acme"', noCompany)).toBe(true);
      expect(check('Company.Name == null', noCompany)).toBe(true);
    });

    it('compares null fields with the null literal', () => {
      expect(check('Nickname == null', person())).toBe(true);
      expect(check('Nickname != null', person({ Nickname: 'JJ' }))).toBe(true);
    });

    it('treats a relational comparison with null as false', () => {
      expect(check('Company.Employees > 0', noCompany)).toBe(false);
      expect(check('Company.Employees <= 0', noCompany)).toBe(false);
    });

    it('skips calls on a null receiver', () => {
      expect(check('Nickname.StartsWith("J")', person())).toBe(false);
      expect(check('!Nickname.StartsWith("J")', person())).toBe(false);
    });

    it('uses three-valued logic', () => {
      const unknown = 'Company.Name.StartsWith("A")';
      expect(check(`${unknown} || Age > 18`, noCompany)).toBe(true);
      expect(check(`${unknown} || Age > 99`, noCompany)).toBe(false);
      expect(check(`${unknown} && Age > 99`, noCompany)).toBe(false);
      expect(check(`!(${unknown} && Age > 18)`, noCompany)).toBe(false);
      expect(check(`!(${unknown} && Age > 99)`, noCompany)).toBe(true);
    });

    it('passes null arguments to methods, which yield null', () => {
      expect(check('Name.Contains(null)', person())).toBe(false);
      expect(check('!Name.Contains(null)', person())).toBe(false);
    });
  });

  describe('built-in methods', () => {
    const jane = person({ Name: '  Jane  ' });

    it('runs string predicates', () => {
      expect(check('Name.StartsWith("J")', person())).toBe(true);
      expect(check('Name.EndsWith("ne")', person())).toBe(true);
      expect(check('Name.Contains("an")', person())).toBe(true);
      expect(check('Name.Equals("Jane")', person())).toBe(true);
      expect(check('Name.Contains("AN")', person())).toBe(false);
    });

    it('runs string transforms', () => {
      expect(check('Name.ToUpper() == "JANE"', person())).toBe(true);
      expect(check('Name.ToLower() == "jane"', person())).toBe(true);
      expect(check('Name.Trim() == "Jane"', jane)).toBe(true);
      expect(check('Name.Replace("a", "o") == "Jone"', person())).toBe(true);
      expect(check('Name.Replace("", "x") == "Jane"', person())).toBe(true);
      expect(check('Name.ToString() == "Jane"', person())).toBe(true);
    });

    it('reads string lengths and offsets', () => {
      expect(check('Name.Length == 4', person())).toBe(true);
      expect(check('Name.IndexOf("n") == 2', person())).toBe(true);
      expect(check('Name.IndexOf("z") == "-1"', person())).toBe(true);
    });

    it('formats and compares numbers and booleans', () => {
      expect(check('Age.ToString() == "30"', person())).toBe(true);
      expect(check('Salary.ToString() == "1500.5"', person())).toBe(true);
      expect(check('Active.ToString() == "true"', person())).toBe(true);
      expect(check('Age.Equals(30)', person())).toBe(true);
      expect(check('Salary.Equals(1500.5)', person())).toBe(true);
      expect(check('Active.Equals(false)', person())).toBe(false);
    });
  });

  describe('evaluate', () => {
    it('reads the parameter as the input record', () => {
      const record = person();
      expect(evaluate(parameter(PersonType), record)).toBe(record);
      expect(evaluate(parameter(PersonType), undefined)).toBeNull();
    });

    it('reads undefined fields as null', () => {
      interface Sparse {
        Label?: string;
      }
      const SparseType = defineRecord<Sparse>('Sparse', { Label: 'string' });
      const predicate = engine.deserialize('Label == null', SparseType);
      expect(predicate.test({})).toBe(true);
      expect(predicate.test({ Label: 'x' })).toBe(false);
    });

    it('only reads declared fields from the record', () => {
      const predicate = engine.deserialize('Name == "Jane"', PersonType);
      const record = Object.assign(person(), { name: 'Other' });
      expect(predicate.test(record)).toBe(true);
    });
  });
});
