// tests/unit/expressions.spec.ts
//
// Unit tests for building typed expressions and predicates in code.

import { describe, it, expect } from 'vitest';
import {
  allOf,
  andAlso,
  anyOf,
  BindingError,
  BooleanType,
  call,
  constant,
  convert,
  createEngine,
  defineRecord,
  equal,
  FloatType,
  greaterThan,
  IntType,
  lambda,
  lessThanOrEqual,
  member,
  negate,
  not,
  notEqual,
  NullType,
  orElse,
  parameter,
  property,
  renderPredicate,
  StringType,
} from '../../src';
import { CompanyType, PersonType, person, type Person } from '../fixtures/people';

function captureBindingError(run: () => unknown): BindingError {
  try {
    run();
  } catch (err) {
    if (err instanceof BindingError) return err;
    throw err;
  }
  throw new Error('expected a BindingError');
}

describe('expression factories', () => {
  const p = parameter(PersonType);

  it('names the parameter "x" by default', () => {
    expect(p).toEqual({ kind: 'Parameter', name: 'x', valueType: PersonType });
    expect(parameter(PersonType, 'person').name).toBe('person');
  });

  it('infers constant types', () => {
    expect(constant(5).valueType).toBe(IntType);
    expect(constant(1.5).valueType).toBe(FloatType);
    expect(constant(2 ** 31).valueType).toBe(FloatType);
    expect(constant('a').valueType).toBe(StringType);
    expect(constant(true).valueType).toBe(BooleanType);
    expect(constant(null).valueType).toBe(NullType);
    expect(constant(5, FloatType).valueType).toBe(FloatType);
  });

  it('resolves properties and dotted paths', () => {
    expect(property(p, 'age')).toMatchObject({ kind: 'Member', member: { name: 'Age' }, valueType: IntType });
    expect(member(p, 'Company.Name').valueType).toBe(StringType);
    expect(member(p, 'Company').valueType).toBe(CompanyType);
  });

  it('rejects unknown properties', () => {
    const err = captureBindingError(() => property(p, 'Nope'));
    expect(err.message).toBe('Predicast: member "Nope" could not be resolved on type "Person".');
    expect(err.member).toBe('Nope');
    expect(captureBindingError(() => member(p, 'Company.Nope')).typeName).toBe('Company');
  });

  it('type-checks binary operands', () => {
    const err = captureBindingError(() => equal(property(p, 'Name'), constant(1)));
    expect(err.message).toBe('Predicast: operator "==" cannot compare string with int.');
    expect(err.member).toBe('==');
    expect(() => andAlso(constant(true), constant(1))).toThrow(
      'Predicast: operator "&&" requires boolean operands, got boolean and int.',
    );
  });

  it('converts the int side of a mixed comparison', () => {
    const expr = lessThanOrEqual(property(p, 'Age'), property(p, 'Salary'));
    expect(expr.left).toMatchObject({ kind: 'Convert', valueType: FloatType });
    expect(expr.right.kind).toBe('Member');
    expect(expr.valueType).toBe(BooleanType);
  });

  it('limits conversions to int → float and null → string or record', () => {
    expect(convert(constant(1), FloatType).valueType).toBe(FloatType);
    expect(convert(constant(null), CompanyType).valueType).toBe(CompanyType);
    expect(() => convert(property(p, 'Name'), IntType)).toThrow('Predicast: cannot convert string to int.');
    expect(() => convert(constant(1.5), IntType)).toThrow('Predicast: cannot convert float to int.');
  });

  it('requires a boolean operand for not', () => {
    expect(() => not(constant(1))).toThrow('Predicast: operator "!" requires a boolean operand, got int.');
  });

  it('resolves calls through the method table', () => {
    const expr = call(property(p, 'Name'), 'Contains', [constant('an')]);
    expect(expr.valueType).toBe(BooleanType);
    expect(expr.method.name).toBe('Contains');
    const err = captureBindingError(() => call(property(p, 'Age'), 'Contains', [constant('a')]));
    expect(err.message).toBe('Predicast: method "Contains" with 1 argument(s) could not be resolved on type "int".');
  });

  it('converts int arguments for float parameters', () => {
    const expr = call(property(p, 'Salary'), 'Equals', [constant(2)]);
    expect(expr.arguments[0]).toMatchObject({ kind: 'Convert', valueType: FloatType });
  });
});

describe('predicates', () => {
  const adult = lambda(PersonType, (p) => greaterThan(property(p, 'Age'), constant(17)));
  const startsWithJ = lambda(PersonType, (p) => call(property(p, 'Name'), 'StartsWith', [constant('J')]));

  it('builds and tests a predicate in code', () => {
    expect(adult.test(person({ Age: 18 }))).toBe(true);
    expect(adult.test(person({ Age: 17 }))).toBe(false);
    expect(adult.source).toBeUndefined();
    expect(renderPredicate(adult)).toBe('(Age > 17)');
  });

  it('requires a boolean body', () => {
    const err = captureBindingError(() => lambda(PersonType, (p) => property(p, 'Age')));
    expect(err.message).toBe('Predicast: a predicate over "Person" must be boolean, got int.');
    expect(err.typeName).toBe('Person');
  });

  it('is frozen', () => {
    expect(Object.isFrozen(adult)).toBe(true);
  });

  it('combines predicates', () => {
    const both = allOf(adult, startsWithJ);
    const either = anyOf(adult, startsWithJ);

    expect(renderPredicate(both)).toBe('((Age > 17) && Name.StartsWith("J"))');
    expect(renderPredicate(either)).toBe('((Age > 17) || Name.StartsWith("J"))');
    expect(renderPredicate(negate(adult))).toBe('!(Age > 17)');

    const ann = person({ Name: 'Ann', Age: 45 });
    expect(both.test(ann)).toBe(false);
    expect(either.test(ann)).toBe(true);
    expect(negate(adult).test(ann)).toBe(false);
  });

  it('combines with compiled predicates', () => {
    const compiled = createEngine().deserialize('Active', PersonType);
    expect(renderPredicate(allOf(compiled, adult, startsWithJ))).toBe(
      '((Active && (Age > 17)) && Name.StartsWith("J"))',
    );
  });

  it('returns the single predicate body unchanged', () => {
    expect(allOf(adult).body).toBe(adult.body);
  });

  it('refuses to combine predicates over different record types', () => {
    const EmployeeType = defineRecord<Person>('Employee', { Name: 'string', Age: 'int' });
    const employee = lambda(EmployeeType, (p) => notEqual(property(p, 'Name'), constant(null)));
    expect(() => allOf(adult, employee)).toThrow(
      'Predicast: cannot combine predicates over "Person" and "Employee".',
    );
  });

  it('builds disjunctions with orElse', () => {
    const predicate = lambda(PersonType, (p) =>
      orElse(equal(property(p, 'Nickname'), constant(null)), call(property(p, 'Nickname'), 'Contains', [constant('J')])),
    );
    expect(predicate.test(person())).toBe(true);
    expect(predicate.test(person({ Nickname: 'JJ' }))).toBe(true);
    expect(predicate.test(person({ Nickname: 'Annie' }))).toBe(false);
  });
});
