/**
 * Predicast – Field registry
 *
 * Describes the types an expression can be bound against. A record type lists
 * its queryable fields by name and value type; nothing outside that list is
 * reachable from an expression.
 *
 *   interface Person { Name: string; Age: number; Company: Company | null }
 *
 *   const CompanyType = defineRecord<Company>('Company', { Name: 'string' });
 *   const PersonType = defineRecord<Person>('Person', {
 *     Name: 'string',
 *     Age: 'int',
 *     Company: CompanyType,
 *   });
 *
 * Field lookup is case-insensitive, so `age > 18` and `Age > 18` bind to the
 * same field; rendering always uses the declared name.
 *
 * License: Apache-2.0
 */

//////////////////////
// Value types      //
//////////////////////

export type ScalarKind = 'string' | 'int' | 'float' | 'boolean';

export const SCALAR_KINDS: readonly ScalarKind[] = ['string', 'int', 'float', 'boolean'];

export interface ScalarType {
  readonly kind: ScalarKind;
}

/**
 * Type of the `null` literal before it meets a typed operand.
 */
export interface NullType {
  readonly kind: 'null';
}

export interface RecordType<T = unknown> {
  readonly kind: 'record';
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];

  /**
   * Case-insensitive lookup by field name.
   */
  findField(name: string): FieldDescriptor | undefined;

  /**
   * Never set. Ties the record type to the shape of `T` at compile time.
   */
  readonly sample?: T;
}

export type ValueType = ScalarType | NullType | RecordType<unknown>;

export const StringType: ScalarType = Object.freeze({ kind: 'string' });
export const IntType: ScalarType = Object.freeze({ kind: 'int' });
export const FloatType: ScalarType = Object.freeze({ kind: 'float' });
export const BooleanType: ScalarType = Object.freeze({ kind: 'boolean' });
export const NullType: NullType = Object.freeze({ kind: 'null' });

export function scalarType(kind: ScalarKind): ScalarType {
  switch (kind) {
    case 'string':
      return StringType;
    case 'int':
      return IntType;
    case 'float':
      return FloatType;
    case 'boolean':
      return BooleanType;
  }
}

export function isScalarKind(value: unknown): value is ScalarKind {
  return SCALAR_KINDS.some((kind) => kind === value);
}

export function isRecordType(type: ValueType): type is RecordType<unknown> {
  return type.kind === 'record';
}

export function isNumericType(type: ValueType): boolean {
  return type.kind === 'int' || type.kind === 'float';
}

/**
 * Name used in error messages: the record name, or the kind for scalars.
 */
export function typeName(type: ValueType): string {
  return isRecordType(type) ? type.name : type.kind;
}

/**
 * Record types compare by identity, everything else by kind.
 */
export function sameType(a: ValueType, b: ValueType): boolean {
  if (isRecordType(a) || isRecordType(b)) return a === b;
  return a.kind === b.kind;
}

//////////////////////
// Fields & members //
//////////////////////

export interface FieldDescriptor {
  /** Declared name, used when rendering. */
  readonly name: string;
  readonly type: ValueType;

  /**
   * Read the field from an instance. Returns `undefined` when the target is
   * not an object.
   */
  read(target: unknown): unknown;
}

/**
 * What a field may be declared as. A thunk defers the lookup of a record
 * type so that types can refer to each other or to themselves.
 */
export type FieldSpec =
  | ScalarKind
  | RecordType<unknown>
  | (() => RecordType<unknown>);

export type FieldMap<T> = {
  readonly [K in keyof T]?: FieldSpec;
};

const IDENTIFIER = /^[\p{L}_][\p{L}\p{Nd}_]*$/u;
const RESERVED = new Set(['true', 'false', 'null']);

/**
 * Declare a record type.
 *
 * Only the listed fields are queryable. Throws a plain `Error` when the
 * declaration itself is invalid (bad names, case-insensitive duplicates,
 * unknown field kinds).
 */
export function defineRecord<T extends object>(
  name: string,
  fields: FieldMap<T>,
): RecordType<T> {
  if (typeof name !== 'string' || name.trim() === '') {
    throw new Error('Predicast: record type name must be a non-empty string.');
  }

  const specs: Readonly<Record<string, FieldSpec | undefined>> = fields;
  const descriptors: FieldDescriptor[] = [];
  const index = new Map<string, FieldDescriptor>();

  for (const fieldName of Object.keys(specs)) {
    const spec = specs[fieldName];
    if (spec === undefined) continue;

    if (!IDENTIFIER.test(fieldName) || RESERVED.has(fieldName)) {
      throw new Error(
        `Predicast: "${fieldName}" on record type "${name}" is not a valid field name.`,
      );
    }

    const key = fieldName.toLowerCase();
    const clash = index.get(key);
    if (clash) {
      throw new Error(
        `Predicast: fields "${clash.name}" and "${fieldName}" on record type "${name}" differ only in case.`,
      );
    }

    const descriptor = createField(name, fieldName, spec);
    descriptors.push(descriptor);
    index.set(key, descriptor);
  }

  const record: RecordType<T> = {
    kind: 'record',
    name,
    fields: Object.freeze(descriptors),
    findField(fieldName: string): FieldDescriptor | undefined {
      return index.get(fieldName.toLowerCase());
    },
  };

  return Object.freeze(record);
}

function createField(recordName: string, name: string, spec: FieldSpec): FieldDescriptor {
  let resolved: ValueType | undefined;

  if (isScalarKind(spec)) {
    resolved = scalarType(spec);
  } else if (typeof spec === 'object' && spec !== null && spec.kind === 'record') {
    resolved = spec;
  } else if (typeof spec !== 'function') {
    throw new Error(
      `Predicast: field "${name}" on record type "${recordName}" has an unknown type.`,
    );
  }

  return Object.freeze({
    name,
    get type(): ValueType {
      if (resolved === undefined) {
        const target = typeof spec === 'function' ? spec() : undefined;
        if (!target || target.kind !== 'record') {
          throw new Error(
            `Predicast: field "${name}" on record type "${recordName}" did not resolve to a record type.`,
          );
        }
        resolved = target;
      }
      return resolved;
    },
    read(target: unknown): unknown {
      if (target === null || typeof target !== 'object') return undefined;
      return Reflect.get(target, name);
    },
  });
}

/**
 * Members available on scalar values.
 */
const STRING_MEMBERS: ReadonlyMap<string, FieldDescriptor> = new Map([
  [
    'length',
    Object.freeze({
      name: 'Length',
      type: IntType,
      read(target: unknown): unknown {
        return typeof target === 'string' ? target.length : undefined;
      },
    }),
  ],
]);

/**
 * Resolve a member on any value type: a field of a record type, or a
 * built-in scalar member such as `string.Length`. Case-insensitive.
 */
export function findMember(type: ValueType, name: string): FieldDescriptor | undefined {
  if (isRecordType(type)) return type.findField(name);
  if (type.kind === 'string') return STRING_MEMBERS.get(name.toLowerCase());
  return undefined;
}
