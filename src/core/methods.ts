/**
 * Predicast – Method table
 *
 * The host methods an expression may call. Only methods listed in a table
 * are callable; there is no open-ended lookup on the runtime value.
 *
 * Each descriptor names its receiver kind, its parameter kinds and its
 * return kind, and carries the implementation used at evaluation time.
 * Lookup is by receiver kind and exact (case-sensitive) name; a name may
 * have several overloads.
 *
 * License: Apache-2.0
 */

import { isScalarKind, type ScalarKind } from './schema';

/////////////////////
// Descriptors     //
/////////////////////

export interface MethodDescriptor {
  readonly owner: ScalarKind;
  readonly name: string;
  readonly parameters: readonly ScalarKind[];
  readonly returns: ScalarKind;

  /**
   * Called with a non-null receiver. Arguments may be `null` when a `null`
   * literal was passed to a `string` parameter.
   */
  invoke(self: unknown, args: readonly unknown[]): unknown;
}

const METHOD_NAME = /^[\p{L}_][\p{L}\p{Nd}_]*$/u;

/**
 * Validate a user-supplied method descriptor and return a frozen copy.
 *
 *   const shout = defineMethod({
 *     owner: 'string',
 *     name: 'Shout',
 *     parameters: [],
 *     returns: 'string',
 *     invoke: (self) => (typeof self === 'string' ? self.toUpperCase() + '!' : null),
 *   });
 */
export function defineMethod(descriptor: MethodDescriptor): MethodDescriptor {
  const { owner, name, parameters, returns, invoke } = descriptor;

  if (typeof name !== 'string' || !METHOD_NAME.test(name)) {
    throw new Error(`Predicast: "${String(name)}" is not a valid method name.`);
  }
  if (!isScalarKind(owner)) {
    throw new Error(
      `Predicast: method "${name}" has an unknown receiver kind "${String(owner)}".`,
    );
  }
  if (!parameters.every(isScalarKind)) {
    throw new Error(`Predicast: method "${name}" has an invalid parameter list.`);
  }
  if (!isScalarKind(returns)) {
    throw new Error(
      `Predicast: method "${name}" has an unknown return kind "${String(returns)}".`,
    );
  }
  if (typeof invoke !== 'function') {
    throw new Error(
      `Predicast: method "${name}" must provide an invoke function, got ${typeof invoke}.`,
    );
  }

  return Object.freeze({
    owner,
    name,
    parameters: Object.freeze([...parameters]),
    returns,
    invoke,
  });
}

/////////////////////
// Table           //
/////////////////////

/**
 * Immutable lookup table of method descriptors. `with` returns a new table.
 */
export class MethodTable {
  private readonly byKey: ReadonlyMap<string, readonly MethodDescriptor[]>;

  constructor(descriptors: Iterable<MethodDescriptor> = []) {
    const byKey = new Map<string, MethodDescriptor[]>();
    for (const descriptor of descriptors) {
      const key = keyOf(descriptor.owner, descriptor.name);
      const list = byKey.get(key);
      if (list) {
        list.push(descriptor);
      } else {
        byKey.set(key, [descriptor]);
      }
    }
    this.byKey = byKey;
  }

  /**
   * All overloads of `name` on receivers of kind `owner`, in registration
   * order.
   */
  find(owner: ScalarKind, name: string): readonly MethodDescriptor[] {
    return this.byKey.get(keyOf(owner, name)) ?? [];
  }

  /**
   * A new table with `descriptor` added. An existing overload with the same
   * parameter kinds is replaced.
   */
  with(descriptor: MethodDescriptor): MethodTable {
    const next = defineMethod(descriptor);
    const kept = this.list().filter(
      (m) =>
        !(
          m.owner === next.owner &&
          m.name === next.name &&
          sameParameters(m.parameters, next.parameters)
        ),
    );
    return new MethodTable([...kept, next]);
  }

  list(): MethodDescriptor[] {
    return [...this.byKey.values()].flat();
  }

  get size(): number {
    return this.list().length;
  }
}

function keyOf(owner: ScalarKind, name: string): string {
  return `${owner}.${name}`;
}

function sameParameters(a: readonly ScalarKind[], b: readonly ScalarKind[]): boolean {
  return a.length === b.length && a.every((kind, i) => kind === b[i]);
}

//////////////////////
// Built-in methods //
//////////////////////

/**
 * Wrap a string method so that a non-string receiver or argument yields
 * `null` instead of throwing.
 */
function stringMethod(
  name: string,
  parameters: readonly ScalarKind[],
  returns: ScalarKind,
  impl: (self: string, args: readonly string[]) => unknown,
): MethodDescriptor {
  return defineMethod({
    owner: 'string',
    name,
    parameters,
    returns,
    invoke(self, args) {
      if (typeof self !== 'string') return null;
      const strings: string[] = [];
      for (const arg of args) {
        if (typeof arg !== 'string') return null;
        strings.push(arg);
      }
      return impl(self, strings);
    },
  });
}

function toStringMethod(owner: ScalarKind): MethodDescriptor {
  return defineMethod({
    owner,
    name: 'ToString',
    parameters: [],
    returns: 'string',
    invoke: (self) => String(self),
  });
}

function equalsMethod(owner: ScalarKind): MethodDescriptor {
  return defineMethod({
    owner,
    name: 'Equals',
    parameters: [owner],
    returns: 'boolean',
    invoke: (self, args) => self === args[0],
  });
}

export const builtinMethods: MethodTable = new MethodTable([
  stringMethod('Contains', ['string'], 'boolean', (s, [v]) => s.includes(v)),
  stringMethod('StartsWith', ['string'], 'boolean', (s, [v]) => s.startsWith(v)),
  stringMethod('EndsWith', ['string'], 'boolean', (s, [v]) => s.endsWith(v)),
  equalsMethod('string'),
  stringMethod('IndexOf', ['string'], 'int', (s, [v]) => s.indexOf(v)),
  stringMethod('Replace', ['string', 'string'], 'string', (s, [from, to]) =>
    from === '' ? s : s.split(from).join(to),
  ),
  stringMethod('ToLower', [], 'string', (s) => s.toLowerCase()),
  stringMethod('ToUpper', [], 'string', (s) => s.toUpperCase()),
  stringMethod('Trim', [], 'string', (s) => s.trim()),
  toStringMethod('string'),

  toStringMethod('int'),
  equalsMethod('int'),
  toStringMethod('float'),
  equalsMethod('float'),
  toStringMethod('boolean'),
  equalsMethod('boolean'),
]);
