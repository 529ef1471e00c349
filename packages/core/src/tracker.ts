/**
 * Declaration registry
 *
 * Every class gets an ordered registry of its declarations: the parent's registry
 * first, then the class's own enumerable static properties, then the entries passed to
 * `declareFields`. A re-declared name keeps its position and takes the new value.
 */

import { Field } from './field.js';

type Kind<K> = abstract new (...args: never[]) => K;

export class Registry {
  private readonly entries: ReadonlyMap<string, unknown>;

  constructor(entries: Iterable<readonly [string, unknown]> = []) {
    this.entries = new Map(entries);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * The declaration registered under `name`
   */
  get(name: string): unknown {
    if (!this.entries.has(name)) {
      throw new ReferenceError(`Declaration "${name}" does not exist.`);
    }
    return this.entries.get(name);
  }

  /**
   * Declarations that are instances of `kind`, in declaration order
   */
  collect<K>(kind: Kind<K>): Map<string, K> {
    const result = new Map<string, K>();
    for (const [name, value] of this.entries) {
      if (value instanceof kind) {
        result.set(name, value);
      }
    }
    return result;
  }

  [Symbol.iterator](): IterableIterator<[string, unknown]> {
    return new Map(this.entries).entries();
  }
}

const declared = new WeakMap<Function, Map<string, unknown>>();
const registries = new WeakMap<Function, Registry>();

function isDunder(name: string): boolean {
  return name.length > 4 && name.startsWith('__') && name.endsWith('__');
}

function installAccessor(target: Function, name: string, declaration: Field<unknown>): void {
  Object.defineProperty(target.prototype, name, {
    configurable: true,
    enumerable: false,
    get(this: object) {
      return declaration.getValue(this);
    },
    set(this: object, value: unknown) {
      declaration.setValue(this, value);
    },
  });
}

function bind(target: Function, name: string, declaration: unknown): void {
  if (declaration instanceof Field) {
    declaration.bindName(name);
    installAccessor(target, name, declaration);
  }
}

/**
 * Register declarations for `target`, after its own static properties in order.
 * Fields become accessors on instances of `target`.
 */
export function declareFields(target: Function, declarations: Record<string, unknown>): void {
  if (registries.has(target)) {
    throw new Error(`Declarations of "${target.name}" must be registered before the class is first used.`);
  }
  let own = declared.get(target);
  if (!own) {
    own = new Map();
    declared.set(target, own);
  }
  for (const [name, declaration] of Object.entries(declarations)) {
    if (isDunder(name)) continue;
    own.set(name, declaration);
    bind(target, name, declaration);
  }
}

/**
 * The registry of `target`, built once on first use
 */
export function registryOf(target: Function): Registry {
  const cached = registries.get(target);
  if (cached) {
    return cached;
  }

  const parent: unknown = Object.getPrototypeOf(target);
  const entries = new Map<string, unknown>(
    typeof parent === 'function' && parent !== Function.prototype ? registryOf(parent) : []
  );

  for (const name of Object.keys(target)) {
    if (isDunder(name)) continue;
    const declaration: unknown = Reflect.get(target, name);
    entries.set(name, declaration);
    bind(target, name, declaration);
  }
  for (const [name, declaration] of declared.get(target) ?? []) {
    entries.set(name, declaration);
  }

  const registry = new Registry(entries);
  registries.set(target, registry);
  return registry;
}
