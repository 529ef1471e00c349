/**
 * Base class for configurable classes
 *
 * The constructor wires positional and keyword arguments to the fields declared on the
 * class. Subclass constructors consume their own options and pass the rest to `super`,
 * so a keyword that nothing declares ends up rejected here.
 */

import { Field, type FieldCell } from './field.js';
import { registryOf } from './tracker.js';
import type { Kwargs } from './types.js';

type Kind<K> = abstract new (...args: never[]) => K;

export function isPlainObject(value: unknown): value is Kwargs {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Split constructor arguments: a trailing plain object holds the keyword arguments
 */
export function splitArguments(args: readonly unknown[]): { positional: unknown[]; kwargs: Kwargs } {
  const last = args[args.length - 1];
  if (args.length && isPlainObject(last)) {
    return { positional: args.slice(0, -1), kwargs: last };
  }
  return { positional: [...args], kwargs: {} };
}

export class FieldContainer {
  constructor(...args: unknown[]) {
    const { positional, kwargs } = splitArguments(args);
    this.assignArguments(positional, kwargs);
  }

  /**
   * Declarations of `kind` on this class, in declaration order
   */
  static collect<K>(kind: Kind<K>): Map<string, K> {
    return registryOf(this).collect(kind);
  }

  /**
   * The declaration registered under `name` on this class
   */
  static declaration(name: string): unknown {
    return registryOf(this).get(name);
  }

  collect<K>(kind: Kind<K>): Map<string, K> {
    return registryOf(this.constructor).collect(kind);
  }

  /**
   * Current values of the fields that are instances of `kind`
   */
  collectValues(kind: Kind<Field<unknown>>): Map<string, unknown> {
    const values = new Map<string, unknown>();
    for (const [name, declaration] of this.collect(kind)) {
      values.set(name, declaration.getValue(this));
    }
    return values;
  }

  /**
   * Current values of all fields
   */
  fieldValues(): Map<string, unknown> {
    return this.collectValues(Field);
  }

  /**
   * A shallow copy whose named fields get the overrides as instance defaults
   */
  at(overrides: Kwargs = {}): this {
    const copy = this.clone();
    for (const [name, value] of Object.entries(overrides)) {
      copy.setDefault(name, value, 'at');
    }
    return copy;
  }

  cell(name: string): FieldCell<unknown> {
    return this.fieldNamed(name).cellOf(this);
  }

  fieldValue(name: string): unknown {
    return this.fieldNamed(name).getValue(this);
  }

  /**
   * Clear the explicit value of a field
   */
  unset(name: string): void {
    this.fieldNamed(name).deleteValue(this);
  }

  getDefault(name: string): unknown {
    return this.fieldNamed(name).getDefault(this);
  }

  setDefault(name: string, value: unknown, caller = 'setDefault'): void {
    this.fieldNamed(name, caller).setDefault(this, value);
  }

  deleteDefault(name: string): void {
    this.fieldNamed(name).deleteDefault(this);
  }

  /**
   * Delete the instance defaults of all fields
   */
  resetDefaults(): void {
    for (const declaration of this.collect(Field).values()) {
      declaration.deleteDefault(this);
    }
  }

  updateDefaults(kwargs: Kwargs = {}): void {
    for (const [name, value] of Object.entries(kwargs)) {
      this.setDefault(name, value, 'updateDefaults');
    }
  }

  /**
   * Copy own properties and every field cell into a new object of the same class
   */
  protected clone(): this {
    const copy: this = Object.create(Object.getPrototypeOf(this));
    Object.assign(copy, this);
    for (const declaration of this.collect(Field).values()) {
      declaration.copyCell(this, copy);
    }
    return copy;
  }

  private fieldNamed(name: string, caller?: string): Field<unknown> {
    const declaration = this.collect(Field).get(name);
    if (!declaration) {
      const where = caller ? `${this.constructor.name}.${caller}` : this.constructor.name;
      throw new TypeError(`"${name}" is an invalid keyword argument for "${where}".`);
    }
    return declaration;
  }

  private assignArguments(positional: unknown[], kwargs: Kwargs): void {
    const fields = this.collect(Field);
    const positionalNames = [...fields].filter(([, declaration]) => declaration.positional).map(([name]) => name);

    if (positional.length > positionalNames.length) {
      throw new TypeError(`Expected at most ${positionalNames.length} positional arguments, got ${positional.length}.`);
    }

    const assigned = new Map<string, unknown>();
    positional.forEach((value, index) => {
      assigned.set(positionalNames[index], value);
    });

    for (const [name, value] of Object.entries(kwargs)) {
      if (assigned.has(name)) {
        throw new TypeError(`Argument "${name}" was specified both positionally and as a keyword argument.`);
      }
      if (!fields.has(name)) {
        throw new TypeError(`"${name}" is an invalid keyword argument for "${this.constructor.name}".`);
      }
      assigned.set(name, value);
    }

    for (const [name, value] of assigned) {
      if (value === undefined) continue;
      const declaration = fields.get(name);
      if (declaration) {
        declaration.setValue(this, value);
      }
    }
  }
}
