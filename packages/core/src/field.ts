/**
 * Field descriptors and their per-instance value cells
 *
 * A field resolves its value through three levels: the explicit value set on an
 * instance, the instance-level default, and the field's own default.
 */

import { describeDType, matchesDType, normalizeDType } from './dtype.js';
import { FieldTypeError, MandatoryFieldError } from './errors.js';
import type { DType, DTypeSpec, ValueOf } from './types.js';

export interface FieldOptions<T> {
  /** Value used when neither an explicit value nor an instance default is set */
  default?: T;
  /** Drop the default, so the field has to be set before it is read */
  mandatory?: boolean;
  /** Accept the field as a positional constructor argument */
  positional?: boolean;
  /** Include the field's value in the identifying metadata of a step */
  identifier?: boolean;
}

export class Field<T = unknown> {
  /** Name the field was declared under, set on registration */
  name = '';

  readonly positional: boolean;
  readonly identifier: boolean;

  private readonly dtypeList: readonly DType[];
  private fieldDefault: T | undefined;
  private readonly cells = new WeakMap<object, FieldCell<T>>();

  constructor(dtype: DTypeSpec, options: FieldOptions<T> = {}) {
    const dtypeList = normalizeDType(dtype);
    if (!dtypeList) {
      throw new FieldTypeError(
        `The dtype of ${this.label} is neither a type, nor a list of types, but "${String(dtype)}".`
      );
    }
    this.dtypeList = dtypeList;
    this.positional = options.positional ?? false;
    this.identifier = options.identifier ?? false;
    this.fieldDefault = options.mandatory ? undefined : this.validate(options.default, 'default value');
  }

  /** Human readable reference used in error messages */
  get label(): string {
    return `${this.constructor.name} "${this.name}"`;
  }

  get dtypes(): readonly DType[] {
    return this.dtypeList;
  }

  get description(): string {
    return describeDType(this.dtypeList);
  }

  get default(): T | undefined {
    return this.fieldDefault;
  }

  set default(value: unknown) {
    this.fieldDefault = this.validate(value, 'default value');
  }

  /** Whether the field has a default value */
  get optional(): boolean {
    return this.fieldDefault !== undefined;
  }

  bindName(name: string): void {
    this.name = name;
  }

  accepts(value: unknown): value is T {
    return matchesDType(value, this.dtypeList);
  }

  /**
   * Hook applied to every value before it is checked, identity by default
   */
  coerce(value: unknown): unknown {
    return value;
  }

  /**
   * Coerce and check a value; `undefined` stays absent
   */
  validate(value: unknown, what: string): T | undefined {
    let coerced: unknown;
    try {
      coerced = this.coerce(value);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new FieldTypeError(`The ${what} of ${this.label} cannot be converted: ${message}`, { cause: err });
    }
    if (coerced === undefined) {
      return undefined;
    }
    if (!this.accepts(coerced)) {
      throw new FieldTypeError(
        `The ${what} of ${this.label} is not of type "${this.description}": ${describeValue(coerced)}.`
      );
    }
    return coerced;
  }

  /**
   * Create a detached cell for this field
   */
  createCell(value?: unknown, defaultValue?: unknown): FieldCell<T> {
    return new FieldCell(this, value, defaultValue);
  }

  /**
   * The cell holding this field's state on `instance`, created on first access
   */
  cellOf(instance: object): FieldCell<T> {
    let cell = this.cells.get(instance);
    if (!cell) {
      cell = this.createCell();
      this.cells.set(instance, cell);
    }
    return cell;
  }

  hasCell(instance: object): boolean {
    return this.cells.has(instance);
  }

  /**
   * Give `target` an independent copy of the cell of `source`
   */
  copyCell(source: object, target: object): void {
    const cell = this.cells.get(source);
    if (cell) {
      this.cells.set(target, cell.clone());
    } else {
      this.cells.delete(target);
    }
  }

  getValue(instance: object): T {
    return this.cellOf(instance).value;
  }

  setValue(instance: object, value: unknown): void {
    this.cellOf(instance).value = value;
  }

  deleteValue(instance: object): void {
    this.cellOf(instance).value = undefined;
  }

  getDefault(instance: object): T | undefined {
    return this.cellOf(instance).default;
  }

  setDefault(instance: object, value: unknown): void {
    this.cellOf(instance).default = value;
  }

  deleteDefault(instance: object): void {
    this.cellOf(instance).default = undefined;
  }
}

/**
 * Per-instance holder of a field's explicit value and instance default
 */
export class FieldCell<T = unknown> {
  private explicitValue: T | undefined;
  private instanceDefault: T | undefined;

  constructor(
    readonly field: Field<T>,
    value?: unknown,
    defaultValue?: unknown
  ) {
    this.instanceDefault = this.check(defaultValue, 'default value');
    this.explicitValue = this.check(value, 'value');
  }

  /** The field's default, read-only from the cell */
  get fallback(): T | undefined {
    return this.field.default;
  }

  get default(): T | undefined {
    return this.instanceDefault !== undefined ? this.instanceDefault : this.fallback;
  }

  /** Setting `undefined` falls back to the field default */
  set default(value: unknown) {
    this.instanceDefault = this.check(value, 'default value');
  }

  get value(): T {
    if (this.explicitValue !== undefined) {
      return this.explicitValue;
    }
    const fallback = this.default;
    if (fallback === undefined) {
      throw new MandatoryFieldError(this.field.name);
    }
    return fallback;
  }

  /** Setting `undefined` falls back to the default */
  set value(value: unknown) {
    this.explicitValue = this.check(value, 'value');
  }

  /** Whether an explicit value is set */
  get isSet(): boolean {
    return this.explicitValue !== undefined;
  }

  /** Whether some default is available */
  get optional(): boolean {
    return this.default !== undefined;
  }

  clone(): FieldCell<T> {
    const copy = this.field.createCell();
    copy.explicitValue = this.explicitValue;
    copy.instanceDefault = this.instanceDefault;
    return copy;
  }

  /**
   * Hook applied to assigned values before the field's own coercion
   */
  protected coerce(value: unknown): unknown {
    return value;
  }

  private check(value: unknown, what: string): T | undefined {
    return this.field.validate(this.coerce(value), what);
  }
}

/**
 * Declare a field; the value type follows from the dtype
 */
export function field<const D extends DTypeSpec>(dtype: D, options: FieldOptions<ValueOf<D>> = {}): Field<ValueOf<D>> {
  return new Field<ValueOf<D>>(dtype, options);
}

export function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'function') return `function ${value.name || '(anonymous)'}`;
  if (typeof value === 'object' && value !== null) {
    return value.constructor && value.constructor !== Object ? `${value.constructor.name} instance` : 'object';
  }
  return String(value);
}
