/**
 * Computation units of a pipeline
 */

import { z } from 'zod';
import { NoDataSourceError, NoDataTargetError } from './errors.js';
import { Field, field } from './field.js';
import { FieldContainer } from './fieldContainer.js';
import { getLogger } from './logger.js';
import { isStorable, NoStorage, type Metadata, type Storable } from './storage.js';
import { declareFields } from './tracker.js';
import type { Kwargs } from './types.js';

/**
 * Short form of a field value for `toString`
 */
export function represent(value: unknown): string {
  if (typeof value === 'function') {
    return value.name || 'anonymous';
  }
  if (value instanceof Step) {
    return value.constructor.name;
  }
  if (typeof value === 'object' && value !== null) {
    if (value.constructor && value.constructor !== Object && value.constructor !== Array) {
      return value.constructor.name;
    }
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

/**
 * A unit of computation with a typed configuration
 *
 * `invoke` consults the step's cache before running `operation`, and records the output
 * as checkpoint data when `isCheckpoint` is set.
 */
export abstract class Step<TIn = unknown, TOut = unknown> extends FieldContainer {
  /** Whether a pipeline collects this step's output */
  declare isOutput: boolean;
  /** Whether `invoke` keeps the output for resuming a pipeline */
  declare isCheckpoint: boolean;
  declare cache: Storable;

  checkpointData: TOut | undefined = undefined;

  /** Label of the output in `toString` */
  protected readonly outputLabel: string = 'unknown';

  abstract operation(input: TIn): TOut;

  invoke(input: TIn): TOut {
    const logger = getLogger();
    const meta = this.identifyingMetadata();
    const cache = this.cache;

    let output: TOut;
    try {
      output = cache.read(input, meta) as TOut;
      logger.debug('Cache hit', { step: this.constructor.name });
    } catch (err) {
      if (!(err instanceof NoDataSourceError)) {
        throw err;
      }
      output = this.operation(input);
      this.store(cache, output, input, meta);
    }

    if (this.isCheckpoint) {
      this.checkpointData = output;
    }
    return output;
  }

  /**
   * Class name and the values of identifier fields
   */
  identifyingMetadata(): Metadata {
    const meta: Metadata = { name: this.typeName() };
    for (const [name, declaration] of this.collect(Field)) {
      if (declaration.identifier) {
        meta[name] = declaration.getValue(this);
      }
    }
    return meta;
  }

  /**
   * Name recorded in the identifying metadata, the class name by default
   *
   * Override it to tell apart same-named step classes that share a cache.
   */
  protected typeName(): string {
    return this.constructor.name;
  }

  copy(): this {
    return this.clone();
  }

  toString(): string {
    const parameters = [...this.fieldValues()]
      .filter(([, value]) => Boolean(value))
      .map(([name, value]) => `${name}=${represent(value)}`)
      .join(', ');
    return `${this.constructor.name}(${parameters}) -> ${this.outputLabel}`;
  }

  private store(cache: Storable, output: TOut, input: TIn, meta: Metadata): void {
    try {
      cache.write(output, input, meta);
    } catch (err) {
      if (!(err instanceof NoDataTargetError)) {
        throw err;
      }
      getLogger().debug('Cache write skipped', { step: this.constructor.name, reason: err.message });
    }
  }
}

declareFields(Step, {
  isOutput: field('boolean', { default: false }),
  isCheckpoint: field('boolean', { default: false }),
  cache: field(z.custom<Storable>(isStorable), { default: new NoStorage() }),
});

export type StepFunction = (...args: never[]) => unknown;

function identity(data: unknown): unknown {
  return data;
}

/**
 * Step running a plain function
 */
export class FunctionStep extends Step {
  declare fn: StepFunction;
  /** Pass the step itself as the first argument */
  declare bindSelf: boolean;

  operation(input: unknown): unknown {
    const args: unknown[] = this.bindSelf ? [this, input] : [input];
    const output: unknown = Reflect.apply(this.fn, undefined, args);
    return output;
  }
}

declareFields(FunctionStep, {
  fn: field('function', { default: identity, positional: true, identifier: true }),
  bindSelf: field('boolean', { default: false }),
});

export function functionStep(fn: (input: never) => unknown, kwargs: Kwargs = {}): FunctionStep {
  return new FunctionStep(fn, kwargs);
}

/**
 * Pass steps through and wrap callables in a `FunctionStep`, then apply `defaults`
 */
export function ensureStep(value: unknown, defaults: Kwargs = {}): Step {
  let step: Step;
  if (value instanceof Step) {
    step = value;
  } else if (typeof value === 'function') {
    step = new FunctionStep(value);
  } else {
    throw new TypeError(`Expected a step or a function, got ${represent(value)}.`);
  }
  step.updateDefaults(defaults);
  return step;
}
