/**
 * Task fields hold the steps of a pipeline
 */

import { Field, FieldCell } from './field.js';
import { ensureStep, represent, Step, type StepFunction } from './step.js';
import type { Kwargs } from './types.js';

type StepClass<S extends Step> = abstract new (...args: never[]) => S;

export interface TaskOptions<S extends Step> {
  /** Class the task's steps must be instances of, `Step` by default */
  type?: StepClass<S>;
  /** Default step or function; the identity function when omitted, none when `null` */
  default?: S | StepFunction | null;
  /** Instance defaults applied to the default step */
  defaults?: Kwargs;
}

function identity(data: unknown): unknown {
  return data;
}

function isStepClass(value: unknown): boolean {
  return typeof value === 'function' && (value === Step || value.prototype instanceof Step);
}

function coerceStep(value: unknown): unknown {
  return value === undefined || value === null ? undefined : ensureStep(value);
}

export class TaskField<S extends Step = Step> extends Field<S> {
  readonly stepType: StepClass<S> | typeof Step;

  constructor(options: TaskOptions<S> = {}) {
    const stepType = options.type ?? Step;
    if (!isStepClass(stepType)) {
      throw new TypeError(`The type of a task must be Step or a subclass of it, got ${represent(stepType)}.`);
    }
    super(stepType, { identifier: true });
    this.stepType = stepType;
    const defaultStep = options.default === undefined ? identity : options.default;
    if (defaultStep !== null) {
      this.default = ensureStep(defaultStep, options.defaults);
    }
  }

  coerce(value: unknown): unknown {
    return coerceStep(value);
  }

  createCell(value?: unknown, defaultValue?: unknown): TaskCell<S> {
    return new TaskCell(this, value, defaultValue);
  }
}

/**
 * Cell of a task field; functions assigned to it are wrapped in steps
 */
export class TaskCell<S extends Step = Step> extends FieldCell<S> {
  get step(): S {
    return this.value;
  }

  protected coerce(value: unknown): unknown {
    return coerceStep(value);
  }
}

/**
 * Declare a task
 */
export function task<S extends Step = Step>(
  defaultStep?: S | StepFunction | null,
  defaults?: Kwargs,
  type?: StepClass<S>
): TaskField<S> {
  return new TaskField<S>({ type, default: defaultStep, defaults });
}
