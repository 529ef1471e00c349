/**
 * Parallel group: one input element per child
 */

import { declareFields, field } from '@pipeboard/core';
import { GroupStep } from './group.js';

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    (typeof value === 'object' && value !== null && Symbol.iterator in value) ||
    typeof value === 'string'
  );
}

/**
 * Runs each child on its own element of the input, or on the whole input when the
 * input is not iterable or `broadcast` is set. Children run one after the other.
 */
export class Parallel extends GroupStep {
  /** Pass the whole input to every child */
  declare broadcast: boolean;

  operation(input: unknown): unknown[] {
    const children = this.children;
    const elements = !isIterable(input) || this.broadcast ? children.map(() => input) : [...input];
    if (elements.length !== children.length) {
      throw new TypeError('Number of data elements and children does not match.');
    }
    return children.map((child, index) => child.invoke(elements[index]));
  }
}

declareFields(Parallel, {
  broadcast: field('boolean', { default: false }),
});
