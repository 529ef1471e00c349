import { GroupStep } from './group.js';

/**
 * Feeds the input to the first child and each output to the next child
 */
export class Sequential extends GroupStep {
  operation(input: unknown): unknown {
    return this.children.reduce((data: unknown, child) => child.invoke(data), input);
  }
}
