/**
 * Reshaping of sequence data
 */

import { declareFields, field, Step } from '@pipeboard/core';
import { z } from 'zod';

/** An index, or a nested list of indices */
export type ShaperIndex = number | ShaperIndex[];

export const shaperIndexSchema: z.ZodType<ShaperIndex> = z.lazy(() =>
  z.union([z.number().int(), z.array(shaperIndexSchema)])
);

/**
 * Picks elements of the input by index, keeping the nesting of the indices
 *
 * @example
 * new Shaper([0, 1, [0, 1, 2]]).invoke(['a', 'b', 'c']); // ['a', 'b', ['a', 'b', 'c']]
 */
export class Shaper extends Step<unknown, unknown[]> {
  declare indices: ShaperIndex[];

  operation(input: unknown): unknown[] {
    const sequence: readonly unknown[] = Array.isArray(input) ? input : [input];
    return this.indices.map((index) => extract(sequence, index));
  }
}

declareFields(Shaper, {
  indices: field(z.array(shaperIndexSchema), { positional: true }),
});

function extract(sequence: readonly unknown[], index: ShaperIndex): unknown {
  if (Array.isArray(index)) {
    return index.map((inner) => extract(sequence, inner));
  }
  if (index >= sequence.length || index < -sequence.length) {
    throw new RangeError(`Index ${index} is out of range for a sequence of length ${sequence.length}.`);
  }
  return sequence.at(index);
}
