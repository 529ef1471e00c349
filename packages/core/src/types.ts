/**
 * Shared type definitions
 */

import type { z, ZodType } from 'zod';

/**
 * Kind tags accepted as dtypes, checked with `typeof`
 * (`function` widens to every callable kind, `object` accepts any present value)
 */
export type KindTag = 'string' | 'number' | 'boolean' | 'bigint' | 'symbol' | 'function' | 'object';

/** Any class, including abstract ones */
export type AnyConstructor = abstract new (...args: never[]) => unknown;

/** A single dtype: kind tag, constructor or zod schema */
export type DType = KindTag | AnyConstructor | ZodType;

/** One dtype or a list of alternatives */
export type DTypeSpec = DType | readonly DType[];

export type AnyFunction = (...args: never[]) => unknown;

type ValueOfOne<D> = D extends 'string' | StringConstructor
  ? string
  : D extends 'number' | NumberConstructor
    ? number
    : D extends 'boolean' | BooleanConstructor
      ? boolean
      : D extends 'bigint'
        ? bigint
        : D extends 'symbol'
          ? symbol
          : D extends 'function' | FunctionConstructor
            ? AnyFunction
            : D extends 'object' | ObjectConstructor
              ? NonNullable<unknown>
              : D extends ZodType
                ? z.output<D>
                : D extends ArrayConstructor
                  ? unknown[]
                  : D extends abstract new (...args: never[]) => infer T
                    ? T
                    : never;

/**
 * Static value type of a field declared with dtype `D`
 */
export type ValueOf<D> = D extends readonly (infer E)[] ? ValueOfOne<E> : ValueOfOne<D>;

/** Keyword arguments passed to a field container */
export type Kwargs = Record<string, unknown>;

/** Open mode of file-backed stores */
export type StorageMode = 'r' | 'w' | 'a';
