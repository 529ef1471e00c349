/**
 * Runtime dtype checks
 */

import type { ZodType } from 'zod';
import type { AnyConstructor, DType, DTypeSpec, KindTag } from './types.js';

export const KIND_TAGS: readonly KindTag[] = ['string', 'number', 'boolean', 'bigint', 'symbol', 'function', 'object'];

/**
 * Callable kinds accepted wherever a dtype asks for a function. Arrow functions, bound
 * functions and class methods report `Function`; the other kinds carry their own tag.
 */
export const FUNCTION_KINDS: readonly string[] = [
  '[object Function]',
  '[object AsyncFunction]',
  '[object GeneratorFunction]',
  '[object AsyncGeneratorFunction]',
];

const PRIMITIVE_CONSTRUCTORS = new Map<unknown, KindTag>([
  [String, 'string'],
  [Number, 'number'],
  [Boolean, 'boolean'],
  [Function, 'function'],
  [Object, 'object'],
]);

export function isKindTag(value: unknown): value is KindTag {
  return typeof value === 'string' && KIND_TAGS.some((tag) => tag === value);
}

export function isZodSchema(value: unknown): value is ZodType {
  return (
    typeof value === 'object' &&
    value !== null &&
    'safeParse' in value &&
    typeof value.safeParse === 'function'
  );
}

function isConstructor(value: unknown): value is AnyConstructor {
  // arrow functions have no prototype and cannot be used with `new`
  return typeof value === 'function' && 'prototype' in value && value.prototype !== undefined;
}

function isDTypeList(spec: DTypeSpec): spec is readonly DType[] {
  return Array.isArray(spec);
}

export function isDType(value: unknown): value is DType {
  return isKindTag(value) || isZodSchema(value) || isConstructor(value);
}

export function isFunctionLike(value: unknown): boolean {
  return typeof value === 'function' && FUNCTION_KINDS.includes(Object.prototype.toString.call(value));
}

function matchesKind(value: unknown, kind: KindTag): boolean {
  switch (kind) {
    case 'function':
      return isFunctionLike(value);
    case 'object':
      return value !== undefined && value !== null;
    default:
      return typeof value === kind;
  }
}

function matchesOne(value: unknown, dtype: DType): boolean {
  if (typeof dtype === 'string') {
    return matchesKind(value, dtype);
  }
  if (isZodSchema(dtype)) {
    return dtype.safeParse(value).success;
  }
  const kind = PRIMITIVE_CONSTRUCTORS.get(dtype);
  if (kind) {
    return matchesKind(value, kind);
  }
  if (dtype === Array) {
    return Array.isArray(value);
  }
  return value instanceof dtype;
}

/**
 * Whether `value` satisfies any of the dtypes
 */
export function matchesDType(value: unknown, dtypes: readonly DType[]): boolean {
  return dtypes.some((dtype) => matchesOne(value, dtype));
}

/**
 * Normalize a dtype spec to a list, or return null when it is not one
 */
export function normalizeDType(spec: DTypeSpec): readonly DType[] | null {
  if (isDTypeList(spec)) {
    const list: DType[] = [];
    for (const element of spec) {
      if (!isDType(element)) return null;
      list.push(element);
    }
    return list.length ? list : null;
  }
  return isDType(spec) ? [spec] : null;
}

export function describeDType(dtypes: DTypeSpec): string {
  const list: readonly DType[] = isDTypeList(dtypes) ? dtypes : [dtypes];
  const names = list.map((dtype) => {
    if (typeof dtype === 'string') return dtype;
    if (isZodSchema(dtype)) return 'schema';
    return dtype.name || 'anonymous class';
  });
  return names.length === 1 ? names[0] : `(${names.join(', ')})`;
}
