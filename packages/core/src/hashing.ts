/**
 * Content hashing of step inputs and metadata
 *
 * Values are turned into a stable string encoding and digested with MD5. Object keys are
 * sorted, so two structurally equal values hash the same regardless of insertion order.
 * Typed arrays, NDArrays and array-convertible objects are identified by dtype, shape and
 * rounded mantissas, so noise below the configured precision does not change the hash.
 * Plain arrays are encoded element by element, exactly.
 */

import { createHash } from 'crypto';
import { getSettings } from './config.js';
import { asNDArray, dtypeName, type DTypeName, type NDArray } from './ndarray.js';

export interface HashOptions {
  /** Decimal places kept of each mantissa, defaults to the `hashMantissaDecimals` setting */
  decimals?: number;
  /** Return a replacement identity for an object, or `undefined` to encode it structurally */
  identify?: (value: object) => unknown;
}

export interface ArrayIdentity {
  dtype: DTypeName;
  shape: number[];
  mantissa: number[];
  exponent: number[];
}

/**
 * Objects identified by their metadata rather than their contents
 */
export interface Identifiable {
  identifyingMetadata(): Record<string, unknown>;
}

function isIdentifiable(value: object): value is Identifiable {
  return 'identifyingMetadata' in value && typeof value.identifyingMetadata === 'function';
}

/**
 * Split `x` into a mantissa in [0.5, 1) and a power of two
 */
export function frexp(x: number): [number, number] {
  if (x === 0 || !Number.isFinite(x)) {
    return [x, 0];
  }
  let magnitude = Math.abs(x);
  let offset = 0;
  if (magnitude < 2 ** -1000) {
    // subnormals
    magnitude *= 2 ** 64;
    offset = -64;
  }
  let exponent = Math.floor(Math.log2(magnitude)) + 1;
  let mantissa = magnitude * 2 ** -exponent;
  while (mantissa >= 1) {
    mantissa /= 2;
    exponent += 1;
  }
  while (mantissa < 0.5) {
    mantissa *= 2;
    exponent -= 1;
  }
  return [Math.sign(x) * mantissa, exponent + offset];
}

/**
 * Round to `decimals` places, ties going to the even neighbour
 */
export function roundHalfEven(x: number, decimals: number): number {
  const scale = 10 ** decimals;
  const scaled = x * scale;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  let rounded: number;
  if (diff > 0.5) {
    rounded = floor + 1;
  } else if (diff < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }
  return rounded / scale;
}

export function arrayIdentity(array: NDArray, decimals: number = getSettings().hashMantissaDecimals): ArrayIdentity {
  const mantissa: number[] = [];
  const exponent: number[] = [];
  for (const element of array.data) {
    const [m, e] = frexp(Number(element));
    mantissa.push(roundHalfEven(m, decimals));
    exponent.push(e);
  }
  return { dtype: dtypeName(array.data), shape: [...array.shape], mantissa, exponent };
}

function encodeNumber(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

function encodeKeyed(entries: Array<[string, string]>): string {
  return entries
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, encoded]) => `${key}=${encoded}`)
    .join(',');
}

/**
 * Stable string encoding of `value`
 */
export function encodeForHash(value: unknown, options: HashOptions = {}): string {
  const decimals = options.decimals ?? getSettings().hashMantissaDecimals;
  const stack: object[] = [];

  function encode(current: unknown): string {
    switch (typeof current) {
      case 'undefined':
        return 'u';
      case 'boolean':
        return `b:${current}`;
      case 'number':
        return `d:${encodeNumber(current)}`;
      case 'bigint':
        return `i:${current}`;
      case 'string':
        return `s:${JSON.stringify(current)}`;
      case 'symbol':
        throw new TypeError(`Cannot hash symbol ${String(current)}.`);
      case 'function':
        return `f:${JSON.stringify(current.name)}:${JSON.stringify(Function.prototype.toString.call(current))}`;
    }
    if (current === null || typeof current !== 'object') {
      return 'n';
    }

    const depth = stack.indexOf(current);
    if (depth >= 0) {
      return `cycle:${stack.length - depth}`;
    }

    stack.push(current);
    try {
      return encodeObject(current);
    } finally {
      stack.pop();
    }
  }

  function encodeObject(current: object): string {
    const replacement = options.identify?.(current);
    if (replacement !== undefined) {
      return `h:${encode(replacement)}`;
    }
    if (isIdentifiable(current)) {
      return `step:${encode(current.identifyingMetadata())}`;
    }
    const array = asNDArray(current);
    if (array) {
      return `a:${JSON.stringify(arrayIdentity(array, decimals))}`;
    }
    if (Array.isArray(current)) {
      return `[${current.map((item: unknown) => encode(item)).join(',')}]`;
    }
    if (current instanceof Date) {
      return `t:${encodeNumber(current.getTime())}`;
    }
    if (current instanceof Map) {
      const entries = [...current].map(([key, item]: [unknown, unknown]) => `${encode(key)}>${encode(item)}`);
      return `m{${entries.sort().join(',')}}`;
    }
    if (current instanceof Set) {
      const items = [...current].map((item: unknown) => encode(item));
      return `e{${items.sort().join(',')}}`;
    }
    const proto: unknown = Object.getPrototypeOf(current);
    const tag = proto === Object.prototype || proto === null ? '' : current.constructor.name;
    const entries: Array<[string, string]> = Object.keys(current).map((key) => [
      key,
      encode(Reflect.get(current, key)),
    ]);
    return `o:${tag}{${encodeKeyed(entries)}}`;
  }

  return encode(value);
}

/**
 * MD5 hex digest of the stable encoding of `value`
 *
 * MD5 serves as a fast content fingerprint for cache keys here, not as a security
 * measure; keys are never compared against untrusted digests.
 */
export function contentHash(value: unknown, options: HashOptions = {}): string {
  return createHash('md5').update(encodeForHash(value, options)).digest('hex');
}
