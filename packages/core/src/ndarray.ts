/**
 * Minimal n-dimensional numeric arrays
 */

export type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

export const DTYPE_NAMES = [
  'int8',
  'uint8',
  'uint8clamped',
  'int16',
  'uint16',
  'int32',
  'uint32',
  'float32',
  'float64',
  'int64',
  'uint64',
] as const;

export type DTypeName = (typeof DTYPE_NAMES)[number];

export interface NDArray {
  readonly shape: readonly number[];
  readonly data: TypedArray;
}

/**
 * Objects that can present themselves as an NDArray
 */
export interface ArrayConvertible {
  toNDArray(): NDArray;
}

export function isTypedArray(value: unknown): value is TypedArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

export function isNDArray(value: unknown): value is NDArray {
  return (
    typeof value === 'object' &&
    value !== null &&
    'shape' in value &&
    'data' in value &&
    Array.isArray(value.shape) &&
    value.shape.every((dim: unknown) => Number.isInteger(dim)) &&
    isTypedArray(value.data)
  );
}

export function isArrayConvertible(value: unknown): value is ArrayConvertible {
  return typeof value === 'object' && value !== null && 'toNDArray' in value && typeof value.toNDArray === 'function';
}

export function dtypeName(data: TypedArray): DTypeName {
  if (data instanceof Int8Array) return 'int8';
  if (data instanceof Uint8ClampedArray) return 'uint8clamped';
  if (data instanceof Uint8Array) return 'uint8';
  if (data instanceof Int16Array) return 'int16';
  if (data instanceof Uint16Array) return 'uint16';
  if (data instanceof Int32Array) return 'int32';
  if (data instanceof Uint32Array) return 'uint32';
  if (data instanceof Float32Array) return 'float32';
  if (data instanceof Float64Array) return 'float64';
  if (data instanceof BigInt64Array) return 'int64';
  return 'uint64';
}

/**
 * A typed array of `dtype` over a copy of `bytes`
 */
export function typedArrayFromDType(dtype: DTypeName, bytes: Uint8Array): TypedArray {
  const buffer = bytes.slice().buffer;
  switch (dtype) {
    case 'int8':
      return new Int8Array(buffer);
    case 'uint8':
      return new Uint8Array(buffer);
    case 'uint8clamped':
      return new Uint8ClampedArray(buffer);
    case 'int16':
      return new Int16Array(buffer);
    case 'uint16':
      return new Uint16Array(buffer);
    case 'int32':
      return new Int32Array(buffer);
    case 'uint32':
      return new Uint32Array(buffer);
    case 'float32':
      return new Float32Array(buffer);
    case 'float64':
      return new Float64Array(buffer);
    case 'int64':
      return new BigInt64Array(buffer);
    case 'uint64':
      return new BigUint64Array(buffer);
  }
}

export function isDTypeName(value: unknown): value is DTypeName {
  return DTYPE_NAMES.some((name) => name === value);
}

/**
 * Wrap `data` with a shape; the shape defaults to one dimension
 */
export function ndarray(data: TypedArray | readonly number[], shape?: readonly number[]): NDArray {
  const typed = isTypedArray(data) ? data : Float64Array.from(data);
  const dims = shape ?? [typed.length];
  const size = dims.reduce((product, dim) => product * dim, 1);
  if (size !== typed.length) {
    throw new RangeError(`Shape [${dims.join(', ')}] does not match ${typed.length} elements.`);
  }
  return { shape: [...dims], data: typed };
}

/**
 * View an NDArray, typed array or array-convertible object as an NDArray, or return
 * null for anything else; plain arrays are not numeric arrays
 */
export function asNDArray(value: unknown): NDArray | null {
  if (isNDArray(value)) return value;
  if (isTypedArray(value)) return { shape: [value.length], data: value };
  if (isArrayConvertible(value)) return value.toNDArray();
  return null;
}
