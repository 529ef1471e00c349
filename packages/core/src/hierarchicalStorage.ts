/**
 * Directory tree cache store
 *
 * Layout of one entry:
 *   <root>/<key>/data     leaf file, or a directory of 000, 001, ... for a tuple
 *   <root>/<key>/meta     identifying metadata as JSON
 *   <root>/<key>/input    content hashes of the input
 *   <root>/<key>/output   content hashes of the output
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, rmSync, statSync, writeFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { formatZodError } from './config.js';
import { NoDataSourceError, NoDataTargetError, StorageError } from './errors.js';
import { contentHash, type Identifiable } from './hashing.js';
import { getLogger } from './logger.js';
import {
  asNDArray,
  DTYPE_NAMES,
  dtypeName,
  isArrayConvertible,
  isNDArray,
  isTypedArray,
  typedArrayFromDType,
  type NDArray,
  type TypedArray,
} from './ndarray.js';
import { parseStorageOptions, Storage, type Metadata, type StorageOptions } from './storage.js';
import type { StorageMode } from './types.js';

export const DATA_FILENAME = 'data';
export const META_FILENAME = 'meta';
export const INPUT_FILENAME = 'input';
export const OUTPUT_FILENAME = 'output';

const TEMP_PREFIX = '.tmp-';

const arrayLeafFields = {
  dtype: z.enum(DTYPE_NAMES),
  shape: z.array(z.number().int().min(0)),
  data: z.string(),
};

const leafSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ndarray'), ...arrayLeafFields }),
  z.object({ kind: z.literal('typed'), ...arrayLeafFields }),
  z.object({ kind: z.literal('json'), value: z.unknown() }),
]);

type Leaf = z.infer<typeof leafSchema>;

/** Contents of the sibling files of an entry */
export interface EntryInfo {
  meta: unknown;
  input: unknown;
  output: unknown;
}

function assertSafeKey(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new StorageError('Storage key must be a non-empty relative path');
  }
  if (value.includes('\0')) {
    throw new StorageError('Storage key must not contain null bytes');
  }
  if (path.isAbsolute(value)) {
    throw new StorageError('Storage key must be a relative path');
  }
  const segments = value.split(/[\\/]+/);
  if (segments.some((seg) => seg === '..' || seg === '.')) {
    throw new StorageError('Storage key must not contain "." or ".." segments');
  }
  if (segments[0].startsWith(TEMP_PREFIX)) {
    throw new StorageError(`Storage key must not start with "${TEMP_PREFIX}"`);
  }
  return value;
}

function isPlainRecord(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isJsonValue(value: unknown): boolean {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isPlainRecord(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function isIdentifiable(value: object): value is Identifiable {
  return 'identifyingMetadata' in value && typeof value.identifyingMetadata === 'function';
}

/**
 * Metadata in a form JSON can hold: steps become their identifying metadata,
 * other unsupported values their string form
 */
function toJson(value: unknown, seen: object[] = []): unknown {
  if (typeof value === 'bigint' || typeof value === 'symbol' || typeof value === 'function') {
    return String(value);
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (seen.includes(value)) {
    return '[Circular]';
  }
  const nested = [...seen, value];
  if (isIdentifiable(value)) {
    return toJson(value.identifyingMetadata(), nested);
  }
  const array = asNDArray(value);
  if (array) {
    return { shape: [...array.shape], dtype: dtypeName(array.data) };
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJson(item, nested));
  }
  return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toJson(item, nested)]));
}

function encodeBytes(data: TypedArray): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
}

function decodeBytes(data: string): Uint8Array {
  return new Uint8Array(Buffer.from(data, 'base64'));
}

function arrayFields(array: NDArray): Omit<Extract<Leaf, { kind: 'ndarray' }>, 'kind'> {
  return {
    dtype: dtypeName(array.data),
    shape: [...array.shape],
    data: encodeBytes(array.data),
  };
}

function describeType(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor ? value.constructor.name : 'object';
  }
  return typeof value;
}

function entryIndex(index: number): string {
  return String(index).padStart(3, '0');
}

export class HierarchicalStorage extends Storage {
  readonly root: string;
  readonly mode: StorageMode;

  constructor(root: string, options: StorageOptions = {}) {
    const { mode, hash, kwargs } = parseStorageOptions(options, 'HierarchicalStorage');
    super(kwargs);
    this.root = path.resolve(root);
    this.mode = mode;
    this.hashOptions = hash;
    if (mode === 'w') {
      rmSync(this.root, { recursive: true, force: true });
    }
    if (mode !== 'r') {
      mkdirSync(this.root, { recursive: true });
    }
  }

  read(input?: unknown, meta?: Metadata): unknown {
    const dataPath = path.join(this.entryPath(input, meta), DATA_FILENAME);
    if (!existsSync(dataPath)) {
      throw new NoDataSourceError(`No entry at "${path.relative(this.root, dataPath)}".`);
    }
    return this.readData(dataPath);
  }

  write(output: unknown, input?: unknown, meta?: Metadata): void {
    if (this.mode === 'r') {
      throw new NoDataTargetError(`Hierarchical store "${this.root}" is opened read-only.`);
    }
    const target = this.entryPath(input, meta);
    const random = Math.random().toString(36).slice(2, 10);
    const tempPath = path.join(this.root, `${TEMP_PREFIX}${random}`);

    mkdirSync(tempPath, { recursive: true });
    try {
      this.writeData(path.join(tempPath, DATA_FILENAME), output);
      writeFileSync(path.join(tempPath, META_FILENAME), JSON.stringify(toJson(meta ?? {}), null, 2), 'utf-8');
      writeFileSync(path.join(tempPath, INPUT_FILENAME), JSON.stringify(this.hashTree(input)), 'utf-8');
      writeFileSync(path.join(tempPath, OUTPUT_FILENAME), JSON.stringify(this.hashTree(output)), 'utf-8');

      mkdirSync(path.dirname(target), { recursive: true });
      rmSync(target, { recursive: true, force: true });
      renameSync(tempPath, target);
    } catch (err) {
      rmSync(tempPath, { recursive: true, force: true });
      throw err;
    }
    getLogger().debug('Stored cache entry', { root: this.root, key: path.relative(this.root, target) });
  }

  exists(input?: unknown, meta?: Metadata): boolean {
    return existsSync(path.join(this.entryPath(input, meta), DATA_FILENAME));
  }

  keys(): string[] {
    this.assertOpen();
    if (!existsSync(this.root)) {
      return [];
    }
    return readdirSync(this.root, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith(TEMP_PREFIX))
      .map((entry) => entry.name)
      .sort();
  }

  /**
   * The parsed `meta`, `input` and `output` files of an entry
   */
  inspect(input?: unknown, meta?: Metadata): EntryInfo {
    const entry = this.entryPath(input, meta);
    if (!existsSync(path.join(entry, DATA_FILENAME))) {
      throw new NoDataSourceError(`No entry at "${path.relative(this.root, entry)}".`);
    }
    return {
      meta: this.readJson(path.join(entry, META_FILENAME)),
      input: this.readJson(path.join(entry, INPUT_FILENAME)),
      output: this.readJson(path.join(entry, OUTPUT_FILENAME)),
    };
  }

  private entryPath(input?: unknown, meta?: Metadata): string {
    this.assertOpen();
    return path.join(this.root, assertSafeKey(this.resolveKey(input, meta)));
  }

  private hashTree(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.hashTree(item));
    }
    return contentHash(value, this.hashOptions);
  }

  private writeData(target: string, value: unknown): void {
    if (Array.isArray(value)) {
      mkdirSync(target);
      value.forEach((item: unknown, index) => {
        this.writeData(path.join(target, entryIndex(index)), item);
      });
      return;
    }
    writeFileSync(target, JSON.stringify(this.toLeaf(value)), 'utf-8');
  }

  private toLeaf(value: unknown): Leaf {
    if (isTypedArray(value)) {
      return { kind: 'typed', ...arrayFields({ shape: [value.length], data: value }) };
    }
    if (isNDArray(value)) {
      return { kind: 'ndarray', ...arrayFields(value) };
    }
    if (isArrayConvertible(value)) {
      return { kind: 'ndarray', ...arrayFields(value.toNDArray()) };
    }
    if (isJsonValue(value)) {
      return { kind: 'json', value };
    }
    throw new TypeError(`Cannot store a value of type "${describeType(value)}" in a hierarchical store.`);
  }

  private readData(target: string): unknown {
    if (statSync(target).isDirectory()) {
      return readdirSync(target)
        .filter((name) => /^\d+$/.test(name))
        .sort((a, b) => Number(a) - Number(b))
        .map((name) => this.readData(path.join(target, name)));
    }
    const parsed = leafSchema.safeParse(this.readJson(target));
    if (!parsed.success) {
      throw new StorageError(`Malformed leaf "${path.relative(this.root, target)}": ${formatZodError(parsed.error)}`, {
        cause: parsed.error,
      });
    }
    const leaf = parsed.data;
    switch (leaf.kind) {
      case 'json':
        return leaf.value;
      case 'typed':
        return typedArrayFromDType(leaf.dtype, decodeBytes(leaf.data));
      case 'ndarray':
        return { shape: leaf.shape, data: typedArrayFromDType(leaf.dtype, decodeBytes(leaf.data)) };
    }
  }

  private readJson(target: string): unknown {
    const content = readFileSync(target, 'utf-8');
    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StorageError(`Failed to parse "${path.relative(this.root, target)}": ${message}`, { cause: err });
    }
  }
}
