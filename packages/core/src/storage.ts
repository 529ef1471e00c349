/**
 * Cache storage contracts and the no-op store
 */

import { z } from 'zod';
import { formatZodError } from './config.js';
import { ConfigError, NoDataSourceError, NoDataTargetError, StorageError } from './errors.js';
import { field } from './field.js';
import { FieldContainer } from './fieldContainer.js';
import { contentHash, type HashOptions } from './hashing.js';
import { declareFields } from './tracker.js';
import type { StorageMode } from './types.js';

export type Metadata = Record<string, unknown>;

/**
 * Anything a step can use as its cache
 */
export interface Storable {
  read(input: unknown, meta: Metadata): unknown;
  write(output: unknown, input: unknown, meta: Metadata): void;
}

export function isStorable(value: unknown): value is Storable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'read' in value &&
    typeof value.read === 'function' &&
    'write' in value &&
    typeof value.write === 'function'
  );
}

export const storageOptionsSchema = z.strictObject({
  mode: z.enum(['r', 'w', 'a']).default('a'),
  dataKey: z.string().optional(),
  hash: z
    .strictObject({
      decimals: z.number().int().min(0).max(15).optional(),
      identify: z.custom<(value: object) => unknown>((value) => typeof value === 'function').optional(),
    })
    .optional(),
});

export type StorageOptions = z.input<typeof storageOptionsSchema>;

export interface ParsedStorageOptions {
  mode: StorageMode;
  hash: HashOptions;
  kwargs: { dataKey?: string };
}

/**
 * Validate store options, splitting the field values from the construction options
 */
export function parseStorageOptions(options: unknown, storeName: string): ParsedStorageOptions {
  const parsed = storageOptionsSchema.safeParse(options ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid options for ${storeName}: ${formatZodError(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  const { mode, hash, dataKey } = parsed.data;
  return { mode, hash: hash ?? {}, kwargs: { dataKey } };
}

/**
 * Storage key of an (input, metadata) pair
 */
export function contentKey(input: unknown, meta: unknown, options: HashOptions = {}): string {
  return contentHash([input, meta], options);
}

interface StorageState {
  closed: boolean;
}

export abstract class Storage extends FieldContainer implements Storable {
  declare dataKey: string;

  /** Shared with copies made by `at`, so closing one closes them all */
  protected readonly state: StorageState = { closed: false };
  protected hashOptions: HashOptions = {};

  abstract read(input?: unknown, meta?: Metadata): unknown;
  abstract write(output: unknown, input?: unknown, meta?: Metadata): void;
  abstract exists(input?: unknown, meta?: Metadata): boolean;
  abstract keys(): string[];

  get isOpen(): boolean {
    return !this.state.closed;
  }

  close(): void {
    this.state.closed = true;
  }

  has(key: string): boolean {
    return this.at({ dataKey: key }).exists();
  }

  get(key: string): unknown {
    return this.at({ dataKey: key }).read();
  }

  set(key: string, value: unknown): void {
    this.at({ dataKey: key }).write(value);
  }

  /**
   * `dataKey` when set, else the content key of input and metadata
   */
  resolveKey(input?: unknown, meta?: Metadata): string {
    const cell = this.cell('dataKey');
    if (!cell.isSet && !cell.optional && (input !== undefined || meta !== undefined)) {
      return contentKey(input, meta, this.hashOptions);
    }
    return this.dataKey;
  }

  protected assertOpen(): void {
    if (this.state.closed) {
      throw new StorageError(`${this.constructor.name} is closed.`);
    }
  }
}

declareFields(Storage, {
  dataKey: field('string'),
});

/**
 * Storage that never holds anything
 */
export class NoStorage extends Storage {
  read(): never {
    throw new NoDataSourceError();
  }

  write(): never {
    throw new NoDataTargetError();
  }

  exists(): never {
    throw new NoDataSourceError();
  }

  keys(): never {
    throw new NoDataSourceError();
  }
}

/**
 * Run `fn` with `storage` and close the storage afterwards
 */
export function withStorage<S extends Storage, R>(storage: S, fn: (storage: S) => R): R {
  try {
    return fn(storage);
  } finally {
    storage.close();
  }
}
