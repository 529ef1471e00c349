/**
 * Single-file cache store
 *
 * The file is a sequence of records, each a 4-byte little-endian length followed by a
 * v8-serialized `{key, data}` object. The whole log is read once on the first query; later
 * records win over earlier ones with the same key.
 */

import { closeSync, fstatSync, openSync, readSync, writeSync } from 'fs';
import { deserialize, serialize } from 'v8';
import { NoDataSourceError, NoDataTargetError, StorageError } from './errors.js';
import { getLogger } from './logger.js';
import { parseStorageOptions, Storage, type Metadata, type StorageOptions } from './storage.js';
import type { StorageMode } from './types.js';

const HEADER_BYTES = 4;

const OPEN_FLAGS: Record<StorageMode, string> = {
  r: 'r',
  w: 'w+',
  a: 'a+',
};

interface LogRecord {
  key: string;
  data: unknown;
}

interface LogHandle {
  fd: number | null;
  records: Map<string, unknown> | null;
}

function isLogRecord(value: unknown): value is LogRecord {
  return typeof value === 'object' && value !== null && 'key' in value && typeof value.key === 'string' && 'data' in value;
}

export class AppendLogStorage extends Storage {
  readonly path: string;
  readonly mode: StorageMode;

  private readonly handle: LogHandle = { fd: null, records: null };

  constructor(path: string, options: StorageOptions = {}) {
    const { mode, hash, kwargs } = parseStorageOptions(options, 'AppendLogStorage');
    super(kwargs);
    this.path = path;
    this.mode = mode;
    this.hashOptions = hash;
    try {
      this.handle.fd = openSync(path, OPEN_FLAGS[mode]);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StorageError(`Cannot open append log "${path}": ${message}`, { cause: err });
    }
  }

  read(input?: unknown, meta?: Metadata): unknown {
    const key = this.resolveKey(input, meta);
    const records = this.load();
    if (!records.has(key)) {
      throw new NoDataSourceError(`No entry for key "${key}".`);
    }
    return records.get(key);
  }

  write(output: unknown, input?: unknown, meta?: Metadata): void {
    if (this.mode === 'r') {
      throw new NoDataTargetError(`Append log "${this.path}" is opened read-only.`);
    }
    const key = this.resolveKey(input, meta);
    const records = this.load();

    let payload: Buffer;
    try {
      payload = serialize({ key, data: output });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StorageError(`Cannot serialize entry "${key}": ${message}`, { cause: err });
    }
    const header = Buffer.alloc(HEADER_BYTES);
    header.writeUInt32LE(payload.length, 0);
    writeSync(this.descriptor(), Buffer.concat([header, payload]));
    records.set(key, output);
    getLogger().debug('Appended cache entry', { path: this.path, key, bytes: payload.length });
  }

  exists(input?: unknown, meta?: Metadata): boolean {
    return this.load().has(this.resolveKey(input, meta));
  }

  keys(): string[] {
    return [...this.load().keys()];
  }

  close(): void {
    if (this.handle.fd !== null) {
      closeSync(this.handle.fd);
      this.handle.fd = null;
    }
    super.close();
  }

  private descriptor(): number {
    this.assertOpen();
    if (this.handle.fd === null) {
      throw new StorageError(`Append log "${this.path}" is closed.`);
    }
    return this.handle.fd;
  }

  private load(): Map<string, unknown> {
    const fd = this.descriptor();
    if (this.handle.records) {
      return this.handle.records;
    }

    const size = fstatSync(fd).size;
    const buffer = Buffer.alloc(size);
    let filled = 0;
    while (filled < size) {
      const read = readSync(fd, buffer, filled, size - filled, filled);
      if (read === 0) break;
      filled += read;
    }

    const records = new Map<string, unknown>();
    let offset = 0;
    while (offset < filled) {
      if (offset + HEADER_BYTES > filled) {
        throw new StorageError(`Append log "${this.path}" ends in a truncated record header.`);
      }
      const length = buffer.readUInt32LE(offset);
      offset += HEADER_BYTES;
      if (offset + length > filled) {
        throw new StorageError(`Append log "${this.path}" ends in a truncated record.`);
      }
      const record: unknown = deserialize(buffer.subarray(offset, offset + length));
      offset += length;
      if (!isLogRecord(record)) {
        throw new StorageError(`Append log "${this.path}" holds a malformed record at byte ${offset - length}.`);
      }
      records.set(record.key, record.data);
    }

    this.handle.records = records;
    getLogger().debug('Loaded append log', { path: this.path, entries: records.size });
    return records;
  }
}
