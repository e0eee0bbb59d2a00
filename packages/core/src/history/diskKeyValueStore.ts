/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import { DEFAULT_HISTORY_STORE_SIZE_LIMIT_BYTES } from '../config/constants.js';
import { debugLogger } from '../utils/debugLogger.js';
import { getErrorMessage, isNodeError } from '../utils/errors.js';
import type { KeyValueStore, StoredValue } from './keyValueStore.js';
import { isStoredValue } from './keyValueStore.js';

const ENTRY_SUFFIX = '.json';
const TEMP_SUFFIX = '.tmp';

interface StoredEntry {
  key: string;
  value: StoredValue;
  /** Milliseconds since the epoch; oldest entries are evicted first. */
  storedAt: number;
}

function isStoredEntry(value: unknown): value is StoredEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'key' in value &&
    typeof value.key === 'string' &&
    'storedAt' in value &&
    typeof value.storedAt === 'number' &&
    'value' in value &&
    isStoredValue(value.value)
  );
}

export interface DiskKeyValueStoreOptions {
  /** Total bytes the store may occupy before old entries are evicted. */
  sizeLimitBytes?: number;
  now?: () => number;
}

/**
 * Keeps each key in its own JSON file, named by the SHA-256 of the key.
 * Writes land in a temporary file that is renamed into place, so a reader in
 * another process sees either the old entry or the new one.
 */
export class DiskKeyValueStore implements KeyValueStore {
  private readonly sizeLimitBytes: number;
  private readonly now: () => number;

  constructor(
    private readonly directory: string,
    options: DiskKeyValueStoreOptions = {},
  ) {
    this.sizeLimitBytes =
      options.sizeLimitBytes ?? DEFAULT_HISTORY_STORE_SIZE_LIMIT_BYTES;
    this.now = options.now ?? Date.now;
    fs.mkdirSync(this.directory, { recursive: true });
  }

  getDirectory(): string {
    return this.directory;
  }

  put(key: string, value: StoredValue): void {
    const entry: StoredEntry = { key, value, storedAt: this.now() };
    const target = this.entryPath(key);
    const temp = `${target}.${process.pid}.${crypto.randomUUID()}${TEMP_SUFFIX}`;
    try {
      fs.writeFileSync(temp, JSON.stringify(entry), 'utf-8');
      fs.renameSync(temp, target);
    } catch (error) {
      fs.rmSync(temp, { force: true });
      throw error;
    }
    this.enforceSizeLimit(target);
  }

  get(key: string): StoredValue | undefined {
    const entry = this.readEntry(this.entryPath(key));
    // A hash collision would surface as a different key.
    return entry && entry.key === key ? entry.value : undefined;
  }

  delete(key: string): void {
    fs.rmSync(this.entryPath(key), { force: true });
  }

  listKeysForPrefix(prefix: string): string[] {
    const keys: string[] = [];
    for (const file of this.entryFiles()) {
      const entry = this.readEntry(file);
      if (entry && entry.key.startsWith(prefix)) {
        keys.push(entry.key);
      }
    }
    return keys.sort();
  }

  /** Bytes currently held by stored entries. */
  totalSize(): number {
    return this.entryFiles().reduce(
      (total, file) => total + this.fileSize(file),
      0,
    );
  }

  private entryPath(key: string): string {
    const hash = crypto.createHash('sha256').update(key).digest('hex');
    return path.join(this.directory, `${hash}${ENTRY_SUFFIX}`);
  }

  private entryFiles(): string[] {
    return fs
      .readdirSync(this.directory)
      .filter((name) => name.endsWith(ENTRY_SUFFIX))
      .map((name) => path.join(this.directory, name));
  }

  private fileSize(file: string): number {
    try {
      return fs.statSync(file).size;
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return 0;
      }
      throw error;
    }
  }

  private readEntry(file: string): StoredEntry | undefined {
    let raw: string;
    try {
      raw = fs.readFileSync(file, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      if (isStoredEntry(parsed)) {
        return parsed;
      }
      debugLogger.warn(`Ignoring malformed history entry ${file}`);
    } catch (error) {
      debugLogger.warn(
        `Ignoring unreadable history entry ${file}: ${getErrorMessage(error)}`,
      );
    }
    return undefined;
  }

  /**
   * Deletes the oldest entries until the store fits its size limit. The entry
   * just written is never evicted.
   */
  private enforceSizeLimit(keep: string): void {
    const sized = this.entryFiles().map((file) => ({
      file,
      size: this.fileSize(file),
    }));
    let total = sized.reduce((sum, { size }) => sum + size, 0);
    if (total <= this.sizeLimitBytes) {
      return;
    }
    const files = sized
      .map((entry) => ({
        ...entry,
        storedAt: this.readEntry(entry.file)?.storedAt ?? 0,
      }))
      .sort((a, b) => a.storedAt - b.storedAt);
    for (const { file, size } of files) {
      if (total <= this.sizeLimitBytes) {
        break;
      }
      if (file === keep) {
        continue;
      }
      fs.rmSync(file, { force: true });
      total -= size;
      debugLogger.debug(`Evicted history entry ${file} (${size} bytes)`);
    }
  }
}
