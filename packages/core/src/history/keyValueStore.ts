/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type StoredValue =
  | string
  | number
  | boolean
  | null
  | StoredValue[]
  | { [key: string]: StoredValue };

/**
 * Minimal persistence contract the history manager depends on.
 */
export interface KeyValueStore {
  put(key: string, value: StoredValue): void;
  get(key: string): StoredValue | undefined;
  delete(key: string): void;
  listKeysForPrefix(prefix: string): string[];
}

export function isStoredValue(value: unknown): value is StoredValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isStoredValue);
  }
  if (typeof value === 'object') {
    return Object.values(value).every(isStoredValue);
  }
  return false;
}

export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, StoredValue>();

  put(key: string, value: StoredValue): void {
    this.entries.set(key, structuredClone(value));
  }

  get(key: string): StoredValue | undefined {
    const value = this.entries.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  listKeysForPrefix(prefix: string): string[] {
    return [...this.entries.keys()].filter((key) => key.startsWith(prefix));
  }

  get size(): number {
    return this.entries.size;
  }
}
