/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { InMemoryKeyValueStore, isStoredValue } from './keyValueStore.js';

describe('isStoredValue', () => {
  it('should accept JSON values', () => {
    expect(isStoredValue('text')).toBe(true);
    expect(isStoredValue(['a', 1, null])).toBe(true);
    expect(isStoredValue({ nested: { ok: true } })).toBe(true);
  });

  it('should reject values JSON cannot hold', () => {
    expect(isStoredValue(undefined)).toBe(false);
    expect(isStoredValue(['a', () => 1])).toBe(false);
  });
});

describe('InMemoryKeyValueStore', () => {
  it('should put, get and delete values', () => {
    const store = new InMemoryKeyValueStore();
    store.put('k', 'v');
    expect(store.get('k')).toBe('v');
    store.delete('k');
    expect(store.get('k')).toBeUndefined();
  });

  it('should list keys under a prefix', () => {
    const store = new InMemoryKeyValueStore();
    store.put('/a:0', 'x');
    store.put('/a:counter', 1);
    store.put('/b:0', 'y');
    expect(store.listKeysForPrefix('/a:').sort()).toEqual(['/a:0', '/a:counter']);
  });

  it('should not share arrays with callers', () => {
    const store = new InMemoryKeyValueStore();
    const list = ['one'];
    store.put('list', list);
    list.push('two');
    expect(store.get('list')).toEqual(['one']);
  });
});
