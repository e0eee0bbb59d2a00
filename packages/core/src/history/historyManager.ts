/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_MAX_HISTORY_PER_FILE } from '../config/constants.js';
import { debugLogger } from '../utils/debugLogger.js';
import type { KeyValueStore } from './keyValueStore.js';

const COUNTER_SUFFIX = 'counter';
const ENTRIES_SUFFIX = 'entries';
const OWNED_SUFFIX = /^(counter|entries|\d+)$/;

/**
 * Bounded undo stack per file. For a path `p` the store holds `p:counter`
 * (next snapshot number), `p:entries` (snapshot keys, oldest first) and one
 * `p:<n>` per snapshot. Snapshot numbers are never reused until `clear`.
 */
export class FileHistoryManager {
  constructor(
    private readonly store: KeyValueStore,
    private readonly maxHistoryPerFile: number = DEFAULT_MAX_HISTORY_PER_FILE,
  ) {}

  add(filePath: string, content: string): void {
    const entries = this.getEntries(filePath);
    const counter = this.nextSnapshotNumber(filePath, entries);
    const key = `${filePath}:${counter}`;

    this.store.put(key, content);
    entries.push(key);
    this.store.put(this.counterKey(filePath), counter + 1);

    while (entries.length > this.maxHistoryPerFile) {
      const evicted = entries.shift();
      if (evicted !== undefined) {
        this.store.delete(evicted);
      }
    }
    this.store.put(this.entriesKey(filePath), entries);
    debugLogger.debug(
      `History saved for ${filePath}. Current history size: ${entries.length}`,
    );
  }

  /** Removes and returns the newest snapshot, if any. */
  getLast(filePath: string): string | undefined {
    const entries = this.getEntries(filePath);
    const key = entries.pop();
    if (key === undefined) {
      return undefined;
    }
    const content = this.store.get(key);
    this.store.delete(key);
    this.store.put(this.entriesKey(filePath), entries);
    if (typeof content !== 'string') {
      debugLogger.warn(`History snapshot ${key} is missing.`);
      return undefined;
    }
    return content;
  }

  /** Keys currently retained for `filePath`, oldest first. */
  getEntries(filePath: string): string[] {
    const stored = this.store.get(this.entriesKey(filePath));
    if (!Array.isArray(stored)) {
      return [];
    }
    return stored.filter((key): key is string => typeof key === 'string');
  }

  clear(filePath: string): void {
    const prefix = `${filePath}:`;
    for (const key of this.store.listKeysForPrefix(prefix)) {
      // `/a:b` shares the prefix of `/a`; only touch keys this path owns.
      if (OWNED_SUFFIX.test(key.slice(prefix.length))) {
        this.store.delete(key);
      }
    }
  }

  /**
   * The stored counter, raised past every retained snapshot number in case
   * the store dropped the counter but kept the entry list.
   */
  private nextSnapshotNumber(filePath: string, entries: string[]): number {
    const stored = this.store.get(this.counterKey(filePath));
    let next =
      typeof stored === 'number' && Number.isInteger(stored) ? stored : 0;
    const prefix = `${filePath}:`;
    for (const key of entries) {
      const suffix = key.slice(prefix.length);
      if (key.startsWith(prefix) && /^\d+$/.test(suffix)) {
        next = Math.max(next, Number(suffix) + 1);
      }
    }
    return next;
  }

  private counterKey(filePath: string): string {
    return `${filePath}:${COUNTER_SUFFIX}`;
  }

  private entriesKey(filePath: string): string {
    return `${filePath}:${ENTRIES_SUFFIX}`;
  }
}
