/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import { Storage } from './storage.js';
import {
  DEFAULT_HISTORY_STORE_SIZE_LIMIT_BYTES,
  DEFAULT_LINT_TIMEOUT_MS,
  DEFAULT_LINTERS,
  DEFAULT_MAX_FILE_SIZE_BYTES,
  DEFAULT_MAX_HISTORY_PER_FILE,
  DEFAULT_MAX_RESPONSE_LENGTH,
  SNIPPET_CONTEXT_WINDOW,
} from './constants.js';
import { debugLogger, type LogLevel } from '../utils/debugLogger.js';

export interface ConfigParameters {
  /** Directory relative paths are resolved against when suggesting fixes. */
  targetDir: string;
  maxFileSizeBytes?: number;
  maxHistoryPerFile?: number;
  /** Overrides the per-project history directory under the user's home. */
  historyDir?: string;
  historyStoreSizeLimitBytes?: number;
  maxResponseLength?: number;
  snippetContextWindow?: number;
  /** Extension to lint command; merged over {@link DEFAULT_LINTERS}. */
  linters?: Record<string, string>;
  lintTimeoutMs?: number;
  logLevel?: LogLevel;
}

export class Config {
  readonly storage: Storage;
  private readonly targetDir: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxHistoryPerFile: number;
  private readonly historyDir: string;
  private readonly historyStoreSizeLimitBytes: number;
  private readonly maxResponseLength: number;
  private readonly snippetContextWindow: number;
  private readonly linters: Readonly<Record<string, string>>;
  private readonly lintTimeoutMs: number;
  private readonly logLevel: LogLevel | undefined;

  constructor(params: ConfigParameters) {
    this.targetDir = path.resolve(params.targetDir);
    this.storage = new Storage(this.targetDir);
    this.maxFileSizeBytes =
      params.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;
    this.maxHistoryPerFile =
      params.maxHistoryPerFile ?? DEFAULT_MAX_HISTORY_PER_FILE;
    this.historyDir = params.historyDir ?? this.storage.getHistoryDir();
    this.historyStoreSizeLimitBytes =
      params.historyStoreSizeLimitBytes ??
      DEFAULT_HISTORY_STORE_SIZE_LIMIT_BYTES;
    this.maxResponseLength =
      params.maxResponseLength ?? DEFAULT_MAX_RESPONSE_LENGTH;
    this.snippetContextWindow =
      params.snippetContextWindow ?? SNIPPET_CONTEXT_WINDOW;
    this.linters = { ...DEFAULT_LINTERS, ...(params.linters ?? {}) };
    this.lintTimeoutMs = params.lintTimeoutMs ?? DEFAULT_LINT_TIMEOUT_MS;
    this.logLevel = params.logLevel;
    if (this.logLevel) {
      debugLogger.setLevel(this.logLevel);
    }
  }

  getTargetDir(): string {
    return this.targetDir;
  }

  getMaxFileSizeBytes(): number {
    return this.maxFileSizeBytes;
  }

  getMaxHistoryPerFile(): number {
    return this.maxHistoryPerFile;
  }

  getHistoryDir(): string {
    return this.historyDir;
  }

  getHistoryStoreSizeLimitBytes(): number {
    return this.historyStoreSizeLimitBytes;
  }

  getMaxResponseLength(): number {
    return this.maxResponseLength;
  }

  getSnippetContextWindow(): number {
    return this.snippetContextWindow;
  }

  getLinters(): Readonly<Record<string, string>> {
    return this.linters;
  }

  getLintTimeoutMs(): number {
    return this.lintTimeoutMs;
  }

  getLogLevel(): LogLevel | undefined {
    return this.logLevel;
  }
}
