/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const MEBIBYTE = 1024 * 1024;

export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * MEBIBYTE;
export const DEFAULT_MAX_HISTORY_PER_FILE = 5;
export const DEFAULT_HISTORY_STORE_SIZE_LIMIT_BYTES = 1024 * MEBIBYTE;

/** Longest rendered file content, in characters, before it is clipped. */
export const DEFAULT_MAX_RESPONSE_LENGTH = 16000;

/** Lines shown above and below an edit in the confirmation snippet. */
export const SNIPPET_CONTEXT_WINDOW = 4;

export const DEFAULT_SHELL_TIMEOUT_MS = 120_000;
export const DEFAULT_LINT_TIMEOUT_MS = 30_000;

/**
 * Lint commands keyed by file extension. `{file}` is replaced with the
 * shell-quoted path of the file under check.
 */
export const DEFAULT_LINTERS: Readonly<Record<string, string>> = {
  '.py': 'ruff check --select F --no-fix --output-format concise {file}',
};
