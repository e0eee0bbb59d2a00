/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as crypto from 'node:crypto';
import type { FileEditorToolResult } from './file-editor.js';

const MARKER_PREFIX = 'plainedit_output_';
const ENVELOPE_PATTERN = new RegExp(
  `<${MARKER_PREFIX}([0-9a-f]+)>\\n([\\s\\S]*?)\\n</${MARKER_PREFIX}\\1>`,
);

/** Wire form of a tool result; keys are snake case. */
export interface ToolResultEnvelope {
  output: string | null;
  error: string | null;
  path: string | null;
  prev_exist: boolean | null;
  old_content: string | null;
  new_content: string | null;
  /** `ERROR:\n<error>` for failures, the output otherwise. */
  formatted_output_and_error: string;
}

export function toEnvelope(result: FileEditorToolResult): ToolResultEnvelope {
  const error = result.error ? result.error.message : null;
  const output = result.error ? null : result.llmContent;
  return {
    output,
    error,
    path: result.path ?? null,
    prev_exist: result.prevExist ?? null,
    old_content: result.oldContent ?? null,
    new_content: result.newContent ?? null,
    formatted_output_and_error:
      error !== null ? `ERROR:\n${error}` : (output ?? ''),
  };
}

/**
 * Serializes a result between a pair of tags carrying a random id, so the
 * block can be found in surrounding free text.
 */
export function formatToolResultEnvelope(
  result: FileEditorToolResult,
  markerId: string = crypto.randomUUID().replace(/-/g, ''),
): string {
  const tag = `${MARKER_PREFIX}${markerId}`;
  return `<${tag}>\n${JSON.stringify(toEnvelope(result))}\n</${tag}>`;
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isToolResultEnvelope(value: unknown): value is ToolResultEnvelope {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'output' in value &&
    isNullableString(value.output) &&
    'error' in value &&
    isNullableString(value.error) &&
    'path' in value &&
    isNullableString(value.path) &&
    'prev_exist' in value &&
    (value.prev_exist === null || typeof value.prev_exist === 'boolean') &&
    'old_content' in value &&
    isNullableString(value.old_content) &&
    'new_content' in value &&
    isNullableString(value.new_content) &&
    'formatted_output_and_error' in value &&
    typeof value.formatted_output_and_error === 'string'
  );
}

/**
 * Finds the first envelope in `text` and decodes it. Returns undefined when
 * there is none or its body is not a result.
 */
export function parseToolResultEnvelope(
  text: string,
): ToolResultEnvelope | undefined {
  const match = ENVELOPE_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(match[2]);
  } catch {
    return undefined;
  }
  return isToolResultEnvelope(parsed) ? parsed : undefined;
}
