/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const DEFAULT_TAB_SIZE = 8;

/**
 * Replaces every tab with enough spaces to reach the next tab stop. Columns
 * restart after `\n` and `\r`, so the result matches what a terminal shows.
 */
export function expandTabs(text: string, tabSize = DEFAULT_TAB_SIZE): string {
  if (!text.includes('\t')) {
    return text;
  }
  const parts: string[] = [];
  let column = 0;
  for (const char of text) {
    if (char === '\t') {
      const width = tabSize - (column % tabSize);
      parts.push(' '.repeat(width));
      column += width;
    } else if (char === '\n' || char === '\r') {
      parts.push(char);
      column = 0;
    } else {
      parts.push(char);
      column += 1;
    }
  }
  return parts.join('');
}

/**
 * Splits content into lines without their terminators. A final `\n` ends the
 * last line rather than starting an empty one, and empty content has no lines.
 */
export function splitLines(content: string): string[] {
  if (content === '') {
    return [];
  }
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function countLines(content: string): number {
  return splitLines(content).length;
}

/** Number of `\n` characters in `text` before `end`. */
export function countNewlines(text: string, end = text.length): number {
  let count = 0;
  let index = text.indexOf('\n');
  while (index !== -1 && index < end) {
    count++;
    index = text.indexOf('\n', index + 1);
  }
  return count;
}

/**
 * Cuts `content` after `truncateAfter` characters and appends `notice`.
 * A missing or zero limit leaves the content untouched.
 */
export function maybeTruncate(
  content: string,
  truncateAfter: number | undefined,
  notice: string,
): string {
  if (!truncateAfter || content.length <= truncateAfter) {
    return content;
  }
  return content.slice(0, truncateAfter) + notice;
}

/**
 * Looks for a NUL byte in the first `sampleSize` bytes, the usual sign of a
 * binary file.
 */
export function hasNulByte(data: Buffer, sampleSize = 1024): boolean {
  const sample = data.length > sampleSize ? data.subarray(0, sampleSize) : data;
  return sample.includes(0);
}
