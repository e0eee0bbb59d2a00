/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { splitLines } from '../utils/textUtils.js';
import type { Outcome } from './editorErrors.js';
import { fail, ok, parameterInvalid } from './editorErrors.js';

export interface Insertion {
  newContent: string;
  /** Number of lines `text` contributed. */
  insertedLineCount: number;
  newLineCount: number;
}

/**
 * Inserts `text` after line `lineIndex` (0 puts it before the first line).
 * Lines are joined with `\n`; the content keeps its trailing newline, and
 * empty content gains one.
 */
export function insertLines(
  content: string,
  lineIndex: number,
  text: string,
): Outcome<Insertion> {
  const lines = splitLines(content);
  if (
    !Number.isInteger(lineIndex) ||
    lineIndex < 0 ||
    lineIndex > lines.length
  ) {
    return fail(
      parameterInvalid(
        'insert_line',
        lineIndex,
        `It should be within the range of lines of the file: [0, ${lines.length}]`,
      ),
    );
  }

  const inserted = text.split('\n');
  const result = [
    ...lines.slice(0, lineIndex),
    ...inserted,
    ...lines.slice(lineIndex),
  ];
  const trailingNewline = content === '' || content.endsWith('\n');
  return ok({
    newContent: result.join('\n') + (trailingNewline ? '\n' : ''),
    insertedLineCount: inserted.length,
    newLineCount: result.length,
  });
}
