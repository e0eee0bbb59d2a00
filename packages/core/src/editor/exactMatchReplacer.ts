/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { countNewlines } from '../utils/textUtils.js';
import type { Outcome } from './editorErrors.js';
import { fail, ok, parameterInvalid } from './editorErrors.js';
import type { Occurrence } from './types.js';

export interface Replacement {
  newContent: string;
  /** 1-based line on which the replaced span started. */
  editedLine: number;
}

/**
 * Every literal occurrence of `search` in `content`, in document order.
 * Matches do not overlap: the search resumes after each one.
 */
export function findOccurrences(content: string, search: string): Occurrence[] {
  const occurrences: Occurrence[] = [];
  if (search === '') {
    return occurrences;
  }
  let offset = content.indexOf(search);
  while (offset !== -1) {
    occurrences.push({
      lineNumber: countNewlines(content, offset) + 1,
      matchedText: search,
      offset,
    });
    offset = content.indexOf(search, offset + search.length);
  }
  return occurrences;
}

/**
 * Replaces the single occurrence of `oldStr` in `content` with `newStr`.
 * Callers pass already tab-expanded text; `filePath` only appears in errors.
 */
export function replaceExactlyOnce(
  content: string,
  oldStr: string,
  newStr: string,
  filePath: string,
): Outcome<Replacement> {
  if (oldStr === '') {
    return fail(
      parameterInvalid('old_str', oldStr, 'It should be a non-empty string.'),
    );
  }
  const occurrences = findOccurrences(content, oldStr);
  if (occurrences.length === 0) {
    return fail(
      parameterInvalid(
        'old_str',
        oldStr,
        `No replacement was performed, old_str \`${oldStr}\` did not appear verbatim in ${filePath}.`,
      ),
    );
  }
  if (occurrences.length > 1) {
    const lines = occurrences.map((occurrence) => occurrence.lineNumber);
    return fail(
      parameterInvalid(
        'old_str',
        oldStr,
        `No replacement was performed. Multiple occurrences of old_str \`${oldStr}\` in lines [${lines.join(', ')}]. Please ensure it is unique.`,
      ),
    );
  }

  const [{ offset, matchedText, lineNumber }] = occurrences;
  return ok({
    newContent:
      content.slice(0, offset) +
      newStr +
      content.slice(offset + matchedText.length),
    editedLine: lineNumber,
  });
}
