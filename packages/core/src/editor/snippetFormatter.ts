/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_MAX_RESPONSE_LENGTH } from '../config/constants.js';
import { expandTabs, maybeTruncate, splitLines } from '../utils/textUtils.js';
import { FILE_CONTENT_TRUNCATED_NOTICE } from './notices.js';

/** Width of the right-aligned line number column, as `cat -n` prints it. */
const LINE_NUMBER_WIDTH = 6;

export function formatNumberedLine(lineNumber: number, line: string): string {
  return `${String(lineNumber).padStart(LINE_NUMBER_WIDTH)}\t${line}`;
}

/**
 * Renders `content` the way `cat -n` would, numbering from `startLine`.
 * Text is split with {@link splitLines}; pass the lines themselves when a
 * trailing empty line must be shown. Over-long content is clipped before
 * numbering, so the notice lands on the last rendered line.
 */
export function makeOutput(
  content: string | readonly string[],
  description: string,
  startLine = 1,
  maxResponseLength = DEFAULT_MAX_RESPONSE_LENGTH,
): string {
  const lines = typeof content === 'string' ? splitLines(content) : content;
  const joined = lines.join('\n');
  const clipped = maybeTruncate(
    joined,
    maxResponseLength,
    FILE_CONTENT_TRUNCATED_NOTICE,
  );
  const rendered = clipped === joined ? lines : clipped.split('\n');
  const numbered = rendered
    .map((line, index) =>
      formatNumberedLine(index + startLine, expandTabs(line)),
    )
    .join('\n');
  return `Here's the result of running \`cat -n\` on ${description}:\n${numbered}\n`;
}
