/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const EDIT_COMMANDS = [
  'view',
  'create',
  'str_replace',
  'insert',
  'undo_edit',
] as const;

export type EditCommand = (typeof EDIT_COMMANDS)[number];

export function isEditCommand(value: string): value is EditCommand {
  return (EDIT_COMMANDS as readonly string[]).includes(value);
}

/**
 * One request to the editor. Field names follow the keyword arguments of the
 * tool so a parsed call can be passed through unchanged.
 */
export interface EditRequest {
  command: string;
  path: string;
  file_text?: string;
  view_range?: number[];
  old_str?: string;
  new_str?: string;
  insert_line?: number;
  enable_linting?: boolean;
}

/** One literal match of a search string inside some content. */
export interface Occurrence {
  /** 1-based line on which the match starts. */
  lineNumber: number;
  matchedText: string;
  /** Character offset of the match in the searched content. */
  offset: number;
}
