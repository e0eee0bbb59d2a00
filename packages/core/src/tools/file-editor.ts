/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ToolInvocation, ToolResult } from './tools.js';
import { BaseDeclarativeTool, BaseToolInvocation, Kind } from './tools.js';
import type { ToolErrorType } from './tool-error.js';
import type { EditEngine } from '../editor/editEngine.js';
import { EDITOR_TOOL_NAME } from '../editor/editEngine.js';
import {
  formatEditorError,
  toolErrorTypeFor,
} from '../editor/editorErrors.js';
import type { EditRequest } from '../editor/types.js';
import { EDIT_COMMANDS } from '../editor/types.js';

/**
 * Parameters for the file editor tool
 */
export type FileEditorToolParams = EditRequest;

export interface FileEditorToolResult extends ToolResult {
  path?: string;
  prevExist?: boolean;
  oldContent?: string;
  newContent?: string;
}

const DISPLAY_VERBS: Record<string, string> = {
  view: 'Viewed',
  create: 'Created',
  str_replace: 'Edited',
  insert: 'Inserted into',
  undo_edit: 'Reverted',
};

class FileEditorToolInvocation extends BaseToolInvocation<
  FileEditorToolParams,
  FileEditorToolResult
> {
  constructor(
    private readonly engine: EditEngine,
    params: FileEditorToolParams,
  ) {
    super(params);
  }

  getDescription(): string {
    return `${this.params.command} ${this.params.path}`;
  }

  async execute(_signal: AbortSignal): Promise<FileEditorToolResult> {
    const outcome = await this.engine.execute(this.params);
    if (!outcome.success) {
      const message = formatEditorError(outcome.error);
      return {
        llmContent: message,
        returnDisplay: `Error: ${message}`,
        error: {
          message,
          type: toolErrorTypeFor(outcome.error),
        },
      };
    }

    const { output, path, prevExist, oldContent, newContent } = outcome.value;
    const verb = DISPLAY_VERBS[this.params.command] ?? 'Processed';
    return {
      llmContent: output,
      returnDisplay: `${verb} ${path}`,
      path,
      prevExist,
      oldContent,
      newContent,
    };
  }
}

/**
 * Views, creates and edits plain-text files, with undo.
 */
export class FileEditorTool extends BaseDeclarativeTool<
  FileEditorToolParams,
  FileEditorToolResult
> {
  static readonly Name = EDITOR_TOOL_NAME;

  constructor(private readonly engine: EditEngine) {
    super(
      FileEditorTool.Name,
      'FileEditor',
      `Custom editing tool for viewing, creating and editing plain-text files.
* State is persistent across command calls.
* If \`path\` is a file, \`view\` displays the result of applying \`cat -n\`. If \`path\` is a directory, \`view\` lists non-hidden files and directories up to 2 levels deep.
* The \`create\` command cannot be used if the specified \`path\` already exists as a file.
* Long outputs are truncated and marked with \`<response clipped>\`.
* The \`undo_edit\` command reverts the last edit made to the file at \`path\`.

Notes for using the \`str_replace\` command:
* The \`old_str\` parameter must match EXACTLY one or more consecutive lines from the file, including whitespace.
* If \`old_str\` is not unique in the file, no replacement is made. Include enough context to make it unique.
* The \`new_str\` parameter holds the lines that replace \`old_str\`.`,
      Kind.Edit,
      {
        type: 'object',
        properties: {
          command: {
            description: `The command to run. Allowed options are: ${EDIT_COMMANDS.map((c) => `\`${c}\``).join(', ')}.`,
            type: 'string',
          },
          path: {
            description:
              'Absolute path to the file or directory, e.g. `/repo/file.py` or `/repo`.',
            type: 'string',
          },
          file_text: {
            description:
              'Required for `create`: the content of the file to be created.',
            type: 'string',
          },
          view_range: {
            description:
              'Optional for `view` on a file: the lines to show, e.g. [11, 12] shows lines 11 and 12. Indexing starts at 1. [start, -1] shows every line from `start` to the end of the file.',
            type: 'array',
            items: { type: 'integer' },
          },
          old_str: {
            description:
              'Required for `str_replace`: the string in `path` to replace.',
            type: 'string',
          },
          new_str: {
            description:
              'Required for `str_replace` (the replacement string) and `insert` (the string to insert).',
            type: 'string',
          },
          insert_line: {
            description:
              'Required for `insert`: `new_str` is inserted AFTER this line of `path`. 0 inserts at the start of the file.',
            type: 'integer',
          },
          enable_linting: {
            description:
              'Optional for `str_replace` and `insert`: lint the changed file and report issues the edit introduced.',
            type: 'boolean',
          },
        },
        required: ['command', 'path'],
      },
    );
  }

  protected override validateToolParamValues(
    params: FileEditorToolParams,
  ): string | null {
    if (params.path.trim() === '') {
      return "The 'path' parameter must be non-empty.";
    }
    return null;
  }

  protected errorResult(
    message: string,
    type: ToolErrorType,
  ): FileEditorToolResult {
    return {
      llmContent: message,
      returnDisplay: `Error: ${message}`,
      error: { message, type },
    };
  }

  protected createInvocation(
    params: FileEditorToolParams,
  ): ToolInvocation<FileEditorToolParams, FileEditorToolResult> {
    return new FileEditorToolInvocation(this.engine, params);
  }
}
