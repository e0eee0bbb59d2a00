/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import * as path from 'node:path';
import type { Config } from '../config/config.js';
import {
  DEFAULT_MAX_RESPONSE_LENGTH,
  SNIPPET_CONTEXT_WINDOW,
} from '../config/constants.js';
import { DiskKeyValueStore } from '../history/diskKeyValueStore.js';
import { FileHistoryManager } from '../history/historyManager.js';
import { CommandLinter } from '../linter/commandLinter.js';
import type { Linter } from '../linter/linter.js';
import { formatLintResults } from '../linter/linter.js';
import type { FileSystemService } from '../services/fileSystemService.js';
import { StandardFileSystemService } from '../services/fileSystemService.js';
import { debugLogger } from '../utils/debugLogger.js';
import { getErrorMessage } from '../utils/errors.js';
import { countNewlines, expandTabs, splitLines } from '../utils/textUtils.js';
import { viewDirectory } from './directoryViewer.js';
import type { EditorError, Outcome } from './editorErrors.js';
import {
  fail,
  ok,
  parameterInvalid,
  parameterMissing,
  toolFailure,
} from './editorErrors.js';
import { replaceExactlyOnce } from './exactMatchReplacer.js';
import { FileValidator } from './fileValidator.js';
import { insertLines } from './lineInserter.js';
import { PathValidator } from './pathValidator.js';
import { makeOutput } from './snippetFormatter.js';
import type { EditRequest } from './types.js';
import { EDIT_COMMANDS, isEditCommand } from './types.js';

export const EDITOR_TOOL_NAME = 'str_replace_editor';

const REVIEW_REMINDER =
  'Review the changes and make sure they are as expected. Edit the file again if necessary.';
const INSERT_REVIEW_REMINDER =
  'Review the changes and make sure they are as expected (correct indentation, no duplicate lines, etc). Edit the file again if necessary.';

/** What a successful command reports back. */
export interface EditResult {
  output: string;
  path: string;
  /** False only when `create` brought the file into existence. */
  prevExist: boolean;
  oldContent?: string;
  newContent?: string;
}

export interface EditEngineDependencies {
  pathValidator: PathValidator;
  fileValidator: FileValidator;
  history: FileHistoryManager;
  linter: Linter;
  fileSystemService: FileSystemService;
  maxResponseLength?: number;
  snippetContextWindow?: number;
}

/**
 * Runs one editor command at a time against the filesystem. Every check
 * happens before the single write a mutating command performs.
 */
export class EditEngine {
  private readonly pathValidator: PathValidator;
  private readonly fileValidator: FileValidator;
  private readonly history: FileHistoryManager;
  private readonly linter: Linter;
  private readonly fileSystemService: FileSystemService;
  private readonly maxResponseLength: number;
  private readonly snippetContextWindow: number;

  constructor(deps: EditEngineDependencies) {
    this.pathValidator = deps.pathValidator;
    this.fileValidator = deps.fileValidator;
    this.history = deps.history;
    this.linter = deps.linter;
    this.fileSystemService = deps.fileSystemService;
    this.maxResponseLength =
      deps.maxResponseLength ?? DEFAULT_MAX_RESPONSE_LENGTH;
    this.snippetContextWindow =
      deps.snippetContextWindow ?? SNIPPET_CONTEXT_WINDOW;
  }

  static fromConfig(config: Config): EditEngine {
    return new EditEngine({
      pathValidator: new PathValidator(config.getTargetDir()),
      fileValidator: new FileValidator(config.getMaxFileSizeBytes()),
      history: new FileHistoryManager(
        new DiskKeyValueStore(config.getHistoryDir(), {
          sizeLimitBytes: config.getHistoryStoreSizeLimitBytes(),
        }),
        config.getMaxHistoryPerFile(),
      ),
      linter: new CommandLinter(config.getLinters(), config.getLintTimeoutMs()),
      fileSystemService: new StandardFileSystemService(),
      maxResponseLength: config.getMaxResponseLength(),
      snippetContextWindow: config.getSnippetContextWindow(),
    });
  }

  async execute(request: EditRequest): Promise<Outcome<EditResult>> {
    const { command } = request;
    const filePath = normalizeFilePath(request.path);
    if (!isEditCommand(command)) {
      return fail(
        toolFailure(
          `Unrecognized command ${command}. The allowed commands for the ${EDITOR_TOOL_NAME} tool are: ${EDIT_COMMANDS.join(', ')}`,
        ),
      );
    }
    debugLogger.debug(`Running ${command} on ${filePath}`);

    const pathCheck = this.pathValidator.validate(command, filePath);
    if (!pathCheck.success) {
      return pathCheck;
    }

    switch (command) {
      case 'view':
        return this.view(filePath, request.view_range);
      case 'create':
        if (request.file_text === undefined) {
          return fail(parameterMissing(command, 'file_text'));
        }
        return this.create(filePath, request.file_text);
      case 'str_replace':
        if (request.old_str === undefined) {
          return fail(parameterMissing(command, 'old_str'));
        }
        if (request.new_str === undefined) {
          return fail(parameterMissing(command, 'new_str'));
        }
        if (request.new_str === request.old_str) {
          return fail(
            parameterInvalid(
              'new_str',
              request.new_str,
              'No replacement was performed. `new_str` and `old_str` must be different.',
            ),
          );
        }
        return this.strReplace(
          filePath,
          request.old_str,
          request.new_str,
          request.enable_linting ?? false,
        );
      case 'insert':
        if (request.insert_line === undefined) {
          return fail(parameterMissing(command, 'insert_line'));
        }
        if (request.new_str === undefined) {
          return fail(parameterMissing(command, 'new_str'));
        }
        return this.insert(
          filePath,
          request.insert_line,
          request.new_str,
          request.enable_linting ?? false,
        );
      case 'undo_edit':
        return this.undoEdit(filePath);
      default: {
        const exhaustive: never = command;
        return exhaustive;
      }
    }
  }

  /** Drops all undo history for `filePath`. */
  clearHistory(filePath: string): void {
    this.history.clear(normalizeFilePath(filePath));
  }

  private async view(
    filePath: string,
    viewRange: number[] | undefined,
  ): Promise<Outcome<EditResult>> {
    const range = viewRange && viewRange.length > 0 ? viewRange : undefined;
    if (fs.statSync(filePath).isDirectory()) {
      if (range) {
        return fail(
          parameterInvalid(
            'view_range',
            range,
            'The `view_range` parameter is not allowed when `path` points to a directory.',
          ),
        );
      }
      return ok({
        output: viewDirectory(filePath, this.maxResponseLength),
        path: filePath,
        prevExist: true,
      });
    }

    const fileCheck = this.fileValidator.validate(filePath);
    if (!fileCheck.success) {
      return fileCheck;
    }

    if (!range) {
      const content = await this.readFile(filePath);
      if (!content.success) {
        return content;
      }
      return ok({
        output: makeOutput(
          content.value,
          filePath,
          1,
          this.maxResponseLength,
        ),
        path: filePath,
        prevExist: true,
      });
    }

    if (range.length !== 2 || !range.every((n) => Number.isInteger(n))) {
      return fail(
        parameterInvalid(
          'view_range',
          range,
          'It should be a list of two integers.',
        ),
      );
    }

    let lineCount: number;
    try {
      lineCount = await this.fileSystemService.countLines(filePath);
    } catch (error) {
      return fail(readFailure(error, filePath));
    }

    const [startLine, requestedEnd] = range;
    if (startLine < 1 || startLine > lineCount) {
      return fail(
        parameterInvalid(
          'view_range',
          range,
          `Its first element \`${startLine}\` should be within the range of lines of the file: [1, ${lineCount}].`,
        ),
      );
    }
    if (requestedEnd > lineCount) {
      return fail(
        parameterInvalid(
          'view_range',
          range,
          `Its second element \`${requestedEnd}\` should be smaller than the number of lines in the file: \`${lineCount}\`.`,
        ),
      );
    }
    if (requestedEnd !== -1 && requestedEnd < startLine) {
      return fail(
        parameterInvalid(
          'view_range',
          range,
          `Its second element \`${requestedEnd}\` should be greater than or equal to the first element \`${startLine}\`.`,
        ),
      );
    }
    const endLine = requestedEnd === -1 ? lineCount : requestedEnd;

    let snippet: string[];
    try {
      snippet = await this.fileSystemService.readLineRange(
        filePath,
        startLine,
        endLine,
      );
    } catch (error) {
      return fail(readFailure(error, filePath));
    }
    return ok({
      output: makeOutput(snippet, filePath, startLine, this.maxResponseLength),
      path: filePath,
      prevExist: true,
    });
  }

  private async create(
    filePath: string,
    fileText: string,
  ): Promise<Outcome<EditResult>> {
    const fileCheck = this.fileValidator.validate(filePath);
    if (!fileCheck.success) {
      return fileCheck;
    }
    const written = await this.writeFile(filePath, fileText);
    if (!written.success) {
      return written;
    }
    // Seeding history makes undo after create restore this text.
    this.history.add(filePath, fileText);
    return ok({
      output: `File created successfully at: ${filePath}`,
      path: filePath,
      prevExist: false,
      newContent: fileText,
    });
  }

  private async strReplace(
    filePath: string,
    oldStr: string,
    newStr: string,
    enableLinting: boolean,
  ): Promise<Outcome<EditResult>> {
    const fileCheck = this.fileValidator.validate(filePath);
    if (!fileCheck.success) {
      return fileCheck;
    }
    const original = await this.readFile(filePath);
    if (!original.success) {
      return original;
    }

    const content = expandTabs(original.value);
    const expandedNew = expandTabs(newStr);
    const replaced = replaceExactlyOnce(
      content,
      expandTabs(oldStr),
      expandedNew,
      filePath,
    );
    if (!replaced.success) {
      return replaced;
    }
    const { newContent, editedLine } = replaced.value;

    const committed = await this.commit(filePath, original.value, newContent);
    if (!committed.success) {
      return committed;
    }

    const lines = splitLines(newContent);
    const window = this.snippetContextWindow;
    const startLine = Math.max(1, editedLine - window);
    const endLine = Math.min(
      lines.length,
      editedLine + window + countNewlines(expandedNew),
    );
    const snippet = lines.slice(startLine - 1, endLine);

    let output =
      `The file ${filePath} has been edited. ` +
      makeOutput(
        snippet,
        `a snippet of ${filePath}`,
        startLine,
        this.maxResponseLength,
      );
    if (enableLinting) {
      output += `\n${await this.lint(content, newContent, filePath)}\n`;
    }
    output += REVIEW_REMINDER;

    return ok({
      output,
      path: filePath,
      prevExist: true,
      oldContent: original.value,
      newContent,
    });
  }

  private async insert(
    filePath: string,
    insertLine: number,
    newStr: string,
    enableLinting: boolean,
  ): Promise<Outcome<EditResult>> {
    const fileCheck = this.fileValidator.validate(filePath);
    if (!fileCheck.success) {
      return fileCheck;
    }
    const original = await this.readFile(filePath);
    if (!original.success) {
      return original;
    }

    const content = expandTabs(original.value);
    const inserted = insertLines(content, insertLine, expandTabs(newStr));
    if (!inserted.success) {
      return inserted;
    }
    const { newContent, insertedLineCount, newLineCount } = inserted.value;

    const committed = await this.commit(filePath, original.value, newContent);
    if (!committed.success) {
      return committed;
    }

    const window = this.snippetContextWindow;
    const startLine = Math.max(1, insertLine - window + 1);
    const endLine = Math.min(
      newLineCount,
      insertLine + insertedLineCount + window,
    );
    const snippet = splitLines(newContent).slice(startLine - 1, endLine);

    let output =
      `The file ${filePath} has been edited. ` +
      makeOutput(
        snippet,
        'a snippet of the edited file',
        startLine,
        this.maxResponseLength,
      );
    if (enableLinting) {
      output += `\n${await this.lint(content, newContent, filePath)}\n`;
    }
    output += INSERT_REVIEW_REMINDER;

    return ok({
      output,
      path: filePath,
      prevExist: true,
      oldContent: original.value,
      newContent,
    });
  }

  private async undoEdit(filePath: string): Promise<Outcome<EditResult>> {
    const fileCheck = this.fileValidator.validate(filePath);
    if (!fileCheck.success) {
      return fileCheck;
    }
    const current = await this.readFile(filePath);
    if (!current.success) {
      return current;
    }

    const previous = this.history.getLast(filePath);
    if (previous === undefined) {
      return fail(toolFailure(`No edit history found for ${filePath}.`));
    }
    const written = await this.writeFile(filePath, previous);
    if (!written.success) {
      this.history.add(filePath, previous);
      return written;
    }

    return ok({
      output: `Last edit to ${filePath} undone successfully. ${makeOutput(
        previous,
        filePath,
        1,
        this.maxResponseLength,
      )}`,
      path: filePath,
      prevExist: true,
      oldContent: current.value,
      newContent: previous,
    });
  }

  /**
   * Records `previous` for undo, then writes `next`. A failed write takes the
   * snapshot back out.
   */
  private async commit(
    filePath: string,
    previous: string,
    next: string,
  ): Promise<Outcome<void>> {
    this.history.add(filePath, previous);
    const written = await this.writeFile(filePath, next);
    if (!written.success) {
      this.history.getLast(filePath);
    }
    return written;
  }

  private async lint(
    oldContent: string,
    newContent: string,
    filePath: string,
  ): Promise<string> {
    try {
      const issues = await this.linter.lintDiff(
        oldContent,
        newContent,
        filePath,
      );
      return formatLintResults(issues);
    } catch (error) {
      debugLogger.warn(`Linting ${filePath} failed:`, error);
      return `Linting could not be completed: ${getErrorMessage(error)}`;
    }
  }

  private async readFile(filePath: string): Promise<Outcome<string>> {
    try {
      return ok(await this.fileSystemService.readTextFile(filePath));
    } catch (error) {
      return fail(readFailure(error, filePath));
    }
  }

  private async writeFile(
    filePath: string,
    content: string,
  ): Promise<Outcome<void>> {
    const fileCheck = this.fileValidator.validate(filePath);
    if (!fileCheck.success) {
      return fileCheck;
    }
    try {
      await this.fileSystemService.writeTextFile(filePath, content);
      return ok(undefined);
    } catch (error) {
      return fail(
        toolFailure(
          `Ran into ${getErrorMessage(error)} while trying to write to ${filePath}`,
        ),
      );
    }
  }
}

/**
 * Collapses `//`, `/./` and `/../` in absolute paths so one file has one
 * history key. Relative paths are left for the path check to reject.
 */
function normalizeFilePath(filePath: string): string {
  return path.isAbsolute(filePath) ? path.normalize(filePath) : filePath;
}

function readFailure(error: unknown, filePath: string): EditorError {
  return toolFailure(
    `Ran into ${getErrorMessage(error)} while trying to read ${filePath}`,
  );
}
