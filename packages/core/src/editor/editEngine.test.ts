/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { EditEngineDependencies, EditResult } from './editEngine.js';
import { EditEngine } from './editEngine.js';
import type { Outcome } from './editorErrors.js';
import { formatEditorError } from './editorErrors.js';
import { FileValidator } from './fileValidator.js';
import { PathValidator } from './pathValidator.js';
import type { EditRequest } from './types.js';
import { Config } from '../config/config.js';
import { DiskKeyValueStore } from '../history/diskKeyValueStore.js';
import { FileHistoryManager } from '../history/historyManager.js';
import type { Linter } from '../linter/linter.js';
import { StandardFileSystemService } from '../services/fileSystemService.js';

const INSERT_REMINDER =
  'Review the changes and make sure they are as expected (correct indentation, no duplicate lines, etc). Edit the file again if necessary.';
const REPLACE_REMINDER =
  'Review the changes and make sure they are as expected. Edit the file again if necessary.';

function outputOf(outcome: Outcome<EditResult>): string {
  if (!outcome.success) {
    throw new Error(
      `expected success, got: ${formatEditorError(outcome.error)}`,
    );
  }
  return outcome.value.output;
}

function errorOf(outcome: Outcome<EditResult>): string {
  if (outcome.success) {
    throw new Error(`expected failure, got: ${outcome.value.output}`);
  }
  return formatEditorError(outcome.error);
}

function numbered(startLine: number, lines: string[]): string {
  return lines
    .map((line, i) => `${String(startLine + i).padStart(6)}\t${line}\n`)
    .join('');
}

describe('EditEngine', () => {
  let tempDir: string;
  let historyDir: string;
  let filePath: string;
  let linter: Linter;

  function createEngine(
    overrides: Partial<EditEngineDependencies> = {},
  ): EditEngine {
    return new EditEngine({
      pathValidator: new PathValidator(tempDir),
      fileValidator: new FileValidator(),
      history: new FileHistoryManager(new DiskKeyValueStore(historyDir)),
      linter,
      fileSystemService: new StandardFileSystemService(),
      ...overrides,
    });
  }

  function run(request: EditRequest, engine = createEngine()) {
    return engine.execute(request);
  }

  function readFile(): string {
    return fs.readFileSync(filePath, 'utf-8');
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'edit-engine-test-'));
    historyDir = path.join(tempDir, '.history');
    filePath = path.join(tempDir, 'test.txt');
    fs.writeFileSync(filePath, 'line 1\nline 2\nline 3\n');
    linter = { lintDiff: vi.fn().mockResolvedValue([]) };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('command dispatch', () => {
    it('should reject unknown commands', async () => {
      expect(errorOf(await run({ command: 'delete', path: filePath }))).toBe(
        'Unrecognized command delete. The allowed commands for the str_replace_editor tool are: view, create, str_replace, insert, undo_edit',
      );
    });

    it('should validate the path before the command parameters', async () => {
      expect(errorOf(await run({ command: 'create', path: 'rel.txt' }))).toBe(
        `Invalid \`path\` parameter: rel.txt. The path should be an absolute path, starting with \`/\`. Maybe you meant ${path.join(tempDir, 'rel.txt')}?`,
      );
    });

    it('should build a working engine from configuration', async () => {
      const engine = EditEngine.fromConfig(
        new Config({ targetDir: tempDir, historyDir }),
      );
      await engine.execute({
        command: 'str_replace',
        path: filePath,
        old_str: 'line 3',
        new_str: 'last',
      });
      expect(fs.existsSync(historyDir)).toBe(true);
      const undone = await engine.execute({
        command: 'undo_edit',
        path: filePath,
      });
      expect(outputOf(undone)).toContain('undone successfully');
      expect(readFile()).toBe('line 1\nline 2\nline 3\n');
    });
  });

  describe('view', () => {
    it('should show the whole file with line numbers', async () => {
      const outcome = await run({ command: 'view', path: filePath });
      expect(outputOf(outcome)).toBe(
        `Here's the result of running \`cat -n\` on ${filePath}:\n` +
          numbered(1, ['line 1', 'line 2', 'line 3']),
      );
      expect(outcome.success && outcome.value.prevExist).toBe(true);
    });

    it('should show a range of lines', async () => {
      expect(
        outputOf(await run({ command: 'view', path: filePath, view_range: [2, 3] })),
      ).toBe(
        `Here's the result of running \`cat -n\` on ${filePath}:\n` +
          numbered(2, ['line 2', 'line 3']),
      );
    });

    it('should treat an end of -1 as the last line', async () => {
      expect(
        outputOf(
          await run({ command: 'view', path: filePath, view_range: [2, -1] }),
        ),
      ).toBe(
        `Here's the result of running \`cat -n\` on ${filePath}:\n` +
          numbered(2, ['line 2', 'line 3']),
      );
    });

    it('should keep empty lines at the end of a range', async () => {
      fs.writeFileSync(filePath, 'a\n\nb\n');
      expect(
        outputOf(await run({ command: 'view', path: filePath, view_range: [2, 2] })),
      ).toBe(
        `Here's the result of running \`cat -n\` on ${filePath}:\n` +
          numbered(2, ['']),
      );

      fs.writeFileSync(filePath, 'a\n\n');
      expect(
        outputOf(
          await run({ command: 'view', path: filePath, view_range: [1, -1] }),
        ),
      ).toBe(
        `Here's the result of running \`cat -n\` on ${filePath}:\n` +
          numbered(1, ['a', '']),
      );
    });

    it('should name the violated bound of a bad range', async () => {
      const view = (range: number[]) =>
        run({ command: 'view', path: filePath, view_range: range });
      expect(errorOf(await view([0, 2]))).toBe(
        'Invalid `view_range` parameter: [0, 2]. Its first element `0` should be within the range of lines of the file: [1, 3].',
      );
      expect(errorOf(await view([1, 4]))).toBe(
        'Invalid `view_range` parameter: [1, 4]. Its second element `4` should be smaller than the number of lines in the file: `3`.',
      );
      expect(errorOf(await view([3, 2]))).toBe(
        'Invalid `view_range` parameter: [3, 2]. Its second element `2` should be greater than or equal to the first element `3`.',
      );
      expect(errorOf(await view([1]))).toBe(
        'Invalid `view_range` parameter: [1]. It should be a list of two integers.',
      );
    });

    it('should accept exactly the ranges inside the file', async () => {
      const lineCount = 3;
      for (let a = -1; a <= 5; a++) {
        for (let b = -2; b <= 5; b++) {
          const outcome = await run({
            command: 'view',
            path: filePath,
            view_range: [a, b],
          });
          const shouldFail =
            a < 1 || a > lineCount || b > lineCount || (b < a && b !== -1);
          expect(outcome.success).toBe(!shouldFail);
        }
      }
    });

    it('should list directories', async () => {
      expect(outputOf(await run({ command: 'view', path: tempDir }))).toBe(
        `Here's the files and directories up to 2 levels deep in ${tempDir}, excluding hidden items:\n` +
          `${tempDir}/\n${filePath}\n` +
          `\n1 hidden files/directories in this directory are excluded. You can use 'ls -la ${tempDir}' to see them.`,
      );
    });

    it('should refuse a range on a directory', async () => {
      expect(
        errorOf(await run({ command: 'view', path: tempDir, view_range: [1, 2] })),
      ).toBe(
        'Invalid `view_range` parameter: [1, 2]. The `view_range` parameter is not allowed when `path` points to a directory.',
      );
    });

    it('should refuse binary files', async () => {
      const binary = path.join(tempDir, 'blob');
      fs.writeFileSync(binary, Buffer.from([0x00, 0x01, 0x02]));
      expect(errorOf(await run({ command: 'view', path: binary }))).toBe(
        'File appears to be binary. Only text files can be edited.',
      );
    });
  });

  describe('create', () => {
    it('should write the file and report that it did not exist', async () => {
      const newFile = path.join(tempDir, 'new.txt');
      const outcome = await run({
        command: 'create',
        path: newFile,
        file_text: 'first\n\tsecond\n',
      });
      expect(outcome).toEqual({
        success: true,
        value: {
          output: `File created successfully at: ${newFile}`,
          path: newFile,
          prevExist: false,
          newContent: 'first\n\tsecond\n',
        },
      });
      expect(fs.readFileSync(newFile, 'utf-8')).toBe('first\n\tsecond\n');
      expect(outputOf(await run({ command: 'view', path: newFile }))).toBe(
        `Here's the result of running \`cat -n\` on ${newFile}:\n` +
          numbered(1, ['first', '        second']),
      );
    });

    it('should let undo restore the created text', async () => {
      const newFile = path.join(tempDir, 'new.txt');
      const engine = createEngine();
      await run({ command: 'create', path: newFile, file_text: 'hello\n' }, engine);
      const undone = await run({ command: 'undo_edit', path: newFile }, engine);
      expect(outputOf(undone)).toBe(
        `Last edit to ${newFile} undone successfully. Here's the result of running \`cat -n\` on ${newFile}:\n` +
          numbered(1, ['hello']),
      );
      expect(fs.readFileSync(newFile, 'utf-8')).toBe('hello\n');
      expect(errorOf(await run({ command: 'undo_edit', path: newFile }, engine))).toBe(
        `No edit history found for ${newFile}.`,
      );
    });

    it('should require file_text', async () => {
      expect(
        errorOf(await run({ command: 'create', path: path.join(tempDir, 'x.txt') })),
      ).toBe('Parameter `file_text` is required for command: create.');
    });

    it('should not overwrite existing files', async () => {
      expect(
        errorOf(await run({ command: 'create', path: filePath, file_text: 'x' })),
      ).toBe(
        `Invalid \`path\` parameter: ${filePath}. File already exists at: ${filePath}. Cannot overwrite files using command \`create\`.`,
      );
      expect(readFile()).toBe('line 1\nline 2\nline 3\n');
    });

    it('should report a missing parent directory as a write failure', async () => {
      const orphan = path.join(tempDir, 'missing', 'new.txt');
      expect(
        errorOf(await run({ command: 'create', path: orphan, file_text: 'x' })),
      ).toMatch(/^Ran into ENOENT: .* while trying to write to .*new\.txt$/);
    });
  });

  describe('str_replace', () => {
    it('should replace a unique string and show the edited lines', async () => {
      const outcome = await run({
        command: 'str_replace',
        path: filePath,
        old_str: 'line 2',
        new_str: 'replaced line',
      });
      expect(outputOf(outcome)).toBe(
        `The file ${filePath} has been edited. Here's the result of running \`cat -n\` on a snippet of ${filePath}:\n` +
          numbered(1, ['line 1', 'replaced line', 'line 3']) +
          REPLACE_REMINDER,
      );
      expect(outputOf(outcome)).toContain('     2\treplaced line');
      expect(readFile()).toBe('line 1\nreplaced line\nline 3\n');
      expect(outcome.success && outcome.value.oldContent).toBe(
        'line 1\nline 2\nline 3\n',
      );
      expect(outcome.success && outcome.value.newContent).toBe(
        'line 1\nreplaced line\nline 3\n',
      );
    });

    it('should show a window of four lines around the edit', async () => {
      const lines = Array.from({ length: 20 }, (_, i) => `l${i + 1}`);
      fs.writeFileSync(filePath, lines.join('\n') + '\n');
      const outcome = await run({
        command: 'str_replace',
        path: filePath,
        old_str: 'l10',
        new_str: 'x\ny',
      });
      expect(outputOf(outcome)).toBe(
        `The file ${filePath} has been edited. Here's the result of running \`cat -n\` on a snippet of ${filePath}:\n` +
          numbered(6, ['l6', 'l7', 'l8', 'l9', 'x', 'y', 'l11', 'l12', 'l13', 'l14']) +
          REPLACE_REMINDER,
      );
    });

    it('should show a trailing empty line in the snippet', async () => {
      fs.writeFileSync(filePath, 'x\n\n');
      const outcome = await run({
        command: 'str_replace',
        path: filePath,
        old_str: 'x',
        new_str: 'y',
      });
      expect(outputOf(outcome)).toBe(
        `The file ${filePath} has been edited. Here's the result of running \`cat -n\` on a snippet of ${filePath}:\n` +
          numbered(1, ['y', '']) +
          REPLACE_REMINDER,
      );
    });

    it('should fail without writing when the string is not unique', async () => {
      fs.writeFileSync(filePath, 'line\nline\nother');
      const message = errorOf(
        await run({
          command: 'str_replace',
          path: filePath,
          old_str: 'line',
          new_str: 'x',
        }),
      );
      expect(message).toContain('in lines [1, 2]');
      expect(readFile()).toBe('line\nline\nother');
    });

    it('should fail when the string does not appear', async () => {
      expect(
        errorOf(
          await run({
            command: 'str_replace',
            path: filePath,
            old_str: 'missing',
            new_str: 'x',
          }),
        ),
      ).toBe(
        `Invalid \`old_str\` parameter: missing. No replacement was performed, old_str \`missing\` did not appear verbatim in ${filePath}.`,
      );
    });

    it('should refuse identical old and new strings', async () => {
      expect(
        errorOf(
          await run({
            command: 'str_replace',
            path: filePath,
            old_str: 'line 1',
            new_str: 'line 1',
          }),
        ),
      ).toBe(
        'Invalid `new_str` parameter: line 1. No replacement was performed. `new_str` and `old_str` must be different.',
      );
    });

    it('should require old_str and new_str', async () => {
      expect(
        errorOf(await run({ command: 'str_replace', path: filePath, new_str: 'x' })),
      ).toBe('Parameter `old_str` is required for command: str_replace.');
      expect(
        errorOf(await run({ command: 'str_replace', path: filePath, old_str: 'x' })),
      ).toBe('Parameter `new_str` is required for command: str_replace.');
    });

    it('should allow deleting text with an empty new_str', async () => {
      await run({
        command: 'str_replace',
        path: filePath,
        old_str: 'line 2\n',
        new_str: '',
      });
      expect(readFile()).toBe('line 1\nline 3\n');
    });

    it('should match tab-indented text and undo to the original bytes', async () => {
      fs.writeFileSync(filePath, '\tindented\nplain\n');
      const engine = createEngine();
      await run(
        {
          command: 'str_replace',
          path: filePath,
          old_str: '\tindented',
          new_str: '\tchanged',
        },
        engine,
      );
      expect(readFile()).toBe('        changed\nplain\n');
      await run({ command: 'undo_edit', path: filePath }, engine);
      expect(readFile()).toBe('\tindented\nplain\n');
    });

    it('should not edit directories', async () => {
      expect(
        errorOf(
          await run({
            command: 'str_replace',
            path: tempDir,
            old_str: 'a',
            new_str: 'b',
          }),
        ),
      ).toBe(
        `Invalid \`path\` parameter: ${tempDir}. The path ${tempDir} is a directory and only the \`view\` command can be used on directories.`,
      );
    });
  });

  describe('insert', () => {
    it('should insert after the given line and show the edited lines', async () => {
      const outcome = await run({
        command: 'insert',
        path: filePath,
        insert_line: 1,
        new_str: 'inserted line',
      });
      expect(outputOf(outcome)).toBe(
        `The file ${filePath} has been edited. Here's the result of running \`cat -n\` on a snippet of the edited file:\n` +
          numbered(1, ['line 1', 'inserted line', 'line 2', 'line 3']) +
          INSERT_REMINDER,
      );
      expect(readFile()).toBe('line 1\ninserted line\nline 2\nline 3\n');
    });

    it('should show three lines before and four after the inserted text', async () => {
      const lines = Array.from({ length: 20 }, (_, i) => `l${i + 1}`);
      fs.writeFileSync(filePath, lines.join('\n') + '\n');
      const outcome = await run({
        command: 'insert',
        path: filePath,
        insert_line: 10,
        new_str: 'a\nb',
      });
      expect(outputOf(outcome)).toBe(
        `The file ${filePath} has been edited. Here's the result of running \`cat -n\` on a snippet of the edited file:\n` +
          numbered(7, ['l7', 'l8', 'l9', 'l10', 'a', 'b', 'l11', 'l12', 'l13', 'l14']) +
          INSERT_REMINDER,
      );
    });

    it('should be undone exactly for every valid line index', async () => {
      const original = 'alpha\n\tbeta\ngamma\n';
      for (let index = 0; index <= 3; index++) {
        fs.writeFileSync(filePath, original);
        const engine = createEngine();
        const inserted = await run(
          {
            command: 'insert',
            path: filePath,
            insert_line: index,
            new_str: 'new',
          },
          engine,
        );
        expect(inserted.success).toBe(true);
        await run({ command: 'undo_edit', path: filePath }, engine);
        expect(readFile()).toBe(original);
      }
    });

    it('should reject lines outside the file', async () => {
      expect(
        errorOf(
          await run({
            command: 'insert',
            path: filePath,
            insert_line: 5,
            new_str: 'x',
          }),
        ),
      ).toBe(
        'Invalid `insert_line` parameter: 5. It should be within the range of lines of the file: [0, 3]',
      );
    });

    it('should require insert_line and new_str', async () => {
      expect(
        errorOf(await run({ command: 'insert', path: filePath, new_str: 'x' })),
      ).toBe('Parameter `insert_line` is required for command: insert.');
      expect(
        errorOf(await run({ command: 'insert', path: filePath, insert_line: 0 })),
      ).toBe('Parameter `new_str` is required for command: insert.');
    });
  });

  describe('undo_edit', () => {
    it('should walk back through replace and insert', async () => {
      const engine = createEngine();
      await run(
        {
          command: 'str_replace',
          path: filePath,
          old_str: 'line 2',
          new_str: 'replaced line',
        },
        engine,
      );
      await run(
        {
          command: 'insert',
          path: filePath,
          insert_line: 1,
          new_str: 'inserted line',
        },
        engine,
      );
      expect(readFile()).toBe('line 1\ninserted line\nreplaced line\nline 3\n');

      const undone = await run({ command: 'undo_edit', path: filePath }, engine);
      expect(outputOf(undone)).toBe(
        `Last edit to ${filePath} undone successfully. Here's the result of running \`cat -n\` on ${filePath}:\n` +
          numbered(1, ['line 1', 'replaced line', 'line 3']),
      );
      expect(undone.success && undone.value.oldContent).toBe(
        'line 1\ninserted line\nreplaced line\nline 3\n',
      );
      expect(readFile()).toBe('line 1\nreplaced line\nline 3\n');

      await run({ command: 'undo_edit', path: filePath }, engine);
      expect(readFile()).toBe('line 1\nline 2\nline 3\n');
    });

    it('should fail when there is no history', async () => {
      expect(errorOf(await run({ command: 'undo_edit', path: filePath }))).toBe(
        `No edit history found for ${filePath}.`,
      );
    });

    it('should keep only the configured number of edits', async () => {
      const engine = createEngine({
        history: new FileHistoryManager(new DiskKeyValueStore(historyDir), 2),
      });
      for (const [from, to] of [
        ['line 1', 'one'],
        ['line 2', 'two'],
        ['line 3', 'three'],
      ]) {
        await run(
          { command: 'str_replace', path: filePath, old_str: from, new_str: to },
          engine,
        );
      }
      await run({ command: 'undo_edit', path: filePath }, engine);
      await run({ command: 'undo_edit', path: filePath }, engine);
      expect(readFile()).toBe('one\nline 2\nline 3\n');
      expect(errorOf(await run({ command: 'undo_edit', path: filePath }, engine))).toBe(
        `No edit history found for ${filePath}.`,
      );
    });

    it('should share history between engines over the same directory', async () => {
      await run(
        { command: 'str_replace', path: filePath, old_str: 'line 1', new_str: 'a' },
        createEngine(),
      );
      await run(
        { command: 'str_replace', path: filePath, old_str: 'line 2', new_str: 'b' },
        createEngine(),
      );
      const third = createEngine();
      await run({ command: 'undo_edit', path: filePath }, third);
      expect(readFile()).toBe('a\nline 2\nline 3\n');
      await run({ command: 'undo_edit', path: filePath }, third);
      expect(readFile()).toBe('line 1\nline 2\nline 3\n');
    });

    it('should treat equivalent spellings of a path as one file', async () => {
      const engine = createEngine();
      const dotted = `${tempDir}/sub/../test.txt`;
      const doubled = `${tempDir}//test.txt`;
      const edited = await run(
        {
          command: 'str_replace',
          path: `${tempDir}/./test.txt`,
          old_str: 'line 1',
          new_str: 'a',
        },
        engine,
      );
      expect(edited.success && edited.value.path).toBe(filePath);

      await run(
        { command: 'str_replace', path: doubled, old_str: 'line 2', new_str: 'b' },
        engine,
      );
      await run({ command: 'undo_edit', path: filePath }, engine);
      expect(readFile()).toBe('a\nline 2\nline 3\n');

      engine.clearHistory(`${tempDir}/./test.txt`);
      expect(errorOf(await run({ command: 'undo_edit', path: dotted }, engine))).toBe(
        `No edit history found for ${filePath}.`,
      );
    });

    it('should forget history once cleared', async () => {
      const engine = createEngine();
      await run(
        { command: 'str_replace', path: filePath, old_str: 'line 1', new_str: 'a' },
        engine,
      );
      engine.clearHistory(filePath);
      expect(errorOf(await run({ command: 'undo_edit', path: filePath }, engine))).toBe(
        `No edit history found for ${filePath}.`,
      );
    });
  });

  describe('linting', () => {
    it('should not lint unless asked', async () => {
      await run({
        command: 'str_replace',
        path: filePath,
        old_str: 'line 1',
        new_str: 'a',
      });
      expect(linter.lintDiff).not.toHaveBeenCalled();
    });

    it('should report issues before the review reminder', async () => {
      linter = {
        lintDiff: vi
          .fn()
          .mockResolvedValue([{ line: 2, column: 1, message: 'bad' }]),
      };
      const output = outputOf(
        await run({
          command: 'str_replace',
          path: filePath,
          old_str: 'line 2',
          new_str: 'bad',
          enable_linting: true,
        }),
      );
      expect(output.endsWith(
        '\nLinting issues found in the changes:\n- Line 2, Column 1: bad\n\n' +
          REPLACE_REMINDER,
      )).toBe(true);
      expect(linter.lintDiff).toHaveBeenCalledWith(
        'line 1\nline 2\nline 3\n',
        'line 1\nbad\nline 3\n',
        filePath,
      );
    });

    it('should report a clean insert', async () => {
      const output = outputOf(
        await run({
          command: 'insert',
          path: filePath,
          insert_line: 0,
          new_str: 'top',
          enable_linting: true,
        }),
      );
      expect(
        output.endsWith(
          '\nNo linting issues found in the changes.\n' + INSERT_REMINDER,
        ),
      ).toBe(true);
    });

    it('should still edit when the linter fails', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      linter = { lintDiff: vi.fn().mockRejectedValue(new Error('boom')) };
      const output = outputOf(
        await run({
          command: 'str_replace',
          path: filePath,
          old_str: 'line 1',
          new_str: 'a',
          enable_linting: true,
        }),
      );
      expect(
        output.endsWith(
          '\nLinting could not be completed: boom\n' + REPLACE_REMINDER,
        ),
      ).toBe(true);
      expect(readFile()).toBe('a\nline 2\nline 3\n');
    });
  });
});
