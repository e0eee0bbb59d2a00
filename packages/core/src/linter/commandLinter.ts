/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import os from 'node:os';
import * as path from 'node:path';
import * as Diff from 'diff';
import { quote } from 'shell-quote';
import { DEFAULT_LINT_TIMEOUT_MS } from '../config/constants.js';
import { ShellExecutionService } from '../services/shellExecutionService.js';
import { debugLogger } from '../utils/debugLogger.js';
import { splitLines } from '../utils/textUtils.js';
import type { LintIssue, Linter } from './linter.js';

const FILE_PLACEHOLDER = '{file}';
const COMMAND_NOT_FOUND_EXIT_CODE = 127;
const ISSUE_PATTERN = /^(.+?):(\d+):(\d+):\s*(.*)$/;

export class LinterUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LinterUnavailableError';
  }
}

/**
 * Parses `file:line:column: message` lines, keeping those that refer to
 * `fileName`.
 */
export function parseLintOutput(output: string, fileName: string): LintIssue[] {
  const issues: LintIssue[] = [];
  for (const rawLine of output.split('\n')) {
    const match = ISSUE_PATTERN.exec(rawLine.trim());
    if (!match) {
      continue;
    }
    const [, reportedFile, line, column, message] = match;
    if (path.basename(reportedFile) !== fileName) {
      continue;
    }
    issues.push({
      line: Number(line),
      column: Number(column),
      message: message.trim(),
    });
  }
  return issues;
}

/**
 * Maps each line of `newContent` that survived the edit unchanged to its line
 * in `oldContent`. Added lines have no entry.
 */
export function mapUnchangedLines(
  oldContent: string,
  newContent: string,
): Map<number, number> {
  const mapping = new Map<number, number>();
  let oldLine = 1;
  let newLine = 1;
  for (const change of Diff.diffArrays(
    splitLines(oldContent),
    splitLines(newContent),
  )) {
    const count = change.value.length;
    if (change.added) {
      newLine += count;
    } else if (change.removed) {
      oldLine += count;
    } else {
      for (let i = 0; i < count; i++) {
        mapping.set(newLine + i, oldLine + i);
      }
      oldLine += count;
      newLine += count;
    }
  }
  return mapping;
}

/**
 * Keeps issues of the new version that sit on an added line, or on an
 * unchanged line that did not already carry the same message.
 */
export function introducedIssues(
  oldIssues: readonly LintIssue[],
  newIssues: readonly LintIssue[],
  lineMapping: ReadonlyMap<number, number>,
): LintIssue[] {
  const existing = new Set(
    oldIssues.map((issue) => `${issue.line}\u0000${issue.message}`),
  );
  return newIssues.filter((issue) => {
    const oldLine = lineMapping.get(issue.line);
    return (
      oldLine === undefined || !existing.has(`${oldLine}\u0000${issue.message}`)
    );
  });
}

/**
 * Runs an external command per file extension. Templates name the file to
 * lint with `{file}`, which is replaced by the shell-quoted path.
 */
export class CommandLinter implements Linter {
  constructor(
    private readonly commands: Readonly<Record<string, string>>,
    private readonly timeoutMs: number = DEFAULT_LINT_TIMEOUT_MS,
  ) {}

  getCommandFor(filePath: string): string | undefined {
    return this.commands[path.extname(filePath).toLowerCase()];
  }

  async lintDiff(
    oldContent: string,
    newContent: string,
    filePath: string,
  ): Promise<LintIssue[]> {
    const template = this.getCommandFor(filePath);
    if (!template) {
      debugLogger.debug(`No linter configured for ${filePath}`);
      return [];
    }

    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'plainedit-lint-'));
    try {
      const baseName = path.basename(filePath);
      const oldFile = path.join(tempDir, `old.${baseName}`);
      const newFile = path.join(tempDir, `new.${baseName}`);
      fs.writeFileSync(oldFile, oldContent, 'utf-8');
      fs.writeFileSync(newFile, newContent, 'utf-8');

      const [oldIssues, newIssues] = await Promise.all([
        this.lintFile(template, oldFile, tempDir),
        this.lintFile(template, newFile, tempDir),
      ]);
      return introducedIssues(
        oldIssues,
        newIssues,
        mapUnchangedLines(oldContent, newContent),
      );
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  }

  private async lintFile(
    template: string,
    file: string,
    cwd: string,
  ): Promise<LintIssue[]> {
    const command = template.split(FILE_PLACEHOLDER).join(quote([file]));
    const result = await ShellExecutionService.run(command, {
      cwd,
      timeoutMs: this.timeoutMs,
    });
    if (result.exitCode === COMMAND_NOT_FOUND_EXIT_CODE) {
      throw new LinterUnavailableError(
        `Linter command not found: ${template}`,
      );
    }
    return parseLintOutput(
      `${result.stdout}\n${result.stderr}`,
      path.basename(file),
    );
  }
}
