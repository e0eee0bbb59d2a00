/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface LintIssue {
  line: number;
  column: number;
  message: string;
}

/**
 * Lints the new version of a file and reports only the issues the change
 * introduced.
 */
export interface Linter {
  lintDiff(
    oldContent: string,
    newContent: string,
    filePath: string,
  ): Promise<LintIssue[]>;
}

export function formatLintResults(issues: readonly LintIssue[]): string {
  if (issues.length === 0) {
    return 'No linting issues found in the changes.';
  }
  const lines = issues.map(
    (issue) => `- Line ${issue.line}, Column ${issue.column}: ${issue.message}`,
  );
  return ['Linting issues found in the changes:', ...lines].join('\n') + '\n';
}
