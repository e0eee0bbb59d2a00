/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import * as path from 'node:path';
import type { EditCommand } from './types.js';
import type { ValidationResult } from './editorErrors.js';
import { VALID, fail, parameterInvalid } from './editorErrors.js';

/**
 * Checks that a path can be used with a command: it must be absolute, exist
 * unless it is being created, and name a regular file unless it is only
 * being viewed.
 */
export class PathValidator {
  constructor(private readonly cwd: string = process.cwd()) {}

  validate(command: EditCommand, filePath: string): ValidationResult {
    if (!path.isAbsolute(filePath)) {
      const suggestion = path.resolve(this.cwd, filePath);
      return fail(
        parameterInvalid(
          'path',
          filePath,
          `The path should be an absolute path, starting with \`/\`. Maybe you meant ${suggestion}?`,
        ),
      );
    }

    // existsSync and statSync follow symlinks, so a link counts as its target.
    const exists = fs.existsSync(filePath);
    if (command === 'create') {
      if (exists) {
        return fail(
          parameterInvalid(
            'path',
            filePath,
            `File already exists at: ${filePath}. Cannot overwrite files using command \`create\`.`,
          ),
        );
      }
      return VALID;
    }

    if (!exists) {
      return fail(
        parameterInvalid(
          'path',
          filePath,
          `The path ${filePath} does not exist. Please provide a valid path.`,
        ),
      );
    }

    if (command !== 'view' && fs.statSync(filePath).isDirectory()) {
      return fail(
        parameterInvalid(
          'path',
          filePath,
          `The path ${filePath} is a directory and only the \`view\` command can be used on directories.`,
        ),
      );
    }
    return VALID;
  }
}
