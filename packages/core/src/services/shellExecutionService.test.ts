/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import os from 'node:os';
import {
  ShellExecutionService,
  ShellTimeoutError,
} from './shellExecutionService.js';

describe('ShellExecutionService', () => {
  it('should capture stdout, stderr and the exit code', async () => {
    const result = await ShellExecutionService.run(
      "printf 'out'; printf 'err' >&2; exit 3",
    );
    expect(result).toEqual({ exitCode: 3, stdout: 'out', stderr: 'err' });
  });

  it('should run in the given directory', async () => {
    const tmp = os.tmpdir();
    const result = await ShellExecutionService.run('pwd -P', { cwd: tmp });
    expect(result.exitCode).toBe(0);
    expect(result.stdout.trim().length).toBeGreaterThan(0);
  });

  it('should strip ANSI escape sequences', async () => {
    const result = await ShellExecutionService.run(
      "printf '\\033[31mred\\033[0m'",
    );
    expect(result.stdout).toBe('red');
  });

  it('should truncate long output with a notice', async () => {
    const result = await ShellExecutionService.run(
      "printf 'abcdefgh'; printf 'zyxwvu' >&2",
      { truncateAfter: 3, truncateNotice: '<cut>' },
    );
    expect(result.stdout).toBe('abc<cut>');
    expect(result.stderr).toBe('zyx<cut>');
  });

  it('should kill the command and report the elapsed time on timeout', async () => {
    const error = await ShellExecutionService.run('sleep 5', {
      timeoutMs: 100,
    }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ShellTimeoutError);
    expect(error instanceof Error && error.message).toMatch(
      /^Command 'sleep 5' timed out after \d+\.\d{2} seconds$/,
    );
  });
});
