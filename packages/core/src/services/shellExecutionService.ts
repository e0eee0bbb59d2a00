/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import stripAnsi from 'strip-ansi';
import { spawn as cpSpawn } from 'node:child_process';
import { TextDecoder } from 'node:util';
import { DEFAULT_SHELL_TIMEOUT_MS } from '../config/constants.js';
import { CONTENT_TRUNCATED_NOTICE } from '../editor/notices.js';
import { debugLogger } from '../utils/debugLogger.js';
import { maybeTruncate } from '../utils/textUtils.js';

const SIGKILL_TIMEOUT_MS = 200;

/** A structured result from a shell command execution. */
export interface ShellExecutionResult {
  /** The process exit code, or null if terminated by a signal. */
  exitCode: number | null;
  /** Decoded stdout with ANSI escapes removed. */
  stdout: string;
  /** Decoded stderr with ANSI escapes removed. */
  stderr: string;
}

export interface ShellExecutionOptions {
  cwd?: string;
  timeoutMs?: number;
  /** Characters kept from each stream before a truncation notice. */
  truncateAfter?: number;
  truncateNotice?: string;
  abortSignal?: AbortSignal;
}

export class ShellTimeoutError extends Error {
  constructor(
    readonly command: string,
    readonly elapsedMs: number,
  ) {
    super(
      `Command '${command}' timed out after ${(elapsedMs / 1000).toFixed(2)} seconds`,
    );
    this.name = 'ShellTimeoutError';
  }
}

/**
 * Runs shell commands under `bash -c`, in their own process group so a
 * timeout can take down everything the command started.
 */
export class ShellExecutionService {
  static run(
    commandToExecute: string,
    options: ShellExecutionOptions = {},
  ): Promise<ShellExecutionResult> {
    const {
      cwd = process.cwd(),
      timeoutMs = DEFAULT_SHELL_TIMEOUT_MS,
      truncateAfter,
      truncateNotice = CONTENT_TRUNCATED_NOTICE,
      abortSignal,
    } = options;
    const startTime = Date.now();

    return new Promise<ShellExecutionResult>((resolve, reject) => {
      const child = cpSpawn('bash', ['-c', commandToExecute], {
        cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true,
        env: {
          ...process.env,
          TERM: 'dumb',
          PAGER: 'cat',
        },
      });

      const stdoutDecoder = new TextDecoder('utf-8');
      const stderrDecoder = new TextDecoder('utf-8');
      let stdout = '';
      let stderr = '';
      let exited = false;
      let timedOut = false;

      const killGroup = async () => {
        const pid = child.pid;
        if (!pid || exited) {
          return;
        }
        try {
          process.kill(-pid, 'SIGTERM');
          await new Promise((res) => setTimeout(res, SIGKILL_TIMEOUT_MS));
          if (!exited) {
            process.kill(-pid, 'SIGKILL');
          }
        } catch (e) {
          debugLogger.debug(`Killing process group ${pid} failed:`, e);
          if (!exited) {
            child.kill('SIGKILL');
          }
        }
      };

      const timer = setTimeout(() => {
        timedOut = true;
        void killGroup();
      }, timeoutMs);

      const abortHandler = () => {
        void killGroup();
      };
      abortSignal?.addEventListener('abort', abortHandler, { once: true });

      const cleanup = () => {
        exited = true;
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', abortHandler);
      };

      child.stdout.on('data', (data: Buffer) => {
        stdout += stdoutDecoder.decode(data, { stream: true });
      });
      child.stderr.on('data', (data: Buffer) => {
        stderr += stderrDecoder.decode(data, { stream: true });
      });

      child.on('error', (err) => {
        cleanup();
        reject(err);
      });

      child.on('close', (code) => {
        cleanup();
        if (timedOut) {
          reject(
            new ShellTimeoutError(commandToExecute, Date.now() - startTime),
          );
          return;
        }
        stdout += stdoutDecoder.decode();
        stderr += stderrDecoder.decode();
        resolve({
          exitCode: code,
          stdout: maybeTruncate(
            stripAnsi(stdout),
            truncateAfter,
            truncateNotice,
          ),
          stderr: maybeTruncate(
            stripAnsi(stderr),
            truncateAfter,
            truncateNotice,
          ),
        });
      });
    });
  }
}
