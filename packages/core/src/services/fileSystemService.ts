/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs/promises';
import fsSync from 'node:fs';

const NEWLINE = 0x0a;

/**
 * Interface for file system operations that may be delegated to different implementations
 */
export interface FileSystemService {
  /**
   * Read text content from a file
   *
   * @param filePath - The path to the file to read
   * @returns The file content as a string
   */
  readTextFile(filePath: string): Promise<string>;

  /**
   * Write text content to a file
   *
   * @param filePath - The path to the file to write
   * @param content - The content to write
   */
  writeTextFile(filePath: string, content: string): Promise<void>;

  /**
   * Read lines `startLine` through `endLine` (1-based, inclusive) without
   * loading the rest of the file. Lines end at `\n` only, as in
   * {@link countLines}, and come back without it.
   */
  readLineRange(
    filePath: string,
    startLine: number,
    endLine: number,
  ): Promise<string[]>;

  /**
   * Count lines the way `wc -l` would, plus a final line that lacks its
   * terminator.
   */
  countLines(filePath: string): Promise<number>;
}

/**
 * Standard file system implementation
 */
export class StandardFileSystemService implements FileSystemService {
  async readTextFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async writeTextFile(filePath: string, content: string): Promise<void> {
    await fs.writeFile(filePath, content, 'utf-8');
  }

  async readLineRange(
    filePath: string,
    startLine: number,
    endLine: number,
  ): Promise<string[]> {
    const stream = fsSync.createReadStream(filePath, { encoding: 'utf-8' });
    const lines: string[] = [];
    let lineNumber = 1;
    let partial = '';
    try {
      for await (const chunk of stream) {
        if (typeof chunk !== 'string') {
          continue;
        }
        const parts = (partial + chunk).split('\n');
        partial = parts.pop() ?? '';
        for (const line of parts) {
          if (lineNumber >= startLine && lineNumber <= endLine) {
            lines.push(line);
          }
          lineNumber++;
        }
        if (lineNumber > endLine) {
          return lines;
        }
      }
    } finally {
      stream.destroy();
    }
    // A last line without its terminator.
    if (partial !== '' && lineNumber >= startLine && lineNumber <= endLine) {
      lines.push(partial);
    }
    return lines;
  }

  async countLines(filePath: string): Promise<number> {
    let count = 0;
    let lastByte: number | undefined;
    for await (const chunk of fsSync.createReadStream(filePath)) {
      if (!Buffer.isBuffer(chunk) || chunk.length === 0) {
        continue;
      }
      let index = chunk.indexOf(NEWLINE);
      while (index !== -1) {
        count++;
        index = chunk.indexOf(NEWLINE, index + 1);
      }
      lastByte = chunk[chunk.length - 1];
    }
    if (lastByte !== undefined && lastByte !== NEWLINE) {
      count++;
    }
    return count;
  }
}
