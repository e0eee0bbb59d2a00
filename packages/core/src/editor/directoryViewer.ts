/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_MAX_RESPONSE_LENGTH } from '../config/constants.js';
import { debugLogger } from '../utils/debugLogger.js';
import { getErrorMessage } from '../utils/errors.js';
import { maybeTruncate } from '../utils/textUtils.js';
import { DIRECTORY_CONTENT_TRUNCATED_NOTICE } from './notices.js';

const MAX_DEPTH = 2;

export interface DirectoryListing {
  /** Root first, then every visible entry; directories end in `/`. */
  entries: string[];
  /** Hidden entries directly inside the root. */
  hiddenCount: number;
}

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

function isDirectory(entryPath: string): boolean {
  try {
    // statSync follows symlinks, so a link to a directory is walked.
    return fs.statSync(entryPath).isDirectory();
  } catch {
    // Broken links list as plain entries.
    return false;
  }
}

function readNames(dirPath: string): string[] {
  try {
    return fs.readdirSync(dirPath);
  } catch (error) {
    debugLogger.warn(`Cannot list ${dirPath}: ${getErrorMessage(error)}`);
    return [];
  }
}

/**
 * Lists `dirPath` and its visible entries up to two levels deep, sorted by
 * path.
 */
export function listDirectory(dirPath: string): DirectoryListing {
  const root = dirPath.replace(/\/+$/, '') || '/';
  const paths: string[] = [];
  let hiddenCount = 0;

  const walk = (current: string, depth: number) => {
    for (const name of readNames(current)) {
      if (isHidden(name)) {
        if (depth === 1) {
          hiddenCount++;
        }
        continue;
      }
      const entryPath = path.join(current, name);
      const directory = isDirectory(entryPath);
      paths.push(directory ? `${entryPath}/` : entryPath);
      if (directory && depth < MAX_DEPTH) {
        walk(entryPath, depth + 1);
      }
    }
  };
  walk(root, 1);

  // Sort on the bare paths so a trailing `/` does not reorder directories.
  const bare = (entry: string) =>
    entry.endsWith('/') ? entry.slice(0, -1) : entry;
  paths.sort((a, b) => {
    const left = bare(a);
    const right = bare(b);
    return left < right ? -1 : left > right ? 1 : 0;
  });

  const rootEntry = root.endsWith('/') ? root : `${root}/`;
  return { entries: [rootEntry, ...paths], hiddenCount };
}

export function viewDirectory(
  dirPath: string,
  maxResponseLength = DEFAULT_MAX_RESPONSE_LENGTH,
): string {
  const { entries, hiddenCount } = listDirectory(dirPath);
  const listing = maybeTruncate(
    entries.join('\n'),
    maxResponseLength,
    DIRECTORY_CONTENT_TRUNCATED_NOTICE,
  );
  let message = `Here's the files and directories up to 2 levels deep in ${dirPath}, excluding hidden items:\n${listing}`;
  if (hiddenCount > 0) {
    message += `\n\n${hiddenCount} hidden files/directories in this directory are excluded. You can use 'ls -la ${dirPath}' to see them.`;
  }
  return message;
}
