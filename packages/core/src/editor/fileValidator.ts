/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import * as path from 'node:path';
import mime from 'mime/lite';
import { DEFAULT_MAX_FILE_SIZE_BYTES, MEBIBYTE } from '../config/constants.js';
import { getErrorMessage, isNodeError } from '../utils/errors.js';
import { hasNulByte } from '../utils/textUtils.js';
import type { ValidationResult } from './editorErrors.js';
import {
  VALID,
  fail,
  fileValidationFailed,
  toolFailure,
} from './editorErrors.js';

/** Bytes sniffed for a NUL when the file name says nothing about its type. */
const BINARY_SNIFF_BYTES = 1024;

const TEXTUAL_APPLICATION_TYPES = new Set([
  'application/json',
  'application/ld+json',
  'application/manifest+json',
  'application/xml',
  'application/xhtml+xml',
  'application/javascript',
  'application/ecmascript',
  'application/x-sh',
  'application/x-csh',
  'application/yaml',
  'application/x-yaml',
  'application/toml',
  'application/sql',
  'application/graphql',
  'application/x-httpd-php',
  'application/rtf',
]);

// mime resolves these to video/mp2t (MPEG transport streams).
const TYPESCRIPT_EXTENSIONS = new Set(['.ts', '.mts', '.cts']);

export function isTextMimeType(mimeType: string): boolean {
  return (
    mimeType.startsWith('text/') || TEXTUAL_APPLICATION_TYPES.has(mimeType)
  );
}

/**
 * Guards reads and writes of regular files: rejects files over the size
 * ceiling and files that are not text. Directories and paths that do not
 * exist yet pass.
 */
export class FileValidator {
  constructor(
    private readonly maxFileSizeBytes: number = DEFAULT_MAX_FILE_SIZE_BYTES,
  ) {}

  validate(filePath: string): ValidationResult {
    let stats: fs.Stats;
    try {
      stats = fs.statSync(filePath);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return VALID;
      }
      return fail(
        toolFailure(
          `Ran into ${getErrorMessage(error)} while trying to read ${filePath}`,
        ),
      );
    }
    if (!stats.isFile()) {
      return VALID;
    }

    if (stats.size > this.maxFileSizeBytes) {
      const sizeMb = (stats.size / MEBIBYTE).toFixed(1);
      const maxMb = Math.trunc(this.maxFileSizeBytes / MEBIBYTE);
      return fail(
        fileValidationFailed(
          filePath,
          `File is too large (${sizeMb}MB). Maximum allowed size is ${maxMb}MB.`,
        ),
      );
    }

    if (TYPESCRIPT_EXTENSIONS.has(path.extname(filePath).toLowerCase())) {
      return VALID;
    }

    const mimeType = mime.getType(filePath);
    if (mimeType !== null) {
      if (isTextMimeType(mimeType)) {
        return VALID;
      }
      return fail(
        fileValidationFailed(
          filePath,
          `File type ${mimeType} is not supported. Only text files can be edited.`,
        ),
      );
    }

    let head: Buffer;
    try {
      head = this.readHead(filePath);
    } catch (error) {
      return fail(
        fileValidationFailed(
          filePath,
          `Error checking file type: ${getErrorMessage(error)}`,
        ),
      );
    }
    if (hasNulByte(head, BINARY_SNIFF_BYTES)) {
      return fail(
        fileValidationFailed(
          filePath,
          'File appears to be binary. Only text files can be edited.',
        ),
      );
    }
    return VALID;
  }

  private readHead(filePath: string): Buffer {
    const fd = fs.openSync(filePath, 'r');
    try {
      const buffer = Buffer.alloc(BINARY_SNIFF_BYTES);
      const bytesRead = fs.readSync(fd, buffer, 0, BINARY_SNIFF_BYTES, 0);
      return buffer.subarray(0, bytesRead);
    } finally {
      fs.closeSync(fd);
    }
  }
}
