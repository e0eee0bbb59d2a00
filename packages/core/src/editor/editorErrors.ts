/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ToolErrorType } from '../tools/tool-error.js';

/**
 * Everything that can go wrong while running an editor command. Each variant
 * carries the structured fields of the failure; turning it into text is left
 * to {@link formatEditorError}.
 */
export type EditorError =
  | {
      kind: 'parameter_missing';
      command: string;
      parameter: string;
    }
  | {
      kind: 'parameter_invalid';
      parameter: string;
      value: unknown;
      hint?: string;
    }
  | {
      kind: 'file_validation_failed';
      path: string;
      reason: string;
    }
  | {
      kind: 'tool_failure';
      message: string;
    };

export type EditorErrorKind = EditorError['kind'];

/** Result of a step that either produces a value or fails. */
export type Outcome<T> =
  | { success: true; value: T }
  | { success: false; error: EditorError };

/** Result of a check that produces nothing on success. */
export type ValidationResult =
  | { success: true }
  | { success: false; error: EditorError };

export const VALID: ValidationResult = { success: true };

export function ok<T>(value: T): Outcome<T> {
  return { success: true, value };
}

export function fail(error: EditorError): {
  success: false;
  error: EditorError;
} {
  return { success: false, error };
}

export function parameterMissing(
  command: string,
  parameter: string,
): EditorError {
  return { kind: 'parameter_missing', command, parameter };
}

export function parameterInvalid(
  parameter: string,
  value: unknown,
  hint?: string,
): EditorError {
  return { kind: 'parameter_invalid', parameter, value, hint };
}

export function fileValidationFailed(
  path: string,
  reason: string,
): EditorError {
  return { kind: 'file_validation_failed', path, reason };
}

export function toolFailure(message: string): EditorError {
  return { kind: 'tool_failure', message };
}

function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => formatValue(item)).join(', ')}]`;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined || value === null) {
    return String(value);
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export function formatEditorError(error: EditorError): string {
  switch (error.kind) {
    case 'parameter_missing':
      return `Parameter \`${error.parameter}\` is required for command: ${error.command}.`;
    case 'parameter_invalid': {
      const base = `Invalid \`${error.parameter}\` parameter: ${formatValue(error.value)}.`;
      return error.hint ? `${base} ${error.hint}` : base;
    }
    case 'file_validation_failed':
      return error.reason;
    case 'tool_failure':
      return error.message;
    default: {
      const exhaustive: never = error;
      return exhaustive;
    }
  }
}

export function toolErrorTypeFor(error: EditorError): ToolErrorType {
  switch (error.kind) {
    case 'parameter_missing':
      return ToolErrorType.PARAMETER_MISSING;
    case 'parameter_invalid':
      return ToolErrorType.PARAMETER_INVALID;
    case 'file_validation_failed':
      return ToolErrorType.FILE_VALIDATION_FAILED;
    case 'tool_failure':
      return ToolErrorType.TOOL_FAILURE;
    default: {
      const exhaustive: never = error;
      return exhaustive;
    }
  }
}
