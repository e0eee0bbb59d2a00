/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A type-safe enum for tool-related errors.
 */
export enum ToolErrorType {
  // General Errors
  INVALID_TOOL_PARAMS = 'invalid_tool_params',
  UNKNOWN = 'unknown',
  UNHANDLED_EXCEPTION = 'unhandled_exception',

  // Editor errors
  PARAMETER_MISSING = 'parameter_missing',
  PARAMETER_INVALID = 'parameter_invalid',
  FILE_VALIDATION_FAILED = 'file_validation_failed',
  TOOL_FAILURE = 'tool_failure',
}
