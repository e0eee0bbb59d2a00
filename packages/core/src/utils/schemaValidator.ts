/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import AjvModule from 'ajv';
import type { SchemaObject } from 'ajv';

// Ajv ships CommonJS; under NodeNext its class sits on `default`.
const Ajv = AjvModule.default;
const ajValidator = new Ajv(
  // See: https://ajv.js.org/options.html#strict-mode-options
  {
    // strictSchema defaults to true and rejects schemas with keywords Ajv
    // does not know. Tool schemas may carry descriptive extras.
    strictSchema: false,
  },
);

export type SchemaParseResult<T> =
  | { success: true; value: T }
  | { success: false; error: string };

/**
 * Simple utility to validate objects against JSON Schemas
 */
export class SchemaValidator {
  /**
   * Returns null if the data conforms to the schema described by schema (or if schema
   *  is null). Otherwise, returns a string describing the error.
   */
  static validate(
    schema: SchemaObject | undefined,
    data: unknown,
  ): string | null {
    if (!schema) {
      return null;
    }
    const result = SchemaValidator.parse(schema, data);
    return result.success ? null : result.error;
  }

  /**
   * Validates `data` and hands it back typed as the schema describes.
   */
  static parse<T>(schema: SchemaObject, data: unknown): SchemaParseResult<T> {
    if (typeof data !== 'object' || data === null) {
      return { success: false, error: 'Value of params must be an object' };
    }
    const validate = ajValidator.compile<T>(schema);
    if (validate(data)) {
      return { success: true, value: data };
    }
    return {
      success: false,
      error: ajValidator.errorsText(validate.errors, { dataVar: 'params' }),
    };
  }
}
