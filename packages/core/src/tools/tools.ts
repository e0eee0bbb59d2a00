/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { SchemaObject } from 'ajv';
import { SchemaValidator } from '../utils/schemaValidator.js';
import type { SchemaParseResult } from '../utils/schemaValidator.js';
import { getErrorMessage } from '../utils/errors.js';
import { ToolErrorType } from './tool-error.js';

/**
 * The kind of side effect a tool has. Hosts use it to decide how much
 * scrutiny a call deserves.
 */
export enum Kind {
  Read = 'read',
  Edit = 'edit',
  Delete = 'delete',
  Search = 'search',
  Execute = 'execute',
  Other = 'other',
}

export interface ToolResult {
  /** Content meant for the model's history. */
  llmContent: string;
  /** Short, user-facing summary. */
  returnDisplay: string;
  /** Present when the call failed. */
  error?: {
    message: string;
    type?: ToolErrorType;
  };
}

/** Description of a tool as handed to a model. */
export interface ToolSchema {
  name: string;
  description: string;
  parametersJsonSchema: SchemaObject;
}

/**
 * A validated, ready-to-run tool call.
 */
export interface ToolInvocation<
  TParams extends object,
  TResult extends ToolResult,
> {
  params: TParams;
  getDescription(): string;
  execute(signal: AbortSignal): Promise<TResult>;
}

export abstract class BaseToolInvocation<
  TParams extends object,
  TResult extends ToolResult,
> implements ToolInvocation<TParams, TResult>
{
  constructor(readonly params: TParams) {}

  abstract getDescription(): string;

  abstract execute(signal: AbortSignal): Promise<TResult>;
}

/**
 * A tool that validates its raw arguments before building an invocation.
 */
export abstract class DeclarativeTool<
  TParams extends object,
  TResult extends ToolResult,
> {
  constructor(
    readonly name: string,
    readonly displayName: string,
    readonly description: string,
    readonly kind: Kind,
    readonly parameterSchema: SchemaObject,
  ) {}

  get schema(): ToolSchema {
    return {
      name: this.name,
      description: this.description,
      parametersJsonSchema: this.parameterSchema,
    };
  }

  /**
   * Checks raw arguments, returning typed parameters or a description of
   * what is wrong with them.
   */
  abstract validateToolParams(
    params: unknown,
  ): SchemaParseResult<TParams>;

  abstract build(params: TParams): ToolInvocation<TParams, TResult>;

  protected abstract errorResult(message: string, type: ToolErrorType): TResult;

  /**
   * Validates raw arguments, builds the invocation and runs it. Never
   * throws: every failure becomes an error result.
   */
  async validateBuildAndExecute(
    params: unknown,
    abortSignal: AbortSignal,
  ): Promise<TResult> {
    const validation = this.validateToolParams(params);
    if (!validation.success) {
      return this.errorResult(
        `Error: Invalid parameters provided. Reason: ${validation.error}`,
        ToolErrorType.INVALID_TOOL_PARAMS,
      );
    }
    try {
      return await this.build(validation.value).execute(abortSignal);
    } catch (error) {
      return this.errorResult(
        `Error during tool execution: ${getErrorMessage(error)}`,
        ToolErrorType.UNHANDLED_EXCEPTION,
      );
    }
  }
}

/**
 * A declarative tool whose arguments are checked against its JSON schema,
 * then by {@link validateToolParamValues}.
 */
export abstract class BaseDeclarativeTool<
  TParams extends object,
  TResult extends ToolResult,
> extends DeclarativeTool<TParams, TResult> {
  override build(params: TParams): ToolInvocation<TParams, TResult> {
    const validationError = this.validateToolParamValues(params);
    if (validationError) {
      throw new Error(validationError);
    }
    return this.createInvocation(params);
  }

  override validateToolParams(
    params: unknown,
  ): SchemaParseResult<TParams> {
    const parsed = SchemaValidator.parse<TParams>(this.parameterSchema, params);
    if (!parsed.success) {
      return parsed;
    }
    const valueError = this.validateToolParamValues(parsed.value);
    if (valueError) {
      return { success: false, error: valueError };
    }
    return parsed;
  }

  protected validateToolParamValues(_params: TParams): string | null {
    return null;
  }

  protected abstract createInvocation(
    params: TParams,
  ): ToolInvocation<TParams, TResult>;
}
