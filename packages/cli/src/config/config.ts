/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import type { ConfigParameters } from '@plainedit/core';
import {
  Config,
  EDIT_COMMANDS,
  FatalInputError,
  MEBIBYTE,
  getErrorMessage,
} from '@plainedit/core';
import type { Settings } from './settings.js';

export interface EditArgs {
  kind: 'edit';
  command: string | undefined;
  path: string | undefined;
  fileText: string | undefined;
  viewRange: number[] | undefined;
  oldStr: string | undefined;
  newStr: string | undefined;
  insertLine: number | undefined;
  enableLinting: boolean | undefined;
  json: string | undefined;
}

export interface ClearHistoryArgs {
  kind: 'clear-history';
  path: string;
}

export type CliArgs = EditArgs | ClearHistoryArgs;

export async function parseArguments(
  argv: string[] = hideBin(process.argv),
): Promise<CliArgs> {
  let parsed: CliArgs | undefined;

  await yargs(argv)
    .locale('en')
    .scriptName('plainedit')
    .usage(
      'Usage: plainedit [options] [command]\n\nplainedit - view, create and edit plain-text files with undo',
    )
    .command(
      '$0',
      'Run one editor command and print its result envelope',
      (yargsInstance) =>
        yargsInstance
          .option('command', {
            alias: 'c',
            type: 'string',
            description: `Editor command: ${EDIT_COMMANDS.join(', ')}`,
          })
          .option('path', {
            alias: 'p',
            type: 'string',
            description: 'Absolute path to the file or directory',
          })
          .option('file-text', {
            type: 'string',
            description: 'Content of the file to create',
          })
          .option('view-range', {
            type: 'number',
            array: true,
            description: 'First and last line to view; -1 means end of file',
          })
          .option('old-str', {
            type: 'string',
            description: 'Text to replace; must occur exactly once',
          })
          .option('new-str', {
            type: 'string',
            description: 'Replacement or inserted text',
          })
          .option('insert-line', {
            type: 'number',
            description: 'Line after which to insert; 0 inserts at the top',
          })
          .option('enable-linting', {
            type: 'boolean',
            description: 'Report lint issues introduced by the edit',
          })
          .option('json', {
            type: 'string',
            description: 'All parameters as one JSON object',
          })
          .conflicts('json', [
            'command',
            'path',
            'file-text',
            'view-range',
            'old-str',
            'new-str',
            'insert-line',
            'enable-linting',
          ])
          .check((args) => {
            if (args.json === undefined && (!args.command || !args.path)) {
              throw new Error('Provide --command and --path, or --json.');
            }
            return true;
          }),
      (args) => {
        parsed = {
          kind: 'edit',
          command: args.command,
          path: args.path,
          fileText: args.fileText,
          viewRange: args.viewRange,
          oldStr: args.oldStr,
          newStr: args.newStr,
          insertLine: args.insertLine,
          enableLinting: args.enableLinting,
          json: args.json,
        };
      },
    )
    .command(
      'clear-history <path>',
      'Forget the undo history of a file',
      (yargsInstance) =>
        yargsInstance.positional('path', {
          type: 'string',
          description: 'Absolute path of the file',
          demandOption: true,
        }),
      (args) => {
        parsed = { kind: 'clear-history', path: args.path };
      },
    )
    .help()
    .alias('h', 'help')
    .version(false)
    .strict()
    .fail((message, error) => {
      throw new FatalInputError(error ? error.message : message);
    })
    .parseAsync();

  if (!parsed) {
    throw new FatalInputError('No command was given.');
  }
  return parsed;
}

/**
 * The raw tool arguments an invocation asks for, keyed the way the tool's
 * schema expects.
 */
export function toToolArgs(args: EditArgs): unknown {
  if (args.json !== undefined) {
    try {
      return JSON.parse(args.json);
    } catch (error) {
      throw new FatalInputError(
        `Invalid --json argument: ${getErrorMessage(error)}`,
      );
    }
  }
  const toolArgs: Record<string, unknown> = {
    command: args.command,
    path: args.path,
    file_text: args.fileText,
    view_range: args.viewRange,
    old_str: args.oldStr,
    new_str: args.newStr,
    insert_line: args.insertLine,
    enable_linting: args.enableLinting,
  };
  return Object.fromEntries(
    Object.entries(toolArgs).filter(([, value]) => value !== undefined),
  );
}

export function buildConfigParameters(
  settings: Settings,
  targetDir: string,
): ConfigParameters {
  const toBytes = (mebibytes: number | undefined) =>
    mebibytes === undefined ? undefined : Math.round(mebibytes * MEBIBYTE);
  return {
    targetDir,
    maxFileSizeBytes: toBytes(settings.maxFileSizeMb),
    maxHistoryPerFile: settings.maxHistoryPerFile,
    historyDir: settings.historyDir,
    historyStoreSizeLimitBytes: toBytes(settings.historyStoreSizeLimitMb),
    maxResponseLength: settings.maxResponseLength,
    snippetContextWindow: settings.snippetContextWindow,
    linters: settings.linters,
    lintTimeoutMs: settings.lintTimeoutMs,
    logLevel: settings.logLevel,
  };
}

export function loadCliConfig(settings: Settings, targetDir: string): Config {
  return new Config(buildConfigParameters(settings, targetDir));
}
