/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { hideBin } from 'yargs/helpers';
import {
  EditEngine,
  FileEditorTool,
  debugLogger,
  formatToolResultEnvelope,
} from '@plainedit/core';
import type { LoadSettingsOptions } from './config/settings.js';
import { loadSettings } from './config/settings.js';
import { loadCliConfig, parseArguments, toToolArgs } from './config/config.js';

export interface MainOptions extends LoadSettingsOptions {
  workspaceDir?: string;
  write?: (text: string) => void;
}

/**
 * Runs one invocation and returns the process exit code: 0 when the tool
 * succeeded, 1 when it reported an error.
 */
export async function main(
  argv: string[] = hideBin(process.argv),
  options: MainOptions = {},
): Promise<number> {
  const workspaceDir = options.workspaceDir ?? process.cwd();
  const write =
    options.write ?? ((text: string) => void process.stdout.write(text));

  const args = await parseArguments(argv);
  const settings = loadSettings(workspaceDir, options);
  const config = loadCliConfig(settings.merged, workspaceDir);
  const engine = EditEngine.fromConfig(config);

  if (args.kind === 'clear-history') {
    engine.clearHistory(args.path);
    write(`Cleared edit history for ${args.path}\n`);
    return 0;
  }

  const tool = new FileEditorTool(engine);
  const result = await tool.validateBuildAndExecute(
    toToolArgs(args),
    new AbortController().signal,
  );
  if (result.error) {
    debugLogger.debug(`${tool.name} failed: ${result.error.type}`);
  }
  write(`${formatToolResultEnvelope(result)}\n`);
  return result.error ? 1 : 0;
}
