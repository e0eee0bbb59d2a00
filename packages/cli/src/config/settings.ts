/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import stripJsonComments from 'strip-json-comments';
import {
  FatalConfigError,
  LOG_LEVELS,
  Storage,
  debugLogger,
  getErrorMessage,
  isLogLevel,
} from '@plainedit/core';

export const settingsSchema = z
  .object({
    /** Largest file the editor will touch, in mebibytes. */
    maxFileSizeMb: z.number().positive().optional(),
    maxHistoryPerFile: z.number().int().positive().optional(),
    historyDir: z.string().min(1).optional(),
    historyStoreSizeLimitMb: z.number().positive().optional(),
    maxResponseLength: z.number().int().nonnegative().optional(),
    snippetContextWindow: z.number().int().nonnegative().optional(),
    /** Extension (with its dot) to lint command containing `{file}`. */
    linters: z.record(z.string()).optional(),
    lintTimeoutMs: z.number().int().positive().optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  })
  .strict();

export type Settings = z.infer<typeof settingsSchema>;

export enum SettingScope {
  User = 'User',
  Workspace = 'Workspace',
}

export interface SettingsFile {
  settings: Settings;
  path: string;
}

export interface SettingsError {
  message: string;
  path: string;
}

export const USER_SETTINGS_PATH = Storage.getGlobalSettingsPath();

function mergeSettings(user: Settings, workspace: Settings): Settings {
  // Workspace settings override user settings; linter tables merge per key.
  return {
    ...user,
    ...workspace,
    linters: { ...(user.linters ?? {}), ...(workspace.linters ?? {}) },
  };
}

export class LoadedSettings {
  constructor(
    readonly user: SettingsFile,
    readonly workspace: SettingsFile,
    private readonly environment: Settings = {},
  ) {
    this._merged = {
      ...mergeSettings(user.settings, workspace.settings),
      ...environment,
    };
  }

  private readonly _merged: Settings;

  get merged(): Settings {
    return this._merged;
  }

  /** Values taken from `PLAINEDIT_*` environment variables. */
  get fromEnvironment(): Settings {
    return this.environment;
  }

  forScope(scope: SettingScope): SettingsFile {
    switch (scope) {
      case SettingScope.User:
        return this.user;
      case SettingScope.Workspace:
        return this.workspace;
      default:
        throw new Error(`Invalid scope: ${scope}`);
    }
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

/**
 * Reads environment overrides. Unparseable values are reported rather than
 * ignored.
 */
function settingsFromEnvironment(
  env: NodeJS.ProcessEnv,
  settingsErrors: SettingsError[],
): Settings {
  const settings: Settings = {};

  const historyDir = env['PLAINEDIT_HISTORY_DIR'];
  if (historyDir) {
    settings.historyDir = historyDir;
  }

  const maxFileSize = env['PLAINEDIT_MAX_FILE_SIZE_MB'];
  if (maxFileSize) {
    const parsed = Number(maxFileSize);
    if (Number.isFinite(parsed) && parsed > 0) {
      settings.maxFileSizeMb = parsed;
    } else {
      settingsErrors.push({
        message: `Expected a positive number, received "${maxFileSize}"`,
        path: 'PLAINEDIT_MAX_FILE_SIZE_MB',
      });
    }
  }

  const logLevel = env['PLAINEDIT_LOG_LEVEL']?.toLowerCase();
  if (logLevel) {
    if (isLogLevel(logLevel)) {
      settings.logLevel = logLevel;
    } else {
      settingsErrors.push({
        message: `Expected one of ${LOG_LEVELS.join(', ')}, received "${logLevel}"`,
        path: 'PLAINEDIT_LOG_LEVEL',
      });
    }
  }
  return settings;
}

export interface LoadSettingsOptions {
  userSettingsPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads settings from user and workspace directories, then applies
 * environment overrides. Workspace settings override user settings.
 */
export function loadSettings(
  workspaceDir: string = process.cwd(),
  options: LoadSettingsOptions = {},
): LoadedSettings {
  const settingsErrors: SettingsError[] = [];
  const userSettingsPath = options.userSettingsPath ?? USER_SETTINGS_PATH;
  const workspaceSettingsPath = new Storage(
    path.resolve(workspaceDir),
  ).getWorkspaceSettingsPath();

  const load = (filePath: string): Settings => {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let rawSettings: unknown;
    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      rawSettings = JSON.parse(stripJsonComments(content));
    } catch (error) {
      settingsErrors.push({ message: getErrorMessage(error), path: filePath });
      return {};
    }
    const parsed = settingsSchema.safeParse(rawSettings);
    if (!parsed.success) {
      settingsErrors.push({
        message: formatIssues(parsed.error),
        path: filePath,
      });
      return {};
    }
    debugLogger.debug(`Loaded settings from ${filePath}`);
    return parsed.data;
  };

  const userSettings = load(userSettingsPath);
  // The home directory's workspace settings are the user settings.
  const workspaceSettings =
    path.resolve(workspaceSettingsPath) === path.resolve(userSettingsPath)
      ? {}
      : load(workspaceSettingsPath);
  const environment = settingsFromEnvironment(
    options.env ?? process.env,
    settingsErrors,
  );

  if (settingsErrors.length > 0) {
    const errorMessages = settingsErrors.map(
      (error) => `Error in ${error.path}: ${error.message}`,
    );
    throw new FatalConfigError(
      `${errorMessages.join('\n')}\nPlease fix the configuration file(s) and try again.`,
    );
  }

  return new LoadedSettings(
    { path: userSettingsPath, settings: userSettings },
    { path: workspaceSettingsPath, settings: workspaceSettings },
    environment,
  );
}
