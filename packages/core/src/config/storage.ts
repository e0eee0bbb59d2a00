/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import * as os from 'node:os';
import * as crypto from 'node:crypto';

export const PLAINEDIT_DIR = '.plainedit';
export const SETTINGS_FILENAME = 'settings.json';
const HISTORY_DIR_NAME = 'history';

export class Storage {
  private readonly targetDir: string;

  constructor(targetDir: string) {
    this.targetDir = targetDir;
  }

  static getGlobalPlaineditDir(): string {
    const homeDir = os.homedir();
    if (!homeDir) {
      // Fallback for environments where homedir is not defined.
      return path.join(os.tmpdir(), PLAINEDIT_DIR);
    }
    return path.join(homeDir, PLAINEDIT_DIR);
  }

  static getGlobalSettingsPath(): string {
    return path.join(Storage.getGlobalPlaineditDir(), SETTINGS_FILENAME);
  }

  getPlaineditDir(): string {
    return path.join(this.targetDir, PLAINEDIT_DIR);
  }

  getWorkspaceSettingsPath(): string {
    return path.join(this.getPlaineditDir(), SETTINGS_FILENAME);
  }

  getProjectRoot(): string {
    return this.targetDir;
  }

  /**
   * Directory holding undo history for this project. One directory per
   * project root, so history survives restarts of the tool in that project.
   */
  getHistoryDir(): string {
    const hash = this.getFilePathHash(this.getProjectRoot());
    return path.join(Storage.getGlobalPlaineditDir(), HISTORY_DIR_NAME, hash);
  }

  private getFilePathHash(filePath: string): string {
    return crypto.createHash('sha256').update(filePath).digest('hex');
  }
}
