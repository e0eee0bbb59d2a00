/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export config
export * from './config/config.js';
export * from './config/constants.js';
export * from './config/storage.js';

// Export editor
export * from './editor/types.js';
export * from './editor/editorErrors.js';
export * from './editor/notices.js';
export * from './editor/snippetFormatter.js';
export * from './editor/pathValidator.js';
export * from './editor/fileValidator.js';
export * from './editor/exactMatchReplacer.js';
export * from './editor/lineInserter.js';
export * from './editor/directoryViewer.js';
export * from './editor/editEngine.js';

// Export history
export * from './history/keyValueStore.js';
export * from './history/diskKeyValueStore.js';
export * from './history/historyManager.js';

// Export linting
export * from './linter/linter.js';
export * from './linter/commandLinter.js';

// Export services
export * from './services/fileSystemService.js';
export * from './services/shellExecutionService.js';

// Export utilities
export * from './utils/debugLogger.js';
export * from './utils/errors.js';
export * from './utils/schemaValidator.js';
export * from './utils/textUtils.js';

// Export tools
export * from './tools/tool-error.js';
export * from './tools/tools.js';
export * from './tools/file-editor.js';
export * from './tools/result-envelope.js';
