/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const CONTENT_TRUNCATED_NOTICE =
  '<response clipped><NOTE>Due to the max output limit, only part of the full response has been shown to you.</NOTE>';

export const FILE_CONTENT_TRUNCATED_NOTICE =
  '<response clipped><NOTE>Due to the max output limit, only part of this file has been shown to you. You should use `view` with a `view_range` to see the rest, or search the file with a shell command such as `grep -n` to find the line numbers you need.</NOTE>';

export const DIRECTORY_CONTENT_TRUNCATED_NOTICE =
  '<response clipped><NOTE>Due to the max output limit, only part of this directory has been shown to you. You should view a subdirectory, or list it with a shell command such as `ls -la`, to see the rest.</NOTE>';
