/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as os from 'node:os';
import * as path from 'node:path';

export const ZTERM_DIR = '.zterm';
export const ZULIPRC_FILENAME = 'zuliprc';

/**
 * Location of the credentials file when no `--config-file` is given.
 */
export function defaultZuliprcPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, ZULIPRC_FILENAME);
}

/**
 * Expands a leading `~` or `~/` to the user's home directory.
 */
export function expandHome(
  filePath: string,
  homeDir: string = os.homedir(),
): string {
  if (filePath === '~') {
    return homeDir;
  }
  if (filePath.startsWith('~/') || filePath.startsWith(`~${path.sep}`)) {
    return path.join(homeDir, filePath.slice(2));
  }
  return filePath;
}
