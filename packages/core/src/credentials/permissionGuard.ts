/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { DebugLogger } from '../debug/DebugLogger.js';
import { isNodeError } from '../utils/errors.js';

const logger = DebugLogger.getLogger('zterm:credentials:permissions');

/** Owner read/write, nothing for group or other. */
export const SECURE_FILE_MODE = 0o600;
const GROUP_OTHER_BITS = 0o077;

export interface PermissionCheck {
  /** True iff no group or other permission bit is set. */
  ok: boolean;
  /** `ls -l` style rendering of the mode, e.g. `-rw-r--r--`. */
  currentMode: string;
}

export type SecureCreateFailureKind =
  | 'already-exists'
  | 'permission-denied'
  | 'path-not-found';

export interface SecureCreateFailure {
  kind: SecureCreateFailureKind;
  path: string;
  /** The errno code reported by the file system, e.g. `EACCES`. */
  code: string;
}

export type SecureCreateResult =
  | { ok: true; handle: FileHandle }
  | { ok: false; error: SecureCreateFailure };

const FAILURE_KIND_BY_CODE: Readonly<Record<string, SecureCreateFailureKind>> =
  {
    EEXIST: 'already-exists',
    EACCES: 'permission-denied',
    EPERM: 'permission-denied',
    EROFS: 'permission-denied',
    ENOENT: 'path-not-found',
    ENOTDIR: 'path-not-found',
  };

const FILE_TYPE_CHARS: ReadonlyArray<readonly [number, string]> = [
  [0o140000, 's'],
  [0o120000, 'l'],
  [0o100000, '-'],
  [0o060000, 'b'],
  [0o040000, 'd'],
  [0o020000, 'c'],
  [0o010000, 'p'],
];
const FILE_TYPE_MASK = 0o170000;

/**
 * Renders a numeric mode the way `ls -l` does, including the
 * setuid/setgid/sticky markers.
 */
export function formatFileMode(mode: number): string {
  const fileType = mode & FILE_TYPE_MASK;
  const typeChar =
    FILE_TYPE_CHARS.find(([bits]) => bits === fileType)?.[1] ?? '?';

  const triplet = (
    shift: number,
    special: number,
    setChar: string,
  ): string => {
    const bits = (mode >> shift) & 0o7;
    const execute = (bits & 0o1) !== 0;
    const isSpecial = (mode & special) !== 0;
    let executeChar = execute ? 'x' : '-';
    if (isSpecial) {
      executeChar = execute ? setChar : setChar.toUpperCase();
    }
    return (
      (bits & 0o4 ? 'r' : '-') + (bits & 0o2 ? 'w' : '-') + executeChar
    );
  };

  return (
    typeChar +
    triplet(6, 0o4000, 's') +
    triplet(3, 0o2000, 's') +
    triplet(0, 0o1000, 't')
  );
}

/**
 * Stats the file and reports whether its mode is owner-only.
 * Errors from stat (including a missing file) propagate to the caller.
 */
export async function checkPermissions(
  filePath: string,
): Promise<PermissionCheck> {
  const { mode } = await fs.stat(filePath);
  const check = {
    ok: (mode & GROUP_OTHER_BITS) === 0,
    currentMode: formatFileMode(mode),
  };
  logger.debug(() => `${filePath}: mode ${check.currentMode} ok=${check.ok}`);
  return check;
}

/**
 * Creates `filePath` exclusively with mode 0600 set by the same open call,
 * so the file never exists with broader permissions. An existing file is
 * reported as `already-exists` and left untouched.
 */
export async function secureCreate(
  filePath: string,
): Promise<SecureCreateResult> {
  try {
    const handle = await fs.open(filePath, 'wx', SECURE_FILE_MODE);
    logger.debug(() => `created ${filePath} with mode 0600`);
    return { ok: true, handle };
  } catch (error) {
    if (!isNodeError(error) || !error.code) {
      throw error;
    }
    const code = error.code;
    const kind = FAILURE_KIND_BY_CODE[code];
    if (!kind) {
      throw error;
    }
    logger.debug(() => `could not create ${filePath}: ${code}`);
    return { ok: false, error: { kind, path: filePath, code } };
  }
}
