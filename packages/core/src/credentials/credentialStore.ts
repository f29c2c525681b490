/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { DebugLogger } from '../debug/DebugLogger.js';
import { isNodeError } from '../utils/errors.js';
import {
  checkPermissions,
  secureCreate,
  type PermissionCheck,
  type SecureCreateFailure,
} from './permissionGuard.js';
import type { CredentialRecord } from './types.js';
import {
  API_SECTION,
  ZTERM_SECTION,
  credentialsFromSection,
  parseZuliprc,
  serializeCredentials,
  type ZuliprcSection,
} from './zuliprc.js';

const logger = DebugLogger.getLogger('zterm:credentials:store');

export interface LoadedZuliprc {
  record: CredentialRecord;
  /** The `[zterm]` section; empty when the file has none. */
  settings: ZuliprcSection;
}

export type LoadFailure =
  | { kind: 'not-found'; path: string }
  | { kind: 'insecure-permissions'; path: string; currentMode: string }
  | { kind: 'malformed'; path: string; reason: string }
  | { kind: 'unreadable'; path: string; code: string };

export type LoadResult =
  | { ok: true; value: LoadedZuliprc }
  | { ok: false; error: LoadFailure };

export type CreateResult = { ok: true } | { ok: false; error: SecureCreateFailure };

async function checkExistingPermissions(
  filePath: string,
): Promise<PermissionCheck | undefined> {
  try {
    return await checkPermissions(filePath);
  } catch (error) {
    if (
      isNodeError(error) &&
      (error.code === 'ENOENT' || error.code === 'ENOTDIR')
    ) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Loads the zuliprc at `filePath`.
 *
 * Permissions are checked before anything is read: a file that group or
 * other can access is reported as `insecure-permissions` and its contents
 * are never parsed.
 */
export async function loadCredentials(filePath: string): Promise<LoadResult> {
  const permissions = await checkExistingPermissions(filePath);
  if (!permissions) {
    return { ok: false, error: { kind: 'not-found', path: filePath } };
  }

  if (!permissions.ok) {
    logger.warn(
      () => `refusing ${filePath} with mode ${permissions.currentMode}`,
    );
    return {
      ok: false,
      error: {
        kind: 'insecure-permissions',
        path: filePath,
        currentMode: permissions.currentMode,
      },
    };
  }

  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNodeError(error) && error.code !== undefined) {
      logger.warn(() => `cannot read ${filePath}: ${error.code}`);
      return {
        ok: false,
        error: { kind: 'unreadable', path: filePath, code: error.code },
      };
    }
    throw error;
  }

  const parsed = parseZuliprc(contents);
  if (!parsed.ok) {
    return {
      ok: false,
      error: { kind: 'malformed', path: filePath, reason: parsed.reason },
    };
  }

  const api = parsed.document.get(API_SECTION);
  if (!api) {
    return {
      ok: false,
      error: {
        kind: 'malformed',
        path: filePath,
        reason: `missing [${API_SECTION}] section`,
      },
    };
  }

  logger.debug(() => `loaded ${filePath}`);
  return {
    ok: true,
    value: {
      record: credentialsFromSection(api),
      settings: parsed.document.get(ZTERM_SECTION) ?? new Map(),
    },
  };
}

/**
 * Writes a new zuliprc holding `record`. The file is created exclusively
 * with owner-only permissions; an existing file is never overwritten.
 */
export async function createCredentials(
  filePath: string,
  record: CredentialRecord,
): Promise<CreateResult> {
  for (const [field, value] of Object.entries(record)) {
    if (value === '') {
      throw new Error(`Cannot store credentials with an empty ${field}`);
    }
  }

  const created = await secureCreate(filePath);
  if (!created.ok) {
    return created;
  }

  try {
    await created.handle.writeFile(serializeCredentials(record), 'utf8');
  } catch (error) {
    await created.handle.close();
    await fs.rm(filePath, { force: true });
    throw error;
  }
  await created.handle.close();

  logger.debug(() => `wrote credentials for ${record.serverUrl} to ${filePath}`);
  return { ok: true };
}

export function describeCreateFailure(error: SecureCreateFailure): string {
  switch (error.kind) {
    case 'already-exists':
      return `zuliprc already exists at ${error.path}`;
    case 'permission-denied':
    case 'path-not-found':
      return `${error.code}: zuliprc could not be created at ${error.path}`;
    default: {
      const unreachable: never = error.kind;
      return unreachable;
    }
  }
}

/**
 * The lines shown when a zuliprc is readable by group or other, ending
 * with the command that fixes it.
 */
export function describeInsecurePermissions(
  filePath: string,
  currentMode: string,
): string[] {
  return [
    'ERROR: Please ensure your zuliprc is NOT publicly accessible:',
    `  ${filePath}`,
    `(it currently has permissions '${currentMode}')`,
    'This can often be achieved with a command such as:',
    `  chmod og-rwx ${filePath}`,
    'Consider regenerating the [api] part of your zuliprc to ensure your account is secure.',
  ];
}

export function describeUnreadable(filePath: string, code: string): string {
  return `Could not access zuliprc file at ${filePath} (${code})`;
}

export function describeMalformed(filePath: string, reason: string): string {
  return `Failed to parse zuliprc file at ${filePath} (${reason})`;
}
