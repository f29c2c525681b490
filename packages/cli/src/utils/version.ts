/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';

const PACKAGE_JSON = new URL('../../package.json', import.meta.url);

const PackageJsonSchema = z.object({ version: z.string() }).passthrough();

let cachedVersion: string | undefined;

/** The version of this package, read once from its package.json. */
export async function getCliVersion(): Promise<string> {
  if (cachedVersion === undefined) {
    const data: unknown = JSON.parse(await readFile(PACKAGE_JSON, 'utf8'));
    cachedVersion = PackageJsonSchema.parse(data).version;
  }
  return cachedVersion;
}
