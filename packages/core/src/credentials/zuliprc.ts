/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Reader and writer for the zuliprc, a small INI file:
 *
 *   [api]
 *   email=someone@example.com
 *   key=...
 *   site=https://chat.example.com
 *
 *   [zterm]
 *   theme=gruvbox
 */

import type { CredentialRecord } from './types.js';

export type ZuliprcSection = ReadonlyMap<string, string>;
export type ZuliprcDocument = ReadonlyMap<string, ZuliprcSection>;

export type ZuliprcParseResult =
  | { ok: true; document: ZuliprcDocument }
  | { ok: false; reason: string };

export const API_SECTION = 'api';
export const ZTERM_SECTION = 'zterm';

const SECTION_HEADER = /^\[([^\]]+)\]$/;

function delimiterIndex(line: string): number {
  const indices = [line.indexOf('='), line.indexOf(':')].filter(
    (index) => index >= 0,
  );
  return indices.length > 0 ? Math.min(...indices) : -1;
}

export function parseZuliprc(text: string): ZuliprcParseResult {
  const document = new Map<string, Map<string, string>>();
  let current: { name: string; entries: Map<string, string> } | undefined;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const line = lines[i].trim();
    if (line === '' || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    const header = SECTION_HEADER.exec(line);
    if (header) {
      const name = header[1].trim();
      if (document.has(name)) {
        return {
          ok: false,
          reason: `line ${lineNumber}: duplicate section [${name}]`,
        };
      }
      current = { name, entries: new Map() };
      document.set(name, current.entries);
      continue;
    }

    if (!current) {
      return { ok: false, reason: 'missing section header' };
    }

    const delimiter = delimiterIndex(line);
    if (delimiter < 0) {
      return {
        ok: false,
        reason: `line ${lineNumber}: expected key=value`,
      };
    }
    const key = line.slice(0, delimiter).trim().toLowerCase();
    const value = line.slice(delimiter + 1).trim();
    if (key === '') {
      return { ok: false, reason: `line ${lineNumber}: empty key` };
    }
    if (current.entries.has(key)) {
      return {
        ok: false,
        reason: `line ${lineNumber}: duplicate key '${key}' in [${current.name}]`,
      };
    }
    current.entries.set(key, value);
  }

  return { ok: true, document };
}

/**
 * The exact on-disk layout of a freshly created zuliprc: no blank lines
 * and no trailing newline.
 */
export function serializeCredentials(record: CredentialRecord): string {
  return [
    `[${API_SECTION}]`,
    `email=${record.loginId}`,
    `key=${record.apiKey}`,
    `site=${record.serverUrl}`,
  ].join('\n');
}

/**
 * Reads the credential triple out of the `[api]` section; absent keys
 * come back as empty strings.
 */
export function credentialsFromSection(api: ZuliprcSection): CredentialRecord {
  return {
    loginId: api.get('email') ?? '',
    apiKey: api.get('key') ?? '',
    serverUrl: api.get('site') ?? '',
  };
}
