/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import {
  credentialsFromSection,
  parseZuliprc,
  serializeCredentials,
} from './zuliprc.js';

describe('parseZuliprc', () => {
  it('reads sections and keys in order', () => {
    const result = parseZuliprc(
      [
        '# comment',
        '[api]',
        'email = someone@example.com',
        'key=test-key',
        'site=https://chat.example.com',
        '',
        '[zterm]',
        '; another comment',
        'Theme: gruvbox',
      ].join('\n'),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect([...result.document.keys()]).toEqual(['api', 'zterm']);
    expect([...(result.document.get('api') ?? [])]).toEqual([
      ['email', 'someone@example.com'],
      ['key', 'test-key'],
      ['site', 'https://chat.example.com'],
    ]);
    expect(result.document.get('zterm')?.get('theme')).toBe('gruvbox');
  });

  it('accepts a bare [api] header', () => {
    const result = parseZuliprc('[api]');
    expect(result.ok && result.document.get('api')?.size).toBe(0);
  });

  it('accepts CRLF line endings', () => {
    const result = parseZuliprc('[api]\r\nemail=a@example.com\r\n');
    expect(result.ok && result.document.get('api')?.get('email')).toBe(
      'a@example.com',
    );
  });

  it('keeps everything after the first delimiter in the value', () => {
    const result = parseZuliprc('[api]\nsite=https://chat.example.com:8443');
    expect(result.ok && result.document.get('api')?.get('site')).toBe(
      'https://chat.example.com:8443',
    );
  });

  it.each([
    ['email=someone@example.com\n[api]', 'missing section header'],
    ['[api]\nemail someone', 'line 2: expected key=value'],
    ['[api]\n=value', 'line 2: empty key'],
    ['[api]\n[zterm]\n[api]', 'line 3: duplicate section [api]'],
    ['[api]\nkey=a\nKEY=b', "line 3: duplicate key 'key' in [api]"],
  ])('rejects %j', (text, reason) => {
    expect(parseZuliprc(text)).toEqual({ ok: false, reason });
  });
});

describe('serializeCredentials', () => {
  it('writes the fixed [api] layout without a trailing newline', () => {
    expect(
      serializeCredentials({ loginId: 'id', apiKey: 'key', serverUrl: 'url' }),
    ).toBe('[api]\nemail=id\nkey=key\nsite=url');
  });
});

describe('credentialsFromSection', () => {
  it('maps email/key/site and defaults absent keys to empty strings', () => {
    expect(
      credentialsFromSection(new Map([['email', 'someone@example.com']])),
    ).toEqual({
      loginId: 'someone@example.com',
      apiKey: '',
      serverUrl: '',
    });
  });
});
