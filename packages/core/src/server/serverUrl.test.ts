/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { apiEndpoint, normalizeServerUrl } from './serverUrl.js';

describe('normalizeServerUrl', () => {
  it.each([
    ['chat.example.com', 'https://chat.example.com'],
    ['  chat.example.com/  ', 'https://chat.example.com'],
    ['localhost:9991', 'http://localhost:9991'],
    ['http://chat.example.com', 'http://chat.example.com'],
    ['https://chat.example.com//', 'https://chat.example.com'],
  ])('normalizes %j to %j', (input, expected) => {
    expect(normalizeServerUrl(input)).toBe(expected);
  });
});

describe('apiEndpoint', () => {
  it('joins the path under /api/v1', () => {
    expect(apiEndpoint('https://chat.example.com/', 'users/me')).toBe(
      'https://chat.example.com/api/v1/users/me',
    );
  });
});
