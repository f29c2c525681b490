/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { ServerConnectionFailure } from '../utils/errors.js';
import { basicAuthHeader, fetchOwnUser } from './ownUser.js';

const record = {
  loginId: 'someone@example.com',
  apiKey: 'test-key',
  serverUrl: 'https://chat.example.com',
};

describe('fetchOwnUser', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('encodes the login id and key as basic auth', () => {
    expect(basicAuthHeader({ ...record, loginId: 'a', apiKey: 'b' })).toBe(
      'Basic YTpi',
    );
  });

  it('returns the authenticated user', async () => {
    const fetchMock = vi.fn().mockImplementation(async () =>
      Response.json({
        result: 'success',
        user_id: 7,
        full_name: 'Some One',
        email: 'someone@example.com',
      }),
    );
    vi.stubGlobal('fetch', fetchMock);

    await expect(fetchOwnUser(record)).resolves.toEqual({
      userId: 7,
      fullName: 'Some One',
      email: 'someone@example.com',
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://chat.example.com/api/v1/users/me');
    expect(init.headers).toEqual({ Authorization: basicAuthHeader(record) });
  });

  it('reports a rejected key as a connection failure', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockImplementation(async () =>
          Response.json({ result: 'error' }, { status: 401 }),
        ),
    );

    await expect(fetchOwnUser(record)).rejects.toThrow(
      new ServerConnectionFailure('Invalid API key'),
    );
  });
});
