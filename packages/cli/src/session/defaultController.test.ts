/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { ServerConnectionFailure, type SessionOptions } from '@zterm/core';
import { createDefaultController } from './defaultController.js';

const options: SessionOptions = {
  zuliprcPath: '/home/t/zuliprc',
  credentials: {
    loginId: 'someone@example.com',
    apiKey: 'test-key',
    serverUrl: 'https://chat.example.com',
  },
  settings: {
    theme: 'zt_dark',
    autohide: 'no_autohide',
    footlinks: 'enabled',
    notify: 'disabled',
    colorDepth: '256',
  },
  theme: { name: 'zt_dark', styles: [] },
  explore: true,
  debug: false,
};

describe('ConnectionCheckController', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('reports the authenticated user', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockImplementation(async () =>
        Response.json({
          user_id: 1,
          full_name: 'Some One',
          email: 'someone@example.com',
        }),
      ),
    );
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const controller = await createDefaultController(options);
    await controller.run();

    expect(logSpy).toHaveBeenCalledWith(
      'Logged in to https://chat.example.com as Some One <someone@example.com> (explore mode).',
    );
  });

  it('fails with a connection error when the server is unreachable', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('ECONNREFUSED')));

    const controller = await createDefaultController(options);
    await expect(controller.run()).rejects.toBeInstanceOf(
      ServerConnectionFailure,
    );
  });
});
