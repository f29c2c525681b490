/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DebugLogger,
  fetchOwnUser,
  type SessionController,
  type SessionControllerFactory,
  type SessionOptions,
} from '@zterm/core';

const logger = DebugLogger.getLogger('zterm:cli:session');

/**
 * Stand-in for the interactive session: authenticates the stored
 * credentials against the server and reports who is logged in.
 */
export class ConnectionCheckController implements SessionController {
  constructor(private readonly options: SessionOptions) {}

  async run(): Promise<void> {
    const { credentials, explore, theme } = this.options;
    const user = await fetchOwnUser(credentials);
    logger.debug(
      () => `authenticated user ${user.userId} with theme ${theme.name}`,
    );

    const mode = explore ? ' (explore mode)' : '';
    console.log(
      `Logged in to ${credentials.serverUrl} as ${user.fullName} <${user.email}>${mode}.`,
    );
  }
}

export const createDefaultController: SessionControllerFactory = (options) =>
  new ConnectionCheckController(options);
