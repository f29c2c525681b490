/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DebugLogger,
  FatalCredentialsError,
  createCredentials,
  describeCreateFailure,
  fetchApiKey,
  normalizeServerUrl,
  promptLoginId,
} from '@zterm/core';
import { inColor } from '../ui/colors.js';
import type { LoginPrompts } from './prompts.js';

const logger = DebugLogger.getLogger('zterm:cli:login');

const URL_GUIDANCE = [
  'Please enter your credentials to login into your Zulip organization.',
  '',
  'NOTE: The Zulip URL is where you would go in a web browser to log in to Zulip.',
  'It often looks like one of the following:',
  '   your-org.zulipchat.com (Zulip cloud)',
  '   zulip.your-org.com (self-hosted servers)',
  '   chat.zulip.org (the Zulip community server)',
];

/**
 * First-run login: asks for the server, login id and password, exchanges
 * them for an API key and stores the result at `zuliprcPath`.
 *
 * A rejected password ends the login with InvalidCredentialsError; there
 * is no second attempt.
 */
export async function interactiveLogin(
  zuliprcPath: string,
  prompts: LoginPrompts,
): Promise<void> {
  console.log(inColor('red', `zuliprc file was not found at ${zuliprcPath}`));
  for (const line of URL_GUIDANCE) {
    console.log(line === '' ? line : inColor('green', line));
  }

  const serverUrl = normalizeServerUrl(await prompts.text('Zulip URL: '));
  const loginId = await promptLoginId(serverUrl, (label) =>
    prompts.text(label),
  );
  const password = await prompts.secret('Password:');

  const { apiKey } = await fetchApiKey(serverUrl, loginId, password);
  logger.debug(() => `fetched API key for ${loginId} at ${serverUrl}`);

  const created = await createCredentials(zuliprcPath, {
    loginId,
    apiKey,
    serverUrl,
  });
  if (!created.ok) {
    throw new FatalCredentialsError(describeCreateFailure(created.error));
  }
  console.log(`Generated API key saved at ${zuliprcPath}`);
}
