/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { DebugLogger } from '../debug/DebugLogger.js';
import { ServerConnectionFailure, getErrorMessage } from '../utils/errors.js';
import { fetchWithTimeout } from '../utils/fetch.js';
import { apiEndpoint } from './serverUrl.js';

const logger = DebugLogger.getLogger('zterm:server:settings');

/**
 * The subset of `/api/v1/server_settings` that decides which login
 * identifier to ask for. Older servers omit the flags.
 */
export const ServerSettingsSchema = z
  .object({
    email_auth_enabled: z.boolean().default(false),
    require_email_format_usernames: z.boolean().default(false),
  })
  .passthrough();

export interface ServerCapabilities {
  emailAuthEnabled: boolean;
  requireEmailFormatUsernames: boolean;
}

export type LoginLabel = 'Email' | 'Email or Username' | 'Username';

export type PromptFn = (label: string) => Promise<string>;

export function resolveLoginLabel(capabilities: ServerCapabilities): LoginLabel {
  if (capabilities.requireEmailFormatUsernames) {
    return 'Email';
  }
  return capabilities.emailAuthEnabled ? 'Email or Username' : 'Username';
}

export async function fetchServerCapabilities(
  serverUrl: string,
): Promise<ServerCapabilities> {
  const endpoint = apiEndpoint(serverUrl, 'server_settings');
  logger.debug(() => `GET ${endpoint}`);

  let response: Response;
  try {
    response = await fetchWithTimeout(endpoint);
  } catch (error) {
    throw new ServerConnectionFailure(getErrorMessage(error));
  }

  if (!response.ok) {
    throw new ServerConnectionFailure(
      `${endpoint} returned ${response.status} ${response.statusText}`.trim(),
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new ServerConnectionFailure(
      `Invalid server_settings response: ${getErrorMessage(error)}`,
    );
  }

  const parsed = ServerSettingsSchema.safeParse(body);
  if (!parsed.success) {
    logger.debug(() => `server_settings rejected: ${parsed.error.message}`);
    throw new ServerConnectionFailure('Invalid server_settings response');
  }

  return {
    emailAuthEnabled: parsed.data.email_auth_enabled,
    requireEmailFormatUsernames: parsed.data.require_email_format_usernames,
  };
}

/**
 * Asks the user for the login identifier the server at `serverUrl`
 * accepts. One prompt, no retry.
 */
export async function promptLoginId(
  serverUrl: string,
  prompt: PromptFn,
): Promise<string> {
  const label = resolveLoginLabel(await fetchServerCapabilities(serverUrl));
  return prompt(`${label}: `);
}
