/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { DebugLogger } from '../debug/DebugLogger.js';
import {
  InvalidCredentialsError,
  ServerConnectionFailure,
  getErrorMessage,
} from '../utils/errors.js';
import { fetchWithTimeout } from '../utils/fetch.js';
import { apiEndpoint } from './serverUrl.js';

const logger = DebugLogger.getLogger('zterm:server:api-key');

const FetchApiKeyResponseSchema = z
  .object({
    api_key: z.string().min(1),
    email: z.string().optional(),
  })
  .passthrough();

export interface FetchedApiKey {
  apiKey: string;
  /** The account email when the server reports it; may differ from the login id. */
  email?: string;
}

/**
 * Exchanges a login id and password for the account's API key.
 */
export async function fetchApiKey(
  serverUrl: string,
  loginId: string,
  password: string,
): Promise<FetchedApiKey> {
  const endpoint = apiEndpoint(serverUrl, 'fetch_api_key');
  logger.debug(() => `POST ${endpoint} for ${loginId}`);

  let response: Response;
  try {
    response = await fetchWithTimeout(endpoint, undefined, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ username: loginId, password }),
    });
  } catch (error) {
    throw new ServerConnectionFailure(getErrorMessage(error));
  }

  if (response.status !== 200) {
    logger.debug(() => `fetch_api_key returned ${response.status}`);
    throw new InvalidCredentialsError();
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new ServerConnectionFailure(
      `Invalid fetch_api_key response: ${getErrorMessage(error)}`,
    );
  }

  const parsed = FetchApiKeyResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ServerConnectionFailure('Invalid fetch_api_key response');
  }
  return { apiKey: parsed.data.api_key, email: parsed.data.email };
}
