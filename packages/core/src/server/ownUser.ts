/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import type { CredentialRecord } from '../credentials/types.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import { ServerConnectionFailure, getErrorMessage } from '../utils/errors.js';
import { fetchWithTimeout } from '../utils/fetch.js';
import { apiEndpoint } from './serverUrl.js';

const logger = DebugLogger.getLogger('zterm:server:users-me');

const OwnUserSchema = z
  .object({
    user_id: z.number(),
    full_name: z.string(),
    email: z.string(),
  })
  .passthrough();

export type OwnUser = {
  userId: number;
  fullName: string;
  email: string;
};

export function basicAuthHeader(record: CredentialRecord): string {
  const token = Buffer.from(`${record.loginId}:${record.apiKey}`).toString(
    'base64',
  );
  return `Basic ${token}`;
}

/**
 * Authenticates `record` against `GET /api/v1/users/me`. Any failure to
 * reach the server or to authenticate is a ServerConnectionFailure.
 */
export async function fetchOwnUser(record: CredentialRecord): Promise<OwnUser> {
  const endpoint = apiEndpoint(record.serverUrl, 'users/me');
  logger.debug(() => `GET ${endpoint}`);

  let response: Response;
  try {
    response = await fetchWithTimeout(endpoint, undefined, {
      headers: { Authorization: basicAuthHeader(record) },
    });
  } catch (error) {
    throw new ServerConnectionFailure(getErrorMessage(error));
  }

  if (response.status === 401) {
    throw new ServerConnectionFailure('Invalid API key');
  }
  if (!response.ok) {
    throw new ServerConnectionFailure(
      `${endpoint} returned ${response.status}`,
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new ServerConnectionFailure(getErrorMessage(error));
  }
  const parsed = OwnUserSchema.safeParse(body);
  if (!parsed.success) {
    throw new ServerConnectionFailure('Invalid users/me response');
  }
  return {
    userId: parsed.data.user_id,
    fullName: parsed.data.full_name,
    email: parsed.data.email,
  };
}
