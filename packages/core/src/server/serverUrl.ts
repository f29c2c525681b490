/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Turns what a user types at the URL prompt into a base URL: `localhost`
 * is assumed to be plain http, any other host without a scheme https.
 */
export function normalizeServerUrl(input: string): string {
  let url = input.trim();
  if (url.startsWith('localhost')) {
    url = `http://${url}`;
  } else if (!url.startsWith('http')) {
    url = `https://${url}`;
  }
  return url.replace(/\/+$/, '');
}

/** Joins an API path onto a server URL without doubling the slash. */
export function apiEndpoint(serverUrl: string, path: string): string {
  return `${serverUrl.replace(/\/+$/, '')}/api/v1/${path}`;
}
