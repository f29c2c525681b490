/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { getErrorMessage, isNodeError } from './errors.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export class FetchError extends Error {
  constructor(
    message: string,
    public code?: string,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * `fetch` with a hard timeout. Transport failures and timeouts are
 * normalized into FetchError; HTTP error statuses are returned as-is.
 */
export async function fetchWithTimeout(
  url: string,
  timeout: number = DEFAULT_REQUEST_TIMEOUT_MS,
  init: RequestInit = {},
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (error: unknown) {
    if (
      (isNodeError(error) && error.code === 'ABORT_ERR') ||
      (error instanceof Error && error.name === 'AbortError')
    ) {
      throw new FetchError(`Request timed out after ${timeout}ms`, 'ETIMEDOUT');
    }
    throw new FetchError(describeFetchFailure(error));
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Undici reports every transport failure as "fetch failed" and keeps the
 * useful part (ECONNREFUSED, ENOTFOUND, ...) on `cause`.
 */
function describeFetchFailure(error: unknown): string {
  const message = getErrorMessage(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${message}: ${getErrorMessage(error.cause)}`;
  }
  return message;
}
