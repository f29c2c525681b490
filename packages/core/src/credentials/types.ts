/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** One stored identity, as kept in the `[api]` section of a zuliprc. */
export interface CredentialRecord {
  readonly loginId: string;
  readonly apiKey: string;
  readonly serverUrl: string;
}
