/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Credentials
export * from './credentials/types.js';
export * from './credentials/zuliprc.js';
export * from './credentials/permissionGuard.js';
export * from './credentials/credentialStore.js';

// Server
export * from './server/serverUrl.js';
export * from './server/serverSettings.js';
export * from './server/apiKey.js';
export * from './server/ownUser.js';

// Session
export * from './session/types.js';

// Debug logging
export * from './debug/types.js';
export { ConfigurationManager } from './debug/ConfigurationManager.js';
export { DebugLogger } from './debug/DebugLogger.js';
export { FileOutput } from './debug/FileOutput.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/fetch.js';
export * from './utils/paths.js';
