/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach } from 'vitest';
import { ConfigurationManager } from './src/debug/ConfigurationManager.js';
import { DebugLogger } from './src/debug/DebugLogger.js';
import { FileOutput } from './src/debug/FileOutput.js';

// Debug logging from the developer's shell must not leak into test runs.
for (const name of ['DEBUG', 'ZTERM_DEBUG', 'DEBUG_LEVEL', 'DEBUG_OUTPUT']) {
  delete process.env[name];
}

afterEach(() => {
  DebugLogger.disposeAll();
  ConfigurationManager.resetForTesting();
  FileOutput.resetForTesting();
});
