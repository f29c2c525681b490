/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach } from 'vitest';
import {
  ConfigurationManager,
  DebugLogger,
  FileOutput,
} from '@zterm/core';

// Debug logging from the developer's shell must not leak into test runs.
for (const name of ['DEBUG', 'ZTERM_DEBUG', 'DEBUG_LEVEL', 'DEBUG_OUTPUT']) {
  delete process.env[name];
}

afterEach(() => {
  DebugLogger.disposeAll();
  ConfigurationManager.resetForTesting();
  FileOutput.resetForTesting();
});
