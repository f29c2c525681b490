/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type DebugLevel = 'debug' | 'log' | 'warn' | 'error';

export interface DebugOutputConfig {
  /** Comma separated targets: `file`, `stderr` or both. */
  target: string;
  directory?: string;
}

export interface DebugSettings {
  enabled: boolean;
  namespaces: string[];
  level: DebugLevel;
  output: DebugOutputConfig;
  redactPatterns: string[];
}

export interface LogEntry {
  timestamp: string;
  namespace: string;
  level: DebugLevel;
  message: string;
  args?: unknown[];
  runId: string;
  pid: number;
}
