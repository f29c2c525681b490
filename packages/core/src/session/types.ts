/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CredentialRecord } from '../credentials/types.js';

export type AutohideSetting = 'autohide' | 'no_autohide';
export type FootlinksSetting = 'enabled' | 'disabled';
export type NotifySetting = 'enabled' | 'disabled';
export type ColorDepth = '1' | '16' | '256' | '24bit';

/** A style entry: name, foreground and background color tokens. */
export type ThemeStyle = readonly [style: string, fg: string, bg: string];

export interface ThemeSpec {
  readonly name: string;
  readonly styles: readonly ThemeStyle[];
}

export interface SessionSettings {
  theme: string;
  autohide: AutohideSetting;
  footlinks: FootlinksSetting;
  notify: NotifySetting;
  colorDepth: ColorDepth;
}

/** Everything the interactive session is started with. */
export interface SessionOptions {
  zuliprcPath: string;
  credentials: CredentialRecord;
  settings: SessionSettings;
  theme: ThemeSpec;
  /** Read-only mode: nothing is sent to the server. */
  explore: boolean;
  debug: boolean;
}

export interface SessionController {
  run(): Promise<void>;
}

/**
 * Builds the controller for a session. Throwing ServerConnectionFailure
 * here, or from `run`, is reported as a connection error.
 */
export type SessionControllerFactory = (
  options: SessionOptions,
) => SessionController | Promise<SessionController>;
