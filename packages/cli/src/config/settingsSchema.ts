/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { SessionSettings } from '@zterm/core';

export interface SettingDefinition<V extends string = string> {
  /** Name used in diagnostics, e.g. `color depth`. */
  label: string;
  /** Key in the `[zterm]` section of the zuliprc. */
  configKey: string;
  default: V;
  options: readonly V[];
  description: string;
}

type EnumSettingKey = Exclude<keyof SessionSettings, 'theme'>;

export type SettingsSchema = {
  [K in EnumSettingKey]: SettingDefinition<SessionSettings[K]>;
};

export const SETTINGS_SCHEMA: SettingsSchema = {
  autohide: {
    label: 'autohide',
    configKey: 'autohide',
    default: 'no_autohide',
    options: ['autohide', 'no_autohide'],
    description: 'Hide the side panels until they are needed.',
  },
  footlinks: {
    label: 'footlinks',
    configKey: 'footlinks',
    default: 'enabled',
    options: ['enabled', 'disabled'],
    description: 'Show the links of a message below its text.',
  },
  notify: {
    label: 'notify',
    configKey: 'notify',
    default: 'disabled',
    options: ['enabled', 'disabled'],
    description: 'Send desktop notifications for private messages and mentions.',
  },
  colorDepth: {
    label: 'color depth',
    configKey: 'color-depth',
    default: '256',
    options: ['1', '16', '256', '24bit'],
    description: 'Number of colors the terminal is asked to use.',
  },
};

export const THEME_CONFIG_KEY = 'theme';
