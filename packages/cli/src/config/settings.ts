/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DebugLogger,
  FatalConfigError,
  type AutohideSetting,
  type SessionSettings,
  type ZuliprcSection,
} from '@zterm/core';
import {
  DEFAULT_THEME,
  describeProvenance,
  type Provenance,
  type ThemeResolver,
} from '../ui/themes/theme-resolver.js';
import {
  SETTINGS_SCHEMA,
  THEME_CONFIG_KEY,
  type SettingsSchema,
} from './settingsSchema.js';

const logger = DebugLogger.getLogger('zterm:cli:settings');

/** Values given on the command line; absent flags are `undefined`. */
export interface CliSettingOverrides {
  theme?: string;
  autohide?: AutohideSetting;
  colorDepth?: string;
}

export interface ResolvedSetting<V extends string> {
  readonly value: V;
  readonly provenance: Provenance;
}

export interface ResolvedTheme extends ResolvedSetting<string> {
  /** The alias the user typed, when the theme was named through one. */
  readonly alias?: string;
}

/** Built once per run and frozen; handed on by value. */
export interface ResolvedSettings {
  readonly theme: ResolvedTheme;
  readonly themeWarnings: readonly string[];
  readonly autohide: ResolvedSetting<SessionSettings['autohide']>;
  readonly footlinks: ResolvedSetting<SessionSettings['footlinks']>;
  readonly notify: ResolvedSetting<SessionSettings['notify']>;
  readonly colorDepth: ResolvedSetting<SessionSettings['colorDepth']>;
}

type EnumSettingKey = keyof SettingsSchema;

const KNOWN_CONFIG_KEYS = new Set<string>([
  THEME_CONFIG_KEY,
  ...Object.values(SETTINGS_SCHEMA).map((definition) => definition.configKey),
]);

function pickLayer(
  cliValue: string | undefined,
  configValue: string | undefined,
): { raw: string; provenance: Provenance } | undefined {
  if (cliValue !== undefined) {
    return { raw: cliValue, provenance: 'from_cli' };
  }
  if (configValue !== undefined) {
    return { raw: configValue, provenance: 'from_config' };
  }
  return undefined;
}

function resolveEnumSetting<K extends EnumSettingKey>(
  key: K,
  zterm: ZuliprcSection,
  cliValue?: string,
): ResolvedSetting<SessionSettings[K]> {
  const definition = SETTINGS_SCHEMA[key];
  const layer = pickLayer(cliValue, zterm.get(definition.configKey));
  if (!layer) {
    return { value: definition.default, provenance: 'default' };
  }

  const value = definition.options.find((option) => option === layer.raw);
  if (value === undefined) {
    throw new FatalConfigError(
      `Invalid ${definition.label} setting '${layer.raw}' was specified ${describeProvenance(layer.provenance)}.`,
      [
        'The following options are available:',
        ...definition.options.map((option) => `  ${option}`),
        `Specify the ${definition.label} option in zuliprc file.`,
      ].join('\n'),
    );
  }
  return { value, provenance: layer.provenance };
}

function resolveTheme(
  zterm: ZuliprcSection,
  cliValue: string | undefined,
  themes: ThemeResolver,
): ResolvedTheme {
  const layer = pickLayer(cliValue, zterm.get(THEME_CONFIG_KEY));
  if (!layer) {
    return { value: DEFAULT_THEME, provenance: 'default' };
  }

  const canonical = themes.canonicalName(layer.raw);
  if (canonical === undefined) {
    throw new FatalConfigError(
      `Invalid theme '${layer.raw}' was specified ${describeProvenance(layer.provenance)}.`,
      [
        'The following themes are available:',
        themes.listThemes(),
        'Specify theme in zuliprc file or override using -t/--theme options on command line.',
      ].join('\n'),
    );
  }
  if (canonical !== layer.raw) {
    return { value: canonical, provenance: layer.provenance, alias: layer.raw };
  }
  return { value: canonical, provenance: layer.provenance };
}

/**
 * Layers built-in defaults, the `[zterm]` section of the zuliprc and the
 * command line, in that order of precedence.
 *
 * @throws FatalConfigError for an unknown theme or an invalid option value.
 */
export function resolveSettings(
  zterm: ZuliprcSection,
  cli: CliSettingOverrides,
  themes: ThemeResolver,
): ResolvedSettings {
  for (const key of zterm.keys()) {
    if (!KNOWN_CONFIG_KEYS.has(key)) {
      logger.debug(() => `ignoring unknown [zterm] key '${key}'`);
    }
  }

  const requested = resolveTheme(zterm, cli.theme, themes);
  const { chosenTheme, warnings } = themes.resolve(
    requested.value,
    requested.provenance,
  );

  return Object.freeze({
    theme: Object.freeze({ ...requested, value: chosenTheme }),
    themeWarnings: Object.freeze(warnings),
    autohide: Object.freeze(resolveEnumSetting('autohide', zterm, cli.autohide)),
    footlinks: Object.freeze(resolveEnumSetting('footlinks', zterm)),
    notify: Object.freeze(resolveEnumSetting('notify', zterm)),
    colorDepth: Object.freeze(
      resolveEnumSetting('colorDepth', zterm, cli.colorDepth),
    ),
  });
}

export function toSessionSettings(resolved: ResolvedSettings): SessionSettings {
  return {
    theme: resolved.theme.value,
    autohide: resolved.autohide.value,
    footlinks: resolved.footlinks.value,
    notify: resolved.notify.value,
    colorDepth: resolved.colorDepth.value,
  };
}

function settingLine(
  label: string,
  setting: ResolvedSetting<string>,
): string {
  return `   ${label} setting '${setting.value}' specified ${describeProvenance(setting.provenance)}.`;
}

/**
 * The `Loading with:` block, one line per setting. Theme warnings are
 * not included; they are printed after it in their own color.
 */
export function describeSettings(resolved: ResolvedSettings): string[] {
  const { theme } = resolved;
  const source = describeProvenance(theme.provenance);
  const themeSource =
    theme.alias === undefined ? source : `${source} (by alias '${theme.alias}')`;
  return [
    'Loading with:',
    `   theme '${theme.value}' specified ${themeSource}.`,
    settingLine('autohide', resolved.autohide),
    settingLine('footlinks', resolved.footlinks),
    settingLine('color depth', resolved.colorDepth),
  ];
}
