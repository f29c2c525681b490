/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it, vi } from 'vitest';
import { FatalConfigError } from '@zterm/core';
import {
  createThemeRegistry,
  loadBuiltinThemes,
} from '../ui/themes/theme-registry.js';
import { ThemeResolver } from '../ui/themes/theme-resolver.js';
import {
  describeSettings,
  resolveSettings,
  toSessionSettings,
} from './settings.js';

const catalog = loadBuiltinThemes();
const themes = new ThemeResolver(
  createThemeRegistry(catalog.themes),
  catalog.requiredStyles,
);

const noConfig = new Map<string, string>();

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('resolveSettings', () => {
  it('uses the built-in defaults when nothing is configured', () => {
    const resolved = resolveSettings(noConfig, {}, themes);

    expect(toSessionSettings(resolved)).toEqual({
      theme: 'zt_dark',
      autohide: 'no_autohide',
      footlinks: 'enabled',
      notify: 'disabled',
      colorDepth: '256',
    });
    expect(describeSettings(resolved)).toEqual([
      'Loading with:',
      "   theme 'zt_dark' specified with no config.",
      "   autohide setting 'no_autohide' specified with no config.",
      "   footlinks setting 'enabled' specified with no config.",
      "   color depth setting '256' specified with no config.",
    ]);
  });

  it('takes values from the config file', () => {
    const zterm = new Map([
      ['theme', 'zt_light'],
      ['autohide', 'autohide'],
      ['footlinks', 'disabled'],
      ['notify', 'enabled'],
      ['color-depth', '16'],
    ]);

    const resolved = resolveSettings(zterm, {}, themes);

    expect(toSessionSettings(resolved)).toEqual({
      theme: 'zt_light',
      autohide: 'autohide',
      footlinks: 'disabled',
      notify: 'enabled',
      colorDepth: '16',
    });
    expect(resolved.colorDepth.provenance).toBe('from_config');
  });

  it('lets the command line override the config file', () => {
    const zterm = new Map([
      ['theme', 'zt_light'],
      ['autohide', 'autohide'],
    ]);

    const resolved = resolveSettings(
      zterm,
      { theme: 'gruvbox_dark', autohide: 'no_autohide', colorDepth: '24bit' },
      themes,
    );

    expect(describeSettings(resolved).slice(1)).toEqual([
      "   theme 'gruvbox_dark' specified on command line.",
      "   autohide setting 'no_autohide' specified on command line.",
      "   footlinks setting 'enabled' specified with no config.",
      "   color depth setting '24bit' specified on command line.",
    ]);
  });

  it('records a theme alias with its canonical name', () => {
    const resolved = resolveSettings(new Map([['theme', 'gruvbox']]), {}, themes);

    expect(resolved.theme).toEqual({
      value: 'gruvbox_dark',
      provenance: 'from_config',
      alias: 'gruvbox',
    });
    expect(describeSettings(resolved)[1]).toBe(
      "   theme 'gruvbox_dark' specified in config file (by alias 'gruvbox').",
    );
  });

  it('freezes the result and carries the theme warnings', () => {
    const resolved = resolveSettings(noConfig, {}, themes);

    expect(Object.isFrozen(resolved)).toBe(true);
    expect(Object.isFrozen(resolved.theme)).toBe(true);
    expect(resolved.themeWarnings).toEqual([]);
  });

  it('takes the theme the resolver chose', () => {
    const resolver = new ThemeResolver(
      createThemeRegistry(catalog.themes),
      catalog.requiredStyles,
    );
    const resolveSpy = vi
      .spyOn(resolver, 'resolve')
      .mockReturnValue({ chosenTheme: 'zt_light', warnings: [] });

    const resolved = resolveSettings(
      new Map([['theme', 'gruvbox']]),
      {},
      resolver,
    );

    expect(resolveSpy).toHaveBeenCalledWith('gruvbox_dark', 'from_config');
    expect(resolved.theme).toEqual({
      value: 'zt_light',
      provenance: 'from_config',
      alias: 'gruvbox',
    });
  });

  it('ignores unknown [zterm] keys', () => {
    const resolved = resolveSettings(new Map([['editor', 'vim']]), {}, themes);
    expect(resolved.theme.value).toBe('zt_dark');
  });

  it('rejects an unknown theme with the list of themes', () => {
    const error = captureError(() =>
      resolveSettings(noConfig, { theme: 'solarized' }, themes),
    );

    expect(error).toBeInstanceOf(FatalConfigError);
    expect(error).toMatchObject({
      message: "Invalid theme 'solarized' was specified on command line.",
      exitCode: 1,
      helperText: [
        'The following themes are available:',
        '  zt_dark (default)',
        '  gruvbox_dark',
        '  zt_light',
        '  zt_blackandwhite',
        'Specify theme in zuliprc file or override using -t/--theme options on command line.',
      ].join('\n'),
    });
  });

  it('rejects an invalid option value from the config file', () => {
    const error = captureError(() =>
      resolveSettings(new Map([['footlinks', 'maybe']]), {}, themes),
    );

    expect(error).toMatchObject({
      message: "Invalid footlinks setting 'maybe' was specified in config file.",
      helperText: [
        'The following options are available:',
        '  enabled',
        '  disabled',
        'Specify the footlinks option in zuliprc file.',
      ].join('\n'),
    });
  });

  it('rejects an invalid color depth', () => {
    expect(() =>
      resolveSettings(new Map([['color-depth', '8']]), {}, themes),
    ).toThrow("Invalid color depth setting '8' was specified in config file.");
  });
});
