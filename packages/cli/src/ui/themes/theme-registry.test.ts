/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import {
  createThemeRegistry,
  isValidColorToken,
  loadBuiltinThemes,
  parseThemeFile,
} from './theme-registry.js';

const palette = new Set(['default', 'black', 'white', 'light red']);
const attributes = new Set(['bold', 'underline']);

describe('isValidColorToken', () => {
  it.each([
    ['white', true],
    ['light red, bold', true],
    ['white, bold, underline', true],
    ['bold', true],
    ['white, black', false],
    ['purple', false],
    ['white, sparkly', false],
  ])('%j -> %s', (token, valid) => {
    expect(isValidColorToken(token, palette, attributes)).toBe(valid);
  });
});

describe('parseThemeFile', () => {
  it('keeps valid themes in file order and drops invalid ones', () => {
    const catalog = parseThemeFile({
      palette: ['white', 'black'],
      attributes: ['bold'],
      requiredStyles: ['default'],
      themes: {
        plain: [['default', 'white', 'black']],
        broken: [['default', 'chartreuse', 'black']],
        bold: [['default', 'white, bold', 'black']],
      },
    });

    expect(catalog.requiredStyles).toEqual(['default']);
    expect(catalog.themes.map((theme) => theme.name)).toEqual(['plain', 'bold']);
  });

  it('rejects a file of the wrong shape', () => {
    expect(() => parseThemeFile({ themes: {} })).toThrow();
  });
});

describe('loadBuiltinThemes', () => {
  it('loads the four built-in themes', () => {
    const catalog = loadBuiltinThemes();

    expect(catalog.themes.map((theme) => theme.name)).toEqual([
      'zt_dark',
      'gruvbox_dark',
      'zt_light',
      'zt_blackandwhite',
    ]);
    expect(catalog.requiredStyles).toContain('default');
    expect(catalog.requiredStyles).toHaveLength(39);
  });
});

describe('createThemeRegistry', () => {
  const a = { name: 'a', styles: [] };
  const b = { name: 'b', styles: [] };

  it('appends extra themes after the built-ins', () => {
    const registry = createThemeRegistry([a, b], [{ name: 'c', styles: [] }]);
    expect([...registry.keys()]).toEqual(['a', 'b', 'c']);
  });

  it('replaces a built-in of the same name in place', () => {
    const replacement = { name: 'a', styles: [['default', 'white', 'black']] as const };
    const registry = createThemeRegistry([a, b], [replacement]);

    expect([...registry.keys()]).toEqual(['a', 'b']);
    expect(registry.get('a')).toBe(replacement);
  });
});
