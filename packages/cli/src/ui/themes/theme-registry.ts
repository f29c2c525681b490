/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DebugLogger, type ThemeSpec } from '@zterm/core';

const logger = DebugLogger.getLogger('zterm:cli:themes');

export const BUILTIN_THEMES_FILE = new URL('./data/themes.json', import.meta.url);

const ThemeStyleSchema = z.tuple([z.string(), z.string(), z.string()]);

export const ThemeFileSchema = z.object({
  palette: z.array(z.string()).nonempty(),
  attributes: z.array(z.string()),
  requiredStyles: z.array(z.string()).nonempty(),
  themes: z.record(z.string(), z.array(ThemeStyleSchema)),
});

export type ThemeRegistry = ReadonlyMap<string, ThemeSpec>;

export interface ThemeCatalog {
  /** Style names a theme must define to count as complete. */
  requiredStyles: readonly string[];
  themes: readonly ThemeSpec[];
}

/**
 * A color token is a comma-separated list of one palette color and any
 * number of attributes, e.g. `light red, bold`.
 */
export function isValidColorToken(
  token: string,
  palette: ReadonlySet<string>,
  attributes: ReadonlySet<string>,
): boolean {
  const parts = token.split(',').map((part) => part.trim());
  const colors = parts.filter((part) => palette.has(part));
  return (
    colors.length <= 1 &&
    parts.every((part) => palette.has(part) || attributes.has(part))
  );
}

export function parseThemeFile(data: unknown): ThemeCatalog {
  const file = ThemeFileSchema.parse(data);
  const palette = new Set(file.palette);
  const attributes = new Set(file.attributes);

  const themes: ThemeSpec[] = [];
  for (const [name, styles] of Object.entries(file.themes)) {
    const invalid = styles.find(
      ([, fg, bg]) =>
        !isValidColorToken(fg, palette, attributes) ||
        !isValidColorToken(bg, palette, attributes),
    );
    if (invalid) {
      logger.warn(() => `dropping theme ${name}: invalid style ${invalid[0]}`);
      continue;
    }
    themes.push({ name, styles });
  }

  return { requiredStyles: file.requiredStyles, themes };
}

export function loadBuiltinThemes(file: URL = BUILTIN_THEMES_FILE): ThemeCatalog {
  const data: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return parseThemeFile(data);
}

/**
 * Builds the registry in insertion order. An extra theme with the name of
 * a built-in one replaces it in place.
 */
export function createThemeRegistry(
  builtins: Iterable<ThemeSpec>,
  extraThemes: Iterable<ThemeSpec> = [],
): ThemeRegistry {
  const registry = new Map<string, ThemeSpec>();
  for (const theme of builtins) {
    registry.set(theme.name, theme);
  }
  for (const theme of extraThemes) {
    registry.set(theme.name, theme);
  }
  return registry;
}
