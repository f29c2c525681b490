/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger, type ThemeSpec } from '@zterm/core';
import type { ThemeRegistry } from './theme-registry.js';

const logger = DebugLogger.getLogger('zterm:cli:themes');

export const DEFAULT_THEME = 'zt_dark';
export const MONOCHROME_THEME = 'zt_blackandwhite';

export const THEME_ALIASES: ReadonlyMap<string, string> = new Map([
  ['default', 'zt_dark'],
  ['gruvbox', 'gruvbox_dark'],
  ['light', 'zt_light'],
  ['blackandwhite', 'zt_blackandwhite'],
]);

/** Where a setting's value came from. */
export type Provenance = 'from_cli' | 'from_config' | 'default';

const PROVENANCE_PHRASES: Record<Provenance, string> = {
  from_cli: 'on command line',
  from_config: 'in config file',
  default: 'with no config',
};

/** `on command line`, `in config file` or `with no config`. */
export function describeProvenance(provenance: Provenance): string {
  return PROVENANCE_PHRASES[provenance];
}

export interface ThemeClassification {
  complete: string[];
  incomplete: string[];
}

export interface ThemeResolution {
  chosenTheme: string;
  warnings: string[];
}

const MAX_SUGGESTIONS = 2;

/**
 * Decides which themes are usable and what to say about a requested one.
 * Classification is recomputed on each call, so a registry that gains
 * themes is always judged against its current contents.
 */
export class ThemeResolver {
  constructor(
    private readonly registry: ThemeRegistry,
    private readonly requiredStyles: readonly string[],
    private readonly aliases: ReadonlyMap<string, string> = THEME_ALIASES,
  ) {}

  classify(): ThemeClassification {
    const complete: string[] = [];
    const incomplete: string[] = [];
    for (const theme of this.registry.values()) {
      const defined = new Set(theme.styles.map(([style]) => style));
      if (this.requiredStyles.every((style) => defined.has(style))) {
        complete.push(theme.name);
      } else {
        incomplete.push(theme.name);
      }
    }
    return { complete, incomplete };
  }

  /**
   * The requested theme is always the chosen one; an incomplete theme is
   * used as-is and only flagged.
   */
  resolve(requestedTheme: string, provenance: Provenance): ThemeResolution {
    const { complete, incomplete } = this.classify();
    logger.debug(
      () => `theme ${requestedTheme} specified ${describeProvenance(provenance)}`,
    );
    if (!incomplete.includes(requestedTheme)) {
      return { chosenTheme: requestedTheme, warnings: [] };
    }

    const suggestion =
      complete.length > 0
        ? `      (you could try: ${complete.slice(0, MAX_SUGGESTIONS).join(', ')})`
        : '      (all themes are incomplete)';
    return {
      chosenTheme: requestedTheme,
      warnings: ['   WARNING: Incomplete theme; results may vary!', suggestion],
    };
  }

  /** Resolves an alias to its theme; `undefined` for unknown names. */
  canonicalName(name: string): string | undefined {
    if (this.registry.has(name)) {
      return name;
    }
    const target = this.aliases.get(name);
    return target !== undefined && this.registry.has(target) ? target : undefined;
  }

  getTheme(name: string): ThemeSpec | undefined {
    const canonical = this.canonicalName(name);
    return canonical === undefined ? undefined : this.registry.get(canonical);
  }

  /** One indented line per theme, the default one marked. */
  listThemes(): string {
    return [...this.registry.keys()]
      .map((name) => (name === DEFAULT_THEME ? `  ${name} (default)` : `  ${name}`))
      .join('\n');
  }
}
