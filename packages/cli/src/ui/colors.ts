/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Chalk } from 'chalk';

export type DiagnosticColor =
  | 'red'
  | 'green'
  | 'yellow'
  | 'blue'
  | 'purple'
  | 'cyan';

// Bootstrap output is always colored with the bright 16-color codes,
// whatever the terminal reports.
const chalk = new Chalk({ level: 1 });

const STYLERS: Record<DiagnosticColor, (text: string) => string> = {
  red: chalk.redBright,
  green: chalk.greenBright,
  yellow: chalk.yellowBright,
  blue: chalk.blueBright,
  purple: chalk.magentaBright,
  cyan: chalk.cyanBright,
};

/** Wraps `text` in the bright ANSI code for `color` and resets after it. */
export function inColor(color: DiagnosticColor, text: string): string {
  return STYLERS[color](text);
}

/** Colors each line on its own so every printed line is self-contained. */
export function linesInColor(
  color: DiagnosticColor,
  lines: readonly string[],
): string[] {
  return lines.map((line) => inColor(color, line));
}
