/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createInterface } from 'node:readline/promises';
import { password } from '@inquirer/prompts';
import { inColor } from '../ui/colors.js';

/** Line-based input for the first-run login. */
export interface LoginPrompts {
  text(label: string): Promise<string>;
  /** Input that is never echoed. */
  secret(label: string): Promise<string>;
}

async function readLine(label: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(inColor('blue', label))).trim();
  } finally {
    rl.close();
  }
}

async function readSecret(label: string): Promise<string> {
  return password({ message: label, mask: '*' });
}

export const terminalPrompts: LoginPrompts = {
  text: readLine,
  secret: readSecret,
};
