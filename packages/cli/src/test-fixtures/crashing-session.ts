/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Runs the real entry flow with a session that throws, so tests can check
// what reaches the debug log once the process has exited.

import { main } from '../zterm.js';

const refusePrompt = async (): Promise<string> => {
  throw new Error('unexpected prompt');
};

process.exitCode = await main(process.argv.slice(2), {
  createController: () => ({
    run: async () => {
      throw new Error('session exploded');
    },
  }),
  prompts: { text: refusePrompt, secret: refusePrompt },
});
