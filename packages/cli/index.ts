#!/usr/bin/env node

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { hideBin } from 'yargs/helpers';
import { main } from './src/zterm.js';

process.exitCode = await main(hideBin(process.argv));
