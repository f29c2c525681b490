/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import {
  FatalArgumentError,
  getErrorMessage,
  type AutohideSetting,
  type ColorDepth,
} from '@zterm/core';
import { SETTINGS_SCHEMA } from './settingsSchema.js';

export const SCRIPT_NAME = 'zterm';

export interface CliArgs {
  theme: string | undefined;
  listThemes: boolean;
  autohide: AutohideSetting | undefined;
  debug: boolean;
  profile: boolean;
  configFile: string | undefined;
  explore: boolean;
  colorDepth: ColorDepth | undefined;
  version: boolean;
  help: boolean;
}

/**
 * Raised for anything the parser rejects; carries the usage text so the
 * caller can print it above the error.
 */
export class ArgumentParseError extends FatalArgumentError {
  constructor(
    message: string,
    readonly usage: string,
  ) {
    super(message);
    this.name = 'ArgumentParseError';
  }
}

function buildParser(argv: readonly string[]) {
  return (
    yargs([...argv])
      .locale('en')
      .scriptName(SCRIPT_NAME)
      .usage('Usage: $0 [options]')
      .parserConfiguration({ 'boolean-negation': false })
      // Built-in help and version would print and exit on their own.
      .help(false)
      .version(false)
      .exitProcess(false)
      .strict()
      .wrap(80)
      .option('theme', {
        alias: 't',
        type: 'string',
        description: 'Choose color theme. (e.g. blue, light)',
      })
      .option('list-themes', {
        type: 'boolean',
        default: false,
        description: 'List all the color themes.',
      })
      .option('autohide', {
        type: 'boolean',
        description: 'Autohide list of users and streams.',
      })
      .option('no-autohide', {
        type: 'boolean',
        description: "Don't autohide list of users and streams.",
      })
      .option('debug', {
        alias: 'd',
        type: 'boolean',
        default: false,
        description: 'Start zterm in debug mode.',
      })
      .option('profile', {
        type: 'boolean',
        default: false,
        description: 'Profile runtime.',
      })
      .option('config-file', {
        alias: 'c',
        type: 'string',
        description: 'Config file downloaded from your zulip organization (default: ~/zuliprc)',
      })
      .option('explore', {
        alias: 'e',
        type: 'boolean',
        default: false,
        description: 'Do not mark messages as read in the session.',
      })
      .option('color-depth', {
        type: 'string',
        choices: SETTINGS_SCHEMA.colorDepth.options,
        description: 'Force the color depth (default 256).',
      })
      .option('version', {
        alias: 'v',
        type: 'boolean',
        default: false,
        description: 'Print zterm version and exit.',
      })
      .option('help', {
        alias: 'h',
        type: 'boolean',
        default: false,
        description: 'Show this help message and exit.',
      })
      .check((args) => {
        if (args.autohide && args['no-autohide']) {
          throw new Error(
            'Arguments --autohide and --no-autohide are mutually exclusive',
          );
        }
        return true;
      })
  );
}

export async function usageText(): Promise<string> {
  return buildParser([]).getHelp();
}

/**
 * Parses `argv` (without the node binary and script path).
 *
 * @throws ArgumentParseError for unknown options, bad values or
 *   conflicting flags.
 */
export async function parseArguments(argv: readonly string[]): Promise<CliArgs> {
  const failures: string[] = [];
  const parser = buildParser(argv).fail((message, error) => {
    failures.push(message || getErrorMessage(error));
  });
  const result = await parser.parseAsync();

  if (failures.length > 0) {
    throw new ArgumentParseError(failures[0], await usageText());
  }

  const colorDepth = SETTINGS_SCHEMA.colorDepth.options.find(
    (option) => option === result.colorDepth,
  );

  return {
    theme: result.theme,
    listThemes: result.listThemes,
    autohide: result.autohide
      ? 'autohide'
      : result['no-autohide']
        ? 'no_autohide'
        : undefined,
    debug: result.debug,
    profile: result.profile,
    configFile: result.configFile,
    explore: result.explore,
    colorDepth,
    version: result.version,
    help: result.help,
  };
}
