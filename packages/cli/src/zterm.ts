/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ConfigurationManager,
  DebugLogger,
  FatalConfigError,
  FatalCredentialsError,
  FatalError,
  ServerConnectionFailure,
  defaultZuliprcPath,
  describeInsecurePermissions,
  describeMalformed,
  describeUnreadable,
  expandHome,
  getErrorMessage,
  loadCredentials,
  type LoadFailure,
  type LoadedZuliprc,
  type SessionControllerFactory,
  type SessionOptions,
  type ThemeSpec,
} from '@zterm/core';
import { interactiveLogin } from './auth/login.js';
import { terminalPrompts, type LoginPrompts } from './auth/prompts.js';
import {
  ArgumentParseError,
  SCRIPT_NAME,
  parseArguments,
  usageText,
  type CliArgs,
} from './config/args.js';
import {
  describeSettings,
  resolveSettings,
  toSessionSettings,
} from './config/settings.js';
import { createDefaultController } from './session/defaultController.js';
import { inColor, linesInColor } from './ui/colors.js';
import {
  createThemeRegistry,
  loadBuiltinThemes,
} from './ui/themes/theme-registry.js';
import {
  MONOCHROME_THEME,
  ThemeResolver,
} from './ui/themes/theme-resolver.js';
import { CpuProfiler } from './utils/profiler.js';
import { getCliVersion } from './utils/version.js';

const logger = DebugLogger.getLogger('zterm:cli:main');

const HELP_STREAM_URL =
  'https://chat.zulip.org/#narrow/stream/206-zulip-terminal';

export interface MainDeps {
  createController: SessionControllerFactory;
  prompts: LoginPrompts;
  /** Base for `~` and the default zuliprc location. */
  homeDir?: string;
  /** Registered after the built-in themes; a same-named one replaces it. */
  extraThemes?: readonly ThemeSpec[];
}

export const defaultDeps: MainDeps = {
  createController: createDefaultController,
  prompts: terminalPrompts,
};

function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

function credentialsError(failure: LoadFailure): FatalCredentialsError {
  switch (failure.kind) {
    case 'not-found':
      return new FatalCredentialsError(
        `zuliprc file was not found at ${failure.path}`,
      );
    case 'insecure-permissions':
      return new FatalCredentialsError(
        describeInsecurePermissions(failure.path, failure.currentMode).join(
          '\n',
        ),
      );
    case 'malformed':
      return new FatalCredentialsError(
        describeMalformed(failure.path, failure.reason),
      );
    case 'unreadable':
      return new FatalCredentialsError(
        describeUnreadable(failure.path, failure.code),
      );
    default: {
      const unreachable: never = failure;
      return unreachable;
    }
  }
}

/**
 * Loads the zuliprc, running the first-run login when there is none.
 */
async function ensureCredentials(
  zuliprcPath: string,
  prompts: LoginPrompts,
): Promise<LoadedZuliprc> {
  let result = await loadCredentials(zuliprcPath);
  if (!result.ok && result.error.kind === 'not-found') {
    await interactiveLogin(zuliprcPath, prompts);
    result = await loadCredentials(zuliprcPath);
  }
  if (!result.ok) {
    throw credentialsError(result.error);
  }
  return result.value;
}

function zuliprcPathFor(args: CliArgs, homeDir?: string): string {
  return args.configFile === undefined
    ? defaultZuliprcPath(homeDir)
    : expandHome(args.configFile, homeDir);
}

async function saveProfile(profiler: CpuProfiler): Promise<void> {
  let outputPath: string;
  try {
    outputPath = await profiler.stop();
  } catch (error) {
    logger.error(() => `could not save the CPU profile: ${getErrorMessage(error)}`);
    return;
  }
  console.log(`Profile data saved to ${outputPath}.`);
  console.log('Open it in the Performance panel of Chrome DevTools.');
}

async function withProfiling<T>(
  enabled: boolean,
  body: () => Promise<T>,
): Promise<T> {
  if (!enabled) {
    return body();
  }
  const profiler = new CpuProfiler();
  await profiler.start();
  try {
    return await body();
  } finally {
    await saveProfile(profiler);
  }
}

async function bootstrap(
  argv: readonly string[],
  deps: MainDeps,
): Promise<number> {
  const args = await parseArguments(argv);

  if (args.help) {
    console.log(await usageText());
    return 0;
  }
  if (args.version) {
    console.log(`Zulip Terminal ${await getCliVersion()}`);
    return 0;
  }
  if (args.debug) {
    ConfigurationManager.getInstance().setCliConfig({
      enabled: true,
      namespaces: ['zterm:*'],
    });
  }

  const catalog = loadBuiltinThemes();
  const themes = new ThemeResolver(
    createThemeRegistry(catalog.themes, deps.extraThemes),
    catalog.requiredStyles,
  );

  if (args.listThemes) {
    printLines([
      'The following themes are available:',
      themes.listThemes(),
      'Specify theme in zuliprc file or override using -t/--theme options on command line.',
    ]);
    return 0;
  }

  const zuliprcPath = zuliprcPathFor(args, deps.homeDir);
  const zuliprc = await ensureCredentials(zuliprcPath, deps.prompts);

  const settings = resolveSettings(
    zuliprc.settings,
    { theme: args.theme, autohide: args.autohide, colorDepth: args.colorDepth },
    themes,
  );
  printLines(describeSettings(settings));
  printLines(linesInColor('yellow', settings.themeWarnings));

  const themeName =
    settings.colorDepth.value === '1' ? MONOCHROME_THEME : settings.theme.value;
  const theme = themes.getTheme(themeName);
  if (!theme) {
    throw new FatalConfigError(`Theme '${themeName}' could not be loaded.`);
  }

  const options: SessionOptions = {
    zuliprcPath,
    credentials: zuliprc.record,
    settings: toSessionSettings(settings),
    theme,
    explore: args.explore,
    debug: args.debug,
  };

  await withProfiling(args.profile, async () => {
    const controller = await deps.createController(options);
    await controller.run();
  });
  return 0;
}

function reportError(error: unknown): number {
  if (error instanceof ArgumentParseError) {
    console.error(error.usage);
    console.error(`${SCRIPT_NAME}: error: ${error.message}`);
    return error.exitCode;
  }
  if (error instanceof ServerConnectionFailure) {
    console.log('');
    console.log(
      inColor('red', `Error connecting to Zulip server: ${error.message}.`),
    );
    return 1;
  }
  if (error instanceof FatalError) {
    printLines(linesInColor('red', error.message.split('\n')));
    if (error.helperText) {
      console.log(error.helperText);
    }
    return error.exitCode;
  }

  logger.error(() =>
    error instanceof Error && error.stack ? error.stack : getErrorMessage(error),
  );
  printLines([
    inColor('red', 'Zulip Terminal has crashed!'),
    `Please ask for help at ${HELP_STREAM_URL}`,
    `(${getErrorMessage(error)})`,
  ]);
  return 1;
}

/**
 * Runs the bootstrap for `argv` (without the node binary and script path)
 * and returns the process exit code. Every error is reported here, once.
 */
export async function main(
  argv: readonly string[],
  deps: MainDeps = defaultDeps,
): Promise<number> {
  try {
    return await bootstrap(argv, deps);
  } catch (error) {
    return reportError(error);
  } finally {
    await DebugLogger.flushAll();
  }
}
