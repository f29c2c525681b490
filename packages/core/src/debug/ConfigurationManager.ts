/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import * as os from 'node:os';
import { ZTERM_DIR } from '../utils/paths.js';
import type { DebugLevel, DebugSettings } from './types.js';

const DEBUG_LEVELS: readonly DebugLevel[] = ['debug', 'log', 'warn', 'error'];

function isDebugLevel(value: string): value is DebugLevel {
  return DEBUG_LEVELS.some((level) => level === value);
}

/**
 * Holds the effective debug logging configuration.
 *
 * Layers, lowest precedence first: built-in defaults, environment
 * (`DEBUG`, `ZTERM_DEBUG`, `DEBUG_LEVEL`, `DEBUG_OUTPUT`), the command line
 * (`--debug`) and ephemeral overrides set at run time. Loggers subscribe to
 * be told when the merged result changes.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings;
  private envConfig: Partial<DebugSettings> | null = null;
  private cliConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private readonly listeners: Set<() => void> = new Set();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  /**
   * Drops the singleton so the next getInstance() re-reads the environment.
   */
  static resetForTesting(): void {
    ConfigurationManager.instance = undefined;
  }

  private constructor() {
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'debug',
      output: {
        target: 'file',
        directory: path.join(os.homedir(), ZTERM_DIR, 'debug'),
      },
      redactPatterns: ['apiKey', 'api_key', 'key', 'password', 'token'],
    };
    this.mergedConfig = this.defaultConfig;
    this.loadEnvironmentConfig();
    this.mergeConfigurations();
  }

  private loadEnvironmentConfig(): void {
    if (process.env.DEBUG) {
      const namespaces = this.parseDebugEnv(process.env.DEBUG).filter(
        (ns) => ns.startsWith('zterm') || ns === '*',
      );
      if (namespaces.length > 0) {
        this.envConfig = { enabled: true, namespaces };
      }
    }

    if (process.env.ZTERM_DEBUG) {
      this.envConfig = {
        enabled: true,
        namespaces: this.parseDebugEnv(process.env.ZTERM_DEBUG),
      };
    }

    const level = process.env.DEBUG_LEVEL;
    if (level && isDebugLevel(level)) {
      this.envConfig = { ...this.envConfig, level };
    }

    if (process.env.DEBUG_OUTPUT) {
      this.envConfig = {
        ...this.envConfig,
        output: {
          ...this.defaultConfig.output,
          target: process.env.DEBUG_OUTPUT,
        },
      };
    }
  }

  private mergeConfigurations(): void {
    let merged: DebugSettings = { ...this.defaultConfig };
    for (const layer of [
      this.envConfig,
      this.cliConfig,
      this.ephemeralConfig,
    ]) {
      if (layer) {
        merged = { ...merged, ...layer };
      }
    }
    this.mergedConfig = merged;

    this.listeners.forEach((listener) => listener());
  }

  setCliConfig(config: Partial<DebugSettings>): void {
    this.cliConfig = config;
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getOutputTarget(): string {
    return this.mergedConfig.output.target;
  }

  getOutputDirectory(): string {
    return (
      this.mergedConfig.output.directory ??
      path.join(os.homedir(), ZTERM_DIR, 'debug')
    );
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private parseDebugEnv(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
