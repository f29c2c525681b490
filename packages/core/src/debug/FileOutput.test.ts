/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileOutput } from './FileOutput.js';
import type { LogEntry } from './types.js';

function entry(message: string): LogEntry {
  return {
    timestamp: '2026-01-01T00:00:00.000Z',
    namespace: 'zterm:test',
    level: 'debug',
    message,
    runId: 'run',
    pid: 1,
  };
}

describe('FileOutput', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'zterm-fileoutput-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('appends entries as JSONL in the debug directory', async () => {
    const debugDir = path.join(tmpDir, 'debug');
    const output = new FileOutput(debugDir);

    await output.write(entry('first'));
    await output.dispose();

    expect(path.dirname(output.logFile)).toBe(debugDir);
    const lines = (await fs.readFile(output.logFile, 'utf8'))
      .trim()
      .split('\n');
    expect(lines.map((line) => JSON.parse(line).message)).toEqual(['first']);
  });

  it('creates the log file without group or other access', async () => {
    const output = new FileOutput(tmpDir);

    await output.write(entry('secret-free'));
    await output.dispose();

    const stats = await fs.stat(output.logFile);
    expect(stats.mode & 0o077).toBe(0);
  });

  it('flush waits for entries queued behind an in-flight write', async () => {
    const output = new FileOutput(tmpDir);

    void output.write(entry('first'));
    void output.write(entry('second'));
    void output.write(entry('third'));
    await output.flush();

    const lines = (await fs.readFile(output.logFile, 'utf8'))
      .trim()
      .split('\n');
    expect(lines.map((line) => JSON.parse(line).message)).toEqual([
      'first',
      'second',
      'third',
    ]);
  });

  it('ignores writes after dispose', async () => {
    const output = new FileOutput(tmpDir);
    await output.dispose();

    await output.write(entry('late'));

    await expect(fs.stat(output.logFile)).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });

  it('moves to a new file when the directory changes', () => {
    const output = new FileOutput(tmpDir);
    const other = path.join(tmpDir, 'other');

    output.setDirectory(other);

    expect(path.dirname(output.logFile)).toBe(other);
  });
});
