/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as inspector from 'node:inspector';
import { writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

export function defaultProfilePath(
  tmpDir: string = os.tmpdir(),
  pid: number = process.pid,
): string {
  return path.join(tmpDir, `zterm-profile.${pid}.cpuprofile`);
}

/**
 * V8 CPU profile of the current process, collected through the inspector
 * and written in the `.cpuprofile` format Chrome DevTools opens.
 */
export class CpuProfiler {
  private readonly session = new inspector.Session();
  private running = false;

  async start(): Promise<void> {
    this.session.connect();
    await new Promise<void>((resolve, reject) => {
      this.session.post('Profiler.enable', (error) =>
        error ? reject(error) : resolve(),
      );
    });
    await new Promise<void>((resolve, reject) => {
      this.session.post('Profiler.start', (error) =>
        error ? reject(error) : resolve(),
      );
    });
    this.running = true;
  }

  /** Stops profiling and writes the profile to `outputPath`. */
  async stop(outputPath: string = defaultProfilePath()): Promise<string> {
    if (!this.running) {
      throw new Error('Profiler was not started');
    }
    const profile = await new Promise<inspector.Profiler.Profile>(
      (resolve, reject) => {
        this.session.post('Profiler.stop', (error, result) =>
          error ? reject(error) : resolve(result.profile),
        );
      },
    );
    this.running = false;
    this.session.disconnect();

    await writeFile(outputPath, JSON.stringify(profile));
    return outputPath;
  }
}
