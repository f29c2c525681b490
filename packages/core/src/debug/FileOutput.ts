/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import type { LogEntry } from './types.js';

interface QueuedEntry {
  entry: LogEntry;
  timestamp: number;
}

const LOG_FILE_DATE_LENGTH = 10;

/**
 * Appends log entries as JSONL to a per-run file in the debug directory.
 * Writes are queued and flushed in batches so logging never blocks the
 * caller on disk I/O.
 */
export class FileOutput {
  private static instance: FileOutput | undefined;
  private readonly debugRunId: string;
  private debugDir: string;
  private currentLogFile: string;
  private writeQueue: QueuedEntry[] = [];
  private inFlight: Promise<boolean> | null = null;
  private disposed = false;
  private flushTimeout: NodeJS.Timeout | null = null;
  private readonly maxQueueSize = 1000;
  private readonly batchSize = 50;
  private readonly flushInterval = 1000;

  constructor(debugDir: string) {
    this.debugDir = debugDir;
    this.debugRunId = process.env.ZTERM_DEBUG_RUN_ID || String(process.pid);
    this.currentLogFile = this.generateLogFileName();
  }

  static getInstance(debugDir: string): FileOutput {
    if (!FileOutput.instance) {
      FileOutput.instance = new FileOutput(debugDir);
    }
    return FileOutput.instance;
  }

  static resetForTesting(): void {
    FileOutput.instance = undefined;
  }

  get runId(): string {
    return this.debugRunId;
  }

  get logFile(): string {
    return this.currentLogFile;
  }

  setDirectory(debugDir: string): void {
    if (debugDir !== this.debugDir) {
      this.debugDir = debugDir;
      this.currentLogFile = this.generateLogFileName();
    }
  }

  async write(entry: LogEntry): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.writeQueue.push({ entry, timestamp: Date.now() });

    if (this.writeQueue.length > this.maxQueueSize) {
      this.writeQueue = this.writeQueue.slice(-this.maxQueueSize);
    }

    if (this.writeQueue.length >= this.batchSize || !this.inFlight) {
      await this.flushQueue();
    } else {
      this.startFlushTimer();
    }
  }

  /**
   * Resolves once every queued entry is on disk, waiting out a write that
   * is already in flight. Stops early if a batch fails to write.
   */
  async flush(): Promise<void> {
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }

    while (!this.disposed && (this.inFlight || this.writeQueue.length > 0)) {
      if (this.inFlight) {
        await this.inFlight;
        continue;
      }
      if (!(await this.flushQueue())) {
        return;
      }
    }
  }

  async dispose(): Promise<void> {
    await this.flush();
    this.disposed = true;
  }

  private startFlushTimer(): void {
    if (this.disposed || this.flushTimeout) {
      return;
    }

    this.flushTimeout = setTimeout(() => {
      this.flushTimeout = null;
      void this.flushQueue().then(() => {
        if (this.writeQueue.length > 0) {
          this.startFlushTimer();
        }
      });
    }, this.flushInterval);
    this.flushTimeout.unref();
  }

  private flushQueue(): Promise<boolean> {
    if (this.inFlight || this.writeQueue.length === 0 || this.disposed) {
      return Promise.resolve(true);
    }

    const entriesToWrite = this.writeQueue.splice(0, this.batchSize);
    const pending = this.appendBatch(entriesToWrite).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = pending;
    return pending;
  }

  private async appendBatch(entriesToWrite: QueuedEntry[]): Promise<boolean> {
    try {
      await fs.mkdir(this.debugDir, { recursive: true, mode: 0o700 });

      const jsonlData =
        entriesToWrite.map(({ entry }) => JSON.stringify(entry)).join('\n') +
        '\n';

      await fs.appendFile(this.currentLogFile, jsonlData, {
        encoding: 'utf8',
        mode: 0o600,
      });
      return true;
    } catch (error) {
      // Report on stderr and requeue the batch.
      console.error('FileOutput: Failed to write log entries:', error);
      if (this.writeQueue.length < this.maxQueueSize / 2) {
        this.writeQueue.unshift(...entriesToWrite);
      }
      return false;
    }
  }

  private generateLogFileName(): string {
    const datePart = new Date().toISOString().slice(0, LOG_FILE_DATE_LENGTH);
    return join(
      this.debugDir,
      `zterm-debug-${this.debugRunId}-${datePart}.jsonl`,
    );
  }
}
