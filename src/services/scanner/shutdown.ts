import fs from 'node:fs/promises';
import path from 'node:path';
import pino from 'pino';
import { isMissingFile } from '../state/atomic-store.js';

const log = pino({ name: 'shutdown' });

export interface ShutdownSignal {
  isRequested(): Promise<boolean>;
  clear(): Promise<void>;
}

/**
 * Shutdown requested either by a sentinel file (from another process) or by
 * `trigger()` (from a signal handler in this one).
 */
export class FileShutdownSignal implements ShutdownSignal {
  private triggered = false;

  constructor(private readonly sentinelPath: string) {}

  trigger(): void {
    this.triggered = true;
  }

  async request(now = new Date()): Promise<void> {
    await fs.mkdir(path.dirname(this.sentinelPath), { recursive: true });
    await fs.writeFile(this.sentinelPath, `${now.toISOString()}\n`, 'utf8');
    log.info({ sentinel: this.sentinelPath }, 'Shutdown requested');
  }

  async isRequested(): Promise<boolean> {
    if (this.triggered) return true;
    try {
      await fs.access(this.sentinelPath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  async clear(): Promise<void> {
    this.triggered = false;
    await fs.rm(this.sentinelPath, { force: true });
  }
}
