/**
 * Project-wide lock with heartbeat so two controllers never drive agents
 * against the same working tree.
 *
 * - Lock file: .closer/lock.json
 * - Heartbeat: updated every 5 seconds
 * - Stale detection: heartbeat > 30s old AND PID not alive
 */

import { readFile, unlink } from 'node:fs/promises';
import { hostname } from 'node:os';
import { join } from 'node:path';
import { writeFile } from 'atomically';
import { z } from 'zod';

import { controllerError } from '../errors.js';

const LOCK_FILENAME = 'lock.json';
const HEARTBEAT_INTERVAL_MS = 5_000;
const STALE_THRESHOLD_MS = 30_000;

const LockDataSchema = z.object({
  runId: z.string(),
  pid: z.number().int(),
  hostname: z.string(),
  startedAt: z.string(),
  heartbeatAt: z.string(),
});
type LockData = z.infer<typeof LockDataSchema>;

export class RunLock {
  private readonly lockPath: string;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    stateDir: string,
    private readonly runId: string,
  ) {
    this.lockPath = join(stateDir, LOCK_FILENAME);
  }

  /**
   * Acquire the lock. Stale locks are replaced.
   * Throws E_RUN_LOCKED if the lock is held by a live process.
   */
  async acquire(): Promise<void> {
    const existing = await this.readLock();
    if (existing && !this.isStale(existing)) {
      throw controllerError(
        'E_RUN_LOCKED',
        `Run ${existing.runId} is already in progress ` +
          `(pid ${existing.pid} on ${existing.hostname}).`,
      );
    }

    const now = new Date().toISOString();
    const lockData: LockData = {
      runId: this.runId,
      pid: process.pid,
      hostname: hostname(),
      startedAt: now,
      heartbeatAt: now,
    };
    await writeFile(this.lockPath, JSON.stringify(lockData, null, 2), 'utf-8');

    this.heartbeatTimer = setInterval(() => {
      this.updateHeartbeat().catch(() => {
        // A missed heartbeat only shortens the time until the lock looks stale
      });
    }, HEARTBEAT_INTERVAL_MS);
    // Don't keep the process alive just for heartbeat
    this.heartbeatTimer.unref();
  }

  /** Release the lock and stop the heartbeat. */
  async release(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (!this.ownsLock(await this.readLock())) return;
    await unlink(this.lockPath).catch(() => {
      // Lock file may already be gone
    });
  }

  private async updateHeartbeat(): Promise<void> {
    const existing = await this.readLock();
    if (existing && this.ownsLock(existing)) {
      existing.heartbeatAt = new Date().toISOString();
      await writeFile(this.lockPath, JSON.stringify(existing, null, 2), 'utf-8');
    }
  }

  private async readLock(): Promise<LockData | null> {
    try {
      const content = await readFile(this.lockPath, 'utf-8');
      const parsed = LockDataSchema.safeParse(JSON.parse(content));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  private ownsLock(lock: LockData | null): boolean {
    return lock?.pid === process.pid && lock.runId === this.runId;
  }

  private isStale(lock: LockData): boolean {
    // Both conditions must be true: heartbeat expired AND PID not alive
    const heartbeatAge = Date.now() - new Date(lock.heartbeatAt).getTime();
    if (heartbeatAge < STALE_THRESHOLD_MS) {
      return false;
    }

    try {
      process.kill(lock.pid, 0);
      return false;
    } catch {
      return true;
    }
  }
}
