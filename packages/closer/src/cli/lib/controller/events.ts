/**
 * JSONL event log writer for controller runs.
 *
 * Append-only, serialized write queue so a late write (for example from a
 * signal handler) never interleaves with a loop write.
 */

import { open, type FileHandle } from 'node:fs/promises';

import type { ControllerEvent, ControllerEventInput } from '../../../lib/controller/types.js';

export class EventLogger {
  private fd: FileHandle | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  /** Open the event log file for appending. */
  async open(): Promise<void> {
    this.fd = await open(this.filePath, 'a');
  }

  /** Stamp and queue one controller event. */
  emit(event: ControllerEventInput): void {
    const record: ControllerEvent = { v: 1, ts: new Date().toISOString(), ...event };
    const line = JSON.stringify(record) + '\n';

    this.writeQueue = this.writeQueue.then(async () => {
      if (this.fd) {
        await this.fd.write(line);
      }
    });
  }

  /** Flush all pending writes and close the file handle. */
  async close(): Promise<void> {
    await this.writeQueue;
    if (this.fd) {
      await this.fd.close();
      this.fd = null;
    }
  }
}
