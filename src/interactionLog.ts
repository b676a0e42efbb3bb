/**
 * Append-only JSONL log of every interaction.
 *
 * Single writer:
 *   Every append is chained onto the previous one, so records land in call
 *   order and one line is fully written before the next starts. Nobody else
 *   touches the file.
 *
 * Best effort:
 *   A failed write (EACCES, ENOSPC, a directory where the file should be…)
 *   is reported on the console and counted, then dropped. append() never
 *   rejects, so a broken disk can't turn a good answer into a 500.
 *
 * No rotation. The file grows until someone moves it.
 */

import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { InteractionRecord } from "./types.js";

export class InteractionLogger {
  private queue: Promise<void> = Promise.resolve();
  private failed = 0;

  constructor(readonly filePath: string) {}

  /** Number of records that could not be written. */
  get failures(): number {
    return this.failed;
  }

  append(record: InteractionRecord): Promise<void> {
    const line = JSON.stringify(record) + "\n";
    this.queue = this.queue.then(() => this.write(line, record.request_id));
    return this.queue;
  }

  /** Resolves once everything queued so far has been written or dropped. */
  flush(): Promise<void> {
    return this.queue;
  }

  private async write(line: string, requestId: number | null): Promise<void> {
    try {
      // every time: the directory may have been moved away since the last write
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, line, "utf8");
    } catch (err: unknown) {
      this.failed++;
      const msg = err instanceof Error ? err.message : String(err);
      console.error(
        `[InteractionLog] Could not save record ${requestId ?? "(rejected)"} to ${this.filePath}: ${msg}`,
      );
    }
  }
}
