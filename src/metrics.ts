/**
 * metrics.ts
 * ──────────
 * Process-wide counters behind one owner.
 *
 *   nextRequestId()  → 1, 2, 3 … in arrival order
 *   recordRequest()  → one per response actually sent (model or fallback)
 *
 * Both are plain synchronous increments. Node runs every handler on one
 * event loop and neither method awaits, so two requests can never read the
 * same value.
 *
 * Lives for the process lifetime; a restart is the only reset.
 */

import os from "node:os";
import type { ServerStats } from "./types.js";

const BYTES_PER_GB = 1024 ** 3;

export interface MemoryReader {
  totalBytes(): number;
  availableBytes(): number;
}

const osMemory: MemoryReader = {
  totalBytes: () => os.totalmem(),
  availableBytes: () => os.freemem(),
};

export class StatsTracker {
  readonly startTime: number;
  private lastRequestId = 0;
  private requestsHandled = 0;

  constructor(
    private readonly now: () => number = Date.now,
    private readonly memory: MemoryReader = osMemory,
  ) {
    this.startTime = now();
  }

  nextRequestId(): number {
    return ++this.lastRequestId;
  }

  recordRequest(): number {
    return ++this.requestsHandled;
  }

  snapshot(): ServerStats {
    const total = this.memory.totalBytes();
    const available = this.memory.availableBytes();
    const usedPct = total > 0 ? ((total - available) / total) * 100 : 0;

    return {
      startTime: this.startTime,
      requestsHandled: this.requestsHandled,
      uptimeSeconds: round(Math.max(0, this.now() - this.startTime) / 1000, 1),
      memoryUsagePercent: round(usedPct, 1),
      memoryAvailableGb: round(available / BYTES_PER_GB, 2),
    };
  }
}

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}
