// ============================================================
// forkfleet — Event Store
// Records RunEvent entries for audit logging
// Persists to <eventsDir>/events.jsonl when configured
// ============================================================

import * as fs from "fs/promises";
import * as path from "path";
import type { RunEvent } from "../shared/types.js";

export class EventStore {
  private events: RunEvent[] = [];
  private logPath: string | null;
  // Appends are chained so lines land in record order.
  private writeQueue: Promise<void> = Promise.resolve();
  private ensureDir: Promise<unknown> | null = null;

  constructor(private eventsDir?: string) {
    this.logPath = eventsDir ? path.join(eventsDir, "events.jsonl") : null;
  }

  /**
   * Record an event synchronously; persistence happens in the background and
   * is awaited by flush().
   */
  record(event: RunEvent): void {
    this.events.push(event);

    const logPath = this.logPath;
    if (!logPath || !this.eventsDir) return;

    const eventsDir = this.eventsDir;
    const line = JSON.stringify(event) + "\n";
    this.writeQueue = this.writeQueue
      .then(async () => {
        this.ensureDir ??= fs.mkdir(eventsDir, { recursive: true });
        await this.ensureDir;
        await fs.appendFile(logPath, line, "utf-8");
      })
      .catch((err: unknown) => {
        console.error(`[events] Failed to persist ${event.event_type}:`, err);
      });
  }

  getByRunId(runId: string): RunEvent[] {
    return this.events.filter((e) => e.run_id === runId);
  }

  /**
   * Wait for pending writes. Call at end of run.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }
}
