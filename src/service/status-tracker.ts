// ============================================================
// forkfleet — Status Tracker
// Console StatusSink: one row per service, printed on change
// ============================================================

import type { OrchestratorRun, ResultStatus, StatusKind, StatusSink } from "../shared/types.js";

export const STATUS_ICONS: Record<StatusKind, string> = {
  pending: "⏸",
  running: "▶",
  waiting: "||",
  success: "✓",
  skipped: "⊘",
  error: "✗",
};

const RESULT_LABELS: Record<ResultStatus, string> = {
  success: "✓ Initialized",
  skipped: "⊘ Skipped",
  error: "✗ Failed",
};

export interface TrackedService {
  status: StatusKind;
  detail: string;
  icon: string;
}

export class ServiceTracker implements StatusSink {
  readonly services = new Map<string, TrackedService>();

  constructor(
    services: string[],
    private write: (line: string) => void = (line) => console.log(line)
  ) {
    for (const service of services) {
      this.services.set(service, { status: "pending", detail: "Waiting to start", icon: STATUS_ICONS.pending });
    }
  }

  update(service: string, status: StatusKind, detail: string): void {
    const tracked = this.services.get(service);
    if (!tracked) return; // not part of this run

    tracked.status = status;
    tracked.detail = detail;
    tracked.icon = STATUS_ICONS[status];
    this.write(`${tracked.icon} ${service.padEnd(this.nameWidth())}  ${status.toUpperCase().padEnd(7)}  ${detail}`);
  }

  private nameWidth(): number {
    return Math.max(0, ...[...this.services.keys()].map((s) => s.length));
  }
}

/**
 * Final results table: one row per requested service plus a summary line.
 */
export function renderResults(run: Pick<OrchestratorRun, "services" | "results" | "branch">): string {
  const counts: Record<ResultStatus | "pending", number> = { success: 0, skipped: 0, error: 0, pending: 0 };
  const rows: string[][] = [["Service", "Branch", "Status", "Result"]];

  for (const service of run.services) {
    const result = run.results.get(service);
    if (!result) {
      counts.pending++;
      rows.push([service, run.branch, "⏸ Pending", ""]);
      continue;
    }
    counts[result.status]++;
    const detail = result.repo_url && result.status !== "error"
      ? `${result.message} (${result.repo_url})`
      : result.message;
    rows.push([service, run.branch, RESULT_LABELS[result.status], detail]);
  }

  const widths = [0, 1, 2].map((col) => Math.max(...rows.map((row) => row[col].length)));
  const lines = rows.map((row) =>
    [row[0].padEnd(widths[0]), row[1].padEnd(widths[1]), row[2].padEnd(widths[2]), row[3]].join("  ").trimEnd()
  );
  lines.splice(1, 0, "-".repeat(Math.max(...lines.map((l) => l.length))));
  lines.push(
    `✓ ${counts.success} Success  ⊘ ${counts.skipped} Skipped  ✗ ${counts.error} Errors  ⏸ ${counts.pending} Pending`
  );
  return lines.join("\n");
}
