import type { HostingClient, WorkflowRunSnapshot } from "../shared/types.js";
import { systemClock, type Clock } from "../utils/clock.js";

export type WorkflowWaitOutcome =
  | { kind: "succeeded"; run: WorkflowRunSnapshot }
  | { kind: "failed"; run: WorkflowRunSnapshot; conclusion: string }
  | { kind: "timed_out"; timeoutSeconds: number };

export interface WorkflowPollerOptions {
  intervalMs: number;
  clock?: Clock;
}

// One listing call raced against the time left in the wait.
type PollAttempt =
  | { kind: "listed"; run: WorkflowRunSnapshot | null }
  | { kind: "expired" }
  | { kind: "interrupted" };

/**
 * Polls the most recent workflow runs of a repository until a run whose name
 * contains `workflowName` completes, or the timeout elapses. The timeout is a
 * budget measured from the call, not from job start: a listing call still
 * pending at the deadline is abandoned and no sleep runs past it. A workflow
 * that never shows up among the recent runs is treated as "not started yet".
 *
 * Hosting errors propagate to the caller.
 */
export class WorkflowPoller {
  private clock: Clock;

  constructor(
    private hosting: HostingClient,
    private options: WorkflowPollerOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async waitFor(
    service: string,
    workflowName: string,
    timeoutSeconds: number,
    signal?: AbortSignal
  ): Promise<WorkflowWaitOutcome> {
    const startedAt = this.clock.now();
    const timeoutMs = timeoutSeconds * 1000;
    const remaining = () => timeoutMs - (this.clock.now() - startedAt);

    while (remaining() > 0) {
      signal?.throwIfAborted();
      const attempt = await this.listWithin(service, workflowName, remaining(), signal);
      signal?.throwIfAborted();
      if (attempt.kind !== "listed") break;

      const run = attempt.run;
      if (run && run.status === "completed") {
        console.log(`[poll:${service}] ${workflowName} completed (run ${run.id}, conclusion=${run.conclusion})`);
        if (run.conclusion === "success") {
          return { kind: "succeeded", run };
        }
        return { kind: "failed", run, conclusion: run.conclusion ?? "unknown" };
      }

      const left = remaining();
      if (left <= 0) break;
      const delayMs = Math.min(this.options.intervalMs, left);
      console.log(
        `[poll:${service}] ${workflowName}: ${run ? run.status : "not started"}, checking again in ${delayMs / 1000}s`
      );
      await this.clock.sleep(delayMs, signal);
    }

    console.warn(`[poll:${service}] ${workflowName} did not complete within ${timeoutSeconds}s`);
    return { kind: "timed_out", timeoutSeconds };
  }

  private async listWithin(
    service: string,
    workflowName: string,
    budgetMs: number,
    signal?: AbortSignal
  ): Promise<PollAttempt> {
    // Fires on caller abort, on deadline and once the race settles.
    const deadline = new AbortController();
    const onAbort = () => deadline.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    const listed = this.hosting
      .findWorkflowRun(service, workflowName, deadline.signal)
      .then((run): PollAttempt => ({ kind: "listed", run }));
    const expired = this.clock.sleep(budgetMs, deadline.signal).then(
      (): PollAttempt => ({ kind: "expired" }),
      (): PollAttempt => ({ kind: "interrupted" })
    );

    try {
      return await Promise.race([listed, expired]);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      deadline.abort();
    }
  }
}
