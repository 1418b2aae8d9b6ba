// ============================================================
// forkfleet — Orchestrator
// Fans provisioning jobs out across a service set, isolates
// per-job faults and aggregates one result per service
// ============================================================

import type {
  AggregateStatus,
  EventType,
  FleetConfig,
  HostingClient,
  LocalWorkspace,
  OrchestratorRun,
  ProvisioningResult,
  ServiceProgress,
  StatusSink,
} from "../shared/types.js";
import { errorMessage } from "../shared/errors.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { ProvisioningJob } from "./provisioning-job.js";
import { WorkflowPoller } from "./workflow-poller.js";
import type { EventStore } from "./event-store.js";

export interface OrchestratorDeps {
  hosting: HostingClient;
  workspace: LocalWorkspace;
  events?: EventStore;
  clock?: Clock;
}

export interface RunOptions {
  // UI sink; receives every transition after the run's own bookkeeping.
  sink?: StatusSink;
  signal?: AbortSignal;
}

export class Orchestrator {
  private poller: WorkflowPoller;

  constructor(
    private config: FleetConfig,
    private deps: OrchestratorDeps
  ) {
    this.poller = new WorkflowPoller(deps.hosting, {
      intervalMs: config.polling.interval_seconds * 1000,
      clock: deps.clock ?? systemClock,
    });
  }

  async run(
    services: string[],
    branch: string = this.config.default_branch,
    options: RunOptions = {}
  ): Promise<OrchestratorRun> {
    const run = this.createRun([...new Set(services)], branch);
    const sink = this.forwardingSink(run, options.sink);

    console.log(`[orchestrator] Run ${run.run_id}: ${run.services.join(", ")} (branch: ${branch})`);
    this.emitEvent(run.run_id, "run.started", { services: run.services, branch });

    const jobs = run.services.map(
      (service) =>
        new ProvisioningJob(
          {
            service,
            branch,
            templateRef: this.config.template_repo,
            upstream: this.config.services[service]?.upstream,
          },
          {
            hosting: this.deps.hosting,
            workspace: this.deps.workspace,
            poller: this.poller,
            sink,
            initTimeoutSeconds: this.config.polling.init_timeout_seconds,
            completeTimeoutSeconds: this.config.polling.complete_timeout_seconds,
          }
        )
    );

    // All jobs start together; executeJob never rejects.
    await Promise.all(jobs.map((job) => this.executeJob(job, run, sink, options.signal)));

    run.completed_at = new Date();
    run.cancelled = options.signal?.aborted ?? false;

    const status = aggregateStatus(run);
    console.log(
      `[orchestrator] Run ${run.run_id} finished: ${status}${run.cancelled ? " (cancelled)" : ""}`
    );
    this.emitEvent(run.run_id, "run.completed", {
      status,
      cancelled: run.cancelled,
      results: [...run.results.values()],
    });
    await this.deps.events?.flush();

    return run;
  }

  private async executeJob(
    job: ProvisioningJob,
    run: OrchestratorRun,
    sink: StatusSink,
    signal?: AbortSignal
  ): Promise<void> {
    let result: ProvisioningResult;
    try {
      result = await job.run(signal);
    } catch (err) {
      // A fault, not a recognized failure: synthesize the error result here
      const message = `Unexpected error: ${errorMessage(err)}`;
      console.error(`[orchestrator] Error provisioning ${job.service}:`, err);
      sink.update(job.service, "error", message);
      result = { service: job.service, status: "error", message };
    }

    run.results.set(job.service, result);
    this.emitEvent(run.run_id, "service.completed", { ...result });
  }

  private forwardingSink(run: OrchestratorRun, ui?: StatusSink): StatusSink {
    return {
      update: (service, status, detail) => {
        run.progress.set(service, { status, detail });
        this.emitEvent(run.run_id, "service.status", { service, status, detail });
        if (!ui) return;
        try {
          ui.update(service, status, detail);
        } catch (err) {
          console.warn(`[orchestrator] Status sink failed for ${service}: ${errorMessage(err)}`);
        }
      },
    };
  }

  private createRun(services: string[], branch: string): OrchestratorRun {
    return {
      run_id: `run-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
      branch,
      services,
      results: new Map(),
      progress: new Map(
        services.map((service): [string, ServiceProgress] => [
          service,
          { status: "pending", detail: "Waiting to start" },
        ])
      ),
      started_at: new Date(),
      completed_at: null,
      cancelled: false,
    };
  }

  private emitEvent(runId: string, type: EventType, data: Record<string, unknown>): void {
    this.deps.events?.record({
      event_id: `evt-${Date.now()}-${Math.random().toString(36).slice(2, 6)}`,
      run_id: runId,
      event_type: type,
      timestamp: new Date(),
      data,
    });
  }
}

/**
 * all_ok iff every requested service ended as success or skipped.
 * A service without a result counts as failed.
 */
export function aggregateStatus(run: Pick<OrchestratorRun, "services" | "results">): AggregateStatus {
  const allOk = run.services.every((service) => {
    const status = run.results.get(service)?.status;
    return status === "success" || status === "skipped";
  });
  return allOk ? "all_ok" : "failed";
}
