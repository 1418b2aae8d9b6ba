// ============================================================
// forkfleet — Provisioning Job
// Drives one service repository from "unknown" to initialized
// ============================================================

import type {
  HostingClient,
  LocalWorkspace,
  ProvisioningResult,
  ProvisioningState,
  ResultStatus,
  StatusKind,
  StatusSink,
  TerminalState,
} from "../shared/types.js";
import { HostingError, errorMessage } from "../shared/errors.js";
import type { WorkflowPoller, WorkflowWaitOutcome } from "./workflow-poller.js";

export const INIT_FORK_WORKFLOW = "Initialize Fork";
export const INIT_COMPLETE_WORKFLOW = "Initialize Complete";
export const INIT_ISSUE_TITLE = "Initialization Required";

// "initial" = not started yet
const TRANSITIONS: Record<ProvisioningState | "initial", readonly ProvisioningState[]> = {
  initial: ["checking_existence", "failed"],
  checking_existence: ["syncing_known_repo", "creating_from_template", "failed"],
  syncing_known_repo: ["skipped", "failed"],
  creating_from_template: ["waiting_for_init_workflow", "failed"],
  waiting_for_init_workflow: ["annotating_issue", "failed"],
  annotating_issue: ["waiting_for_completion_workflow", "failed"],
  waiting_for_completion_workflow: ["syncing_local", "failed"],
  syncing_local: ["succeeded", "failed"],
  succeeded: [],
  skipped: [],
  failed: [],
};

const RESULT_STATUS: Record<TerminalState, ResultStatus> = {
  succeeded: "success",
  skipped: "skipped",
  failed: "error",
};

export interface ProvisioningJobSpec {
  service: string;
  branch: string;
  templateRef: string;
  // Upstream repository reference; undefined for services missing from the catalog.
  upstream?: string;
}

export interface ProvisioningJobDeps {
  hosting: HostingClient;
  workspace: LocalWorkspace;
  poller: WorkflowPoller;
  sink: StatusSink;
  initTimeoutSeconds: number;
  completeTimeoutSeconds: number;
}

export class ProvisioningJob {
  readonly service: string;
  readonly branch: string;
  readonly templateRef: string;
  private upstream?: string;

  private _state: ProvisioningState | null = null;
  private _detail = "Waiting to start";
  private _repoUrl?: string;
  private started = false;

  constructor(
    spec: ProvisioningJobSpec,
    private deps: ProvisioningJobDeps
  ) {
    this.service = spec.service;
    this.branch = spec.branch;
    this.templateRef = spec.templateRef;
    this.upstream = spec.upstream;
  }

  get state(): ProvisioningState | null {
    return this._state;
  }

  get detail(): string {
    return this._detail;
  }

  get repoUrl(): string | undefined {
    return this._repoUrl;
  }

  /**
   * Run the state machine to a terminal state. Recognized failures (hosting
   * errors, failed or timed-out workflows, cancellation) resolve to an error
   * result; anything else is a fault and rejects.
   */
  async run(signal?: AbortSignal): Promise<ProvisioningResult> {
    if (this.started) {
      throw new Error(`Provisioning job for ${this.service} has already run`);
    }
    this.started = true;

    try {
      return await this.execute(signal);
    } catch (err) {
      if (signal?.aborted && !this.isTerminal()) {
        return this.fail("Provisioning cancelled");
      }
      throw err;
    }
  }

  private async execute(signal?: AbortSignal): Promise<ProvisioningResult> {
    const { hosting, workspace } = this.deps;

    if (!this.upstream) {
      return this.fail(`Unknown service: ${this.service}`);
    }

    // Step 1: Check if repo already exists
    this.transition("checking_existence", "running", "Checking if repository exists...");
    let exists: boolean;
    try {
      exists = await hosting.exists(this.service, signal);
    } catch (err) {
      if (err instanceof HostingError && !signal?.aborted) {
        return this.fail(`Failed to check repository: ${err.message}`);
      }
      throw err;
    }
    signal?.throwIfAborted();

    if (exists) {
      return this.syncKnownRepo(signal);
    }

    // Step 2: Create repository from template
    this.transition("creating_from_template", "running", "Creating repository from template...");
    const created = await hosting.createFromTemplate(this.service, this.templateRef, this.branch, signal);
    signal?.throwIfAborted();
    if (!created.success) {
      return this.fail(`Failed to create repository: ${created.error}`);
    }
    const repoUrl = hosting.repoUrl(this.service);
    this._repoUrl = repoUrl;

    // Step 3: Wait for "Initialize Fork" workflow
    const initFailure = await this.waitForWorkflow(
      "waiting_for_init_workflow",
      INIT_FORK_WORKFLOW,
      this.deps.initTimeoutSeconds,
      signal
    );
    if (initFailure) return initFailure;

    // Step 4: Comment the upstream reference on the initialization issue
    this.transition("annotating_issue", "running", "Commenting on initialization issue...");
    await this.annotateIssue(this.upstream, signal);

    // Step 5: Wait for "Initialize Complete" workflow
    const completeFailure = await this.waitForWorkflow(
      "waiting_for_completion_workflow",
      INIT_COMPLETE_WORKFLOW,
      this.deps.completeTimeoutSeconds,
      signal
    );
    if (completeFailure) return completeFailure;

    // Step 6: Clone/pull repository locally
    const hasLocal = await workspace.hasLocalCopy(this.service);
    this.transition(
      "syncing_local",
      "running",
      hasLocal ? "Pulling latest changes..." : "Cloning repository locally..."
    );
    const synced = await workspace.cloneOrPull(this.service, repoUrl, signal);
    signal?.throwIfAborted();
    if (!synced.success) {
      return this.fail(`Failed to sync local copy (${synced.action === "pulled" ? "pull" : "clone"}): ${synced.error}`);
    }

    return this.finish("succeeded", "Repository initialized successfully");
  }

  private async syncKnownRepo(signal?: AbortSignal): Promise<ProvisioningResult> {
    const { hosting, workspace } = this.deps;
    const repoUrl = hosting.repoUrl(this.service);
    this._repoUrl = repoUrl;
    console.log(`[job:${this.service}] Repository already exists - skipping creation`);

    const hasLocal = await workspace.hasLocalCopy(this.service);
    this.transition(
      "syncing_known_repo",
      "running",
      hasLocal ? "Repository exists - syncing latest changes..." : "Repository exists - cloning locally..."
    );

    const synced = await workspace.cloneOrPull(this.service, repoUrl, signal);
    signal?.throwIfAborted();
    if (!synced.success) {
      return this.fail(`Failed to sync local copy (${synced.action === "pulled" ? "pull" : "clone"}): ${synced.error}`);
    }

    return this.finish(
      "skipped",
      synced.action === "pulled"
        ? "Repository exists - synced latest changes"
        : "Repository exists - cloned locally"
    );
  }

  // Returns a failed result, or null once the workflow has succeeded.
  private async waitForWorkflow(
    state: "waiting_for_init_workflow" | "waiting_for_completion_workflow",
    workflowName: string,
    timeoutSeconds: number,
    signal?: AbortSignal
  ): Promise<ProvisioningResult | null> {
    this.transition(state, "waiting", `Waiting for ${workflowName} workflow...`);

    let outcome: WorkflowWaitOutcome;
    try {
      outcome = await this.deps.poller.waitFor(this.service, workflowName, timeoutSeconds, signal);
    } catch (err) {
      if (err instanceof HostingError && !signal?.aborted) {
        return this.fail(`${workflowName} workflow failed: ${err.message}`);
      }
      throw err;
    }

    switch (outcome.kind) {
      case "succeeded":
        return null;
      case "failed":
        return this.fail(`${workflowName} workflow failed: ${outcome.conclusion}`);
      case "timed_out":
        return this.fail(`${workflowName} workflow did not complete within ${outcome.timeoutSeconds}s`);
    }
  }

  // Advisory only: every failure here is logged and the job moves on.
  private async annotateIssue(upstream: string, signal?: AbortSignal): Promise<void> {
    const { hosting } = this.deps;
    try {
      const issue = await hosting.findOpenIssueByTitleSubstring(this.service, INIT_ISSUE_TITLE, signal);
      if (!issue) {
        console.warn(`[job:${this.service}] Could not comment on init issue: Initialization issue not found`);
        return;
      }
      const commented = await hosting.commentOnIssue(issue, upstream, signal);
      if (!commented.success) {
        console.warn(`[job:${this.service}] Could not comment on init issue #${issue.number}: ${commented.error}`);
        return;
      }
      console.log(`[job:${this.service}] Commented on issue #${issue.number} with upstream URL`);
    } catch (err) {
      if (signal?.aborted) throw err;
      console.warn(`[job:${this.service}] Could not comment on init issue: ${errorMessage(err)}`);
    }
  }

  // ---- Transitions ----

  private transition(next: ProvisioningState, status: StatusKind, detail: string): void {
    const allowed = TRANSITIONS[this._state ?? "initial"];
    if (!allowed.includes(next)) {
      throw new Error(
        `Invalid transition for ${this.service}: ${this._state ?? "initial"} -> ${next}`
      );
    }
    this._state = next;
    this._detail = detail;
    console.log(`[job:${this.service}] ${next}: ${detail}`);
    this.deps.sink.update(this.service, status, detail);
  }

  private finish(state: "succeeded" | "skipped", message: string): ProvisioningResult {
    this.transition(state, RESULT_STATUS[state], message);
    return this.result(state, message);
  }

  private fail(message: string): ProvisioningResult {
    this.transition("failed", "error", message);
    return this.result("failed", message);
  }

  private result(state: TerminalState, message: string): ProvisioningResult {
    return {
      service: this.service,
      status: RESULT_STATUS[state],
      message,
      ...(this._repoUrl ? { repo_url: this._repoUrl } : {}),
    };
  }

  private isTerminal(): boolean {
    return this._state === "succeeded" || this._state === "skipped" || this._state === "failed";
  }
}
