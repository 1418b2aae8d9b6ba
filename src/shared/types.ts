// ============================================================
// forkfleet — Core Type Definitions
// ============================================================

// ----- Configuration -----

export interface ServiceDefinition {
  upstream: string; // upstream repository reference posted on the init issue
  display_name?: string;
}

export interface GitHubConfig {
  api_url: string;
  token?: string;
  visibility: "public" | "private";
}

export interface PollingConfig {
  interval_seconds: number;
  init_timeout_seconds: number;
  complete_timeout_seconds: number;
}

export interface FleetConfig {
  organization: string;
  template_repo: string; // "owner/name"
  default_branch: string;
  repos_dir: string;
  github: GitHubConfig;
  services: Record<string, ServiceDefinition>;
  polling: PollingConfig;
  events_dir?: string;
}

// ----- Status propagation -----

export type StatusKind =
  | "pending"
  | "running"
  | "waiting"
  | "success"
  | "skipped"
  | "error";

export interface StatusSink {
  update(service: string, status: StatusKind, detail: string): void;
}

// ----- Provisioning -----

export type ProvisioningState =
  | "checking_existence"
  | "syncing_known_repo"
  | "creating_from_template"
  | "waiting_for_init_workflow"
  | "annotating_issue"
  | "waiting_for_completion_workflow"
  | "syncing_local"
  | "succeeded"
  | "skipped"
  | "failed";

export type TerminalState = Extract<ProvisioningState, "succeeded" | "skipped" | "failed">;

export type ResultStatus = "success" | "skipped" | "error";

export interface ProvisioningResult {
  readonly service: string;
  readonly status: ResultStatus;
  readonly message: string;
  readonly repo_url?: string;
}

export interface ServiceProgress {
  status: StatusKind;
  detail: string;
}

export interface OrchestratorRun {
  run_id: string;
  branch: string;
  services: string[];
  results: Map<string, ProvisioningResult>;
  progress: Map<string, ServiceProgress>;
  started_at: Date;
  completed_at: Date | null;
  cancelled: boolean;
}

export type AggregateStatus = "all_ok" | "failed";

// ----- Hosting -----

export type WorkflowRunStatus =
  | "queued"
  | "in_progress"
  | "completed"
  | "waiting"
  | "requested"
  | "pending";

export interface WorkflowRunSnapshot {
  id: number;
  name: string;
  status: WorkflowRunStatus;
  conclusion: string | null; // success, failure, cancelled, timed_out, ...
}

export interface IssueRef {
  service: string;
  number: number;
  title: string;
}

export type OperationOutcome =
  | { success: true }
  | { success: false; error: string };

export type SyncAction = "cloned" | "pulled";

export type SyncOutcome =
  | { success: true; action: SyncAction }
  | { success: false; action: SyncAction; error: string };

export interface HostingClient {
  repoUrl(service: string): string;
  exists(service: string, signal?: AbortSignal): Promise<boolean>;
  createFromTemplate(
    service: string,
    templateRef: string,
    branch: string,
    signal?: AbortSignal
  ): Promise<OperationOutcome>;
  findWorkflowRun(
    service: string,
    nameSubstring: string,
    signal?: AbortSignal
  ): Promise<WorkflowRunSnapshot | null>;
  findOpenIssueByTitleSubstring(
    service: string,
    substring: string,
    signal?: AbortSignal
  ): Promise<IssueRef | null>;
  commentOnIssue(issue: IssueRef, body: string, signal?: AbortSignal): Promise<OperationOutcome>;
}

export interface LocalWorkspace {
  hasLocalCopy(service: string): Promise<boolean>;
  cloneOrPull(service: string, repoUrl: string, signal?: AbortSignal): Promise<SyncOutcome>;
}

// ----- Events (run log) -----

export type EventType =
  | "run.started"
  | "service.status"
  | "service.completed"
  | "run.completed";

export interface RunEvent {
  event_id: string;
  run_id: string;
  event_type: EventType;
  timestamp: Date;
  data: Record<string, unknown>;
}
