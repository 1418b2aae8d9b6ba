// ============================================================
// forkfleet — GitHub Client
// Repository existence, template generation, workflow runs, issues
// ============================================================

import { z } from "zod";
import type {
  HostingClient,
  IssueRef,
  OperationOutcome,
  WorkflowRunSnapshot,
  WorkflowRunStatus,
} from "../shared/types.js";
import {
  PermanentHostingError,
  TransientHostingError,
  errorMessage,
  isRetryableStatus,
} from "../shared/errors.js";
import { systemClock, type Clock } from "../utils/clock.js";
import type { GitWorkspace } from "./git-workspace.js";

// Only the most recent runs/issues are inspected.
const RECENT_LIMIT = 10;

const KNOWN_RUN_STATUSES: readonly WorkflowRunStatus[] = [
  "queued",
  "in_progress",
  "completed",
  "waiting",
  "requested",
  "pending",
];

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
}

export const defaultRetryPolicy: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 500,
};

export interface GitHubClientOptions {
  organization: string;
  apiUrl: string;
  token?: string;
  visibility: "public" | "private";
  defaultBranch: string;
  // Needed to seed repositories from a non-default template branch.
  workspace?: GitWorkspace;
  retry?: RetryPolicy;
  clock?: Clock;
}

interface ApiResponse {
  status: number;
  data: unknown;
}

export class GitHubClient implements HostingClient {
  private retry: RetryPolicy;
  private clock: Clock;

  constructor(private options: GitHubClientOptions) {
    this.retry = options.retry ?? defaultRetryPolicy;
    this.clock = options.clock ?? systemClock;
    if (!options.token) {
      console.warn("[github] No token configured, requests are unauthenticated and rate limited");
    }
  }

  repoUrl(service: string): string {
    return `${this.webBaseUrl()}/${this.fullName(service)}`;
  }

  async exists(service: string, signal?: AbortSignal): Promise<boolean> {
    const resp = await this.request("GET", `/repos/${this.fullName(service)}`, { signal });
    if (resp.status === 404) return false;
    this.ensureOk(resp, `Checking ${this.fullName(service)}`);
    return true;
  }

  async createFromTemplate(
    service: string,
    templateRef: string,
    branch: string,
    signal?: AbortSignal
  ): Promise<OperationOutcome> {
    const isPrivate = this.options.visibility === "private";
    try {
      if (branch === this.options.defaultBranch) {
        console.log(`[github] Generating ${this.fullName(service)} from template ${templateRef}`);
        const resp = await this.request("POST", `/repos/${templateRef}/generate`, {
          signal,
          body: {
            owner: this.options.organization,
            name: service,
            private: isPrivate,
            include_all_branches: false,
          },
        });
        this.ensureOk(resp, `Generating ${this.fullName(service)}`);
        return { success: true };
      }

      const workspace = this.options.workspace;
      if (!workspace) {
        return { success: false, error: `No local workspace available to seed branch '${branch}'` };
      }

      console.log(`[github] Creating ${this.fullName(service)} from ${templateRef}@${branch}`);
      // Local checkout first; the remote is created only once the branch exists.
      await workspace.prepareFromTemplateBranch(
        service,
        `${this.webBaseUrl()}/${templateRef}.git`,
        branch,
        this.options.defaultBranch,
        signal
      );
      const resp = await this.request("POST", `/orgs/${this.options.organization}/repos`, {
        signal,
        body: { name: service, private: isPrivate },
      });
      this.ensureOk(resp, `Creating ${this.fullName(service)}`);
      await workspace.pushToRemote(service, `${this.repoUrl(service)}.git`, this.options.defaultBranch, signal);
      return { success: true };
    } catch (err) {
      if (signal?.aborted) throw err;
      return { success: false, error: errorMessage(err) };
    }
  }

  async findWorkflowRun(
    service: string,
    nameSubstring: string,
    signal?: AbortSignal
  ): Promise<WorkflowRunSnapshot | null> {
    const resp = await this.request(
      "GET",
      `/repos/${this.fullName(service)}/actions/runs?per_page=${RECENT_LIMIT}`,
      { signal }
    );
    this.ensureOk(resp, `Listing workflow runs for ${this.fullName(service)}`);

    const needle = nameSubstring.toLowerCase();
    const listing = WorkflowRunListSchema.safeParse(resp.data);
    const runs = listing.success ? listing.data.workflow_runs : [];
    // Runs come back newest first; the first match is the most recent one.
    for (const raw of runs.slice(0, RECENT_LIMIT)) {
      const run = parseWorkflowRun(raw);
      if (run && run.name.toLowerCase().includes(needle)) {
        return run;
      }
    }
    return null;
  }

  async findOpenIssueByTitleSubstring(
    service: string,
    substring: string,
    signal?: AbortSignal
  ): Promise<IssueRef | null> {
    const resp = await this.request(
      "GET",
      `/repos/${this.fullName(service)}/issues?state=open&per_page=${RECENT_LIMIT}`,
      { signal }
    );
    this.ensureOk(resp, `Listing issues for ${this.fullName(service)}`);

    const needle = substring.toLowerCase();
    const listing = z.array(z.unknown()).safeParse(resp.data);
    for (const raw of listing.success ? listing.data : []) {
      const issue = IssueSchema.safeParse(raw);
      // The issues endpoint also returns pull requests
      if (!issue.success || issue.data.pull_request !== undefined) continue;
      if (issue.data.title.toLowerCase().includes(needle)) {
        return { service, number: issue.data.number, title: issue.data.title };
      }
    }
    return null;
  }

  async commentOnIssue(issue: IssueRef, body: string, signal?: AbortSignal): Promise<OperationOutcome> {
    try {
      const resp = await this.request(
        "POST",
        `/repos/${this.fullName(issue.service)}/issues/${issue.number}/comments`,
        { signal, body: { body } }
      );
      this.ensureOk(resp, `Commenting on ${this.fullName(issue.service)}#${issue.number}`);
      console.log(`[github] Commented on ${this.fullName(issue.service)}#${issue.number}`);
      return { success: true };
    } catch (err) {
      if (signal?.aborted) throw err;
      return { success: false, error: errorMessage(err) };
    }
  }

  // ---- Transport ----

  private async request(
    method: "GET" | "POST",
    apiPath: string,
    options: { body?: Record<string, unknown>; signal?: AbortSignal }
  ): Promise<ApiResponse> {
    const url = `${this.options.apiUrl}${apiPath}`;
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
      "User-Agent": "forkfleet",
    };
    if (this.options.token) headers.Authorization = `Bearer ${this.options.token}`;
    if (options.body) headers["Content-Type"] = "application/json";

    let lastError: TransientHostingError | null = null;
    for (let attempt = 1; attempt <= this.retry.attempts; attempt++) {
      if (attempt > 1) {
        const delayMs = this.retry.baseDelayMs * 2 ** (attempt - 2);
        console.warn(`[github] ${method} ${apiPath} retry ${attempt}/${this.retry.attempts} in ${delayMs}ms`);
        await this.clock.sleep(delayMs, options.signal);
      }

      let resp: Response;
      try {
        resp = await fetch(url, {
          method,
          headers,
          body: options.body ? JSON.stringify(options.body) : undefined,
          signal: options.signal,
        });
      } catch (err) {
        if (options.signal?.aborted) throw err;
        lastError = new TransientHostingError(`GitHub request failed: ${errorMessage(err)}`);
        continue;
      }

      if (isRetryableStatus(resp.status)) {
        lastError = new TransientHostingError(
          `GitHub API error: ${resp.status} ${resp.statusText}`,
          resp.status
        );
        continue;
      }

      return { status: resp.status, data: await readJson(resp) };
    }

    throw lastError ?? new TransientHostingError(`GitHub request failed: ${method} ${apiPath}`);
  }

  private ensureOk(resp: ApiResponse, context: string): void {
    if (resp.status >= 200 && resp.status < 300) return;
    const body = ErrorBodySchema.safeParse(resp.data);
    const detail = body.success ? ` ${body.data.message}` : "";
    const message = `${context}: GitHub API error: ${resp.status}${detail}`;
    if (isRetryableStatus(resp.status)) {
      throw new TransientHostingError(message, resp.status);
    }
    throw new PermanentHostingError(message, resp.status);
  }

  private fullName(service: string): string {
    return `${this.options.organization}/${service}`;
  }

  private webBaseUrl(): string {
    // api.github.com -> github.com; GitHub Enterprise: https://host/api/v3 -> https://host
    if (this.options.apiUrl === "https://api.github.com") return "https://github.com";
    return this.options.apiUrl.replace(/\/api\/v3$/, "");
  }
}

// ---- Response parsing ----

const WorkflowRunSchema = z.object({
  id: z.number(),
  name: z.string().nullish(),
  display_title: z.string().nullish(),
  status: z.string().nullish(),
  conclusion: z.string().nullish(),
});

const WorkflowRunListSchema = z.object({
  workflow_runs: z.array(z.unknown()).default([]),
});

const IssueSchema = z.object({
  number: z.number(),
  title: z.string(),
  pull_request: z.unknown().optional(),
});

const ErrorBodySchema = z.object({ message: z.string() });

async function readJson(resp: Response): Promise<unknown> {
  try {
    return await resp.json();
  } catch {
    return null; // empty or non-JSON body
  }
}

function parseWorkflowRun(raw: unknown): WorkflowRunSnapshot | null {
  const parsed = WorkflowRunSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { id, name, display_title, status, conclusion } = parsed.data;
  return {
    id,
    name: name ?? display_title ?? "",
    status: KNOWN_RUN_STATUSES.find((s) => s === status) ?? "pending",
    conclusion: conclusion ?? null,
  };
}
