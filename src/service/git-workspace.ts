// ============================================================
// forkfleet — Git Workspace
// Local working copies, one directory per service under repos_dir
// ============================================================

import * as fs from "fs/promises";
import * as path from "path";
import type { LocalWorkspace, SyncAction, SyncOutcome } from "../shared/types.js";
import { errorMessage } from "../shared/errors.js";
import { runProcess, type ProcessResult } from "./process-utils.js";

const GIT_TIMEOUT_MS = 60_000;

export interface GitWorkspaceOptions {
  token?: string;
}

export class GitWorkspace implements LocalWorkspace {
  constructor(
    private reposDir: string,
    private options: GitWorkspaceOptions = {}
  ) {}

  getPath(service: string): string {
    return path.join(this.reposDir, service);
  }

  async hasLocalCopy(service: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.getPath(service));
      return stat.isDirectory();
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
      throw err;
    }
  }

  async cloneOrPull(service: string, repoUrl: string, signal?: AbortSignal): Promise<SyncOutcome> {
    const action: SyncAction = (await this.hasLocalCopy(service)) ? "pulled" : "cloned";

    try {
      if (action === "pulled") {
        console.log(`[git] Pulling latest changes for ${service}`);
        await this.git(["pull"], this.getPath(service), signal);
      } else {
        console.log(`[git] Cloning ${service} into ${this.getPath(service)}`);
        await fs.mkdir(this.reposDir, { recursive: true });
        await this.git(["clone", this.authUrl(repoUrl), service], this.reposDir, signal);
      }
      return { success: true, action };
    } catch (err) {
      const error = errorMessage(err);
      console.warn(`[git] Failed to ${action === "pulled" ? "pull" : "clone"} ${service}: ${error}`);
      return { success: false, action, error };
    }
  }

  /**
   * Check out a non-default template branch locally as the default branch:
   * clone the template, check out the branch and rename it. Nothing remote is
   * touched, so a bad branch name fails before any repository is created.
   */
  async prepareFromTemplateBranch(
    service: string,
    templateUrl: string,
    branch: string,
    defaultBranch: string,
    signal?: AbortSignal
  ): Promise<void> {
    const dir = this.getPath(service);
    await fs.rm(dir, { recursive: true, force: true });
    await fs.mkdir(this.reposDir, { recursive: true });

    await this.git(["clone", this.authUrl(templateUrl), service], this.reposDir, signal);
    await this.git(["checkout", branch], dir, signal);
    await this.git(["branch", "-M", defaultBranch], dir, signal);
  }

  // Point origin at the new repository and push the prepared branch.
  async pushToRemote(service: string, targetUrl: string, defaultBranch: string, signal?: AbortSignal): Promise<void> {
    const dir = this.getPath(service);
    await this.git(["remote", "set-url", "origin", this.authUrl(targetUrl)], dir, signal);
    await this.git(["push", "-u", "origin", defaultBranch], dir, signal);
  }

  private authUrl(url: string): string {
    const token = this.options.token;
    if (!token) return url;
    // Convert git@github.com:org/repo.git to https://token@github.com/org/repo.git
    if (url.startsWith("git@")) {
      const match = url.match(/git@(.+):(.+)/);
      if (match) {
        return `https://${token}@${match[1]}/${match[2]}`;
      }
    }
    return url.replace("https://", `https://${token}@`);
  }

  private git(args: string[], cwd: string, signal?: AbortSignal): Promise<ProcessResult> {
    return runProcess("git", args, {
      cwd,
      timeoutMs: GIT_TIMEOUT_MS,
      signal,
      redact: this.options.token ? [this.options.token] : [],
      env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
    });
  }
}
