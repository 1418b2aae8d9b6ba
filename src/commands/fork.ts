import * as path from "path";
import type { FleetConfig, HostingClient, LocalWorkspace } from "../shared/types.js";
import { GitHubClient } from "../service/github-client.js";
import { GitWorkspace } from "../service/git-workspace.js";
import { EventStore } from "../service/event-store.js";
import { Orchestrator, aggregateStatus } from "../service/orchestrator.js";
import { ServiceTracker, renderResults } from "../service/status-tracker.js";
import { findUnknownServices, parseServices } from "../utils/services.js";
import type { Clock } from "../utils/clock.js";

export interface ForkOptions {
  branch?: string;
  signal?: AbortSignal;
  hosting?: HostingClient;
  workspace?: LocalWorkspace;
  clock?: Clock;
}

export function createCollaborators(config: FleetConfig): { hosting: GitHubClient; workspace: GitWorkspace } {
  const workspace = new GitWorkspace(config.repos_dir, { token: config.github.token });
  const hosting = new GitHubClient({
    organization: config.organization,
    apiUrl: config.github.api_url,
    token: config.github.token,
    visibility: config.github.visibility,
    defaultBranch: config.default_branch,
    workspace,
  });
  return { hosting, workspace };
}

function showConfig(config: FleetConfig, services: string[], branch: string): void {
  if (services.length === 1) {
    console.log(`  Repository: ${config.organization}/${services[0]}`);
  } else {
    console.log(`  Organization: ${config.organization}`);
    console.log(`  Services:     ${services.join(", ")}`);
  }
  console.log(`  Branch:       ${branch}`);
  console.log(`  Template:     ${config.template_repo}`);
  console.log("");
}

/**
 * Provision the requested services and print the results table.
 * Resolves to the process exit code: 0 when every service succeeded or was
 * skipped, 1 otherwise.
 */
export async function runFork(
  config: FleetConfig,
  servicesArg: string,
  options: ForkOptions = {}
): Promise<number> {
  const catalog = Object.keys(config.services);
  const services = parseServices(servicesArg, catalog);

  const invalid = findUnknownServices(services, catalog);
  if (invalid.length > 0) {
    console.error(`Error: Invalid service(s): ${invalid.join(", ")}`);
    console.error(`Available services: ${catalog.join(", ")}`);
    return 1;
  }
  if (services.length === 0) {
    console.error("Error: No services given");
    return 1;
  }

  const branch = options.branch ?? config.default_branch;
  showConfig(config, services, branch);

  const { hosting, workspace } =
    options.hosting && options.workspace
      ? { hosting: options.hosting, workspace: options.workspace }
      : createCollaborators(config);

  const tracker = new ServiceTracker(services);
  const events = new EventStore(config.events_dir);
  const orchestrator = new Orchestrator(config, {
    hosting,
    workspace,
    events,
    clock: options.clock,
  });

  const run = await orchestrator.run(services, branch, { sink: tracker, signal: options.signal });

  console.log("");
  console.log(renderResults(run));
  const recorded = events.getByRunId(run.run_id).length;
  console.log(
    config.events_dir
      ? `Run ${run.run_id}: ${recorded} events appended to ${path.join(config.events_dir, "events.jsonl")}`
      : `Run ${run.run_id}: ${recorded} events recorded`
  );
  if (run.cancelled) {
    console.warn("Run was cancelled; results above are partial.");
  }

  return aggregateStatus(run) === "all_ok" ? 0 : 1;
}
