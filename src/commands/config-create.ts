import { input, select, confirm } from "@inquirer/prompts";
import { stringify as yamlStringify } from "yaml";
import * as fs from "fs/promises";
import * as path from "path";

export interface ServiceAnswer {
  name: string;
  upstream: string;
}

export interface FleetAnswers {
  organization: string;
  templateRepo: string;
  defaultBranch: string;
  reposDir: string;
  visibility: "public" | "private";
  apiUrl: string;
  services: ServiceAnswer[];
  eventsDir: string;
}

const SERVICE_NAME = /^[a-z0-9][a-z0-9._-]*$/;

async function askServices(): Promise<ServiceAnswer[]> {
  const services: ServiceAnswer[] = [];
  for (;;) {
    const name = await input({
      message: services.length === 0 ? "Service name:" : "Service name (blank to finish):",
      validate: (val) => {
        if (val === "" && services.length > 0) return true;
        if (!SERVICE_NAME.test(val)) return "Use lowercase letters, numbers, dots, hyphens or underscores";
        if (services.some((s) => s.name === val)) return `Service "${val}" already added`;
        return true;
      },
    });
    if (name === "") return services;

    const upstream = await input({
      message: `Upstream repository for ${name}:`,
      validate: (val) => val.length > 0 || "Upstream reference is required",
    });
    services.push({ name, upstream });
  }
}

async function gatherAnswers(): Promise<FleetAnswers> {
  // Phase 1: Hosting
  console.log("  Hosting\n");

  const apiUrl = await input({
    message: "GitHub API URL:",
    default: "https://api.github.com",
  });

  const organization = await input({
    message: "Organization that owns the service repositories:",
    validate: (val) => val.length > 0 || "Organization is required",
  });

  const visibility = await select<"public" | "private">({
    message: "Visibility of created repositories:",
    choices: [
      { name: "Public", value: "public" },
      { name: "Private", value: "private" },
    ],
  });

  // Phase 2: Template
  console.log("\n  Template\n");

  const templateRepo = await input({
    message: "Template repository (owner/name):",
    validate: (val) => /^[^/\s]+\/[^/\s]+$/.test(val) || "Must look like owner/name",
  });

  const defaultBranch = await input({
    message: "Default branch:",
    default: "main",
  });

  // Phase 3: Services
  console.log("\n  Services\n");

  const services = await askServices();

  // Phase 4: Local workspace
  console.log("\n  Local Workspace\n");

  const reposDir = await input({
    message: "Directory for local clones:",
    default: "repos",
  });

  const eventsDir = await input({
    message: "Directory for the run event log (blank to disable):",
    default: "",
  });

  return {
    organization,
    templateRepo,
    defaultBranch,
    reposDir,
    visibility,
    apiUrl,
    services,
    eventsDir,
  };
}

export function buildFleetConfig(answers: FleetAnswers): Record<string, unknown> {
  const config: Record<string, unknown> = {
    organization: answers.organization,
    template_repo: answers.templateRepo,
    default_branch: answers.defaultBranch,
    repos_dir: answers.reposDir,
    github: {
      api_url: answers.apiUrl,
      token: "${GITHUB_TOKEN}",
      visibility: answers.visibility,
    },
    services: Object.fromEntries(
      answers.services.map((s) => [s.name, { upstream: s.upstream }])
    ),
    polling: {
      interval_seconds: 10,
      init_timeout_seconds: 300,
      complete_timeout_seconds: 600,
    },
  };

  if (answers.eventsDir) {
    config.events_dir = answers.eventsDir;
  }

  return config;
}

export function renderYaml(config: Record<string, unknown>): string {
  const header = [
    "# forkfleet — Fleet Configuration",
    "# Generated by: forkfleet config create",
    "",
  ].join("\n");

  const body = yamlStringify(config, {
    lineWidth: 120,
    defaultStringType: "PLAIN",
    defaultKeyType: "PLAIN",
  });

  return header + body;
}

function printNextSteps(configDir: string, filePath: string): void {
  console.log(`\n  Configuration saved to ${filePath}\n`);
  console.log("  Next steps:\n");
  console.log("  1. Make a GitHub token available:");
  console.log("     export GITHUB_TOKEN=...");
  console.log("");
  console.log("  2. Validate the config:");
  console.log(`     forkfleet validate --config ${configDir}`);
  console.log("");
  console.log("  3. Provision every service:");
  console.log(`     forkfleet fork --services all --config ${configDir}`);
  console.log("");
}

export async function runConfigCreate(configDir: string): Promise<void> {
  console.log("\n  Welcome to forkfleet setup.\n");

  const answers = await gatherAnswers();
  const yaml = renderYaml(buildFleetConfig(answers));

  console.log("\n--- Generated config ---\n");
  console.log(yaml);
  console.log("------------------------\n");

  const filePath = path.join(configDir, "fleet.yaml");

  const ok = await confirm({ message: `Save to ${filePath}?`, default: true });
  if (!ok) {
    console.log("\n  Aborted. No file was written.\n");
    return;
  }

  await fs.mkdir(configDir, { recursive: true });
  await fs.writeFile(filePath, yaml, "utf-8");
  printNextSteps(configDir, filePath);
}
