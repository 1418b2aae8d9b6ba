#!/usr/bin/env node

import { Command } from "commander";
import { loadConfig } from "./service/config-loader.js";
import { runFork } from "./commands/fork.js";
import { runConfigCreate } from "./commands/config-create.js";

const program = new Command();

program
  .name("forkfleet")
  .description("Provision and initialize service repositories from a shared template")
  .version("0.1.0");

program
  .command("fork")
  .description("Create, initialize and clone service repositories")
  .requiredOption("-s, --services <services>", "Service name(s): 'all', single name, or comma-separated list")
  .option("-b, --branch <branch>", "Template branch (default: default_branch from config)")
  .option("--config <dir>", "Config directory", "config")
  .option("--profile <name>", "Config profile (loads <name>.yaml or fleet-<name>.yaml)")
  .action(async (opts: { services: string; branch?: string; config: string; profile?: string }) => {
    const config = await loadConfig(opts.config, opts.profile);

    // Ctrl-C cancels in-flight polls and git processes; partial results still print.
    const controller = new AbortController();
    const onInterrupt = () => {
      console.warn("\nInterrupted, cancelling in-flight provisioning...");
      controller.abort();
    };
    process.once("SIGINT", onInterrupt);

    try {
      process.exitCode = await runFork(config, opts.services, {
        branch: opts.branch,
        signal: controller.signal,
      });
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }
  });

program
  .command("services")
  .description("List the services defined in the fleet configuration")
  .option("--config <dir>", "Config directory", "config")
  .option("--profile <name>", "Config profile (loads <name>.yaml or fleet-<name>.yaml)")
  .action(async (opts: { config: string; profile?: string }) => {
    const config = await loadConfig(opts.config, opts.profile);
    const width = Math.max(...Object.keys(config.services).map((s) => s.length));
    for (const [name, service] of Object.entries(config.services)) {
      const label = service.display_name ? ` (${service.display_name})` : "";
      console.log(`  ${name.padEnd(width)}  ${service.upstream}${label}`);
    }
  });

program
  .command("validate")
  .description("Validate the fleet configuration")
  .option("--config <dir>", "Config directory", "config")
  .option("--profile <name>", "Config profile (loads <name>.yaml or fleet-<name>.yaml)")
  .action(async (opts: { config: string; profile?: string }) => {
    const config = await loadConfig(opts.config, opts.profile);
    console.log("Configuration valid.");
    console.log(`  Organization: ${config.organization}`);
    console.log(`  Template: ${config.template_repo}`);
    console.log(`  Default branch: ${config.default_branch}`);
    console.log(`  Repos dir: ${config.repos_dir}`);
    console.log(`  GitHub API: ${config.github.api_url} (${config.github.token ? "token set" : "no token"})`);
    console.log(`  Services: ${Object.keys(config.services).join(", ")}`);
    console.log(
      `  Polling: every ${config.polling.interval_seconds}s, ` +
      `timeouts ${config.polling.init_timeout_seconds}s / ${config.polling.complete_timeout_seconds}s`
    );
    if (config.events_dir) console.log(`  Events dir: ${config.events_dir}`);
  });

const configCmd = new Command("config").description("Fleet configuration commands");

configCmd
  .command("create")
  .description("Interactively create a fleet configuration")
  .option("--config <dir>", "Config directory", "config")
  .action(async (opts: { config: string }) => {
    await runConfigCreate(opts.config);
  });

program.addCommand(configCmd);

const argv =
  process.argv[2] === "--"
    ? [process.argv[0], process.argv[1], ...process.argv.slice(3)]
    : process.argv;

program.parseAsync(argv).catch((err: unknown) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
