import * as fs from "fs/promises";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { FleetConfig, PollingConfig, ServiceDefinition } from "../shared/types.js";
import { applyEnvOverrides, resolveGitHubToken } from "./env-overrides.js";

export const DEFAULT_POLLING: PollingConfig = {
  interval_seconds: 10,
  init_timeout_seconds: 300,
  complete_timeout_seconds: 600,
};

export async function loadYaml(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf-8");
  // Interpolate environment variables: ${VAR_NAME}
  const interpolated = raw.replace(/\$\{(\w+)\}/g, (_, varName: string) => {
    return process.env[varName] ?? "";
  });
  return parseYaml(interpolated);
}

export async function loadConfig(configDir: string, profile?: string): Promise<FleetConfig> {
  // Resolve config path:
  //   --profile given: try <name>.yaml, then fleet-<name>.yaml
  //   no --profile: default to fleet.yaml
  let raw: unknown;
  if (profile) {
    const candidates = [
      path.join(configDir, `${profile}.yaml`),
      path.join(configDir, `fleet-${profile}.yaml`),
    ];

    let loaded = false;
    for (const candidate of candidates) {
      try {
        raw = await loadYaml(candidate);
        console.log(`[config] Loaded profile: ${path.basename(candidate)}`);
        loaded = true;
        break;
      } catch (err) {
        if (!isMissingFile(err)) throw err;
      }
    }

    if (!loaded) {
      throw new Error(
        `Could not find fleet config for profile "${profile}". ` +
        `Tried: ${candidates.map((c) => path.basename(c)).join(", ")}`
      );
    }
  } else {
    const configPath = path.join(configDir, "fleet.yaml");
    try {
      raw = await loadYaml(configPath);
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      throw new Error(
        `${configPath} not found. Run "forkfleet config create" or copy config/fleet.example.yaml to ${configPath}.`
      );
    }
  }

  const file = z.record(z.unknown()).safeParse(raw);
  if (!file.success) {
    throw new Error(`Config field "config" must be a mapping`);
  }
  return normalizeConfig(applyEnvOverrides(file.data));
}

const requiredString = z
  .string({ required_error: "is required", invalid_type_error: "must be a string" })
  .trim()
  .min(1, "is required");

const optionalString = z
  .string({ invalid_type_error: "must be a string" })
  .nullish()
  .transform((value) => value?.trim() || undefined);

const positiveSeconds = (fallback: number) =>
  z.coerce
    .number({ invalid_type_error: "must be a positive number" })
    .finite("must be a positive number")
    .positive("must be a positive number")
    .default(fallback);

// A bare string is shorthand for { upstream }
const ServiceSchema = z.preprocess(
  (value) => (typeof value === "string" ? { upstream: value } : value),
  z.object(
    {
      upstream: requiredString,
      display_name: optionalString,
    },
    { invalid_type_error: "must be a mapping" }
  )
);

const GitHubSchema = z
  .object(
    {
      api_url: z
        .string({ invalid_type_error: "must be a string" })
        .url("must be a URL")
        .default("https://api.github.com")
        .transform((url) => url.replace(/\/+$/, "")),
      token: optionalString,
      visibility: z
        .enum(["public", "private"], { errorMap: () => ({ message: "must be public or private" }) })
        .default("public"),
    },
    { invalid_type_error: "must be a mapping" }
  )
  .default({});

const PollingSchema = z
  .object(
    {
      interval_seconds: positiveSeconds(DEFAULT_POLLING.interval_seconds),
      init_timeout_seconds: positiveSeconds(DEFAULT_POLLING.init_timeout_seconds),
      complete_timeout_seconds: positiveSeconds(DEFAULT_POLLING.complete_timeout_seconds),
    },
    { invalid_type_error: "must be a mapping" }
  )
  .default({});

export const FleetConfigSchema = z.object(
  {
    organization: requiredString,
    template_repo: requiredString.regex(/^[^/\s]+\/[^/\s]+$/, "must look like owner/name"),
    default_branch: optionalString.transform((value) => value ?? "main"),
    repos_dir: optionalString.transform((value) => path.resolve(value ?? "repos")),
    github: GitHubSchema,
    services: z
      .record(ServiceSchema, { required_error: "is required", invalid_type_error: "must be a mapping" })
      .refine((services) => Object.keys(services).length > 0, "must define at least one service"),
    polling: PollingSchema,
    events_dir: optionalString.transform((value) => (value ? path.resolve(value) : undefined)),
  },
  { invalid_type_error: "must be a mapping" }
);

/**
 * Validate a parsed fleet.yaml and fill in defaults. The first schema issue
 * is reported as `Config field "<path>" <problem>`.
 */
export function normalizeConfig(raw: unknown): FleetConfig {
  const result = FleetConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join(".") : "config";
    throw new Error(`Config field "${field}" ${issue.message}`);
  }

  const parsed = result.data;
  const services: Record<string, ServiceDefinition> = {};
  for (const [name, service] of Object.entries(parsed.services)) {
    services[name] = service.display_name
      ? { upstream: service.upstream, display_name: service.display_name }
      : { upstream: service.upstream };
  }

  const config: FleetConfig = {
    organization: parsed.organization,
    template_repo: parsed.template_repo,
    default_branch: parsed.default_branch,
    repos_dir: parsed.repos_dir,
    github: {
      api_url: parsed.github.api_url,
      token: parsed.github.token ?? resolveGitHubToken(),
      visibility: parsed.github.visibility,
    },
    services,
    polling: parsed.polling,
  };
  if (parsed.events_dir) config.events_dir = parsed.events_dir;
  return config;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
