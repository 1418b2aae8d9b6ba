import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import * as os from "os";
import { loadYaml, loadConfig, normalizeConfig } from "../src/service/config-loader.js";
import { applyEnvOverrides, resolveGitHubToken } from "../src/service/env-overrides.js";

const ENV_KEYS = [
  "FORKFLEET_ORGANIZATION",
  "FORKFLEET_TEMPLATE_REPO",
  "FORKFLEET_DEFAULT_BRANCH",
  "FORKFLEET_REPOS_DIR",
  "GITHUB_TOKEN",
  "GH_TOKEN",
  "TEST_CONFIG_VAR",
];

const FLEET_YAML = `
organization: test-org
template_repo: test-org/service-template
repos_dir: ./checkouts
github:
  token: test-secret
services:
  alpha:
    upstream: https://git.example.com/platform/alpha
    display_name: Alpha Service
  beta: https://git.example.com/platform/beta
`;

describe("Config Loading", () => {
  let tmpDir: string;
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"));
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(async () => {
    for (const key of ENV_KEYS) {
      if (savedEnv[key] === undefined) delete process.env[key];
      else process.env[key] = savedEnv[key];
    }
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  // --- loadYaml ---

  it("loadYaml parses valid YAML", async () => {
    const filePath = path.join(tmpDir, "test.yaml");
    await fs.writeFile(filePath, "name: test\nlist:\n  - a\n  - b\n", "utf-8");

    expect(await loadYaml(filePath)).toEqual({ name: "test", list: ["a", "b"] });
  });

  it("loadYaml interpolates ${ENV_VAR} from process.env", async () => {
    process.env.TEST_CONFIG_VAR = "test-secret";
    const filePath = path.join(tmpDir, "env.yaml");
    await fs.writeFile(filePath, "token: ${TEST_CONFIG_VAR}\nother: static\n", "utf-8");

    expect(await loadYaml(filePath)).toEqual({ token: "test-secret", other: "static" });
  });

  it("loadYaml replaces missing env vars with empty string", async () => {
    const filePath = path.join(tmpDir, "missing.yaml");
    await fs.writeFile(filePath, 'token: "prefix-${TEST_CONFIG_VAR}-suffix"\n', "utf-8");

    expect(await loadYaml(filePath)).toEqual({ token: "prefix--suffix" });
  });

  // --- loadConfig ---

  it("loadConfig loads fleet.yaml with defaults filled in", async () => {
    await fs.writeFile(path.join(tmpDir, "fleet.yaml"), FLEET_YAML, "utf-8");

    const config = await loadConfig(tmpDir);

    expect(config.organization).toBe("test-org");
    expect(config.template_repo).toBe("test-org/service-template");
    expect(config.default_branch).toBe("main");
    expect(config.repos_dir).toBe(path.resolve("./checkouts"));
    expect(config.github).toEqual({
      api_url: "https://api.github.com",
      token: "test-secret",
      visibility: "public",
    });
    expect(config.services).toEqual({
      alpha: { upstream: "https://git.example.com/platform/alpha", display_name: "Alpha Service" },
      beta: { upstream: "https://git.example.com/platform/beta" },
    });
    expect(config.polling).toEqual({
      interval_seconds: 10,
      init_timeout_seconds: 300,
      complete_timeout_seconds: 600,
    });
    expect(config.events_dir).toBeUndefined();
  });

  it("loadConfig tells how to create a missing fleet.yaml", async () => {
    const configPath = path.join(tmpDir, "fleet.yaml");

    await expect(loadConfig(tmpDir)).rejects.toThrow(
      `${configPath} not found. Run "forkfleet config create" or copy config/fleet.example.yaml to ${configPath}.`
    );
  });

  it("loadConfig resolves a profile as <name>.yaml first", async () => {
    await fs.writeFile(path.join(tmpDir, "staging.yaml"), FLEET_YAML.replace("test-org\n", "staging-org\n"), "utf-8");
    await fs.writeFile(path.join(tmpDir, "fleet-staging.yaml"), FLEET_YAML, "utf-8");

    const config = await loadConfig(tmpDir, "staging");

    expect(config.organization).toBe("staging-org");
  });

  it("loadConfig falls back to fleet-<name>.yaml for a profile", async () => {
    await fs.writeFile(path.join(tmpDir, "fleet-prod.yaml"), FLEET_YAML, "utf-8");

    const config = await loadConfig(tmpDir, "prod");

    expect(config.organization).toBe("test-org");
  });

  it("loadConfig lists the tried files for an unknown profile", async () => {
    await expect(loadConfig(tmpDir, "nope")).rejects.toThrow(
      'Could not find fleet config for profile "nope". Tried: nope.yaml, fleet-nope.yaml'
    );
  });

  it("loadConfig applies FORKFLEET_* overrides", async () => {
    await fs.writeFile(path.join(tmpDir, "fleet.yaml"), FLEET_YAML, "utf-8");
    process.env.FORKFLEET_ORGANIZATION = "override-org";
    process.env.FORKFLEET_DEFAULT_BRANCH = "develop";

    const config = await loadConfig(tmpDir);

    expect(config.organization).toBe("override-org");
    expect(config.default_branch).toBe("develop");
  });

  it("loadConfig rejects a file that is not a mapping", async () => {
    await fs.writeFile(path.join(tmpDir, "fleet.yaml"), "- alpha\n- beta\n", "utf-8");

    await expect(loadConfig(tmpDir)).rejects.toThrow('Config field "config" must be a mapping');
  });

  it("loadConfig falls back to GITHUB_TOKEN when the token resolves empty", async () => {
    await fs.writeFile(
      path.join(tmpDir, "fleet.yaml"),
      FLEET_YAML.replace("token: test-secret", "token: ${TEST_CONFIG_VAR}"),
      "utf-8"
    );
    process.env.GITHUB_TOKEN = "test-token";

    const config = await loadConfig(tmpDir);

    expect(config.github.token).toBe("test-token");
  });

  it("loadConfig interpolates the token from the environment", async () => {
    await fs.writeFile(
      path.join(tmpDir, "fleet.yaml"),
      FLEET_YAML.replace("token: test-secret", "token: ${GITHUB_TOKEN}"),
      "utf-8"
    );
    process.env.GITHUB_TOKEN = "test-token";

    const config = await loadConfig(tmpDir);

    expect(config.github.token).toBe("test-token");
  });
});

describe("normalizeConfig", () => {
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ["GITHUB_TOKEN", "GH_TOKEN"]) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ["GITHUB_TOKEN", "GH_TOKEN"]) {
      if (savedEnv[key] === undefined) delete process.env[key];
      else process.env[key] = savedEnv[key];
    }
  });

  const base = (): Record<string, unknown> => ({
    organization: "test-org",
    template_repo: "test-org/service-template",
    services: { alpha: "https://git.example.com/platform/alpha" },
  });

  it("requires organization", () => {
    const raw = base();
    delete raw.organization;
    expect(() => normalizeConfig(raw)).toThrow('Config field "organization" is required');
  });

  it("requires template_repo to look like owner/name", () => {
    expect(() => normalizeConfig({ ...base(), template_repo: "service-template" })).toThrow(
      'Config field "template_repo" must look like owner/name'
    );
  });

  it("requires at least one service", () => {
    expect(() => normalizeConfig({ ...base(), services: {} })).toThrow(
      'Config field "services" must define at least one service'
    );
  });

  it("requires services to be a mapping", () => {
    expect(() => normalizeConfig({ ...base(), services: ["alpha"] })).toThrow(
      'Config field "services" must be a mapping'
    );
  });

  it("requires an upstream for every service", () => {
    expect(() => normalizeConfig({ ...base(), services: { alpha: { display_name: "Alpha" } } })).toThrow(
      'Config field "services.alpha.upstream" is required'
    );
  });

  it("rejects non-positive polling values", () => {
    expect(() => normalizeConfig({ ...base(), polling: { interval_seconds: 0 } })).toThrow(
      'Config field "polling.interval_seconds" must be a positive number'
    );
  });

  it("rejects an unknown visibility", () => {
    expect(() => normalizeConfig({ ...base(), github: { visibility: "internal" } })).toThrow(
      'Config field "github.visibility" must be public or private'
    );
  });

  it("strips trailing slashes from the API URL", () => {
    const config = normalizeConfig({ ...base(), github: { api_url: "https://ghe.example.com/api/v3/" } });
    expect(config.github.api_url).toBe("https://ghe.example.com/api/v3");
  });

  it("falls back to GH_TOKEN when no token is configured", () => {
    process.env.GH_TOKEN = "test-token";
    expect(normalizeConfig(base()).github.token).toBe("test-token");
  });

  it("rejects polling values that are not numbers", () => {
    expect(() => normalizeConfig({ ...base(), polling: { init_timeout_seconds: "soon" } })).toThrow(
      'Config field "polling.init_timeout_seconds" must be a positive number'
    );
  });

  it("rejects a service entry that is neither a string nor a mapping", () => {
    expect(() => normalizeConfig({ ...base(), services: { alpha: 42 } })).toThrow(
      'Config field "services.alpha" must be a mapping'
    );
  });

  it("keeps custom polling values", () => {
    const config = normalizeConfig({
      ...base(),
      polling: { interval_seconds: 2, init_timeout_seconds: 30, complete_timeout_seconds: "60" },
    });
    expect(config.polling).toEqual({ interval_seconds: 2, init_timeout_seconds: 30, complete_timeout_seconds: 60 });
  });
});

describe("env overrides", () => {
  afterEach(() => {
    delete process.env.FORKFLEET_REPOS_DIR;
    delete process.env.GITHUB_TOKEN;
    delete process.env.GH_TOKEN;
  });

  it("returns a new object and leaves the input untouched", () => {
    process.env.FORKFLEET_REPOS_DIR = "/srv/repos";
    const raw = { repos_dir: "repos" };

    const result = applyEnvOverrides(raw);

    expect(result.repos_dir).toBe("/srv/repos");
    expect(raw.repos_dir).toBe("repos");
  });

  it("prefers GITHUB_TOKEN over GH_TOKEN", () => {
    process.env.GITHUB_TOKEN = "test-secret";
    process.env.GH_TOKEN = "test-token";
    expect(resolveGitHubToken()).toBe("test-secret");
  });

  it("returns undefined when no token variable is set", () => {
    delete process.env.GITHUB_TOKEN;
    delete process.env.GH_TOKEN;
    expect(resolveGitHubToken()).toBeUndefined();
  });
});
