import { describe, it, expect } from "vitest";
import { parse as parseYaml } from "yaml";
import { buildFleetConfig, renderYaml, type FleetAnswers } from "../src/commands/config-create.js";

function makeAnswers(overrides?: Partial<FleetAnswers>): FleetAnswers {
  return {
    organization: "test-org",
    templateRepo: "test-org/service-template",
    defaultBranch: "main",
    reposDir: "repos",
    visibility: "private",
    apiUrl: "https://api.github.com",
    services: [
      { name: "alpha", upstream: "https://git.example.com/platform/alpha" },
      { name: "beta", upstream: "https://git.example.com/platform/beta" },
    ],
    eventsDir: "",
    ...overrides,
  };
}

describe("buildFleetConfig", () => {
  it("maps answers onto the fleet.yaml layout", () => {
    expect(buildFleetConfig(makeAnswers())).toEqual({
      organization: "test-org",
      template_repo: "test-org/service-template",
      default_branch: "main",
      repos_dir: "repos",
      github: {
        api_url: "https://api.github.com",
        token: "${GITHUB_TOKEN}",
        visibility: "private",
      },
      services: {
        alpha: { upstream: "https://git.example.com/platform/alpha" },
        beta: { upstream: "https://git.example.com/platform/beta" },
      },
      polling: {
        interval_seconds: 10,
        init_timeout_seconds: 300,
        complete_timeout_seconds: 600,
      },
    });
  });

  it("adds events_dir only when given", () => {
    expect(buildFleetConfig(makeAnswers()).events_dir).toBeUndefined();
    expect(buildFleetConfig(makeAnswers({ eventsDir: ".forkfleet/events" })).events_dir).toBe(".forkfleet/events");
  });
});

describe("renderYaml", () => {
  it("prefixes the generated header", () => {
    const yaml = renderYaml({ organization: "test-org" });

    expect(yaml).toBe(
      "# forkfleet — Fleet Configuration\n# Generated by: forkfleet config create\norganization: test-org\n"
    );
  });

  it("produces YAML that parses back to the same config", () => {
    const config = buildFleetConfig(makeAnswers());

    expect(parseYaml(renderYaml(config))).toEqual(config);
  });
});
