import { describe, it, expect, vi } from "vitest";
import { ServiceTracker, STATUS_ICONS, renderResults } from "../src/service/status-tracker.js";
import type { ProvisioningResult } from "../src/shared/types.js";

describe("ServiceTracker", () => {
  it("starts every service as pending", () => {
    const tracker = new ServiceTracker(["alpha", "beta"], () => {});

    expect(tracker.services.get("alpha")).toEqual({
      status: "pending",
      detail: "Waiting to start",
      icon: STATUS_ICONS.pending,
    });
  });

  it("writes one aligned line per update", () => {
    const write = vi.fn();
    const tracker = new ServiceTracker(["alpha", "gamma-long"], write);

    tracker.update("alpha", "running", "Checking if repository exists...");
    tracker.update("gamma-long", "waiting", "Waiting for Initialize Fork workflow...");
    tracker.update("alpha", "error", "Failed to check repository: 401");

    expect(write.mock.calls.map(([line]) => line)).toEqual([
      "▶ alpha       RUNNING  Checking if repository exists...",
      "|| gamma-long  WAITING  Waiting for Initialize Fork workflow...",
      "✗ alpha       ERROR    Failed to check repository: 401",
    ]);
    expect(tracker.services.get("alpha")?.status).toBe("error");
  });

  it("ignores services outside the run", () => {
    const write = vi.fn();
    const tracker = new ServiceTracker(["alpha"], write);

    tracker.update("zeta", "running", "Checking if repository exists...");

    expect(write).not.toHaveBeenCalled();
    expect(tracker.services.has("zeta")).toBe(false);
  });
});

describe("renderResults", () => {
  it("renders one row per service and a summary line", () => {
    const results = new Map<string, ProvisioningResult>([
      [
        "alpha",
        {
          service: "alpha",
          status: "skipped",
          message: "Repository exists - cloned locally",
          repo_url: "https://github.com/test-org/alpha",
        },
      ],
      [
        "beta",
        {
          service: "beta",
          status: "error",
          message: "Initialize Fork workflow did not complete within 300s",
          repo_url: "https://github.com/test-org/beta",
        },
      ],
    ]);

    const lines = renderResults({ services: ["alpha", "beta", "gamma"], branch: "main", results }).split("\n");

    expect(lines).toEqual([
      "Service  Branch  Status     Result",
      "-".repeat(98),
      "alpha    main    ⊘ Skipped  Repository exists - cloned locally (https://github.com/test-org/alpha)",
      "beta     main    ✗ Failed   Initialize Fork workflow did not complete within 300s",
      "gamma    main    ⏸ Pending",
      "✓ 0 Success  ⊘ 1 Skipped  ✗ 1 Errors  ⏸ 1 Pending",
    ]);
  });

  it("counts successes", () => {
    const results = new Map<string, ProvisioningResult>([
      ["alpha", { service: "alpha", status: "success", message: "Repository initialized successfully" }],
    ]);

    const lines = renderResults({ services: ["alpha"], branch: "develop", results }).split("\n");

    expect(lines[2]).toBe("alpha    develop  ✓ Initialized  Repository initialized successfully");
    expect(lines.at(-1)).toBe("✓ 1 Success  ⊘ 0 Skipped  ✗ 0 Errors  ⏸ 0 Pending");
  });
});
