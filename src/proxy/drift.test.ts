import { describe, expect, it, vi } from "vitest";
import { generateCaddyConfig } from "./caddy-config.js";
import { describeDrift, detectDrift, verifyApplied } from "./drift.js";
import { buildRoutes } from "./route-table.js";
import type { CaddyConfig, WorkloadRecord } from "./types.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

function app(target: string, name = "web"): WorkloadRecord {
  return { id: `id-${name}`, name, labels: { "caddy.proxy": "app.example.com", "caddy.proxy.reverse_proxy": target } };
}

function compile(workloads: WorkloadRecord[]): CaddyConfig {
  return generateCaddyConfig(buildRoutes(workloads), { email: "ops@example.com" });
}

describe("detectDrift", () => {
  it("reports one issue when a host forwards to a stale target", () => {
    const live = compile([app("old-target:8000")]);

    expect(detectDrift(live, [app("new-target:8000")])).toEqual([
      { host: "app.example.com", pathKey: "", actualTarget: "old-target:8000", expectedTarget: "new-target:8000" },
    ]);
  });

  it("reports nothing when live and labels agree", () => {
    expect(detectDrift(compile([app("web:8000")]), [app("web:8000")])).toEqual([]);
  });

  it("compares only hosts present on both sides", () => {
    const docs: WorkloadRecord = { id: "id-docs", name: "docs", labels: { "caddy.proxy": "docs.example.com" } };
    const live = compile([app("web:8000")]);

    expect(detectDrift(live, [app("web:8000"), docs])).toEqual([]);
    expect(detectDrift(live, [])).toEqual([]);
  });

  it("checks each path of a shared host", () => {
    const api: WorkloadRecord = {
      id: "id-api",
      name: "api",
      labels: { "caddy.proxy": "app.example.com", "caddy.proxy.path": "/api/*" },
    };
    const movedApi: WorkloadRecord = { ...api, labels: { ...api.labels, "caddy.proxy.reverse_proxy": "api-v2:8000" } };
    const live = compile([app("web:8000"), api]);

    expect(detectDrift(live, [app("web:8000"), movedApi])).toEqual([
      { host: "app.example.com", pathKey: "/api/*", actualTarget: "api:8000", expectedTarget: "api-v2:8000" },
    ]);
  });
});

describe("verifyApplied", () => {
  it("accepts an identical route list", () => {
    const desired = compile([app("web:8000")]);
    expect(verifyApplied(structuredClone(desired), desired)).toBe(true);
  });

  it("rejects a different route count", () => {
    const desired = compile([app("web:8000")]);
    const live = compile([]);
    expect(verifyApplied(live, desired)).toBe(false);
  });

  it("rejects a route that differs in content", () => {
    expect(verifyApplied(compile([app("old:8000")]), compile([app("new:8000")]))).toBe(false);
  });
});

describe("describeDrift", () => {
  it("names the path only when there is one", () => {
    expect(describeDrift({ host: "a.example.com", pathKey: "", actualTarget: "x:1", expectedTarget: "y:1" })).toBe(
      "Domain a.example.com points to x:1 but should point to y:1",
    );
    expect(describeDrift({ host: "a.example.com", pathKey: "/api/*", actualTarget: "x:1", expectedTarget: "y:1" })).toBe(
      "Domain a.example.com /api/* points to x:1 but should point to y:1",
    );
  });
});
