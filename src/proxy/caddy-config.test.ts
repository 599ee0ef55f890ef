import { describe, expect, it, vi } from "vitest";
import { logger } from "../config/logger.js";
import { generateCaddyConfig, LETS_ENCRYPT_STAGING_CA, publicHosts } from "./caddy-config.js";
import { buildRoutes } from "./route-table.js";
import type { WorkloadRecord } from "./types.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

function workload(name: string, labels: Record<string, string>): WorkloadRecord {
  return { id: `id-${name}`, name, labels };
}

const svcA = workload("svc-a", { "caddy.proxy": "app.example.com" });
const svcB = workload("svc-b", { "caddy.proxy": "app.example.com", "caddy.proxy.path": "/api/*" });

describe("generateCaddyConfig", () => {
  it("serves only the wildcard with no workloads", () => {
    const config = generateCaddyConfig(buildRoutes([]));
    const server = config.apps.http.servers.srv0;

    expect(server.listen).toEqual([":80"]);
    expect(server.routes).toEqual([
      {
        match: [{ host: ["*"] }],
        handle: [{ handler: "static_response", status_code: 200, body: "caddy-label-sync ready: no route for this host" }],
      },
    ]);
    expect(config.apps.tls).toBeUndefined();
  });

  it("nests the rules of a shared host in a subroute, path rule first", () => {
    const config = generateCaddyConfig(buildRoutes([svcA, svcB]), { email: "ops@example.com" });
    const routes = config.apps.http.servers.srv0.routes ?? [];

    expect(routes).toHaveLength(2);
    expect(routes[0]).toEqual({
      match: [{ host: ["app.example.com"] }],
      handle: [
        {
          handler: "subroute",
          routes: [
            { match: [{ path: ["/api/*"] }], handle: [{ handler: "reverse_proxy", upstreams: [{ dial: "svc-b:8000" }] }] },
            { handle: [{ handler: "reverse_proxy", upstreams: [{ dial: "svc-a:8000" }] }] },
          ],
        },
      ],
      terminal: true,
    });
    expect(routes[1].match).toEqual([{ host: ["*"] }]);
  });

  it("renders a single workload as a direct proxy route", () => {
    const config = generateCaddyConfig(buildRoutes([svcA]), { email: "ops@example.com" });
    expect(config.apps.http.servers.srv0.routes?.[0]).toEqual({
      match: [{ host: ["app.example.com"] }],
      handle: [{ handler: "reverse_proxy", upstreams: [{ dial: "svc-a:8000" }] }],
      terminal: true,
    });
  });

  it("renders an exclusion as a negated path matcher", () => {
    const config = generateCaddyConfig(
      buildRoutes([svcA, workload("static", { "caddy.proxy": "app.example.com", "caddy.proxy.path_exclude": "/admin/*" })]),
      { email: "ops@example.com" },
    );
    const handler = config.apps.http.servers.srv0.routes?.[0].handle[0];
    expect(handler).toEqual({
      handler: "subroute",
      routes: [
        { match: [{ not: [{ path: ["/admin/*"] }] }], handle: [{ handler: "reverse_proxy", upstreams: [{ dial: "static:8000" }] }] },
        { handle: [{ handler: "reverse_proxy", upstreams: [{ dial: "svc-a:8000" }] }] },
      ],
    });
  });

  it("adds an active health check with the host header", () => {
    const config = generateCaddyConfig(
      buildRoutes([workload("web", { "caddy.proxy": "web.example.com", "caddy.proxy.health_check": "/healthz" })]),
      { email: "ops@example.com" },
    );
    expect(config.apps.http.servers.srv0.routes?.[0].handle[0]).toEqual({
      handler: "reverse_proxy",
      upstreams: [{ dial: "web:8000" }],
      health_checks: {
        active: { path: "/healthz", headers: { Host: ["web.example.com"] }, timeout: "30s", interval: "10s" },
      },
    });
  });

  it("issues certificates for exactly the public hosts", () => {
    const config = generateCaddyConfig(
      buildRoutes([svcA, workload("local", { "caddy.proxy": "dev.localhost" }), workload("ip", { "caddy.proxy": "10.0.0.5" })]),
      { email: "ops@example.com" },
    );

    expect(config.apps.http.servers.srv0.listen).toEqual([":80", ":443"]);
    expect(config.apps.tls).toEqual({
      automation: {
        policies: [{ subjects: ["app.example.com"], issuers: [{ module: "acme", email: "ops@example.com" }] }],
      },
    });
  });

  it("omits TLS when no host is public", () => {
    const config = generateCaddyConfig(buildRoutes([workload("local", { "caddy.proxy": "app.localhost" })]));
    expect(config.apps.tls).toBeUndefined();
    expect(config.apps.http.servers.srv0.listen).toEqual([":80"]);
  });

  it("derives the ACME contact from the first public host when no email is set", () => {
    vi.mocked(logger.warn).mockClear();
    const config = generateCaddyConfig(buildRoutes([svcA]));

    expect(config.apps.tls?.automation?.policies?.[0].issuers).toEqual([{ module: "acme", email: "admin@app.example.com" }]);
    expect(logger.warn).toHaveBeenCalledWith("CADDY_EMAIL not set; using admin@app.example.com as the ACME contact");
  });

  it("points the issuer at the staging directory when asked", () => {
    const config = generateCaddyConfig(buildRoutes([svcA]), { email: "ops@example.com", useStagingCertificates: true });
    expect(config.apps.tls?.automation?.policies?.[0].issuers).toEqual([
      { module: "acme", email: "ops@example.com", ca: LETS_ENCRYPT_STAGING_CA },
    ]);
  });

  it("keeps the admin listener and honours a custom server name", () => {
    const config = generateCaddyConfig(buildRoutes([]), { serverName: "edge", adminListen: "127.0.0.1:2019" });

    expect(config.admin).toEqual({ listen: "127.0.0.1:2019", enforce_origin: false, origins: ["//127.0.0.1:2019"] });
    expect(Object.keys(config.apps.http.servers)).toEqual(["edge"]);
  });
});

describe("publicHosts", () => {
  it("keeps table order and drops local names", () => {
    const table = buildRoutes([
      workload("b", { "caddy.proxy": "b.example.com" }),
      workload("l", { "caddy.proxy": "localhost" }),
      workload("a", { "caddy.proxy": "a.example.com" }),
    ]);
    expect(publicHosts(table)).toEqual(["a.example.com", "b.example.com"]);
  });
});
