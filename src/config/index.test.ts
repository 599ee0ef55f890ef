import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      caddyAdminUrl: "http://localhost:2019",
      adminListen: "0.0.0.0:2019",
      serverName: "srv0",
      caddyContainer: "caddy",
      useStagingCertificates: false,
      dockerSocket: "/var/run/docker.sock",
      pollIntervalMs: 5000,
      readTimeoutMs: 5000,
      applyTimeoutMs: 10000,
      verifyDelayMs: 2000,
      certLogTail: 500,
      certLogWindowSeconds: 3600,
      probeUpstreams: false,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      CADDY_ADMIN_URL: "http://caddy:2019/",
      CADDY_SERVER_NAME: "edge",
      CADDY_EMAIL: "ops@example.com",
      USE_STAGING_CERTIFICATES: "Yes",
      POLL_INTERVAL_MS: "15000",
      PROBE_UPSTREAMS: "1",
    });

    expect(config).toMatchObject({
      logLevel: "debug",
      caddyAdminUrl: "http://caddy:2019",
      serverName: "edge",
      caddyEmail: "ops@example.com",
      useStagingCertificates: true,
      pollIntervalMs: 15000,
      probeUpstreams: true,
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ CADDY_EMAIL: "", POLL_INTERVAL_MS: "  ", USE_STAGING_CERTIFICATES: "" });

    expect(config.caddyEmail).toBeUndefined();
    expect(config.pollIntervalMs).toBe(5000);
    expect(config.useStagingCertificates).toBe(false);
  });

  it("reads unknown boolean words as false", () => {
    expect(loadConfig({ USE_STAGING_CERTIFICATES: "maybe" }).useStagingCertificates).toBe(false);
  });

  it.each([
    ["CADDY_EMAIL", "not-an-email"],
    ["CADDY_ADMIN_URL", "not a url"],
    ["CADDY_SERVER_NAME", "srv/0"],
    ["POLL_INTERVAL_MS", "soon"],
    ["LOG_LEVEL", "verbose"],
  ])("rejects an invalid %s", (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ZodError);
  });
});
