import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CaddyAdminClient } from "./caddy-admin.js";
import { CaddyAdminError, CaddyConfigShapeError, CaddyUnreachableError } from "./errors.js";
import type { CaddyConfig, CaddyRoute } from "./types.js";

const liveConfig: CaddyConfig = {
  apps: { http: { servers: { srv0: { listen: [":80"], routes: [] } } } },
};

const route: CaddyRoute = {
  match: [{ host: ["app.example.com"] }],
  handle: [{ handler: "reverse_proxy", upstreams: [{ dial: "web:8000" }] }],
  terminal: true,
};

function okResponse(body: unknown = null) {
  return { ok: true, status: 200, json: () => Promise.resolve(body), text: () => Promise.resolve("") };
}

describe("CaddyAdminClient", () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  let client: CaddyAdminClient;

  beforeEach(() => {
    fetchMock = vi.fn().mockResolvedValue(okResponse());
    vi.stubGlobal("fetch", fetchMock);
    client = new CaddyAdminClient({ caddyAdminUrl: "http://caddy:2019/" });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reads the full config", async () => {
    fetchMock.mockResolvedValueOnce(okResponse(liveConfig));

    await expect(client.getConfig()).resolves.toEqual(liveConfig);
    expect(fetchMock).toHaveBeenCalledWith("http://caddy:2019/config/", expect.objectContaining({ method: "GET" }));
  });

  it("rejects a body that is not a Caddy config", async () => {
    fetchMock.mockResolvedValueOnce(okResponse(null));

    await expect(client.getConfig()).rejects.toBeInstanceOf(CaddyConfigShapeError);
  });

  it("loads a document with a JSON body", async () => {
    await client.load(liveConfig);

    expect(fetchMock).toHaveBeenCalledWith(
      "http://caddy:2019/load",
      expect.objectContaining({
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(liveConfig),
      }),
    );
  });

  it("appends, clears and patches routes of the configured server", async () => {
    const edge = new CaddyAdminClient({ caddyAdminUrl: "http://caddy:2019", serverName: "edge" });

    await edge.appendRoute(route);
    await edge.deleteAllRoutes();
    await edge.patchRoute(2, route);

    expect(fetchMock.mock.calls.map(([url, init]) => [url, init.method, init.body])).toEqual([
      ["http://caddy:2019/config/apps/http/servers/edge/routes", "POST", JSON.stringify(route)],
      ["http://caddy:2019/config/apps/http/servers/edge/routes", "PATCH", "[]"],
      ["http://caddy:2019/config/apps/http/servers/edge/routes/2", "PATCH", JSON.stringify(route)],
    ]);
  });

  it("raises CaddyAdminError on a non-2xx answer", async () => {
    fetchMock.mockResolvedValueOnce({ ok: false, status: 400, text: () => Promise.resolve("invalid config") });

    const error = await client.load(liveConfig).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CaddyAdminError);
    expect(error).toMatchObject({ status: 400, body: "invalid config" });
    expect(String(error)).toBe("CaddyAdminError: Caddy admin POST /load failed (400): invalid config");
  });

  it("raises CaddyUnreachableError when the request cannot be sent", async () => {
    fetchMock.mockRejectedValueOnce(new Error("connect ECONNREFUSED 127.0.0.1:2019"));

    const error = await client.getConfig().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CaddyUnreachableError);
    expect(error).toMatchObject({
      url: "http://caddy:2019/config/",
      message: "Caddy admin API unreachable at http://caddy:2019/config/: connect ECONNREFUSED 127.0.0.1:2019",
    });
  });
});
