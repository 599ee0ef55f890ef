import { isCaddyConfig } from "./caddy-document.js";
import { CaddyAdminError, CaddyConfigShapeError, CaddyUnreachableError } from "./errors.js";
import type { CaddyConfig, CaddyRoute } from "./types.js";

const DEFAULT_CADDY_ADMIN_URL = "http://localhost:2019";

/** Operations this service needs from the proxy's control plane. */
export interface ControlPlane {
  /** Full live document. */
  getConfig(): Promise<CaddyConfig>;
  /** Replace the whole document. */
  load(config: CaddyConfig): Promise<void>;
  /** Append one route to the server's route list. */
  appendRoute(route: CaddyRoute): Promise<void>;
  /** Empty the server's route list. */
  deleteAllRoutes(): Promise<void>;
  /** Replace the route at one index. */
  patchRoute(index: number, route: CaddyRoute): Promise<void>;
}

export interface CaddyAdminClientOptions {
  /** Caddy admin API URL (default: "http://localhost:2019") */
  caddyAdminUrl?: string;
  /** Server block whose routes are edited (default: "srv0") */
  serverName?: string;
  /** Timeout for reads and single-route writes (default: 5000) */
  readTimeoutMs?: number;
  /** Timeout for a full /load (default: 10000) */
  applyTimeoutMs?: number;
}

/**
 * Caddy admin API over fetch. Transport failures surface as
 * CaddyUnreachableError, non-2xx answers as CaddyAdminError.
 */
export class CaddyAdminClient implements ControlPlane {
  private readonly caddyAdminUrl: string;
  private readonly routesPath: string;
  private readonly readTimeoutMs: number;
  private readonly applyTimeoutMs: number;

  constructor(options: CaddyAdminClientOptions = {}) {
    this.caddyAdminUrl = (options.caddyAdminUrl ?? DEFAULT_CADDY_ADMIN_URL).replace(/\/+$/, "");
    this.routesPath = `/config/apps/http/servers/${options.serverName ?? "srv0"}/routes`;
    this.readTimeoutMs = options.readTimeoutMs ?? 5_000;
    this.applyTimeoutMs = options.applyTimeoutMs ?? 10_000;
  }

  async getConfig(): Promise<CaddyConfig> {
    const path = "/config/";
    const response = await this.request("GET", path, undefined, this.readTimeoutMs);
    const body: unknown = await response.json();
    if (!isCaddyConfig(body)) {
      throw new CaddyConfigShapeError(path);
    }
    return body;
  }

  async load(config: CaddyConfig): Promise<void> {
    await this.request("POST", "/load", config, this.applyTimeoutMs);
  }

  async appendRoute(route: CaddyRoute): Promise<void> {
    await this.request("POST", this.routesPath, route, this.readTimeoutMs);
  }

  async deleteAllRoutes(): Promise<void> {
    // PATCH keeps the key as an array so later appends have somewhere to go.
    await this.request("PATCH", this.routesPath, [], this.readTimeoutMs);
  }

  async patchRoute(index: number, route: CaddyRoute): Promise<void> {
    await this.request("PATCH", `${this.routesPath}/${index}`, route, this.readTimeoutMs);
  }

  private async request(method: string, path: string, body: unknown, timeoutMs: number): Promise<Response> {
    const url = `${this.caddyAdminUrl}${path}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: body === undefined ? {} : { "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new CaddyUnreachableError(url, err);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new CaddyAdminError(method, path, response.status, text);
    }
    return response;
  }
}
