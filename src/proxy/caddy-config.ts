import { logger } from "../config/logger.js";
import { isPublicDomain } from "./domain.js";
import type {
  CaddyConfig,
  CaddyMatcher,
  CaddyReverseProxyHandler,
  CaddyRoute,
  CaddyTlsPolicy,
  HostRoutes,
  PathMatch,
  RouteRule,
  RouteTable,
} from "./types.js";

export const LETS_ENCRYPT_STAGING_CA = "https://acme-staging-v02.api.letsencrypt.org/directory";

const DEFAULT_SERVER_NAME = "srv0";
const DEFAULT_ADMIN_LISTEN = "0.0.0.0:2019";

export interface CaddyConfigOptions {
  /** HTTP server block name (default: "srv0") */
  serverName?: string;
  /** Admin listener kept in the document so a reload does not cut off the API (default: "0.0.0.0:2019") */
  adminListen?: string;
  /** ACME contact address; derived from the first public host when unset */
  email?: string;
  /** Issue certificates from the Let's Encrypt staging directory */
  useStagingCertificates?: boolean;
}

function pathMatcher(path: PathMatch): CaddyMatcher {
  return path.kind === "prefix" ? { path: [path.pattern] } : { not: [{ path: [path.pattern] }] };
}

function reverseProxy(rule: RouteRule): CaddyReverseProxyHandler {
  const handler: CaddyReverseProxyHandler = {
    handler: "reverse_proxy",
    upstreams: [{ dial: rule.upstream }],
  };
  if (rule.healthCheckPath) {
    handler.health_checks = {
      active: {
        path: rule.healthCheckPath,
        headers: { Host: [rule.host] },
        timeout: "30s",
        interval: "10s",
      },
    };
  }
  return handler;
}

/**
 * One top-level route per host. Several rules for a host are nested in a
 * subroute because Caddy only guarantees first-match order inside one.
 */
function buildHostRoute(entry: HostRoutes): CaddyRoute {
  const hostMatch: CaddyMatcher[] = [{ host: [entry.host] }];

  if (entry.rules.length === 1) {
    return { match: hostMatch, handle: [reverseProxy(entry.rules[0])], terminal: true };
  }

  const routes: CaddyRoute[] = entry.rules.map((rule) => ({
    ...(rule.path ? { match: [pathMatcher(rule.path)] } : {}),
    handle: [reverseProxy(rule)],
  }));

  return { match: hostMatch, handle: [{ handler: "subroute", routes }], terminal: true };
}

function buildTlsPolicy(domains: string[], options: CaddyConfigOptions): CaddyTlsPolicy {
  let email = options.email;
  if (!email) {
    email = `admin@${domains[0]}`;
    logger.warn(`CADDY_EMAIL not set; using ${email} as the ACME contact`);
  }

  return {
    subjects: domains,
    issuers: [
      {
        module: "acme",
        email,
        ...(options.useStagingCertificates ? { ca: LETS_ENCRYPT_STAGING_CA } : {}),
      },
    ],
  };
}

/** Hosts of the table that qualify for ACME certificates, deduplicated, in table order. */
export function publicHosts(table: RouteTable): string[] {
  return [...new Set(table.hosts.map((entry) => entry.host).filter(isPublicDomain))];
}

/**
 * Generate a complete Caddy JSON config from a route table.
 */
export function generateCaddyConfig(table: RouteTable, options: CaddyConfigOptions = {}): CaddyConfig {
  const serverName = options.serverName ?? DEFAULT_SERVER_NAME;
  const adminListen = options.adminListen ?? DEFAULT_ADMIN_LISTEN;
  const domains = publicHosts(table);

  const listen = [":80"];
  if (domains.length > 0) {
    listen.push(":443");
    logger.info(`HTTPS enabled for domains: ${domains.join(", ")}`);
  }

  const routes: CaddyRoute[] = table.hosts.map(buildHostRoute);
  routes.push({
    match: [{ host: [table.wildcard.host] }],
    handle: [{ handler: "static_response", status_code: table.wildcard.statusCode, body: table.wildcard.body }],
  });

  const config: CaddyConfig = {
    admin: { listen: adminListen, enforce_origin: false, origins: [`//${adminListen}`] },
    apps: {
      http: {
        servers: {
          [serverName]: { listen, routes },
        },
      },
    },
  };

  if (domains.length > 0) {
    config.apps.tls = { automation: { policies: [buildTlsPolicy(domains, options)] } };
  }

  return config;
}
