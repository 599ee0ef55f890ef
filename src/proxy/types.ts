/** A running unit reported by the inventory (one container). */
export interface WorkloadRecord {
  id: string;
  name: string;
  labels: Record<string, string>;
}

/** Routing-relevant view of a workload's labels. */
export interface RoutingLabelSet {
  host: string;
  target: string;
  pathPrefix?: string;
  pathExclude?: string;
  healthCheckPath?: string;
}

/** Path condition of a rule. Absent on catch-all rules. */
export type PathMatch = { kind: "prefix"; pattern: string } | { kind: "exclude"; pattern: string };

/** One ordered entry of a route table. */
export interface RouteRule {
  host: string;
  path?: PathMatch;
  upstream: string;
  healthCheckPath?: string;
  /** Workload the rule was derived from, for logging. */
  source: { id: string; name: string };
}

export interface HostRoutes {
  host: string;
  rules: RouteRule[];
}

/** Catch-all for unknown hosts; always rendered last. */
export interface WildcardRule {
  host: "*";
  statusCode: number;
  body: string;
}

export interface RouteTable {
  hosts: HostRoutes[];
  wildcard: WildcardRule;
}

/** A (host, path key) pair and the upstream it should forward to. */
export interface ExpectedTarget {
  host: string;
  /** "" for a catch-all, the pattern for a prefix, "!" + pattern for an exclusion. */
  pathKey: string;
  target: string;
}

/** A forwarding target found inside a live or compiled document. */
export interface RouteTarget extends ExpectedTarget {
  /** Index of the top-level route inside the server's route list. */
  routeIndex: number;
}

export interface DriftIssue {
  host: string;
  pathKey: string;
  actualTarget: string;
  expectedTarget: string;
}

// ---------------------------------------------------------------------------
// Caddy JSON config
// ---------------------------------------------------------------------------

export interface CaddyMatchHost {
  host: string[];
}

export interface CaddyMatchPath {
  path: string[];
}

export interface CaddyMatchNot {
  not: CaddyMatchPath[];
}

export type CaddyMatcher = Partial<CaddyMatchHost & CaddyMatchPath & CaddyMatchNot>;

export interface CaddyActiveHealthCheck {
  path: string;
  headers?: Record<string, string[]>;
  timeout?: string;
  interval?: string;
}

/** Caddy reverse_proxy handler. */
export interface CaddyReverseProxyHandler {
  handler: "reverse_proxy";
  upstreams: { dial: string }[];
  health_checks?: { active: CaddyActiveHealthCheck };
}

/** Caddy static_response handler. */
export interface CaddyStaticResponseHandler {
  handler: "static_response";
  status_code: number | string;
  body?: string;
  headers?: Record<string, string[]>;
}

/** Caddy subroute handler: nested routes evaluated strictly in order. */
export interface CaddySubrouteHandler {
  handler: "subroute";
  routes: CaddyRoute[];
}

/** Any other handler found in a live document; kept untouched. */
export interface CaddyGenericHandler {
  handler: string;
  [key: string]: unknown;
}

export type CaddyHandler =
  | CaddyReverseProxyHandler
  | CaddyStaticResponseHandler
  | CaddySubrouteHandler
  | CaddyGenericHandler;

/** A single Caddy route entry. */
export interface CaddyRoute {
  match?: CaddyMatcher[];
  handle: CaddyHandler[];
  terminal?: boolean;
}

/** Caddy server configuration. */
export interface CaddyServer {
  listen?: string[];
  routes?: CaddyRoute[];
}

export interface CaddyAcmeIssuer {
  module: "acme";
  email?: string;
  ca?: string;
}

export interface CaddyTlsPolicy {
  subjects?: string[];
  issuers?: CaddyAcmeIssuer[];
}

export interface CaddyAdminConfig {
  listen: string;
  enforce_origin?: boolean;
  origins?: string[];
}

/** Top-level Caddy JSON config. */
export interface CaddyConfig {
  admin?: CaddyAdminConfig;
  apps: {
    http: {
      servers: Record<string, CaddyServer>;
    };
    tls?: {
      automation?: {
        policies?: CaddyTlsPolicy[];
      };
    };
  };
}
