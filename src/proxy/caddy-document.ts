import type {
  CaddyConfig,
  CaddyHandler,
  CaddyMatcher,
  CaddyReverseProxyHandler,
  CaddyRoute,
  CaddyServer,
  CaddySubrouteHandler,
  CaddyTlsPolicy,
  RouteTarget,
} from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isMatcher(value: unknown): value is CaddyMatcher {
  if (!isRecord(value)) return false;
  if (value.host !== undefined && !isStringArray(value.host)) return false;
  if (value.path !== undefined && !isStringArray(value.path)) return false;
  if (value.not !== undefined && !(Array.isArray(value.not) && value.not.every(isMatcher))) return false;
  return true;
}

function isHandler(value: unknown): value is CaddyHandler {
  return isRecord(value) && typeof value.handler === "string";
}

export function isCaddyRoute(value: unknown): value is CaddyRoute {
  if (!isRecord(value)) return false;
  if (value.match !== undefined && !(Array.isArray(value.match) && value.match.every(isMatcher))) return false;
  return Array.isArray(value.handle) && value.handle.every(isHandler);
}

function isTlsPolicy(value: unknown): value is CaddyTlsPolicy {
  if (!isRecord(value)) return false;
  if (value.subjects !== undefined && !isStringArray(value.subjects)) return false;
  return value.issuers === undefined || (Array.isArray(value.issuers) && value.issuers.every(isRecord));
}

function isServer(value: unknown): value is CaddyServer {
  if (!isRecord(value)) return false;
  if (value.listen !== undefined && !isStringArray(value.listen)) return false;
  return value.routes === undefined || (Array.isArray(value.routes) && value.routes.every(isCaddyRoute));
}

/**
 * Structural check of a document returned by the admin API. Only the parts
 * this service reads are checked; unknown keys are left in place.
 */
export function isCaddyConfig(value: unknown): value is CaddyConfig {
  if (!isRecord(value) || !isRecord(value.apps)) return false;
  const http = value.apps.http;
  if (!isRecord(http) || !isRecord(http.servers)) return false;
  if (!Object.values(http.servers).every(isServer)) return false;

  const tls = value.apps.tls;
  if (tls === undefined) return true;
  if (!isRecord(tls)) return false;
  if (tls.automation === undefined) return true;
  if (!isRecord(tls.automation)) return false;
  const policies = tls.automation.policies;
  return policies === undefined || (Array.isArray(policies) && policies.every(isTlsPolicy));
}

export function isReverseProxy(handler: CaddyHandler): handler is CaddyReverseProxyHandler {
  if (handler.handler !== "reverse_proxy" || !("upstreams" in handler)) return false;
  const upstreams: unknown = handler.upstreams;
  return Array.isArray(upstreams) && upstreams.every((upstream) => isRecord(upstream) && typeof upstream.dial === "string");
}

export function isSubroute(handler: CaddyHandler): handler is CaddySubrouteHandler {
  if (handler.handler !== "subroute" || !("routes" in handler)) return false;
  const routes: unknown = handler.routes;
  return Array.isArray(routes) && routes.every(isCaddyRoute);
}

/** Routes of the named server, or an empty list when the server has none. */
export function serverRoutes(config: CaddyConfig, serverName: string): CaddyRoute[] {
  return config.apps.http.servers[serverName]?.routes ?? [];
}

export function tlsPolicies(config: CaddyConfig): CaddyTlsPolicy[] {
  return config.apps.tls?.automation?.policies ?? [];
}

export function routeHosts(route: CaddyRoute): string[] {
  return (route.match ?? []).flatMap((matcher) => matcher.host ?? []);
}

/** Path key of a matcher list: "" without a path, "!" prefix for a negated path. */
export function pathKeyOfMatchers(matchers: CaddyMatcher[] | undefined): string {
  for (const matcher of matchers ?? []) {
    const path = matcher.path?.[0];
    if (path) return path;
    const negated = matcher.not?.[0]?.path?.[0];
    if (negated) return `!${negated}`;
  }
  return "";
}

function firstDial(handler: CaddyReverseProxyHandler): string {
  return handler.upstreams[0]?.dial ?? "";
}

/**
 * Every (host, path) -> upstream forwarding found in a server's routes,
 * looking one level into subroutes. Routes without a host matcher are skipped.
 */
export function collectTargets(config: CaddyConfig, serverName: string): RouteTarget[] {
  const targets: RouteTarget[] = [];

  serverRoutes(config, serverName).forEach((route, routeIndex) => {
    const hosts = routeHosts(route);
    if (hosts.length === 0) return;
    const topPathKey = pathKeyOfMatchers(route.match);

    for (const handler of route.handle) {
      if (isReverseProxy(handler)) {
        for (const host of hosts) {
          targets.push({ host, pathKey: topPathKey, target: firstDial(handler), routeIndex });
        }
      } else if (isSubroute(handler)) {
        for (const sub of handler.routes) {
          const proxy = sub.handle.find(isReverseProxy);
          if (!proxy) continue;
          const pathKey = pathKeyOfMatchers(sub.match);
          for (const host of hosts) {
            targets.push({ host, pathKey, target: firstDial(proxy), routeIndex });
          }
        }
      }
    }
  });

  return targets;
}

/** True when the route forwards anywhere, directly or through a subroute. */
export function hasUpstream(route: CaddyRoute): boolean {
  return route.handle.some(
    (handler) => isReverseProxy(handler) || (isSubroute(handler) && handler.routes.some(hasUpstream)),
  );
}

/**
 * Copy of a top-level route with the upstream for one path key replaced.
 * Returns null when the route has no forwarding for that path key.
 */
export function retargetRoute(route: CaddyRoute, pathKey: string, target: string): CaddyRoute | null {
  const copy = structuredClone(route);
  const topPathKey = pathKeyOfMatchers(copy.match);

  for (const handler of copy.handle) {
    if (isReverseProxy(handler) && topPathKey === pathKey) {
      handler.upstreams = [{ ...handler.upstreams[0], dial: target }, ...handler.upstreams.slice(1)];
      return copy;
    }
    if (isSubroute(handler)) {
      for (const sub of handler.routes) {
        if (pathKeyOfMatchers(sub.match) !== pathKey) continue;
        const proxy = sub.handle.find(isReverseProxy);
        if (!proxy) continue;
        proxy.upstreams = [{ ...proxy.upstreams[0], dial: target }, ...proxy.upstreams.slice(1)];
        return copy;
      }
    }
  }
  return null;
}
