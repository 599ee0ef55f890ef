import { logger } from "../config/logger.js";
import { compareStrings, compareWorkloads, groupByHost, pathMatchOf } from "./labels.js";
import type { HostRoutes, RouteRule, RouteTable, WildcardRule, WorkloadRecord } from "./types.js";

export const WILDCARD_RULE: WildcardRule = {
  host: "*",
  statusCode: 200,
  body: "caddy-label-sync ready: no route for this host",
};

/** Prefix rules first, then exclusions, then catch-alls. */
function rank(rule: RouteRule): number {
  if (!rule.path) return 2;
  return rule.path.kind === "prefix" ? 0 : 1;
}

/**
 * Total order for the rules of one host, mirroring Caddy's first-match
 * evaluation of a subroute: more specific paths must come first.
 */
export function compareRules(a: RouteRule, b: RouteRule): number {
  const byRank = rank(a) - rank(b);
  if (byRank !== 0) return byRank;

  if (a.path && b.path) {
    if (a.path.kind === "prefix") {
      const byLength = b.path.pattern.length - a.path.pattern.length;
      if (byLength !== 0) return byLength;
    }
    const byPattern = compareStrings(a.path.pattern, b.path.pattern);
    if (byPattern !== 0) return byPattern;
  }

  return compareWorkloads(a.source, b.source);
}

/**
 * Turn workload records into an ordered route table. Workloads without the
 * routing label are ignored; the result only depends on the multiset of
 * records, never on their order.
 */
export function buildRoutes(workloads: readonly WorkloadRecord[]): RouteTable {
  const hosts: HostRoutes[] = [];

  for (const [host, group] of groupByHost(workloads)) {
    const single = group.length === 1;
    const rules = group.map(({ workload, labels }): RouteRule => {
      const path = single ? undefined : pathMatchOf(labels);
      return {
        host,
        ...(path ? { path } : {}),
        upstream: labels.target,
        ...(labels.healthCheckPath ? { healthCheckPath: labels.healthCheckPath } : {}),
        source: { id: workload.id, name: workload.name },
      };
    });
    rules.sort(compareRules);

    const catchAlls = rules.filter((rule) => !rule.path).length;
    if (catchAlls > 1) {
      logger.warn(`Host ${host} has ${catchAlls} catch-all workloads; only ${rules[rules.length - catchAlls].source.name} will receive traffic`);
    }

    hosts.push({ host, rules });
  }

  return { hosts, wildcard: WILDCARD_RULE };
}

/** Flattened view of a table: every host rule in order, then the wildcard. */
export function flattenRules(table: RouteTable): Array<RouteRule | WildcardRule> {
  return [...table.hosts.flatMap((entry) => entry.rules), table.wildcard];
}
