import type { ExpectedTarget, PathMatch, RoutingLabelSet, WorkloadRecord } from "./types.js";

/** Marks a workload for routing; its value is the public host. */
export const ROUTING_LABEL = "caddy.proxy";
export const TARGET_LABEL = "caddy.proxy.reverse_proxy";
export const PATH_LABEL = "caddy.proxy.path";
export const PATH_EXCLUDE_LABEL = "caddy.proxy.path_exclude";
export const HEALTH_CHECK_LABEL = "caddy.proxy.health_check";

/** Port assumed when a workload does not name its upstream. */
export const DEFAULT_UPSTREAM_PORT = 8000;

function labelValue(labels: Record<string, string>, key: string): string | undefined {
  const value = labels[key]?.trim();
  return value ? value : undefined;
}

/** "/" and "/*" match every request, so they carry no path condition. */
function isRootPath(path: string): boolean {
  return path === "/" || path === "/*";
}

/**
 * Extract the routing view of a workload, or null when it carries no routing label.
 */
export function parseRoutingLabels(workload: WorkloadRecord): RoutingLabelSet | null {
  const host = labelValue(workload.labels, ROUTING_LABEL);
  if (!host) return null;

  const pathPrefix = labelValue(workload.labels, PATH_LABEL);
  const pathExclude = labelValue(workload.labels, PATH_EXCLUDE_LABEL);
  const healthCheckPath = labelValue(workload.labels, HEALTH_CHECK_LABEL);

  return {
    host,
    target: labelValue(workload.labels, TARGET_LABEL) ?? `${workload.name}:${DEFAULT_UPSTREAM_PORT}`,
    ...(pathPrefix && !isRootPath(pathPrefix) ? { pathPrefix } : {}),
    ...(pathExclude && !isRootPath(pathExclude) ? { pathExclude } : {}),
    ...(healthCheckPath ? { healthCheckPath } : {}),
  };
}

/** Path condition implied by a label set. A prefix wins over an exclusion. */
export function pathMatchOf(labels: RoutingLabelSet): PathMatch | undefined {
  if (labels.pathPrefix) return { kind: "prefix", pattern: labels.pathPrefix };
  if (labels.pathExclude) return { kind: "exclude", pattern: labels.pathExclude };
  return undefined;
}

export function pathKeyOf(path: PathMatch | undefined): string {
  if (!path) return "";
  return path.kind === "prefix" ? path.pattern : `!${path.pattern}`;
}

/** Byte-order comparison; independent of the process locale. */
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareWorkloads(a: { id: string; name: string }, b: { id: string; name: string }): number {
  return compareStrings(a.name, b.name) || compareStrings(a.id, b.id);
}

export interface RoutedWorkload {
  workload: WorkloadRecord;
  labels: RoutingLabelSet;
}

/**
 * Group routed workloads by host. Hosts come out in byte order, and the
 * workloads of each host in name/id order.
 */
export function groupByHost(workloads: readonly WorkloadRecord[]): Map<string, RoutedWorkload[]> {
  const groups = new Map<string, RoutedWorkload[]>();
  for (const workload of workloads) {
    const labels = parseRoutingLabels(workload);
    if (!labels) continue;
    const group = groups.get(labels.host) ?? [];
    group.push({ workload, labels });
    groups.set(labels.host, group);
  }

  const sorted = new Map<string, RoutedWorkload[]>();
  for (const host of [...groups.keys()].sort(compareStrings)) {
    const group = groups.get(host) ?? [];
    sorted.set(
      host,
      group.slice().sort((a, b) => compareWorkloads(a.workload, b.workload)),
    );
  }
  return sorted;
}

/**
 * The (host, path) -> upstream mapping the labels ask for, computed without
 * looking at any generated document. A host served by a single workload is
 * always its catch-all; when two workloads claim the same key, the one the
 * proxy would reach first (name, then id order) is expected.
 */
export function expectedTargets(workloads: readonly WorkloadRecord[]): ExpectedTarget[] {
  const expected: ExpectedTarget[] = [];
  for (const [host, group] of groupByHost(workloads)) {
    const seen = new Set<string>();
    for (const { labels } of group) {
      const pathKey = group.length === 1 ? "" : pathKeyOf(pathMatchOf(labels));
      if (seen.has(pathKey)) continue;
      seen.add(pathKey);
      expected.push({ host, pathKey, target: labels.target });
    }
  }
  return expected;
}

export function targetKey(host: string, pathKey: string): string {
  return `${host}\u0000${pathKey}`;
}

export function expectedTargetMap(expected: readonly ExpectedTarget[]): Map<string, ExpectedTarget> {
  return new Map(expected.map((entry) => [targetKey(entry.host, entry.pathKey), entry]));
}
