import { logger } from "../config/logger.js";
import { collectTargets, isReverseProxy, isSubroute, serverRoutes } from "./caddy-document.js";
import { expectedTargetMap, expectedTargets, targetKey } from "./labels.js";
import type { CaddyConfig, CaddyRoute, WorkloadRecord } from "./types.js";

function describePath(pathKey: string): string {
  return pathKey === "" ? "(catch-all)" : pathKey;
}

/**
 * Check a document against the targets the workload labels ask for.
 *
 * Fails on the first (host, path) whose forwarding differs from the labels.
 * An expected pair that is missing from the document only produces a
 * warning: a wrong target blocks the apply, an unverifiable one does not.
 */
export function validateConfig(config: CaddyConfig, workloads: readonly WorkloadRecord[], serverName = "srv0"): boolean {
  const expected = expectedTargetMap(expectedTargets(workloads));
  const seen = new Set<string>();

  for (const actual of collectTargets(config, serverName)) {
    const key = targetKey(actual.host, actual.pathKey);
    const wanted = expected.get(key);
    if (!wanted) continue;
    seen.add(key);

    if (actual.target !== wanted.target) {
      logger.error(
        `Route misconfiguration detected: ${actual.host} ${describePath(actual.pathKey)} -> ${actual.target} (expected: ${wanted.target})`,
      );
      return false;
    }
    logger.debug(`Route validation passed: ${actual.host} ${describePath(actual.pathKey)} -> ${actual.target}`);
  }

  for (const [key, wanted] of expected) {
    if (!seen.has(key)) {
      logger.warn(`No route found for ${wanted.host} ${describePath(wanted.pathKey)} (expected -> ${wanted.target})`);
    }
  }

  logger.info("All route configurations validated successfully");
  return true;
}

function lintRoute(route: CaddyRoute, label: string, findings: string[]): void {
  for (const handler of route.handle) {
    if (isSubroute(handler)) {
      handler.routes.forEach((sub, index) => lintRoute(sub, `${label}.${index}`, findings));
      continue;
    }
    if (handler.handler !== "reverse_proxy") continue;

    if (!isReverseProxy(handler)) {
      findings.push(`Route ${label} has no upstreams configured`);
    } else if (handler.upstreams.length === 0) {
      findings.push(`Route ${label} has empty upstreams list`);
    } else if (handler.upstreams.some((upstream) => !upstream.dial.trim())) {
      findings.push(`Route ${label} upstream has empty 'dial' value`);
    }
  }
}

/**
 * Structural problems in a document that would make Caddy forward nowhere.
 * Static responses are intentional and never reported.
 */
export function lintConfig(config: CaddyConfig, serverName = "srv0"): string[] {
  const findings: string[] = [];
  serverRoutes(config, serverName).forEach((route, index) => lintRoute(route, String(index), findings));

  if (findings.length > 0) {
    logger.warn(`Detected ${findings.length} routing misconfiguration(s)`, { findings });
  }
  return findings;
}
