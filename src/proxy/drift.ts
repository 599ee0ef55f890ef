import { isDeepStrictEqual } from "node:util";
import { logger } from "../config/logger.js";
import { collectTargets, serverRoutes } from "./caddy-document.js";
import { expectedTargetMap, expectedTargets, targetKey } from "./labels.js";
import type { CaddyConfig, DriftIssue, WorkloadRecord } from "./types.js";

/**
 * Compare a live document with what the current labels ask for. Only
 * (host, path) pairs present on both sides are compared; a differing target
 * is one issue. Nothing is changed here.
 */
export function detectDrift(live: CaddyConfig, workloads: readonly WorkloadRecord[], serverName = "srv0"): DriftIssue[] {
  const expected = expectedTargetMap(expectedTargets(workloads));
  const issues: DriftIssue[] = [];
  const reported = new Set<string>();

  for (const actual of collectTargets(live, serverName)) {
    const key = targetKey(actual.host, actual.pathKey);
    const wanted = expected.get(key);
    if (!wanted || reported.has(key) || actual.target === wanted.target) continue;

    reported.add(key);
    issues.push({
      host: actual.host,
      pathKey: actual.pathKey,
      actualTarget: actual.target,
      expectedTarget: wanted.target,
    });
  }

  if (issues.length > 0) {
    logger.warn(`Detected ${issues.length} configuration drift issue(s)`, { issues });
  } else {
    logger.debug("No configuration drift detected");
  }
  return issues;
}

/**
 * True when the live server holds exactly the desired routes, in order.
 */
export function verifyApplied(live: CaddyConfig, desired: CaddyConfig, serverName = "srv0"): boolean {
  const current = serverRoutes(live, serverName);
  const wanted = serverRoutes(desired, serverName);

  if (current.length !== wanted.length) {
    logger.warn(`Route count mismatch: current=${current.length}, expected=${wanted.length}`);
    return false;
  }

  for (const [index, route] of wanted.entries()) {
    if (!isDeepStrictEqual(current[index], route)) {
      logger.warn(`Route ${index} configuration mismatch`);
      return false;
    }
  }

  logger.info("Configuration verification passed");
  return true;
}

export function describeDrift(issue: DriftIssue): string {
  const path = issue.pathKey ? ` ${issue.pathKey}` : "";
  return `Domain ${issue.host}${path} points to ${issue.actualTarget} but should point to ${issue.expectedTarget}`;
}
