import { logger } from "../config/logger.js";
import type { WorkloadInventory } from "../inventory/types.js";
import { parseRoutingLabels } from "../proxy/labels.js";
import type { WorkloadRecord } from "../proxy/types.js";

/** Pause before each attempt; grows linearly. */
export const PROBE_DELAYS_MS = [0, 2_000, 4_000] as const;

export interface ProbeOptions {
  /** Path requested on the upstream (default: "/") */
  path?: string;
  /** Timeout of a single attempt (default: 5000) */
  timeoutMs?: number;
  /** Injected for tests. */
  sleep?: (ms: number) => Promise<void>;
}

export interface ProbeResult {
  reachable: boolean;
  attempts: number;
  error?: string;
}

export type UpstreamProbe = (target: string, options?: ProbeOptions) => Promise<ProbeResult>;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * GET an upstream directly, bypassing the proxy. Any HTTP answer, even an
 * error status, counts as reachable: only a transport failure is not.
 */
export async function probeUpstream(target: string, options: ProbeOptions = {}): Promise<ProbeResult> {
  const path = options.path ?? "/";
  const timeoutMs = options.timeoutMs ?? 5_000;
  const sleep = options.sleep ?? defaultSleep;
  const url = `http://${target}${path.startsWith("/") ? path : `/${path}`}`;

  let lastError = "";
  for (const [index, delay] of PROBE_DELAYS_MS.entries()) {
    if (delay > 0) await sleep(delay);
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
      logger.debug(`Upstream ${target} answered ${response.status}`);
      return { reachable: true, attempts: index + 1 };
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);
      logger.debug(`Upstream probe ${index + 1}/${PROBE_DELAYS_MS.length} for ${target} failed: ${lastError}`);
    }
  }
  return { reachable: false, attempts: PROBE_DELAYS_MS.length, error: lastError };
}

/** Container part of a dial address ("svc:8000" -> "svc"). */
function upstreamHost(target: string): string {
  const bracketed = /^\[([^\]]+)\]/.exec(target);
  if (bracketed) return bracketed[1];
  const colon = target.lastIndexOf(":");
  return colon === -1 ? target : target.slice(0, colon);
}

/**
 * Check that every routed workload's upstream exists, runs and is not
 * reported unhealthy; with a probe, also that it answers HTTP. Returns
 * human-readable issues and never changes anything.
 */
export async function diagnoseUpstreams(
  workloads: readonly WorkloadRecord[],
  inventory: WorkloadInventory,
  probe?: UpstreamProbe,
): Promise<string[]> {
  const issues: string[] = [];

  for (const workload of workloads) {
    const labels = parseRoutingLabels(workload);
    if (!labels) continue;

    const container = upstreamHost(labels.target);
    const state = await inventory.getState(container);
    if (!state) {
      issues.push(`${labels.host}: upstream container ${container} not found`);
      continue;
    }
    if (!state.running) {
      issues.push(`${labels.host}: upstream container ${container} is ${state.status}`);
      continue;
    }
    if (state.health === "unhealthy") {
      issues.push(`${labels.host}: upstream container ${container} is unhealthy`);
    }

    if (probe) {
      const result = await probe(labels.target, labels.healthCheckPath ? { path: labels.healthCheckPath } : {});
      if (!result.reachable) {
        issues.push(`${labels.host}: upstream ${labels.target} unreachable after ${result.attempts} attempt(s): ${result.error ?? "unknown error"}`);
      }
    }
  }

  for (const issue of issues) {
    logger.warn(`Connectivity issue: ${issue}`);
  }
  if (issues.length === 0) {
    logger.debug("All upstream containers are reachable");
  }
  return issues;
}
