import { logger } from "../config/logger.js";
import type { ControlPlane } from "./caddy-admin.js";
import { collectTargets, hasUpstream, retargetRoute, routeHosts, serverRoutes } from "./caddy-document.js";
import { CaddyUnreachableError } from "./errors.js";
import type { CaddyConfig, ExpectedTarget } from "./types.js";

export type ApplyTierName = "load" | "per-route" | "force-patch";

export interface TierAttempt {
  tier: ApplyTierName;
  error: string;
}

export type ApplyResult =
  | { status: "applied"; tier: ApplyTierName }
  /** The control plane could not be reached; routing is left to whatever serves traffic today. */
  | { status: "unreachable"; reason: string }
  | { status: "failed"; attempts: TierAttempt[] };

/** One way of installing a document. Throws when it did not take effect. */
interface ApplyTier {
  readonly name: ApplyTierName;
  run(config: CaddyConfig): Promise<void>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Expectations a document itself encodes, one per (host, path). */
export function documentTargets(config: CaddyConfig, serverName: string): ExpectedTarget[] {
  const seen = new Set<string>();
  const targets: ExpectedTarget[] = [];
  for (const { host, pathKey, target } of collectTargets(config, serverName)) {
    const key = `${host}\u0000${pathKey}`;
    if (seen.has(key)) continue;
    seen.add(key);
    targets.push({ host, pathKey, target });
  }
  return targets;
}

/**
 * Installs a document through progressively narrower control-plane calls:
 * full reload, then route-by-route insertion, then in-place retargeting of
 * existing routes. The first tier that succeeds wins.
 */
export class ApplyStrategy {
  private readonly controlPlane: ControlPlane;
  private readonly serverName: string;
  private readonly tiers: ApplyTier[];

  constructor(controlPlane: ControlPlane, serverName = "srv0") {
    this.controlPlane = controlPlane;
    this.serverName = serverName;
    this.tiers = [
      { name: "load", run: (config) => this.controlPlane.load(config) },
      { name: "per-route", run: (config) => this.applyPerRoute(config) },
      { name: "force-patch", run: (config) => this.forcePatch(documentTargets(config, this.serverName)) },
    ];
  }

  async apply(config: CaddyConfig): Promise<ApplyResult> {
    const attempts: TierAttempt[] = [];

    for (const tier of this.tiers) {
      try {
        await tier.run(config);
        logger.info(`Caddy configuration applied via ${tier.name}`);
        return { status: "applied", tier: tier.name };
      } catch (err) {
        if (err instanceof CaddyUnreachableError) {
          logger.info(`${err.message}; external fallback routing in effect`);
          return { status: "unreachable", reason: err.message };
        }
        logger.warn(`Apply tier ${tier.name} failed`, { err });
        attempts.push({ tier: tier.name, error: errorMessage(err) });
      }
    }

    logger.error("All apply tiers failed", { attempts });
    return { status: "failed", attempts };
  }

  /**
   * Clear the route list and append each forwarding route in order. Routes
   * without an upstream (the wildcard) are skipped. Individual failures are
   * tolerated as long as something was inserted.
   */
  private async applyPerRoute(config: CaddyConfig): Promise<void> {
    const routes = serverRoutes(config, this.serverName).filter(hasUpstream);

    try {
      await this.controlPlane.deleteAllRoutes();
      logger.info("Cleared existing routes");
    } catch (err) {
      if (err instanceof CaddyUnreachableError) throw err;
      logger.warn("Failed to clear existing routes; appending anyway", { err });
    }

    let inserted = 0;
    for (const [index, route] of routes.entries()) {
      try {
        await this.controlPlane.appendRoute(route);
        inserted += 1;
        logger.info(`Added route for ${routeHosts(route).join(", ")}`);
      } catch (err) {
        if (err instanceof CaddyUnreachableError) throw err;
        logger.warn(`Failed to add route ${index}`, { err });
      }
    }

    if (routes.length > 0 && inserted === 0) {
      throw new Error(`none of ${routes.length} route(s) could be added`);
    }
    logger.info(`Individual route updates completed: ${inserted}/${routes.length}`);
  }

  /**
   * For every expected (host, path), re-read the live document, find the
   * route serving it and rewrite only its upstream. Throws when nothing could
   * be patched or when any patch was rejected.
   */
  async forcePatch(expected: readonly ExpectedTarget[]): Promise<void> {
    let patched = 0;
    const rejected: string[] = [];

    for (const entry of expected) {
      const live = await this.controlPlane.getConfig();
      const routes = serverRoutes(live, this.serverName);
      const index = routes.findIndex((route) => routeHosts(route).includes(entry.host));
      if (index === -1) {
        logger.warn(`No live route for ${entry.host}; cannot force its target`);
        continue;
      }

      const updated = retargetRoute(routes[index], entry.pathKey, entry.target);
      if (!updated) {
        logger.warn(`Live route ${index} for ${entry.host} has no forwarding for path "${entry.pathKey}"`);
        continue;
      }

      try {
        await this.controlPlane.patchRoute(index, updated);
        patched += 1;
        logger.info(`Updated route ${entry.host} -> ${entry.target}`);
      } catch (err) {
        if (err instanceof CaddyUnreachableError) throw err;
        logger.warn(`Failed to update route ${entry.host}`, { err });
        rejected.push(entry.host);
      }
    }

    if (rejected.length > 0) {
      throw new Error(`route patch rejected for ${rejected.join(", ")}`);
    }
    if (expected.length > 0 && patched === 0) {
      throw new Error("no live route matched any expected target");
    }
  }
}
