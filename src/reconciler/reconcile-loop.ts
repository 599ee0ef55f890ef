import { logger } from "../config/logger.js";
import type { WorkloadInventory } from "../inventory/types.js";
import type { CertificateHealthMonitor, CertificateHealthReport } from "../monitoring/cert-health.js";
import { diagnoseUpstreams, type UpstreamProbe } from "../monitoring/connectivity.js";
import { ApplyStrategy, type ApplyTierName, type TierAttempt } from "../proxy/apply-strategy.js";
import type { ControlPlane } from "../proxy/caddy-admin.js";
import { type CaddyConfigOptions, generateCaddyConfig, publicHosts } from "../proxy/caddy-config.js";
import { describeDrift, detectDrift, verifyApplied } from "../proxy/drift.js";
import { CaddyUnreachableError } from "../proxy/errors.js";
import { expectedTargets } from "../proxy/labels.js";
import { buildRoutes } from "../proxy/route-table.js";
import type { CaddyConfig, DriftIssue, WorkloadRecord } from "../proxy/types.js";
import { lintConfig, validateConfig } from "../proxy/validator.js";

export type RecoveryStep = "reapply" | "force-patch";

export type CycleReport =
  | { kind: "applied"; tier: ApplyTierName; workloads: number }
  | { kind: "apply-failed"; attempts: TierAttempt[] }
  | { kind: "unreachable"; reason: string }
  | { kind: "validation-failed" }
  | { kind: "in-sync"; certificates: CertificateHealthReport[] }
  | { kind: "drift-recovered"; via: RecoveryStep; certificates: CertificateHealthReport[] }
  | { kind: "drift-unresolved"; unresolved: DriftIssue[]; certificates: CertificateHealthReport[] }
  | { kind: "error"; error: string };

export interface ConfigureResult {
  status: "configured" | "unreachable" | "failed";
  unresolved: DriftIssue[];
}

export interface ReconcileLoopOptions {
  /** Compiler options; serverName here also selects the routes that are checked. */
  compileOptions?: CaddyConfigOptions;
  /** Delay between cycles (default: 5000) */
  pollIntervalMs?: number;
  /** Pause before re-reading the live document after an apply (default: 2000) */
  verifyDelayMs?: number;
  /** Certificate checks run after each drift check when set. */
  certificates?: CertificateHealthMonitor;
  /** HTTP probe used by upstream diagnostics; container checks only when unset. */
  probe?: UpstreamProbe;
  sleep?: (ms: number) => Promise<void>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function sameIds(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const id of a) {
    if (!b.has(id)) return false;
  }
  return true;
}

/**
 * Keeps the proxy's live routes in line with the labels of running
 * workloads. Each cycle either rebuilds (the set of workloads changed) or
 * checks for drift and certificate trouble (it did not). A cycle never
 * throws; it reports what happened.
 */
export class ReconcileLoop {
  private readonly inventory: WorkloadInventory;
  private readonly controlPlane: ControlPlane;
  private readonly strategy: ApplyStrategy;
  private readonly compileOptions: CaddyConfigOptions;
  private readonly serverName: string;
  private readonly pollIntervalMs: number;
  private readonly verifyDelayMs: number;
  private readonly certificates: CertificateHealthMonitor | null;
  private readonly probe: UpstreamProbe | undefined;
  private readonly sleep: (ms: number) => Promise<void>;

  private knownIds = new Set<string>();
  private running = false;
  private wake: (() => void) | null = null;

  constructor(inventory: WorkloadInventory, controlPlane: ControlPlane, options: ReconcileLoopOptions = {}) {
    this.inventory = inventory;
    this.controlPlane = controlPlane;
    this.compileOptions = options.compileOptions ?? {};
    this.serverName = this.compileOptions.serverName ?? "srv0";
    this.strategy = new ApplyStrategy(controlPlane, this.serverName);
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.verifyDelayMs = options.verifyDelayMs ?? 2_000;
    this.certificates = options.certificates ?? null;
    this.probe = options.probe;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** IDs of the workloads the last successful apply was built from. */
  get knownWorkloadIds(): ReadonlySet<string> {
    return this.knownIds;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Run cycles until stop() is called. Resolves once the loop has exited. */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    logger.info(`Reconcile loop started (interval ${this.pollIntervalMs}ms)`);

    while (this.running) {
      await this.runCycle();
      if (!this.running) break;
      await this.idle(this.pollIntervalMs);
    }
    logger.info("Reconcile loop stopped");
  }

  /** Ends the loop after the current cycle; an idle wait is cut short. */
  stop(): void {
    this.running = false;
    this.wake?.();
  }

  async runCycle(): Promise<CycleReport> {
    try {
      const workloads = await this.inventory.listWorkloads();
      const ids = new Set(workloads.map((workload) => workload.id));

      if (!sameIds(ids, this.knownIds)) {
        logger.info(`Detected container changes: ${workloads.length} routed container(s)`);
        return await this.rebuild(workloads, ids);
      }
      return await this.checkSteadyState(workloads);
    } catch (err) {
      logger.error("Reconcile cycle failed", { err });
      return { kind: "error", error: errorMessage(err) };
    }
  }

  /**
   * Single configuration pass: diagnose, build, validate, apply, verify and,
   * when verification fails, force the expected targets into place.
   */
  async configureOnce(): Promise<ConfigureResult> {
    const workloads = await this.inventory.listWorkloads();
    await this.diagnose(workloads);

    const desired = this.compile(workloads);
    if (!validateConfig(desired, workloads, this.serverName)) {
      return { status: "failed", unresolved: [] };
    }
    lintConfig(desired, this.serverName);

    const result = await this.strategy.apply(desired);
    if (result.status === "unreachable") return { status: "unreachable", unresolved: [] };
    if (result.status === "failed") return { status: "failed", unresolved: [] };
    this.knownIds = new Set(workloads.map((workload) => workload.id));

    const live = await this.readAfterApply();
    if (live && verifyApplied(live, desired, this.serverName)) {
      return { status: "configured", unresolved: [] };
    }

    logger.warn("Applied configuration did not verify; forcing expected targets");
    const issues = live ? detectDrift(live, workloads, this.serverName) : [];
    const forced = await this.forceRecover(workloads, issues);
    if (!forced.ok || forced.unresolved.length > 0) {
      return { status: "failed", unresolved: forced.unresolved };
    }
    return { status: "configured", unresolved: [] };
  }

  private compile(workloads: readonly WorkloadRecord[]): CaddyConfig {
    return generateCaddyConfig(buildRoutes(workloads), { ...this.compileOptions, serverName: this.serverName });
  }

  private async rebuild(workloads: WorkloadRecord[], ids: Set<string>): Promise<CycleReport> {
    await this.diagnose(workloads);

    const desired = this.compile(workloads);
    if (!validateConfig(desired, workloads, this.serverName)) {
      logger.error("Generated configuration failed validation; retrying next cycle");
      return { kind: "validation-failed" };
    }
    lintConfig(desired, this.serverName);

    const result = await this.strategy.apply(desired);
    switch (result.status) {
      case "applied":
        this.knownIds = ids;
        return { kind: "applied", tier: result.tier, workloads: workloads.length };
      case "unreachable":
        return { kind: "unreachable", reason: result.reason };
      case "failed":
        return { kind: "apply-failed", attempts: result.attempts };
    }
  }

  private async checkSteadyState(workloads: WorkloadRecord[]): Promise<CycleReport> {
    let live: CaddyConfig;
    try {
      live = await this.controlPlane.getConfig();
    } catch (err) {
      if (err instanceof CaddyUnreachableError) {
        logger.info(`${err.message}; skipping drift check`);
        return { kind: "unreachable", reason: err.message };
      }
      throw err;
    }

    const issues = detectDrift(live, workloads, this.serverName);
    const recovery = issues.length > 0 ? await this.recover(workloads, issues) : null;
    const certificates = await this.checkCertificates(workloads);

    if (!recovery) return { kind: "in-sync", certificates };
    if (recovery.unresolved.length === 0 && recovery.via) {
      return { kind: "drift-recovered", via: recovery.via, certificates };
    }
    return { kind: "drift-unresolved", unresolved: recovery.unresolved, certificates };
  }

  /** Re-apply and verify; failing that, patch targets in place. */
  private async recover(
    workloads: WorkloadRecord[],
    issues: DriftIssue[],
  ): Promise<{ via?: RecoveryStep; unresolved: DriftIssue[] }> {
    for (const issue of issues) {
      logger.warn(describeDrift(issue));
    }

    if (await this.reapplyAndVerify(workloads)) {
      logger.info("Configuration drift corrected by re-applying");
      return { via: "reapply", unresolved: [] };
    }

    const { ok, unresolved } = await this.forceRecover(workloads, issues);
    if (ok && unresolved.length === 0) {
      logger.info("Configuration drift corrected by forced route updates");
      return { via: "force-patch", unresolved };
    }
    logger.error(`Configuration drift unresolved for ${unresolved.length} route(s); retrying next cycle`);
    return { unresolved };
  }

  private async reapplyAndVerify(workloads: WorkloadRecord[]): Promise<boolean> {
    const desired = this.compile(workloads);
    if (!validateConfig(desired, workloads, this.serverName)) return false;

    const result = await this.strategy.apply(desired);
    if (result.status !== "applied") return false;

    const live = await this.readAfterApply();
    return live !== null && verifyApplied(live, desired, this.serverName);
  }

  /**
   * Patch every label-derived target in place and re-check. `ok` is false
   * when the patch or the re-read failed; `unresolved` is then the drift
   * known beforehand.
   */
  private async forceRecover(
    workloads: WorkloadRecord[],
    before: DriftIssue[],
  ): Promise<{ ok: boolean; unresolved: DriftIssue[] }> {
    try {
      await this.strategy.forcePatch(expectedTargets(workloads));
      const live = await this.controlPlane.getConfig();
      return { ok: true, unresolved: detectDrift(live, workloads, this.serverName) };
    } catch (err) {
      logger.error("Forced route update failed", { err });
      return { ok: false, unresolved: before };
    }
  }

  private async readAfterApply(): Promise<CaddyConfig | null> {
    await this.sleep(this.verifyDelayMs);
    try {
      return await this.controlPlane.getConfig();
    } catch (err) {
      logger.warn("Could not re-read configuration after apply", { err });
      return null;
    }
  }

  private async diagnose(workloads: readonly WorkloadRecord[]): Promise<void> {
    try {
      await diagnoseUpstreams(workloads, this.inventory, this.probe);
    } catch (err) {
      logger.warn("Upstream diagnostics failed", { err });
    }
  }

  private async checkCertificates(workloads: readonly WorkloadRecord[]): Promise<CertificateHealthReport[]> {
    if (!this.certificates) return [];
    return this.certificates.checkDomains(publicHosts(buildRoutes(workloads)));
  }

  private idle(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
