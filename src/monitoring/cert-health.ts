import { logger } from "../config/logger.js";
import type { LogSource, LogWindow } from "../inventory/types.js";
import type { ControlPlane } from "../proxy/caddy-admin.js";
import { tlsPolicies } from "../proxy/caddy-document.js";
import type { CaddyConfig } from "../proxy/types.js";

export type CertificateMode = "production" | "staging" | "unknown";
export type CertificateSeverity = "warning" | "error";

/** A named, ordered group of log signatures. */
export interface CertificatePatternFamily {
  kind: string;
  severity: CertificateSeverity;
  patterns: RegExp[];
}

export interface CertificateErrorDetail {
  kind: string;
  /** First log line matching the signature. */
  message: string;
  severity: CertificateSeverity;
}

export interface CertificateHealthReport {
  domain: string;
  status: CertificateMode;
  hasErrors: boolean;
  errorDetail?: CertificateErrorDetail;
}

export const RATE_LIMIT_FAMILY: CertificatePatternFamily = {
  kind: "rate_limit",
  severity: "warning",
  patterns: [/rateLimited/i, /too many certificates/i, /rate limit/i, /too many failed authorizations/i],
};

export const CERTIFICATE_ERROR_FAMILY: CertificatePatternFamily = {
  kind: "certificate_error",
  severity: "error",
  patterns: [
    /could not get certificate/i,
    /obtaining certificate.*error/i,
    /obtain.*failed/i,
    /acme.*error/i,
    /tls.*handshake.*error/i,
    /no solvers available/i,
    /challenge failed/i,
    /certificate.*(invalid|expired)/i,
  ],
};

/** Rate limits are checked before generic failures; the first family that matches wins. */
export const DEFAULT_PATTERN_FAMILIES: readonly CertificatePatternFamily[] = [RATE_LIMIT_FAMILY, CERTIFICATE_ERROR_FAMILY];

export interface CertificateHealthMonitorOptions {
  families?: readonly CertificatePatternFamily[];
  logWindow?: LogWindow;
}

/**
 * Scan a log blob for the first family with a matching signature. A match is
 * only credited when the domain also appears somewhere in the same blob.
 */
export function scanCertificateLogs(
  logs: string,
  domain: string,
  families: readonly CertificatePatternFamily[] = DEFAULT_PATTERN_FAMILIES,
): CertificateErrorDetail | undefined {
  if (!logs || !domain || !logs.toLowerCase().includes(domain.toLowerCase())) return undefined;

  const lines = logs.split(/\r?\n/);
  for (const family of families) {
    for (const pattern of family.patterns) {
      const line = lines.find((candidate) => pattern.test(candidate));
      if (line !== undefined) {
        return { kind: family.kind, message: line.trim(), severity: family.severity };
      }
    }
  }
  return undefined;
}

/** CA mode of the TLS automation policy covering a domain. */
export function certificateMode(config: CaddyConfig, domain: string): CertificateMode {
  const policy = tlsPolicies(config).find((candidate) => candidate.subjects?.includes(domain));
  if (!policy) return "unknown";
  const staging = (policy.issuers ?? []).some((issuer) => issuer.ca?.toLowerCase().includes("staging"));
  return staging ? "staging" : "production";
}

/**
 * Reports certificate trouble for routed domains from two independent
 * sources: recent proxy logs and the live TLS automation policy.
 */
export class CertificateHealthMonitor {
  private readonly logs: LogSource;
  private readonly controlPlane: ControlPlane;
  private readonly families: readonly CertificatePatternFamily[];
  private readonly logWindow: LogWindow;

  constructor(logs: LogSource, controlPlane: ControlPlane, options: CertificateHealthMonitorOptions = {}) {
    this.logs = logs;
    this.controlPlane = controlPlane;
    this.families = options.families ?? DEFAULT_PATTERN_FAMILIES;
    this.logWindow = options.logWindow ?? { tail: 500, sinceSeconds: 3600 };
  }

  async checkDomain(domain: string): Promise<CertificateHealthReport> {
    const [report] = await this.checkDomains([domain]);
    return report;
  }

  /** One report per domain, reading the logs and the live document once. */
  async checkDomains(domains: readonly string[]): Promise<CertificateHealthReport[]> {
    if (domains.length === 0) return [];

    const logs = await this.readLogs();
    const live = await this.readConfig();

    return domains.map((domain) => {
      const errorDetail = scanCertificateLogs(logs, domain, this.families);
      const report: CertificateHealthReport = {
        domain,
        status: live ? certificateMode(live, domain) : "unknown",
        hasErrors: errorDetail !== undefined,
        ...(errorDetail ? { errorDetail } : {}),
      };

      if (errorDetail?.severity === "error") {
        logger.error(`Certificate error for ${domain}: ${errorDetail.message}`);
      } else if (errorDetail) {
        logger.warn(`Certificate ${errorDetail.kind} for ${domain}: ${errorDetail.message}`);
      } else {
        logger.debug(`Certificate health for ${domain}: ${report.status}, no errors`);
      }
      return report;
    });
  }

  private async readLogs(): Promise<string> {
    try {
      return await this.logs.fetchRecent(this.logWindow);
    } catch (err) {
      logger.warn("Could not read proxy logs for certificate health", { err });
      return "";
    }
  }

  private async readConfig(): Promise<CaddyConfig | null> {
    try {
      return await this.controlPlane.getConfig();
    } catch (err) {
      logger.warn("Could not read live TLS policy", { err });
      return null;
    }
  }
}
