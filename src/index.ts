import Docker from "dockerode";
import { type Config, loadConfig } from "./config/index.js";
import { logger } from "./config/logger.js";
import { DockerInventory } from "./inventory/docker-inventory.js";
import { DockerLogSource } from "./inventory/docker-logs.js";
import { CertificateHealthMonitor } from "./monitoring/cert-health.js";
import { probeUpstream, type UpstreamProbe } from "./monitoring/connectivity.js";
import { CaddyAdminClient } from "./proxy/caddy-admin.js";
import { ReconcileLoop } from "./reconciler/reconcile-loop.js";

/** Wire the loop and its collaborators from a loaded config. */
export function createReconcileLoop(config: Config, docker: Docker): ReconcileLoop {
  const controlPlane = new CaddyAdminClient({
    caddyAdminUrl: config.caddyAdminUrl,
    serverName: config.serverName,
    readTimeoutMs: config.readTimeoutMs,
    applyTimeoutMs: config.applyTimeoutMs,
  });

  const probe: UpstreamProbe = (target, options) => probeUpstream(target, { timeoutMs: config.readTimeoutMs, ...options });

  const certificates = new CertificateHealthMonitor(new DockerLogSource(docker, config.caddyContainer), controlPlane, {
    logWindow: { tail: config.certLogTail, sinceSeconds: config.certLogWindowSeconds },
  });

  return new ReconcileLoop(new DockerInventory(docker), controlPlane, {
    compileOptions: {
      serverName: config.serverName,
      adminListen: config.adminListen,
      email: config.caddyEmail,
      useStagingCertificates: config.useStagingCertificates,
    },
    pollIntervalMs: config.pollIntervalMs,
    verifyDelayMs: config.verifyDelayMs,
    certificates,
    probe: config.probeUpstreams ? probe : undefined,
  });
}

// ---------------------------------------------------------------------------
// CLI entrypoint: only runs when executed directly
// ---------------------------------------------------------------------------

const isMain = process.argv[1]?.endsWith("dist/index.js") || process.argv[1]?.endsWith("src/index.ts");

if (isMain) {
  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    logger.error("Invalid configuration", { err });
    process.exit(1);
  }
  logger.level = config.logLevel;

  const docker = new Docker({ socketPath: config.dockerSocket });
  const loop = createReconcileLoop(config, docker);

  if (process.argv.includes("--once")) {
    try {
      const result = await loop.configureOnce();
      if (result.status === "configured") {
        logger.info("Caddy configuration completed");
        process.exit(0);
      }
      logger.error(`Caddy configuration ${result.status}`, { unresolved: result.unresolved });
    } catch (err) {
      logger.error("Caddy configuration failed", { err });
    }
    process.exit(1);
  }

  const shutdown = () => {
    logger.info("Shutting down...");
    loop.stop();
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  logger.info(`Watching containers labelled for Caddy at ${config.caddyAdminUrl}`);
  await loop.start();
}
