import { z } from "zod";

/** Accepts 1/true/yes/on (any case) as true; everything else, including unset, is false. */
const envBoolean = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((raw) => {
    if (typeof raw === "boolean") return raw;
    return ["1", "true", "yes", "on"].includes((raw ?? "").trim().toLowerCase());
  });

/** Empty strings are treated as unset so `FOO=` in a compose file falls back to the default. */
function blankToUndefined(raw: string | undefined): string | undefined {
  return raw === undefined || raw.trim() === "" ? undefined : raw.trim();
}

export const configSchema = z.object({
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Caddy admin API base URL. */
  caddyAdminUrl: z
    .string()
    .url()
    .default("http://localhost:2019")
    .transform((url) => url.replace(/\/+$/, "")),
  /** Admin listener written into every generated document. */
  adminListen: z.string().min(1).default("0.0.0.0:2019"),
  /** Name of the HTTP server block that owns the routes. */
  serverName: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, "serverName may only contain letters, digits, '-' and '_'")
    .default("srv0"),
  /** Container whose output is scanned for certificate errors. */
  caddyContainer: z.string().min(1).default("caddy"),
  /** ACME contact address. */
  caddyEmail: z.string().email().optional(),
  useStagingCertificates: envBoolean,

  dockerSocket: z.string().min(1).default("/var/run/docker.sock"),

  pollIntervalMs: z.coerce.number().int().min(100).default(5_000),
  readTimeoutMs: z.coerce.number().int().min(100).default(5_000),
  applyTimeoutMs: z.coerce.number().int().min(100).default(10_000),
  verifyDelayMs: z.coerce.number().int().min(0).default(2_000),

  certLogTail: z.coerce.number().int().min(1).default(500),
  certLogWindowSeconds: z.coerce.number().int().min(1).default(3_600),

  probeUpstreams: envBoolean,
});

export type Config = z.infer<typeof configSchema>;

/**
 * Build the daemon configuration from environment variables.
 * Throws a ZodError describing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    logLevel: blankToUndefined(env.LOG_LEVEL),
    caddyAdminUrl: blankToUndefined(env.CADDY_ADMIN_URL),
    adminListen: blankToUndefined(env.CADDY_ADMIN_LISTEN),
    serverName: blankToUndefined(env.CADDY_SERVER_NAME),
    caddyContainer: blankToUndefined(env.CADDY_CONTAINER),
    caddyEmail: blankToUndefined(env.CADDY_EMAIL),
    useStagingCertificates: env.USE_STAGING_CERTIFICATES,
    dockerSocket: blankToUndefined(env.DOCKER_SOCKET),
    pollIntervalMs: blankToUndefined(env.POLL_INTERVAL_MS),
    readTimeoutMs: blankToUndefined(env.READ_TIMEOUT_MS),
    applyTimeoutMs: blankToUndefined(env.APPLY_TIMEOUT_MS),
    verifyDelayMs: blankToUndefined(env.VERIFY_DELAY_MS),
    certLogTail: blankToUndefined(env.CERT_LOG_TAIL),
    certLogWindowSeconds: blankToUndefined(env.CERT_LOG_WINDOW_SECONDS),
    probeUpstreams: env.PROBE_UPSTREAMS,
  });
}
