import winston from "winston";

const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(raw: string | undefined): LogLevel {
  const candidate = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === candidate) ?? "info";
}

/**
 * Process-wide logger. Emits one JSON object per line so the output can be
 * shipped as-is by the container runtime.
 */
export const logger = winston.createLogger({
  level: resolveLevel(process.env.LOG_LEVEL),
  format: winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json()),
  defaultMeta: { service: "caddy-label-sync" },
  transports: [new winston.transports.Console()],
});
