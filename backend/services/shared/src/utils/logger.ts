// backend/services/shared/src/utils/logger.ts
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared logger (pino).
 *
 * Each service calls `initLogger(SERVICE_NAME)` once at bootstrap so every
 * line carries `service`. Modules that log take a child:
 *   const log = getLogger().child({ component: "movieRepo" });
 *
 * Env:
 * - LOG_LEVEL (optional) fatal|error|warn|info|debug|trace|silent [default: info]
 */

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function resolveLogLevel(raw: string | undefined): LevelWithSilent {
  const v = (raw ?? "info").toLowerCase().trim();
  const hit = LEVELS.find((l) => l === v);
  if (hit === undefined) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return hit;
}

function pinoOptions(service?: string): LoggerOptions {
  return {
    level: resolveLogLevel(process.env.LOG_LEVEL),
    // no "service" until initLogger() runs
    base: service ? { service } : {},
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      remove: true,
      paths: ["uri", "*.uri", "password", "*.password"],
    },
  };
}

let logger: Logger = pino(pinoOptions());

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): Logger {
  const service = serviceName.trim();
  if (!service) throw new Error("initLogger requires serviceName");
  logger = pino(pinoOptions(service));
  return logger;
}

export function getLogger(): Logger {
  return logger;
}

export type { Logger };
