// backend/services/shared/src/db/DbClientBuilder.ts
/**
 * Purpose:
 * - Construct a DbClient from environment variables.
 * - Support optional prefixing for per-service DB bindings (e.g. CATALOG_).
 *
 * Env (prefix "CATALOG" shown):
 *   required:
 *     - CATALOG_DB_URI
 *     - CATALOG_DB_NAME
 *   optional:
 *     - CATALOG_DB_DRIVER                      allowed: "mongo" [default: mongo]
 *     - CATALOG_DB_MAX_POOL_SIZE               [default: 50]
 *     - CATALOG_DB_WTIMEOUT_MS                 [default: 2500]
 *     - CATALOG_DB_SERVER_SELECTION_TIMEOUT_MS [default: 2000]
 */

import { DbClient } from "./DbClient";
import { MongoDbFactory } from "./mongo/MongoDbFactory";
import type { IDbConnectionInfo, IDbFactory } from "./types";
import { getEnv, getNumber, requireEnv, requireEnum } from "../env";

const DRIVERS = ["mongo"] as const;
type Driver = (typeof DRIVERS)[number];

export const DB_DEFAULTS = {
  maxPoolSize: 50,
  wtimeoutMS: 2500,
  serverSelectionTimeoutMS: 2000,
} as const;

/** Helper: join prefix and key into a strict env var name */
function prefixKey(prefix: string | undefined, key: string): string {
  return prefix ? `${prefix.toUpperCase()}_${key}` : key;
}

function requirePositiveInt(name: string, n: number): number {
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`Env var ${name} must be a positive integer, got ${n}`);
  }
  return n;
}

export function readDbConnectionInfo(opts?: {
  prefix?: string;
}): IDbConnectionInfo {
  const p = opts?.prefix;
  const poolKey = prefixKey(p, "DB_MAX_POOL_SIZE");
  const wtimeoutKey = prefixKey(p, "DB_WTIMEOUT_MS");
  const selectionKey = prefixKey(p, "DB_SERVER_SELECTION_TIMEOUT_MS");

  return {
    uri: requireEnv(prefixKey(p, "DB_URI")),
    dbName: requireEnv(prefixKey(p, "DB_NAME")),
    maxPoolSize: requirePositiveInt(
      poolKey,
      getNumber(poolKey, DB_DEFAULTS.maxPoolSize)
    ),
    wtimeoutMS: requirePositiveInt(
      wtimeoutKey,
      getNumber(wtimeoutKey, DB_DEFAULTS.wtimeoutMS)
    ),
    serverSelectionTimeoutMS: requirePositiveInt(
      selectionKey,
      getNumber(selectionKey, DB_DEFAULTS.serverSelectionTimeoutMS)
    ),
  };
}

export function createDbClientFromEnv(opts?: {
  prefix?: string;
  /** Pre-built factory (tests, alternative drivers); skips DB_DRIVER. */
  factory?: IDbFactory;
}): DbClient {
  const p = opts?.prefix;
  if (opts?.factory) {
    return new DbClient(opts.factory, readDbConnectionInfo(opts));
  }
  const driverKey = prefixKey(p, "DB_DRIVER");
  const driver: Driver = requireEnum(
    driverKey,
    getEnv(driverKey) ?? "mongo",
    DRIVERS
  );

  let factory: IDbFactory;
  switch (driver) {
    case "mongo":
      factory = new MongoDbFactory();
      break;
    default:
      throw new Error(`Unsupported ${driverKey}: ${String(driver)}`);
  }

  return new DbClient(factory, readDbConnectionInfo(opts));
}
