// backend/services/catalog/src/bootstrap.ts
import { loadEnvFilesOrThrow } from "@catalog/shared/env";
import { createDbClientFromEnv } from "@catalog/shared/db/DbClientBuilder";
import type { DbClient } from "@catalog/shared/db/DbClient";
import type { IDbFactory } from "@catalog/shared/db/types";
import { initLogger } from "@catalog/shared/utils/logger";
import { CatalogService } from "./CatalogService";
import { ENV_PREFIX, loadCatalogConfig } from "./config";

export type BootstrapOptions = {
  /** Env files loaded in order (later wins); missing files are skipped. */
  envFiles?: string[];
  factory?: IDbFactory;
};

/**
 * Load env, init the logger, connect once and hand back a ready service.
 * The caller owns `db` and closes it on shutdown.
 */
export async function bootstrapCatalog(
  opts: BootstrapOptions = {}
): Promise<{ catalog: CatalogService; db: DbClient }> {
  loadEnvFilesOrThrow(opts.envFiles ?? [".env"], { allowMissing: true });

  const cfg = loadCatalogConfig();
  const log = initLogger(cfg.serviceName);
  const db = createDbClientFromEnv({
    prefix: ENV_PREFIX,
    factory: opts.factory,
  });

  try {
    await db.connect();
  } catch (err) {
    log.error(
      {
        target: db.target,
        err: err instanceof Error ? err.message : String(err),
      },
      "catalog db connection failed"
    );
    throw err;
  }
  log.info(
    {
      target: db.target,
      db: db.dbName,
      maxPoolSize: db.settings().maxPoolSize,
    },
    "catalog db connected"
  );

  return {
    catalog: CatalogService.create(db, {
      collections: cfg.collections,
      logger: log,
    }),
    db,
  };
}
