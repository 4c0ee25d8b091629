// backend/services/shared/src/base/RepoBase.ts
/**
 * Purpose:
 * - Thin shared base for Mongo-backed repos using DbClient.
 * - Handles collection access and a per-repo child logger.
 *
 * Notes:
 * - No retries here. Reads are idempotent; callers (or the driver's own
 *   retryable reads) own retry policy.
 */

import type { Document } from "mongodb";
import type { DbClient } from "../db/DbClient";
import type { StoreCollection } from "../db/types";
import { getLogger, type Logger } from "../utils/logger";

export interface RepoBaseConfig {
  /** Logical collection name (required). */
  collection: string;
  /** Optional db name override (else DbClient's default). */
  dbName?: string;
  /** Optional logger; defaults to a child of the shared logger. */
  logger?: Logger;
}

export abstract class RepoBase<TDoc extends Document = Document> {
  protected readonly db: DbClient;
  protected readonly collection: string;
  protected readonly dbName?: string;
  protected readonly log: Logger;

  constructor(db: DbClient, cfg: RepoBaseConfig) {
    if (!cfg.collection || !cfg.collection.trim()) {
      throw new Error("RepoBase: collection is required");
    }
    this.db = db;
    this.collection = cfg.collection.trim();
    this.dbName = cfg.dbName;
    this.log = (cfg.logger ?? getLogger()).child({
      component: this.constructor.name,
      collection: this.collection,
    });
  }

  /** Get a typed collection handle. */
  protected coll(): Promise<StoreCollection<TDoc>> {
    return this.db.getCollection<TDoc>(this.collection, this.dbName);
  }
}
