// backend/services/catalog/src/config.ts

/**
 * Catalog service settings. DB connection settings (URI, pool size,
 * timeouts) are read by the shared DbClientBuilder under the same prefix.
 *
 * Env:
 * - CATALOG_MOVIES_COLLECTION   (optional) [default: movies]
 * - CATALOG_COMMENTS_COLLECTION (optional) [default: comments]
 */

import { getEnv } from "@catalog/shared/env";
import type { CollectionNames } from "./CatalogService";

export const SERVICE_NAME = "catalog";
export const ENV_PREFIX = "CATALOG";

export type CatalogConfig = {
  serviceName: string;
  collections: CollectionNames;
};

export function loadCatalogConfig(): CatalogConfig {
  return {
    serviceName: getEnv(`${ENV_PREFIX}_SERVICE_NAME`) ?? SERVICE_NAME,
    collections: {
      movies: getEnv(`${ENV_PREFIX}_MOVIES_COLLECTION`) ?? "movies",
      comments: getEnv(`${ENV_PREFIX}_COMMENTS_COLLECTION`) ?? "comments",
    },
  };
}
