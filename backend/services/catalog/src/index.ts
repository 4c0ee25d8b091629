// backend/services/catalog/src/index.ts
/**
 * Curated exports (no god-barrel).
 */
export { CatalogService, DEFAULT_COLLECTIONS } from "./CatalogService";
export type { CollectionNames } from "./CatalogService";
export { bootstrapCatalog } from "./bootstrap";
export type { BootstrapOptions } from "./bootstrap";
export { loadCatalogConfig, SERVICE_NAME } from "./config";

export { parseFilterIntent, NO_FILTER } from "./contracts/filter";
export type { FilterIntent } from "./contracts/filter";
export type * from "./contracts/movie";
export { compileFilter } from "./query/filterCompiler";
export type { QuerySpec } from "./query/filterCompiler";

export {
  CatalogError,
  FilterTooBroadError,
  PreconditionViolatedError,
  StoreFailureError,
} from "./errors";
export type { CatalogFailure, CatalogResult } from "./errors";

export { decodeObjectId, encodeObjectId } from "@catalog/shared/db/objectId";

export { MovieRepo } from "./repo/movieRepo";
export { CommentRepo } from "./repo/commentRepo";
export type { NewComment, CommentUpdate } from "./repo/commentRepo";
